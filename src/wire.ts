/**
 * Wire format for the configuration and signing services.
 *
 * Field names match the .proto definitions (loaded with keepCase). Decoded
 * responses are validated with zod before anything reads them.
 */

import { status as GrpcStatus } from "@grpc/grpc-js";
import { z } from "zod";
import { TransportError } from "./errors.js";
import type { AppPublicKey, NodeIdentity, Peer, SignRequest, SignResponse } from "./types.js";

const bytes = z.instanceof(Uint8Array);
const uint32 = z.number().int().nonnegative();

export const nodeInfoResponseSchema = z.object({
  node_id: uint32,
  rpc_address: z.string().default(""),
  cert: bytes,
  key: bytes,
});

export const peerSchema = z.object({
  id: uint32,
  rpc_address: z.string(),
  cert: bytes,
  type: uint32,
});

export const peerNodeResponseSchema = z.object({
  peers: z.array(peerSchema).default([]),
});

export const signResponseSchema = z.object({
  signature: bytes.optional(),
  success: z.boolean(),
  error: z.string().optional(),
});

export const appPublicKeyResponseSchema = z.object({
  publickey: z.string().default(""),
  protocol: z.string().default(""),
  curve: z.string().default(""),
});

export type WireNodeInfoResponse = z.input<typeof nodeInfoResponseSchema>;
export type WirePeer = z.input<typeof peerSchema>;
export type WirePeerNodeResponse = z.input<typeof peerNodeResponseSchema>;
export type WireSignResponse = z.input<typeof signResponseSchema>;
export type WireAppPublicKeyResponse = z.input<typeof appPublicKeyResponseSchema>;

export interface WireSignRequest {
  from: number;
  public_key_info: Buffer;
  msg: Buffer;
  protocol: number;
  curve: number;
}

export interface WirePeerNodeRequest {
  node_type: string;
}

export interface WireAppPublicKeyRequest {
  app_id: string;
}

// --- Decoding ---

function decode<S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new TransportError(
      GrpcStatus.INTERNAL,
      `malformed ${what} response${where}: ${issue?.message ?? "invalid"}`,
      { cause: result.error },
    );
  }
  return result.data;
}

export function decodeNodeInfo(raw: unknown): NodeIdentity {
  const wire = decode(nodeInfoResponseSchema, raw, "GetNodeInfo");
  return {
    nodeId: wire.node_id,
    address: wire.rpc_address,
    cert: toBuffer(wire.cert),
    key: toBuffer(wire.key),
  };
}

export function decodePeers(raw: unknown): Peer[] {
  const wire = decode(peerNodeResponseSchema, raw, "GetPeerNode");
  return wire.peers.map((peer) => ({
    id: peer.id,
    address: peer.rpc_address,
    cert: toBuffer(peer.cert),
    type: peer.type,
  }));
}

export function decodeSignResponse(raw: unknown): SignResponse {
  const wire = decode(signResponseSchema, raw, "Sign");
  return {
    signature: wire.signature ?? new Uint8Array(),
    success: wire.success,
    error: wire.error ?? "",
  };
}

export function decodeAppPublicKey(raw: unknown): AppPublicKey {
  const wire = decode(appPublicKeyResponseSchema, raw, "GetPublicKeyByAppID");
  return { publicKey: wire.publickey, protocol: wire.protocol, curve: wire.curve };
}

// --- Encoding ---

export function signRequestToWire(request: SignRequest): WireSignRequest {
  return {
    from: request.from,
    public_key_info: toBuffer(request.publicKeyInfo),
    msg: toBuffer(request.message),
    protocol: request.protocol,
    curve: request.curve,
  };
}

export function toBuffer(data: Uint8Array): Buffer {
  return Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}
