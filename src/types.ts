/**
 * Shared types for the signer clients.
 *
 * Wire shapes (snake_case) live in wire.ts; these are the values callers
 * see once a response has been validated.
 */

export const NodeType = {
  INVALID: 0,
  TRUSTED_EXECUTION: 1,
  MESH: 2,
  APPLICATION: 3,
} as const;

export type NodeType = (typeof NodeType)[keyof typeof NodeType];

export const Protocol = {
  ECDSA: 1,
  SCHNORR: 2,
} as const;

export const Curve = {
  ED25519: 1,
  SECP256K1: 2,
  SECP256R1: 3,
} as const;

/**
 * Resolved configuration snapshot. Produced frozen by ConfigClient.getConfig;
 * a fresh resolution returns a fresh object.
 */
export interface NodeConfig {
  readonly nodeId: number;
  readonly cert: Buffer;
  readonly key: Buffer;
  /** Trusted-execution peer. Empty when no such peer was found. */
  readonly rpcAddress: string;
  readonly targetCert: Buffer;
  /** Application peer. Empty when no such peer was found. */
  readonly appNodeAddr: string;
  readonly appNodeCert: Buffer;
}

export interface NodeIdentity {
  nodeId: number;
  address: string;
  cert: Buffer;
  key: Buffer;
}

export interface Peer {
  id: number;
  address: string;
  cert: Buffer;
  /** Raw type tag; values outside NodeType are kept and never selected. */
  type: number;
}

/** PEM material for a mutually-authenticated channel. */
export interface TlsMaterial {
  cert: Buffer;
  key: Buffer;
  /** Certificate of the peer to trust. */
  ca: Buffer;
}

export interface SignRequest {
  from: number;
  publicKeyInfo: Uint8Array;
  message: Uint8Array;
  protocol: number;
  curve: number;
}

export interface SignResponse {
  signature: Uint8Array;
  success: boolean;
  error: string;
}

/** Key registered for an application id, as the application node reports it. */
export interface AppPublicKey {
  /** Base64 encoded. */
  publicKey: string;
  protocol: string;
  curve: string;
}

export const DEFAULT_CONFIG_TIMEOUT_MS = 10_000;
export const DEFAULT_TASK_TIMEOUT_MS = 10_000;
export const DEFAULT_CLIENT_TIMEOUT_MS = 30_000;
