/**
 * gRPC transport for the configuration and signing services.
 *
 * Service definitions are loaded at run time from proto/ with
 * @grpc/proto-loader; calls go through grpc.Client.makeUnaryRequest so the
 * clients never touch generated stubs. Responses are returned undecoded and
 * validated by wire.ts.
 */

import * as path from "node:path";
import { fileURLToPath } from "node:url";
import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import { abortError } from "../deadline.js";
import { TransportError } from "../errors.js";
import type { TlsMaterial } from "../types.js";
import type { WireAppPublicKeyRequest, WirePeerNodeRequest, WireSignRequest } from "../wire.js";

// --- Connection interfaces ---

export interface CallOptions {
  signal: AbortSignal;
  deadline: Date;
  metadata?: Record<string, string>;
}

/** Insecure channel to the configuration service. */
export interface ConfigServiceConnection {
  getNodeInfo(options: CallOptions): Promise<unknown>;
  getPeerNode(request: WirePeerNodeRequest, options: CallOptions): Promise<unknown>;
  close(): void;
}

/** Mutually-authenticated channel to the trusted-execution node. */
export interface SigningServiceConnection {
  waitForReady(options: CallOptions): Promise<void>;
  sign(request: WireSignRequest, options: CallOptions): Promise<unknown>;
  close(): void;
}

/** Mutually-authenticated channel to the application node. */
export interface AppIdServiceConnection {
  waitForReady(options: CallOptions): Promise<void>;
  getPublicKeyByAppId(request: WireAppPublicKeyRequest, options: CallOptions): Promise<unknown>;
  close(): void;
}

/**
 * Creates channels. Dialing is lazy: nothing goes over the network until the
 * first call or waitForReady. Tests swap in an in-memory implementation.
 */
export interface Dialer {
  dialConfigService(address: string): ConfigServiceConnection;
  dialSigningService(address: string, tls: TlsMaterial): SigningServiceConnection;
  dialAppIdService(address: string, tls: TlsMaterial): AppIdServiceConnection;
}

// --- Service definitions ---

const PROTO_DIR = fileURLToPath(new URL("../../proto/", import.meta.url));

const loaderOptions: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

export const CONFIG_SERVICE = { file: "node_management/node_management.proto", name: "tee_node_management.CLIRPCService" };
export const SIGNING_SERVICE = { file: "key_management/user_task.proto", name: "UserTask" };
export const APPID_SERVICE = { file: "appid/appid_service.proto", name: "appid.AppIDService" };

type MethodDefinition = protoLoader.MethodDefinition<object, object>;

const serviceCache = new Map<string, protoLoader.ServiceDefinition>();

/** Loads (once) a service definition from proto/. */
export function loadService(source: { file: string; name: string }): protoLoader.ServiceDefinition {
  const cached = serviceCache.get(source.name);
  if (cached) return cached;

  const definition = protoLoader.loadSync(path.join(PROTO_DIR, source.file), loaderOptions);
  const service = definition[source.name];
  if (!service || "format" in service) {
    throw new Error(`service ${source.name} not found in ${source.file}`);
  }
  serviceCache.set(source.name, service);
  return service;
}

function method(service: protoLoader.ServiceDefinition, name: string): MethodDefinition {
  const definition = service[name];
  if (!definition) throw new Error(`method ${name} not found`);
  return definition;
}

// --- Channel options ---

/** Keepalive for the long-lived mTLS channels. Built-in retries are off; RetryPolicy applies instead. */
export const MTLS_CHANNEL_OPTIONS: grpc.ChannelOptions = {
  "grpc.keepalive_time_ms": 30_000,
  "grpc.keepalive_timeout_ms": 5_000,
  "grpc.keepalive_permit_without_calls": 1,
  "grpc.http2.max_pings_without_data": 0,
  "grpc.enable_retries": 0,
};

export const CONFIG_CHANNEL_OPTIONS: grpc.ChannelOptions = {
  "grpc.enable_retries": 0,
};

// --- Unary calls ---

export function toTransportError(err: grpc.ServiceError): TransportError {
  return new TransportError(err.code, err.details || err.message, { cause: err });
}

function unaryCall(
  client: grpc.Client,
  definition: MethodDefinition,
  request: object,
  options: CallOptions,
): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const { signal } = options;
    if (signal.aborted) {
      reject(abortError(signal));
      return;
    }

    const metadata = new grpc.Metadata();
    for (const [key, value] of Object.entries(options.metadata ?? {})) {
      metadata.set(key, value);
    }

    let settled = false;
    const onAbort = () => {
      if (settled) return;
      settled = true;
      call.cancel();
      reject(abortError(signal));
    };

    const call = client.makeUnaryRequest(
      definition.path,
      definition.requestSerialize,
      definition.responseDeserialize,
      request,
      metadata,
      { deadline: options.deadline },
      (err, response) => {
        signal.removeEventListener("abort", onAbort);
        if (settled) return;
        settled = true;
        if (err) {
          reject(toTransportError(err));
        } else {
          resolve(response);
        }
      },
    );

    signal.addEventListener("abort", onAbort, { once: true });
  });
}

function waitUntilReady(client: grpc.Client, options: CallOptions): Promise<void> {
  return new Promise((resolve, reject) => {
    const { signal } = options;
    if (signal.aborted) {
      reject(abortError(signal));
      return;
    }

    let settled = false;
    const onAbort = () => {
      if (settled) return;
      settled = true;
      reject(abortError(signal));
    };
    signal.addEventListener("abort", onAbort, { once: true });

    client.waitForReady(options.deadline, (err) => {
      signal.removeEventListener("abort", onAbort);
      if (settled) return;
      settled = true;
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}

// --- Dialer ---

export class GrpcDialer implements Dialer {
  dialConfigService(address: string): ConfigServiceConnection {
    const service = loadService(CONFIG_SERVICE);
    const client = new grpc.Client(address, grpc.credentials.createInsecure(), CONFIG_CHANNEL_OPTIONS);

    return {
      getNodeInfo: (options) => unaryCall(client, method(service, "GetNodeInfo"), {}, options),
      getPeerNode: (request, options) =>
        unaryCall(client, method(service, "GetPeerNode"), request, options),
      close: () => client.close(),
    };
  }

  dialSigningService(address: string, tls: TlsMaterial): SigningServiceConnection {
    const service = loadService(SIGNING_SERVICE);
    const credentials = grpc.credentials.createSsl(tls.ca, tls.key, tls.cert);
    const client = new grpc.Client(address, credentials, MTLS_CHANNEL_OPTIONS);

    return {
      waitForReady: (options) => waitUntilReady(client, options),
      sign: (request, options) => unaryCall(client, method(service, "Sign"), request, options),
      close: () => client.close(),
    };
  }

  dialAppIdService(address: string, tls: TlsMaterial): AppIdServiceConnection {
    const service = loadService(APPID_SERVICE);
    const credentials = grpc.credentials.createSsl(tls.ca, tls.key, tls.cert);
    const client = new grpc.Client(address, credentials, MTLS_CHANNEL_OPTIONS);

    return {
      waitForReady: (options) => waitUntilReady(client, options),
      getPublicKeyByAppId: (request, options) =>
        unaryCall(client, method(service, "GetPublicKeyByAppID"), request, options),
      close: () => client.close(),
    };
  }
}
