/**
 * In-memory Dialer for unit tests. Each connection plays back a script of
 * responses; a "hang" step only settles when the call's signal aborts, the
 * way a real call is cancelled.
 */

import { abortError } from "../deadline.js";
import type {
  AppIdServiceConnection,
  CallOptions,
  ConfigServiceConnection,
  Dialer,
  SigningServiceConnection,
} from "../transport/grpc.js";
import type { TlsMaterial } from "../types.js";
import type { WireAppPublicKeyRequest, WirePeerNodeRequest, WireSignRequest } from "../wire.js";

export type Step = { response: unknown } | { error: Error } | { hang: true };

function play(step: Step, options: CallOptions): Promise<unknown> {
  if ("response" in step) return Promise.resolve(step.response);
  if ("error" in step) return Promise.reject(step.error);

  return new Promise((_resolve, reject) => {
    const { signal } = options;
    if (signal.aborted) {
      reject(abortError(signal));
      return;
    }
    signal.addEventListener("abort", () => reject(abortError(signal)), { once: true });
  });
}

export class FakeConfigService implements ConfigServiceConnection {
  nodeInfo: Step = { response: { node_id: 1, rpc_address: "", cert: Buffer.alloc(0), key: Buffer.alloc(0) } };
  peers: Step = { response: { peers: [] } };
  calls: string[] = [];
  closeCount = 0;

  getNodeInfo(options: CallOptions): Promise<unknown> {
    this.calls.push("GetNodeInfo");
    return play(this.nodeInfo, options);
  }

  getPeerNode(_request: WirePeerNodeRequest, options: CallOptions): Promise<unknown> {
    this.calls.push("GetPeerNode");
    return play(this.peers, options);
  }

  close(): void {
    this.closeCount++;
  }
}

export class FakeSigningService implements SigningServiceConnection {
  readonly address: string;
  readonly tls: TlsMaterial;
  ready: Step = { response: undefined };
  /** Played in order; once exhausted every call gets `fallback`. */
  script: Step[] = [];
  fallback: Step = { response: { signature: Buffer.from("sig"), success: true, error: "" } };
  requests: Array<{ request: WireSignRequest; options: CallOptions }> = [];
  closeCount = 0;

  constructor(address: string, tls: TlsMaterial) {
    this.address = address;
    this.tls = tls;
  }

  async waitForReady(options: CallOptions): Promise<void> {
    await play(this.ready, options);
  }

  sign(request: WireSignRequest, options: CallOptions): Promise<unknown> {
    this.requests.push({ request, options });
    return play(this.script.shift() ?? this.fallback, options);
  }

  close(): void {
    this.closeCount++;
  }
}

export class FakeAppIdService implements AppIdServiceConnection {
  readonly address: string;
  readonly tls: TlsMaterial;
  ready: Step = { response: undefined };
  lookup: Step = { response: { publickey: "", protocol: "", curve: "" } };
  requests: Array<{ request: WireAppPublicKeyRequest; options: CallOptions }> = [];
  closeCount = 0;

  constructor(address: string, tls: TlsMaterial) {
    this.address = address;
    this.tls = tls;
  }

  async waitForReady(options: CallOptions): Promise<void> {
    await play(this.ready, options);
  }

  getPublicKeyByAppId(request: WireAppPublicKeyRequest, options: CallOptions): Promise<unknown> {
    this.requests.push({ request, options });
    return play(this.lookup, options);
  }

  close(): void {
    this.closeCount++;
  }
}

export class FakeDialer implements Dialer {
  readonly configService = new FakeConfigService();
  readonly signingServices: FakeSigningService[] = [];
  readonly appIdServices: FakeAppIdService[] = [];
  configAddresses: string[] = [];
  dialError: Error | null = null;
  /** Applied to each signing connection as it is dialed. */
  prepareSigning: (service: FakeSigningService) => void = () => {};
  prepareAppId: (service: FakeAppIdService) => void = () => {};

  dialConfigService(address: string): ConfigServiceConnection {
    if (this.dialError) throw this.dialError;
    this.configAddresses.push(address);
    return this.configService;
  }

  dialSigningService(address: string, tls: TlsMaterial): SigningServiceConnection {
    if (this.dialError) throw this.dialError;
    const service = new FakeSigningService(address, tls);
    this.prepareSigning(service);
    this.signingServices.push(service);
    return service;
  }

  dialAppIdService(address: string, tls: TlsMaterial): AppIdServiceConnection {
    if (this.dialError) throw this.dialError;
    const service = new FakeAppIdService(address, tls);
    this.prepareAppId(service);
    this.appIdServices.push(service);
    return service;
  }

  get lastSigning(): FakeSigningService | undefined {
    return this.signingServices[this.signingServices.length - 1];
  }

  get lastAppId(): FakeAppIdService | undefined {
    return this.appIdServices[this.appIdServices.length - 1];
  }
}
