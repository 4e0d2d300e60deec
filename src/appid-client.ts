/**
 * AppID client: public key lookup on the application node.
 *
 * Same channel lifecycle as TaskClient (unconnected, connected, closed),
 * over mTLS material built for the application peer.
 */

import { checkTimeout, deriveDeadline } from "./deadline.js";
import { ConnectionError, InvalidArgumentError, NotConnectedError, describeError } from "./errors.js";
import { Logger } from "./logger.js";
import { GrpcDialer, type AppIdServiceConnection, type Dialer } from "./transport/grpc.js";
import type { TaskClientState } from "./task-client.js";
import { DEFAULT_TASK_TIMEOUT_MS, type AppPublicKey, type NodeConfig, type TlsMaterial } from "./types.js";
import { decodeAppPublicKey } from "./wire.js";

export interface AppIdClientOptions {
  timeoutMs?: number;
  logger?: Logger;
  dialer?: Dialer;
}

export class AppIdClient {
  readonly nodeConfig: NodeConfig;
  private conn: AppIdServiceConnection | null = null;
  private currentState: TaskClientState = "unconnected";
  private timeoutMs: number;
  private logger: Logger;
  private dialer: Dialer;

  constructor(nodeConfig: NodeConfig, options: AppIdClientOptions = {}) {
    this.nodeConfig = nodeConfig;
    this.timeoutMs = checkTimeout(options.timeoutMs ?? DEFAULT_TASK_TIMEOUT_MS);
    this.logger = (options.logger ?? new Logger()).child("appid");
    this.dialer = options.dialer ?? new GrpcDialer();
  }

  get state(): TaskClientState {
    return this.currentState;
  }

  get timeout(): number {
    return this.timeoutMs;
  }

  setTimeout(timeoutMs: number): void {
    this.timeoutMs = checkTimeout(timeoutMs);
  }

  /** Opens the channel to the application node and waits until it is ready. */
  async connect(tls: TlsMaterial, signal?: AbortSignal): Promise<void> {
    this.releaseConnection();
    this.currentState = "unconnected";

    const address = this.nodeConfig.appNodeAddr;
    if (!address) {
      throw new ConnectionError(address, "no application node address in config");
    }

    let conn: AppIdServiceConnection;
    try {
      conn = this.dialer.dialAppIdService(address, tls);
    } catch (err) {
      throw new ConnectionError(
        address,
        `failed to connect to application node ${address}: ${describeError(err)}`,
        { cause: err },
      );
    }

    const sub = deriveDeadline(signal, this.timeoutMs);
    try {
      await conn.waitForReady({ signal: sub.signal, deadline: sub.deadline });
    } catch (err) {
      conn.close();
      throw new ConnectionError(
        address,
        `failed to connect to application node ${address}: ${describeError(err)}`,
        { cause: err },
      );
    } finally {
      sub.dispose();
    }

    this.conn = conn;
    this.currentState = "connected";
    this.logger.info(`Connected to application node at ${address}`);
  }

  async close(): Promise<void> {
    if (!this.conn) return;
    this.releaseConnection();
    this.currentState = "closed";
  }

  /**
   * Looks up the key registered for `appId`. Transport failures reject with
   * TransportError, a malformed reply with TransportError INTERNAL.
   */
  async getPublicKeyByAppId(appId: string, signal?: AbortSignal): Promise<AppPublicKey> {
    if (!appId) throw new InvalidArgumentError("appId", "app id cannot be empty");

    const conn = this.conn;
    if (!conn) throw new NotConnectedError("AppID client not connected");

    const sub = deriveDeadline(signal, this.timeoutMs);
    try {
      this.logger.debug(`Looking up public key for app ${appId}`);
      const raw = await conn.getPublicKeyByAppId({ app_id: appId }, { signal: sub.signal, deadline: sub.deadline });
      return decodeAppPublicKey(raw);
    } finally {
      sub.dispose();
    }
  }

  private releaseConnection(): void {
    if (!this.conn) return;
    this.conn.close();
    this.conn = null;
  }
}
