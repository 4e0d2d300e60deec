/**
 * Task client: signing requests to the trusted-execution node.
 *
 * Holds at most one mutually-authenticated channel. Lifecycle:
 *
 *   unconnected --connect()--> connected --close()--> closed
 *
 * connect() on a connected or closed client replaces the channel. Each
 * sign() runs under its own sub-deadline and the retry policy.
 */

import { v4 as uuidv4 } from "uuid";
import { checkTimeout, deriveDeadline } from "./deadline.js";
import {
  ConnectionError,
  InvalidArgumentError,
  NotConnectedError,
  SigningError,
  describeError,
} from "./errors.js";
import { Logger } from "./logger.js";
import { GrpcDialer, type Dialer, type SigningServiceConnection } from "./transport/grpc.js";
import { DEFAULT_SIGN_RETRY_POLICY, invokeWithRetry, type RetryPolicy } from "./transport/retry.js";
import { DEFAULT_TASK_TIMEOUT_MS, type NodeConfig, type TlsMaterial } from "./types.js";
import { decodeSignResponse, signRequestToWire } from "./wire.js";

export type TaskClientState = "unconnected" | "connected" | "closed";

export interface TaskClientOptions {
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
  dialer?: Dialer;
}

export const REQUEST_ID_HEADER = "x-request-id";

export class TaskClient {
  readonly nodeConfig: NodeConfig;
  private conn: SigningServiceConnection | null = null;
  private currentState: TaskClientState = "unconnected";
  private timeoutMs: number;
  private retryPolicy: RetryPolicy;
  private logger: Logger;
  private dialer: Dialer;

  constructor(nodeConfig: NodeConfig, options: TaskClientOptions = {}) {
    this.nodeConfig = nodeConfig;
    this.timeoutMs = checkTimeout(options.timeoutMs ?? DEFAULT_TASK_TIMEOUT_MS);
    this.retryPolicy = options.retryPolicy ?? DEFAULT_SIGN_RETRY_POLICY;
    this.logger = (options.logger ?? new Logger()).child("task");
    this.dialer = options.dialer ?? new GrpcDialer();
  }

  get state(): TaskClientState {
    return this.currentState;
  }

  get timeout(): number {
    return this.timeoutMs;
  }

  /** Applies to sign calls started after this one. */
  setTimeout(timeoutMs: number): void {
    this.timeoutMs = checkTimeout(timeoutMs);
  }

  /**
   * Opens the channel to the trusted-execution node and waits until it is
   * ready, bounded by the task timeout and `signal`. Any previous channel is
   * closed first. On failure the client is left unconnected.
   */
  async connect(tls: TlsMaterial, signal?: AbortSignal): Promise<void> {
    this.releaseConnection();
    this.currentState = "unconnected";

    const address = this.nodeConfig.rpcAddress;
    if (!address) {
      throw new ConnectionError(address, "no trusted-execution node address in config");
    }

    let conn: SigningServiceConnection;
    try {
      conn = this.dialer.dialSigningService(address, tls);
    } catch (err) {
      throw new ConnectionError(
        address,
        `failed to connect to trusted-execution node ${address}: ${describeError(err)}`,
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
        `failed to connect to trusted-execution node ${address}: ${describeError(err)}`,
        { cause: err },
      );
    } finally {
      sub.dispose();
    }

    this.conn = conn;
    this.currentState = "connected";
    this.logger.info(`Connected to trusted-execution node at ${address}`);
  }

  /** Releases the channel. Safe to call any number of times, connected or not. */
  async close(): Promise<void> {
    if (!this.conn) return;
    this.releaseConnection();
    this.currentState = "closed";
    this.logger.debug("Connection closed");
  }

  /**
   * Signs `message` with the key referenced by `publicKey`. Resolves with the
   * signature bytes; rejects with InvalidArgumentError or NotConnectedError
   * before any I/O, SigningError when the node refuses, TransportError when
   * the call itself fails.
   */
  async sign(
    message: Uint8Array,
    publicKey: Uint8Array,
    protocol: number,
    curve: number,
    signal?: AbortSignal,
  ): Promise<Uint8Array> {
    if (message.length === 0) {
      throw new InvalidArgumentError("message", "message cannot be empty");
    }
    if (publicKey.length === 0) {
      throw new InvalidArgumentError("publicKey", "public key cannot be empty");
    }

    const conn = this.conn;
    if (!conn) throw new NotConnectedError();

    const requestId = uuidv4();
    const request = signRequestToWire({
      from: this.nodeConfig.nodeId,
      publicKeyInfo: publicKey,
      message,
      protocol,
      curve,
    });

    const sub = deriveDeadline(signal, this.timeoutMs);
    try {
      const callOptions = {
        signal: sub.signal,
        deadline: sub.deadline,
        metadata: { [REQUEST_ID_HEADER]: requestId },
      };

      const response = await invokeWithRetry(
        this.retryPolicy,
        async (attempt) => {
          this.logger.debug(`Sign ${requestId} attempt ${attempt}`);
          return decodeSignResponse(await conn.sign(request, callOptions));
        },
        sub.signal,
        this.logger,
      );

      if (!response.success) {
        throw new SigningError(response.error.trim() || "unknown error");
      }
      return response.signature;
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

export function newTaskClient(nodeConfig: NodeConfig, options?: TaskClientOptions): TaskClient {
  return new TaskClient(nodeConfig, options);
}
