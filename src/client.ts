/**
 * Client facade over the configuration and task clients.
 *
 * init() resolves the NodeConfig from the configuration service, then opens
 * mTLS channels to the trusted-execution node and, when the config names
 * one, to the application node used for AppID key lookups.
 */

import { AppIdClient } from "./appid-client.js";
import { loadSettings } from "./config.js";
import { ConfigClient } from "./config-client.js";
import { ConfigurationError, NotConnectedError } from "./errors.js";
import { Logger } from "./logger.js";
import { parseCurve, parseProtocol } from "./protocol.js";
import { TaskClient } from "./task-client.js";
import { tlsMaterialForAppPeer, tlsMaterialForTrustedPeer } from "./tls.js";
import type { Dialer } from "./transport/grpc.js";
import type { RetryPolicy } from "./transport/retry.js";
import { checkTimeout } from "./deadline.js";
import { DEFAULT_CLIENT_TIMEOUT_MS, type AppPublicKey, type NodeConfig } from "./types.js";

export interface ClientOptions {
  /** Budget for getConfig, connect and each sign call, unless overridden below. */
  timeoutMs?: number;
  configTimeoutMs?: number;
  taskTimeoutMs?: number;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
  dialer?: Dialer;
}

export class Client {
  private configClient: ConfigClient;
  private taskClient: TaskClient | null = null;
  private appIdClient: AppIdClient | null = null;
  private config: NodeConfig | null = null;
  private timeoutMs: number;
  private options: ClientOptions;
  private logger: Logger;

  constructor(configServerAddress: string, options: ClientOptions = {}) {
    this.options = options;
    this.timeoutMs = checkTimeout(options.timeoutMs ?? DEFAULT_CLIENT_TIMEOUT_MS);
    this.logger = options.logger ?? new Logger();
    this.configClient = new ConfigClient(configServerAddress, {
      timeoutMs: options.configTimeoutMs ?? this.timeoutMs,
      logger: this.logger,
      dialer: options.dialer,
    });
  }

  /** Builds a client from SIGNER_* env vars (see loadSettings). */
  static fromEnv(env: NodeJS.ProcessEnv = process.env, overrides: ClientOptions = {}): Client {
    const settings = loadSettings(env);
    return new Client(settings.configServerAddress, {
      timeoutMs: settings.clientTimeoutMs,
      configTimeoutMs: settings.configTimeoutMs,
      taskTimeoutMs: settings.taskTimeoutMs,
      logger: new Logger(settings.logLevel),
      ...overrides,
    });
  }

  get nodeId(): number {
    return this.config?.nodeId ?? 0;
  }

  get nodeConfig(): NodeConfig | undefined {
    return this.config ?? undefined;
  }

  async init(signal?: AbortSignal): Promise<void> {
    const config = await this.configClient.getConfig(signal);
    const taskTls = tlsMaterialForTrustedPeer(config);
    const appTls = config.appNodeAddr ? tlsMaterialForAppPeer(config) : null;

    const taskTimeoutMs = this.options.taskTimeoutMs ?? this.timeoutMs;
    const taskClient = new TaskClient(config, {
      timeoutMs: taskTimeoutMs,
      retryPolicy: this.options.retryPolicy,
      logger: this.logger,
      dialer: this.options.dialer,
    });
    await taskClient.connect(taskTls, signal);

    let appIdClient: AppIdClient | null = null;
    if (appTls) {
      appIdClient = new AppIdClient(config, {
        timeoutMs: taskTimeoutMs,
        logger: this.logger,
        dialer: this.options.dialer,
      });
      try {
        await appIdClient.connect(appTls, signal);
      } catch (err) {
        await taskClient.close();
        throw err;
      }
    } else {
      this.logger.warn("No application node in config; AppID lookups are unavailable");
    }

    await this.releaseClients();
    this.config = config;
    this.taskClient = taskClient;
    this.appIdClient = appIdClient;
    this.logger.info(`Client initialized successfully, node ID: ${config.nodeId}`);
  }

  async sign(
    message: Uint8Array,
    publicKey: Uint8Array,
    protocol: number,
    curve: number,
    signal?: AbortSignal,
  ): Promise<Uint8Array> {
    if (!this.taskClient) throw new NotConnectedError("client not initialized");
    return this.taskClient.sign(message, publicKey, protocol, curve, signal);
  }

  /** Like sign, with protocol and curve given by name ("schnorr", "secp256k1", or a numeric tag). */
  async signWith(
    message: Uint8Array,
    publicKey: Uint8Array,
    protocolName: string,
    curveName: string,
    signal?: AbortSignal,
  ): Promise<Uint8Array> {
    return this.sign(message, publicKey, parseProtocol(protocolName), parseCurve(curveName), signal);
  }

  /** Public key, protocol and curve registered on the application node for `appId`. */
  async getPublicKeyByAppId(appId: string, signal?: AbortSignal): Promise<AppPublicKey> {
    if (!this.appIdClient) throw new NotConnectedError("AppID client not initialized");
    return this.appIdClient.getPublicKeyByAppId(appId, signal);
  }

  /** Looks up the key for `appId`, then signs `message` with it. */
  async signWithAppId(message: Uint8Array, appId: string, signal?: AbortSignal): Promise<Uint8Array> {
    const { publicKey, protocol, curve } = await this.getPublicKeyByAppId(appId, signal);

    const keyBytes = Buffer.from(publicKey, "base64");
    if (keyBytes.length === 0) {
      throw new ConfigurationError(`no public key registered for app ${appId}`);
    }
    return this.sign(message, keyBytes, parseProtocol(protocol), parseCurve(curve), signal);
  }

  /** Sets one budget for everything, dropping the per-client overrides. */
  setTimeout(timeoutMs: number): void {
    this.timeoutMs = checkTimeout(timeoutMs);
    this.options = { ...this.options, configTimeoutMs: undefined, taskTimeoutMs: undefined };
    this.configClient.setTimeout(timeoutMs);
    this.taskClient?.setTimeout(timeoutMs);
    this.appIdClient?.setTimeout(timeoutMs);
  }

  async close(): Promise<void> {
    await this.releaseClients();
  }

  private async releaseClients(): Promise<void> {
    await this.taskClient?.close();
    await this.appIdClient?.close();
    this.taskClient = null;
    this.appIdClient = null;
  }
}
