/**
 * Bootstrap configuration client.
 *
 * Pulls this node's identity and its peer list from the management service
 * over an insecure channel, and resolves them into a NodeConfig. The
 * certificates it hands back are what later channels trust.
 */

import { checkTimeout, deriveDeadline } from "./deadline.js";
import { ConfigurationError, ConnectionError, describeError } from "./errors.js";
import { Logger } from "./logger.js";
import {
  GrpcDialer,
  type CallOptions,
  type ConfigServiceConnection,
  type Dialer,
} from "./transport/grpc.js";
import { DEFAULT_CONFIG_TIMEOUT_MS, NodeType, type NodeConfig, type Peer } from "./types.js";
import { decodeNodeInfo, decodePeers } from "./wire.js";

export interface ConfigClientOptions {
  timeoutMs?: number;
  logger?: Logger;
  dialer?: Dialer;
}

export interface SelectedPeers {
  trustedExecution?: Peer;
  application?: Peer;
}

/**
 * Single pass over `peers`, keeping the first peer of each wanted type and
 * stopping once both are found.
 */
export function selectPeers(peers: Iterable<Peer>): SelectedPeers {
  const selected: SelectedPeers = {};

  for (const peer of peers) {
    if (peer.type === NodeType.TRUSTED_EXECUTION) {
      selected.trustedExecution ??= peer;
    } else if (peer.type === NodeType.APPLICATION) {
      selected.application ??= peer;
    }
    if (selected.trustedExecution && selected.application) break;
  }

  return selected;
}

export class ConfigClient {
  readonly serverAddress: string;
  private timeoutMs: number;
  private logger: Logger;
  private dialer: Dialer;

  constructor(serverAddress: string, options: ConfigClientOptions = {}) {
    this.serverAddress = serverAddress;
    this.timeoutMs = checkTimeout(options.timeoutMs ?? DEFAULT_CONFIG_TIMEOUT_MS);
    this.logger = (options.logger ?? new Logger()).child("config");
    this.dialer = options.dialer ?? new GrpcDialer();
  }

  get timeout(): number {
    return this.timeoutMs;
  }

  /** Applies to getConfig calls started after this one. */
  setTimeout(timeoutMs: number): void {
    this.timeoutMs = checkTimeout(timeoutMs);
  }

  async getConfig(signal?: AbortSignal): Promise<NodeConfig> {
    const sub = deriveDeadline(signal, this.timeoutMs);
    try {
      const conn = this.dial();
      try {
        return await this.fetchFromServer(conn, { signal: sub.signal, deadline: sub.deadline });
      } finally {
        conn.close();
      }
    } finally {
      sub.dispose();
    }
  }

  private dial(): ConfigServiceConnection {
    try {
      return this.dialer.dialConfigService(this.serverAddress);
    } catch (err) {
      const cause = new ConnectionError(
        this.serverAddress,
        `failed to connect to config server ${this.serverAddress}: ${describeError(err)}`,
        { cause: err },
      );
      throw new ConfigurationError(cause.message, { cause });
    }
  }

  private async fetchFromServer(conn: ConfigServiceConnection, callOptions: CallOptions): Promise<NodeConfig> {
    this.logger.debug(`Requesting node info from ${this.serverAddress}`);
    const identity = await conn.getNodeInfo(callOptions).then(decodeNodeInfo).catch((err: unknown) => {
      throw new ConfigurationError(`failed to get node info: ${describeError(err)}`, { cause: err });
    });

    this.logger.debug(`Requesting peer list from ${this.serverAddress}`);
    const peers = await conn.getPeerNode({ node_type: "" }, callOptions).then(decodePeers).catch((err: unknown) => {
      throw new ConfigurationError(`failed to get peer nodes: ${describeError(err)}`, { cause: err });
    });

    const { trustedExecution, application } = selectPeers(peers);
    if (!trustedExecution && !application) {
      throw new ConfigurationError(`no trusted-execution or application node among ${peers.length} peers`);
    }
    if (!trustedExecution) this.logger.warn("No trusted-execution node found; signing will be unavailable");
    if (!application) this.logger.warn("No application node found");

    const config: NodeConfig = Object.freeze({
      nodeId: identity.nodeId,
      cert: identity.cert,
      key: identity.key,
      rpcAddress: trustedExecution?.address ?? "",
      targetCert: trustedExecution?.cert ?? Buffer.alloc(0),
      appNodeAddr: application?.address ?? "",
      appNodeCert: application?.cert ?? Buffer.alloc(0),
    });

    this.logger.info(`Retrieved config from server, node ID: ${config.nodeId}`);
    return config;
  }
}

export function newConfigClient(serverAddress: string, options?: ConfigClientOptions): ConfigClient {
  return new ConfigClient(serverAddress, options);
}
