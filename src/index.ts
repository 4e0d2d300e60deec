/**
 * enclave-signer-client: bootstrap configuration and mTLS signing for
 * trusted-execution nodes.
 *
 *   const config = await newConfigClient("10.0.0.5:50052").getConfig();
 *   const tasks = newTaskClient(config);
 *   await tasks.connect(tlsMaterialForTrustedPeer(config));
 *   const signature = await tasks.sign(message, publicKey, Protocol.SCHNORR, Curve.ED25519);
 *   await tasks.close();
 */

export { Client, type ClientOptions } from "./client.js";
export { AppIdClient, type AppIdClientOptions } from "./appid-client.js";
export {
  ConfigClient,
  newConfigClient,
  selectPeers,
  type ConfigClientOptions,
  type SelectedPeers,
} from "./config-client.js";
export {
  TaskClient,
  newTaskClient,
  REQUEST_ID_HEADER,
  type TaskClientOptions,
  type TaskClientState,
} from "./task-client.js";
export {
  ConfigurationError,
  ConnectionError,
  InvalidArgumentError,
  NotConnectedError,
  SignerClientError,
  SigningError,
  TransportError,
} from "./errors.js";
export { Logger, type LogLevel } from "./logger.js";
export { loadSettings, type ClientSettings } from "./config.js";
export { parseCurve, parseProtocol } from "./protocol.js";
export { tlsMaterialForAppPeer, tlsMaterialForTrustedPeer } from "./tls.js";
export { MAX_TIMEOUT_MS, checkTimeout, deriveDeadline, type SubDeadline } from "./deadline.js";
export {
  DEFAULT_SIGN_RETRY_POLICY,
  backoffSchedule,
  invokeWithRetry,
  type RetryPolicy,
} from "./transport/retry.js";
export {
  GrpcDialer,
  type AppIdServiceConnection,
  type CallOptions,
  type ConfigServiceConnection,
  type Dialer,
  type SigningServiceConnection,
} from "./transport/grpc.js";
export {
  Curve,
  DEFAULT_CLIENT_TIMEOUT_MS,
  DEFAULT_CONFIG_TIMEOUT_MS,
  DEFAULT_TASK_TIMEOUT_MS,
  NodeType,
  Protocol,
  type AppPublicKey,
  type NodeConfig,
  type Peer,
  type SignRequest,
  type SignResponse,
  type TlsMaterial,
} from "./types.js";
