/**
 * End-to-end tests against real gRPC servers on loopback.
 *
 * Setup:
 *   config server: CLIRPCService over an insecure channel
 *   peer server: UserTask and AppIDService over mTLS, trusting only the
 *   client certificate
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as grpc from "@grpc/grpc-js";
import { Client } from "./client.js";
import { ConfigClient } from "./config-client.js";
import { ConfigurationError, ConnectionError, SigningError, TransportError } from "./errors.js";
import { Logger } from "./logger.js";
import { REQUEST_ID_HEADER, TaskClient } from "./task-client.js";
import { fixture } from "./test-support/fixtures.js";
import { tlsMaterialForTrustedPeer } from "./tls.js";
import { APPID_SERVICE, CONFIG_SERVICE, SIGNING_SERVICE, loadService } from "./transport/grpc.js";
import { Curve, NodeType, Protocol } from "./types.js";
import type {
  WireAppPublicKeyRequest,
  WireAppPublicKeyResponse,
  WireNodeInfoResponse,
  WirePeerNodeResponse,
  WireSignRequest,
  WireSignResponse,
} from "./wire.js";

function silentLogger(): Logger {
  return new Logger("error");
}

function listen(server: grpc.Server, credentials: grpc.ServerCredentials): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync("127.0.0.1:0", credentials, (err, port) => {
      if (err) reject(err);
      else resolve(port);
    });
  });
}

type SignHandler = (
  call: grpc.ServerUnaryCall<WireSignRequest, WireSignResponse>,
  callback: grpc.sendUnaryData<WireSignResponse>,
) => void;

interface Harness {
  configAddress: string;
  signingAddress: string;
  peerRequests: string[];
  signRequests: Array<{ request: WireSignRequest; requestId: string }>;
  appIdRequests: string[];
  /** Replaced per test; defaults to signing "sig:<msg>". */
  onSign: SignHandler;
}

let configServer: grpc.Server;
let signingServer: grpc.Server;
let harness: Harness;

beforeEach(async () => {
  harness = {
    configAddress: "",
    signingAddress: "",
    peerRequests: [],
    signRequests: [],
    appIdRequests: [],
    onSign: (call, callback) => {
      callback(null, { signature: Buffer.from(`sig:${call.request.msg.toString()}`), success: true, error: "" });
    },
  };

  signingServer = new grpc.Server();
  signingServer.addService(loadService(SIGNING_SERVICE), {
    Sign: (
      call: grpc.ServerUnaryCall<WireSignRequest, WireSignResponse>,
      callback: grpc.sendUnaryData<WireSignResponse>,
    ) => {
      const [requestId] = call.metadata.get(REQUEST_ID_HEADER);
      harness.signRequests.push({ request: call.request, requestId: String(requestId) });
      harness.onSign(call, callback);
    },
  });
  signingServer.addService(loadService(APPID_SERVICE), {
    GetPublicKeyByAppID: (
      call: grpc.ServerUnaryCall<WireAppPublicKeyRequest, WireAppPublicKeyResponse>,
      callback: grpc.sendUnaryData<WireAppPublicKeyResponse>,
    ) => {
      harness.appIdRequests.push(call.request.app_id);
      if (call.request.app_id !== "wallet-app") {
        callback({ code: grpc.status.NOT_FOUND, details: "unknown app" });
        return;
      }
      callback(null, { publickey: Buffer.from("wallet-pk").toString("base64"), protocol: "ecdsa", curve: "secp256k1" });
    },
  });
  const signingPort = await listen(
    signingServer,
    grpc.ServerCredentials.createSsl(
      fixture("client.crt"),
      [{ private_key: fixture("server.key"), cert_chain: fixture("server.crt") }],
      true,
    ),
  );
  harness.signingAddress = `127.0.0.1:${signingPort}`;

  const nodeInfo: WireNodeInfoResponse = {
    node_id: 42,
    rpc_address: "127.0.0.1:0",
    cert: fixture("client.crt"),
    key: fixture("client.key"),
  };
  const peers: WirePeerNodeResponse = {
    peers: [
      { id: 9, rpc_address: "127.0.0.1:1", cert: Buffer.from("mesh"), type: NodeType.MESH },
      { id: 5, rpc_address: harness.signingAddress, cert: fixture("server.crt"), type: NodeType.TRUSTED_EXECUTION },
      { id: 6, rpc_address: harness.signingAddress, cert: fixture("server.crt"), type: NodeType.APPLICATION },
    ],
  };

  configServer = new grpc.Server();
  configServer.addService(loadService(CONFIG_SERVICE), {
    GetNodeInfo: (
      _call: grpc.ServerUnaryCall<object, WireNodeInfoResponse>,
      callback: grpc.sendUnaryData<WireNodeInfoResponse>,
    ) => callback(null, nodeInfo),
    GetPeerNode: (
      call: grpc.ServerUnaryCall<{ node_type: string }, WirePeerNodeResponse>,
      callback: grpc.sendUnaryData<WirePeerNodeResponse>,
    ) => {
      harness.peerRequests.push(call.request.node_type);
      callback(null, peers);
    },
  });
  const configPort = await listen(configServer, grpc.ServerCredentials.createInsecure());
  harness.configAddress = `127.0.0.1:${configPort}`;
});

afterEach(() => {
  configServer.forceShutdown();
  signingServer.forceShutdown();
});

// --- Bootstrap ---

describe("ConfigClient over gRPC", () => {
  it("fetches identity and peers", async () => {
    const config = await new ConfigClient(harness.configAddress, { logger: silentLogger() }).getConfig();

    expect(config.nodeId).toBe(42);
    expect(config.cert.equals(fixture("client.crt"))).toBe(true);
    expect(config.key.equals(fixture("client.key"))).toBe(true);
    expect(config.rpcAddress).toBe(harness.signingAddress);
    expect(config.targetCert.equals(fixture("server.crt"))).toBe(true);
    expect(config.appNodeAddr).toBe(harness.signingAddress);
    expect(harness.peerRequests).toEqual([""]);
  });

  it("reports an unreachable server as a ConfigurationError", async () => {
    configServer.forceShutdown();
    const client = new ConfigClient(harness.configAddress, { timeoutMs: 2_000, logger: silentLogger() });

    const err = await client.getConfig().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err instanceof Error && err.cause).toMatchObject({ code: grpc.status.UNAVAILABLE });
  });
});

// --- Signing ---

describe("Client over gRPC", () => {
  async function initClient(timeoutMs = 5_000): Promise<Client> {
    const client = new Client(harness.configAddress, { timeoutMs, logger: silentLogger() });
    await client.init();
    return client;
  }

  it("initializes over mTLS and signs", async () => {
    const client = await initClient();

    const signature = await client.sign(Buffer.from("hello"), Buffer.from("pk"), Protocol.SCHNORR, Curve.ED25519);

    expect(client.nodeId).toBe(42);
    expect(Buffer.from(signature).toString()).toBe("sig:hello");
    const [{ request, requestId }] = harness.signRequests;
    expect(request.from).toBe(42);
    expect(request.public_key_info.toString()).toBe("pk");
    expect(request.protocol).toBe(Protocol.SCHNORR);
    expect(request.curve).toBe(Curve.ED25519);
    expect(requestId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    await client.close();
  });

  it("looks up an app's key and signs with it", async () => {
    const client = await initClient();

    const signature = await client.signWithAppId(Buffer.from("vote"), "wallet-app");

    expect(Buffer.from(signature).toString()).toBe("sig:vote");
    expect(harness.appIdRequests).toEqual(["wallet-app"]);
    const [{ request }] = harness.signRequests;
    expect(request.public_key_info.toString()).toBe("wallet-pk");
    expect(request.protocol).toBe(Protocol.ECDSA);
    expect(request.curve).toBe(Curve.SECP256K1);
    await client.close();
  });

  it("reports an unknown app id as NOT_FOUND without signing", async () => {
    const client = await initClient();

    const err = await client.signWithAppId(Buffer.from("vote"), "ghost").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ code: grpc.status.NOT_FOUND, details: "unknown app" });
    expect(harness.signRequests).toHaveLength(0);
    await client.close();
  });

  it("retries UNAVAILABLE and keeps the request id", async () => {
    let calls = 0;
    harness.onSign = (_call, callback) => {
      calls++;
      if (calls < 3) {
        callback({ code: grpc.status.UNAVAILABLE, details: "busy" });
        return;
      }
      callback(null, { signature: Buffer.from("third"), success: true, error: "" });
    };
    const client = await initClient();

    const signature = await client.sign(Buffer.from("m"), Buffer.from("pk"), Protocol.ECDSA, Curve.SECP256K1);

    expect(Buffer.from(signature).toString()).toBe("third");
    expect(harness.signRequests).toHaveLength(3);
    const ids = new Set(harness.signRequests.map((r) => r.requestId));
    expect(ids.size).toBe(1);
    await client.close();
  });

  it("does not retry a non-retryable status", async () => {
    harness.onSign = (_call, callback) => {
      callback({ code: grpc.status.INVALID_ARGUMENT, details: "bad curve" });
    };
    const client = await initClient();

    const err = await client.sign(Buffer.from("m"), Buffer.from("pk"), 1, 99).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ code: grpc.status.INVALID_ARGUMENT, details: "bad curve" });
    expect(harness.signRequests).toHaveLength(1);
    await client.close();
  });

  it("surfaces a refusal as SigningError", async () => {
    harness.onSign = (_call, callback) => {
      callback(null, { success: false, error: "key not found " });
    };
    const client = await initClient();

    const err = await client.sign(Buffer.from("m"), Buffer.from("pk"), 1, 1).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SigningError);
    expect(err).toMatchObject({ serverMessage: "key not found", message: "signing failed: key not found" });
    await client.close();
  });

  it("cancels an in-flight call when the caller aborts", async () => {
    harness.onSign = () => {};
    const client = await initClient();
    const controller = new AbortController();

    const pending = client.sign(Buffer.from("m"), Buffer.from("pk"), 1, 1, controller.signal);
    setTimeout(() => controller.abort(), 50);
    const err = await pending.catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ code: grpc.status.CANCELLED });
    expect(harness.signRequests).toHaveLength(1);
    await client.close();
  });

  it("gives up at the sign deadline", async () => {
    harness.onSign = () => {};
    const client = await initClient();
    client.setTimeout(300);

    const err = await client.sign(Buffer.from("m"), Buffer.from("pk"), 1, 1).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ code: grpc.status.DEADLINE_EXCEEDED });
    await client.close();
  });
});

describe("TaskClient over gRPC", () => {
  it("fails to connect when the server certificate is not trusted", async () => {
    const config = await new ConfigClient(harness.configAddress, { logger: silentLogger() }).getConfig();
    const task = new TaskClient(config, { timeoutMs: 500, logger: silentLogger() });
    const tls = { ...tlsMaterialForTrustedPeer(config), ca: fixture("client.crt") };

    const err = await task.connect(tls).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConnectionError);
    expect(err).toMatchObject({ address: harness.signingAddress });
    expect(task.state).toBe("unconnected");
  });
});
