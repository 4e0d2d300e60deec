import { readFileSync } from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import type { NodeConfig } from "../types.js";

const FIXTURE_DIR = fileURLToPath(new URL("../../test/fixtures/", import.meta.url));

/** Self-signed P-256 certificates with SAN localhost / 127.0.0.1. */
export function fixture(name: "server.crt" | "server.key" | "client.crt" | "client.key"): Buffer {
  return readFileSync(path.join(FIXTURE_DIR, name));
}

export function makeNodeConfig(overrides: Partial<NodeConfig> = {}): NodeConfig {
  return {
    nodeId: 7,
    cert: fixture("client.crt"),
    key: fixture("client.key"),
    rpcAddress: "10.0.0.1:50051",
    targetCert: fixture("server.crt"),
    appNodeAddr: "10.0.0.3:50053",
    appNodeCert: fixture("server.crt"),
    ...overrides,
  };
}
