/**
 * mTLS material for channels to peers listed in a NodeConfig.
 *
 * The node's own certificate and key authenticate it; the peer's certificate
 * is the only trust root for that channel.
 */

import { X509Certificate, createPrivateKey } from "node:crypto";
import { ConfigurationError, describeError } from "./errors.js";
import type { NodeConfig, TlsMaterial } from "./types.js";

export function tlsMaterialForTrustedPeer(config: NodeConfig): TlsMaterial {
  return buildTlsMaterial(config, config.targetCert, "trusted-execution node");
}

export function tlsMaterialForAppPeer(config: NodeConfig): TlsMaterial {
  return buildTlsMaterial(config, config.appNodeCert, "application node");
}

function buildTlsMaterial(config: NodeConfig, peerCert: Buffer, peerName: string): TlsMaterial {
  if (peerCert.length === 0) {
    throw new ConfigurationError(`no certificate for the ${peerName}`);
  }

  parseOrThrow(() => new X509Certificate(config.cert), "failed to parse client certificate");
  parseOrThrow(() => createPrivateKey(config.key), "failed to parse client private key");
  parseOrThrow(() => new X509Certificate(peerCert), `failed to parse ${peerName} certificate`);

  return { cert: config.cert, key: config.key, ca: peerCert };
}

function parseOrThrow(parse: () => unknown, message: string): void {
  try {
    parse();
  } catch (err) {
    throw new ConfigurationError(`${message}: ${describeError(err)}`, { cause: err });
  }
}
