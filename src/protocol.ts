import { Curve, Protocol } from "./types.js";

const protocolNames: Record<string, number> = {
  ecdsa: Protocol.ECDSA,
  schnorr: Protocol.SCHNORR,
};

const curveNames: Record<string, number> = {
  ed25519: Curve.ED25519,
  secp256k1: Curve.SECP256K1,
  secp256r1: Curve.SECP256R1,
};

const MAX_UINT32 = 0xffff_ffff;

/** Maps "ecdsa" / "schnorr" or a numeric tag to a protocol tag. Unknown names fall back to Schnorr. */
export function parseProtocol(name: string): number {
  return parseTag(name, protocolNames, Protocol.SCHNORR);
}

/** Maps a curve name or a numeric tag to a curve tag. Unknown names fall back to Ed25519. */
export function parseCurve(name: string): number {
  return parseTag(name, curveNames, Curve.ED25519);
}

function parseTag(name: string, known: Record<string, number>, fallback: number): number {
  const normalized = name.trim().toLowerCase();
  if (Object.prototype.hasOwnProperty.call(known, normalized)) return known[normalized];

  if (/^\d+$/.test(normalized)) {
    const parsed = Number(normalized);
    if (parsed <= MAX_UINT32) return parsed;
  }
  return fallback;
}
