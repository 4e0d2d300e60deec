import { describe, it, expect } from "vitest";
import { parseCurve, parseProtocol } from "./protocol.js";
import { Curve, Protocol } from "./types.js";

describe("parseProtocol", () => {
  it("maps known names", () => {
    expect(parseProtocol("ecdsa")).toBe(Protocol.ECDSA);
    expect(parseProtocol("schnorr")).toBe(Protocol.SCHNORR);
    expect(parseProtocol(" ECDSA ")).toBe(Protocol.ECDSA);
  });

  it("passes numeric tags through", () => {
    expect(parseProtocol("1")).toBe(1);
    expect(parseProtocol("7")).toBe(7);
  });

  it("falls back to Schnorr", () => {
    expect(parseProtocol("bls")).toBe(Protocol.SCHNORR);
    expect(parseProtocol("")).toBe(Protocol.SCHNORR);
    expect(parseProtocol("-1")).toBe(Protocol.SCHNORR);
    expect(parseProtocol("4294967296")).toBe(Protocol.SCHNORR);
  });
});

describe("parseCurve", () => {
  it("maps known names", () => {
    expect(parseCurve("ed25519")).toBe(Curve.ED25519);
    expect(parseCurve("secp256k1")).toBe(Curve.SECP256K1);
    expect(parseCurve("SECP256R1")).toBe(Curve.SECP256R1);
  });

  it("passes numeric tags through", () => {
    expect(parseCurve("3")).toBe(3);
    expect(parseCurve("4294967295")).toBe(4294967295);
  });

  it("falls back to Ed25519", () => {
    expect(parseCurve("p384")).toBe(Curve.ED25519);
    expect(parseCurve("2.5")).toBe(Curve.ED25519);
  });
});
