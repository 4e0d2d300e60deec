/**
 * Error taxonomy shared by the configuration and task clients.
 *
 * Wrapping errors keep the underlying failure as `cause`.
 */

import { status as GrpcStatus } from "@grpc/grpc-js";

export class SignerClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A channel to a remote endpoint could not be created or never became ready. */
export class ConnectionError extends SignerClientError {
  readonly address: string;

  constructor(address: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.address = address;
  }
}

/** Identity or peer data is missing or could not be obtained. */
export class ConfigurationError extends SignerClientError {}

export class InvalidArgumentError extends SignerClientError {
  readonly argument: string;

  constructor(argument: string, message: string) {
    super(message);
    this.argument = argument;
  }
}

export class NotConnectedError extends SignerClientError {
  constructor(message = "not connected to server") {
    super(message);
  }
}

/**
 * A remote call failed at the transport level. `code` is the gRPC status,
 * CANCELLED when the caller aborted and DEADLINE_EXCEEDED when the
 * sub-deadline ran out.
 */
export class TransportError extends SignerClientError {
  readonly code: GrpcStatus;
  readonly details: string;

  constructor(code: GrpcStatus, details: string, options?: { cause?: unknown }) {
    super(`rpc failed [${statusName(code)}]: ${details}`, options);
    this.code = code;
    this.details = details;
  }
}

/** The call went through but the service reported `success=false`. */
export class SigningError extends SignerClientError {
  readonly serverMessage: string;

  constructor(serverMessage: string) {
    super(`signing failed: ${serverMessage}`);
    this.serverMessage = serverMessage;
  }
}

export function statusName(code: GrpcStatus): string {
  return GrpcStatus[code] ?? `CODE_${code}`;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
