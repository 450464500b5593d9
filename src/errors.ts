/**
 * Error taxonomy shared by every layer above the channel.
 *
 * Each kind has its own class so callers can branch with `instanceof`,
 * and all of them carry a `kind` tag for `switch`-style handling.
 */

export type ErrorKind =
  | "InvalidArgument"
  | "Connection"
  | "ConnectionInterrupted"
  | "Busy"
  | "Failure"
  | "Acknowledge"
  | "Read"
  | "Write"
  | "Decode"
  | "PropertyNotSupported"
  | "Binding"
  | "NotImplemented"
  | "NotFound";

export abstract class GatewayError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends GatewayError {
  readonly kind = "InvalidArgument";
}

export class ConnectionError extends GatewayError {
  readonly kind = "Connection";
}

export class ConnectionInterruptedError extends GatewayError {
  readonly kind = "ConnectionInterrupted";
}

/** The device is busy. The same request may succeed later. */
export class BusyError extends GatewayError {
  readonly kind = "Busy";
}

export class FailureError extends GatewayError {
  readonly kind = "Failure";
}

/** The device accepted the request but has no data for it yet. */
export class AcknowledgeError extends GatewayError {
  readonly kind = "Acknowledge";
}

export class ReadError extends GatewayError {
  readonly kind = "Read";
  readonly exceptionCode: number | undefined;

  constructor(message: string, exceptionCode?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.exceptionCode = exceptionCode;
  }
}

export class WriteError extends GatewayError {
  readonly kind = "Write";
  readonly exceptionCode: number | undefined;

  constructor(message: string, exceptionCode?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.exceptionCode = exceptionCode;
  }
}

export class DecodeError extends GatewayError {
  readonly kind = "Decode";
}

export class PropertyNotSupportedError extends GatewayError {
  readonly kind = "PropertyNotSupported";
  readonly property: string;

  constructor(property: string) {
    super(`Property not supported: ${property}`);
    this.property = property;
  }
}

export class BindingError extends GatewayError {
  readonly kind = "Binding";
}

export class NotImplementedError extends GatewayError {
  readonly kind = "NotImplemented";
}

export class NotFoundError extends GatewayError {
  readonly kind = "NotFound";
}

export function isGatewayError(err: unknown, kind?: ErrorKind): err is GatewayError {
  return err instanceof GatewayError && (kind === undefined || err.kind === kind);
}

/** Errors that mean the channel itself is unusable. */
export function isConnectionError(err: unknown): boolean {
  return err instanceof ConnectionError || err instanceof ConnectionInterruptedError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Errors the device reported for one request; the channel is still fine. */
export function isDeviceFailure(err: unknown): boolean {
  return (
    err instanceof AcknowledgeError ||
    err instanceof BusyError ||
    err instanceof FailureError ||
    err instanceof ReadError ||
    err instanceof WriteError
  );
}
