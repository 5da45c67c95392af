/**
 * Thermostat error taxonomy
 *
 * Every failure surfaced by the bridge is a ThermostatError with a stable code.
 * Only TRANSPORT_ERROR invalidates long-lived state (session + coordinator).
 */

export type ThermostatErrorCode =
  | 'DEVICE_NOT_FOUND'
  | 'TRANSPORT_ERROR'
  | 'AUTHENTICATION_FAILED'
  | 'ALREADY_CONNECTING'
  | 'TIMEOUT'
  | 'DECODE_ERROR'
  | 'OUT_OF_RANGE'
  | 'NOT_READY'
  | 'CHARACTERISTIC_MISSING';

export class ThermostatError extends Error {
  readonly code: ThermostatErrorCode;

  constructor(code: ThermostatErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
  }
}

export class DeviceNotFoundError extends ThermostatError {
  constructor(readonly address: string) {
    super('DEVICE_NOT_FOUND', `Device ${address} not found`);
  }
}

export class TransportError extends ThermostatError {
  constructor(message: string, cause?: unknown) {
    super('TRANSPORT_ERROR', message, cause);
  }
}

export class AuthenticationFailedError extends ThermostatError {
  constructor(message: string, cause?: unknown) {
    super('AUTHENTICATION_FAILED', message, cause);
  }
}

export class AlreadyConnectingError extends ThermostatError {
  constructor(address: string) {
    super('ALREADY_CONNECTING', `Connection to ${address} already in progress`);
  }
}

export class TimeoutError extends ThermostatError {
  constructor(message: string, readonly timeoutMs: number) {
    super('TIMEOUT', message);
  }
}

export class DecodeError extends ThermostatError {
  constructor(readonly characteristic: string, message: string, readonly length?: number) {
    super('DECODE_ERROR', `${characteristic}: ${message}`);
  }
}

export class OutOfRangeError extends ThermostatError {
  constructor(
    readonly field: string,
    readonly value: number,
    readonly min: number,
    readonly max: number,
  ) {
    super('OUT_OF_RANGE', `${field} must be between ${min} and ${max}, got ${value}`);
  }
}

export class NotReadyError extends ThermostatError {
  constructor(message: string, cause?: unknown) {
    super('NOT_READY', message, cause);
  }
}

/** The firmware does not expose this characteristic; the link stays usable */
export class CharacteristicMissingError extends ThermostatError {
  constructor(readonly uuid: string, address: string) {
    super('CHARACTERISTIC_MISSING', `Characteristic ${uuid} not found on ${address}`);
  }
}

export function isThermostatError(error: unknown, code?: ThermostatErrorCode): error is ThermostatError {
  return error instanceof ThermostatError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalise whatever a transport threw into a TransportError.
 * Timeouts, missing characteristics and errors that are already TransportErrors
 * pass through untouched.
 */
export function toTransportError(error: unknown, operation: string): ThermostatError {
  if (error instanceof TransportError || error instanceof TimeoutError || error instanceof CharacteristicMissingError) {
    return error;
  }
  return new TransportError(`${operation} failed: ${errorMessage(error)}`, error);
}

/** Keep typed errors as they are, wrap anything else as a transport failure */
export function asThermostatError(error: unknown, operation: string): ThermostatError {
  return error instanceof ThermostatError ? error : toTransportError(error, operation);
}
