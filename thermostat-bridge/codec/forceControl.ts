/**
 * Force / external control.
 *
 * Older firmware exposes a single potentiometer byte. Firmware 1.14+ exposes an
 * extended record of at least 19 bytes:
 *   [8-9]   absolute target °C u16 /10 (mode 5)
 *   [12-13] target change °C i16 /10 (mode 6)
 *   [17]    mode: 2 Off, 5 Temperature, 6 Temperature change
 * Bytes outside those fields belong to the device and are written back unchanged.
 */

import { EXTERNAL_CONTROL_MODES } from '../ThermostatConstants';
import { DecodeError, OutOfRangeError } from '../ThermostatErrors';
import type { ExtendedForceControl, ForceControl } from '../ThermostatTypes';
import { checkInteger, enumValue, readFixed, toFixed } from './primitives';

export const EXTENDED_FORCE_CONTROL_LENGTH = 19;

export const FORCE_CONTROL_MODE = {
  OFF: 2,
  TEMPERATURE: 5,
  TEMPERATURE_CHANGE: 6,
} as const;

export const FORCE_TEMPERATURE = { min: 5, max: 35 } as const;
export const FORCE_TEMPERATURE_OFFSET = { min: -20, max: 20 } as const;

export function decodeForceControl(data: Buffer): ForceControl {
  if (data.length === 1) {
    return { format: 'legacy', potentiometerPercent: data[0] };
  }
  if (data.length < EXTENDED_FORCE_CONTROL_LENGTH) {
    throw new DecodeError('forceControl', `expected 1 or at least ${EXTENDED_FORCE_CONTROL_LENGTH} bytes, got ${data.length}`, data.length);
  }
  const mode = data[17];
  return {
    format: 'extended',
    mode: enumValue(EXTERNAL_CONTROL_MODES, mode),
    enabled: mode === FORCE_CONTROL_MODE.TEMPERATURE || mode === FORCE_CONTROL_MODE.TEMPERATURE_CHANGE,
    temperature: readFixed(data, 8, 10, false),
    temperatureOffset: readFixed(data, 12, 10, true),
    raw: Buffer.from(data),
  };
}

function encodeExtended(control: ExtendedForceControl): Buffer {
  if (control.raw.length < EXTENDED_FORCE_CONTROL_LENGTH) {
    throw new OutOfRangeError('raw.length', control.raw.length, EXTENDED_FORCE_CONTROL_LENGTH, Number.MAX_SAFE_INTEGER);
  }
  if (EXTERNAL_CONTROL_MODES[control.mode.code] === undefined) {
    throw new OutOfRangeError('mode', control.mode.code, FORCE_CONTROL_MODE.OFF, FORCE_CONTROL_MODE.TEMPERATURE_CHANGE);
  }
  const temperature = toFixed('temperature', control.temperature, 10, FORCE_TEMPERATURE.min, FORCE_TEMPERATURE.max);
  const offset = toFixed(
    'temperatureOffset',
    control.temperatureOffset,
    10,
    FORCE_TEMPERATURE_OFFSET.min,
    FORCE_TEMPERATURE_OFFSET.max,
  );

  const data = Buffer.from(control.raw);
  data.writeUInt16LE(temperature, 8);
  data.writeInt16LE(offset, 12);
  data[17] = control.mode.code;
  return data;
}

export function encodeForceControl(control: ForceControl): Buffer {
  if (control.format === 'legacy') {
    checkInteger('potentiometerPercent', control.potentiometerPercent, 0, 100);
    return Buffer.from([control.potentiometerPercent]);
  }
  return encodeExtended(control);
}
