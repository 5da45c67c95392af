/**
 * Identity formats: device name, revision strings, factory reset id.
 */

import { EXTERNAL_CONTROL_MIN_FIRMWARE } from '../ThermostatConstants';
import { OutOfRangeError } from '../ThermostatErrors';
import type { DeviceName, FactoryResetInfo } from '../ThermostatTypes';
import { checkInteger, readText, requireLength, U32_MAX, U8_MAX } from './primitives';

export const DEVICE_NAME_LENGTH = 60;
export const DEVICE_NAME_MAX_CHARS = 25;

export function decodeDeviceName(data: Buffer): DeviceName {
  requireLength('deviceName', data, 1);
  return { prefix: data[0], name: readText(data, 1) };
}

export function encodeDeviceName(deviceName: DeviceName): Buffer {
  checkInteger('prefix', deviceName.prefix, 0, U8_MAX);
  const chars = [...deviceName.name].length;
  if (chars > DEVICE_NAME_MAX_CHARS) {
    throw new OutOfRangeError('name.length', chars, 0, DEVICE_NAME_MAX_CHARS);
  }
  const encoded = Buffer.from(deviceName.name, 'utf8');
  if (encoded.length > DEVICE_NAME_LENGTH - 1) {
    throw new OutOfRangeError('name.bytes', encoded.length, 0, DEVICE_NAME_LENGTH - 1);
  }

  const data = Buffer.alloc(DEVICE_NAME_LENGTH);
  data[0] = deviceName.prefix;
  encoded.copy(data, 1);
  return data;
}

export function decodeText(data: Buffer): string {
  return readText(data);
}

export function encodeText(text: string): Buffer {
  return Buffer.from(text, 'utf8');
}

export function decodeHardwareRevision(data: Buffer): string {
  requireLength('hardwareRevision', data, 4);
  return String(data.readUInt32LE(0));
}

export function encodeHardwareRevision(revision: string): Buffer {
  const value = /^\d+$/.test(revision) ? Number(revision) : Number.NaN;
  checkInteger('hardwareRevision', value, 0, U32_MAX);
  const data = Buffer.alloc(4);
  data.writeUInt32LE(value, 0);
  return data;
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory reset id
// ─────────────────────────────────────────────────────────────────────────────

const ADDRESS_PATTERN = /^([0-9A-F]{2}:){5}[0-9A-F]{2}$/i;

export function decodeFactoryResetId(data: Buffer): FactoryResetInfo {
  requireLength('factoryResetId', data, 4);
  const deviceAddress = data.length >= 10
    ? [...data.subarray(4, 10)].map((byte) => byte.toString(16).padStart(2, '0').toUpperCase()).join(':')
    : null;
  return { id: data.readUInt32LE(0), deviceAddress };
}

/** Authentication writes carry the id only; the address is appended when present */
export function encodeFactoryResetId(info: FactoryResetInfo): Buffer {
  checkInteger('factoryResetId', info.id, 0, U32_MAX);
  const address = info.deviceAddress;
  if (address !== null && !ADDRESS_PATTERN.test(address)) {
    throw new OutOfRangeError('deviceAddress.length', address.length, 17, 17);
  }

  const data = Buffer.alloc(address === null ? 4 : 10);
  data.writeUInt32LE(info.id, 0);
  if (address !== null) {
    Buffer.from(address.replace(/:/g, ''), 'hex').copy(data, 4);
  }
  return data;
}

// ─────────────────────────────────────────────────────────────────────────────
// Software revision: "app;ble;bootloader"
// ─────────────────────────────────────────────────────────────────────────────

export function parseAppVersion(softwareRevision: string): [number, number] | null {
  const match = /^(\d+)(?:\.(\d+))?/.exec(softwareRevision.split(';')[0].trim());
  if (!match) return null;
  return [Number(match[1]), match[2] === undefined ? 0 : Number(match[2])];
}

export function supportsExternalControl(softwareRevision: string | null): boolean {
  if (!softwareRevision) return false;
  const version = parseAppVersion(softwareRevision);
  if (!version) return false;
  const [major, minor] = version;
  const [minMajor, minMinor] = EXTERNAL_CONTROL_MIN_FIRMWARE;
  return major > minMajor || (major === minMajor && minor >= minMinor);
}
