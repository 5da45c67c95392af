/**
 * Codec primitives: length checks, fixed-point fields, sentinels and range validation.
 * Every encoder validates all of its fields before allocating the output buffer.
 */

import { DecodeError, OutOfRangeError } from '../ThermostatErrors';
import type { EnumValue } from '../ThermostatTypes';

export const RATIO_UNSET = 0xff;
export const TEMPERATURE_UNSET = 0x7fff;

export const U8_MAX = 0xff;
export const U16_MAX = 0xffff;
export const U32_MAX = 0xffffffff;

// ─────────────────────────────────────────────────────────────────────────────
// Decoding
// ─────────────────────────────────────────────────────────────────────────────

export function requireLength(characteristic: string, data: Buffer, length: number): void {
  if (data.length < length) {
    throw new DecodeError(characteristic, `expected at least ${length} bytes, got ${data.length}`, data.length);
  }
}

export function requireExactLength(characteristic: string, data: Buffer, length: number): void {
  if (data.length !== length) {
    throw new DecodeError(characteristic, `expected ${length} bytes, got ${data.length}`, data.length);
  }
}

export function readFixed(data: Buffer, offset: number, scale: number, signed: boolean): number {
  const raw = signed ? data.readInt16LE(offset) : data.readUInt16LE(offset);
  return raw / scale;
}

/** 16-bit temperature where 0x7FFF means "no data" */
export function readTemperature(data: Buffer, offset: number, scale: number, signed: boolean): number | null {
  if (data.readUInt16LE(offset) === TEMPERATURE_UNSET) return null;
  return readFixed(data, offset, scale, signed);
}

/** Single-byte ratio where 0xFF means "no data" */
export function readRatio(data: Buffer, offset: number): number | null {
  const raw = data.readUInt8(offset);
  return raw === RATIO_UNSET ? null : raw;
}

export function readBool(data: Buffer, offset: number): boolean {
  return data.readUInt8(offset) !== 0;
}

export function enumValue(names: Record<number, string>, code: number): EnumValue {
  return { code, name: names[code] ?? 'Unknown' };
}

/** Trimmed UTF-8 text, cut at the first NUL */
export function readText(data: Buffer, start = 0): string {
  const slice = data.subarray(start);
  const end = slice.indexOf(0);
  return slice.subarray(0, end === -1 ? slice.length : end).toString('utf8').trim();
}

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

export function checkRange(field: string, value: number, min: number, max: number): void {
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new OutOfRangeError(field, value, min, max);
  }
}

export function checkInteger(field: string, value: number, min: number, max: number): void {
  checkRange(field, value, min, max);
  if (!Number.isInteger(value)) {
    throw new OutOfRangeError(field, value, min, max);
  }
}

/** Validate a fixed-point field and return its raw integer (rounded) */
export function toFixed(field: string, value: number, scale: number, min: number, max: number): number {
  checkRange(field, value, min, max);
  return Math.round(value * scale);
}

/** Validate a nullable temperature; null maps to the sentinel */
export function toTemperature(
  field: string,
  value: number | null,
  scale: number,
  min: number,
  max: number,
): number {
  if (value === null) return TEMPERATURE_UNSET;
  const raw = toFixed(field, value, scale, min, max);
  if (raw === TEMPERATURE_UNSET) {
    throw new OutOfRangeError(field, value, min, (TEMPERATURE_UNSET - 1) / scale);
  }
  return raw;
}

export function toRatio(field: string, value: number | null): number {
  if (value === null) return RATIO_UNSET;
  checkInteger(field, value, 0, RATIO_UNSET - 1);
  return value;
}

// Signed 16-bit fixed-point bounds at a given scale
export function i16Bounds(scale: number): [number, number] {
  return [-0x8000 / scale, 0x7fff / scale];
}

export function u16Bounds(scale: number): [number, number] {
  return [0, U16_MAX / scale];
}

// ─────────────────────────────────────────────────────────────────────────────
// Dates
// ─────────────────────────────────────────────────────────────────────────────

/** Build a Date from UTC fields; years below 100 are not shifted to 19xx */
export function utcDate(year: number, month: number, day: number, hour = 0, minute = 0, second = 0): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);
  return date;
}

export function daysInMonth(year: number, month: number): number {
  return utcDate(year, month + 1, 0).getUTCDate();
}

/** Month 1-12 and a day that exists in that month */
export function isCalendarDate(year: number, month: number, day: number): boolean {
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

export function requireValidDate(characteristic: string, date: Date, data: Buffer): Date {
  if (Number.isNaN(date.getTime())) {
    throw new DecodeError(characteristic, 'invalid date fields', data.length);
  }
  return date;
}

export function checkDate(field: string, date: Date): void {
  if (Number.isNaN(date.getTime())) {
    throw new OutOfRangeError(field, Number.NaN, 0, Number.MAX_SAFE_INTEGER);
  }
}
