/**
 * Calendar day and vacation window formats.
 *
 * Calendar day, 49 bytes: day number followed by six 8-byte program slots
 *   [n+0] from hour  [n+1] from minute  [n+2] to hour  [n+3] to minute
 *   [n+4..5] offset °C i16 /100  [n+6] offset % i8  [n+7] enabled
 *
 * Vacation window, 15 bytes, device wall-clock:
 *   [0-4] from (year-2000, month, day, hour, minute)  [5-9] to (...)
 *   [10-11] offset °C i16 /100  [12] offset % i8  [13] enabled  [14] active
 */

import { DecodeError, OutOfRangeError } from '../ThermostatErrors';
import type { CalendarDay, CalendarProgram, VacationWindow } from '../ThermostatTypes';
import {
  checkDate,
  checkInteger,
  isCalendarDate,
  readBool,
  readFixed,
  requireLength,
  toFixed,
  utcDate,
} from './primitives';
import { BOOST_OFFSET_DEGREES, PERCENT_OFFSET } from './settings';

export const CALENDAR_SLOTS = 6;
export const CALENDAR_SLOT_LENGTH = 8;
export const CALENDAR_DAY_LENGTH = 1 + CALENDAR_SLOTS * CALENDAR_SLOT_LENGTH;

export function emptyProgram(): CalendarProgram {
  return {
    startHour: 0,
    startMinute: 0,
    endHour: 0,
    endMinute: 0,
    offsetDegrees: 0,
    offsetPercentage: 0,
    enabled: false,
  };
}

export function checkCalendarDay(day: number): void {
  checkInteger('day', day, 1, 7);
}

function decodeProgram(data: Buffer, offset: number): CalendarProgram {
  return {
    startHour: data[offset],
    startMinute: data[offset + 1],
    endHour: data[offset + 2],
    endMinute: data[offset + 3],
    offsetDegrees: readFixed(data, offset + 4, 100, true),
    offsetPercentage: data.readInt8(offset + 6),
    enabled: readBool(data, offset + 7),
  };
}

/**
 * A header-only payload is a day without programs: six disabled slots.
 * Anything between header-only and a full record is structurally invalid.
 */
export function decodeCalendarDay(data: Buffer): CalendarDay {
  requireLength('calendarDay', data, 1);
  const day = data[0];
  if (data.length === 1) {
    return { day, programs: Array.from({ length: CALENDAR_SLOTS }, emptyProgram) };
  }
  if (data.length < CALENDAR_DAY_LENGTH) {
    throw new DecodeError('calendarDay', `expected 1 or ${CALENDAR_DAY_LENGTH} bytes, got ${data.length}`, data.length);
  }

  const programs: CalendarProgram[] = [];
  for (let slot = 0; slot < CALENDAR_SLOTS; slot++) {
    programs.push(decodeProgram(data, 1 + slot * CALENDAR_SLOT_LENGTH));
  }
  return { day, programs };
}

function checkProgram(program: CalendarProgram, index: number): number {
  const prefix = `programs[${index}]`;
  checkInteger(`${prefix}.startHour`, program.startHour, 0, 23);
  checkInteger(`${prefix}.startMinute`, program.startMinute, 0, 59);
  checkInteger(`${prefix}.endHour`, program.endHour, 0, 23);
  checkInteger(`${prefix}.endMinute`, program.endMinute, 0, 59);
  checkInteger(`${prefix}.offsetPercentage`, program.offsetPercentage, PERCENT_OFFSET.min, PERCENT_OFFSET.max);
  return toFixed(
    `${prefix}.offsetDegrees`,
    program.offsetDegrees,
    100,
    BOOST_OFFSET_DEGREES.min,
    BOOST_OFFSET_DEGREES.max,
  );
}

/** Always the full 49-byte record; unused slots stay zero */
export function encodeCalendarDay(calendar: CalendarDay): Buffer {
  checkCalendarDay(calendar.day);
  if (calendar.programs.length > CALENDAR_SLOTS) {
    throw new OutOfRangeError('programs.length', calendar.programs.length, 0, CALENDAR_SLOTS);
  }
  const offsets = calendar.programs.map(checkProgram);

  const data = Buffer.alloc(CALENDAR_DAY_LENGTH);
  data[0] = calendar.day;
  calendar.programs.forEach((program, index) => {
    const offset = 1 + index * CALENDAR_SLOT_LENGTH;
    data[offset] = program.startHour;
    data[offset + 1] = program.startMinute;
    data[offset + 2] = program.endHour;
    data[offset + 3] = program.endMinute;
    data.writeInt16LE(offsets[index], offset + 4);
    data.writeInt8(program.offsetPercentage, offset + 6);
    data[offset + 7] = program.enabled ? 1 : 0;
  });
  return data;
}

// ─────────────────────────────────────────────────────────────────────────────
// Vacation
// ─────────────────────────────────────────────────────────────────────────────

export const VACATION_LENGTH = 15;

function readWallClock(data: Buffer, offset: number, field: string): Date {
  const [year, month, day, hour, minute] = [data[offset], data[offset + 1], data[offset + 2], data[offset + 3], data[offset + 4]];
  if (!isCalendarDate(2000 + year, month, day) || hour > 23 || minute > 59) {
    throw new DecodeError('vacationTime', `invalid ${field} time`, data.length);
  }
  return utcDate(2000 + year, month, day, hour, minute);
}

function writeWallClock(data: Buffer, offset: number, date: Date): void {
  data[offset] = date.getUTCFullYear() - 2000;
  data[offset + 1] = date.getUTCMonth() + 1;
  data[offset + 2] = date.getUTCDate();
  data[offset + 3] = date.getUTCHours();
  data[offset + 4] = date.getUTCMinutes();
}

function checkWallClock(field: string, date: Date): void {
  checkDate(field, date);
  checkInteger(`${field}.year`, date.getUTCFullYear(), 2000, 2255);
}

export function decodeVacation(data: Buffer): VacationWindow {
  requireLength('vacationTime', data, VACATION_LENGTH);
  return {
    from: readWallClock(data, 0, 'from'),
    to: readWallClock(data, 5, 'to'),
    offsetDegrees: readFixed(data, 10, 100, true),
    offsetPercentage: data.readInt8(12),
    enabled: readBool(data, 13),
    active: readBool(data, 14),
  };
}

/** Device-owned active byte, read without validating the rest of the record */
export function readVacationActive(data: Buffer): boolean {
  return data.length >= VACATION_LENGTH && readBool(data, 14);
}

/** Seconds are not representable and are dropped */
export function encodeVacation(vacation: VacationWindow): Buffer {
  checkWallClock('from', vacation.from);
  checkWallClock('to', vacation.to);
  const offset = toFixed('offsetDegrees', vacation.offsetDegrees, 100, BOOST_OFFSET_DEGREES.min, BOOST_OFFSET_DEGREES.max);
  checkInteger('offsetPercentage', vacation.offsetPercentage, PERCENT_OFFSET.min, PERCENT_OFFSET.max);

  const data = Buffer.alloc(VACATION_LENGTH);
  writeWallClock(data, 0, vacation.from);
  writeWallClock(data, 5, vacation.to);
  data.writeInt16LE(offset, 10);
  data.writeInt8(vacation.offsetPercentage, 12);
  data[13] = vacation.enabled ? 1 : 0;
  data[14] = vacation.active ? 1 : 0;
  return data;
}
