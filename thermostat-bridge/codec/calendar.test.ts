import { DecodeError, OutOfRangeError } from '../ThermostatErrors';
import type { CalendarProgram } from '../ThermostatTypes';
import {
  CALENDAR_DAY_LENGTH,
  decodeCalendarDay,
  decodeVacation,
  emptyProgram,
  encodeCalendarDay,
  encodeVacation,
  readVacationActive,
} from './calendar';
import { utcDate } from './primitives';

const morning: CalendarProgram = {
  startHour: 6,
  startMinute: 30,
  endHour: 8,
  endMinute: 0,
  offsetDegrees: 1.5,
  offsetPercentage: 10,
  enabled: true,
};

const night: CalendarProgram = {
  startHour: 22,
  startMinute: 0,
  endHour: 23,
  endMinute: 59,
  offsetDegrees: -3,
  offsetPercentage: -25,
  enabled: true,
};

describe('calendar day', () => {
  test('should always encode 49 bytes with unused slots zeroed', () => {
    const data = encodeCalendarDay({ day: 3, programs: [morning] });

    expect(data.length).toBe(CALENDAR_DAY_LENGTH);
    expect([...data.subarray(0, 9)]).toEqual([3, 6, 30, 8, 0, 0x96, 0x00, 10, 1]);
    expect(data.subarray(9).every((byte) => byte === 0)).toBe(true);
  });

  test('should decode six slots from a full record', () => {
    const calendar = decodeCalendarDay(encodeCalendarDay({ day: 7, programs: [morning, night] }));

    expect(calendar.day).toBe(7);
    expect(calendar.programs).toHaveLength(6);
    expect(calendar.programs[0]).toEqual(morning);
    expect(calendar.programs[1]).toEqual(night);
    expect(calendar.programs[5]).toEqual(emptyProgram());
  });

  test('should treat a header-only record as a day without programs', () => {
    const calendar = decodeCalendarDay(Buffer.from([4]));

    expect(calendar.day).toBe(4);
    expect(calendar.programs).toEqual(Array.from({ length: 6 }, emptyProgram));
  });

  test('should reject a truncated record', () => {
    expect(() => decodeCalendarDay(Buffer.alloc(20, 1))).toThrow(DecodeError);
    expect(() => decodeCalendarDay(Buffer.alloc(0))).toThrow(DecodeError);
  });

  test('should reject more than six programs', () => {
    const programs = Array.from({ length: 7 }, () => morning);
    expect(() => encodeCalendarDay({ day: 1, programs })).toThrow(OutOfRangeError);
  });

  test('should reject invalid days and times', () => {
    expect(() => encodeCalendarDay({ day: 0, programs: [] })).toThrow(OutOfRangeError);
    expect(() => encodeCalendarDay({ day: 8, programs: [] })).toThrow(OutOfRangeError);
    expect(() => encodeCalendarDay({ day: 1, programs: [{ ...morning, endHour: 24 }] })).toThrow(OutOfRangeError);
    expect(() => encodeCalendarDay({ day: 1, programs: [{ ...morning, startMinute: 60 }] })).toThrow(OutOfRangeError);
  });
});

describe('vacation window', () => {
  const window = {
    from: utcDate(2026, 12, 20, 8, 30),
    to: utcDate(2027, 1, 6, 18, 0),
    offsetDegrees: -2.5,
    offsetPercentage: -20,
    enabled: true,
    active: false,
  };

  test('should encode both timestamps as two-digit years', () => {
    const data = encodeVacation(window);

    expect([...data]).toEqual([26, 12, 20, 8, 30, 27, 1, 6, 18, 0, 0x06, 0xff, 0xec, 1, 0]);
  });

  test('should decode what it encodes', () => {
    expect(decodeVacation(encodeVacation(window))).toEqual(window);
  });

  test('should drop seconds', () => {
    const decoded = decodeVacation(encodeVacation({ ...window, from: utcDate(2026, 12, 20, 8, 30, 45) }));

    expect(decoded.from.toISOString()).toBe('2026-12-20T08:30:00.000Z');
  });

  test('should reject impossible timestamps from the device', () => {
    const data = encodeVacation(window);
    data[1] = 0;

    expect(() => decodeVacation(data)).toThrow(DecodeError);
  });

  test('should reject a day the month does not have', () => {
    const data = encodeVacation(window);
    data[1] = 4;
    data[2] = 31;

    expect(() => decodeVacation(data)).toThrow(DecodeError);
  });

  test('should accept a leap day', () => {
    const data = encodeVacation(window);
    data[0] = 28;
    data[1] = 2;
    data[2] = 29;

    expect(decodeVacation(data).from.toISOString()).toBe('2028-02-29T08:30:00.000Z');
  });

  test('should read the active byte of a record that does not decode', () => {
    const data = Buffer.alloc(15);
    expect(readVacationActive(data)).toBe(false);

    data[14] = 1;
    expect(readVacationActive(data)).toBe(true);
    expect(readVacationActive(Buffer.from([1]))).toBe(false);
  });

  test('should reject years before 2000', () => {
    expect(() => encodeVacation({ ...window, from: utcDate(1999, 12, 31) })).toThrow(OutOfRangeError);
  });
});
