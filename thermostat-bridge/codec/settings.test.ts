import { DecodeError, OutOfRangeError } from '../ThermostatErrors';
import { utcDate } from './primitives';
import {
  decodeBoost,
  decodeDateAndTime,
  decodeDaylightSaving,
  decodeEnergyUnit,
  decodeFloorLimits,
  decodeFloorSensor,
  decodeRoomCalibration,
  encodeBoost,
  encodeCalendarControl,
  encodeChildLock,
  encodeDateAndTime,
  encodeDaylightSaving,
  encodeEnergyUnit,
  encodeFloorLimits,
  encodeFloorSensor,
  encodeHeatingMode,
  encodeLedBrightness,
  encodePowerControlCycle,
  encodeRoomCalibration,
  encodeU16,
  FLOOR_SENSOR_PRESETS,
  HEATING_POWER_MAX,
  matchFloorSensorPreset,
} from './settings';

describe('boost', () => {
  test('should encode offsets as signed fixed-point and percentage', () => {
    const data = encodeBoost({
      enabled: true,
      offsetDegrees: 2.5,
      offsetPercentage: -10,
      setpointMinutes: 90,
      remainingMinutes: 0,
    });

    expect([...data]).toEqual([1, 0xfa, 0x00, 0xf6, 90, 0, 0, 0]);
  });

  test('should decode negative offsets and the remaining time', () => {
    const boost = decodeBoost(Buffer.from([1, 0x38, 0xff, 0x14, 0x3c, 0x00, 0x1e, 0x00]));

    expect(boost).toEqual({
      enabled: true,
      offsetDegrees: -2,
      offsetPercentage: 20,
      setpointMinutes: 60,
      remainingMinutes: 30,
    });
  });

  test('should reject an offset outside ±20 °C before encoding', () => {
    expect(() => encodeBoost({
      enabled: true,
      offsetDegrees: 20.5,
      offsetPercentage: 0,
      setpointMinutes: 60,
      remainingMinutes: 0,
    })).toThrow(OutOfRangeError);
  });
});

describe('clock', () => {
  test('should write the wall-clock fields in order', () => {
    const data = encodeDateAndTime(utcDate(2026, 10, 19, 7, 5, 9));

    expect([...data]).toEqual([0xea, 0x07, 10, 19, 7, 5, 9]);
  });

  test('should read the wall-clock fields into UTC', () => {
    const date = decodeDateAndTime(Buffer.from([0xea, 0x07, 2, 28, 23, 59, 0]));

    expect(date.toISOString()).toBe('2026-02-28T23:59:00.000Z');
  });

  test('should reject impossible clock fields', () => {
    expect(() => decodeDateAndTime(Buffer.from([0xea, 0x07, 13, 1, 0, 0, 0]))).toThrow(DecodeError);
  });

  test('should only accept 29 February in a leap year', () => {
    expect(() => decodeDateAndTime(Buffer.from([0xea, 0x07, 2, 29, 0, 0, 0]))).toThrow(DecodeError);
    expect(decodeDateAndTime(Buffer.from([0xe8, 0x07, 2, 29, 0, 0, 0])).toISOString()).toBe('2024-02-29T00:00:00.000Z');
  });

  test('should encode the daylight saving record', () => {
    const data = encodeDaylightSaving({
      enabled: true,
      winterToSummerMinutes: 60,
      summerToWinterMinutes: 60,
      utcOffsetMinutes: -300,
    });

    expect(decodeDaylightSaving(data)).toEqual({
      enabled: true,
      winterToSummerMinutes: 60,
      summerToWinterMinutes: 60,
      utcOffsetMinutes: -300,
    });
    expect(data.readInt16LE(6)).toBe(-300);
  });

  test('should reject an offset beyond one day', () => {
    expect(() => encodeDaylightSaving({
      enabled: false,
      winterToSummerMinutes: 60,
      summerToWinterMinutes: 60,
      utcOffsetMinutes: 1441,
    })).toThrow(OutOfRangeError);
  });
});

describe('floor limits', () => {
  test('should encode limits in hundredths of a degree', () => {
    const data = encodeFloorLimits({ low: 10, high: 27.5 });

    expect([...data]).toEqual([0xe8, 0x03, 0xbe, 0x0a]);
    expect(decodeFloorLimits(data)).toEqual({ low: 10, high: 27.5 });
  });

  test('should require a gap of at least 8 °C', () => {
    expect(() => encodeFloorLimits({ low: 10, high: 17 })).toThrow(OutOfRangeError);
    expect(() => encodeFloorLimits({ low: 10, high: 18 })).not.toThrow();
  });

  test('should reject a low limit below 5 °C', () => {
    expect(() => encodeFloorLimits({ low: 4.5, high: 20 })).toThrow(OutOfRangeError);
  });
});

describe('floor sensor', () => {
  test('should recognise a preset configuration', () => {
    const preset = FLOOR_SENSOR_PRESETS['12k'];
    const decoded = decodeFloorSensor(encodeFloorSensor(preset));

    expect(decoded).toEqual(preset);
    expect(matchFloorSensorPreset(decoded)).toBe('12k');
  });

  test('should report a custom sensor as unmatched', () => {
    expect(matchFloorSensorPreset({ ...FLOOR_SENSOR_PRESETS['10k'], resistance25cOhms: 22000 })).toBeNull();
  });
});

describe('single-value settings', () => {
  test('should round the room calibration to tenths', () => {
    const data = encodeRoomCalibration(1.25);

    expect(data.readInt16LE(0)).toBe(13);
    expect(decodeRoomCalibration(data)).toBe(1.3);
  });

  test('should bound heating power', () => {
    expect([...encodeU16('heatingPower', 1200, HEATING_POWER_MAX)]).toEqual([0xb0, 0x04]);
    expect(() => encodeU16('heatingPower', 10000, HEATING_POWER_MAX)).toThrow(OutOfRangeError);
  });

  test('should reject fractional values for integer fields', () => {
    expect(() => encodeU16('floorArea', 12.5)).toThrow(OutOfRangeError);
  });

  test('should accept only heating modes 1 to 5', () => {
    expect([...encodeHeatingMode({ code: 5, name: 'Force Control' })]).toEqual([5]);
    expect(() => encodeHeatingMode({ code: 6, name: 'Unknown' })).toThrow(OutOfRangeError);
  });

  test('should bound the power control cycle to 30-180 minutes', () => {
    expect([...encodePowerControlCycle(30)]).toEqual([30]);
    expect(() => encodePowerControlCycle(29)).toThrow(OutOfRangeError);
    expect(() => encodePowerControlCycle(181)).toThrow(OutOfRangeError);
  });

  test('should bound calendar control to 0-8', () => {
    expect([...encodeCalendarControl(0)]).toEqual([0]);
    expect(() => encodeCalendarControl(9)).toThrow(OutOfRangeError);
  });

  test('should encode the child lock code little-endian', () => {
    expect([...encodeChildLock({ enabled: true, code: 1234 })]).toEqual([1, 0xd2, 0x04]);
    expect(() => encodeChildLock({ enabled: true, code: 10000 })).toThrow(OutOfRangeError);
  });

  test('should bound LED brightness to percentages', () => {
    expect([...encodeLedBrightness({ red: 10, green: 50, blue: 100 })]).toEqual([10, 50, 100]);
    expect(() => encodeLedBrightness({ red: 0, green: 0, blue: 101 })).toThrow(OutOfRangeError);
  });
});

describe('energy unit', () => {
  test('should decode the currency and the price', () => {
    expect(decodeEnergyUnit(Buffer.from([1, 0, 0x0f, 0x00]))).toEqual({
      currency: 1,
      currencyCode: 'EUR',
      currencySymbol: '€',
      price: 0.15,
    });
  });

  test('should report an unknown currency', () => {
    const unit = decodeEnergyUnit(Buffer.from([42, 0, 0, 0]));

    expect(unit.currencyCode).toBe('Unknown');
    expect(unit.currencySymbol).toBe('');
  });

  test('should encode the price in cents', () => {
    expect([...encodeEnergyUnit({ currency: 2, price: 1.05 })]).toEqual([2, 0, 0x69, 0x00]);
    expect(() => encodeEnergyUnit({ currency: 2, price: 655.36 })).toThrow(OutOfRangeError);
  });
});
