/**
 * Settings formats: boost, heating mode, clock, limits, sensors and other
 * single-record configuration characteristics.
 */

import { CURRENCIES, HEATING_MODES } from '../ThermostatConstants';
import { DecodeError, OutOfRangeError } from '../ThermostatErrors';
import type {
  BoostConfig,
  ChildLock,
  DaylightSaving,
  EnergyUnit,
  EnumValue,
  FloorLimits,
  FloorSensorConfig,
  LedBrightness,
  ManufacturingDate,
} from '../ThermostatTypes';
import {
  checkDate,
  checkInteger,
  enumValue,
  i16Bounds,
  isCalendarDate,
  readBool,
  readFixed,
  requireLength,
  toFixed,
  U16_MAX,
  U8_MAX,
  utcDate,
} from './primitives';

// ─────────────────────────────────────────────────────────────────────────────
// Boost
// ─────────────────────────────────────────────────────────────────────────────

export const BOOST_OFFSET_DEGREES = { min: -20, max: 20 } as const;
export const PERCENT_OFFSET = { min: -100, max: 100 } as const;

export function decodeBoost(data: Buffer): BoostConfig {
  requireLength('boost', data, 8);
  return {
    enabled: readBool(data, 0),
    offsetDegrees: readFixed(data, 1, 100, true),
    offsetPercentage: data.readInt8(3),
    setpointMinutes: data.readUInt16LE(4),
    remainingMinutes: data.readUInt16LE(6),
  };
}

export function encodeBoost(boost: BoostConfig): Buffer {
  const offset = toFixed('offsetDegrees', boost.offsetDegrees, 100, BOOST_OFFSET_DEGREES.min, BOOST_OFFSET_DEGREES.max);
  checkInteger('offsetPercentage', boost.offsetPercentage, PERCENT_OFFSET.min, PERCENT_OFFSET.max);
  checkInteger('setpointMinutes', boost.setpointMinutes, 0, U16_MAX);
  checkInteger('remainingMinutes', boost.remainingMinutes, 0, U16_MAX);

  const data = Buffer.alloc(8);
  data[0] = boost.enabled ? 1 : 0;
  data.writeInt16LE(offset, 1);
  data.writeInt8(boost.offsetPercentage, 3);
  data.writeUInt16LE(boost.setpointMinutes, 4);
  data.writeUInt16LE(boost.remainingMinutes, 6);
  return data;
}

// ─────────────────────────────────────────────────────────────────────────────
// Heating mode and single-byte settings
// ─────────────────────────────────────────────────────────────────────────────

export function decodeHeatingMode(data: Buffer): EnumValue {
  requireLength('heatingMode', data, 1);
  return enumValue(HEATING_MODES, data[0]);
}

export function encodeHeatingMode(mode: EnumValue): Buffer {
  checkInteger('heatingMode', mode.code, 1, 5);
  return Buffer.from([mode.code]);
}

export function decodeFlag(characteristic: string, data: Buffer): boolean {
  requireLength(characteristic, data, 1);
  return readBool(data, 0);
}

export function encodeFlag(enabled: boolean): Buffer {
  return Buffer.from([enabled ? 1 : 0]);
}

export function decodePowerControlCycle(data: Buffer): number {
  requireLength('powerControlCycle', data, 1);
  return data[0];
}

export function encodePowerControlCycle(minutes: number): Buffer {
  checkInteger('powerControlCycle', minutes, 30, 180);
  return Buffer.from([minutes]);
}

export function decodeCalendarControl(data: Buffer): number {
  requireLength('calendarControl', data, 1);
  return data[0];
}

/** 0 commits to flash, 1-7 selects a day, 8 announces a calendar name */
export function encodeCalendarControl(value: number): Buffer {
  checkInteger('calendarControl', value, 0, 8);
  return Buffer.from([value]);
}

// ─────────────────────────────────────────────────────────────────────────────
// Clock
// ─────────────────────────────────────────────────────────────────────────────

export const DATE_AND_TIME_LENGTH = 7;

export function decodeDateAndTime(data: Buffer): Date {
  requireLength('dateAndTime', data, DATE_AND_TIME_LENGTH);
  const year = data.readUInt16LE(0);
  const [month, day, hour, minute, second] = [data[2], data[3], data[4], data[5], data[6]];
  if (!isCalendarDate(year, month, day) || hour > 23 || minute > 59 || second > 59) {
    throw new DecodeError('dateAndTime', `invalid clock fields ${data.subarray(0, 7).toString('hex')}`, data.length);
  }
  return utcDate(year, month, day, hour, minute, second);
}

/** Device clock runs in UTC */
export function encodeDateAndTime(date: Date): Buffer {
  checkDate('dateAndTime', date);
  checkInteger('year', date.getUTCFullYear(), 0, 9999);

  const data = Buffer.alloc(DATE_AND_TIME_LENGTH);
  data.writeUInt16LE(date.getUTCFullYear(), 0);
  data[2] = date.getUTCMonth() + 1;
  data[3] = date.getUTCDate();
  data[4] = date.getUTCHours();
  data[5] = date.getUTCMinutes();
  data[6] = date.getUTCSeconds();
  return data;
}

export const MINUTES_PER_DAY = 1440;

export function decodeDaylightSaving(data: Buffer): DaylightSaving {
  requireLength('daylightSaving', data, 8);
  return {
    enabled: readBool(data, 0),
    winterToSummerMinutes: data.readInt16LE(2),
    summerToWinterMinutes: data.readInt16LE(4),
    utcOffsetMinutes: data.readInt16LE(6),
  };
}

export function encodeDaylightSaving(config: DaylightSaving): Buffer {
  checkInteger('winterToSummerMinutes', config.winterToSummerMinutes, -MINUTES_PER_DAY, MINUTES_PER_DAY);
  checkInteger('summerToWinterMinutes', config.summerToWinterMinutes, -MINUTES_PER_DAY, MINUTES_PER_DAY);
  checkInteger('utcOffsetMinutes', config.utcOffsetMinutes, -MINUTES_PER_DAY, MINUTES_PER_DAY);

  const data = Buffer.alloc(8);
  data[0] = config.enabled ? 1 : 0;
  data.writeInt16LE(config.winterToSummerMinutes, 2);
  data.writeInt16LE(config.summerToWinterMinutes, 4);
  data.writeInt16LE(config.utcOffsetMinutes, 6);
  return data;
}

// ─────────────────────────────────────────────────────────────────────────────
// Floor limits and sensors
// ─────────────────────────────────────────────────────────────────────────────

export const FLOOR_LIMIT_LOW = { min: 5, max: 42 } as const;
export const FLOOR_LIMIT_HIGH = { min: 13, max: 50 } as const;
export const FLOOR_LIMIT_MIN_GAP = 8;

export function decodeFloorLimits(data: Buffer): FloorLimits {
  requireLength('floorLimits', data, 4);
  return {
    low: readFixed(data, 0, 100, false),
    high: readFixed(data, 2, 100, false),
  };
}

export function encodeFloorLimits(limits: FloorLimits): Buffer {
  const low = toFixed('low', limits.low, 100, FLOOR_LIMIT_LOW.min, FLOOR_LIMIT_LOW.max);
  const high = toFixed('high', limits.high, 100, FLOOR_LIMIT_HIGH.min, FLOOR_LIMIT_HIGH.max);
  if (limits.high - limits.low < FLOOR_LIMIT_MIN_GAP) {
    throw new OutOfRangeError('high', limits.high, limits.low + FLOOR_LIMIT_MIN_GAP, FLOOR_LIMIT_HIGH.max);
  }

  const data = Buffer.alloc(4);
  data.writeUInt16LE(low, 0);
  data.writeUInt16LE(high, 2);
  return data;
}

export const FLOOR_SENSOR_PRESETS: Readonly<Record<string, FloorSensorConfig>> = {
  '10k': { sensorType: 2, missingLimitAdc: 4007, bValue: 3800, pullUpOhms: 47000, brokenLimitAdc: 100, resistance25cOhms: 10000, offset: -0.1 },
  '12k': { sensorType: 3, missingLimitAdc: 4007, bValue: 3600, pullUpOhms: 47000, brokenLimitAdc: 100, resistance25cOhms: 12000, offset: -0.7 },
  '15k': { sensorType: 4, missingLimitAdc: 4007, bValue: 3400, pullUpOhms: 47000, brokenLimitAdc: 100, resistance25cOhms: 15000, offset: -0.5 },
  '33k': { sensorType: 6, missingLimitAdc: 4007, bValue: 4100, pullUpOhms: 47000, brokenLimitAdc: 100, resistance25cOhms: 33000, offset: -0.4 },
  '47k': { sensorType: 7, missingLimitAdc: 4007, bValue: 3850, pullUpOhms: 47000, brokenLimitAdc: 100, resistance25cOhms: 47000, offset: -0.8 },
};

/** Preset name matching a configuration, or null for a custom sensor */
export function matchFloorSensorPreset(config: FloorSensorConfig): string | null {
  for (const [name, preset] of Object.entries(FLOOR_SENSOR_PRESETS)) {
    if (preset.sensorType === config.sensorType && preset.resistance25cOhms === config.resistance25cOhms) {
      return name;
    }
  }
  return null;
}

export function decodeFloorSensor(data: Buffer): FloorSensorConfig {
  requireLength('floorSensorType', data, 13);
  return {
    sensorType: data[0],
    missingLimitAdc: data.readUInt16LE(1),
    bValue: data.readUInt16LE(3),
    pullUpOhms: data.readUInt16LE(5),
    brokenLimitAdc: data.readUInt16LE(7),
    resistance25cOhms: data.readUInt16LE(9),
    offset: readFixed(data, 11, 10, true),
  };
}

export function encodeFloorSensor(config: FloorSensorConfig): Buffer {
  const [offsetMin, offsetMax] = i16Bounds(10);
  checkInteger('sensorType', config.sensorType, 1, 7);
  checkInteger('missingLimitAdc', config.missingLimitAdc, 0, U16_MAX);
  checkInteger('bValue', config.bValue, 0, U16_MAX);
  checkInteger('pullUpOhms', config.pullUpOhms, 0, U16_MAX);
  checkInteger('brokenLimitAdc', config.brokenLimitAdc, 0, U16_MAX);
  checkInteger('resistance25cOhms', config.resistance25cOhms, 0, U16_MAX);
  const offset = toFixed('offset', config.offset, 10, offsetMin, offsetMax);

  const data = Buffer.alloc(13);
  data[0] = config.sensorType;
  data.writeUInt16LE(config.missingLimitAdc, 1);
  data.writeUInt16LE(config.bValue, 3);
  data.writeUInt16LE(config.pullUpOhms, 5);
  data.writeUInt16LE(config.brokenLimitAdc, 7);
  data.writeUInt16LE(config.resistance25cOhms, 9);
  data.writeInt16LE(offset, 11);
  return data;
}

export const ROOM_CALIBRATION = { min: -5, max: 5 } as const;

export function decodeRoomCalibration(data: Buffer): number {
  requireLength('roomCalibration', data, 2);
  return readFixed(data, 0, 10, true);
}

export function encodeRoomCalibration(value: number): Buffer {
  const raw = toFixed('roomCalibration', value, 10, ROOM_CALIBRATION.min, ROOM_CALIBRATION.max);
  const data = Buffer.alloc(2);
  data.writeInt16LE(raw, 0);
  return data;
}

// ─────────────────────────────────────────────────────────────────────────────
// Plain 16-bit quantities
// ─────────────────────────────────────────────────────────────────────────────

export function decodeU16(characteristic: string, data: Buffer): number {
  requireLength(characteristic, data, 2);
  return data.readUInt16LE(0);
}

export function encodeU16(field: string, value: number, max: number = U16_MAX): Buffer {
  checkInteger(field, value, 0, max);
  const data = Buffer.alloc(2);
  data.writeUInt16LE(value, 0);
  return data;
}

export const HEATING_POWER_MAX = 9999;

// ─────────────────────────────────────────────────────────────────────────────
// Child lock, LEDs, energy unit
// ─────────────────────────────────────────────────────────────────────────────

export function decodeChildLock(data: Buffer): ChildLock {
  requireLength('childLock', data, 3);
  return { enabled: readBool(data, 0), code: data.readUInt16LE(1) };
}

export function encodeChildLock(lock: ChildLock): Buffer {
  checkInteger('code', lock.code, 0, 9999);
  const data = Buffer.alloc(3);
  data[0] = lock.enabled ? 1 : 0;
  data.writeUInt16LE(lock.code, 1);
  return data;
}

export function decodeLedBrightness(data: Buffer): LedBrightness {
  requireLength('ledBrightness', data, 3);
  return { red: data[0], green: data[1], blue: data[2] };
}

export function encodeLedBrightness(leds: LedBrightness): Buffer {
  checkInteger('red', leds.red, 0, 100);
  checkInteger('green', leds.green, 0, 100);
  checkInteger('blue', leds.blue, 0, 100);
  return Buffer.from([leds.red, leds.green, leds.blue]);
}

export const ENERGY_PRICE_MAX = 655.35;

export function decodeEnergyUnit(data: Buffer): EnergyUnit {
  requireLength('energyUnit', data, 4);
  const currency = data[0];
  return {
    currency,
    currencyCode: CURRENCIES[currency]?.code ?? 'Unknown',
    currencySymbol: CURRENCIES[currency]?.symbol ?? '',
    price: readFixed(data, 2, 100, false),
  };
}

export function encodeEnergyUnit(unit: Pick<EnergyUnit, 'currency' | 'price'>): Buffer {
  checkInteger('currency', unit.currency, 0, U8_MAX);
  const price = toFixed('price', unit.price, 100, 0, ENERGY_PRICE_MAX);
  const data = Buffer.alloc(4);
  data[0] = unit.currency;
  data.writeUInt16LE(price, 2);
  return data;
}

// ─────────────────────────────────────────────────────────────────────────────
// Manufacturing date
// ─────────────────────────────────────────────────────────────────────────────

export function decodeManufacturingDate(data: Buffer): ManufacturingDate {
  requireLength('manufacturingDate', data, 4);
  return { day: data[0], month: data[1], year: data.readUInt16LE(2) };
}

export function encodeManufacturingDate(date: ManufacturingDate): Buffer {
  checkInteger('day', date.day, 1, 31);
  checkInteger('month', date.month, 1, 12);
  checkInteger('year', date.year, 0, U16_MAX);
  const data = Buffer.alloc(4);
  data[0] = date.day;
  data[1] = date.month;
  data.writeUInt16LE(date.year, 2);
  return data;
}
