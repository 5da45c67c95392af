/**
 * History buffers: monitoring data and real time power consumption.
 *
 * Every section starts with a wall-clock header; each sample stores how many
 * units (days, months or hours) before the header it was taken.
 */

import { DecodeError, OutOfRangeError } from '../ThermostatErrors';
import type {
  HistorySection,
  MonitoringData,
  PowerConsumption,
  RatioSample,
  TemperatureSample,
} from '../ThermostatTypes';
import {
  checkDate,
  checkInteger,
  i16Bounds,
  isCalendarDate,
  readRatio,
  readTemperature,
  requireLength,
  toRatio,
  toTemperature,
  U8_MAX,
  utcDate,
} from './primitives';

const HOUR_MS = 3_600_000;

export const DAILY_SAMPLES = 8;
export const MONTHLY_SAMPLES = 13;
export const HOURLY_SAMPLES = 168;
export const POWER_SAMPLES = 25;

const DAILY_OFFSET = 0;
const MONTHLY_OFFSET = 3 + DAILY_SAMPLES * 2;
const HOURLY_OFFSET = MONTHLY_OFFSET + 2 + MONTHLY_SAMPLES * 2;

export const MONITORING_LENGTH = HOURLY_OFFSET + 4 + HOURLY_SAMPLES * 5;
export const POWER_CONSUMPTION_LENGTH = 4 + POWER_SAMPLES * 2;

type Unit = 'day' | 'month' | 'hour';

export function subtractUnits(header: Date, delta: number, unit: Unit): Date {
  switch (unit) {
    case 'hour':
      return new Date(header.getTime() - delta * HOUR_MS);
    case 'day':
      return utcDate(header.getUTCFullYear(), header.getUTCMonth() + 1, header.getUTCDate() - delta, header.getUTCHours());
    case 'month':
      return utcDate(header.getUTCFullYear(), header.getUTCMonth() + 1 - delta, 1);
  }
}

interface HeaderFields {
  hour: number;
  day: number;
  month: number;
  year: number;
}

/** Month 0 marks a section the device never recorded */
function headerDate(characteristic: string, fields: HeaderFields, data: Buffer): Date | null {
  if (fields.month === 0) return null;
  if (!isCalendarDate(2000 + fields.year, fields.month, fields.day) || fields.hour > 23) {
    throw new DecodeError(characteristic, `invalid section header ${JSON.stringify(fields)}`, data.length);
  }
  return utcDate(2000 + fields.year, fields.month, fields.day, fields.hour);
}

function decodeRatioSection(
  data: Buffer,
  header: Date | null,
  start: number,
  count: number,
  unit: Unit,
): HistorySection<RatioSample> {
  if (header === null) return { header: null, samples: [] };
  const samples: RatioSample[] = [];
  for (let i = 0; i < count; i++) {
    const offset = start + i * 2;
    const delta = data[offset];
    samples.push({ delta, time: subtractUnits(header, delta, unit), ratio: readRatio(data, offset + 1) });
  }
  return { header, samples };
}

// ─────────────────────────────────────────────────────────────────────────────
// Monitoring data
// ─────────────────────────────────────────────────────────────────────────────

export function decodeMonitoringData(data: Buffer): MonitoringData {
  requireLength('monitoringData', data, MONITORING_LENGTH);

  const dailyHeader = headerDate('monitoringData', {
    hour: 0,
    day: data[DAILY_OFFSET],
    month: data[DAILY_OFFSET + 1],
    year: data[DAILY_OFFSET + 2],
  }, data);
  const monthlyHeader = headerDate('monitoringData', {
    hour: 0,
    day: 1,
    month: data[MONTHLY_OFFSET],
    year: data[MONTHLY_OFFSET + 1],
  }, data);
  const hourlyHeader = headerDate('monitoringData', {
    hour: data[HOURLY_OFFSET],
    day: data[HOURLY_OFFSET + 1],
    month: data[HOURLY_OFFSET + 2],
    year: data[HOURLY_OFFSET + 3],
  }, data);

  const hourly: TemperatureSample[] = [];
  if (hourlyHeader !== null) {
    for (let i = 0; i < HOURLY_SAMPLES; i++) {
      const offset = HOURLY_OFFSET + 4 + i * 5;
      const delta = data[offset];
      hourly.push({
        delta,
        time: subtractUnits(hourlyHeader, delta, 'hour'),
        floorTemperature: readTemperature(data, offset + 1, 10, true),
        roomTemperature: readTemperature(data, offset + 3, 10, true),
      });
    }
  }

  return {
    daily: decodeRatioSection(data, dailyHeader, DAILY_OFFSET + 3, DAILY_SAMPLES, 'day'),
    monthly: decodeRatioSection(data, monthlyHeader, MONTHLY_OFFSET + 2, MONTHLY_SAMPLES, 'month'),
    hourly: { header: hourlyHeader, samples: hourly },
  };
}

function checkSection<S>(field: string, section: HistorySection<S>, count: number): Date | null {
  const expected = section.header === null ? 0 : count;
  if (section.samples.length !== expected) {
    throw new OutOfRangeError(`${field}.samples.length`, section.samples.length, expected, expected);
  }
  if (section.header !== null) {
    checkDate(`${field}.header`, section.header);
    checkInteger(`${field}.header.year`, section.header.getUTCFullYear(), 2000, 2255);
  }
  return section.header;
}

function checkRatioSamples(field: string, samples: RatioSample[]): number[] {
  return samples.map((sample, index) => {
    checkInteger(`${field}[${index}].delta`, sample.delta, 0, U8_MAX);
    return toRatio(`${field}[${index}].ratio`, sample.ratio);
  });
}

function writeRatioSamples(data: Buffer, start: number, samples: RatioSample[], ratios: number[]): void {
  samples.forEach((sample, index) => {
    data[start + index * 2] = sample.delta;
    data[start + index * 2 + 1] = ratios[index];
  });
}

export function encodeMonitoringData(monitoring: MonitoringData): Buffer {
  const [tMin, tMax] = i16Bounds(10);
  const daily = checkSection('daily', monitoring.daily, DAILY_SAMPLES);
  const monthly = checkSection('monthly', monitoring.monthly, MONTHLY_SAMPLES);
  const hourly = checkSection('hourly', monitoring.hourly, HOURLY_SAMPLES);
  const dailyRatios = checkRatioSamples('daily', monitoring.daily.samples);
  const monthlyRatios = checkRatioSamples('monthly', monitoring.monthly.samples);
  const temperatures = monitoring.hourly.samples.map((sample, index) => {
    checkInteger(`hourly[${index}].delta`, sample.delta, 0, U8_MAX);
    return [
      toTemperature(`hourly[${index}].floorTemperature`, sample.floorTemperature, 10, tMin, tMax),
      toTemperature(`hourly[${index}].roomTemperature`, sample.roomTemperature, 10, tMin, tMax),
    ];
  });

  const data = Buffer.alloc(MONITORING_LENGTH);
  if (daily) {
    data[DAILY_OFFSET] = daily.getUTCDate();
    data[DAILY_OFFSET + 1] = daily.getUTCMonth() + 1;
    data[DAILY_OFFSET + 2] = daily.getUTCFullYear() - 2000;
    writeRatioSamples(data, DAILY_OFFSET + 3, monitoring.daily.samples, dailyRatios);
  }
  if (monthly) {
    data[MONTHLY_OFFSET] = monthly.getUTCMonth() + 1;
    data[MONTHLY_OFFSET + 1] = monthly.getUTCFullYear() - 2000;
    writeRatioSamples(data, MONTHLY_OFFSET + 2, monitoring.monthly.samples, monthlyRatios);
  }
  if (hourly) {
    data[HOURLY_OFFSET] = hourly.getUTCHours();
    data[HOURLY_OFFSET + 1] = hourly.getUTCDate();
    data[HOURLY_OFFSET + 2] = hourly.getUTCMonth() + 1;
    data[HOURLY_OFFSET + 3] = hourly.getUTCFullYear() - 2000;
    monitoring.hourly.samples.forEach((sample, index) => {
      const offset = HOURLY_OFFSET + 4 + index * 5;
      data[offset] = sample.delta;
      data.writeInt16LE(temperatures[index][0], offset + 1);
      data.writeInt16LE(temperatures[index][1], offset + 3);
    });
  }
  return data;
}

// ─────────────────────────────────────────────────────────────────────────────
// Real time power consumption
// ─────────────────────────────────────────────────────────────────────────────

export function decodePowerConsumption(data: Buffer): PowerConsumption {
  requireLength('realTimePowerConsumption', data, POWER_CONSUMPTION_LENGTH);
  const header = headerDate('realTimePowerConsumption', {
    hour: data[0],
    day: data[1],
    month: data[2],
    year: data[3],
  }, data);
  return decodeRatioSection(data, header, 4, POWER_SAMPLES, 'hour');
}

export function encodePowerConsumption(power: PowerConsumption): Buffer {
  const header = checkSection('power', power, POWER_SAMPLES);
  const ratios = checkRatioSamples('power', power.samples);

  const data = Buffer.alloc(POWER_CONSUMPTION_LENGTH);
  if (header) {
    data[0] = header.getUTCHours();
    data[1] = header.getUTCDate();
    data[2] = header.getUTCMonth() + 1;
    data[3] = header.getUTCFullYear() - 2000;
    writeRatioSamples(data, 4, power.samples, ratios);
  }
  return data;
}
