import { DecodeError } from '../ThermostatErrors';
import {
  decodeMonitoringData,
  decodePowerConsumption,
  encodeMonitoringData,
  encodePowerConsumption,
  MONITORING_LENGTH,
  POWER_CONSUMPTION_LENGTH,
} from './history';

// Section offsets inside the monitoring record
const MONTHLY = 19;
const HOURLY = 47;

function monitoringRecord(): Buffer {
  const data = Buffer.alloc(MONITORING_LENGTH);
  // Daily: 15.6.2026, first sample one day back at 30 %
  data[0] = 15;
  data[1] = 6;
  data[2] = 26;
  data[3] = 1;
  data[4] = 30;
  // Monthly: June 2026, first sample two months back without data
  data[MONTHLY] = 6;
  data[MONTHLY + 1] = 26;
  data[MONTHLY + 2] = 2;
  data[MONTHLY + 3] = 0xff;
  // Hourly: 12:00 on 15.6.2026, first sample three hours back
  data[HOURLY] = 12;
  data[HOURLY + 1] = 15;
  data[HOURLY + 2] = 6;
  data[HOURLY + 3] = 26;
  data[HOURLY + 4] = 3;
  data.writeInt16LE(215, HOURLY + 5);
  data.writeUInt16LE(0x7fff, HOURLY + 7);
  return data;
}

describe('decodeMonitoringData', () => {
  test('should timestamp samples relative to their section header', () => {
    const monitoring = decodeMonitoringData(monitoringRecord());

    expect(monitoring.daily.header?.toISOString()).toBe('2026-06-15T00:00:00.000Z');
    expect(monitoring.daily.samples).toHaveLength(8);
    expect(monitoring.daily.samples[0].time.toISOString()).toBe('2026-06-14T00:00:00.000Z');
    expect(monitoring.daily.samples[0].ratio).toBe(30);

    expect(monitoring.monthly.header?.toISOString()).toBe('2026-06-01T00:00:00.000Z');
    expect(monitoring.monthly.samples).toHaveLength(13);
    expect(monitoring.monthly.samples[0].time.toISOString()).toBe('2026-04-01T00:00:00.000Z');
    expect(monitoring.monthly.samples[0].ratio).toBeNull();

    expect(monitoring.hourly.header?.toISOString()).toBe('2026-06-15T12:00:00.000Z');
    expect(monitoring.hourly.samples).toHaveLength(168);
    expect(monitoring.hourly.samples[0]).toEqual({
      delta: 3,
      time: new Date('2026-06-15T09:00:00.000Z'),
      floorTemperature: 21.5,
      roomTemperature: null,
    });
  });

  test('should leave unrecorded sections empty', () => {
    const monitoring = decodeMonitoringData(Buffer.alloc(MONITORING_LENGTH));

    expect(monitoring.daily).toEqual({ header: null, samples: [] });
    expect(monitoring.monthly).toEqual({ header: null, samples: [] });
    expect(monitoring.hourly).toEqual({ header: null, samples: [] });
  });

  test('should reject an invalid header', () => {
    const data = monitoringRecord();
    data[HOURLY] = 24;

    expect(() => decodeMonitoringData(data)).toThrow(DecodeError);
  });

  test('should reject a header day past the end of its month', () => {
    const data = monitoringRecord();
    data[HOURLY + 1] = 31;

    expect(() => decodeMonitoringData(data)).toThrow(DecodeError);
  });

  test('should reject a short record', () => {
    expect(() => decodeMonitoringData(Buffer.alloc(MONITORING_LENGTH - 1))).toThrow(DecodeError);
  });

  test('should encode back to the same bytes', () => {
    const data = monitoringRecord();
    expect(encodeMonitoringData(decodeMonitoringData(data))).toEqual(data);
  });
});

describe('decodePowerConsumption', () => {
  test('should step back one hour per delta', () => {
    const data = Buffer.alloc(POWER_CONSUMPTION_LENGTH);
    data[0] = 0;
    data[1] = 1;
    data[2] = 3;
    data[3] = 26;
    data[4] = 0;
    data[5] = 40;
    data[6] = 1;
    data[7] = 0xff;

    const power = decodePowerConsumption(data);

    expect(power.header?.toISOString()).toBe('2026-03-01T00:00:00.000Z');
    expect(power.samples).toHaveLength(25);
    expect(power.samples[0]).toEqual({ delta: 0, time: new Date('2026-03-01T00:00:00.000Z'), ratio: 40 });
    expect(power.samples[1]).toEqual({ delta: 1, time: new Date('2026-02-28T23:00:00.000Z'), ratio: null });
    expect(encodePowerConsumption(power)).toEqual(data);
  });

  test('should treat month 0 as no data', () => {
    expect(decodePowerConsumption(Buffer.alloc(POWER_CONSUMPTION_LENGTH))).toEqual({ header: null, samples: [] });
  });
});
