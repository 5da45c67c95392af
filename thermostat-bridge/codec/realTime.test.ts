/**
 * Live status and alarm code decoding
 */

import { DecodeError, OutOfRangeError } from '../ThermostatErrors';
import {
  alarmStateFromFlags,
  decodeAlarmBytes,
  decodeAlarmCode,
  decodeRealTimeStatus,
  emptyAlarmFlags,
  encodeRealTimeStatus,
} from './realTime';

function liveRecord(): Buffer {
  const data = Buffer.alloc(20);
  data.writeUInt16LE(200, 0); // target 20.0
  data[2] = 50;
  data.writeInt16LE(215, 3); // room 21.5
  data.writeInt16LE(-15, 5); // floor -1.5
  data[7] = 1;
  data[8] = 0x21;
  data[9] = 0x04;
  data[12] = 2;
  data[13] = 3;
  data[14] = 1;
  data.writeUInt16LE(120, 15);
  data.writeUInt16LE(45, 17);
  data[19] = 30;
  return data;
}

describe('decodeRealTimeStatus', () => {
  test('should decode every field of the 20-byte record', () => {
    const status = decodeRealTimeStatus(liveRecord());

    expect(status.targetTemperature).toBe(20);
    expect(status.settingPercent).toBe(50);
    expect(status.roomTemperature).toBe(21.5);
    expect(status.floorTemperature).toBe(-1.5);
    expect(status.relayActive).toBe(true);
    expect(status.activeMode).toEqual({ code: 2, name: 'Calendar' });
    expect(status.heatingMode).toEqual({ code: 3, name: 'Combination' });
    expect(status.boostEnabled).toBe(true);
    expect(status.boostSetpointMinutes).toBe(120);
    expect(status.boostRemainingMinutes).toBe(45);
    expect(status.potentiometerPercent).toBe(30);
  });

  test('should map the no-data sentinel to null', () => {
    const data = liveRecord();
    data.writeUInt16LE(0x7fff, 0);
    data.writeUInt16LE(0x7fff, 5);

    const status = decodeRealTimeStatus(data);

    expect(status.targetTemperature).toBeNull();
    expect(status.floorTemperature).toBeNull();
    expect(status.roomTemperature).toBe(21.5);
  });

  test('should name unknown enumeration codes', () => {
    const data = liveRecord();
    data[12] = 9;

    expect(decodeRealTimeStatus(data).activeMode).toEqual({ code: 9, name: 'Unknown' });
  });

  test('should reject a record of the wrong length', () => {
    expect(() => decodeRealTimeStatus(Buffer.alloc(19))).toThrow(DecodeError);
    expect(() => decodeRealTimeStatus(Buffer.alloc(21))).toThrow(DecodeError);
  });

  test('should encode back to the same bytes', () => {
    const data = liveRecord();
    expect(encodeRealTimeStatus(decodeRealTimeStatus(data))).toEqual(data);
  });

  test('should reject a setting percentage above 100', () => {
    const status = { ...decodeRealTimeStatus(liveRecord()), settingPercent: 101 };
    expect(() => encodeRealTimeStatus(status)).toThrow(OutOfRangeError);
  });
});

describe('alarm code', () => {
  test('should decode the known bits of both bytes', () => {
    const alarm = decodeAlarmBytes(0x21, 0x04);

    expect(alarm.code).toBe(0x0421);
    expect(alarm.flags.sensorFault).toBe(true);
    expect(alarm.flags.floorSensorMissing).toBe(true);
    expect(alarm.flags.dayCalendarNotSet).toBe(true);
    expect(alarm.flags.roomSensorBroken).toBe(false);
    expect(alarm.active).toEqual([
      'Sensor fault (short-circuit)',
      'Floor sensor missing',
      'Day calendar is not set',
    ]);
  });

  test('should ignore undefined bits', () => {
    const alarm = decodeAlarmBytes(0x00, 0xf8);

    expect(alarm.code).toBe(0);
    expect(alarm.active).toEqual([]);
  });

  test('should read the alarm characteristic and ignore the reserved bytes', () => {
    const alarm = decodeAlarmCode(Buffer.from([0x00, 0x01, 0xff, 0xff]));

    expect(alarm.code).toBe(0x0100);
    expect(alarm.flags.roomSensorBroken).toBe(true);
  });

  test('should rebuild the state from flags', () => {
    const flags = { ...emptyAlarmFlags(), invalidVacation: true };

    expect(alarmStateFromFlags(flags)).toEqual({
      code: 0x08,
      flags,
      active: ['Invalid vacation configuration'],
    });
  });
});
