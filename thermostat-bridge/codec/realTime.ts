/**
 * Live status (real time indication) and alarm code formats.
 *
 * Real time indication, 20 bytes:
 *   [0-1]   target temperature u16 /10
 *   [2]     temperature setting %
 *   [3-4]   room temperature i16 /10
 *   [5-6]   floor temperature i16 /10
 *   [7]     relay active
 *   [8-11]  alarm code (bytes 2-3 reserved)
 *   [12]    active mode
 *   [13]    heating mode
 *   [14]    boost enabled
 *   [15-16] boost setpoint minutes
 *   [17-18] boost remaining minutes
 *   [19]    potentiometer %
 */

import { ACTIVE_MODES, HEATING_MODES } from '../ThermostatConstants';
import type { AlarmFlag, AlarmFlags, AlarmState, RealTimeStatus } from '../ThermostatTypes';
import {
  checkInteger,
  enumValue,
  i16Bounds,
  readBool,
  readTemperature,
  requireExactLength,
  requireLength,
  toTemperature,
  U16_MAX,
  u16Bounds,
  U8_MAX,
} from './primitives';

export const REAL_TIME_LENGTH = 20;
export const ALARM_CODE_LENGTH = 4;

interface AlarmBit {
  flag: AlarmFlag;
  byte: 0 | 1;
  mask: number;
  description: string;
}

const ALARM_BITS: readonly AlarmBit[] = [
  { flag: 'sensorFault', byte: 0, mask: 0x01, description: 'Sensor fault (short-circuit)' },
  { flag: 'combinationLowLimit', byte: 0, mask: 0x02, description: 'Low limit in combination mode' },
  { flag: 'combinationHighLimit', byte: 0, mask: 0x04, description: 'High limit in combination mode' },
  { flag: 'invalidVacation', byte: 0, mask: 0x08, description: 'Invalid vacation configuration' },
  { flag: 'invalidCalendar', byte: 0, mask: 0x10, description: 'Invalid calendar configuration' },
  { flag: 'floorSensorMissing', byte: 0, mask: 0x20, description: 'Floor sensor missing' },
  { flag: 'floorSensorBroken', byte: 0, mask: 0x40, description: 'Floor sensor broken' },
  { flag: 'roomSensorMissing', byte: 0, mask: 0x80, description: 'Room sensor missing' },
  { flag: 'roomSensorBroken', byte: 1, mask: 0x01, description: 'Room sensor broken' },
  { flag: 'combinationSetValuesInvalid', byte: 1, mask: 0x02, description: 'Combination mode faulty set values (<8)' },
  { flag: 'dayCalendarNotSet', byte: 1, mask: 0x04, description: 'Day calendar is not set' },
];

export function emptyAlarmFlags(): AlarmFlags {
  return {
    sensorFault: false,
    combinationLowLimit: false,
    combinationHighLimit: false,
    invalidVacation: false,
    invalidCalendar: false,
    floorSensorMissing: false,
    floorSensorBroken: false,
    roomSensorMissing: false,
    roomSensorBroken: false,
    combinationSetValuesInvalid: false,
    dayCalendarNotSet: false,
  };
}

export function describeAlarm(flag: AlarmFlag): string {
  return ALARM_BITS.find((bit) => bit.flag === flag)?.description ?? flag;
}

/** Decode the two meaningful alarm bytes; unknown bits are ignored */
export function decodeAlarmBytes(byte0: number, byte1: number): AlarmState {
  const flags = emptyAlarmFlags();
  const active: string[] = [];
  let code = 0;
  for (const bit of ALARM_BITS) {
    const value = bit.byte === 0 ? byte0 : byte1;
    if (value & bit.mask) {
      flags[bit.flag] = true;
      active.push(bit.description);
      code |= bit.mask << (bit.byte * 8);
    }
  }
  return { code, flags, active };
}

/** Pack flags back into bytes 0-1; only known bits are ever set */
export function encodeAlarmFlags(flags: AlarmFlags): [number, number] {
  const bytes: [number, number] = [0, 0];
  for (const bit of ALARM_BITS) {
    if (flags[bit.flag]) {
      bytes[bit.byte] |= bit.mask;
    }
  }
  return bytes;
}

export function alarmStateFromFlags(flags: AlarmFlags): AlarmState {
  const [byte0, byte1] = encodeAlarmFlags(flags);
  return decodeAlarmBytes(byte0, byte1);
}

export function decodeAlarmCode(data: Buffer): AlarmState {
  requireLength('alarmCode', data, 2);
  return decodeAlarmBytes(data[0], data[1]);
}

export function encodeAlarmCode(alarm: AlarmState): Buffer {
  const [byte0, byte1] = encodeAlarmFlags(alarm.flags);
  const data = Buffer.alloc(ALARM_CODE_LENGTH);
  data[0] = byte0;
  data[1] = byte1;
  return data;
}

export function decodeRealTimeStatus(data: Buffer): RealTimeStatus {
  requireExactLength('realTimeIndication', data, REAL_TIME_LENGTH);
  return {
    targetTemperature: readTemperature(data, 0, 10, false),
    settingPercent: data[2],
    roomTemperature: readTemperature(data, 3, 10, true),
    floorTemperature: readTemperature(data, 5, 10, true),
    relayActive: readBool(data, 7),
    alarm: decodeAlarmBytes(data[8], data[9]),
    activeMode: enumValue(ACTIVE_MODES, data[12]),
    heatingMode: enumValue(HEATING_MODES, data[13]),
    boostEnabled: readBool(data, 14),
    boostSetpointMinutes: data.readUInt16LE(15),
    boostRemainingMinutes: data.readUInt16LE(17),
    potentiometerPercent: data[19],
  };
}

export function encodeRealTimeStatus(status: RealTimeStatus): Buffer {
  const [u16Min, u16Max] = u16Bounds(10);
  const [i16Min, i16Max] = i16Bounds(10);
  const target = toTemperature('targetTemperature', status.targetTemperature, 10, u16Min, u16Max);
  const room = toTemperature('roomTemperature', status.roomTemperature, 10, i16Min, i16Max);
  const floor = toTemperature('floorTemperature', status.floorTemperature, 10, i16Min, i16Max);
  checkInteger('settingPercent', status.settingPercent, 0, 100);
  checkInteger('activeMode', status.activeMode.code, 0, U8_MAX);
  checkInteger('heatingMode', status.heatingMode.code, 0, U8_MAX);
  checkInteger('boostSetpointMinutes', status.boostSetpointMinutes, 0, U16_MAX);
  checkInteger('boostRemainingMinutes', status.boostRemainingMinutes, 0, U16_MAX);
  checkInteger('potentiometerPercent', status.potentiometerPercent, 0, 100);

  const data = Buffer.alloc(REAL_TIME_LENGTH);
  data.writeUInt16LE(target, 0);
  data[2] = status.settingPercent;
  data.writeInt16LE(room, 3);
  data.writeInt16LE(floor, 5);
  data[7] = status.relayActive ? 1 : 0;
  const [byte0, byte1] = encodeAlarmFlags(status.alarm.flags);
  data[8] = byte0;
  data[9] = byte1;
  data[12] = status.activeMode.code;
  data[13] = status.heatingMode.code;
  data[14] = status.boostEnabled ? 1 : 0;
  data.writeUInt16LE(status.boostSetpointMinutes, 15);
  data.writeUInt16LE(status.boostRemainingMinutes, 17);
  data[19] = status.potentiometerPercent;
  return data;
}
