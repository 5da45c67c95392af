/**
 * Binary Codec
 * One decode and one encode entry point over the closed set of characteristics.
 */

import { CHARACTERISTICS, CharacteristicId } from '../ThermostatConstants';
import type { CharacteristicValue } from '../ThermostatTypes';
import { decodeCalendarDay, decodeVacation, encodeCalendarDay, encodeVacation } from './calendar';
import {
  decodeDeviceName,
  decodeFactoryResetId,
  decodeHardwareRevision,
  decodeText,
  encodeDeviceName,
  encodeFactoryResetId,
  encodeHardwareRevision,
  encodeText,
} from './deviceInfo';
import { decodeForceControl, encodeForceControl } from './forceControl';
import {
  decodeMonitoringData,
  decodePowerConsumption,
  encodeMonitoringData,
  encodePowerConsumption,
} from './history';
import { decodeAlarmCode, decodeRealTimeStatus, encodeAlarmCode, encodeRealTimeStatus } from './realTime';
import {
  decodeBoost,
  decodeCalendarControl,
  decodeChildLock,
  decodeDateAndTime,
  decodeDaylightSaving,
  decodeEnergyUnit,
  decodeFlag,
  decodeFloorLimits,
  decodeFloorSensor,
  decodeHeatingMode,
  decodeLedBrightness,
  decodeManufacturingDate,
  decodePowerControlCycle,
  decodeRoomCalibration,
  decodeU16,
  encodeBoost,
  encodeCalendarControl,
  encodeChildLock,
  encodeDateAndTime,
  encodeDaylightSaving,
  encodeEnergyUnit,
  encodeFlag,
  encodeFloorLimits,
  encodeFloorSensor,
  encodeHeatingMode,
  encodeLedBrightness,
  encodeManufacturingDate,
  encodePowerControlCycle,
  encodeRoomCalibration,
  encodeU16,
  HEATING_POWER_MAX,
} from './settings';

export * from './calendar';
export * from './deviceInfo';
export * from './forceControl';
export * from './history';
export * from './primitives';
export * from './realTime';
export * from './settings';

/**
 * Split reads strip trailing zero padding; put it back so fixed-length
 * decoders see the full record. Longer buffers are returned untouched.
 */
export function restorePadding(id: CharacteristicId, data: Buffer): Buffer {
  const length: number | null = CHARACTERISTICS[id].recordLength;
  if (length === null || data.length === 0 || data.length >= length) {
    return data;
  }
  const padded = Buffer.alloc(length);
  data.copy(padded);
  return padded;
}

export function decodeCharacteristic(id: CharacteristicId, data: Buffer): CharacteristicValue {
  switch (id) {
    case 'manufacturerName':
    case 'modelNumber':
    case 'softwareRevision':
      return { kind: id, value: decodeText(data) };
    case 'deviceName':
      return { kind: id, value: decodeDeviceName(data) };
    case 'manufacturingDate':
      return { kind: id, value: decodeManufacturingDate(data) };
    case 'hardwareRevision':
      return { kind: id, value: decodeHardwareRevision(data) };
    case 'dateAndTime':
      return { kind: id, value: decodeDateAndTime(data) };
    case 'daylightSaving':
      return { kind: id, value: decodeDaylightSaving(data) };
    case 'heatingMode':
      return { kind: id, value: decodeHeatingMode(data) };
    case 'boost':
      return { kind: id, value: decodeBoost(data) };
    case 'powerControlCycle':
      return { kind: id, value: decodePowerControlCycle(data) };
    case 'floorLimits':
      return { kind: id, value: decodeFloorLimits(data) };
    case 'childLock':
      return { kind: id, value: decodeChildLock(data) };
    case 'adaptiveTemperatureControl':
    case 'calendarMode':
      return { kind: id, value: decodeFlag(id, data) };
    case 'floorSensorType':
      return { kind: id, value: decodeFloorSensor(data) };
    case 'heatingPower':
    case 'floorArea':
      return { kind: id, value: decodeU16(id, data) };
    case 'roomCalibration':
      return { kind: id, value: decodeRoomCalibration(data) };
    case 'ledBrightness':
      return { kind: id, value: decodeLedBrightness(data) };
    case 'energyUnit':
      return { kind: id, value: decodeEnergyUnit(data) };
    case 'alarmCode':
      return { kind: id, value: decodeAlarmCode(data) };
    case 'calendarControl':
      return { kind: id, value: decodeCalendarControl(data) };
    case 'calendarDay':
      return { kind: id, value: decodeCalendarDay(data) };
    case 'vacationTime':
      return { kind: id, value: decodeVacation(data) };
    case 'factoryResetId':
      return { kind: id, value: decodeFactoryResetId(data) };
    case 'monitoringData':
      return { kind: id, value: decodeMonitoringData(data) };
    case 'realTimeIndication':
      return { kind: id, value: decodeRealTimeStatus(data) };
    case 'realTimePowerConsumption':
      return { kind: id, value: decodePowerConsumption(data) };
    case 'forceControl':
      return { kind: id, value: decodeForceControl(data) };
  }
}

export function encodeCharacteristic(characteristic: CharacteristicValue): Buffer {
  switch (characteristic.kind) {
    case 'manufacturerName':
    case 'modelNumber':
    case 'softwareRevision':
      return encodeText(characteristic.value);
    case 'deviceName':
      return encodeDeviceName(characteristic.value);
    case 'manufacturingDate':
      return encodeManufacturingDate(characteristic.value);
    case 'hardwareRevision':
      return encodeHardwareRevision(characteristic.value);
    case 'dateAndTime':
      return encodeDateAndTime(characteristic.value);
    case 'daylightSaving':
      return encodeDaylightSaving(characteristic.value);
    case 'heatingMode':
      return encodeHeatingMode(characteristic.value);
    case 'boost':
      return encodeBoost(characteristic.value);
    case 'powerControlCycle':
      return encodePowerControlCycle(characteristic.value);
    case 'floorLimits':
      return encodeFloorLimits(characteristic.value);
    case 'childLock':
      return encodeChildLock(characteristic.value);
    case 'adaptiveTemperatureControl':
    case 'calendarMode':
      return encodeFlag(characteristic.value);
    case 'floorSensorType':
      return encodeFloorSensor(characteristic.value);
    case 'heatingPower':
      return encodeU16('heatingPower', characteristic.value, HEATING_POWER_MAX);
    case 'floorArea':
      return encodeU16('floorArea', characteristic.value);
    case 'roomCalibration':
      return encodeRoomCalibration(characteristic.value);
    case 'ledBrightness':
      return encodeLedBrightness(characteristic.value);
    case 'energyUnit':
      return encodeEnergyUnit(characteristic.value);
    case 'alarmCode':
      return encodeAlarmCode(characteristic.value);
    case 'calendarControl':
      return encodeCalendarControl(characteristic.value);
    case 'calendarDay':
      return encodeCalendarDay(characteristic.value);
    case 'vacationTime':
      return encodeVacation(characteristic.value);
    case 'factoryResetId':
      return encodeFactoryResetId(characteristic.value);
    case 'monitoringData':
      return encodeMonitoringData(characteristic.value);
    case 'realTimeIndication':
      return encodeRealTimeStatus(characteristic.value);
    case 'realTimePowerConsumption':
      return encodePowerConsumption(characteristic.value);
    case 'forceControl':
      return encodeForceControl(characteristic.value);
  }
}
