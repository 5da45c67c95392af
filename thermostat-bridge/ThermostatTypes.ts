/**
 * Thermostat Bridge Types
 * Typed records for every characteristic format, plus the tagged union over them.
 *
 * Units: temperatures in °C, offsets in °C or %, durations in minutes.
 * `null` temperatures/ratios mean the device reported its "no data" sentinel.
 */

import type { CharacteristicId } from './ThermostatConstants';

/** A wire enumeration code with its name; unknown codes keep the raw number and name 'Unknown' */
export interface EnumValue {
  code: number;
  name: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Live status and alarms
// ─────────────────────────────────────────────────────────────────────────────

export interface AlarmFlags {
  sensorFault: boolean;
  combinationLowLimit: boolean;
  combinationHighLimit: boolean;
  invalidVacation: boolean;
  invalidCalendar: boolean;
  floorSensorMissing: boolean;
  floorSensorBroken: boolean;
  roomSensorMissing: boolean;
  roomSensorBroken: boolean;
  combinationSetValuesInvalid: boolean;
  dayCalendarNotSet: boolean;
}

export type AlarmFlag = keyof AlarmFlags;

export interface AlarmState {
  /** Bytes 0-1 of the alarm code, little endian */
  code: number;
  flags: AlarmFlags;
  /** Descriptions of the raised flags, byte 0 first */
  active: string[];
}

export interface RealTimeStatus {
  targetTemperature: number | null;
  settingPercent: number;
  roomTemperature: number | null;
  floorTemperature: number | null;
  relayActive: boolean;
  alarm: AlarmState;
  activeMode: EnumValue;
  heatingMode: EnumValue;
  boostEnabled: boolean;
  boostSetpointMinutes: number;
  boostRemainingMinutes: number;
  potentiometerPercent: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Settings
// ─────────────────────────────────────────────────────────────────────────────

export interface BoostConfig {
  enabled: boolean;
  offsetDegrees: number;
  offsetPercentage: number;
  setpointMinutes: number;
  remainingMinutes: number;
}

export interface DaylightSaving {
  enabled: boolean;
  winterToSummerMinutes: number;
  summerToWinterMinutes: number;
  utcOffsetMinutes: number;
}

export interface FloorLimits {
  low: number;
  high: number;
}

export interface ChildLock {
  enabled: boolean;
  code: number;
}

export interface FloorSensorConfig {
  sensorType: number;
  missingLimitAdc: number;
  bValue: number;
  pullUpOhms: number;
  brokenLimitAdc: number;
  resistance25cOhms: number;
  /** °C */
  offset: number;
}

export interface LedBrightness {
  red: number;
  green: number;
  blue: number;
}

export interface EnergyUnit {
  currency: number;
  currencyCode: string;
  currencySymbol: string;
  price: number;
}

export interface ManufacturingDate {
  day: number;
  month: number;
  year: number;
}

export interface DeviceName {
  /** Device-owned byte preceding the name */
  prefix: number;
  name: string;
}

export interface FactoryResetInfo {
  id: number;
  /** Device address appended on read by some firmware, colon separated */
  deviceAddress: string | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Calendar and vacation
// ─────────────────────────────────────────────────────────────────────────────

export interface CalendarProgram {
  startHour: number;
  startMinute: number;
  endHour: number;
  endMinute: number;
  offsetDegrees: number;
  offsetPercentage: number;
  enabled: boolean;
}

export interface CalendarDay {
  day: number;
  /** Always six slots; unused slots are disabled and zeroed */
  programs: CalendarProgram[];
}

export interface VacationWindow {
  /** Device wall-clock time carried in the Date's UTC fields */
  from: Date;
  to: Date;
  offsetDegrees: number;
  offsetPercentage: number;
  enabled: boolean;
  /** Set by the device while the window is running; never chosen by callers */
  active: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// External (force) control
// ─────────────────────────────────────────────────────────────────────────────

export interface LegacyForceControl {
  format: 'legacy';
  potentiometerPercent: number;
}

export interface ExtendedForceControl {
  format: 'extended';
  mode: EnumValue;
  enabled: boolean;
  temperature: number;
  temperatureOffset: number;
  /** Full record as read; writes change only the fields above */
  raw: Buffer;
}

export type ForceControl = LegacyForceControl | ExtendedForceControl;

// ─────────────────────────────────────────────────────────────────────────────
// History
// ─────────────────────────────────────────────────────────────────────────────

export interface RatioSample {
  /** Units back from the section header (days, months or hours) */
  delta: number;
  time: Date;
  ratio: number | null;
}

export interface TemperatureSample {
  delta: number;
  time: Date;
  floorTemperature: number | null;
  roomTemperature: number | null;
}

export interface HistorySection<S> {
  /** Wall-clock header; null when the section was never recorded */
  header: Date | null;
  samples: S[];
}

export interface MonitoringData {
  daily: HistorySection<RatioSample>;
  monthly: HistorySection<RatioSample>;
  hourly: HistorySection<TemperatureSample>;
}

export type PowerConsumption = HistorySection<RatioSample>;

// ─────────────────────────────────────────────────────────────────────────────
// Tagged union
// ─────────────────────────────────────────────────────────────────────────────

export interface CharacteristicValueMap {
  manufacturerName: string;
  deviceName: DeviceName;
  modelNumber: string;
  softwareRevision: string;
  manufacturingDate: ManufacturingDate;
  hardwareRevision: string;
  dateAndTime: Date;
  daylightSaving: DaylightSaving;
  heatingMode: EnumValue;
  boost: BoostConfig;
  powerControlCycle: number;
  floorLimits: FloorLimits;
  childLock: ChildLock;
  adaptiveTemperatureControl: boolean;
  floorSensorType: FloorSensorConfig;
  heatingPower: number;
  floorArea: number;
  roomCalibration: number;
  ledBrightness: LedBrightness;
  energyUnit: EnergyUnit;
  alarmCode: AlarmState;
  calendarControl: number;
  calendarDay: CalendarDay;
  vacationTime: VacationWindow;
  calendarMode: boolean;
  factoryResetId: FactoryResetInfo;
  monitoringData: MonitoringData;
  realTimeIndication: RealTimeStatus;
  realTimePowerConsumption: PowerConsumption;
  forceControl: ForceControl;
}

export type CharacteristicValue = {
  [K in CharacteristicId]: { kind: K; value: CharacteristicValueMap[K] };
}[CharacteristicId];

// ─────────────────────────────────────────────────────────────────────────────
// Device identity
// ─────────────────────────────────────────────────────────────────────────────

export interface DeviceIdentity {
  address: string;
  factoryResetId: number;
  modelNumber: string | null;
  deviceName: string | null;
  softwareRevision: string | null;
  hardwareRevision: string | null;
}

export interface DeviceInfo {
  modelNumber: string | null;
  softwareRevision: string | null;
  hardwareRevision: string | null;
  manufacturerName: string | null;
  manufacturingDate: ManufacturingDate | null;
}
