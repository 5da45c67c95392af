/**
 * Thermostat Device
 *
 * Typed command/query surface for one thermostat. Every operation:
 *   validate input → ensure a ready session → run its GATT sequence exclusively
 *
 * Input validation happens before any I/O, so an OutOfRangeError never leaves
 * a half-written characteristic behind.
 */

import {
  CALENDAR_CONTROL,
  CHARACTERISTICS,
  CharacteristicId,
  characteristicUuid,
  EXTERNAL_CONTROL_MODES,
  HEATING_MODES,
  SUPPORTED_HEATING_MODES,
} from './ThermostatConstants';
import { CharacteristicMissingError, DecodeError, NotReadyError, OutOfRangeError } from './ThermostatErrors';
import { thermostatLogger } from './ThermostatLogger';
import type {
  AlarmState,
  BoostConfig,
  CalendarDay,
  CalendarProgram,
  ChildLock,
  DaylightSaving,
  DeviceInfo,
  DeviceName,
  EnergyUnit,
  EnumValue,
  ExtendedForceControl,
  FloorLimits,
  FloorSensorConfig,
  ForceControl,
  LedBrightness,
  ManufacturingDate,
  MonitoringData,
  PowerConsumption,
  RealTimeStatus,
  VacationWindow,
} from './ThermostatTypes';
import { TypedEventEmitter } from './TypedEventEmitter';
import { getPlatformConfig, ThermostatConfig } from './PlatformConfig';
import { CoordinatorEvents, RealTimeCoordinator } from './RealTimeCoordinator';
import { SplitTransfer } from './SplitTransfer';
import { SessionLink, ThermostatSession, ThermostatSessionOptions } from './ThermostatSession';
import { sleep as defaultSleep } from './utils/timing';
import {
  checkCalendarDay,
  decodeAlarmCode,
  decodeBoost,
  decodeCalendarDay,
  decodeChildLock,
  decodeDateAndTime,
  decodeDaylightSaving,
  decodeDeviceName,
  decodeEnergyUnit,
  decodeFlag,
  decodeFloorLimits,
  decodeFloorSensor,
  decodeForceControl,
  decodeHardwareRevision,
  decodeHeatingMode,
  decodeLedBrightness,
  decodeManufacturingDate,
  decodeMonitoringData,
  decodePowerConsumption,
  decodePowerControlCycle,
  decodeRealTimeStatus,
  decodeRoomCalibration,
  decodeText,
  decodeU16,
  decodeVacation,
  encodeBoost,
  encodeCalendarControl,
  encodeCalendarDay,
  encodeChildLock,
  encodeDateAndTime,
  encodeDaylightSaving,
  encodeDeviceName,
  encodeEnergyUnit,
  encodeFlag,
  encodeFloorLimits,
  encodeFloorSensor,
  encodeForceControl,
  encodeHeatingMode,
  encodeLedBrightness,
  encodePowerControlCycle,
  encodeRoomCalibration,
  encodeU16,
  encodeVacation,
  enumValue,
  EXTENDED_FORCE_CONTROL_LENGTH,
  HEATING_POWER_MAX,
  readVacationActive,
  restorePadding,
  supportsExternalControl,
} from './codec';

export interface DeviceEvents {
  realTimeStatus: CoordinatorEvents['updated'];
}

export interface ThermostatDeviceOptions extends ThermostatSessionOptions {
  /** Injected for tests; defaults to a real timer */
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/** Boost as written by callers; the device owns the remaining time */
export type BoostSetting = Omit<BoostConfig, 'remainingMinutes'>;

/** Vacation as written by callers; the device owns the `active` flag */
export type VacationSetting = Omit<VacationWindow, 'active'>;

export interface ForceControlSetting {
  /** 2 Off, 5 Temperature, 6 Temperature change */
  mode: number;
  temperature: number;
  temperatureOffset: number;
}

// Daylight saving transitions used when the clock is synchronised
const DST_SHIFT_MINUTES = 60;
const MS_PER_MINUTE = 60_000;

export class ThermostatDevice extends TypedEventEmitter<DeviceEvents> {
  readonly address: string;
  readonly session: ThermostatSession;
  readonly realTime: RealTimeCoordinator;

  private readonly config: Readonly<ThermostatConfig>;
  private readonly split: SplitTransfer;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: ThermostatDeviceOptions) {
    super();
    this.address = options.address;
    this.config = options.config ?? getPlatformConfig();
    this.sleep = options.sleep ?? defaultSleep;
    this.session = new ThermostatSession({ ...options, config: this.config });
    this.split = new SplitTransfer({ writeDelayMs: this.config.timing.splitWriteDelayMs, sleep: this.sleep });

    this.realTime = new RealTimeCoordinator({
      address: options.address,
      maxAgeMs: this.config.timing.realTimeMaxAgeMs,
      now: options.now,
      fetch: () => this.execute('readRealTimeStatus', (link) =>
        this.readRecord(link, 'realTimeIndication', decodeRealTimeStatus)),
    });

    this.session.on('invalidated', () => this.realTime.invalidate());
    this.realTime.on('updated', (update) => this.emit('realTimeStatus', update));
  }

  async connect(): Promise<void> {
    await this.session.connect();
  }

  async cleanup(): Promise<void> {
    this.realTime.invalidate();
    this.realTime.removeAllListeners();
    await this.session.cleanup();
    this.removeAllListeners();
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Live status
  // ─────────────────────────────────────────────────────────────────────────────

  getRealTimeStatus(maxAgeMs?: number): Promise<RealTimeStatus> {
    return this.realTime.get(maxAgeMs);
  }

  readAlarmCode(): Promise<AlarmState> {
    return this.readValue('alarmCode', decodeAlarmCode);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Heating control
  // ─────────────────────────────────────────────────────────────────────────────

  readBoost(): Promise<BoostConfig> {
    return this.readValue('boost', decodeBoost);
  }

  writeBoost(boost: BoostSetting): Promise<void> {
    return this.writeValue('boost', () => encodeBoost({ ...boost, remainingMinutes: 0 }));
  }

  readHeatingMode(): Promise<EnumValue> {
    return this.readValue('heatingMode', decodeHeatingMode);
  }

  writeHeatingMode(mode: number): Promise<void> {
    return this.writeValue('heatingMode', () => {
      const data = encodeHeatingMode(enumValue(HEATING_MODES, mode));
      const supported = this.supportedHeatingModes();
      if (supported && !supported.includes(mode)) {
        throw new OutOfRangeError('heatingMode', mode, Math.min(...supported), Math.max(...supported));
      }
      return data;
    });
  }

  /** Heating modes the connected model accepts, or null while the model is unknown */
  supportedHeatingModes(): readonly number[] | null {
    const model = this.session.identity?.modelNumber?.toUpperCase();
    if (!model) return null;
    const key = Object.keys(SUPPORTED_HEATING_MODES).find((prefix) => model.includes(prefix));
    return key === undefined ? null : SUPPORTED_HEATING_MODES[key];
  }

  readAdaptiveTemperatureControl(): Promise<boolean> {
    return this.readValue('adaptiveTemperatureControl', (data) => decodeFlag('adaptiveTemperatureControl', data));
  }

  writeAdaptiveTemperatureControl(enabled: boolean): Promise<void> {
    return this.writeValue('adaptiveTemperatureControl', () => encodeFlag(enabled));
  }

  readCalendarMode(): Promise<boolean> {
    return this.readValue('calendarMode', (data) => decodeFlag('calendarMode', data));
  }

  writeCalendarMode(enabled: boolean): Promise<void> {
    return this.writeValue('calendarMode', () => encodeFlag(enabled));
  }

  readForceControl(): Promise<ForceControl> {
    return this.readValue('forceControl', decodeForceControl);
  }

  /**
   * Read-modify-write of the extended record; bytes outside mode, temperature
   * and offset are written back as read. Legacy firmware is rejected.
   */
  async writeForceControl(setting: ForceControlSetting): Promise<void> {
    const apply = (current: ExtendedForceControl): Buffer => encodeForceControl({
      ...current,
      mode: enumValue(EXTERNAL_CONTROL_MODES, setting.mode),
      temperature: setting.temperature,
      temperatureOffset: setting.temperatureOffset,
    });
    // Validate against a blank record before touching the device
    apply({
      format: 'extended',
      mode: enumValue(EXTERNAL_CONTROL_MODES, setting.mode),
      enabled: false,
      temperature: 0,
      temperatureOffset: 0,
      raw: Buffer.alloc(EXTENDED_FORCE_CONTROL_LENGTH),
    });

    return this.execute('writeForceControl', async (link) => {
      const current = decodeForceControl(await link.read(characteristicUuid('forceControl')));
      if (current.format === 'legacy') {
        throw new DecodeError('forceControl', 'device exposes the legacy 1-byte record, external control is not supported', 1);
      }
      await link.write(characteristicUuid('forceControl'), apply(current), true);
    });
  }

  supportsExternalControl(): boolean {
    return supportsExternalControl(this.session.identity?.softwareRevision ?? null);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Clock
  // ─────────────────────────────────────────────────────────────────────────────

  readDateTime(): Promise<Date> {
    return this.readValue('dateAndTime', decodeDateAndTime);
  }

  /** `date` carries the device wall-clock time in its UTC fields */
  writeDateTime(date: Date): Promise<void> {
    return this.writeValue('dateAndTime', () => encodeDateAndTime(date));
  }

  readDaylightSaving(): Promise<DaylightSaving> {
    return this.readValue('daylightSaving', decodeDaylightSaving);
  }

  writeDaylightSaving(config: DaylightSaving): Promise<void> {
    return this.writeValue('daylightSaving', () => encodeDaylightSaving(config));
  }

  /**
   * Set the device clock to UTC and its zone offset, keeping whatever daylight
   * saving state the device already has.
   */
  async syncClock(now: Date = new Date(), utcOffsetMinutes: number = -now.getTimezoneOffset()): Promise<void> {
    const time = encodeDateAndTime(now);
    // Validates the offset up front; the enabled flag is filled in from the device
    encodeDaylightSaving({
      enabled: false,
      winterToSummerMinutes: DST_SHIFT_MINUTES,
      summerToWinterMinutes: DST_SHIFT_MINUTES,
      utcOffsetMinutes,
    });

    return this.execute('syncClock', async (link) => {
      const current = decodeDaylightSaving(await link.read(characteristicUuid('daylightSaving')));
      await link.write(characteristicUuid('dateAndTime'), time, true);
      await link.write(characteristicUuid('daylightSaving'), encodeDaylightSaving({
        enabled: current.enabled,
        winterToSummerMinutes: DST_SHIFT_MINUTES,
        summerToWinterMinutes: DST_SHIFT_MINUTES,
        utcOffsetMinutes,
      }), true);
      thermostatLogger.info(`[Device] Clock synchronised for ${this.address}`, {
        utc: now.toISOString(),
        utcOffsetMinutes,
        dst: current.enabled,
      });
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Installation settings
  // ─────────────────────────────────────────────────────────────────────────────

  readFloorLimits(): Promise<FloorLimits> {
    return this.readValue('floorLimits', decodeFloorLimits);
  }

  writeFloorLimits(limits: FloorLimits): Promise<void> {
    return this.writeValue('floorLimits', () => encodeFloorLimits(limits));
  }

  readRoomCalibration(): Promise<number> {
    return this.readValue('roomCalibration', decodeRoomCalibration);
  }

  writeRoomCalibration(offset: number): Promise<void> {
    return this.writeValue('roomCalibration', () => encodeRoomCalibration(offset));
  }

  readHeatingPower(): Promise<number> {
    return this.readValue('heatingPower', (data) => decodeU16('heatingPower', data));
  }

  writeHeatingPower(watts: number): Promise<void> {
    return this.writeValue('heatingPower', () => encodeU16('heatingPower', watts, HEATING_POWER_MAX));
  }

  readFloorArea(): Promise<number> {
    return this.readValue('floorArea', (data) => decodeU16('floorArea', data));
  }

  writeFloorArea(squareMeters: number): Promise<void> {
    return this.writeValue('floorArea', () => encodeU16('floorArea', squareMeters));
  }

  readEnergyUnit(): Promise<EnergyUnit> {
    return this.readValue('energyUnit', decodeEnergyUnit);
  }

  writeEnergyUnit(unit: Pick<EnergyUnit, 'currency' | 'price'>): Promise<void> {
    return this.writeValue('energyUnit', () => encodeEnergyUnit(unit));
  }

  readPowerControlCycle(): Promise<number> {
    return this.readValue('powerControlCycle', decodePowerControlCycle);
  }

  writePowerControlCycle(minutes: number): Promise<void> {
    return this.writeValue('powerControlCycle', () => encodePowerControlCycle(minutes));
  }

  readChildLock(): Promise<ChildLock> {
    return this.readValue('childLock', decodeChildLock);
  }

  writeChildLock(lock: ChildLock): Promise<void> {
    return this.writeValue('childLock', () => encodeChildLock(lock));
  }

  readLedBrightness(): Promise<LedBrightness> {
    return this.readValue('ledBrightness', decodeLedBrightness);
  }

  writeLedBrightness(leds: LedBrightness): Promise<void> {
    return this.writeValue('ledBrightness', () => encodeLedBrightness(leds));
  }

  readFloorSensor(): Promise<FloorSensorConfig> {
    return this.readValue('floorSensorType', decodeFloorSensor);
  }

  writeFloorSensor(sensor: FloorSensorConfig): Promise<void> {
    return this.writeValue('floorSensorType', () => encodeFloorSensor(sensor));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Calendar and vacation
  // ─────────────────────────────────────────────────────────────────────────────

  async readCalendarDay(day: number): Promise<CalendarDay> {
    checkCalendarDay(day);
    const control = encodeCalendarControl(day);

    return this.execute('readCalendarDay', async (link) => {
      await link.write(characteristicUuid('calendarControl'), control, true);
      await this.sleep(this.config.timing.calendarPrepareDelayMs);
      return this.readRecord(link, 'calendarDay', decodeCalendarDay);
    });
  }

  /** Writes the day, then commits it to flash; without the commit it is lost on power cycle */
  async writeCalendarDay(day: number, programs: CalendarProgram[]): Promise<void> {
    checkCalendarDay(day);
    const control = encodeCalendarControl(day);
    const record = encodeCalendarDay({ day, programs });
    const commit = encodeCalendarControl(CALENDAR_CONTROL.COMMIT);

    return this.execute('writeCalendarDay', async (link) => {
      await link.write(characteristicUuid('calendarControl'), control, true);
      await this.split.write(link, characteristicUuid('calendarDay'), record);
      await this.sleep(this.config.timing.calendarPrepareDelayMs);
      await link.write(characteristicUuid('calendarControl'), commit, true);
      thermostatLogger.info(`[Device] Calendar day ${day} written for ${this.address}`, {
        programs: programs.filter((program) => program.enabled).length,
      });
    });
  }

  readVacation(): Promise<VacationWindow> {
    return this.readValue('vacationTime', decodeVacation);
  }

  async writeVacation(vacation: VacationSetting): Promise<void> {
    // Compared at the device's one-minute resolution
    const from = Math.floor(vacation.from.getTime() / MS_PER_MINUTE);
    const to = Math.floor(vacation.to.getTime() / MS_PER_MINUTE);
    if (from >= to) {
      throw new OutOfRangeError('from', from, Number.MIN_SAFE_INTEGER, to - 1);
    }
    encodeVacation({ ...vacation, active: false });

    return this.execute('writeVacation', async (link) => {
      // A never-set record does not decode, so only its active byte is taken
      const active = readVacationActive(await link.read(characteristicUuid('vacationTime')));
      await link.write(characteristicUuid('vacationTime'), encodeVacation({ ...vacation, active }), true);
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // History
  // ─────────────────────────────────────────────────────────────────────────────

  readPowerConsumption(): Promise<PowerConsumption> {
    return this.readValue('realTimePowerConsumption', decodePowerConsumption);
  }

  readMonitoringData(): Promise<MonitoringData> {
    return this.readValue('monitoringData', decodeMonitoringData);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Identity
  // ─────────────────────────────────────────────────────────────────────────────

  async readDeviceName(): Promise<string> {
    const deviceName = await this.readValue('deviceName', decodeDeviceName);
    return deviceName.name;
  }

  /** Keeps the device-owned prefix byte as read */
  async writeDeviceName(name: string): Promise<void> {
    encodeDeviceName({ prefix: 0, name });

    return this.execute('writeDeviceName', async (link) => {
      const current: DeviceName = decodeDeviceName(await link.read(characteristicUuid('deviceName')));
      await link.write(characteristicUuid('deviceName'), encodeDeviceName({ prefix: current.prefix, name }), true);
    });
  }

  readDeviceInfo(): Promise<DeviceInfo> {
    return this.execute('readDeviceInfo', async (link) => ({
      modelNumber: await this.readOptional(link, 'modelNumber', decodeText),
      softwareRevision: await this.readOptional(link, 'softwareRevision', decodeText),
      hardwareRevision: await this.readOptional(link, 'hardwareRevision', decodeHardwareRevision),
      manufacturerName: await this.readOptional(link, 'manufacturerName', decodeText),
      manufacturingDate: await this.readOptional<ManufacturingDate>(link, 'manufacturingDate', decodeManufacturingDate),
    }));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Plumbing
  // ─────────────────────────────────────────────────────────────────────────────

  private async execute<T>(label: string, operation: (link: SessionLink) => Promise<T>): Promise<T> {
    return this.session.runExclusive(label, async () => {
      const ready = await this.session.ensureReady();
      if (!ready.ok) {
        throw new NotReadyError(`${label} on ${this.address}: ${ready.error.message}`, ready.error);
      }
      return operation(ready.link);
    });
  }

  private readValue<T>(id: CharacteristicId, decode: (data: Buffer) => T): Promise<T> {
    return this.execute(`read ${id}`, (link) => this.readRecord(link, id, decode));
  }

  /** Encodes (and so validates) before the session is touched */
  private async writeValue(id: CharacteristicId, encode: () => Buffer): Promise<void> {
    const data = encode();
    await this.execute(`write ${id}`, async (link) => {
      if (CHARACTERISTICS[id].transfer === 'split') {
        await this.split.write(link, characteristicUuid(id), data);
      } else {
        await link.write(characteristicUuid(id), data, true);
      }
    });
  }

  private async readRecord<T>(link: SessionLink, id: CharacteristicId, decode: (data: Buffer) => T): Promise<T> {
    const uuid = characteristicUuid(id);
    if (CHARACTERISTICS[id].transfer === 'split') {
      return decode(restorePadding(id, await this.split.read(link, uuid)));
    }
    return decode(await link.read(uuid));
  }

  /** Identity strings some firmware leaves out; a missing or undecodable value reads as null */
  private async readOptional<T>(link: SessionLink, id: CharacteristicId, decode: (data: Buffer) => T): Promise<T | null> {
    try {
      return decode(await link.read(characteristicUuid(id)));
    } catch (error) {
      if (error instanceof DecodeError || error instanceof CharacteristicMissingError) {
        thermostatLogger.warn(`[Device] Could not decode ${id} from ${this.address}`, { error: error.message });
        return null;
      }
      throw error;
    }
  }
}

