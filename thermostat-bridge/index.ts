/**
 * Thermostat Bridge - BLE session and protocol core for floor heating thermostats
 *
 * Windows/Mac: Uses @abandonware/noble (HCI socket)
 * Linux/Raspberry Pi: Uses node-ble (BlueZ via DBus)
 *
 * Public API exports
 */

// ─────────────────────────────────────────────────────────────────────────────
// Device command surface (main export)
// ─────────────────────────────────────────────────────────────────────────────

export { ThermostatDevice } from './ThermostatDevice';
export type {
  BoostSetting,
  DeviceEvents,
  ForceControlSetting,
  ThermostatDeviceOptions,
  VacationSetting,
} from './ThermostatDevice';

// ─────────────────────────────────────────────────────────────────────────────
// Session, transfer and cache
// ─────────────────────────────────────────────────────────────────────────────

export { ThermostatSession } from './ThermostatSession';
export type {
  DisconnectReason,
  ReadyResult,
  SessionEvents,
  SessionLink,
  SessionPhase,
  ThermostatSessionOptions,
} from './ThermostatSession';

export { SplitTransfer, buildSplitFrames, isFinalFrame, stripTrailingZeros } from './SplitTransfer';
export type { CharacteristicIO, SplitTransferOptions } from './SplitTransfer';

export { RealTimeCoordinator } from './RealTimeCoordinator';
export type { CachedReading, CoordinatorEvents, RealTimeCoordinatorOptions } from './RealTimeCoordinator';

export { OperationQueue } from './OperationQueue';
export { TypedEventEmitter } from './TypedEventEmitter';

// ─────────────────────────────────────────────────────────────────────────────
// Codec, types and constants
// ─────────────────────────────────────────────────────────────────────────────

export * from './codec';
export * from './ThermostatTypes';
export * from './ThermostatConstants';
export * from './ThermostatErrors';

// ─────────────────────────────────────────────────────────────────────────────
// Interfaces
// ─────────────────────────────────────────────────────────────────────────────

export type {
  GattHandle,
  IBleTransport,
  ICredentialStore,
  IDiscovery,
  IGattTransport,
  ThermostatAdvertisement,
} from './interfaces/ITransport';

// ─────────────────────────────────────────────────────────────────────────────
// Transports, discovery and credentials
// ─────────────────────────────────────────────────────────────────────────────

export { createTransport } from './TransportFactory';
export { NobleTransport } from './transports/NobleTransport';
export { NodeBleTransport } from './transports/NodeBleTransport';
export { MockThermostatTransport } from './MockThermostatTransport';
export type { MockOperation, MockThermostatOptions } from './MockThermostatTransport';

export { findPairingDevices, isPairingAdvertisement } from './PairingDiscovery';
export { FileCredentialStore, MemoryCredentialStore } from './CredentialStore';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration and logging
// ─────────────────────────────────────────────────────────────────────────────

export { detectPlatform, getPlatformConfig } from './PlatformConfig';
export type {
  LogLevel,
  PlatformType,
  ThermostatConfig,
  ThermostatConfigOverrides,
  ThermostatTiming,
  TransportType,
} from './PlatformConfig';

export { ThermostatLogger, thermostatLogger } from './ThermostatLogger';
export type { LogCategory, LoggerOptions } from './ThermostatLogger';
