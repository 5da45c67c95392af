/**
 * Platform Configuration
 * Detects the current platform and resolves the thermostat bridge configuration
 * from defaults, caller overrides and environment variables.
 */

import * as os from 'os';
import * as path from 'path';
import { TIMING } from './ThermostatConstants';

// ─────────────────────────────────────────────────────────────────────────────
// Platform Detection
// ─────────────────────────────────────────────────────────────────────────────

export type PlatformType = 'windows' | 'macos' | 'linux' | 'unknown';
export type TransportType = 'noble' | 'node-ble';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const TRANSPORT_TYPES: readonly TransportType[] = ['noble', 'node-ble'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function detectPlatform(): PlatformType {
  switch (process.platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    case 'linux':
      return 'linux';
    default:
      return 'unknown';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

export interface ThermostatTiming {
  connectTimeoutMs: number;
  scanTimeoutMs: number;
  splitWriteDelayMs: number;
  calendarPrepareDelayMs: number;
  realTimeMaxAgeMs: number;
}

export interface ThermostatConfig {
  platform: PlatformType;
  transportType: TransportType;
  logLevel: LogLevel;
  logDir: string | null;
  credentialFile: string;
  timing: ThermostatTiming;
}

export interface ThermostatConfigOverrides {
  transportType?: TransportType;
  logLevel?: LogLevel;
  logDir?: string | null;
  credentialFile?: string;
  timing?: Partial<ThermostatTiming>;
}

function defaultTransport(platform: PlatformType): TransportType {
  // BlueZ on Linux, HCI everywhere else
  return platform === 'linux' ? 'node-ble' : 'noble';
}

function defaultTiming(transportType: TransportType): ThermostatTiming {
  return {
    connectTimeoutMs: transportType === 'noble' ? TIMING.NOBLE_CONNECT_TIMEOUT : TIMING.NODE_BLE_CONNECT_TIMEOUT,
    scanTimeoutMs: TIMING.SCAN_TIMEOUT,
    splitWriteDelayMs: TIMING.SPLIT_WRITE_DELAY,
    calendarPrepareDelayMs: TIMING.CALENDAR_PREPARE_DELAY,
    realTimeMaxAgeMs: TIMING.REAL_TIME_MAX_AGE,
  };
}

function pickEnum<T extends string>(
  name: string,
  raw: string | undefined,
  allowed: readonly T[],
): T | undefined {
  if (raw === undefined || raw === '') return undefined;
  const match = allowed.find((value) => value === raw.toLowerCase());
  if (match === undefined) {
    console.warn(`[PlatformConfig] Ignoring ${name}=${raw} (expected one of ${allowed.join(', ')})`);
  }
  return match;
}

/**
 * Resolve the configuration. Precedence: overrides, then environment, then defaults.
 */
export function getPlatformConfig(
  overrides: ThermostatConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): Readonly<ThermostatConfig> {
  const platform = detectPlatform();

  const transportType =
    overrides.transportType ??
    pickEnum('THERMOSTAT_BLE_TRANSPORT', env.THERMOSTAT_BLE_TRANSPORT, TRANSPORT_TYPES) ??
    defaultTransport(platform);

  const logLevel =
    overrides.logLevel ??
    pickEnum('THERMOSTAT_LOG_LEVEL', env.THERMOSTAT_LOG_LEVEL, LOG_LEVELS) ??
    'info';

  const logDir = overrides.logDir !== undefined ? overrides.logDir : env.THERMOSTAT_LOG_DIR || null;

  const credentialFile =
    overrides.credentialFile ??
    (env.THERMOSTAT_CREDENTIAL_FILE || path.join(os.tmpdir(), 'floorheat-ble', 'credentials.json'));

  return Object.freeze({
    platform,
    transportType,
    logLevel,
    logDir,
    credentialFile,
    timing: Object.freeze({ ...defaultTiming(transportType), ...overrides.timing }),
  });
}
