/**
 * Thermostat Bridge Constants - GATT wire contract for the heating thermostat
 */

// Bluetooth company identifier in the manufacturer-specific advertisement data
export const MANUFACTURER_ID = 0x2806;

export type TransferMode = 'plain' | 'split';
export type CharacteristicAccess = 'read' | 'write' | 'readWrite';

export interface CharacteristicSpec {
  uuid: string;
  transfer: TransferMode;
  access: CharacteristicAccess;
  // Full record size; split reads strip trailing zeros so the codec pads back up to this
  recordLength: number | null;
}

const GATT_BASE = '-0000-1000-8000-00805f9b34fb';

export const CHARACTERISTICS = {
  manufacturerName: { uuid: `00002a29${GATT_BASE}`, transfer: 'plain', access: 'read', recordLength: null },
  deviceName: { uuid: `00002a00${GATT_BASE}`, transfer: 'plain', access: 'readWrite', recordLength: 60 },
  modelNumber: { uuid: `00002a24${GATT_BASE}`, transfer: 'plain', access: 'read', recordLength: null },
  softwareRevision: { uuid: `00002a28${GATT_BASE}`, transfer: 'plain', access: 'read', recordLength: null },
  manufacturingDate: { uuid: `00002a85${GATT_BASE}`, transfer: 'plain', access: 'read', recordLength: 4 },
  hardwareRevision: { uuid: `00002a27${GATT_BASE}`, transfer: 'plain', access: 'read', recordLength: 4 },

  dateAndTime: { uuid: 'b43f918a-b084-45c8-9b60-df648c4a4a1e', transfer: 'plain', access: 'readWrite', recordLength: 7 },
  daylightSaving: { uuid: 'e4f66642-ed89-4c73-be57-2158c225bbde', transfer: 'plain', access: 'readWrite', recordLength: 8 },
  heatingMode: { uuid: '4eb1d6a2-19e0-4809-ba55-4a94e7d9b763', transfer: 'plain', access: 'readWrite', recordLength: 1 },
  boost: { uuid: 'ca3c0685-b708-4cd4-a049-5badd10469e7', transfer: 'plain', access: 'readWrite', recordLength: 8 },
  powerControlCycle: { uuid: '2cdb1af8-3f3d-4504-b56e-69a2532bc0b8', transfer: 'plain', access: 'readWrite', recordLength: 1 },
  floorLimits: { uuid: '89b4c78f-6d5e-4cfa-8e81-4eca9738bbfd', transfer: 'plain', access: 'readWrite', recordLength: 4 },
  childLock: { uuid: '6e3064e2-d9a5-4ca0-9d14-017c59627330', transfer: 'plain', access: 'readWrite', recordLength: 3 },
  adaptiveTemperatureControl: { uuid: 'c2dc85e9-47bf-4968-9562-d2e1980ed4e4', transfer: 'plain', access: 'readWrite', recordLength: 1 },
  floorSensorType: { uuid: 'f561ce1f-61fb-4fa2-8bef-5fecc949b55b', transfer: 'plain', access: 'readWrite', recordLength: 13 },
  heatingPower: { uuid: '53b7bf87-6cf0-4790-839a-e72d3afbec44', transfer: 'plain', access: 'readWrite', recordLength: 2 },
  floorArea: { uuid: '5c897ab6-354c-443d-9f36-f3f7263868dd', transfer: 'plain', access: 'readWrite', recordLength: 2 },
  roomCalibration: { uuid: '1eca4351-b264-4db6-9c59-af4341d6ce69', transfer: 'plain', access: 'readWrite', recordLength: 2 },
  ledBrightness: { uuid: '0bee30ff-ed95-4747-bf1b-01a60f5ff4fc', transfer: 'plain', access: 'readWrite', recordLength: 3 },
  energyUnit: { uuid: 'ccf1fe7b-d928-45b1-abba-7a915f2f0c64', transfer: 'plain', access: 'readWrite', recordLength: 4 },
  alarmCode: { uuid: '644b0534-cdc5-4538-8ba5-1408df8849d4', transfer: 'plain', access: 'read', recordLength: 4 },
  calendarControl: { uuid: '8219bc38-a505-4452-8b6c-165e75cff5db', transfer: 'plain', access: 'write', recordLength: 1 },
  calendarDay: { uuid: '20db94b9-bd18-4f84-bf16-de1163adfd8c', transfer: 'split', access: 'readWrite', recordLength: 49 },
  vacationTime: { uuid: '6584e9c6-4784-41aa-ac09-c899191048ae', transfer: 'plain', access: 'readWrite', recordLength: 15 },
  calendarMode: { uuid: '636d45fd-d7be-491f-966c-380f8631b2c6', transfer: 'plain', access: 'readWrite', recordLength: 1 },
  factoryResetId: { uuid: 'f366dddb-ebe2-43ee-83c0-472ded74c8fa', transfer: 'plain', access: 'readWrite', recordLength: 4 },
  monitoringData: { uuid: 'ecc794d2-c790-4abd-88a5-79abf9417908', transfer: 'split', access: 'read', recordLength: 891 },
  realTimeIndication: { uuid: '66ad3e6b-3135-4ada-bb2b-8b22916b21d4', transfer: 'split', access: 'read', recordLength: 20 },
  realTimePowerConsumption: { uuid: 'c1686f28-fa1b-4791-9eca-35523fb3597e', transfer: 'split', access: 'read', recordLength: 54 },
  forceControl: { uuid: '7bd74f74-ffae-452e-bb61-b59b2faf96c9', transfer: 'plain', access: 'readWrite', recordLength: null },
} as const satisfies Record<string, CharacteristicSpec>;

export type CharacteristicId = keyof typeof CHARACTERISTICS;

export function characteristicUuid(id: CharacteristicId): string {
  return CHARACTERISTICS[id].uuid;
}

// Split transfer header bits (first byte of every frame)
export const SPLIT_HEADER = {
  FINAL: 0x40,       // Last frame of a logical transfer
  FIRST_WRITE: 0x80, // Header the device expects on the first of the two write frames
  SEQUENCE_MASK: 0x3f,
} as const;

// Calendar control values written before/after calendar day transfers
export const CALENDAR_CONTROL = {
  COMMIT: 0x00,       // Persist the calendar to flash
  CALENDAR_NAME: 0x08,
} as const;

export const TIMING = {
  SPLIT_WRITE_DELAY: 100,        // Device needs ~100ms between split frames
  CALENDAR_PREPARE_DELAY: 200,   // Device prepares the requested day after a control write
  REAL_TIME_MAX_AGE: 25000,      // Freshness window for the live status
  SCAN_TIMEOUT: 10000,
  NOBLE_CONNECT_TIMEOUT: 30000,
  NODE_BLE_CONNECT_TIMEOUT: 60000,
} as const;

export const DEFAULT_MTU = 23;

// ─────────────────────────────────────────────────────────────────────────────
// Enumerations carried on the wire
// ─────────────────────────────────────────────────────────────────────────────

export const ACTIVE_MODES: Record<number, string> = {
  1: 'Manual',
  2: 'Calendar',
  3: 'Vacation',
};

export const HEATING_MODES: Record<number, string> = {
  1: 'Floor',
  2: 'Room',
  3: 'Combination',
  4: 'Power',
  5: 'Force Control',
};

// Supported heating modes per device model (model number prefix)
export const SUPPORTED_HEATING_MODES: Record<string, readonly number[]> = {
  ECO16: [1, 2, 3, 4],
  ELTE6: [2, 4],
};

export const EXTERNAL_CONTROL_MODES: Record<number, string> = {
  2: 'Off',
  5: 'Temperature',
  6: 'Temperature change',
};

export const CURRENCIES: Record<number, { code: string; symbol: string }> = {
  1: { code: 'EUR', symbol: '€' },
  2: { code: 'SEK', symbol: 'kr' },
  3: { code: 'NOK', symbol: 'kr' },
  4: { code: 'RUB', symbol: '₽' },
  5: { code: 'USD', symbol: '$' },
};

// Firmware version that introduced the extended force/external control record
export const EXTERNAL_CONTROL_MIN_FIRMWARE: readonly [number, number] = [1, 14];
