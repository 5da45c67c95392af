import { detectPlatform, getPlatformConfig } from './PlatformConfig';

describe('getPlatformConfig', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
  });

  test('should pick the transport and timeouts from the environment', () => {
    const config = getPlatformConfig({}, { THERMOSTAT_BLE_TRANSPORT: 'noble', THERMOSTAT_LOG_LEVEL: 'DEBUG' });

    expect(config.transportType).toBe('noble');
    expect(config.logLevel).toBe('debug');
    expect(config.timing.connectTimeoutMs).toBe(30000);
    expect(config.timing.splitWriteDelayMs).toBe(100);
    expect(config.timing.calendarPrepareDelayMs).toBe(200);
    expect(config.timing.realTimeMaxAgeMs).toBe(25000);
  });

  test('should give BlueZ the longer connect timeout', () => {
    expect(getPlatformConfig({ transportType: 'node-ble' }, {}).timing.connectTimeoutMs).toBe(60000);
  });

  test('should let overrides win over the environment', () => {
    const config = getPlatformConfig(
      { transportType: 'node-ble', credentialFile: '/var/lib/test/credentials.json', timing: { scanTimeoutMs: 2000 } },
      { THERMOSTAT_BLE_TRANSPORT: 'noble', THERMOSTAT_CREDENTIAL_FILE: '/tmp/other.json' },
    );

    expect(config.transportType).toBe('node-ble');
    expect(config.credentialFile).toBe('/var/lib/test/credentials.json');
    expect(config.timing.scanTimeoutMs).toBe(2000);
    expect(config.timing.splitWriteDelayMs).toBe(100);
  });

  test('should ignore unknown values with a warning', () => {
    const config = getPlatformConfig({}, { THERMOSTAT_LOG_LEVEL: 'verbose' });

    expect(config.logLevel).toBe('info');
    expect(warn).toHaveBeenCalledTimes(1);
  });

  test('should default the transport by platform', () => {
    const expected = detectPlatform() === 'linux' ? 'node-ble' : 'noble';
    expect(getPlatformConfig({}, {}).transportType).toBe(expected);
  });

  test('should return a frozen configuration', () => {
    const config = getPlatformConfig({}, {});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.timing)).toBe(true);
    expect(config.logDir).toBeNull();
  });
});
