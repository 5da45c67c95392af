import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ThermostatLogger } from './ThermostatLogger';

describe('ThermostatLogger', () => {
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should drop lines below the configured level', () => {
    const logger = new ThermostatLogger({ level: 'warn', logDir: null });

    logger.debug('noise');
    logger.info('noise');
    logger.warn('link unstable', undefined, 'SESSION');
    logger.error('link lost', undefined, 'SESSION');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });

  test('should format level, category and data', () => {
    const logger = new ThermostatLogger({ level: 'debug', logDir: null });

    logger.info('Connected', { rssi: -60 }, 'CONNECTION');

    expect(log).toHaveBeenCalledWith(
      expect.stringMatching(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] \[CONNECTION\] Connected \| \{"rssi":-60\}$/),
    );
  });

  test('should survive data that cannot be serialised', () => {
    const logger = new ThermostatLogger({ level: 'debug', logDir: null });
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    expect(logger.formatMessage('debug', 'CODEC', 'decoded', circular)).toMatch(/ \| \[Unserializable data\]$/);
  });

  test('should log frames as hex only at debug level', () => {
    const logger = new ThermostatLogger({ level: 'info', logDir: null });

    logger.logFrame('write', 'uuid', Buffer.from([0x80, 0x01]));
    expect(log).not.toHaveBeenCalled();

    logger.configure({ level: 'debug' });
    logger.logFrame('write', 'uuid', Buffer.from([0x80, 0x01]));
    expect(log).toHaveBeenCalledWith(expect.stringContaining('[TRANSFER] -> uuid | {"hex":"8001"}'));
  });

  test('should stay quiet when silent', () => {
    const logger = new ThermostatLogger({ level: 'silent', logDir: null });

    logger.error('hidden');

    expect(error).not.toHaveBeenCalled();
  });

  test('should open a log file in the configured directory', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'thermostat-logs-'));
    const logger = new ThermostatLogger({ level: 'info', logDir: dir });

    expect(path.dirname(logger.getLogPath())).toBe(dir);
    expect(path.basename(logger.getLogPath())).toMatch(/^thermostat-.+\.log$/);

    logger.close();
    expect(logger.getLogPath()).toBe('');
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
