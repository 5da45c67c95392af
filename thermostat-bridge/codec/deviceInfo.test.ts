import { OutOfRangeError } from '../ThermostatErrors';
import {
  decodeDeviceName,
  decodeFactoryResetId,
  decodeHardwareRevision,
  encodeDeviceName,
  encodeFactoryResetId,
  encodeHardwareRevision,
  parseAppVersion,
  supportsExternalControl,
} from './deviceInfo';

describe('device name', () => {
  test('should keep the prefix byte apart from the name', () => {
    const data = Buffer.alloc(60);
    data[0] = 3;
    data.write('Hall ', 1, 'utf8');

    expect(decodeDeviceName(data)).toEqual({ prefix: 3, name: 'Hall' });
  });

  test('should pad the name to 60 bytes', () => {
    const data = encodeDeviceName({ prefix: 1, name: 'Kitchen' });

    expect(data.length).toBe(60);
    expect(data[0]).toBe(1);
    expect(data.subarray(1, 8).toString('utf8')).toBe('Kitchen');
    expect(data[8]).toBe(0);
  });

  test('should count characters, not bytes, against the 25 character limit', () => {
    expect(() => encodeDeviceName({ prefix: 0, name: 'ä'.repeat(25) })).not.toThrow();
    expect(() => encodeDeviceName({ prefix: 0, name: 'a'.repeat(26) })).toThrow(OutOfRangeError);
  });

  test('should reject names longer than 59 bytes', () => {
    expect(() => encodeDeviceName({ prefix: 0, name: '€'.repeat(20) })).toThrow(OutOfRangeError);
  });
});

describe('factory reset id', () => {
  test('should write the id alone for authentication', () => {
    expect([...encodeFactoryResetId({ id: 123456, deviceAddress: null })]).toEqual([0x40, 0xe2, 0x01, 0x00]);
  });

  test('should decode the id and an appended address', () => {
    const data = Buffer.from([0x40, 0xe2, 0x01, 0x00, 0xaa, 0xbb, 0xcc, 0xdd, 0xee, 0x01]);

    expect(decodeFactoryResetId(data)).toEqual({ id: 123456, deviceAddress: 'AA:BB:CC:DD:EE:01' });
    expect(decodeFactoryResetId(data.subarray(0, 4))).toEqual({ id: 123456, deviceAddress: null });
  });

  test('should encode an address as six bytes', () => {
    const data = encodeFactoryResetId({ id: 1, deviceAddress: 'aa:bb:cc:dd:ee:01' });

    expect([...data]).toEqual([1, 0, 0, 0, 0xaa, 0xbb, 0xcc, 0xdd, 0xee, 0x01]);
  });

  test('should reject a malformed address', () => {
    expect(() => encodeFactoryResetId({ id: 1, deviceAddress: 'AA:BB' })).toThrow(OutOfRangeError);
  });
});

describe('revisions', () => {
  test('should read the hardware revision as a decimal string', () => {
    expect(decodeHardwareRevision(Buffer.from([5, 1, 0, 0]))).toBe('261');
    expect([...encodeHardwareRevision('261')]).toEqual([5, 1, 0, 0]);
  });

  test('should reject a non-numeric hardware revision', () => {
    expect(() => encodeHardwareRevision('1.2')).toThrow(OutOfRangeError);
  });

  test('should take the application version from the first field', () => {
    expect(parseAppVersion('1.14;2.3;1.0')).toEqual([1, 14]);
    expect(parseAppVersion('2')).toEqual([2, 0]);
    expect(parseAppVersion('beta')).toBeNull();
  });

  test('should require firmware 1.14 for external control', () => {
    expect(supportsExternalControl('1.14;2.3;1.0')).toBe(true);
    expect(supportsExternalControl('2.0')).toBe(true);
    expect(supportsExternalControl('1.13;2.3;1.0')).toBe(false);
    expect(supportsExternalControl(null)).toBe(false);
  });
});
