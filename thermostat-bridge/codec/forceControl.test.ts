import { DecodeError, OutOfRangeError } from '../ThermostatErrors';
import type { ForceControl } from '../ThermostatTypes';
import { decodeForceControl, encodeForceControl, EXTENDED_FORCE_CONTROL_LENGTH } from './forceControl';

function extendedRecord(mode: number): Buffer {
  const data = Buffer.alloc(EXTENDED_FORCE_CONTROL_LENGTH);
  data[0] = 0xaa;
  data.writeUInt16LE(215, 8);
  data.writeInt16LE(-20, 12);
  data[17] = mode;
  data[18] = 0x55;
  return data;
}

function extended(control: ForceControl) {
  if (control.format !== 'extended') {
    throw new Error(`expected the extended record, got ${control.format}`);
  }
  return control;
}

describe('force control', () => {
  test('should decode the one-byte record of older firmware', () => {
    expect(decodeForceControl(Buffer.from([40]))).toEqual({ format: 'legacy', potentiometerPercent: 40 });
  });

  test('should decode the extended record', () => {
    const control = extended(decodeForceControl(extendedRecord(5)));

    expect(control.mode).toEqual({ code: 5, name: 'Temperature' });
    expect(control.enabled).toBe(true);
    expect(control.temperature).toBe(21.5);
    expect(control.temperatureOffset).toBe(-2);
  });

  test('should report mode 2 as disabled', () => {
    expect(extended(decodeForceControl(extendedRecord(2))).enabled).toBe(false);
  });

  test('should reject records between the two formats', () => {
    expect(() => decodeForceControl(Buffer.alloc(18))).toThrow(DecodeError);
  });

  test('should change only mode and targets on encode', () => {
    const current = extended(decodeForceControl(extendedRecord(2)));

    const data = encodeForceControl({
      ...current,
      mode: { code: 6, name: 'Temperature change' },
      temperature: 22,
      temperatureOffset: 1.5,
    });

    expect(data[0]).toBe(0xaa);
    expect(data[18]).toBe(0x55);
    expect(data.readUInt16LE(8)).toBe(220);
    expect(data.readInt16LE(12)).toBe(15);
    expect(data[17]).toBe(6);
  });

  test('should reject modes other than 2, 5 and 6', () => {
    const current = extended(decodeForceControl(extendedRecord(2)));

    expect(() => encodeForceControl({ ...current, mode: { code: 3, name: 'Unknown' } })).toThrow(OutOfRangeError);
  });

  test('should bound the absolute target to 5-35 °C', () => {
    const current = extended(decodeForceControl(extendedRecord(5)));

    expect(() => encodeForceControl({ ...current, temperature: 35.5 })).toThrow(OutOfRangeError);
  });
});
