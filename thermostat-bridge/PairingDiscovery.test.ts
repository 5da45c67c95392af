import { MockThermostatTransport } from './MockThermostatTransport';
import { findPairingDevices, isPairingAdvertisement } from './PairingDiscovery';
import { MANUFACTURER_ID } from './ThermostatConstants';
import type { IDiscovery, ThermostatAdvertisement } from './interfaces/ITransport';

function advertisement(address: string, payload: string): ThermostatAdvertisement {
  return { address, name: `Thermostat ${address.slice(-2)}`, rssi: -70, manufacturerData: Buffer.from(payload, 'ascii') };
}

describe('isPairingAdvertisement', () => {
  test('should read the pairing flag from the second field', () => {
    expect(isPairingAdvertisement(Buffer.from('ECO16;1;0', 'ascii'))).toBe(true);
    expect(isPairingAdvertisement(Buffer.from('ECO16;0;0', 'ascii'))).toBe(false);
  });

  test('should treat a payload without a second field as not pairing', () => {
    expect(isPairingAdvertisement(Buffer.from('ECO16', 'ascii'))).toBe(false);
    expect(isPairingAdvertisement(Buffer.alloc(0))).toBe(false);
  });

  test('should reject non-ASCII payloads', () => {
    expect(isPairingAdvertisement(Buffer.from([0x45, 0x3b, 0x31, 0xff]))).toBe(false);
  });
});

describe('findPairingDevices', () => {
  test('should keep only devices in pairing mode', async () => {
    const scan = jest.fn(async (_manufacturerId: number, _timeoutMs: number) => [
      advertisement('AA:BB:CC:DD:EE:01', 'ECO16;1;0'),
      advertisement('AA:BB:CC:DD:EE:02', 'ECO16;0;0'),
      advertisement('AA:BB:CC:DD:EE:03', 'ELTE6;1;2'),
    ]);
    const discovery: IDiscovery = { scan, findDevice: async () => null };

    const found = await findPairingDevices(discovery, 500);

    expect(found.map((item) => item.address)).toEqual(['AA:BB:CC:DD:EE:01', 'AA:BB:CC:DD:EE:03']);
    expect(scan).toHaveBeenCalledWith(MANUFACTURER_ID, 500);
  });

  test('should find the mock thermostat while it is in pairing mode', async () => {
    const mock = new MockThermostatTransport({ pairingMode: true });

    await expect(findPairingDevices(mock, 10)).resolves.toHaveLength(1);

    mock.pairingMode = false;
    await expect(findPairingDevices(mock, 10)).resolves.toHaveLength(0);
  });
});
