import { getPlatformConfig } from './PlatformConfig';
import { createTransport } from './TransportFactory';
import { NobleTransport } from './transports/NobleTransport';
import { NodeBleTransport } from './transports/NodeBleTransport';

describe('createTransport', () => {
  test('should create the noble transport without loading the stack', async () => {
    const transport = await createTransport(getPlatformConfig({ transportType: 'noble', logLevel: 'silent' }));

    expect(transport).toBeInstanceOf(NobleTransport);
    expect(transport.name).toBe('noble');
  });

  test('should create the node-ble transport without loading the stack', async () => {
    const transport = await createTransport(getPlatformConfig({ transportType: 'node-ble', logLevel: 'silent' }));

    expect(transport).toBeInstanceOf(NodeBleTransport);
    expect(transport.name).toBe('node-ble');
  });
});
