/**
 * Transport Factory - Platform-aware BLE stack selector
 *
 * Windows/Mac: @abandonware/noble (HCI socket)
 * Linux/Raspberry Pi: node-ble (BlueZ via DBus)
 */

import { getPlatformConfig, ThermostatConfig } from './PlatformConfig';
import { thermostatLogger } from './ThermostatLogger';
import type { IBleTransport } from './interfaces/ITransport';

/**
 * Create the transport named by the configuration. Each stack is loaded on
 * demand so the other one never has to be installed.
 */
export async function createTransport(config: Readonly<ThermostatConfig> = getPlatformConfig()): Promise<IBleTransport> {
  thermostatLogger.info(`[TransportFactory] Platform ${config.platform}, using ${config.transportType}`, undefined, 'TRANSPORT');

  switch (config.transportType) {
    case 'node-ble': {
      const { NodeBleTransport } = await import('./transports/NodeBleTransport');
      return new NodeBleTransport();
    }
    case 'noble': {
      const { NobleTransport } = await import('./transports/NobleTransport');
      return new NobleTransport();
    }
  }
}
