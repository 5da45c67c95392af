/**
 * Pairing Discovery
 *
 * Thermostats advertise an ASCII status string in their manufacturer data,
 * fields separated by ';'. The second field is the pairing flag: "1" while the
 * user holds the device in pairing mode.
 */

import { MANUFACTURER_ID } from './ThermostatConstants';
import { thermostatLogger } from './ThermostatLogger';
import type { IDiscovery, ThermostatAdvertisement } from './interfaces/ITransport';
import { getPlatformConfig } from './PlatformConfig';

const PAIRING_FLAG_FIELD = 1;

export function isPairingAdvertisement(manufacturerData: Buffer): boolean {
  if (manufacturerData.some((byte) => byte > 0x7f)) {
    thermostatLogger.warn('[PairingDiscovery] Manufacturer data is not ASCII', {
      hex: manufacturerData.toString('hex'),
    }, 'DISCOVERY');
    return false;
  }

  const fields = manufacturerData.toString('ascii').split(';');
  return fields.length > PAIRING_FLAG_FIELD && fields[PAIRING_FLAG_FIELD] === '1';
}

/**
 * Scan for thermostats and keep those currently in pairing mode.
 */
export async function findPairingDevices(
  discovery: IDiscovery,
  timeoutMs: number = getPlatformConfig().timing.scanTimeoutMs,
): Promise<ThermostatAdvertisement[]> {
  const advertisements = await discovery.scan(MANUFACTURER_ID, timeoutMs);
  const pairing = advertisements.filter((advertisement) => {
    const inPairingMode = isPairingAdvertisement(advertisement.manufacturerData);
    thermostatLogger.debug(
      `[PairingDiscovery] ${advertisement.name ?? 'Unnamed'} (${advertisement.address}) is ${inPairingMode ? '' : 'NOT '}in pairing mode`,
      undefined,
      'DISCOVERY',
    );
    return inPairingMode;
  });

  thermostatLogger.info(`[PairingDiscovery] ${pairing.length} of ${advertisements.length} thermostat(s) in pairing mode`, undefined, 'DISCOVERY');
  return pairing;
}
