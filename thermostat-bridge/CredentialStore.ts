/**
 * Credential Stores
 *
 * Persist the factory reset id per device address. The file store keeps one
 * JSON document for all devices:
 *   { "<address>": { "factoryResetId": 123456 } }
 * and deletes the file once the last device is removed.
 */

import * as fs from 'fs';
import * as path from 'path';
import { OperationQueue } from './OperationQueue';
import { getPlatformConfig } from './PlatformConfig';
import { errorMessage } from './ThermostatErrors';
import { thermostatLogger } from './ThermostatLogger';
import type { ICredentialStore } from './interfaces/ITransport';

interface CredentialEntry {
  factoryResetId: number;
}

type CredentialDocument = Record<string, CredentialEntry>;

function normalizeAddress(address: string): string {
  return address.toUpperCase();
}

function isCredentialEntry(value: unknown): value is CredentialEntry {
  return typeof value === 'object'
    && value !== null
    && 'factoryResetId' in value
    && typeof value.factoryResetId === 'number'
    && Number.isInteger(value.factoryResetId);
}

// fs errors can come from another realm, so no instanceof Error here
function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class FileCredentialStore implements ICredentialStore {
  readonly filePath: string;
  // Serialises read-modify-write cycles on the file
  private readonly queue = new OperationQueue('credentials');

  constructor(filePath: string = getPlatformConfig().credentialFile) {
    this.filePath = filePath;
  }

  load(address: string): Promise<number | null> {
    return this.queue.enqueue('load', async () => {
      const entry = (await this.readDocument())[normalizeAddress(address)];
      return entry ? entry.factoryResetId : null;
    });
  }

  save(address: string, factoryResetId: number): Promise<void> {
    return this.queue.enqueue('save', async () => {
      const document = await this.readDocument();
      document[normalizeAddress(address)] = { factoryResetId };
      await this.writeDocument(document);
      thermostatLogger.debug(`[CredentialStore] Saved credential for ${address}`, undefined, 'STORE');
    });
  }

  remove(address: string): Promise<void> {
    return this.queue.enqueue('remove', async () => {
      const document = await this.readDocument();
      const key = normalizeAddress(address);
      if (!(key in document)) {
        thermostatLogger.debug(`[CredentialStore] ${address} not found in storage`, undefined, 'STORE');
        return;
      }

      delete document[key];
      if (Object.keys(document).length === 0) {
        await fs.promises.rm(this.filePath, { force: true });
        thermostatLogger.debug(`[CredentialStore] Removed ${this.filePath} as no devices remain`, undefined, 'STORE');
      } else {
        await this.writeDocument(document);
      }
    });
  }

  private async readDocument(): Promise<CredentialDocument> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return {};
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    const document: CredentialDocument = {};
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      thermostatLogger.warn(`[CredentialStore] Ignoring malformed ${this.filePath}`, undefined, 'STORE');
      return document;
    }

    for (const [address, entry] of Object.entries(parsed)) {
      if (isCredentialEntry(entry)) {
        document[normalizeAddress(address)] = { factoryResetId: entry.factoryResetId };
      } else {
        thermostatLogger.warn(`[CredentialStore] Skipping malformed entry for ${address}`, undefined, 'STORE');
      }
    }
    return document;
  }

  private async writeDocument(document: CredentialDocument): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(this.filePath, JSON.stringify(document, null, 2));
    } catch (error) {
      thermostatLogger.error(`[CredentialStore] Failed to write ${this.filePath}`, { error: errorMessage(error) }, 'STORE');
      throw error;
    }
  }
}

export class MemoryCredentialStore implements ICredentialStore {
  private readonly entries = new Map<string, number>();

  constructor(initial: Record<string, number> = {}) {
    for (const [address, factoryResetId] of Object.entries(initial)) {
      this.entries.set(normalizeAddress(address), factoryResetId);
    }
  }

  async load(address: string): Promise<number | null> {
    return this.entries.get(normalizeAddress(address)) ?? null;
  }

  async save(address: string, factoryResetId: number): Promise<void> {
    this.entries.set(normalizeAddress(address), factoryResetId);
  }

  async remove(address: string): Promise<void> {
    this.entries.delete(normalizeAddress(address));
  }

  get size(): number {
    return this.entries.size;
  }
}
