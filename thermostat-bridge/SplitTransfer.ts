/**
 * Split Transfer
 *
 * Long values travel over one characteristic as a series of frames:
 *   BYTE[0]   header - bit 0x40 marks the final frame, low bits a sequence counter
 *   BYTE[1..] payload
 *
 * Reads repeat until the final frame (or an empty frame) and strip the zero
 * padding the device adds to the last frame. Writes always use exactly two
 * frames, first half rounded up, with a settle delay after each frame.
 */

import { SPLIT_HEADER, TIMING } from './ThermostatConstants';
import { thermostatLogger } from './ThermostatLogger';
import { sleep as defaultSleep } from './utils/timing';

/** Read/write access to one link, as provided by an exclusive session operation */
export interface CharacteristicIO {
  read(uuid: string): Promise<Buffer>;
  write(uuid: string, data: Buffer, requireAck: boolean): Promise<void>;
}

export interface SplitTransferOptions {
  writeDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export function stripTrailingZeros(data: Buffer): Buffer {
  let end = data.length;
  while (end > 0 && data[end - 1] === 0) {
    end--;
  }
  return data.subarray(0, end);
}

/** Split a payload into the two frames the device expects */
export function buildSplitFrames(payload: Buffer): [Buffer, Buffer] {
  const firstLength = Math.ceil(payload.length / 2);
  return [
    Buffer.concat([Buffer.from([SPLIT_HEADER.FIRST_WRITE]), payload.subarray(0, firstLength)]),
    Buffer.concat([Buffer.from([SPLIT_HEADER.FINAL]), payload.subarray(firstLength)]),
  ];
}

export function isFinalFrame(frame: Buffer): boolean {
  return frame.length > 0 && (frame[0] & SPLIT_HEADER.FINAL) !== 0;
}

export class SplitTransfer {
  private readonly writeDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: SplitTransferOptions = {}) {
    this.writeDelayMs = options.writeDelayMs ?? TIMING.SPLIT_WRITE_DELAY;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async read(io: CharacteristicIO, uuid: string): Promise<Buffer> {
    const chunks: Buffer[] = [];
    let frames = 0;

    for (;;) {
      const frame = await io.read(uuid);
      if (frame.length === 0) {
        thermostatLogger.debug('Empty frame, treating as end of stream', { uuid, frames }, 'TRANSFER');
        break;
      }
      frames++;
      thermostatLogger.logFrame('read', uuid, frame);
      chunks.push(frame.subarray(1));
      if (isFinalFrame(frame)) {
        break;
      }
    }

    const assembled = stripTrailingZeros(Buffer.concat(chunks));
    thermostatLogger.debug(`Split read complete: ${frames} frame(s), ${assembled.length} byte(s)`, { uuid }, 'TRANSFER');
    return assembled;
  }

  async write(io: CharacteristicIO, uuid: string, payload: Buffer): Promise<void> {
    const frames = buildSplitFrames(payload);
    for (const frame of frames) {
      thermostatLogger.logFrame('write', uuid, frame);
      await io.write(uuid, frame, true);
      // Skipping this delay corrupts the write on real devices
      await this.sleep(this.writeDelayMs);
    }
    thermostatLogger.debug(`Split write complete: ${payload.length} byte(s)`, { uuid }, 'TRANSFER');
  }
}
