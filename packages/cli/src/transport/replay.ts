import { EventEmitter } from 'events';
import { createReadStream } from 'fs';
import { createInterface } from 'readline';
import type { Readable } from 'stream';
import type { LineRead, LineSource } from '@geomancer/shared';
import { LineQueue } from './line-queue.js';
import { TransportError } from './errors.js';

/**
 * Lines of a recorded NMEA stream (log file, pipe, fixture). Emits `error`
 * (TransportError) when the stream fails mid-way; pending reads then
 * resolve `end`.
 */
export class ReplayLineSource extends EventEmitter implements LineSource {
  private queue = new LineQueue();

  constructor(private input: Readable, private name = 'replay') {
    super();
    const rl = createInterface({ input, crlfDelay: Infinity });
    rl.on('line', (line) => this.queue.push(line));
    rl.on('close', () => this.queue.end());
    input.on('error', (err: Error) => {
      this.queue.end();
      this.emit('error', new TransportError(`Replay ${this.name} failed: ${err.message}`, this.name, { cause: err }));
    });
  }

  /** Opens `file`; rejects with TransportError when it cannot be read */
  static open(file: string): Promise<ReplayLineSource> {
    const stream = createReadStream(file, { encoding: 'ascii' });
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(new TransportError(`Could not read ${file}: ${err.message}`, file, { cause: err }));
      stream.once('error', onError);
      stream.once('open', () => {
        stream.off('error', onError);
        resolve(new ReplayLineSource(stream, file));
      });
    });
  }

  readLine(signal?: AbortSignal): Promise<LineRead> {
    return this.queue.next(signal);
  }

  async close(): Promise<void> {
    this.queue.end();
    this.input.destroy();
  }
}
