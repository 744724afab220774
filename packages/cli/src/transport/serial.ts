import { EventEmitter } from 'events';
import { SerialPort, ReadlineParser } from 'serialport';
import type { LineRead, LineSource } from '@geomancer/shared';
import { LineQueue } from './line-queue.js';
import { TransportError } from './errors.js';
import { watchPort } from './port-events.js';

export interface SerialOptions {
  path: string;
  baudRate: number;
  readTimeoutMs: number;
}

/**
 * NMEA over a serial port. Emits `error` (TransportError) when the port
 * fails or disconnects after opening; pending reads then resolve `end`.
 */
export class SerialLineSource extends EventEmitter implements LineSource {
  private queue: LineQueue;

  private constructor(private port: SerialPort, readTimeoutMs: number) {
    super();
    this.queue = new LineQueue(readTimeoutMs);
    const parser = port.pipe(new ReadlineParser({ delimiter: '\n' }));
    parser.on('data', (line: string) => this.queue.push(line));
    watchPort(port, port.path, this.queue, (err) => this.emit('error', err));
  }

  static open(options: SerialOptions): Promise<SerialLineSource> {
    const port = new SerialPort({ path: options.path, baudRate: options.baudRate, autoOpen: false });
    return new Promise((resolve, reject) => {
      port.open((err) => {
        if (err) {
          reject(new TransportError(`Could not open port ${options.path}: ${err.message}`, options.path, { cause: err }));
          return;
        }
        resolve(new SerialLineSource(port, options.readTimeoutMs));
      });
    });
  }

  readLine(signal?: AbortSignal): Promise<LineRead> {
    return this.queue.next(signal);
  }

  close(): Promise<void> {
    this.queue.end();
    if (!this.port.isOpen) return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.port.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
