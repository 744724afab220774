import type { EventEmitter } from 'events';
import type { LineQueue } from './line-queue.js';
import { TransportError } from './errors.js';

/**
 * Ends the queue when the port closes or fails. A close carrying an error
 * (the device was unplugged) is reported like a port failure.
 */
export function watchPort(port: EventEmitter, path: string, queue: LineQueue, onError: (err: TransportError) => void) {
  port.on('close', (err?: Error | null) => {
    queue.end();
    if (err) onError(new TransportError(`Serial port ${path} disconnected: ${err.message}`, path, { cause: err }));
  });
  port.on('error', (err: Error) => {
    queue.end();
    onError(new TransportError(`Serial port ${path} failed: ${err.message}`, path, { cause: err }));
  });
}
