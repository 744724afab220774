import type { LineRead } from '@geomancer/shared';

type Waiter = (read: LineRead) => void;

/**
 * Buffers lines pushed by a stream and hands them out one read at a time.
 * A read resolves `timeout` when no line arrives within `readTimeoutMs`
 * (no limit when unset) and `cancelled` when its signal aborts.
 */
export class LineQueue {
  private lines: string[] = [];
  private waiters: Waiter[] = [];
  private ended = false;

  constructor(private readTimeoutMs?: number) {}

  push(line: string) {
    if (this.ended) return;
    const waiter = this.waiters.shift();
    if (waiter) waiter({ kind: 'line', line });
    else this.lines.push(line);
  }

  /** No more lines; buffered ones are still handed out */
  end() {
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) waiter({ kind: 'end' });
  }

  get pending(): number {
    return this.lines.length;
  }

  next(signal?: AbortSignal): Promise<LineRead> {
    if (signal?.aborted) return Promise.resolve({ kind: 'cancelled' });
    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve({ kind: 'line', line });
    if (this.ended) return Promise.resolve({ kind: 'end' });

    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | null = null;
      const settle = (read: LineRead) => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const idx = this.waiters.indexOf(settle);
        if (idx >= 0) this.waiters.splice(idx, 1);
        resolve(read);
      };
      const onAbort = () => settle({ kind: 'cancelled' });

      this.waiters.push(settle);
      signal?.addEventListener('abort', onAbort, { once: true });
      if (this.readTimeoutMs !== undefined) {
        timer = setTimeout(() => settle({ kind: 'timeout' }), this.readTimeoutMs);
      }
    });
  }
}
