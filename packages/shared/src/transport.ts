// ============================================================================
// Geomancer Transport Types
// ============================================================================

export type LineRead =
  | { kind: 'line'; line: string }
  | { kind: 'timeout' }
  | { kind: 'end' }
  | { kind: 'cancelled' };

/** Line-oriented view of a receiver: serial port, log replay or test fixture */
export interface LineSource {
  readLine(signal?: AbortSignal): Promise<LineRead>;
  close(): Promise<void>;
}
