import type { LineRead, LineSource } from '@geomancer/shared';

/** In-memory line source; `null` entries read as a timeout */
export class ArraySource implements LineSource {
  private index = 0;
  closed = false;
  reads = 0;

  constructor(private lines: (string | null)[]) {}

  async readLine(signal?: AbortSignal): Promise<LineRead> {
    this.reads++;
    if (signal?.aborted) return { kind: 'cancelled' };
    if (this.index >= this.lines.length) return { kind: 'end' };
    const line = this.lines[this.index++];
    return line === null ? { kind: 'timeout' } : { kind: 'line', line };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

// Three-sentence report: prn 1-8 spread round the compass, prn 9 on the
// 135° boundary, prn 10 due north with its trailing fields truncated.
export const VIEW_1 = '$GPGSV,3,1,10,01,05,260,25,02,10,010,20,03,15,100,15,04,20,190,30*72';
export const VIEW_2 = '$GPGSV,3,2,10,05,40,350,22,06,33,080,40,07,12,200,18,08,61,275,28*7E';
export const VIEW_2_CORRUPT = '$GPGSV,3,2,10,05,40,350,22,06,33,080,40,07,12,200,18,08,61,275,28*7F';
export const VIEW_3 = '$GPGSV,3,3,10,09,08,135,,10,,,*4F';

// One satellite per direction, each its direction's sole candidate.
export const SINGLE_VIEW = '$GPGSV,1,1,04,01,05,260,25,02,10,010,20,03,15,100,15,04,20,190,30*75';

// Two-sentence report with nobody to the west.
export const NO_WEST_1 = '$GPGSV,2,1,06,11,30,045,30,12,20,010,33,13,25,012,20,14,35,055,15*7E';
export const NO_WEST_2 = '$GPGSV,2,2,06,15,50,100,41,16,10,190,*74';

export const RMC_ACTIVE = '$GPRMC,123519.00,A,5230.000,N,01322.000,E,0.0,0.0,181026,,,A*59';
export const RMC_VOID = '$GPRMC,123518.00,V,,,,,,,181026,,,N*7D';
export const GGA = '$GPGGA,123519,5230.000,N,01322.000,E,1,08,0.9,545.4,M,46.9,M,,*43';
