import { EventEmitter } from 'events';
import { DEFAULT_TALKER, FIX_STATUS_TYPE, SATELLITE_VIEW_TYPE } from '@geomancer/shared';
import type {
  ChosenFour,
  ClassifiedSatellite,
  Direction,
  Figure,
  LineSource,
  RawSentence,
  SatelliteTable,
} from '@geomancer/shared';
import { decodeSentence, sentenceHeader } from '../nmea/decoder.js';
import { assembleReport } from '../nmea/assembler.js';
import { buildSatelliteTable } from '../satellite/table.js';
import { classifySatellites } from '../satellite/classifier.js';
import { selectCandidates } from '../satellite/selector.js';
import { renderDiagram } from './renderer.js';

export type CycleResult =
  | { kind: 'diagram'; table: SatelliteTable; classified: ClassifiedSatellite[]; chosen: ChosenFour; text: string; figure: Figure }
  | { kind: 'gap'; table: SatelliteTable; classified: ClassifiedSatellite[]; chosen: ChosenFour; missing: Direction[] }
  | { kind: 'ended' }
  | { kind: 'cancelled' };

export type FixWaitResult = 'fix' | 'ended' | 'cancelled';

/**
 * Geomancy Reader — runs the satellite-view pipeline over a line source.
 *
 * Events:
 * - `frame_error` (DecodeResult failure) a line was dropped
 * - `assembly_error` (AssembleError) a report was dropped, waiting again
 * - `fix_status` ('A' | 'V' | string) status field of a fix-status sentence
 * - `report` (SatelliteGroup) a complete report was collected
 * - `table` (SatelliteTable) satellites recovered from the report
 * - `idle` a read timed out while waiting
 *
 * Nothing is carried from one cycle to the next.
 */
export class GeomancyReader extends EventEmitter {
  constructor(private source: LineSource, private talker: string = DEFAULT_TALKER) {
    super();
  }

  /** Block until the receiver reports an active fix */
  async waitForFix(signal?: AbortSignal): Promise<FixWaitResult> {
    const header = `${sentenceHeader(this.talker, FIX_STATUS_TYPE)},`;
    for (;;) {
      const read = await this.source.readLine(signal);
      if (read.kind === 'end') return 'ended';
      if (read.kind === 'cancelled') return 'cancelled';
      if (read.kind === 'timeout') {
        this.emit('idle');
        continue;
      }
      if (!read.line.startsWith(header)) continue;

      const decoded = decodeSentence(read.line);
      if (!decoded.ok) {
        this.emit('frame_error', decoded);
        continue;
      }
      // $GPRMC,hhmmss.ss,A,... status follows the UTC time
      const status = decoded.sentence.fields[1] ?? '';
      this.emit('fix_status', status);
      if (status === 'A') return 'fix';
    }
  }

  /** First sentence of the next satellite-view report */
  private async nextReportStart(signal?: AbortSignal): Promise<RawSentence | 'ended' | 'cancelled'> {
    const header = `${sentenceHeader(this.talker, SATELLITE_VIEW_TYPE)},`;
    for (;;) {
      const read = await this.source.readLine(signal);
      if (read.kind === 'end') return 'ended';
      if (read.kind === 'cancelled') return 'cancelled';
      if (read.kind === 'timeout') {
        this.emit('idle');
        continue;
      }
      if (!read.line.startsWith(header)) continue;

      const decoded = decodeSentence(read.line);
      if (!decoded.ok) {
        this.emit('frame_error', decoded);
        continue;
      }
      // Joining a report halfway through would misnumber it; wait for sentence 1.
      if (decoded.sentence.fields[1] !== '1') continue;
      return decoded.sentence;
    }
  }

  async runCycle(signal?: AbortSignal): Promise<CycleResult> {
    for (;;) {
      const first = await this.nextReportStart(signal);
      if (first === 'ended' || first === 'cancelled') return { kind: first };

      const assembled = await assembleReport(first, this.source, {
        signal,
        onFrameError: (failure) => this.emit('frame_error', failure),
      });
      if (!assembled.ok) {
        if (assembled.error === 'cancelled') return { kind: 'cancelled' };
        this.emit('assembly_error', assembled.error);
        continue;
      }
      this.emit('report', assembled.group);

      const table = buildSatelliteTable(assembled.group);
      this.emit('table', table);

      const classified = classifySatellites(table);
      const chosen = selectCandidates(classified);
      const rendered = renderDiagram(chosen);
      if (!rendered.ok) return { kind: 'gap', table, classified, chosen, missing: rendered.missing };
      return { kind: 'diagram', table, classified, chosen, text: rendered.text, figure: rendered.figure };
    }
  }
}
