import type { AssembleResult, DecodeResult, LineSource, RawSentence } from '@geomancer/shared';
import { decodeSentence, sentenceHeader } from './decoder.js';

export interface AssembleOptions {
  signal?: AbortSignal;
  /** Called for every matching line that failed to decode */
  onFrameError?: (failure: Extract<DecodeResult, { ok: false }>) => void;
}

/** Parse a count field; empty or non-numeric values give NaN */
export function parseCount(value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value.trim())) return NaN;
  return parseInt(value, 10);
}

/**
 * Collect the rest of a multi-sentence report.
 *
 * The first sentence announces how many sentences the report spans. The
 * remaining ones are read from `source`, skipping lines of other families.
 * A sentence that fails its checksum (or disagrees on the sentence or
 * in-view count) leaves a null slot; the report is still returned.
 */
export async function assembleReport(
  first: RawSentence,
  source: LineSource,
  options: AssembleOptions = {},
): Promise<AssembleResult> {
  const total = parseCount(first.fields[0]);
  if (!Number.isInteger(total) || total < 1) return { ok: false, error: 'malformed header' };

  const satellitesInView = parseCount(first.fields[2]);
  const header = sentenceHeader(first.talker, first.type);
  const members: (RawSentence | null)[] = [first];

  while (members.length < total) {
    const read = await source.readLine(options.signal);
    if (read.kind === 'end') return { ok: false, error: 'incomplete report' };
    if (read.kind === 'timeout') return { ok: false, error: 'timeout' };
    if (read.kind === 'cancelled') return { ok: false, error: 'cancelled' };

    if (!read.line.startsWith(`${header},`)) continue;

    const decoded = decodeSentence(read.line);
    if (!decoded.ok) {
      options.onFrameError?.(decoded);
      members.push(null);
      continue;
    }
    // Members of one report agree on both the sentence total and the in-view count.
    const fields = decoded.sentence.fields;
    const sameReport = parseCount(fields[0]) === total && Object.is(parseCount(fields[2]), satellitesInView);
    members.push(sameReport ? decoded.sentence : null);
  }

  return {
    ok: true,
    group: {
      total,
      satellitesInView: Number.isNaN(satellitesInView) ? 0 : satellitesInView,
      members,
    },
  };
}
