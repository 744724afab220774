import type { SatelliteGroup, SatelliteRecord, SatelliteTable } from '@geomancer/shared';

// Leading count fields repeated by every satellite-view sentence:
// sentence total, sentence index, satellites in view.
const COUNT_FIELDS = 3;
const CHUNK = 4;

/**
 * (prn, elevation, azimuth, snr) chunks of every decoded member, report
 * order. Empty values and the missing tail of a truncated trailing group
 * read as '0'. Each member contributes its own run of chunks, so a dropped
 * sentence cannot shift the ones after it.
 */
export function flattenReport(group: SatelliteGroup): string[][] {
  const chunks: string[][] = [];
  for (const member of group.members) {
    if (!member) continue;
    const values = member.fields.slice(COUNT_FIELDS).map((v) => (v.trim() === '' ? '0' : v.trim()));
    for (let i = 0; i < values.length; i += CHUNK) {
      const chunk = values.slice(i, i + CHUNK);
      while (chunk.length < CHUNK) chunk.push('0');
      chunks.push(chunk);
    }
  }
  return chunks;
}

function toRecord(chunk: string[]): SatelliteRecord | null {
  if (!chunk.every((v) => /^\d+$/.test(v))) return null;
  const [prn, elevation, azimuth, snr] = chunk.map((v) => parseInt(v, 10));
  // PRNs start at 1; an empty identifier names no satellite.
  if (prn === 0) return null;
  return { prn, elevation, azimuth, snr };
}

/**
 * Build the prn → record table for one report. Chunks without a usable
 * identifier or with non-numeric values are counted and dropped; a prn
 * reported twice keeps its later record.
 */
export function buildSatelliteTable(group: SatelliteGroup): SatelliteTable {
  const satellites = new Map<number, SatelliteRecord>();
  let skipped = 0;

  for (const chunk of flattenReport(group)) {
    const record = toRecord(chunk);
    if (!record) {
      skipped++;
      continue;
    }
    satellites.set(record.prn, record);
  }

  return { satellites, recovered: satellites.size, skipped };
}
