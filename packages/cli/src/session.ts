import { GeomancyReader } from '@geomancer/core';
import type { AssembleError, DecodeResult, LineSource, SatelliteGroup, SatelliteTable } from '@geomancer/shared';
import type { Logger } from './logger.js';
import type { Settings } from './settings.js';
import { formatChosen, formatFrameError, formatReport, formatSatellite } from './output.js';

export interface SessionSummary {
  diagrams: number;
  gaps: number;
  outcome: 'completed' | 'ended' | 'cancelled';
}

/**
 * Exit code for a finished session: 1 only when the input ran out before a
 * single report was read. A cycle that ends in a gap still counts as read.
 */
export function exitCode(summary: SessionSummary): number {
  if (summary.outcome !== 'ended') return 0;
  return summary.diagrams + summary.gaps > 0 ? 0 : 1;
}

function attachDiagnostics(reader: GeomancyReader, log: Logger) {
  reader.on('frame_error', (failure: Extract<DecodeResult, { ok: false }>) => log.debug(`📡 Dropped line, ${formatFrameError(failure)}`));
  reader.on('assembly_error', (error: AssembleError) => log.debug(`📡 Report dropped (${error}), waiting for the next one`));
  reader.on('fix_status', (status: string) => log.debug(`🛰️ Fix status: ${status === 'A' ? 'active' : 'void'}`));
  reader.on('report', (group: SatelliteGroup) => log.debug(`📡 ${formatReport(group)}`));
  reader.on('table', (table: SatelliteTable) => {
    log.debug(`🛰️ ${table.recovered} satellites recovered${table.skipped ? `, ${table.skipped} malformed skipped` : ''}`);
  });
}

/**
 * Wait for a fix (unless disabled), then cast `settings.cycles` figures,
 * or keep casting until the source ends or the signal aborts when it is 0.
 */
export async function runSession(
  source: LineSource,
  settings: Settings,
  log: Logger,
  signal?: AbortSignal,
): Promise<SessionSummary> {
  const reader = new GeomancyReader(source, settings.talker);
  attachDiagnostics(reader, log);
  const summary: SessionSummary = { diagrams: 0, gaps: 0, outcome: 'completed' };

  if (settings.waitForFix) {
    log.info('🛰️ Waiting for a position fix...');
    const fix = await reader.waitForFix(signal);
    if (fix !== 'fix') return { ...summary, outcome: fix };
    log.info('🛰️ Fix acquired');
  }

  for (let cycle = 1; settings.cycles === 0 || cycle <= settings.cycles; cycle++) {
    const result = await reader.runCycle(signal);
    if (result.kind === 'ended' || result.kind === 'cancelled') return { ...summary, outcome: result.kind };

    if (log.verbose) {
      for (const sat of result.classified) log.debug(`   ${formatSatellite(sat)}`);
      for (const line of formatChosen(result.chosen)) log.debug(`   ➜ ${line}`);
    }

    if (result.kind === 'gap') {
      summary.gaps++;
      log.warn(`No satellite to the ${result.missing.join(', ')}; cannot cast a figure this time`);
      continue;
    }
    summary.diagrams++;
    log.info(`\n${result.text}\n`);
  }
  return summary;
}
