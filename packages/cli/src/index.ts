#!/usr/bin/env node
// ============================================================================
// Geomancer — casts a geomantic figure from the GPS satellites overhead
// ============================================================================
import { Logger } from './logger.js';
import { parseCommandLine, SettingsError, USAGE } from './settings.js';
import type { Command, Settings } from './settings.js';
import { exitCode, runSession } from './session.js';
import { SerialLineSource } from './transport/serial.js';
import { ReplayLineSource } from './transport/replay.js';
import { TransportError } from './transport/errors.js';

function openSource(settings: Settings): Promise<SerialLineSource | ReplayLineSource> {
  if (settings.replay) return ReplayLineSource.open(settings.replay);
  return SerialLineSource.open({ path: settings.port, baudRate: settings.baud, readTimeoutMs: settings.timeoutMs });
}

async function main(argv: string[]): Promise<number> {
  let command: Command;
  try {
    command = parseCommandLine(argv);
  } catch (err) {
    if (!(err instanceof SettingsError)) throw err;
    console.error(`❌ ${err.message}`);
    for (const issue of err.issues) console.error(`   ${issue}`);
    console.error(`\n${USAGE}`);
    return 2;
  }
  if (command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  const { settings } = command;
  const log = new Logger(settings.verbose);
  log.info(`🛰️ Geomancer: ${settings.replay ? `replaying ${settings.replay}` : `${settings.port} @ ${settings.baud} baud`}`);

  let source: SerialLineSource | ReplayLineSource;
  try {
    source = await openSource(settings);
  } catch (err) {
    if (!(err instanceof TransportError)) throw err;
    log.error(err.message);
    if (!settings.replay) log.info('   Is the GPS plugged in and turned on?');
    return 2;
  }

  const controller = new AbortController();
  let transportFailed = false;
  const shutdown = () => {
    log.info('\n🛑 User interrupt, shutting down');
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
  source.on('error', (err: TransportError) => {
    transportFailed = true;
    log.error('Transport failure', err);
    controller.abort();
  });

  try {
    const summary = await runSession(source, settings, log, controller.signal);
    if (transportFailed) return 2;
    if (summary.outcome === 'ended' && summary.diagrams === 0) log.warn('Input ended before a figure could be cast');
    return exitCode(summary);
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
    await source.close();
  }
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error('❌ Unexpected failure:', err);
    process.exit(1);
  },
);
