import { z } from 'zod';

const BooleanFlagZ = z
  .union([z.boolean(), z.enum(['1', '0', 'true', 'false', 'yes', 'no'])])
  .transform((v) => v === true || v === '1' || v === 'true' || v === 'yes');

export const SettingsZ = z
  .object({
    port: z.string().min(1),
    baud: z.coerce.number().int().positive(),
    talker: z
      .string()
      .regex(/^[A-Za-z]{2}$/, 'talker id is two letters, e.g. GP or GN')
      .transform((v) => v.toUpperCase()),
    cycles: z.coerce.number().int().min(0),
    timeoutMs: z.coerce.number().int().positive(),
    replay: z.string().min(1).optional(),
    waitForFix: BooleanFlagZ,
    verbose: BooleanFlagZ,
  })
  .strict();

export type Settings = z.output<typeof SettingsZ>;
type RawSettings = Partial<Record<keyof Settings, string | boolean>>;

// Garmin eTrex and similar handhelds sit on ttyUSB0 at 4800 baud;
// USB data loggers tend to be ttyACM0 at 115200.
export const DEFAULT_SETTINGS: Settings = {
  port: '/dev/ttyUSB0',
  baud: 4800,
  talker: 'GP',
  cycles: 1,
  timeoutMs: 1000,
  waitForFix: true,
  verbose: false,
};

export const USAGE = `Usage: geomancer [options]

Geomancy with GPS satellite positions.

Options:
  -p, --port <path>     serial device of the GPS (default ${DEFAULT_SETTINGS.port})
  -b, --baud <rate>     baud rate (default ${DEFAULT_SETTINGS.baud})
  -t, --talker <id>     talker id of satellite-view sentences (default ${DEFAULT_SETTINGS.talker})
  -c, --cycles <n>      figures to cast, 0 = until interrupted (default ${DEFAULT_SETTINGS.cycles})
      --timeout <ms>    per-line read timeout (default ${DEFAULT_SETTINGS.timeoutMs})
  -r, --replay <file>   read NMEA from a log file instead of the serial port
      --no-fix          do not wait for a position fix first
  -v, --verbose         show sentence and satellite diagnostics
  -h, --help            show this help`;

export class SettingsError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'SettingsError';
  }
}

export type Command = { kind: 'run'; settings: Settings } | { kind: 'help' };

const ENV_KEYS: [keyof Settings, string][] = [
  ['port', 'GEOMANCER_PORT'],
  ['baud', 'GEOMANCER_BAUD'],
  ['talker', 'GEOMANCER_TALKER'],
  ['cycles', 'GEOMANCER_CYCLES'],
  ['timeoutMs', 'GEOMANCER_TIMEOUT_MS'],
  ['verbose', 'GEOMANCER_VERBOSE'],
];

const VALUE_FLAGS: Record<string, keyof Settings> = {
  '-p': 'port', '--port': 'port',
  '-b': 'baud', '--baud': 'baud',
  '-t': 'talker', '--talker': 'talker',
  '-c': 'cycles', '--cycles': 'cycles',
  '--timeout': 'timeoutMs',
  '-r': 'replay', '--replay': 'replay',
};

export function settingsFromEnv(env: NodeJS.ProcessEnv): RawSettings {
  const raw: RawSettings = {};
  for (const [key, name] of ENV_KEYS) {
    const value = env[name];
    if (value !== undefined && value !== '') raw[key] = value;
  }
  return raw;
}

function parseFlags(argv: string[]): RawSettings | 'help' {
  const raw: RawSettings = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq > 0 ? arg.slice(0, eq) : arg;

    if (flag === '-h' || flag === '--help') return 'help';
    if (flag === '-v' || flag === '--verbose') { raw.verbose = true; continue; }
    if (flag === '--no-fix') { raw.waitForFix = false; continue; }

    const key = VALUE_FLAGS[flag];
    if (!key) throw new SettingsError(`Unknown option: ${arg}`);

    const value = eq > 0 ? arg.slice(eq + 1) : argv[++i];
    if (value === undefined) throw new SettingsError(`Option ${flag} needs a value`);
    raw[key] = value;
  }
  return raw;
}

/** Merge defaults, environment and flags (in that order) and validate the result */
export function parseCommandLine(argv: string[], env: NodeJS.ProcessEnv = process.env): Command {
  const flags = parseFlags(argv);
  if (flags === 'help') return { kind: 'help' };

  const parsed = SettingsZ.safeParse({ ...DEFAULT_SETTINGS, ...settingsFromEnv(env), ...flags });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new SettingsError('Invalid settings', issues);
  }
  return { kind: 'run', settings: parsed.data };
}
