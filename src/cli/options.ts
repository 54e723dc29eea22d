/**
 * Command-line parsing for kcswav.
 *
 * Flags are either switches (`--alpha`) or `--key=value` settings; anything
 * that does not start with `--` is a source path.
 */
import type { Bit, EncodingConfig } from '../core/types';
import { Parity } from '../core/types';
import { SAMPLE_RATE_CHOICES, TONE_CHOICES } from '../core/constants';

export type ConfigOverrides = { -readonly [K in keyof EncodingConfig]?: EncodingConfig[K] };

export interface CliOptions {
  sources: string[];
  outDir: string;
  alphabetize: boolean;
  truncateLabels: boolean;
  verbose: boolean;
  quiet: boolean;
  json: boolean;
  help: boolean;
  overrides: ConfigOverrides;
  errors: string[];
}

export const USAGE = [
  'Usage: kcswav <source.txt | source-dir> [options]',
  '',
  'Options:',
  '  --out=<dir>         Target directory (files go to <dir>/wav/)',
  '  --alpha             Save files in alphabetized sub-directories (default)',
  '  --flat              Save every file directly in <dir>/wav/',
  `  --one=<hz>          Bit 1 frequency (${TONE_CHOICES.join(' ')})`,
  `  --zero=<hz>         Bit 0 frequency (${TONE_CHOICES.join(' ')})`,
  `  --rate=<hz>         Sample rate (${SAMPLE_RATE_CHOICES.join(' ')})`,
  '  --amplitude=<n>     Square wave amplitude, 0..255',
  '  --center=<n>        Center level, 0..255',
  '  --leader=<s>        Leader length in seconds, 0..60',
  '  --start-bit=<0|1>   Start bit value',
  '  --parity=<odd|even> Parity bit mode',
  '  --truncate-labels   Keep the low 16 bits of line numbers above 65535',
  '  --verbose           Show records and frame counts',
  '  --quiet             Only show errors',
  '  --json              Output results as JSON',
];

function parseInteger(key: string, value: string, errors: string[]): number | undefined {
  if (!/^[0-9]+$/.test(value)) {
    errors.push(`--${key} expects a whole number, got '${value}'`);
    return undefined;
  }
  return parseInt(value, 10);
}

function parseChoice(key: string, value: string, choices: readonly number[], errors: string[]): number | undefined {
  const n = parseInteger(key, value, errors);
  if (n === undefined) return undefined;
  if (!choices.includes(n)) {
    errors.push(`--${key} must be one of ${choices.join(', ')}; got ${n}`);
    return undefined;
  }
  return n;
}

function parseParity(value: string, errors: string[]): Parity | undefined {
  const v = value.toLowerCase();
  if (v === Parity.ODD || v === '0') return Parity.ODD;
  if (v === Parity.EVEN || v === '1') return Parity.EVEN;
  errors.push(`--parity must be 'odd' or 'even', got '${value}'`);
  return undefined;
}

function parseStartBit(value: string, errors: string[]): Bit | undefined {
  if (value === '0') return 0;
  if (value === '1') return 1;
  errors.push(`--start-bit must be 0 or 1, got '${value}'`);
  return undefined;
}

export function parseCliArgs(args: readonly string[], cwd: string = process.cwd()): CliOptions {
  const opts: CliOptions = {
    sources: [],
    outDir: cwd,
    alphabetize: true,
    truncateLabels: false,
    verbose: false,
    quiet: false,
    json: false,
    help: false,
    overrides: {},
    errors: [],
  };
  const { overrides, errors } = opts;

  // Rejected values are reported and leave the default in place
  const set = <K extends keyof ConfigOverrides>(key: K, value: ConfigOverrides[K]) => {
    if (value !== undefined) overrides[key] = value;
  };

  for (const arg of args) {
    if (!arg.startsWith('--')) {
      opts.sources.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    if (eq < 0) {
      switch (arg) {
        case '--alpha': opts.alphabetize = true; break;
        case '--flat': opts.alphabetize = false; break;
        case '--truncate-labels': opts.truncateLabels = true; break;
        case '--verbose': opts.verbose = true; break;
        case '--quiet': opts.quiet = true; break;
        case '--json': opts.json = true; break;
        case '--help': opts.help = true; break;
        default: errors.push(`Unknown option '${arg}'`);
      }
      continue;
    }

    const key = arg.slice(2, eq);
    const value = arg.slice(eq + 1);
    switch (key) {
      case 'out':
        if (value === '') errors.push('--out expects a directory');
        else opts.outDir = value;
        break;
      case 'one': set('oneFrequency', parseChoice(key, value, TONE_CHOICES, errors)); break;
      case 'zero': set('zeroFrequency', parseChoice(key, value, TONE_CHOICES, errors)); break;
      case 'rate': set('sampleRate', parseChoice(key, value, SAMPLE_RATE_CHOICES, errors)); break;
      case 'amplitude': set('amplitude', parseInteger(key, value, errors)); break;
      case 'center': set('center', parseInteger(key, value, errors)); break;
      case 'leader': set('leaderSeconds', parseInteger(key, value, errors)); break;
      case 'start-bit': set('startBit', parseStartBit(value, errors)); break;
      case 'parity': set('parity', parseParity(value, errors)); break;
      default: errors.push(`Unknown option '--${key}'`);
    }
  }

  if (opts.quiet && opts.verbose) errors.push('--quiet and --verbose cannot be combined');
  // JSON goes to stdout alone
  if (opts.json && opts.verbose) errors.push('--json and --verbose cannot be combined');

  return opts;
}
