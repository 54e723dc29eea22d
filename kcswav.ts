/**
 * kcswav — BASIC listing to Kansas City Standard cassette audio
 *
 * Usage:
 *   npm run build && node dist/kcswav.js <file.txt | dir> [options]
 *
 * Each listing becomes an 8-bit mono WAV under <out>/wav/, tagged with the
 * file's name as artist, album and title. Run with --help for options.
 */
import { existsSync, statSync } from 'fs';
import { createConfig } from './src/core/config';
import { discoverSources, encodeSources } from './src/core/batch';
import { leaderPulseCount } from './src/core/stream';
import { getPulses } from './src/core/pulse';
import { parseCliArgs, USAGE } from './src/cli/options';
import type { EncodeFileResult } from './src/core/encoder';

const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const BOLD = '\x1b[1m';
const RESET = '\x1b[0m';

// ---- Argument parsing ----

const opts = parseCliArgs(process.argv.slice(2));

if (opts.help || (opts.sources.length === 0 && opts.errors.length === 0)) {
  const out = opts.help ? console.log : console.error;
  out('kcswav — BASIC text to Kansas City Standard WAV');
  out('');
  for (const line of USAGE) out(line);
  process.exit(opts.help ? 0 : 1);
}

if (opts.errors.length > 0) {
  for (const err of opts.errors) console.error(`${RED}Error:${RESET} ${err}`);
  process.exit(1);
}

const { config, errors: configErrors } = createConfig(opts.overrides);
if (!config) {
  for (const err of configErrors) console.error(`${RED}Error:${RESET} ${err.message}`);
  process.exit(1);
}

// ---- Source discovery ----

const sources: string[] = [];
for (const path of opts.sources) {
  if (!existsSync(path)) {
    console.error(`${RED}Error:${RESET} cannot find '${path}'`);
    process.exit(1);
  }
  if (statSync(path).isDirectory()) sources.push(...discoverSources(path));
  else sources.push(path);
}

if (sources.length === 0) {
  console.error(`${YELLOW}No .txt sources found${RESET}`);
  process.exit(1);
}

// ---- Settings ----

if (opts.verbose) {
  const pulses = getPulses(config);
  console.log(`${BOLD}Wav File Parameters${RESET}`);
  console.log(`  Bit 1 frequency   ${config.oneFrequency} Hz (${pulses.one.length} samples/cycle)`);
  console.log(`  Bit 0 frequency   ${config.zeroFrequency} Hz (${pulses.zero.length} samples/cycle)`);
  console.log(`  Sample rate       ${config.sampleRate} Hz`);
  console.log(`  Amplitude         ${config.amplitude} around ${config.center}`);
  console.log(`  Leader            ${config.leaderSeconds} s (${leaderPulseCount(config, pulses)} pulses)`);
  console.log(`  Start bit         ${config.startBit}`);
  console.log(`  Parity            ${config.parity}`);
  console.log('');
}

// ---- Encode ----

const report = (result: EncodeFileResult) => {
  if (opts.json) return;

  if (result.errors.length > 0) {
    console.error(`${RED}✗ ${result.source}: ${result.errors.length} error(s)${RESET}`);
    for (const err of result.errors) {
      const loc = err.line ? `:${err.line}` : '';
      console.error(`  ${result.source}${loc}: ${err.message}`);
    }
    return;
  }

  if (opts.quiet) return;

  console.log(`${GREEN}✓ ${result.target}${RESET} — ${result.records.length} line(s), ${result.frames} frames, ${result.duration.toFixed(1)} s`);

  if (opts.verbose) {
    console.log(`  Size header: 0x${result.header.toString(16).padStart(4, '0')}`);
    const decoder = new TextDecoder();
    for (const r of result.records) {
      const text = decoder.decode(r.body).replace(/\r$/, '');
      console.log(`    ${r.label.toString().padStart(5)}  ${r.body.length.toString().padStart(3)} B  ${text}`);
    }
  }
};

const results = encodeSources(
  sources,
  opts.outDir,
  config,
  { alphabetize: opts.alphabetize, truncateLabels: opts.truncateLabels },
  {
    onStart: (_source, target) => {
      if (opts.verbose) console.log(`${YELLOW}Creating File ${target}${RESET}`);
    },
    onResult: report,
  },
);

const failed = results.filter(r => r.errors.length > 0).length;

// ---- JSON output mode ----

if (opts.json) {
  const out = {
    config,
    results: results.map(r => ({
      source: r.source,
      target: r.errors.length > 0 ? null : r.target,
      errors: r.errors,
      lines: r.records.length,
      header: r.header,
      frames: r.frames,
      samples: r.samples,
      duration: r.duration,
    })),
  };
  console.log(JSON.stringify(out, null, 2));
} else if (sources.length > 1 && !opts.quiet) {
  console.log('');
  console.log(`${sources.length - failed} converted, ${failed} failed out of ${sources.length} file(s)`);
}

process.exit(failed > 0 ? 1 : 0);
