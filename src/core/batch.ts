/**
 * Batch conversion of a directory of BASIC listings.
 *
 * Every `*.txt` directly inside the source directory becomes
 * `<target>/wav/<stem>.wav`, or `<target>/wav/<X>/<stem>.wav` when sorting
 * into alphabetized sub-directories by the stem's first letter.
 */
import { readdirSync, statSync } from 'fs';
import { basename, extname, join } from 'path';
import type { EncodingConfig } from './types';
import { encodeFile } from './encoder';
import type { EncodeFileResult, EncodeOptions } from './encoder';

export const SOURCE_EXT = '.txt';
export const OUTPUT_DIR = 'wav';

export interface BatchOptions extends EncodeOptions {
  alphabetize?: boolean;
}

export interface BatchHooks {
  onStart?: (source: string, target: string) => void;
  onResult?: (result: EncodeFileResult) => void;
}

/** `*.txt` files directly in `dir`, sorted by name. */
export function discoverSources(dir: string): string[] {
  return readdirSync(dir)
    .filter(name => extname(name) === SOURCE_EXT)
    .sort()
    .map(name => join(dir, name))
    .filter(path => statSync(path).isFile());
}

export function targetPathFor(source: string, targetDir: string, alphabetize = false): string {
  const stem = basename(source, extname(source));
  const dir = alphabetize
    ? join(targetDir, OUTPUT_DIR, (stem[0] ?? '_').toUpperCase())
    : join(targetDir, OUTPUT_DIR);
  return join(dir, `${stem}.wav`);
}

/** Encode each source in turn; a failing file does not stop the rest. */
export function encodeSources(
  sources: readonly string[],
  targetDir: string,
  config: EncodingConfig,
  options: BatchOptions = {},
  hooks: BatchHooks = {},
): EncodeFileResult[] {
  const results: EncodeFileResult[] = [];
  for (const source of sources) {
    const target = targetPathFor(source, targetDir, options.alphabetize);
    hooks.onStart?.(source, target);
    const result = encodeFile(source, target, config, options);
    hooks.onResult?.(result);
    results.push(result);
  }
  return results;
}

export function encodeBatch(
  sourceDir: string,
  targetDir: string,
  config: EncodingConfig,
  options: BatchOptions = {},
  hooks: BatchHooks = {},
): EncodeFileResult[] {
  return encodeSources(discoverSources(sourceDir), targetDir, config, options, hooks);
}
