/**
 * Environment helpers shared by the client library and its CLI.
 */
import { parse } from 'dotenv';
import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';

export type EnvSource = Record<string, string | undefined>;

export interface LoadEnvOptions {
  cwd?: string;
  /** Read in order; relative names resolve against `cwd`. Defaults to `.env`. */
  files?: string[];
  /** Later files replace earlier ones, and file values replace `target` values. */
  override?: boolean;
  /** When false, files are only parsed and nothing is written to `target`. */
  assignToProcess?: boolean;
  /** Where values are written. Defaults to `process.env`. */
  target?: EnvSource;
}

export interface LoadEnvSummary {
  loadedFiles: string[];
  missingFiles: string[];
  /** Keys written to the target that were not set before. */
  assignedKeys: string[];
  /** Keys whose existing target value was replaced (override only). */
  overriddenKeys: string[];
  values: Record<string, string>;
}

export function loadEnvFilesWithSummary(options: LoadEnvOptions = {}): LoadEnvSummary {
  const { override = false, assignToProcess = true } = options;
  const target = options.target ?? process.env;
  const cwd = resolve(options.cwd ?? process.cwd());
  const names = options.files?.length ? options.files : ['.env'];

  const summary: LoadEnvSummary = {
    loadedFiles: [],
    missingFiles: [],
    assignedKeys: [],
    overriddenKeys: [],
    values: {},
  };

  for (const path of names.map((name) => resolve(cwd, name))) {
    if (!existsSync(path)) {
      summary.missingFiles.push(path);
      continue;
    }
    summary.loadedFiles.push(path);

    for (const [key, value] of Object.entries(parse(readFileSync(path, 'utf8')))) {
      if (override || !(key in summary.values)) summary.values[key] = value;
      if (assignToProcess) assign(summary, target, key, value, override);
    }
  }

  return summary;
}

function assign(summary: LoadEnvSummary, target: EnvSource, key: string, value: string, override: boolean): void {
  if (target[key] === undefined) {
    target[key] = value;
    if (!summary.assignedKeys.includes(key)) summary.assignedKeys.push(key);
    return;
  }
  if (!override) return;
  target[key] = value;
  if (!summary.assignedKeys.includes(key) && !summary.overriddenKeys.includes(key)) {
    summary.overriddenKeys.push(key);
  }
}

// Empty strings count as unset for both readers.
export function readString(name: string, fallback?: string, env: EnvSource = process.env): string | undefined {
  const raw = env[name];
  return raw === undefined || raw === '' ? fallback : raw;
}

export function readInt(name: string, fallback: number, env: EnvSource = process.env): number {
  const raw = readString(name, undefined, env);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? Math.trunc(value) : fallback;
}
