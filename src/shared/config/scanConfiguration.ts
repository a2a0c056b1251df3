import * as os from "os";
import { ScanOptions } from "../../application/ports/driving/ScanOptions";
import { InvalidOptionsError } from "../errors/scanErrors";

export const ENV_KEYS = {
  MAX_CONCURRENCY: "STORAGE_SCOPE_MAX_CONCURRENCY",
  FOLLOW_SYMLINKS: "STORAGE_SCOPE_FOLLOW_SYMLINKS",
  SKIP_HIDDEN: "STORAGE_SCOPE_SKIP_HIDDEN",
  PROGRESS_INTERVAL_MS: "STORAGE_SCOPE_PROGRESS_INTERVAL_MS",
  VERBOSE: "STORAGE_SCOPE_VERBOSE",
} as const;

export const DEFAULT_PROGRESS_INTERVAL_MS = 100;

export function defaultConcurrency(): number {
  return Math.max(1, os.availableParallelism());
}

export const DEFAULT_SCAN_OPTIONS: Readonly<ScanOptions> = Object.freeze({
  followSymlinks: false,
  maxConcurrency: defaultConcurrency(),
  ignorePatterns: [],
  skipHidden: false,
  progressIntervalMs: DEFAULT_PROGRESS_INTERVAL_MS,
});

export interface ScanConfiguration {
  options: Partial<ScanOptions>;
  verboseLogging: boolean;
}

/**
 * Lee la configuración desde variables de entorno.
 * Las variables ausentes no aparecen en `options`, de modo que se apliquen los valores por defecto.
 * @throws InvalidOptionsError si una variable tiene un valor no reconocible
 */
export function loadScanConfiguration(
  env: NodeJS.ProcessEnv = process.env
): ScanConfiguration {
  const options: Partial<ScanOptions> = {};

  const concurrency = env[ENV_KEYS.MAX_CONCURRENCY];
  if (concurrency !== undefined) {
    options.maxConcurrency = parseInteger(ENV_KEYS.MAX_CONCURRENCY, concurrency);
  }
  const interval = env[ENV_KEYS.PROGRESS_INTERVAL_MS];
  if (interval !== undefined) {
    options.progressIntervalMs = parseInteger(ENV_KEYS.PROGRESS_INTERVAL_MS, interval);
  }
  const follow = env[ENV_KEYS.FOLLOW_SYMLINKS];
  if (follow !== undefined) {
    options.followSymlinks = parseBoolean(ENV_KEYS.FOLLOW_SYMLINKS, follow);
  }
  const skipHidden = env[ENV_KEYS.SKIP_HIDDEN];
  if (skipHidden !== undefined) {
    options.skipHidden = parseBoolean(ENV_KEYS.SKIP_HIDDEN, skipHidden);
  }

  const verbose = env[ENV_KEYS.VERBOSE];
  const verboseLogging =
    verbose !== undefined ? parseBoolean(ENV_KEYS.VERBOSE, verbose) : false;

  return { options, verboseLogging };
}

/**
 * Combina opciones con una base y valida el resultado.
 * @throws InvalidOptionsError
 */
export function resolveScanOptions(
  overrides: Partial<ScanOptions> = {},
  base: Readonly<ScanOptions> = DEFAULT_SCAN_OPTIONS
): ScanOptions {
  const resolved: ScanOptions = {
    followSymlinks: overrides.followSymlinks ?? base.followSymlinks,
    maxConcurrency: overrides.maxConcurrency ?? base.maxConcurrency,
    excludePredicate: overrides.excludePredicate ?? base.excludePredicate,
    ignorePatterns: [...(overrides.ignorePatterns ?? base.ignorePatterns)],
    skipHidden: overrides.skipHidden ?? base.skipHidden,
    progressIntervalMs: overrides.progressIntervalMs ?? base.progressIntervalMs,
  };

  if (!Number.isInteger(resolved.maxConcurrency) || resolved.maxConcurrency < 1) {
    throw new InvalidOptionsError(
      "maxConcurrency",
      `expected an integer >= 1, got ${resolved.maxConcurrency}`
    );
  }
  if (!Number.isFinite(resolved.progressIntervalMs) || resolved.progressIntervalMs < 0) {
    throw new InvalidOptionsError(
      "progressIntervalMs",
      `expected a number >= 0, got ${resolved.progressIntervalMs}`
    );
  }
  return resolved;
}

function parseInteger(name: string, raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === "" || !Number.isInteger(value)) {
    throw new InvalidOptionsError(name, `expected an integer, got "${raw}"`);
  }
  return value;
}

function parseBoolean(name: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true;
    case "0":
    case "false":
    case "no":
      return false;
    default:
      throw new InvalidOptionsError(name, `expected true/false, got "${raw}"`);
  }
}
