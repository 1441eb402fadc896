/**
 * Argument parsing and config loading shared by the CLI commands.
 *
 * Flags use the `--name=value` form. Commands return exit codes:
 * 0 success, 1 a failed run or lookup, 2 a configuration error,
 * 130 cancelled.
 */

import * as p from '@clack/prompts';
import { readEngineConfig, DEFAULT_CONFIG_PATH, EngineConfigError } from '../config/reader.js';
import { EngineConfigSchema, type EngineConfig } from '../config/schema.js';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_CONFIG = 2;
export const EXIT_CANCELLED = 130;

/**
 * Check if a boolean flag is present in args.
 */
export function hasFlag(args: string[], ...flags: string[]): boolean {
  return flags.some((flag) => args.includes(`--${flag}`));
}

/** Value of `--name=value`, or undefined when absent. */
export function flagValue(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  return arg === undefined ? undefined : arg.slice(prefix.length);
}

/** Comma-separated flag value, blanks dropped. */
export function listFlag(args: string[], name: string): string[] | undefined {
  const value = flagValue(args, name);
  if (value === undefined) return undefined;
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * Numeric flag value. A present but non-numeric value throws
 * EngineConfigError so the command exits as a configuration error.
 */
export function numberFlag(args: string[], name: string): number | undefined {
  const value = flagValue(args, name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new EngineConfigError(`--${name} expects a number, got "${value}"`, name);
  }
  return parsed;
}

/** Positional arguments (those not starting with '-'). */
export function positionals(args: string[]): string[] {
  return args.filter((a) => !a.startsWith('-'));
}

export interface ConfigOverrides {
  coverage?: Partial<EngineConfig['coverage']>;
  sequencer?: Partial<EngineConfig['sequencer']>;
  batch?: Partial<EngineConfig['batch']>;
}

/**
 * Read the config named by `--config=` (or the default path) and apply
 * flag overrides. Overrides are validated with the same schema.
 *
 * @throws {EngineConfigError} On any invalid file or override
 */
export async function loadCommandConfig(
  args: string[],
  overrides: ConfigOverrides = {},
): Promise<EngineConfig> {
  const base = await readEngineConfig(flagValue(args, 'config') ?? DEFAULT_CONFIG_PATH);
  const merged = {
    ...base,
    coverage: { ...base.coverage, ...overrides.coverage },
    sequencer: { ...base.sequencer, ...overrides.sequencer },
    batch: { ...base.batch, ...overrides.batch },
  };

  const result = EngineConfigSchema.safeParse(merged);
  if (!result.success) {
    const lines = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new EngineConfigError(`Invalid option:\n${lines.join('\n')}`, result.error.issues[0]?.path.join('.'));
  }
  return result.data;
}

/**
 * Report a configuration-time error and return the matching exit code.
 */
export function reportConfigError(err: unknown, json: boolean): number {
  const message = err instanceof Error ? err.message : String(err);
  if (json) {
    console.log(JSON.stringify({ error: message }, null, 2));
  } else {
    p.log.error(message);
  }
  return EXIT_CONFIG;
}
