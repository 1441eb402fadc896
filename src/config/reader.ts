/**
 * Engine config file reader.
 *
 * Missing file = all defaults. Invalid JSON or a schema failure raises
 * EngineConfigError with one `path: message` line per issue.
 *
 * @module config/reader
 */

import { readFile } from 'node:fs/promises';
import type { ZodError } from 'zod';
import { DEFAULT_ENGINE_CONFIG, EngineConfigSchema, type EngineConfig } from './schema.js';

/** Default config file, relative to the working directory. */
export const DEFAULT_CONFIG_PATH = 'cds-coverage.config.json';

export class EngineConfigError extends Error {
  override name = 'EngineConfigError' as const;

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
  }
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Read and validate the config at `configPath`.
 *
 * @throws {EngineConfigError} On invalid JSON or validation failure
 */
export async function readEngineConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
): Promise<EngineConfig> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return DEFAULT_ENGINE_CONFIG;
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new EngineConfigError(`Invalid JSON in config file: ${configPath} (${detail})`);
  }

  const result = EngineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new EngineConfigError(
      `Config validation failed:\n${formatIssues(result.error).join('\n')}`,
      result.error.issues[0]?.path.join('.'),
    );
  }
  return result.data;
}

/**
 * Validate raw input against the config schema (no I/O).
 */
export function validateEngineConfig(
  raw: unknown,
): { valid: true; config: EngineConfig } | { valid: false; errors: string[] } {
  const result = EngineConfigSchema.safeParse(raw);
  if (result.success) {
    return { valid: true, config: result.data };
  }
  return { valid: false, errors: formatIssues(result.error) };
}
