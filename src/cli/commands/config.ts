/**
 * CLI command: `cds-coverage config`
 *
 * Validates the config file and prints the effective configuration
 * (file values merged over defaults).
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { DEFAULT_CONFIG_PATH, readEngineConfig } from '../../config/reader.js';
import type { EngineConfig } from '../../config/schema.js';
import { EXIT_OK, flagValue, hasFlag, reportConfigError } from '../shared.js';

const HELP_TEXT = `
Usage: cds-coverage config [options]

Validate the engine config and print the effective values.

Options:
  --config=PATH   Config file (default: cds-coverage.config.json)
  --json          Output the effective config as JSON
  --help, -h      Show this help message

A missing config file is valid: every value takes its default.
`;

export async function configCommand(args: string[]): Promise<number> {
  if (hasFlag(args, 'help') || args.includes('-h')) {
    console.log(HELP_TEXT);
    return EXIT_OK;
  }

  const json = hasFlag(args, 'json');
  const configPath = flagValue(args, 'config') ?? DEFAULT_CONFIG_PATH;

  let config: EngineConfig;
  try {
    config = await readEngineConfig(configPath);
  } catch (err: unknown) {
    return reportConfigError(err, json);
  }

  if (json) {
    console.log(JSON.stringify(config, null, 2));
    return EXIT_OK;
  }

  p.intro(pc.bgCyan(pc.black(' Engine Configuration ')));
  p.log.message(`Source: ${configPath}`);
  for (const [section, values] of Object.entries(config)) {
    p.log.message(pc.bold(section));
    for (const [key, value] of Object.entries(values)) {
      p.log.message(`  ${key}: ${pc.cyan(JSON.stringify(value))}`);
    }
  }
  p.outro(pc.green('Configuration is valid.'));
  return EXIT_OK;
}
