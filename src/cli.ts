#!/usr/bin/env node
import { createRequire } from 'node:module';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import { runCommand } from './cli/commands/run.js';
import { evaluateCommand } from './cli/commands/evaluate.js';
import { taxonomyCommand } from './cli/commands/taxonomy.js';
import { configCommand } from './cli/commands/config.js';

function printVersion(): void {
  const require = createRequire(import.meta.url);
  const pkg: unknown = require('../package.json');
  const version =
    typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
      ? pkg.version
      : 'unknown';

  console.log(`cds-coverage  v${version}`);
  console.log(`Node.js       ${process.version}`);
  console.log(`Platform      ${process.platform} ${process.arch}`);
}

function showHelp(): void {
  console.log(`
${pc.bold('cds-coverage')} - CDS usage-scenario coverage and fidelity evaluation

Usage:
  cds-coverage <command> [options]

Commands:
  run                 Run documents x fidelity levels and write reports
  evaluate <doc>      Score one document and list its coverage gaps
  taxonomy            List the usage-scenario categories
  config              Validate and print the effective configuration

Options:
  --help, -h          Show help (also per command: cds-coverage run --help)
  --version, -V       Show version

Examples:
  cds-coverage run
  cds-coverage run --documents=afib,breast-cancer --levels=full,table
  cds-coverage run --threshold=0.6 --budget=10 --json
  cds-coverage evaluate guidelines/afib.md
  cds-coverage taxonomy --tier=high
  cds-coverage config --config=./cds-coverage.config.json

Configuration:
  Settings are read from cds-coverage.config.json in the working
  directory when present. Command-line flags override file values.
`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const command = args[0];
  const rest = args.slice(1);

  if (command === '--version' || command === '-V') {
    printVersion();
    return 0;
  }

  switch (command) {
    case 'run':
      return runCommand(rest);
    case 'evaluate':
    case 'eval':
      return evaluateCommand(rest);
    case 'taxonomy':
    case 'tax':
      return taxonomyCommand(rest);
    case 'config':
      return configCommand(rest);
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      showHelp();
      return 0;
    default:
      p.log.error(`Unknown command: ${command}`);
      showHelp();
      return 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    p.log.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
