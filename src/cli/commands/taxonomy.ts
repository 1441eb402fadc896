/**
 * CLI command: `cds-coverage taxonomy`
 *
 * Lists the usage-scenario categories, optionally filtered by tier.
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { PriorityTierSchema, type PriorityTier } from '../../types/taxonomy.js';
import { formatTaxonomy } from '../../reporting/terminal-formatter.js';
import { getDefaultRegistry } from '../../taxonomy/loader.js';
import type { TaxonomyRegistry } from '../../taxonomy/registry.js';
import { EXIT_FAILED, EXIT_OK, flagValue, hasFlag, reportConfigError } from '../shared.js';

const HELP_TEXT = `
Usage: cds-coverage taxonomy [options]

List the CDS usage-scenario categories.

Options:
  --tier=TIER     Only show one tier (high, medium, low)
  --json          Output categories as JSON
  --help, -h      Show this help message
`;

export async function taxonomyCommand(args: string[]): Promise<number> {
  if (hasFlag(args, 'help') || args.includes('-h')) {
    console.log(HELP_TEXT);
    return EXIT_OK;
  }

  const json = hasFlag(args, 'json');
  const tierArg = flagValue(args, 'tier');
  let tier: PriorityTier | undefined;
  if (tierArg !== undefined) {
    const parsed = PriorityTierSchema.safeParse(tierArg);
    if (!parsed.success) {
      p.log.error(`Unknown tier "${tierArg}" (expected high, medium or low)`);
      return EXIT_FAILED;
    }
    tier = parsed.data;
  }

  let registry: TaxonomyRegistry;
  try {
    registry = await getDefaultRegistry();
  } catch (err: unknown) {
    return reportConfigError(err, json);
  }

  const categories = tier === undefined ? registry.categories() : registry.byTier(tier);

  if (json) {
    console.log(JSON.stringify({
      version: registry.version,
      tier_policy: registry.policy,
      categories,
    }, null, 2));
    return EXIT_OK;
  }

  const { high, medium, low } = registry.policy;
  p.log.message(pc.bold(`Taxonomy v${registry.version}: ${registry.size} categories (${high} high, ${medium} medium, ${low} low)`));
  p.log.message(formatTaxonomy(categories));
  return EXIT_OK;
}
