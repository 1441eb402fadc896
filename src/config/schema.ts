/**
 * Zod schema for the engine configuration file.
 *
 * Every field has a `.default()`, so `EngineConfigSchema.parse({})`
 * yields a complete config and a partial file only overrides what it
 * names. Nested objects use `.default(() => ({}))` factories.
 *
 * @module config/schema
 */

import { z } from 'zod';
import { FidelityLevelSchema } from '../types/fidelity.js';
import { PriorityTierSchema } from '../types/taxonomy.js';
import { LOG_LEVELS } from '../logging/engine-logger.js';

// ============================================================================
// Coverage & sequencing
// ============================================================================

const CoverageSchema = z.object({
  /** Score at or above which a category counts as covered */
  target_threshold: z.number().min(0).max(1).default(0.5),
});

const SequencerSchema = z.object({
  max_generation_calls: z.number().int().min(0).default(23),
  generation_timeout_ms: z.number().int().min(1).default(30_000),
});

// ============================================================================
// Inventory
// ============================================================================

export const SyntheticPolicySchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('all') }),
  z.object({ mode: z.literal('none') }),
  z.object({ mode: z.literal('tiers'), tiers: z.array(PriorityTierSchema) }),
]);

const InventorySchema = z.object({
  completion_target: z.number().min(0).max(1).default(0.95),
  synthetic_policy: SyntheticPolicySchema.default(() => ({
    mode: 'tiers' as const,
    tiers: ['high' as const, 'medium' as const],
  })),
});

// ============================================================================
// Fidelity & batch
// ============================================================================

const FidelitySchema = z.object({
  allow_fallback: z.boolean().default(true),
  /** `none` is the ladder floor and cannot be disabled */
  disabled_levels: z
    .array(FidelityLevelSchema)
    .refine((levels) => !levels.includes('none'), { message: 'The "none" level cannot be disabled' })
    .default([]),
  max_document_bytes: z.number().int().min(1).default(5_000_000),
});

const BatchSchema = z.object({
  concurrency: z.number().int().min(1).max(64).default(4),
  documents_dir: z.string().min(1).default('guidelines'),
  output_dir: z.string().min(1).default('generated/fidelity-reports'),
  default_levels: z
    .array(FidelityLevelSchema)
    .min(1)
    .default(['evaluation-only', 'table', 'sequential', 'full']),
  per_document_reports: z.boolean().default(true),
  comprehensive_report: z.boolean().default(true),
});

// ============================================================================
// Logging
// ============================================================================

const LoggingSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
  /** JSONL run-event log path; null disables it */
  event_log: z.string().min(1).nullable().default(null),
});

// ============================================================================
// Root
// ============================================================================

export const EngineConfigSchema = z.object({
  coverage: CoverageSchema.default(() => ({})),
  sequencer: SequencerSchema.default(() => ({})),
  inventory: InventorySchema.default(() => ({})),
  fidelity: FidelitySchema.default(() => ({})),
  batch: BatchSchema.default(() => ({})),
  logging: LoggingSchema.default(() => ({})),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({});
