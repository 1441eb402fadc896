/**
 * JSONL append log of run events.
 *
 * One line per event: orchestrator fallbacks, sequencer state transitions
 * and completed runs. Writes are serialized through a queue so concurrent
 * pairs never interleave partial lines. Reads validate each line with Zod
 * and skip anything malformed.
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { FidelityLevelSchema } from '../types/fidelity.js';

// ============================================================================
// Schema
// ============================================================================

const FallbackEventSchema = z.object({
  type: z.literal('fallback'),
  document_name: z.string(),
  requested_level: FidelityLevelSchema,
  from: FidelityLevelSchema,
  to: FidelityLevelSchema.nullable(),
  reason: z.string(),
});

const TransitionEventSchema = z.object({
  type: z.literal('transition'),
  document_name: z.string(),
  category_id: z.string(),
  from: z.string(),
  to: z.string(),
  step: z.number().int().positive(),
  reason: z.string().optional(),
});

const RunCompleteEventSchema = z.object({
  type: z.literal('run_complete'),
  document_name: z.string(),
  requested_level: FidelityLevelSchema,
  fidelity_level: FidelityLevelSchema.nullable(),
  state: z.enum(['succeeded', 'failed', 'cancelled']),
  execution_time: z.number().nonnegative(),
  fallback_count: z.number().int().nonnegative(),
});

export const RunEventSchema = z.discriminatedUnion('type', [
  FallbackEventSchema,
  TransitionEventSchema,
  RunCompleteEventSchema,
]);

export type RunEvent = z.infer<typeof RunEventSchema>;

const RunEventEnvelopeSchema = z.object({
  timestamp: z.string(),
  event: RunEventSchema,
});

export type RunEventEnvelope = z.infer<typeof RunEventEnvelopeSchema>;

/** Destination for run events. The JSONL log is the only persistent one. */
export interface RunEventSink {
  record(event: RunEvent): Promise<void>;
}

export const nullEventSink: RunEventSink = {
  record: async () => undefined,
};

function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

// ============================================================================
// Store
// ============================================================================

export class RunEventLog implements RunEventSink {
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    readonly filePath: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * Append one event. Writes are applied in call order.
   */
  async record(event: RunEvent): Promise<void> {
    const envelope: RunEventEnvelope = { timestamp: this.clock().toISOString(), event };
    const line = JSON.stringify(envelope) + '\n';

    const write = async (): Promise<void> => {
      await mkdir(dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, line, 'utf-8');
    };
    // A failed write rejects only its own caller; later writes still run
    this.writeQueue = this.writeQueue.then(write, write);

    return this.writeQueue;
  }

  /**
   * All valid envelopes in append order. Missing file reads as empty.
   */
  async readAll(): Promise<RunEventEnvelope[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const envelopes: RunEventEnvelope[] = [];
    for (const line of content.split(/\r?\n/)) {
      if (line.trim() === '') continue;
      const result = RunEventEnvelopeSchema.safeParse(parseLine(line));
      if (result.success) {
        envelopes.push(result.data);
      }
    }
    return envelopes;
  }
}
