/**
 * Tests for the run CLI command.
 *
 * Covers:
 * - JSON summary and written reports
 * - Exit codes: success, degraded, failed, cancelled, config errors
 * - Interactive output (spinner, table, outro)
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

vi.mock('@clack/prompts', () => ({
  log: {
    message: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    success: vi.fn(),
    info: vi.fn(),
  },
  intro: vi.fn(),
  outro: vi.fn(),
  spinner: () => ({ start: vi.fn(), message: vi.fn(), stop: vi.fn() }),
}));

vi.mock('picocolors', () => {
  const plain = (s: string) => s;
  return {
    default: { green: plain, red: plain, yellow: plain, dim: plain, bold: plain, cyan: plain, bgCyan: plain, black: plain },
  };
});

import * as p from '@clack/prompts';
import { runCommand } from './run.js';
import { CancellationToken } from '../../batch/cancellation.js';
import { FailingGenerator, FIXTURE_GUIDELINES_DIR } from '../../__fixtures__/engine-fixtures.js';

describe('runCommand', () => {
  let dir: string;
  let configPath: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  async function writeConfig(extra: Record<string, unknown> = {}): Promise<void> {
    await writeFile(
      configPath,
      JSON.stringify({
        batch: { documents_dir: FIXTURE_GUIDELINES_DIR, output_dir: join(dir, 'reports') },
        logging: { level: 'silent' },
        ...extra,
      }),
    );
  }

  function printedJson(): unknown {
    const call = consoleLogSpy.mock.calls.at(-1);
    return JSON.parse(String(call?.[0]));
  }

  beforeEach(async () => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    dir = await mkdtemp(join(tmpdir(), 'run-command-'));
    configPath = join(dir, 'config.json');
    await writeConfig();
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    await rm(dir, { recursive: true, force: true });
  });

  // ============================================================================
  // JSON mode
  // ============================================================================

  describe('--json', () => {
    it('runs the requested pairs and writes reports', async () => {
      const exitCode = await runCommand([
        '--documents=afib,asthma',
        '--levels=draft,evaluation-only',
        `--config=${configPath}`,
        '--json',
      ]);

      expect(exitCode).toBe(0);
      expect(printedJson()).toMatchObject({
        exit_code: 0,
        cancelled: false,
        performance_summary: { total_runs: 4, successful_runs: 4 },
        runs: [
          { document_name: 'afib', requested_level: 'evaluation-only', state: 'succeeded', fallbacks: 0 },
          { document_name: 'afib', requested_level: 'draft', state: 'succeeded' },
          { document_name: 'asthma', requested_level: 'evaluation-only', state: 'succeeded' },
          { document_name: 'asthma', requested_level: 'draft', state: 'succeeded' },
        ],
      });

      const files = (await readdir(join(dir, 'reports'))).sort();
      expect(files).toHaveLength(3);
      expect(files[0]).toMatch(/^comprehensive_fidelity_\d{8}_\d{6}\.json$/);
      expect(files[1]).toMatch(/^fidelity_summary_\d{8}_\d{6}\.txt$/);
      expect(files[2]).toMatch(/^per-document_\d{8}_\d{6}$/);
    });

    it('honours the report switches', async () => {
      await runCommand([
        '--documents=afib',
        '--levels=none',
        '--no-per-document',
        '--no-comprehensive',
        `--config=${configPath}`,
        '--json',
      ]);

      expect(printedJson()).toMatchObject({ reports: [] });
    });

    it('exits 0 when a pair only degrades', async () => {
      const exitCode = await runCommand(
        ['--documents=afib', '--levels=full', `--config=${configPath}`, '--json'],
        { generator: new FailingGenerator() },
      );

      expect(exitCode).toBe(0);
      expect(printedJson()).toMatchObject({
        runs: [{ requested_level: 'full', fidelity_level: 'sequential', fallbacks: 1 }],
      });
    });

    it('exits 1 when a pair fails', async () => {
      await writeConfig({ fidelity: { allow_fallback: false, max_document_bytes: 10 } });
      const exitCode = await runCommand([
        '--documents=afib',
        '--levels=evaluation-only',
        `--config=${configPath}`,
        '--json',
      ]);

      expect(exitCode).toBe(1);
      expect(printedJson()).toMatchObject({
        exit_code: 1,
        runs: [{ state: 'failed', fidelity_level: null }],
      });
    });

    it('exits 130 when cancelled', async () => {
      const token = new CancellationToken();
      token.cancel('SIGINT');
      const exitCode = await runCommand(
        ['--documents=afib', '--levels=table', `--config=${configPath}`, '--json'],
        { token },
      );

      expect(exitCode).toBe(130);
      expect(printedJson()).toMatchObject({
        cancelled: true,
        runs: [{ state: 'cancelled', error_message: 'Cancelled: SIGINT' }],
      });
    });
  });

  // ============================================================================
  // Configuration errors
  // ============================================================================

  describe('configuration errors', () => {
    it('rejects a non-numeric threshold', async () => {
      const exitCode = await runCommand(['--threshold=high', `--config=${configPath}`, '--json']);

      expect(exitCode).toBe(2);
      expect(printedJson()).toEqual({ error: '--threshold expects a number, got "high"' });
    });

    it('rejects an out-of-range threshold', async () => {
      const exitCode = await runCommand(['--threshold=2', `--config=${configPath}`]);

      expect(exitCode).toBe(2);
      expect(p.log.error).toHaveBeenCalledWith(
        'Invalid option:\ncoverage.target_threshold: Number must be less than or equal to 1',
      );
    });

    it('rejects an unknown level', async () => {
      const exitCode = await runCommand(['--levels=ultra', `--config=${configPath}`, '--json']);

      expect(exitCode).toBe(2);
      expect(printedJson()).toEqual({ error: 'Unknown fidelity level "ultra"' });
    });

    it('rejects an empty documents directory', async () => {
      await writeConfig({ batch: { documents_dir: join(dir, 'nothing-here') } });
      const exitCode = await runCommand([`--config=${configPath}`, '--json']);

      expect(exitCode).toBe(2);
      expect(printedJson()).toEqual({ error: `No guideline documents found in ${join(dir, 'nothing-here')}` });
    });

    it('rejects an unknown document id', async () => {
      const exitCode = await runCommand(['--documents=gout', `--config=${configPath}`, '--json']);

      expect(exitCode).toBe(2);
      expect(printedJson()).toEqual({ error: 'Unknown document id: "gout"' });
    });
  });

  // ============================================================================
  // Interactive output
  // ============================================================================

  describe('interactive output', () => {
    it('prints the run table and outro', async () => {
      const exitCode = await runCommand(['--documents=asthma', '--levels=draft,none', `--config=${configPath}`]);

      expect(exitCode).toBe(0);
      expect(p.intro).toHaveBeenCalledWith(' Fidelity Run ');
      expect(p.log.success).toHaveBeenCalledWith(`Wrote 3 report file(s) to ${join(dir, 'reports')}`);
      expect(p.outro).toHaveBeenCalledWith('2 runs complete');
    });

    it('prints help', async () => {
      expect(await runCommand(['--help'])).toBe(0);
      expect(String(consoleLogSpy.mock.calls[0]?.[0])).toContain('Usage: cds-coverage run [options]');
    });
  });
});
