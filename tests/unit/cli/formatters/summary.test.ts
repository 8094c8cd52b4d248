/**
 * Tests for the run summary formatter.
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import chalk from 'chalk';
import { formatRunSummary } from '../../../../src/cli/formatters/summary.js';
import type { RunReport } from '../../../../src/core/execution/types.js';

describe('formatRunSummary', () => {
  const level = chalk.level;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  function report(overrides: Partial<RunReport>): RunReport {
    return { action: 'apply', ok: true, cancelled: false, units: [], warnings: [], durationMs: 5, ...overrides };
  }

  it('groups units by status with failure reasons', () => {
    const text = formatRunSummary(report({
      ok: false,
      units: [
        { unit: 'vpc', path: 'vpc', status: 'failed', error: 'boom', durationMs: 1 },
        { unit: 'db', path: 'db', status: 'skipped', error: "dependency 'vpc' failed", durationMs: 0 },
        { unit: 'cache', path: 'cache', status: 'succeeded', durationMs: 1 },
        { unit: 'api', path: 'api', status: 'not-selected', durationMs: 0 },
      ],
      warnings: ["Unit 'db' was excluded by a filter but is required by 'api'; including it"],
    }));

    expect(text.split('\n')).toEqual([
      'Summary: apply',
      '  succeeded (1): cache',
      '  failed (1): vpc',
      '    vpc: boom',
      '  skipped (1): db',
      "    db: dependency 'vpc' failed",
      '  not selected (1): api',
      "  warning: Unit 'db' was excluded by a filter but is required by 'api'; including it",
      'Result: FAILED',
    ]);
  });

  it('reports success', () => {
    const text = formatRunSummary(report({
      action: 'plan',
      units: [
        { unit: 'a', path: 'a', status: 'succeeded', durationMs: 1 },
        { unit: 'b', path: 'b', status: 'succeeded', durationMs: 1 },
      ],
    }));
    expect(text).toBe('Summary: plan\n  succeeded (2): a, b\nResult: OK');
  });

  it('reports cancellation ahead of the outcome', () => {
    const text = formatRunSummary(report({
      cancelled: true,
      units: [{ unit: 'a', path: 'a', status: 'cancelled', durationMs: 0 }],
    }));
    expect(text.split('\n').slice(-2)).toEqual(['  cancelled (1): a', 'Result: CANCELLED']);
  });
});
