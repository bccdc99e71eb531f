/**
 * Tests for the summary command and its helpers.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { createSummaryCommand } from '../../../../src/cli/commands/summary.js';
import { loadEcosystemGraph, missingFields } from '../../../../src/cli/commands/ecosystem-helpers.js';

const fixtures = fileURLToPath(new URL('../../../fixtures/ecosystem', import.meta.url));

describe('missingFields', () => {
  it('should list absent required fields per repository', async () => {
    const { load } = await loadEcosystemGraph(join(fixtures, 'index.json'), {});

    expect([...missingFields(load, ['license', 'updated'])]).toEqual([
      ['gamma', ['license', 'updated']],
    ]);
  });

  it('should count overridden fields as present', async () => {
    const { load } = await loadEcosystemGraph(join(fixtures, 'index.json'), {
      overrides: join(fixtures, 'overrides'),
    });

    expect(missingFields(load, ['url']).has('alpha')).toBe(false);
    expect(missingFields(load, ['url']).get('beta')).toEqual(['url']);
  });
});

describe('createSummaryCommand', () => {
  let exitSpy: MockInstance<typeof process.exit>;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => {}) as never);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print layer counts and missing fields as JSON', async () => {
    await createSummaryCommand().parseAsync(['node', 'summary', join(fixtures, 'index.json'), '--json']);

    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
      total: 3,
      layers: [
        { layer: 'protocol', count: 1, repos: ['alpha'] },
        { layer: 'language', count: 0, repos: [] },
        { layer: 'runtime', count: 1, repos: ['beta'] },
        { layer: 'application', count: 1, repos: ['gamma'] },
        { layer: 'infrastructure', count: 0, repos: [] },
        { layer: 'research', count: 0, repos: [] },
      ],
      missing_fields: { gamma: ['license'] },
    });
    expect(exitSpy).not.toHaveBeenCalled();
  });

  it('should exit with 1 when the index cannot be read', async () => {
    await createSummaryCommand().parseAsync(['node', 'summary', join(fixtures, 'malformed.yaml')]);

    expect(exitSpy).toHaveBeenCalledWith(1);
  });
});
