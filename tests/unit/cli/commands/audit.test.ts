/**
 * Tests for the audit command.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { InvalidArgumentError } from 'commander';
import {
  createAuditCommand,
  parseRuleList,
  selectRules,
  configOverrides,
  getExitCode,
} from '../../../../src/cli/commands/audit.js';
import { parseInteger } from '../../../../src/cli/commands/options.js';
import { buildReport } from '../../../../src/core/report/builder.js';
import { createFinding } from '../../../../src/core/findings/factory.js';

const fixtures = fileURLToPath(new URL('../../../fixtures/ecosystem', import.meta.url));
const exitCodes = { success: 0, error: 1, warning_only: 2 };

describe('audit command helpers', () => {
  describe('parseRuleList', () => {
    it('should return known rules in check order', () => {
      expect(parseRuleList('links, cycles,completeness')).toEqual(['completeness', 'cycles', 'links']);
    });

    it('should reject unknown rules', () => {
      expect(() => parseRuleList('cycles,spelling')).toThrow(
        'Unknown rule(s): spelling. Use: completeness, dependencies, cycles, staleness, links'
      );
    });
  });

  describe('selectRules', () => {
    it('should default to every rule', () => {
      expect(selectRules(undefined, false)).toEqual(['completeness', 'dependencies', 'cycles', 'staleness', 'links']);
    });

    it('should drop links when skipping them', () => {
      expect(selectRules('links,staleness', true)).toEqual(['staleness']);
    });
  });

  describe('configOverrides', () => {
    it('should map flags to config keys', () => {
      expect(
        configOverrides({ format: 'human', timeout: 500, staleDays: 30, bestEffort: ['status.example.org'] })
      ).toEqual({ timeout_ms: 500, staleness_threshold_days: 30, best_effort_hosts: ['status.example.org'] });
    });

    it('should leave unset flags out', () => {
      expect(configOverrides({ format: 'json' })).toEqual({});
    });
  });

  describe('getExitCode', () => {
    const warning = createFinding({
      severity: 'warning',
      category: 'metadata',
      code: 'M010',
      rule: 'completeness',
      subject: 'alpha',
      message: 'No tags declared',
    });

    it('should map the verdict to the configured codes', () => {
      expect(getExitCode(buildReport([]), exitCodes)).toBe(0);
      expect(getExitCode(buildReport([warning]), exitCodes)).toBe(2);
      expect(getExitCode(buildReport([{ ...warning, severity: 'blocking' }]), exitCodes)).toBe(1);
    });

    it('should fail an incomplete run even without blocking findings', () => {
      const report = buildReport([], { complete: false });

      expect(report.passed).toBe(true);
      expect(getExitCode(report, exitCodes)).toBe(1);
      expect(getExitCode(buildReport([warning], { complete: false }), exitCodes)).toBe(1);
    });
  });

  describe('parseInteger', () => {
    it('should parse non-negative integers', () => {
      expect(parseInteger('8', '--concurrency')).toBe(8);
      expect(parseInteger('0', '--retries')).toBe(0);
    });

    it('should reject anything else', () => {
      expect(() => parseInteger('-1', '--retries')).toThrow(InvalidArgumentError);
      expect(() => parseInteger('2.5', '--timeout')).toThrow("--timeout expects a non-negative integer, got '2.5'");
    });
  });
});

describe('createAuditCommand', () => {
  let tempDir: string;
  let exitSpy: MockInstance<typeof process.exit>;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'ecoaudit-audit-'));
    exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => {}) as never);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should register its options', () => {
    const command = createAuditCommand();
    const flags = command.options.map((o) => o.long);

    expect(command.name()).toBe('audit');
    expect(flags).toContain('--skip-links');
    expect(flags).toContain('--as-of');
    expect(flags).toContain('--best-effort');
  });

  it('should print the report and exit with the error code on blocking findings', async () => {
    const configPath = join(tempDir, 'config.yaml');
    await writeFile(configPath, 'staleness_threshold_days: 180\n');

    await createAuditCommand().parseAsync([
      'node',
      'audit',
      join(fixtures, 'index.json'),
      '--config',
      configPath,
      '--overrides',
      join(fixtures, 'overrides'),
      '--skip-links',
      '--as-of',
      '2026-10-01',
      '--format',
      'compact',
    ]);

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(String(logSpy.mock.calls[0][0]).split('\n')).toEqual([
      'ERROR M001 gamma: Missing required field: license',
      'ERROR D001 gamma: Unresolved dependency: delta',
      'WARN M010 gamma: No tags declared',
      'WARN D003 beta: Dependency cycle through test edges: beta → gamma → beta',
      'WARN T001 ecosystem-index: Index declares 4 repositories but contains 3',
      'INFO T002 beta: Not updated for 259 days (since 2026-01-15); candidate for deprecated status',
      '',
      'SUMMARY: 2 errors, 3 warnings, 1 info',
    ]);
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('should use the configured exit code for warnings only', async () => {
    const configPath = join(tempDir, 'config.yaml');
    const indexPath = join(tempDir, 'index.json');
    await writeFile(configPath, 'exit_codes:\n  warning_only: 2\n');
    await writeFile(
      indexPath,
      JSON.stringify([
        {
          name: 'solo',
          layer: 'runtime',
          status: 'stable',
          short_description: 'Standalone runtime',
          dependencies: [],
          tags: [],
          license: 'MIT',
        },
      ])
    );

    await createAuditCommand().parseAsync(['node', 'audit', indexPath, '-c', configPath, '-f', 'json']);

    const parsed: unknown = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(parsed).toHaveProperty('summary', { blocking: 0, warning: 1, info: 0, total: 1 });
    expect(exitSpy).toHaveBeenCalledWith(2);
  });

  it('should exit with 1 on an invalid format', async () => {
    await createAuditCommand().parseAsync(['node', 'audit', join(fixtures, 'index.json'), '--format', 'xml']);

    expect(logSpy).not.toHaveBeenCalled();
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('should exit with 1 when the index is missing', async () => {
    await createAuditCommand().parseAsync(['node', 'audit', join(tempDir, 'missing.json'), '--skip-links']);

    expect(logSpy).not.toHaveBeenCalled();
    expect(exitSpy).toHaveBeenCalledWith(1);
  });
});
