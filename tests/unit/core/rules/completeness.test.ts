/**
 * Tests for the completeness rule.
 */
import { describe, it, expect } from 'vitest';
import { CompletenessRule } from '../../../../src/core/rules/completeness.js';
import { buildContext, repo } from './helpers.js';

describe('CompletenessRule', () => {
  const rule = new CompletenessRule();

  it('should pass complete descriptors', () => {
    expect(rule.run(buildContext([repo('alpha'), repo('beta')]))).toEqual([]);
  });

  it('should carry loader findings', () => {
    const { license: _license, ...withoutLicense } = repo('alpha');
    const findings = rule.run(buildContext([withoutLicense]));

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({ code: 'M001', subject: 'alpha', message: 'Missing required field: license' });
  });

  it('should reject layers outside the enumeration', () => {
    const findings = rule.run(buildContext([repo('alpha', { layer: 'frontend' })]));

    expect(findings).toEqual([
      {
        severity: 'blocking',
        category: 'metadata',
        code: 'M007',
        rule: 'completeness',
        subject: 'alpha',
        message: "Invalid layer 'frontend'. Must be one of: protocol, language, runtime, application, infrastructure, research",
      },
    ]);
  });

  it('should reject statuses outside the enumeration', () => {
    const findings = rule.run(buildContext([repo('alpha', { status: 'archived' })]));

    expect(findings.map((f) => [f.code, f.severity])).toEqual([['M008', 'blocking']]);
    expect(findings[0].message).toBe("Invalid status 'archived'. Must be one of: alpha, beta, stable, deprecated");
  });

  it('should warn about declared but empty tags', () => {
    const findings = rule.run(buildContext([repo('alpha', { tags: [] })]));

    expect(findings.map((f) => [f.code, f.severity, f.message])).toEqual([['M010', 'warning', 'No tags declared']]);
  });
});
