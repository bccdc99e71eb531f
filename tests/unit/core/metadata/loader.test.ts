/**
 * Tests for the metadata loader.
 */
import { describe, it, expect } from 'vitest';
import { loadEcosystem } from '../../../../src/core/metadata/loader.js';
import { MalformedMetadataError, ErrorCodes } from '../../../../src/utils/errors.js';

function descriptor(name: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name,
    layer: 'protocol',
    status: 'stable',
    short_description: `${name} repository`,
    dependencies: [],
    tags: ['core'],
    license: 'MIT',
    ...extra,
  };
}

describe('loadEcosystem', () => {
  describe('index shapes', () => {
    it('should load a list of descriptors', () => {
      const result = loadEcosystem({ index: [descriptor('alpha'), descriptor('beta')] });

      expect([...result.records.keys()]).toEqual(['alpha', 'beta']);
      expect(result.findings).toEqual([]);
    });

    it('should load a name to descriptor mapping', () => {
      const result = loadEcosystem({ index: { alpha: descriptor('alpha'), beta: descriptor('beta') } });

      expect([...result.records.keys()]).toEqual(['alpha', 'beta']);
    });

    it('should load a repos list and index-level declarations', () => {
      const result = loadEcosystem({
        index: { version: '1.0', generated: '2026-01-02T00:00:00Z', total_repos: 2, repos: [descriptor('alpha')] },
      });

      expect(result.records.size).toBe(1);
      expect(result.declarations).toEqual({
        version: '1.0',
        generated: '2026-01-02T00:00:00Z',
        totalRepos: 2,
        publicRepos: undefined,
        privateRepos: undefined,
      });
    });

    it('should use the mapping key as the name', () => {
      const { name: _name, ...withoutName } = descriptor('alpha');
      const result = loadEcosystem({ index: { repos: { alpha: withoutName } } });

      expect(result.records.get('alpha')?.name).toBe('alpha');
      expect(result.findings).toEqual([]);
    });
  });

  describe('fatal input', () => {
    it('should reject a scalar index', () => {
      expect(() => loadEcosystem({ index: 'not an index' })).toThrow(MalformedMetadataError);
    });

    it('should reject a repos field that is neither list nor mapping', () => {
      expect(() => loadEcosystem({ index: { repos: 42 } })).toThrow("Index field 'repos' must be a list or a mapping");
    });

    it('should name the record that is not an object', () => {
      expect(() => loadEcosystem({ index: [descriptor('alpha'), 'beta'] })).toThrow('Record repos[1] is not an object');
    });

    it('should reject a list entry without a name', () => {
      try {
        loadEcosystem({ index: [{ layer: 'protocol' }] });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedMetadataError);
        if (error instanceof MalformedMetadataError) {
          expect(error.code).toBe(ErrorCodes.MISSING_NAME);
          expect(error.details).toEqual({ record: 'repos[0]', field: 'name' });
        }
      }
    });

    it('should reject an override that is not an object', () => {
      expect(() => loadEcosystem({ index: [descriptor('alpha')], overrides: { alpha: ['x'] } })).toThrow(
        "Override for 'alpha' is not an object"
      );
    });
  });

  describe('required fields', () => {
    it('should report exactly one finding for a missing license', () => {
      const { license: _license, ...withoutLicense } = descriptor('alpha');
      const result = loadEcosystem({ index: [withoutLicense] });

      expect(result.findings).toHaveLength(1);
      expect(result.findings[0]).toEqual({
        severity: 'blocking',
        category: 'metadata',
        code: 'M001',
        rule: 'loader',
        subject: 'alpha',
        message: 'Missing required field: license',
        remediation: "Add 'license' to the repository descriptor",
      });
    });

    it('should treat null as missing', () => {
      const result = loadEcosystem({ index: [descriptor('alpha', { layer: null })] });

      expect(result.findings.map((f) => f.message)).toEqual(['Missing required field: layer']);
    });

    it('should honour a custom required field list', () => {
      const result = loadEcosystem({ index: [{ name: 'alpha' }] }, { requiredFields: ['name', 'url'] });

      expect(result.findings.map((f) => f.message)).toEqual(['Missing required field: url']);
    });
  });

  describe('field validation', () => {
    it('should report ill-typed fields and drop them', () => {
      const result = loadEcosystem({ index: [descriptor('alpha', { tags: 'core', license: 3 })] });
      const record = result.records.get('alpha');

      expect(result.findings.map((f) => [f.code, f.message])).toEqual([
        ['M002', "Field 'license' has an invalid value (number)"],
        ['M002', "Field 'tags' has an invalid value (string)"],
      ]);
      expect(record?.tags).toEqual([]);
      expect(record?.license).toBeUndefined();
    });

    it('should report an over-long short description', () => {
      const result = loadEcosystem(
        { index: [descriptor('alpha', { short_description: 'x'.repeat(12) })] },
        { maxDescriptionLength: 10 }
      );

      expect(result.findings).toHaveLength(1);
      expect(result.findings[0].code).toBe('M003');
      expect(result.findings[0].message).toBe('short_description exceeds 10 chars (12 chars)');
    });

    it('should report unknown fields as info and accept generated ones', () => {
      const result = loadEcosystem({ index: [descriptor('alpha', { colour: 'blue', local_path: '/tmp/alpha' })] });

      expect(result.findings).toHaveLength(1);
      expect(result.findings[0].severity).toBe('info');
      expect(result.findings[0].message).toBe("Unknown field 'colour' ignored");
    });

    it('should normalize dates and spec versions', () => {
      const result = loadEcosystem({
        index: [descriptor('alpha', { updated: new Date('2026-03-04T10:00:00Z'), spec_version: 2 })],
      });
      const record = result.records.get('alpha');

      expect(record?.updated).toBe('2026-03-04');
      expect(record?.specVersion).toBe('2');
    });
  });

  describe('dependencies', () => {
    it('should treat bare names as direct dependencies', () => {
      const result = loadEcosystem({
        index: [descriptor('alpha', { dependencies: ['beta', { name: 'gamma', type: 'conceptual' }] })],
      });

      expect(result.records.get('alpha')?.dependencies).toEqual([
        { name: 'beta', type: 'direct' },
        { name: 'gamma', type: 'conceptual' },
      ]);
    });

    it('should report unknown edge types and fall back to direct', () => {
      const result = loadEcosystem({
        index: [descriptor('alpha', { dependencies: [{ name: 'beta', type: 'runtime' }] })],
      });

      expect(result.records.get('alpha')?.dependencies).toEqual([{ name: 'beta', type: 'direct' }]);
      expect(result.findings.map((f) => f.code)).toEqual(['D004']);
    });
  });

  describe('names', () => {
    it('should keep the first of duplicate names', () => {
      const result = loadEcosystem({
        index: [descriptor('alpha', { layer: 'runtime' }), descriptor('alpha', { layer: 'research' })],
      });

      expect(result.records.size).toBe(1);
      expect(result.records.get('alpha')?.layer).toBe('runtime');
      expect(result.findings.map((f) => f.message)).toEqual([
        'Duplicate repository name (repos[1]); first occurrence kept',
      ]);
    });

    it('should report a declared name that differs from its key', () => {
      const result = loadEcosystem({ index: { alpha: descriptor('alfa') } });

      expect(result.records.has('alpha')).toBe(true);
      expect(result.findings.map((f) => f.code)).toEqual(['M005']);
    });
  });

  describe('deprecation', () => {
    it('should mark deprecated status and the deprecated flag', () => {
      const result = loadEcosystem({
        index: [descriptor('alpha', { status: 'deprecated' }), descriptor('beta', { deprecated: true }), descriptor('gamma')],
      });

      expect(result.records.get('alpha')?.deprecated).toBe(true);
      expect(result.records.get('beta')?.deprecated).toBe(true);
      expect(result.records.get('gamma')?.deprecated).toBe(false);
    });
  });

  describe('overrides', () => {
    it('should merge override fields over the index descriptor', () => {
      const result = loadEcosystem({
        index: [descriptor('alpha')],
        overrides: { alpha: { status: 'beta', url: 'https://alpha.example.org' } },
      });
      const record = result.records.get('alpha');

      expect(record?.status).toBe('beta');
      expect(record?.url).toBe('https://alpha.example.org');
      expect(record?.layer).toBe('protocol');
    });

    it('should supply missing fields from an override', () => {
      const { license: _license, ...withoutLicense } = descriptor('alpha');
      const result = loadEcosystem({ index: [withoutLicense], overrides: { alpha: { license: 'Apache-2.0' } } });

      expect(result.findings).toEqual([]);
      expect(result.records.get('alpha')?.license).toBe('Apache-2.0');
    });

    it('should not let an override rename a record', () => {
      const result = loadEcosystem({ index: [descriptor('alpha')], overrides: { alpha: { name: 'omega' } } });

      expect(result.records.get('alpha')?.name).toBe('alpha');
    });

    it('should report overrides for unknown repositories', () => {
      const result = loadEcosystem({ index: [descriptor('alpha')], overrides: { ghost: { status: 'beta' } } });

      expect(result.findings).toHaveLength(1);
      expect(result.findings[0].code).toBe('M009');
      expect(result.findings[0].subject).toBe('ghost');
      expect(result.findings[0].severity).toBe('info');
    });
  });
});
