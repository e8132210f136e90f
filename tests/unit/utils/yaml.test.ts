/**
 * @arch codeout.test.unit
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readFileSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { z } from 'zod';
import {
  parseYaml,
  parseYamlWithSchema,
  loadYamlWithSchema,
  stringifyYaml,
  writeYaml,
} from '../../../src/utils/yaml.js';
import { ConfigError, SystemError } from '../../../src/utils/errors.js';

const Schema = z.object({ name: z.string(), count: z.number().default(1) });

describe('yaml utilities', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `codeout-yaml-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('parseYaml', () => {
    it('should parse mappings', () => {
      expect(parseYaml('a: 1\nb: [x, y]\n')).toEqual({ a: 1, b: ['x', 'y'] });
    });

    it('should throw SystemError S001 on malformed input', () => {
      expect(() => parseYaml('a: [1\n')).toThrow(SystemError);
    });
  });

  describe('parseYamlWithSchema', () => {
    it('should apply schema defaults', () => {
      expect(parseYamlWithSchema('name: dump\n', Schema)).toEqual({ name: 'dump', count: 1 });
    });

    it('should throw ConfigError with the failing path', () => {
      expect(() => parseYamlWithSchema('name: 3\n', Schema)).toThrow(ConfigError);
      expect(() => parseYamlWithSchema('name: 3\n', Schema)).toThrow(/^YAML validation failed: name: /);
    });
  });

  describe('loadYamlWithSchema', () => {
    it('should load a file', async () => {
      const filePath = join(tempDir, 'a.yaml');
      writeFileSync(filePath, 'name: loaded\ncount: 4\n');

      expect(await loadYamlWithSchema(filePath, Schema)).toEqual({ name: 'loaded', count: 4 });
    });

    it('should throw SystemError S002 for a missing file', async () => {
      await expect(loadYamlWithSchema(join(tempDir, 'missing.yaml'), Schema)).rejects.toMatchObject({
        name: 'SystemError',
        code: 'S002',
      });
    });
  });

  describe('stringifyYaml / writeYaml', () => {
    it('should stringify with two-space indentation', () => {
      expect(stringifyYaml({ output: { directory: 'tests' } })).toBe('output:\n  directory: tests\n');
    });

    it('should write into a new directory', async () => {
      const filePath = join(tempDir, 'nested', 'out.yaml');

      await writeYaml(filePath, { enabled: true });

      expect(readFileSync(filePath, 'utf-8')).toBe('enabled: true\n');
    });
  });
});
