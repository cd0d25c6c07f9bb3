/**
 * Tests for YAML utility functions.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { parseYaml, parseYamlWithSchema, loadYamlWithSchema } from '../../../src/utils/yaml.js';
import { ConfigError, ErrorCodes } from '../../../src/utils/errors.js';

const Schema = z.object({
  name: z.string(),
  count: z.number().default(1),
});

describe('parseYaml', () => {
  it('should parse nested YAML', () => {
    expect(parseYaml('config:\n  items:\n    - one\n    - two\n')).toEqual({
      config: { items: ['one', 'two'] },
    });
  });

  it('should throw ConfigError on invalid YAML', () => {
    expect(() => parseYaml('key: [unclosed')).toThrow(ConfigError);
    try {
      parseYaml('key: [unclosed');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.code).toBe(ErrorCodes.PARSE_ERROR);
        expect(error.message).toMatch(/^Failed to parse YAML: /);
      }
    }
  });
});

describe('parseYamlWithSchema', () => {
  it('should validate and apply defaults', () => {
    expect(parseYamlWithSchema('name: demo\n', Schema)).toEqual({ name: 'demo', count: 1 });
  });

  it('should report the failing path', () => {
    expect(() => parseYamlWithSchema('name: 3\n', Schema)).toThrow(/YAML validation failed: name: /);
  });
});

describe('loadYamlWithSchema', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'featurekit-yaml-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should load a file', () => {
    const file = path.join(tempDir, 'c.yaml');
    fs.writeFileSync(file, 'name: demo\ncount: 4\n');

    expect(loadYamlWithSchema(file, Schema)).toEqual({ name: 'demo', count: 4 });
  });

  it('should append the file path to validation errors', () => {
    const file = path.join(tempDir, 'c.yaml');
    fs.writeFileSync(file, 'count: 4\n');

    expect(() => loadYamlWithSchema(file, Schema)).toThrow(`(file: ${file})`);
  });

  it('should throw ConfigError when the file cannot be read', () => {
    const file = path.join(tempDir, 'missing.yaml');

    expect(() => loadYamlWithSchema(file, Schema)).toThrow(`Failed to read YAML file: ${file}`);
  });
});
