/**
 * scenelex Tests: Configuration
 * Parsing, validation and loading of .scenelex.yaml
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  parseConfig,
} from '../src/config.js';

describe('scenelex: Configuration', () => {
  describe('parseConfig', () => {
    it('returns the defaults for an empty document', () => {
      expect(parseConfig('')).toEqual({
        format: 'human',
        includeComments: true,
        contextLines: 2,
      });
    });

    it('merges given values over the defaults', () => {
      expect(parseConfig('format: compact\ncontextLines: 0\n')).toEqual({
        format: 'compact',
        includeComments: true,
        contextLines: 0,
      });
    });

    it('reads every key', () => {
      const text = 'format: json\nincludeComments: false\ncontextLines: 10\n';

      expect(parseConfig(text)).toEqual({
        format: 'json',
        includeComments: false,
        contextLines: 10,
      });
    });

    it('rejects a document that is not a mapping', () => {
      expect(() => parseConfig('- human\n')).toThrow(
        'Invalid configuration: must be a mapping'
      );
    });

    it('rejects unknown keys', () => {
      expect(() => parseConfig('colour: true\n')).toThrow(
        'Invalid configuration: unknown key colour'
      );
    });

    it('rejects an unknown format', () => {
      expect(() => parseConfig('format: xml\n')).toThrow(
        `Invalid configuration: format "xml" (must be 'human', 'json', or 'compact')`
      );
    });

    it('rejects a non-boolean includeComments', () => {
      expect(() => parseConfig('includeComments: "no"\n')).toThrow(
        'Invalid configuration: includeComments must be a boolean'
      );
    });

    it.each(['-1', '11', '2.5', 'two'])(
      'rejects contextLines: %s',
      (value) => {
        expect(() => parseConfig(`contextLines: ${value}\n`)).toThrow(
          'Invalid configuration: contextLines must be an integer between 0 and 10'
        );
      }
    );

    it('wraps YAML syntax errors', () => {
      expect(() => parseConfig('format: [human\n')).toThrow(
        /^Invalid configuration: /
      );
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'scenelex-config-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('returns null when no configuration file exists', () => {
      expect(loadConfig(dir)).toBeNull();
    });

    it('loads the configuration file from the directory', () => {
      writeFileSync(join(dir, CONFIG_FILE_NAME), 'includeComments: false\n');

      expect(loadConfig(dir)).toEqual({
        ...createDefaultConfig(),
        includeComments: false,
      });
    });

    it('propagates validation errors', () => {
      writeFileSync(join(dir, CONFIG_FILE_NAME), 'format: 42\n');

      expect(() => loadConfig(dir)).toThrow(
        `Invalid configuration: format "42" (must be 'human', 'json', or 'compact')`
      );
    });
  });
});
