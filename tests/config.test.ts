/**
 * Strand Tests: Configuration
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { ConfigError, loadConfig, parseConfig } from '../src/index.js';

describe('Strand: Configuration', () => {
  describe('parseConfig', () => {
    it('returns defaults for an empty document', () => {
      expect(parseConfig('')).toEqual({ exclude: [], aliases: {} });
      expect(parseConfig('# nothing here\n')).toEqual({ exclude: [], aliases: {} });
    });

    it('reads every key', () => {
      const config = parseConfig(
        [
          'namespace: str',
          'exclude:',
          '  - randAscii',
          'aliases:',
          '  startsWith: hasPrefix',
        ].join('\n')
      );
      expect(config).toEqual({
        namespace: 'str',
        exclude: ['randAscii'],
        aliases: { startsWith: 'hasPrefix' },
      });
    });

    it('rejects malformed YAML', () => {
      expect(() => parseConfig('exclude: [trim', 'test.yaml')).toThrow(
        /^Invalid YAML in test\.yaml: /
      );
    });

    it('rejects a document that is not a mapping', () => {
      expect(() => parseConfig('- trim', 'test.yaml')).toThrow(
        'Invalid YAML in test.yaml: document root must be a mapping'
      );
      expect(() => parseConfig('just text', 'test.yaml')).toThrow(ConfigError);
    });

    it('rejects unknown keys', () => {
      expect(() => parseConfig('colour: red', 'test.yaml')).toThrow(
        'Invalid "colour" in test.yaml: unknown key'
      );
    });

    it('validates the namespace', () => {
      expect(() => parseConfig('namespace: "a b"', 'test.yaml')).toThrow(
        'Invalid "namespace" in test.yaml: must be letters, digits, "_" or "-"'
      );
    });

    it('validates exclusions', () => {
      expect(() => parseConfig('exclude: trim', 'test.yaml')).toThrow(
        'Invalid "exclude" in test.yaml: must be a list of function names'
      );
      expect(() => parseConfig('exclude: [shout]', 'test.yaml')).toThrow(
        'Invalid "exclude" in test.yaml: unknown function shout'
      );
    });

    it('validates aliases', () => {
      expect(() => parseConfig('aliases: [trim]', 'test.yaml')).toThrow(
        'Invalid "aliases" in test.yaml: must be a mapping of alias to function name'
      );
      expect(() => parseConfig('aliases:\n  x: shout', 'test.yaml')).toThrow(
        'Invalid "aliases" in test.yaml: alias x targets unknown function shout'
      );
    });

    it('carries the error id', () => {
      try {
        parseConfig('colour: red', 'test.yaml');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        expect(error).toMatchObject({ errorId: 'STRAND-C003' });
      }
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'strand-config-'));
    });

    afterAll(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('reads a YAML file', async () => {
      const file = path.join(dir, 'strand.config.yaml');
      await fs.writeFile(file, 'namespace: text\nexclude: [randAscii]\n');
      await expect(loadConfig(file)).resolves.toEqual({
        namespace: 'text',
        exclude: ['randAscii'],
        aliases: {},
      });
    });

    it('names the file in parse errors', async () => {
      const file = path.join(dir, 'broken.yaml');
      await fs.writeFile(file, 'colour: red\n');
      await expect(loadConfig(file)).rejects.toThrow(`Invalid "colour" in ${file}: unknown key`);
    });

    it('reports unreadable files', async () => {
      await expect(loadConfig(path.join(dir, 'missing.yaml'))).rejects.toMatchObject({
        errorId: 'STRAND-C001',
      });
    });
  });
});
