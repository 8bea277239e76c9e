/**
 * Configuration Loader Tests
 * YAML loading, shape validation and lookup in the working directory
 */

import { describe, expect, it, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  CONFIG_FILE_NAME,
  loadConfig,
  loadConfigFile,
  parseConfigData,
} from '../src/config-loader.js';

describe('parseConfigData', () => {
  it('treats an empty document as no settings', () => {
    expect(parseConfigData(null)).toEqual({ input: {}, macroName: undefined });
  });

  it('reads every field', () => {
    const { input, macroName } = parseConfigData({
      nativeTags: ['view', 'text'],
      deferredTag: 'later',
      componentPattern: '^[A-Z]',
      conventions: { attachOne: 'append' },
      macro: 'markup',
    });
    expect(input).toEqual({
      nativeTags: ['view', 'text'],
      deferredTag: 'later',
      componentPattern: '^[A-Z]',
      conventions: { attachOne: 'append' },
    });
    expect(macroName).toBe('markup');
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => parseConfigData(['div'])).toThrow(
      'Invalid configuration: must be a mapping'
    );
  });

  it('rejects unknown fields', () => {
    expect(() => parseConfigData({ tags: ['div'] })).toThrow(
      'Invalid configuration: unknown field tags'
    );
    expect(() => parseConfigData({ conventions: { attach: 'add' } })).toThrow(
      'Invalid configuration: unknown field conventions.attach'
    );
  });

  it('rejects values of the wrong type', () => {
    expect(() => parseConfigData({ nativeTags: 'div' })).toThrow(
      'Invalid configuration: nativeTags must be a list of names'
    );
    expect(() => parseConfigData({ nativeTags: ['div', 3] })).toThrow(
      'Invalid configuration: nativeTags must be a list of names'
    );
    expect(() => parseConfigData({ deferredTag: 3 })).toThrow(
      'Invalid configuration: deferredTag must be a string'
    );
    expect(() => parseConfigData({ conventions: ['x'] })).toThrow(
      'Invalid configuration: conventions must be a mapping'
    );
    expect(() => parseConfigData({ conventions: { attachOne: 5 } })).toThrow(
      'Invalid configuration: conventions.attachOne must be a string'
    );
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'chainmark-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeFile(name: string, content: string): Promise<string> {
    const filePath = path.join(tempDir, name);
    await fs.writeFile(filePath, content, 'utf-8');
    return filePath;
  }

  it('falls back to the defaults without a file', () => {
    const loaded = loadConfig(tempDir);
    expect(loaded.path).toBeNull();
    expect(loaded.macroName).toBeUndefined();
    expect(loaded.markup.deferredTag).toBe('deferred');
  });

  it('finds the configuration file in the working directory', async () => {
    const filePath = await writeFile(
      CONFIG_FILE_NAME,
      'nativeTags:\n  - view\nmacro: markup\n'
    );
    const loaded = loadConfig(tempDir);
    expect(loaded.path).toBe(filePath);
    expect(loaded.macroName).toBe('markup');
    expect(loaded.markup.nativeTags).toEqual(['view']);
  });

  it('resolves an explicit path against the working directory', async () => {
    await writeFile('custom.yaml', 'conventions:\n  attachMany: extend\n');
    const loaded = loadConfig(tempDir, 'custom.yaml');
    expect(loaded.path).toBe(path.join(tempDir, 'custom.yaml'));
    expect(loaded.markup.conventions.attachMany).toBe('extend');
    expect(loaded.markup.conventions.attachOne).toBe('child');
  });

  it('reports a missing explicit file', () => {
    const missing = path.join(tempDir, 'missing.yaml');
    expect(() => loadConfig(tempDir, 'missing.yaml')).toThrow(
      `File not found: ${missing}`
    );
  });

  it('accepts an empty file', async () => {
    await writeFile(CONFIG_FILE_NAME, '');
    expect(loadConfig(tempDir).markup.nativeTags).toEqual([
      'div',
      'svg',
      'img',
      'canvas',
      'anchored',
    ]);
  });

  it('reports malformed YAML', async () => {
    const filePath = await writeFile('broken.yaml', 'nativeTags: [div\n');
    expect(() => loadConfigFile(filePath)).toThrow(
      /^Invalid configuration: invalid YAML \(/
    );
  });

  it('passes semantic checks through from the transformer', async () => {
    const filePath = await writeFile('clash.yaml', 'deferredTag: div\n');
    expect(() => loadConfigFile(filePath)).toThrow(
      'Invalid configuration: deferredTag "div" is also listed in nativeTags'
    );
  });
});
