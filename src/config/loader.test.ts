/**
 * Tests for configuration loading.
 */

import { describe, it, expect, afterEach, beforeAll, afterAll, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import pino from 'pino';
import { ConfigValidationError, deepMerge, loadConfig, resolveConfig } from './loader.js';
import { DEFAULT_CONFIG } from './types.js';

function validationError(action: () => unknown): ConfigValidationError {
  try {
    action();
  } catch (err) {
    if (err instanceof ConfigValidationError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected a ConfigValidationError');
}

describe('resolveConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('fills in defaults', () => {
    expect(resolveConfig({})).toEqual(DEFAULT_CONFIG);
    expect(resolveConfig({ logging: { level: 'debug' } })).toEqual({
      ...DEFAULT_CONFIG,
      logging: { level: 'debug' },
    });
  });

  it('substitutes environment variables', () => {
    vi.stubEnv('VOCAB_TEST_DIR', '/srv/vocab');
    const config = resolveConfig({ schema: { path: '${VOCAB_TEST_DIR}/as' } });
    expect(config.schema).toEqual({ path: '/srv/vocab/as', recursive: true });
  });

  it('uses the default of an unset variable', () => {
    const config = resolveConfig({ schema: { path: '${VOCAB_TEST_NEVER_SET:-./fallback}' } });
    expect(config.schema.path).toBe('./fallback');
  });

  it('warns about an unset variable without a default', () => {
    const lines: string[] = [];
    const logger = pino({ level: 'warn' }, { write: (line: string) => { lines.push(line); } });

    const config = resolveConfig({ schema: { path: './vocab${VOCAB_TEST_NEVER_SET}' } }, { logger });
    expect(config.schema.path).toBe('./vocab');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({ level: 40, variable: 'VOCAB_TEST_NEVER_SET' });
  });

  it('reads flags from substituted strings', () => {
    vi.stubEnv('VOCAB_TEST_LEGACY', 'true');
    const config = resolveConfig({
      schema: { recursive: 'false' },
      codecs: { duration: { legacyMonths: '${VOCAB_TEST_LEGACY}' } },
    });
    expect(config.schema.recursive).toBe(false);
    expect(config.codecs.duration.legacyMonths).toBe(true);
  });

  it('names the offending path', () => {
    const level = validationError(() => resolveConfig({ logging: { level: 'loud' } }));
    expect(level.path).toBe('logging.level');
    expect(level.value).toBe('loud');

    const path = validationError(() => resolveConfig({ schema: { path: '' } }));
    expect(path.message).toBe("Config validation error at 'schema.path': path must not be empty");
  });

  it('rejects a document that is not an object', () => {
    const err = validationError(() => resolveConfig(['a']));
    expect(err.message).toBe("Config validation error at '': must be an object");
  });
});

describe('deepMerge', () => {
  it('merges nested objects and lets the source win', () => {
    expect(deepMerge({ a: { b: 1, c: 2 }, d: [1] }, { a: { c: 3 }, d: [2], e: undefined })).toEqual({
      a: { b: 1, c: 3 },
      d: [2],
    });
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'vocab-config-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns defaults when the file is missing', async () => {
    const config = await loadConfig({ configPath: join(dir, 'missing.yaml') });
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config).not.toBe(DEFAULT_CONFIG);
  });

  it('reads a YAML file', async () => {
    const path = join(dir, 'vocab.config.yaml');
    await writeFile(path, 'schema:\n  path: ./schemas\n  recursive: false\nlogging:\n  level: warn\n');

    const config = await loadConfig({ configPath: path });
    expect(config).toEqual({
      schema: { path: './schemas', recursive: false },
      logging: { level: 'warn' },
      codecs: { duration: { legacyMonths: false } },
    });
  });

  it('treats an empty file as all defaults', async () => {
    const path = join(dir, 'empty.yaml');
    await writeFile(path, '');
    expect(await loadConfig({ configPath: path })).toEqual(DEFAULT_CONFIG);
  });

  it('rejects unparseable YAML', async () => {
    const path = join(dir, 'broken.yaml');
    await writeFile(path, 'schema: [unclosed\n');
    await expect(loadConfig({ configPath: path })).rejects.toThrow(/^Failed to parse config file: /);
  });
});
