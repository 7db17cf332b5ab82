import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_MODELS, loadConfig, parseConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('parseConfig', () => {
  it('fills every default from an empty document', () => {
    expect(parseConfig(null)).toEqual({
      storage: { root: './data' },
      context: { file: 'research_context.txt' },
      encoder: {
        models: DEFAULT_MODELS,
        endpoint: 'https://api-inference.huggingface.co/pipeline/feature-extraction',
        apiKeyEnv: 'HF_TOKEN',
        timeoutMs: 60_000,
      },
      scoring: {
        thresholds: [
          { min: 85, category: 'Highly Relevant' },
          { min: 60, category: 'Moderately Relevant' },
          { min: 30, category: 'Somewhat Relevant' },
        ],
        updateTolerance: 1,
      },
      arxiv: { maxResults: 10 },
    });
  });

  it('keeps configured values', () => {
    const config = parseConfig({
      encoder: { models: ['hash:512'], apiKeyEnv: null },
      scoring: { thresholds: [{ min: 70, category: 'Highly Relevant' }], updateTolerance: 0.5 },
    });
    expect(config.encoder.models).toEqual(['hash:512']);
    expect(config.encoder.apiKeyEnv).toBeNull();
    expect(config.scoring).toEqual({ thresholds: [{ min: 70, category: 'Highly Relevant' }], updateTolerance: 0.5 });
  });

  it('rejects an unknown category as a ConfigError naming the field', () => {
    const run = () => parseConfig({ scoring: { thresholds: [{ min: 70, category: 'Must Read' }] } });
    expect(run).toThrow(ConfigError);
    expect(run).toThrow(/^Invalid config: scoring\.thresholds\.0\.category: /);
    let caught: unknown;
    try {
      run();
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({ code: 'CONFIG_INVALID', cause: expect.any(Error) });
  });

  it('rejects a non-monotone threshold table at load time', () => {
    expect(() => parseConfig({
      scoring: {
        thresholds: [
          { min: 90, category: 'Somewhat Relevant' },
          { min: 50, category: 'Highly Relevant' },
        ],
      },
    })).toThrow(ConfigError);
  });

  it('rejects an empty model chain', () => {
    expect(() => parseConfig({ encoder: { models: [] } })).toThrow(ConfigError);
  });
});

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'paper-triage-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('explains how to create a missing config.yml', () => {
    expect(() => loadConfig(tmpDir)).toThrow(
      `Missing config.yml at ${path.join(tmpDir, 'config.yml')}. Copy config.example.yml → config.yml and edit.`,
    );
  });

  it('resolves relative paths against the config directory', () => {
    fs.writeFileSync(path.join(tmpDir, 'config.yml'), 'storage:\n  root: ./store\ncontext:\n  file: notes/context.txt\n');
    const config = loadConfig(tmpDir);
    expect(config.storage.root).toBe(path.join(tmpDir, 'store'));
    expect(config.context.file).toBe(path.join(tmpDir, 'notes', 'context.txt'));
  });

  it('leaves absolute paths alone', () => {
    fs.writeFileSync(path.join(tmpDir, 'config.yml'), 'storage:\n  root: /var/lib/papers\n');
    expect(loadConfig(tmpDir).storage.root).toBe('/var/lib/papers');
  });
});
