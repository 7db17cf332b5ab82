import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { buildCategoryTable, DEFAULT_THRESHOLDS } from './scoring/categories.js';
import type { AppConfig } from './types.js';

export const DEFAULT_MODELS = [
  'allenai/specter2_base',
  'sentence-transformers/all-mpnet-base-v2',
  'sentence-transformers/all-MiniLM-L6-v2',
];

const CategorySchema = z.enum(['Highly Relevant', 'Moderately Relevant', 'Somewhat Relevant', 'Low Relevance']);

const AppConfigSchema = z.object({
  storage: z.object({
    root: z.string().min(1).default('./data'),
  }).default({}),
  context: z.object({
    file: z.string().min(1).default('research_context.txt'),
  }).default({}),
  encoder: z.object({
    models: z.array(z.string().min(1)).min(1).default(() => [...DEFAULT_MODELS]),
    endpoint: z.string().url().default('https://api-inference.huggingface.co/pipeline/feature-extraction'),
    apiKeyEnv: z.string().min(1).nullable().default('HF_TOKEN'),
    timeoutMs: z.number().int().min(1000).default(60_000),
  }).default({}),
  scoring: z.object({
    thresholds: z.array(
      z.object({
        min: z.number(),
        category: CategorySchema,
      })
    ).min(1).default(() => DEFAULT_THRESHOLDS.map((t) => ({ ...t }))),
    updateTolerance: z.number().min(0).default(1.0),
  }).default({}),
  arxiv: z.object({
    maxResults: z.number().int().min(1).max(100).default(10),
  }).default({}),
});

export function loadYamlFile(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, 'utf8');
  return YAML.parse(raw);
}

export function parseConfig(raw: unknown): AppConfig {
  const parsed = AppConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid config: ${issues.join('; ')}`, { cause: parsed.error });
  }
  const config = parsed.data;
  // Fail at load time rather than on the first score.
  buildCategoryTable(config.scoring.thresholds);
  return config;
}

export function loadConfig(repoRoot: string): AppConfig {
  const configPath = path.join(repoRoot, 'config.yml');
  if (!fs.existsSync(configPath)) {
    throw new Error(`Missing config.yml at ${configPath}. Copy config.example.yml → config.yml and edit.`);
  }
  const config = parseConfig(loadYamlFile(configPath));
  // Relative paths in config.yml are relative to the file, not the shell.
  return {
    ...config,
    storage: { root: path.resolve(repoRoot, config.storage.root) },
    context: { file: path.resolve(repoRoot, config.context.file) },
  };
}
