// Configuration management

import { promises as fs } from 'fs';
import path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { JUDGE_PROVIDERS } from '../llm/types.js';
import type { JudgeProvider } from '../llm/types.js';
import { PROVIDER_DEFAULTS } from '../llm/provider-factory.js';
import { CANDIDATE_CATEGORIES } from '../sources/types.js';
import { getConfigFilePath } from './app-paths.js';
import { validateWith } from './error-handler.js';
import { logger } from './logger.js';

// Load .env file
dotenv.config();

const positiveInt = z.number().int().positive();

const judgeSchema = z.object({
  provider: z.enum(['openai', 'anthropic', 'ollama']),
  endpoint: z.string().url(),
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1),
  maxTokens: positiveInt,
  temperature: z.number().min(0).max(2),
  timeoutMs: positiveInt,
});

const rankingSchema = z.object({
  maxKeywords: positiveInt,
  maxFiles: positiveInt,
  maxFileBytes: positiveInt,
  maxDepth: positiveInt,
  recentCommitWindow: positiveInt,
  commandTimeoutMs: positiveInt,
});

const gatheringSchema = z.object({
  treeDepth: positiveInt,
  commitCount: positiveInt,
  memoryPaths: z.array(z.string()).optional(),
});

const selectionSchema = z.object({
  threshold: z.number().min(0).max(1),
  maxTokens: z.number().int().nonnegative().optional(),
  platform: z.string().min(1),
  budgetFraction: z.number().gt(0).max(1),
  reservedFraction: z.number().min(0).max(1),
  reservedCategories: z.array(z.enum(CANDIDATE_CATEGORIES)),
});

export const appConfigSchema = z.object({
  judge: judgeSchema,
  ranking: rankingSchema,
  gathering: gatheringSchema,
  selection: selectionSchema,
});

export type AppConfig = z.infer<typeof appConfigSchema>;

type Env = Record<string, string | undefined>;

function isJudgeProvider(value: string | undefined): value is JudgeProvider {
  return JUDGE_PROVIDERS.some((provider) => provider === value);
}

function getDefaultProvider(env: Env): JudgeProvider {
  const envProvider = env.JUDGE_PROVIDER?.toLowerCase();
  if (isJudgeProvider(envProvider)) return envProvider;
  if (env.ANTHROPIC_API_KEY) return 'anthropic';
  if (env.OPENAI_API_KEY) return 'openai';
  return 'anthropic';
}

function providerApiKey(provider: JudgeProvider, env: Env): string | undefined {
  if (env.JUDGE_API_KEY) return env.JUDGE_API_KEY;
  if (provider === 'anthropic') return env.ANTHROPIC_API_KEY || undefined;
  if (provider === 'openai') return env.OPENAI_API_KEY || undefined;
  return undefined;
}

/**
 * Built-in defaults. Endpoint, model and API key follow `provider`, which is
 * taken from the environment unless given.
 */
export function getDefaultConfig(env: Env = process.env, provider: JudgeProvider = getDefaultProvider(env)): AppConfig {
  const providerDefaults = PROVIDER_DEFAULTS[provider];

  return {
    judge: {
      provider,
      endpoint: env.JUDGE_ENDPOINT || providerDefaults.endpoint,
      apiKey: providerApiKey(provider, env),
      model: env.JUDGE_MODEL || providerDefaults.model,
      maxTokens: 4096,
      temperature: 0,
      timeoutMs: 60_000,
    },
    ranking: {
      maxKeywords: 10,
      maxFiles: 50,
      maxFileBytes: 100_000,
      maxDepth: 8,
      recentCommitWindow: 10,
      commandTimeoutMs: 10_000,
    },
    gathering: {
      treeDepth: 4,
      commitCount: 20,
    },
    selection: {
      threshold: 0.5,
      platform: env.CONTEXT_PRIME_PLATFORM || 'claude-code',
      budgetFraction: 0.25,
      reservedFraction: 0.15,
      reservedCategories: ['memory', 'project-config'],
    },
  };
}

export type ConfigObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(target: ConfigObject, source: ConfigObject): ConfigObject {
  const result: ConfigObject = { ...target };
  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    if (isPlainObject(value)) {
      result[key] = deepMerge(isPlainObject(existing) ? existing : {}, value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

async function readConfigFile(configFile: string): Promise<ConfigObject> {
  let raw: string;
  try {
    raw = await fs.readFile(configFile, 'utf-8');
  } catch {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    if (isPlainObject(parsed)) return parsed;
    logger.warn(`Ignoring ${configFile}: not a JSON object`);
  } catch (error) {
    logger.warn(`Ignoring ${configFile}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return {};
}

export interface LoadConfigOptions {
  configFile?: string;
  env?: Env;
}

/**
 * Defaults (environment-aware, for the provider the file names), overridden
 * by the config file.
 *
 * @throws ValidationError when the merged configuration is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const fileConfig = await readConfigFile(options.configFile ?? getConfigFilePath());
  return validateWith(appConfigSchema, withDefaults(fileConfig, options.env), 'configuration');
}

function configuredProvider(fileConfig: ConfigObject): JudgeProvider | undefined {
  const value = getValueAtPath(fileConfig, 'judge.provider');
  return typeof value === 'string' && isJudgeProvider(value) ? value : undefined;
}

// A provider chosen in the file brings its own endpoint, model and key defaults
function withDefaults(fileConfig: ConfigObject, env: Env = process.env): ConfigObject {
  return deepMerge(getDefaultConfig(env, configuredProvider(fileConfig)), fileConfig);
}

export async function saveConfig(config: ConfigObject, configFile: string = getConfigFilePath()): Promise<void> {
  await fs.mkdir(path.dirname(configFile), { recursive: true });

  const current = await readConfigFile(configFile);
  const merged = deepMerge(current, config);

  await fs.writeFile(configFile, JSON.stringify(merged, null, 2), 'utf-8');
}

export function getValueAtPath(source: unknown, key: string): unknown {
  let value: unknown = source;
  for (const segment of key.split('.')) {
    if (!isPlainObject(value)) return undefined;
    value = value[segment];
  }
  return value;
}

/**
 * Build the nested object `{ a: { b: value } }` for the key `a.b`.
 */
export function objectAtPath(key: string, value: unknown): ConfigObject {
  const segments = key.split('.').filter(Boolean);
  if (segments.length === 0) {
    throw new Error(`Invalid configuration key: "${key}"`);
  }
  let result: ConfigObject = { [segments[segments.length - 1]]: value };
  for (let i = segments.length - 2; i >= 0; i--) {
    result = { [segments[i]]: result };
  }
  return result;
}

/**
 * Parse a CLI value: JSON when it parses, otherwise the raw string.
 */
export function parseConfigValue(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

export async function getConfigValue(key: string, options: LoadConfigOptions = {}): Promise<unknown> {
  return getValueAtPath(await loadConfig(options), key);
}

/**
 * Persist one dotted key, refusing values that would make the configuration
 * invalid.
 */
export async function setConfigValue(key: string, value: string, configFile: string = getConfigFilePath()): Promise<void> {
  const patch = objectAtPath(key, parseConfigValue(value));
  const next = withDefaults(deepMerge(await readConfigFile(configFile), patch));
  validateWith(appConfigSchema, next, 'configuration');
  await saveConfig(patch, configFile);
}
