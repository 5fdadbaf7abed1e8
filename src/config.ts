import { readFileSync } from 'node:fs';
import dotenv from 'dotenv';
import type { SafeSearch } from './types.js';
import type { LogFormatName, LogLevelName } from './logger.js';
import { ConfigurationError } from './errors.js';

export interface AssistantConfig {
  systemPrompt: string;
  conversationMemory: boolean;
  maxContextMessages: number;
  autoSummarizeContext: boolean;
  dataRetentionHours: number;
  anonymizeData: boolean;
  retryAttempts: number;
  ocrRateLimit: number;
  webRateLimit: number;
  maxCacheSize: number;
  webSearchMaxResults: number;
  webSearchSafesearch: SafeSearch;
  logLevel: LogLevelName;
  logFormat: LogFormatName;
}

export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful personal assistant. Be concise and helpful.';

export interface LoadConfigOptions {
  /** Variables to read (default: process.env) */
  env?: Record<string, string | undefined>;

  /** Dotenv file whose values fill in variables missing from `env` */
  envFile?: string;
}

const SAFESEARCH_VALUES = ['strict', 'moderate', 'off'] as const;
const LOG_LEVEL_VALUES = ['debug', 'info', 'warn', 'error', 'silent'] as const;
const LOG_FORMAT_VALUES = ['pretty', 'json'] as const;

/**
 * Read assistant settings from environment variables.
 * Throws ConfigurationError naming the first invalid variable.
 */
export function loadConfig(options: LoadConfigOptions = {}): Readonly<AssistantConfig> {
  const fileValues = options.envFile ? readEnvFile(options.envFile) : {};
  const env = { ...fileValues, ...definedOnly(options.env ?? process.env) };

  const config: AssistantConfig = {
    systemPrompt: env.ASSISTANT_SYSTEM_PROMPT || DEFAULT_SYSTEM_PROMPT,
    conversationMemory: readBoolean(env, 'ASSISTANT_CONVERSATION_MEMORY', true),
    maxContextMessages: readPositiveInt(env, 'ASSISTANT_MAX_CONTEXT_MESSAGES', 10),
    autoSummarizeContext: readBoolean(env, 'ASSISTANT_AUTO_SUMMARIZE_CONTEXT', false),
    dataRetentionHours: readPositiveInt(env, 'ASSISTANT_DATA_RETENTION_HOURS', 24),
    anonymizeData: readBoolean(env, 'ASSISTANT_ANONYMIZE_DATA', false),
    retryAttempts: readPositiveInt(env, 'ASSISTANT_RETRY_ATTEMPTS', 3),
    ocrRateLimit: readPositiveInt(env, 'ASSISTANT_OCR_RATE_LIMIT', 10),
    webRateLimit: readPositiveInt(env, 'ASSISTANT_WEB_RATE_LIMIT', 20),
    maxCacheSize: readPositiveInt(env, 'ASSISTANT_MAX_CACHE_SIZE', 1000),
    webSearchMaxResults: readPositiveInt(env, 'WEB_SEARCH_MAX_RESULTS', 5),
    webSearchSafesearch: readChoice(env, 'WEB_SEARCH_SAFESEARCH', SAFESEARCH_VALUES, 'moderate'),
    logLevel: readChoice(env, 'ASSISTANT_LOG_LEVEL', LOG_LEVEL_VALUES, 'info'),
    logFormat: readChoice(env, 'ASSISTANT_LOG_FORMAT', LOG_FORMAT_VALUES, 'pretty'),
  };

  return Object.freeze(config);
}

function readEnvFile(path: string): Record<string, string> {
  let contents: string;
  try {
    contents = readFileSync(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`cannot read env file ${path}`, {
      path,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return dotenv.parse(contents);
}

function definedOnly(env: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

function readBoolean(env: Record<string, string>, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  switch (raw.toLowerCase()) {
    case 'true':
      return true;
    case 'false':
      return false;
    default:
      throw new ConfigurationError(`${name} must be true or false`, { [name]: raw });
  }
}

function readPositiveInt(env: Record<string, string>, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer`, { [name]: raw });
  }
  return value;
}

function readChoice<T extends string>(
  env: Record<string, string>,
  name: string,
  choices: readonly T[],
  fallback: T
): T {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;

  const match = choices.find(choice => choice === raw);
  if (match === undefined) {
    throw new ConfigurationError(`${name} must be one of ${choices.join(', ')}`, { [name]: raw });
  }
  return match;
}
