/**
 * Configuration management for readme-refresh
 * Loads and validates environment variables once at process start
 */

import { homedir } from 'os';
import { join } from 'path';

export type LLMProvider = 'ollama' | 'openai' | 'gemini';

export const LLM_PROVIDERS: readonly LLMProvider[] = ['ollama', 'openai', 'gemini'];

interface BaseLLMConfig {
  model: string;
  timeoutMs: number;
  maxTokens: number;
}

export interface OllamaConfig extends BaseLLMConfig {
  provider: 'ollama';
  baseUrl: string;
}

export interface OpenAIConfig extends BaseLLMConfig {
  provider: 'openai';
  apiKey: string;
  baseUrl?: string;
}

export interface GeminiConfig extends BaseLLMConfig {
  provider: 'gemini';
  apiKey: string;
}

export type LLMConfig = OllamaConfig | OpenAIConfig | GeminiConfig;

export interface Config {
  githubToken: string;
  githubTimeoutMs: number;
  llm: LLMConfig;
  backupDir: string;
}

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const DEFAULTS = {
  ollamaModel: 'llama3.1:8b',
  ollamaBaseUrl: 'http://localhost:11434',
  openaiModel: 'gpt-4o-mini',
  geminiModel: 'gemini-1.5-flash',
  llmTimeoutMs: 120_000,
  githubTimeoutMs: 30_000,
  maxTokens: 2048,
};

/**
 * Validates that a required environment variable is set
 */
function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value || value.trim() === '') {
    throw new ConfigError(
      `Missing required environment variable: ${name}\n` +
      `Please set ${name} before running the command.`
    );
  }
  return value.trim();
}

/**
 * Gets an optional environment variable with a default value
 */
function optionalEnv(env: Env, name: string, defaultValue: string): string {
  const value = env[name];
  return value?.trim() || defaultValue;
}

/**
 * Gets an optional positive integer, rejecting anything that does not parse
 */
function optionalInt(env: Env, name: string, defaultValue: number): number {
  const raw = env[name]?.trim();
  if (!raw) return defaultValue;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`Invalid value for ${name}: "${raw}". Expected a positive integer.`);
  }
  return value;
}

function parseProvider(env: Env): LLMProvider {
  const raw = optionalEnv(env, 'LLM_PROVIDER', 'ollama').toLowerCase();
  const provider = LLM_PROVIDERS.find((p) => p === raw);
  if (!provider) {
    throw new ConfigError(
      `Invalid value for LLM_PROVIDER: "${raw}". Expected one of: ${LLM_PROVIDERS.join(', ')}.`
    );
  }
  return provider;
}

/**
 * Loads the language model settings for the configured provider
 */
export function loadLLMConfig(env: Env = process.env): LLMConfig {
  const provider = parseProvider(env);
  const timeoutMs = optionalInt(env, 'LLM_TIMEOUT_MS', DEFAULTS.llmTimeoutMs);
  const maxTokens = optionalInt(env, 'LLM_MAX_TOKENS', DEFAULTS.maxTokens);

  switch (provider) {
    case 'openai': {
      const baseUrl = env['OPENAI_BASE_URL']?.trim();
      return {
        provider,
        apiKey: requireEnv(env, 'OPENAI_API_KEY'),
        model: optionalEnv(env, 'OPENAI_MODEL', DEFAULTS.openaiModel),
        ...(baseUrl ? { baseUrl } : {}),
        timeoutMs,
        maxTokens,
      };
    }
    case 'gemini':
      return {
        provider,
        apiKey: requireEnv(env, 'LLM_API_KEY'),
        model: optionalEnv(env, 'GEMINI_MODEL', DEFAULTS.geminiModel),
        timeoutMs,
        maxTokens,
      };
    case 'ollama':
      return {
        provider,
        model: optionalEnv(env, 'OLLAMA_MODEL', DEFAULTS.ollamaModel),
        baseUrl: optionalEnv(env, 'OLLAMA_BASE_URL', DEFAULTS.ollamaBaseUrl).replace(/\/+$/, ''),
        timeoutMs,
        maxTokens,
      };
  }
}

/**
 * Directory holding README backups
 */
export function loadBackupDir(env: Env = process.env): string {
  return optionalEnv(env, 'README_BACKUP_DIR', join(homedir(), '.readme-refresh', 'backups'));
}

/**
 * Loads and validates configuration from environment variables
 */
export function loadConfig(env: Env = process.env): Config {
  return {
    githubToken: requireEnv(env, 'GITHUB_TOKEN'),
    githubTimeoutMs: optionalInt(env, 'GITHUB_TIMEOUT_MS', DEFAULTS.githubTimeoutMs),
    llm: loadLLMConfig(env),
    backupDir: loadBackupDir(env),
  };
}

/**
 * Validates that every variable a command needs is present
 * Call this early to fail fast with one message listing all of them
 */
export function validateConfig(
  env: Env = process.env,
  needs: { github?: boolean; llm?: boolean } = { github: true, llm: true },
): void {
  const missingVars: string[] = [];

  if (needs.github && !env['GITHUB_TOKEN']?.trim()) {
    missingVars.push('GITHUB_TOKEN');
  }

  if (needs.llm) {
    const provider = parseProvider(env);
    if (provider === 'openai' && !env['OPENAI_API_KEY']?.trim()) {
      missingVars.push('OPENAI_API_KEY');
    }
    if (provider === 'gemini' && !env['LLM_API_KEY']?.trim()) {
      missingVars.push('LLM_API_KEY');
    }
  }

  if (missingVars.length > 0) {
    throw new ConfigError(
      `Missing required environment variables:\n` +
      missingVars.map(v => `  - ${v}`).join('\n') +
      `\n\nPlease set these variables (or add them to .env) before running the command:\n` +
      missingVars.map(v => `  export ${v}=...`).join('\n')
    );
  }
}
