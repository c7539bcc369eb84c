// src/config/index.ts
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../errors';

// Resolves to the checked-in config directory from both src/ and dist/.
export const CONFIG_DIR = path.resolve(__dirname, '../../src/config');

const providerProfileSchema = z.discriminatedUnion('backend', [
  z.object({
    backend: z.literal('groq'),
    model: z.string().min(1),
    apiKeyEnv: z.string().min(1),
    baseURL: z.string().url().optional(),
    maxTokens: z.number().int().positive().default(2048),
    temperature: z.number().min(0).max(2).default(0.2),
  }),
  z.object({
    backend: z.literal('openai'),
    model: z.string().min(1),
    apiKeyEnv: z.string().min(1),
    baseURL: z.string().url().optional(),
    maxTokens: z.number().int().positive().default(2048),
    temperature: z.number().min(0).max(2).default(0.2),
  }),
  z.object({
    backend: z.literal('azure-openai'),
    model: z.string().min(1),
    apiKeyEnv: z.string().min(1),
    endpoint: z.string().url(),
    deployment: z.string().min(1),
    apiVersion: z.string().min(1),
    maxTokens: z.number().int().positive().default(2048),
    temperature: z.number().min(0).max(2).default(0.2),
  }),
]);

export type ProviderProfile = z.output<typeof providerProfileSchema>;

const providerFileSchema = z.object({
  profiles: z.record(providerProfileSchema),
});

const splitArgs = (value: string): string[] => value.split(/\s+/).filter(Boolean);
const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  DATA_DIR: z.string().default('.data'),
  PROJECT_STORE: z.enum(['file', 'redis']).default('file'),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  ARTIFACT_ROOT: z.string().optional(),
  TOOL_CONFIG_PATH: z.string().optional(),
  PROVIDER_CONFIG_PATH: z.string().optional(),
  DEFAULT_PROFILE: z.string().default('groq-default'),
  SANDBOX_COMMAND: z.string().default('python3'),
  SANDBOX_ARGS: z.string().default('-m pipeline_tools.runner').transform(splitArgs),
  SANDBOX_INSTALL_ARGS: z.string().default('-m pip install').transform(splitArgs),
  SANDBOX_ROOT: z.string().optional(),
  SANDBOX_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
  SANDBOX_MAX_OUTPUT_BYTES: z.coerce.number().int().positive().default(4 * 1024 * 1024),
  SANDBOX_DENY_NETWORK: z.string().default('').transform(splitArgs),
  CONTEXT_WINDOW_TURNS: z.coerce.number().int().min(2).default(24),
  MAX_CORRECTIVE_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  MAX_MODEL_ROUNDS: z.coerce.number().int().min(1).max(50).default(8),
  ERROR_EXCERPT_CHARS: z.coerce.number().int().min(80).default(1200),
  FOLLOW_UP_SUMMARY: booleanFlag.default('true'),
  LOG_MODEL_CALLS: booleanFlag.default('true'),
  PROVIDER_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(4),
  PROVIDER_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  PROVIDER_MAX_DELAY_MS: z.coerce.number().int().min(0).default(8_000),
});

export interface SandboxSettings {
  command: string;
  args: string[];
  installArgs: string[];
  root: string;
  defaultTimeoutMs: number;
  maxOutputBytes: number;
  denyNetworkWrapper: string[];
}

export interface LoopSettings {
  contextWindowTurns: number;
  maxCorrectiveRetries: number;
  maxModelRounds: number;
  errorExcerptChars: number;
  followUpSummary: boolean;
}

export interface RetrySettings {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  logLevel: string;
  dataDir: string;
  projectStore: { kind: 'file'; dir: string } | { kind: 'redis'; url: string };
  artifactRoot: string;
  toolCatalogPath: string;
  providers: Record<string, ProviderProfile>;
  defaultProfile: string;
  /** Environment the provider credentials are resolved from. */
  credentials: Readonly<Record<string, string | undefined>>;
  providerRetry: RetrySettings;
  sandbox: SandboxSettings;
  loop: LoopSettings;
  /** Write every model request and response under the project's `_logs/model-calls`. */
  logModelCalls: boolean;
}

export function loadProviderProfiles(filePath: string): Record<string, ProviderProfile> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`cannot read provider profiles from ${filePath}: ${reason}`]);
  }
  const parsed = providerFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${filePath}: ${issue.path.join('.')} ${issue.message}`),
    );
  }
  return parsed.data.profiles;
}

/**
 * Builds the application configuration once at startup. The result is passed
 * explicitly to every service; nothing else reads the environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;

  const dataDir = path.resolve(e.DATA_DIR);
  const providers = loadProviderProfiles(
    e.PROVIDER_CONFIG_PATH ?? path.join(CONFIG_DIR, 'providers.json'),
  );
  if (!providers[e.DEFAULT_PROFILE]) {
    throw new ConfigError([
      `DEFAULT_PROFILE '${e.DEFAULT_PROFILE}' is not one of: ${Object.keys(providers).join(', ')}`,
    ]);
  }

  return Object.freeze({
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    dataDir,
    projectStore:
      e.PROJECT_STORE === 'redis'
        ? { kind: 'redis' as const, url: e.REDIS_URL }
        : { kind: 'file' as const, dir: path.join(dataDir, 'projects') },
    artifactRoot: path.resolve(e.ARTIFACT_ROOT ?? path.join(dataDir, 'artifacts')),
    toolCatalogPath: e.TOOL_CONFIG_PATH ?? path.join(CONFIG_DIR, 'tools.json'),
    providers,
    defaultProfile: e.DEFAULT_PROFILE,
    credentials: Object.freeze({ ...env }),
    providerRetry: {
      maxRetries: e.PROVIDER_MAX_RETRIES,
      baseDelayMs: e.PROVIDER_BASE_DELAY_MS,
      maxDelayMs: e.PROVIDER_MAX_DELAY_MS,
    },
    sandbox: {
      command: e.SANDBOX_COMMAND,
      args: e.SANDBOX_ARGS,
      installArgs: e.SANDBOX_INSTALL_ARGS,
      root: path.resolve(e.SANDBOX_ROOT ?? path.join(dataDir, 'sandbox')),
      defaultTimeoutMs: e.SANDBOX_TIMEOUT_MS,
      maxOutputBytes: e.SANDBOX_MAX_OUTPUT_BYTES,
      denyNetworkWrapper: e.SANDBOX_DENY_NETWORK,
    },
    loop: {
      contextWindowTurns: e.CONTEXT_WINDOW_TURNS,
      maxCorrectiveRetries: e.MAX_CORRECTIVE_RETRIES,
      maxModelRounds: e.MAX_MODEL_ROUNDS,
      errorExcerptChars: e.ERROR_EXCERPT_CHARS,
      followUpSummary: e.FOLLOW_UP_SUMMARY,
    },
    logModelCalls: e.LOG_MODEL_CALLS,
  });
}

/**
 * Loads `.env` from the project root into the process environment. Called
 * by the entry points only.
 */
export function loadDotenv(): void {
  const envPath = path.resolve(__dirname, '../../.env');
  const result = dotenv.config({ path: envPath });
  if (result.error && !fs.existsSync(envPath)) {
    return;
  }
  if (result.error) {
    throw new ConfigError([`cannot parse ${envPath}: ${result.error.message}`]);
  }
}
