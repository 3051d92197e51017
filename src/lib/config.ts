/**
 * Application configuration.
 *
 * Settings are parsed once from the environment and passed into each
 * component, so nothing below this module reads process.env directly.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';

export { ConfigurationError };

export type CredentialName = 'ANTHROPIC_API_KEY' | 'OPENAI_API_KEY';

/** Read-only lookup of named API credentials */
export interface CredentialSource {
  get(name: CredentialName): string | undefined;
}

/** Values shipped in .env.example that mean "not configured" */
export const PLACEHOLDER_CREDENTIALS: ReadonlySet<string> = new Set([
  'your_openai_api_key_here',
  'your_anthropic_api_key_here',
]);

type Env = Record<string, string | undefined>;

export function envCredentials(env: Env = process.env): CredentialSource {
  return {
    get: (name) => env[name],
  };
}

/**
 * Returns the credential, or null when it is missing, blank or a placeholder.
 */
export function readCredential(source: CredentialSource, name: CredentialName): string | null {
  const value = source.get(name)?.trim();
  if (!value || PLACEHOLDER_CREDENTIALS.has(value)) return null;
  return value;
}

export function requireCredential(
  source: CredentialSource,
  name: CredentialName,
  component: string
): string {
  const value = readCredential(source, name);
  if (!value) {
    throw new ConfigurationError(
      `${name} not found or is a placeholder. ${component} cannot operate without it.`
    );
  }
  return value;
}

// ============================================
// Settings
// ============================================

const EnvSchema = z.object({
  KB_DATA_DIR: z.string().min(1).default('data/kb'),
  AGENT_MODEL: z.string().min(1).default('claude-3-5-haiku-20241022'),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  OPENAI_EMBED_MODEL: z.string().min(1).default('text-embedding-3-small'),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
});

export interface EmbeddingSettings {
  baseUrl: string;
  model: string;
}

export interface AppConfig {
  credentials: CredentialSource;
  /** Directory for per-user index files, or ':memory:' */
  dataDir: string;
  agentModel: string;
  embedding: EmbeddingSettings;
  fetchTimeoutMs: number;
  llmTimeoutMs: number;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new ConfigurationError(`Invalid configuration: ${keys.join(', ')}`);
  }

  const settings = parsed.data;
  return {
    credentials: envCredentials(env),
    dataDir: settings.KB_DATA_DIR,
    agentModel: settings.AGENT_MODEL,
    embedding: {
      baseUrl: settings.OPENAI_BASE_URL.replace(/\/+$/, ''),
      model: settings.OPENAI_EMBED_MODEL,
    },
    fetchTimeoutMs: settings.FETCH_TIMEOUT_MS,
    llmTimeoutMs: settings.LLM_TIMEOUT_MS,
  };
}
