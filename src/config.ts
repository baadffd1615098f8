/**
 * Engine Configuration
 *
 * Read from environment variables, validated with Zod. CLI flags are
 * applied on top by the entry point.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { TargetLanguage } from './types.js';
import {
  PRESET_MODELS,
  type ModelRole,
  type ProviderPreset,
  type RoleModels,
} from './models.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

export const EnvSchema = z.object({
  CURLGEN_LANGUAGE: TargetLanguage.default('java'),
  CURLGEN_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  CURLGEN_WORKSPACE: z.string().min(1).default('workspace'),
  CURLGEN_TOOLCHAIN_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  CURLGEN_PROVIDER: z.enum(['ollama', 'anthropic', 'openai']).default('ollama'),
  CURLGEN_BASE_URL: z.string().url().optional(),
  CURLGEN_PLANNER_MODEL: z.string().min(1).optional(),
  CURLGEN_GENERATOR_MODEL: z.string().min(1).optional(),
  CURLGEN_ANALYST_MODEL: z.string().min(1).optional(),
  CURLGEN_ANALYZE_FAILURES: booleanFlag.default('false'),
});

export interface EngineConfig {
  language: TargetLanguage;
  maxAttempts: number;
  workspace: string;
  toolchainTimeoutMs: number;
  provider: ProviderPreset;
  models: RoleModels;
  analyzeFailures: boolean;
}

function resolveModels(
  provider: ProviderPreset,
  baseURL: string | undefined,
  overrides: Record<ModelRole, string | undefined>
): RoleModels {
  const preset = PRESET_MODELS[provider];
  const withOverrides = (role: ModelRole) => ({
    ...preset[role],
    id: overrides[role] ?? preset[role].id,
    baseURL: baseURL ?? preset[role].baseURL,
  });
  return {
    planner: withOverrides('planner'),
    generator: withOverrides('generator'),
    analyst: withOverrides('analyst'),
  };
}

/**
 * Build the engine configuration from an environment.
 * Unset variables fall back to defaults; invalid ones raise ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('CURLGEN_') && value !== '')
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    language: values.CURLGEN_LANGUAGE,
    maxAttempts: values.CURLGEN_MAX_ATTEMPTS,
    workspace: values.CURLGEN_WORKSPACE,
    toolchainTimeoutMs: values.CURLGEN_TOOLCHAIN_TIMEOUT_MS,
    provider: values.CURLGEN_PROVIDER,
    models: resolveModels(values.CURLGEN_PROVIDER, values.CURLGEN_BASE_URL, {
      planner: values.CURLGEN_PLANNER_MODEL,
      generator: values.CURLGEN_GENERATOR_MODEL,
      analyst: values.CURLGEN_ANALYST_MODEL,
    }),
    analyzeFailures: values.CURLGEN_ANALYZE_FAILURES,
  };
}
