import { join } from 'node:path';
import { GapflowConfigSchema, type BackendConfig, type GapflowConfig } from '@domain/types/config.js';
import { GAPFLOW_DIRS } from '@shared/constants/paths.js';
import { ValidationError } from '@shared/lib/errors.js';
import { isLogLevel } from '@shared/lib/logger.js';
import { JsonStore } from '@infra/persistence/json-store.js';
import type { Env } from '@infra/backends/backend-selector.js';

/** Model variables that apply to every backend config of the given name */
const MODEL_ENV: Record<string, string> = {
  anthropic: 'ANTHROPIC_MODEL',
  groq: 'GROQ_MODEL',
};

export function configPath(gapflowDir: string): string {
  return join(gapflowDir, GAPFLOW_DIRS.config);
}

export function defaultConfig(): GapflowConfig {
  return GapflowConfigSchema.parse({});
}

function parseNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${name} must be a number, got "${raw}"`, []);
  }
  return value;
}

function withModel(backend: BackendConfig, env: Env): BackendConfig {
  const variable = MODEL_ENV[backend.name];
  const model = variable ? env[variable] : undefined;
  return model ? { ...backend, params: { ...backend.params, model } } : backend;
}

/**
 * Apply environment overrides on top of a config. Environment wins over the
 * file:
 *
 * - GAPFLOW_BACKEND       default backend name
 * - ANTHROPIC_MODEL       model for every anthropic backend config
 * - GROQ_MODEL            model for every groq backend config
 * - GAPFLOW_TEMPERATURE   default backend temperature
 * - GAPFLOW_TIMEOUT_MS    per-call timeout
 * - GAPFLOW_LOG_LEVEL     logging level
 */
export function applyEnvOverrides(config: GapflowConfig, env: Env): GapflowConfig {
  const next: GapflowConfig = structuredClone(config);

  const backendName = env['GAPFLOW_BACKEND']?.trim();
  if (backendName) {
    next.backend = { name: backendName, params: {} };
  }

  const temperature = parseNumber(env, 'GAPFLOW_TEMPERATURE');
  if (temperature !== undefined) {
    next.backend.params.temperature = temperature;
  }

  next.backend = withModel(next.backend, env);
  for (const [stage, backend] of Object.entries(next.stageBackends)) {
    next.stageBackends[stage] = withModel(backend, env);
  }

  const timeoutMs = parseNumber(env, 'GAPFLOW_TIMEOUT_MS');
  if (timeoutMs !== undefined) {
    next.timeoutMs = timeoutMs;
  }

  const level = env['GAPFLOW_LOG_LEVEL'];
  if (level !== undefined) {
    if (!isLogLevel(level)) {
      throw new ValidationError(`GAPFLOW_LOG_LEVEL must be one of debug, info, warn, error; got "${level}"`, []);
    }
    next.logging.level = level;
  }

  const result = GapflowConfigSchema.safeParse(next);
  if (!result.success) {
    throw new ValidationError('Configuration is invalid after environment overrides', result.error.issues);
  }
  return result.data;
}

/**
 * Load `.gapflow/config.json` (defaults when absent or when no directory is
 * given) and apply environment overrides.
 */
export function loadConfig(gapflowDir?: string, env: Env = process.env): GapflowConfig {
  const path = gapflowDir ? configPath(gapflowDir) : undefined;
  const base = path && JsonStore.exists(path) ? JsonStore.read(path, GapflowConfigSchema) : defaultConfig();
  return applyEnvOverrides(base, env);
}

export async function writeConfig(gapflowDir: string, config: GapflowConfig): Promise<void> {
  await JsonStore.write(configPath(gapflowDir), config, GapflowConfigSchema);
}
