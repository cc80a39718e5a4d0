import { join } from 'node:path';
import { existsSync } from 'node:fs';
import { GapflowConfigSchema, type GapflowConfig } from '@domain/types/config.js';
import { BackendSelector } from '@infra/backends/backend-selector.js';
import { configPath, defaultConfig, writeConfig } from '@infra/config/config-loader.js';
import { MemoryStore } from '@infra/memory/memory-store.js';
import { GAPFLOW_DIRS } from '@shared/constants/paths.js';
import { GapflowError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';

export interface InitOptions {
  cwd: string;
  backend?: string;
  skipPrompts?: boolean;
  /** Environment consulted for backend credentials; defaults to process.env */
  env?: Record<string, string | undefined>;
}

export interface InitResult {
  gapflowDir: string;
  configPath: string;
  config: GapflowConfig;
  /** True when an existing config.json was replaced */
  reinitialized: boolean;
  /** Credentials the chosen backend needs that are not set */
  missingCredentials: string[];
}

/**
 * Prompt the user for the default backend interactively.
 * Only called when skipPrompts is false.
 */
async function promptBackend(): Promise<string> {
  const { select } = await import('@inquirer/prompts');

  return select({
    message: 'Select the default backend:',
    choices: BackendSelector.registered().map((name) => ({ name, value: name })),
    default: defaultConfig().backend.name,
  });
}

/**
 * Initialize a gapflow project.
 *
 * Flow:
 * 1. Confirm before replacing an existing .gapflow/config.json
 * 2. Choose the default backend (flag, prompt, or config default)
 * 3. Create .gapflow/ with its sessions, long-term and traces directories
 * 4. Write .gapflow/config.json
 */
export async function handleInit(options: InitOptions): Promise<InitResult> {
  const { cwd, skipPrompts = false } = options;
  const gapflowDir = join(cwd, GAPFLOW_DIRS.root);
  const path = configPath(gapflowDir);
  const reinitialized = existsSync(path);

  if (reinitialized && !skipPrompts) {
    const { confirm } = await import('@inquirer/prompts');
    const proceed = await confirm({
      message: 'A .gapflow/config.json already exists. Re-initializing will overwrite it. Continue?',
      default: false,
    });
    if (!proceed) {
      throw new GapflowError('Init cancelled — existing .gapflow/ directory preserved.');
    }
  }

  let backend = options.backend;
  if (!backend && !skipPrompts) {
    backend = await promptBackend();
  }

  const config = GapflowConfigSchema.parse({
    ...defaultConfig(),
    ...(backend ? { backend: { name: backend, params: {} } } : {}),
  });

  const registered = BackendSelector.registered();
  if (!registered.includes(config.backend.name)) {
    throw new GapflowError(
      `Unknown backend "${config.backend.name}". Registered backends are: ${registered.join(', ')}`,
    );
  }

  MemoryStore.open({ root: gapflowDir });
  await writeConfig(gapflowDir, config);

  const missingCredentials = new BackendSelector({ env: options.env }).missingCredentials(config.backend.name);
  if (missingCredentials.length > 0) {
    logger.warn(`Backend "${config.backend.name}" will fall back to the stub until ${missingCredentials.join(', ')} is set`);
  }

  return { gapflowDir, configPath: path, config, reinitialized, missingCredentials };
}
