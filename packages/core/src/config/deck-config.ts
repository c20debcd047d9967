/**
 * Deck build configuration
 *
 * Every setting resolves with precedence:
 * 1. Explicit override (CLI flag) - HIGHEST
 * 2. Environment variable - MEDIUM
 * 3. Built-in default - FALLBACK
 */

import { fileURLToPath } from 'node:url';

/** Template shipped with the package (`packages/core/assets/default.tex`) */
export const DEFAULT_TEMPLATE_PATH = fileURLToPath(
  new URL('../../assets/default.tex', import.meta.url)
);
export const DEFAULT_ENGINE = 'pdflatex';
export const DEFAULT_WORK_DIR = 'tmp';

export const CONFIG_ENV_VARS = {
  templatePath: 'FRAMEDECK_TEMPLATE',
  engine: 'FRAMEDECK_ENGINE',
  workDir: 'FRAMEDECK_WORK_DIR',
} as const;

export interface DeckConfig {
  /** Template with one `%s` placeholder */
  templatePath: string;
  /** Typesetting engine executable */
  engine: string;
  /** Arguments placed before the source file name on every engine pass */
  engineArgs: string[];
  /** Scratch directory; created for the build and removed afterwards */
  workDir: string;
}

export type ConfigSource = 'flag' | 'env' | 'default';

export interface ResolvedDeckConfig {
  config: DeckConfig;
  sources: Record<keyof typeof CONFIG_ENV_VARS, ConfigSource>;
}

export type DeckConfigOverrides = Partial<DeckConfig>;

function pick(
  override: string | undefined,
  envValue: string | undefined,
  fallback: string
): { value: string; source: ConfigSource } {
  if (override && override.length > 0) {
    return { value: override, source: 'flag' };
  }
  if (envValue && envValue.length > 0) {
    return { value: envValue, source: 'env' };
  }
  return { value: fallback, source: 'default' };
}

/**
 * Resolve the build configuration from overrides and the environment
 *
 * @param overrides - Values given explicitly (CLI flags); empty strings count as unset
 * @param env - Environment to read (defaults to process.env)
 */
export function resolveDeckConfig(
  overrides: DeckConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedDeckConfig {
  const templatePath = pick(
    overrides.templatePath,
    env[CONFIG_ENV_VARS.templatePath],
    DEFAULT_TEMPLATE_PATH
  );
  const engine = pick(overrides.engine, env[CONFIG_ENV_VARS.engine], DEFAULT_ENGINE);
  const workDir = pick(overrides.workDir, env[CONFIG_ENV_VARS.workDir], DEFAULT_WORK_DIR);

  return {
    config: {
      templatePath: templatePath.value,
      engine: engine.value,
      engineArgs: overrides.engineArgs ?? [],
      workDir: workDir.value,
    },
    sources: {
      templatePath: templatePath.source,
      engine: engine.source,
      workDir: workDir.source,
    },
  };
}
