// Configuration loading logic
import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { extname, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, describeError } from '../orchestration/errors';
import type { OrchestratorConfig } from '../types';
import { DEFAULT_CONFIG } from './defaults';
import type { ConfigLoader, ConfigValidationResult, RawConfig } from './types';
import { validateAndNormalizeConfig, validateConfig } from './validator';

export const DEFAULT_CONFIG_PATHS = ['orchestrator.yml', 'orchestrator.yaml', 'orchestrator.json'];

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Loads YAML or JSON configuration, substitutes `${VAR}` and
 * `${VAR:-default}` from the environment, and fills in defaults.
 */
export class OrchestratorConfigLoader implements ConfigLoader {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async load(path: string): Promise<OrchestratorConfig> {
    try {
      if (!existsSync(path)) {
        throw new Error(`Configuration file not found: ${path}`);
      }
      const content = await readFile(path, 'utf-8');
      return this.resolve(this.parse(content, extname(path)));
    } catch (error) {
      throw new ConfigError(`Failed to load configuration from ${path}: ${describeError(error)}`, { cause: error });
    }
  }

  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /** Tries each path in turn; the first one that loads wins. */
  async loadFromPaths(searchPaths: string[]): Promise<OrchestratorConfig> {
    const errors: string[] = [];

    for (const path of searchPaths) {
      try {
        return await this.load(path);
      } catch (error) {
        errors.push(describeError(error));
      }
    }

    throw new ConfigError(`Could not load configuration from any of the specified paths:\n${errors.join('\n')}`);
  }

  /** Applies defaults, substitution and validation to an already parsed document. */
  resolve(raw: unknown): OrchestratorConfig {
    if (raw !== null && raw !== undefined && !isRecord(raw)) {
      throw new ConfigError('Configuration must be a mapping of sections');
    }
    const merged = this.resolveEnvironmentVariables(deepMerge(DEFAULT_CONFIG, raw ?? {}));
    return validateAndNormalizeConfig(withDerivedNames(merged));
  }

  parse(content: string, extension: string): unknown {
    switch (extension) {
      case '.json':
        return JSON.parse(content);
      case '.yml':
      case '.yaml':
        return parseYaml(content);
      default:
        throw new Error('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
    }
  }

  private resolveEnvironmentVariables(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.substituteEnvironmentVariables(value);
    }
    if (Array.isArray(value)) {
      return value.map(item => this.resolveEnvironmentVariables(item));
    }
    if (isRecord(value)) {
      return Object.fromEntries(
        Object.entries(value).map(([key, entry]) => [key, this.resolveEnvironmentVariables(entry)])
      );
    }
    return value;
  }

  // Unset variables without a default keep their placeholder, so validation names them.
  private substituteEnvironmentVariables(text: string): string {
    return text.replace(/\$\{([^}]+)\}/g, (match, expression: string) => {
      const [name, fallback] = expression.split(':-');
      const value = this.env[name];
      if (value !== undefined) {
        return value;
      }
      return fallback ?? match;
    });
  }
}

/** Plain objects merge key by key; arrays and scalars from `override` replace. */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (!isRecord(base) || !isRecord(override)) {
    return override === undefined ? base : override;
  }
  const result: RawConfig = { ...base };
  for (const [key, value] of Object.entries(override)) {
    result[key] = deepMerge(base[key], value);
  }
  return result;
}

/** State bucket and lock table default to names built from `project`. */
function withDerivedNames(config: unknown): unknown {
  if (!isRecord(config)) {
    return config;
  }
  const project = typeof config.project === 'string' ? config.project : '';
  const backend = isRecord(config.backend) ? config.backend : {};
  return {
    ...config,
    backend: {
      bucket_name: `${project}-terraform-state`,
      lock_table_name: `${project}-terraform-locks`,
      ...backend
    }
  };
}

export function createConfigLoader(env?: NodeJS.ProcessEnv): OrchestratorConfigLoader {
  return new OrchestratorConfigLoader(env);
}

/**
 * Loads the first of orchestrator.yml, orchestrator.yaml or orchestrator.json
 * found in `cwd`, or the defaults when there is none.
 */
export async function loadDefaultConfig(cwd: string = process.cwd()): Promise<OrchestratorConfig> {
  const loader = createConfigLoader();
  const found = DEFAULT_CONFIG_PATHS.map(path => resolve(cwd, path)).filter(path => existsSync(path));
  if (found.length === 0) {
    return loader.resolve({});
  }
  return loader.loadFromPaths(found);
}
