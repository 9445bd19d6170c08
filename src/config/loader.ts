// Configuration loading logic
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { ProvisionerConfig, ConfigOverrides, ConfigValidationResult, LoadOptions } from './types';
import { validateAndNormalizeConfig, validateConfig } from './validator';

export const DEFAULT_CONFIG_PATHS = [
  './provisioner.yml',
  './provisioner.yaml',
  './provisioner.json'
];

type PlainObject = Record<string, unknown>;

/**
 * Configuration loader that supports YAML and JSON files with environment variable substitution
 */
export class ProvisionerConfigLoader {
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  /**
   * Load configuration from `options.path`, or from the first default location
   * that exists. With no file at all the configuration is built from defaults
   * and overrides alone.
   */
  async load(options: Omit<LoadOptions, 'env'> = {}): Promise<ProvisionerConfig> {
    const path = options.path ?? DEFAULT_CONFIG_PATHS.find(candidate => existsSync(candidate));
    const fileConfig = path ? await this.readConfigFile(path) : {};

    const merged = this.deepMerge(this.deepMerge(this.defaults(), fileConfig), options.overrides ?? {});

    try {
      return validateAndNormalizeConfig(merged);
    } catch (error) {
      const source = path ?? 'defaults';
      throw new Error(`Invalid configuration (${source}): ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /**
   * Parse a configuration file and resolve environment variables in it
   */
  async readConfigFile(path: string): Promise<PlainObject> {
    if (!existsSync(path)) {
      throw new Error(`Configuration file not found: ${path}`);
    }

    const content = await readFile(path, 'utf-8');

    let rawConfig: unknown;
    try {
      if (path.endsWith('.json')) {
        rawConfig = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        rawConfig = parseYaml(content);
      } else {
        throw new Error('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
      }
    } catch (error) {
      throw new Error(`Failed to load configuration from ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }

    // An empty YAML document parses to null
    if (rawConfig === null || rawConfig === undefined) {
      return {};
    }
    if (!isPlainObject(rawConfig)) {
      throw new Error(`Failed to load configuration from ${path}: top level must be a mapping`);
    }

    const resolved = this.resolveEnvironmentVariables(rawConfig);
    return isPlainObject(resolved) ? resolved : {};
  }

  /**
   * Recursively resolve environment variables in configuration values
   * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
   */
  private resolveEnvironmentVariables(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.substituteEnvironmentVariables(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => this.resolveEnvironmentVariables(item));
    }

    if (isPlainObject(value)) {
      const result: PlainObject = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(item);
      }
      return result;
    }

    return value;
  }

  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match, varExpression: string) => {
      const [varName, defaultValue] = varExpression.split(':-');
      const envValue = this.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      // Unset variable without default: keep the placeholder
      return match;
    });
  }

  private defaults(): PlainObject {
    const defaults: PlainObject = {
      aws: {
        region: 'us-east-1'
      }
    };

    const token = this.env.GH_SECRET_TOKEN;
    if (token) {
      defaults.github = { token };
    }

    return defaults;
  }

  /**
   * Deep merge two objects, with the second object taking precedence.
   * Undefined values in `source` leave the target untouched.
   */
  private deepMerge(target: PlainObject, source: PlainObject | ConfigOverrides): PlainObject {
    const result: PlainObject = { ...target };

    for (const [key, value] of Object.entries(source)) {
      if (value === undefined) {
        continue;
      }
      const existing = result[key];
      if (isPlainObject(value)) {
        result[key] = this.deepMerge(isPlainObject(existing) ? existing : {}, value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convenience function to create a new configuration loader
 */
export function createConfigLoader(env?: NodeJS.ProcessEnv): ProvisionerConfigLoader {
  return new ProvisionerConfigLoader(env);
}

/**
 * Load configuration from the given options, using `process.env` unless `options.env` is set
 */
export async function loadConfig(options: LoadOptions = {}): Promise<ProvisionerConfig> {
  const { env, ...rest } = options;
  return createConfigLoader(env).load(rest);
}
