import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema, expandHome, type Config, type ConfigInput } from '@roster/shared';

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: ConfigInput; // CLI flags
  env?: NodeJS.ProcessEnv;
  home?: string;
}

export interface LoadedConfig {
  config: Config;
  /** `$ROSTER_HOME`, or `~/.roster` */
  rosterHome: string;
  userConfigPath: string;
  configPath: string | undefined;
  /** Absolute cache file location */
  cachePath: string;
  /** Absolute scan roots, `~` expanded */
  roots: string[];
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function resolveRosterHome(env: NodeJS.ProcessEnv, home: string): string {
  const override = env.ROSTER_HOME;
  if (override) {
    return path.resolve(expandHome(override, home));
  }
  return path.join(home, '.roster');
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
    // An empty file parses to undefined.
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output: ConfigRecord = { ...target };
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static load(options: ConfigOptions = {}): LoadedConfig {
    const env = options.env ?? process.env;
    const home = options.home ?? os.homedir();
    const rosterHome = resolveRosterHome(env, home);

    // 1. User config: <rosterHome>/config.yaml
    const userConfigPath = path.join(rosterHome, 'config.yaml');
    const userConfig = this.loadYaml(userConfigPath);

    // 2. Explicit --config file (if provided)
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 3. CLI flags
    const flagConfig: ConfigRecord = options.flags ?? {};

    // Merge in order of precedence: flags > explicit > user
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }
    const config = result.data;

    return {
      config,
      rosterHome,
      userConfigPath,
      configPath: options.configPath,
      cachePath: config.cache.path
        ? path.resolve(expandHome(config.cache.path, home))
        : path.join(rosterHome, 'repos.txt'),
      roots: config.scan.roots.map((root) => path.resolve(expandHome(root, home))),
    };
  }
}
