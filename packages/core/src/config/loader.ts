import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { Config, ConfigInput, ConfigSchema, ConfigError } from '@pacup/shared';

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: ConfigInput; // CLI flags
  cwd?: string; // Directory holding the repo config
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

type ConfigObject = Record<string, unknown>;

function isConfigObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigObject {
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      const parsed: unknown = yaml.load(content);
      if (parsed === undefined || parsed === null) {
        return {};
      }
      if (!isConfigObject(parsed)) {
        throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
      }
      return parsed;
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  static mergeConfigs(target: ConfigObject, source: ConfigObject): ConfigObject {
    const output = { ...target };
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isConfigObject(sourceValue) && isConfigObject(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static userConfigPath(options: ConfigOptions = {}): string {
    const env = options.env ?? process.env;
    const configHome = env.XDG_CONFIG_HOME || path.join(options.homeDir ?? os.homedir(), '.config');
    return path.join(configHome, 'pacup', 'config.yaml');
  }

  static repoConfigPath(options: ConfigOptions = {}): string {
    return path.join(options.cwd ?? process.cwd(), '.pacup.yaml');
  }

  /**
   * Config files that contribute to the effective configuration, lowest precedence first.
   */
  static sources(options: ConfigOptions = {}): string[] {
    const candidates = [this.userConfigPath(options), this.repoConfigPath(options)];
    if (options.configPath) {
      candidates.push(options.configPath);
    }
    return candidates.filter((candidate) => fs.existsSync(candidate));
  }

  static load(options: ConfigOptions = {}): Config {
    // 1. User config: ~/.config/pacup/config.yaml
    const userConfig = this.loadYaml(this.userConfigPath(options));

    // 2. Repo config: ./.pacup.yaml
    const repoConfig = this.loadYaml(this.repoConfigPath(options));

    // 3. Explicit --config file (if provided)
    let explicitConfig: ConfigObject = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 4. CLI flags
    const flagConfig: ConfigObject = { ...options.flags };

    // Merge in order of precedence: flags > explicit > repo > user
    let mergedConfig = this.mergeConfigs({}, userConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, repoConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, explicitConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, flagConfig);

    const result = ConfigSchema.safeParse(mergedConfig);

    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    return result.data;
  }
}
