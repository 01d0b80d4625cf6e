import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigError } from '@pacup/shared';
import { ConfigLoader, ConfigOptions } from './loader';

describe('ConfigLoader', () => {
  let root: string;
  let options: ConfigOptions;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'pacup-config-'));
    fs.mkdirSync(path.join(root, 'home'));
    fs.mkdirSync(path.join(root, 'repo'));
    options = { homeDir: path.join(root, 'home'), cwd: path.join(root, 'repo'), env: {} };
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function writeYaml(file: string, content: unknown): string {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, yaml.dump(content));
    return file;
  }

  const userFile = () => path.join(root, 'home', '.config', 'pacup', 'config.yaml');
  const repoFile = () => path.join(root, 'repo', '.pacup.yaml');

  describe('load', () => {
    it('should load defaults when no files exist', () => {
      const config = ConfigLoader.load(options);
      expect(config.configVersion).toBe(1);
      expect(config.repology).toEqual({
        apiUrl: 'https://repology.org/api/v1',
        concurrency: 11,
        denylist: ['appget', 'baulk', 'chocolatey', 'cygwin', 'just-install', 'scoop', 'winget'],
      });
      expect(config.install).toEqual({ command: 'pacstall', args: ['-Il'] });
    });

    it('should load user config', () => {
      writeYaml(userFile(), { http: { timeoutMs: 5000 } });
      expect(ConfigLoader.load(options).http.timeoutMs).toBe(5000);
    });

    it('should honour XDG_CONFIG_HOME', () => {
      const xdg = path.join(root, 'xdg');
      writeYaml(path.join(xdg, 'pacup', 'config.yaml'), { ship: { remote: 'upstream' } });
      const config = ConfigLoader.load({ ...options, env: { XDG_CONFIG_HOME: xdg } });
      expect(config.ship.remote).toBe('upstream');
    });

    it('should respect precedence: flags > explicit > repo > user', () => {
      writeYaml(userFile(), { repology: { concurrency: 1 }, http: { timeoutMs: 1000 } });
      writeYaml(repoFile(), { repology: { concurrency: 2 } });
      const explicit = writeYaml(path.join(root, 'explicit.yaml'), {
        repology: { concurrency: 3 },
      });

      const config = ConfigLoader.load({
        ...options,
        configPath: explicit,
        flags: { repology: { concurrency: 4 } },
      });

      expect(config.repology.concurrency).toBe(4);
      expect(config.http.timeoutMs).toBe(1000);
    });

    it('should replace arrays instead of merging them', () => {
      writeYaml(userFile(), { repology: { denylist: ['scoop'] } });
      writeYaml(repoFile(), { repology: { denylist: ['winget'] } });
      expect(ConfigLoader.load(options).repology.denylist).toEqual(['winget']);
    });

    it('should fail if explicit config file is missing', () => {
      expect(() => ConfigLoader.load({ ...options, configPath: '/missing.yaml' })).toThrow(
        /Config file not found/,
      );
    });

    it('should fail on invalid YAML', () => {
      fs.writeFileSync(repoFile(), 'invalid: yaml: :');
      expect(() => ConfigLoader.load(options)).toThrow(/Error parsing YAML file/);
    });

    it('should fail on schema validation with the offending path', () => {
      writeYaml(repoFile(), { repology: { concurrency: 'many' } });
      expect(() => ConfigLoader.load(options)).toThrow(ConfigError);
      expect(() => ConfigLoader.load(options)).toThrow(/- repology\.concurrency: /);
    });

    it('should reject files that are not mappings', () => {
      fs.writeFileSync(repoFile(), '- just\n- a list\n');
      expect(() => ConfigLoader.load(options)).toThrow(/must contain a mapping/);
    });
  });

  describe('sources', () => {
    it('should list existing config files lowest precedence first', () => {
      writeYaml(userFile(), {});
      const explicit = writeYaml(path.join(root, 'explicit.yaml'), {});
      expect(ConfigLoader.sources({ ...options, configPath: explicit })).toEqual([
        userFile(),
        explicit,
      ]);
    });
  });
});
