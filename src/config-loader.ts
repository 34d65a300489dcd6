/**
 * Config Loader - Loads gmxcheck settings from user and project files
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ConfigError, ConfigLoadResult, ConfigSource, GmxCheckConfig } from './types';

export function defaultConfig(): GmxCheckConfig {
  return {
    audit: {
      enabled: false,
      path: path.join(os.homedir(), '.gmxcheck', 'audit.log'),
      maxSize: 10 * 1024 * 1024,
      maxBackups: 5
    },
    validation: {
      strict: false,
      validateCommands: true
    },
    output: {
      verbose: false,
      color: true,
      json: false
    }
  };
}

type SectionName = keyof GmxCheckConfig;

// Expected primitive type of every recognised key
const SCHEMA: { [S in SectionName]: Record<keyof GmxCheckConfig[S], 'boolean' | 'string' | 'number'> } = {
  audit: { enabled: 'boolean', path: 'string', maxSize: 'number', maxBackups: 'number' },
  validation: { strict: 'boolean', validateCommands: 'boolean' },
  output: { verbose: 'boolean', color: 'boolean', json: 'boolean' }
};

export class ConfigLoader {
  constructor(
    private readonly cwd: string = process.cwd(),
    private readonly homeDir: string = os.homedir()
  ) {}

  userPath(): string {
    return path.join(this.homeDir, '.config', 'gmxcheck', 'config.json');
  }

  projectPath(): string {
    return path.join(this.cwd, '.gmxcheck.json');
  }

  /**
   * Load and merge settings. Precedence: project > user > defaults.
   * An explicit path replaces the project file.
   */
  load(overridePath?: string): ConfigLoadResult {
    const config = defaultConfig();
    const errors: ConfigError[] = [];

    this.applyFile(config, this.userPath(), ConfigSource.USER, errors);
    this.applyFile(config, overridePath ?? this.projectPath(), ConfigSource.PROJECT, errors);

    return { config, errors };
  }

  private applyFile(config: GmxCheckConfig, filePath: string, source: ConfigSource, errors: ConfigError[]): void {
    if (!fs.existsSync(filePath)) {
      return;
    }

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      errors.push({
        source,
        path: filePath,
        message: `Cannot read config: ${error instanceof Error ? error.message : String(error)}`
      });
      return;
    }

    if (!isRecord(data)) {
      errors.push({ source, path: filePath, message: 'Config must be a JSON object' });
      return;
    }

    for (const [sectionName, section] of Object.entries(data)) {
      if (!isSectionName(sectionName)) {
        errors.push({ source, path: filePath, message: `Unknown config section: ${sectionName}` });
        continue;
      }
      if (!isRecord(section)) {
        errors.push({ source, path: filePath, message: `Config section '${sectionName}' must be an object` });
        continue;
      }
      this.applySection(config, sectionName, section, (message) => errors.push({ source, path: filePath, message }));
    }
  }

  private applySection(
    config: GmxCheckConfig,
    sectionName: SectionName,
    section: Record<string, unknown>,
    report: (message: string) => void
  ): void {
    const expected: Record<string, string> = SCHEMA[sectionName];
    const target: Record<string, unknown> = config[sectionName];

    for (const [key, value] of Object.entries(section)) {
      const type = expected[key];
      if (type === undefined) {
        report(`Unknown config key: ${sectionName}.${key}`);
      } else if (typeof value !== type) {
        report(`Config key ${sectionName}.${key} must be a ${type}`);
      } else {
        target[key] = value;
      }
    }

    if (sectionName === 'audit' && config.audit.path.startsWith('~/')) {
      config.audit.path = path.join(this.homeDir, config.audit.path.slice(2));
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSectionName(name: string): name is SectionName {
  return Object.prototype.hasOwnProperty.call(SCHEMA, name);
}
