/**
 * Config Parser - Loads iline-relay settings files
 *
 * Files are line based:
 *
 *   # comment
 *   channels = IRCnet/#i-line, IRCnet/#i-line2
 *   flood_count = 5
 *
 * Values from the project file override the user file, which overrides
 * DEFAULT_CONFIG.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ConfigParseResult, ConfigSource, IlineConfig, ParseError } from './types';

export const DEFAULT_CONFIG: Readonly<IlineConfig> = Object.freeze({
  channels: [],
  command: 'Iline',
  commandChar: '!',
  lagLimitSeconds: 5,
  url: 'https://api.i-line.space/index.php?q=',
  requirePrivileges: true,
  showBanner: true,
  commandHelp: true,
  commandVersion: true,
  testWebchat: true,
  showPrefix: true,
  showPrefixLong: true,
  showExtended: true,
  hideProcessing: false,
  hideLooking: false,
  hideLookingNicks: false,
  floodTimeoutSeconds: 60,
  floodCount: 5,
  statusTimeoutSeconds: 30,
  workerTimeoutSeconds: 30
});

type ValueKind = 'string' | 'list' | 'int' | 'bool';

type KeysOfKind<K extends ValueKind> = {
  [P in keyof IlineConfig]: IlineConfig[P] extends (K extends 'list' ? string[] : K extends 'string' ? string : K extends 'int' ? number : boolean) ? P : never;
}[keyof IlineConfig];

type SettingDefinition =
  | { kind: 'string'; key: KeysOfKind<'string'> }
  | { kind: 'list'; key: KeysOfKind<'list'> }
  | { kind: 'int'; key: KeysOfKind<'int'> }
  | { kind: 'bool'; key: KeysOfKind<'bool'> };

// Setting names as written in files
const SETTINGS: Record<string, SettingDefinition> = {
  channels: { kind: 'list', key: 'channels' },
  command: { kind: 'string', key: 'command' },
  command_char: { kind: 'string', key: 'commandChar' },
  lag_limit: { kind: 'int', key: 'lagLimitSeconds' },
  url: { kind: 'string', key: 'url' },
  require_privs: { kind: 'bool', key: 'requirePrivileges' },
  show_banner: { kind: 'bool', key: 'showBanner' },
  command_help: { kind: 'bool', key: 'commandHelp' },
  command_version: { kind: 'bool', key: 'commandVersion' },
  test_webchat: { kind: 'bool', key: 'testWebchat' },
  show_prefix: { kind: 'bool', key: 'showPrefix' },
  show_prefix_long: { kind: 'bool', key: 'showPrefixLong' },
  show_extended: { kind: 'bool', key: 'showExtended' },
  hide_processing: { kind: 'bool', key: 'hideProcessing' },
  hide_looking: { kind: 'bool', key: 'hideLooking' },
  hide_looking_nicks: { kind: 'bool', key: 'hideLookingNicks' },
  flood_timeout: { kind: 'int', key: 'floodTimeoutSeconds' },
  flood_count: { kind: 'int', key: 'floodCount' },
  status_timeout: { kind: 'int', key: 'statusTimeoutSeconds' },
  worker_timeout: { kind: 'int', key: 'workerTimeoutSeconds' }
};

/** [file name, config key] pairs in file order */
export const SETTING_NAMES: ReadonlyArray<[string, keyof IlineConfig]> = Object.entries(SETTINGS).map(
  ([name, definition]): [string, keyof IlineConfig] => [name, definition.key]
);

export interface LoadedConfig {
  config: IlineConfig;
  errors: ParseError[];
}

export class ConfigParser {
  /**
   * Parse a single settings file. A missing file yields no values and
   * no errors.
   */
  parse(filePath: string, source: ConfigSource): ConfigParseResult {
    const values: Partial<IlineConfig> = {};
    const errors: ParseError[] = [];

    if (!fs.existsSync(filePath)) {
      return { values, errors };
    }

    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      const lines = content.split('\n');

      for (let i = 0; i < lines.length; i++) {
        const line = lines[i].trim();

        if (line === '' || line.startsWith('#')) {
          continue;
        }

        try {
          this.parseLine(line, values);
        } catch (error) {
          errors.push({
            line: i + 1,
            message: error instanceof Error ? error.message : String(error),
            source
          });
        }
      }
    } catch (error) {
      errors.push({
        line: 0,
        message: `Cannot read file: ${error instanceof Error ? error.message : String(error)}`,
        source
      });
    }

    return { values, errors };
  }

  /**
   * Load the user and project files on top of the defaults
   */
  loadAll(projectPath?: string): LoadedConfig {
    const user = this.parse(this.getUserPath(), ConfigSource.USER);
    const project = this.parse(projectPath || this.getProjectPath(), ConfigSource.PROJECT);

    return {
      config: { ...DEFAULT_CONFIG, ...user.values, ...project.values },
      errors: [...user.errors, ...project.errors]
    };
  }

  getUserPath(): string {
    return path.join(os.homedir(), '.config', 'iline-relay', 'config');
  }

  getProjectPath(): string {
    return path.join(process.cwd(), '.iline-relay');
  }

  private parseLine(line: string, values: Partial<IlineConfig>): void {
    const eq = line.indexOf('=');
    if (eq === -1) {
      throw new Error(`Expected "name = value": ${line}`);
    }

    const name = line.substring(0, eq).trim().toLowerCase();
    const raw = line.substring(eq + 1).trim();
    const setting = Object.prototype.hasOwnProperty.call(SETTINGS, name) ? SETTINGS[name] : undefined;

    if (!setting) {
      throw new Error(`Unknown setting: ${name}`);
    }

    switch (setting.kind) {
      case 'string':
        values[setting.key] = raw;
        break;
      case 'list':
        values[setting.key] = raw.split(',').map((entry) => entry.trim()).filter((entry) => entry.length > 0);
        break;
      case 'int':
        values[setting.key] = this.parseInteger(name, raw);
        break;
      case 'bool':
        values[setting.key] = this.parseBoolean(name, raw);
        break;
    }
  }

  private parseInteger(name: string, raw: string): number {
    if (!/^\d+$/.test(raw)) {
      throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
    }
    return parseInt(raw, 10);
  }

  private parseBoolean(name: string, raw: string): boolean {
    const normalized = raw.toLowerCase();
    if (normalized === 'on' || normalized === 'true' || normalized === 'yes' || normalized === '1') {
      return true;
    }
    if (normalized === 'off' || normalized === 'false' || normalized === 'no' || normalized === '0') {
      return false;
    }
    throw new Error(`${name} must be on or off, got "${raw}"`);
  }
}
