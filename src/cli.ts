/**
 * CLI Interface - Command-line access to the lookup pipeline
 */

import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'readline';
import { CLIOptions, IlineConfig } from './types';
import { ConfigParser, LoadedConfig, SETTING_NAMES } from './config-parser';
import { LookupExecutor } from './lookup-executor';
import { ReplyFormatter } from './reply-formatter';
import { AuditLogger, OUTCOMES, isOutcome } from './audit-logger';
import { VERSION } from './command-dispatcher';
import {
  hexToIPv4,
  isHexHost,
  isWebGatewayHost,
  looksLikeAddress,
  looksLikeHostname
} from './address-classifier';

export class CLI {
  private parser: ConfigParser;
  private executor: LookupExecutor;
  private formatter: ReplyFormatter;

  constructor(executor?: LookupExecutor) {
    this.parser = new ConfigParser();
    this.executor = executor || new LookupExecutor();
    this.formatter = new ReplyFormatter();
  }

  /**
   * Main entry point for CLI
   *
   * Subcommands:
   * - lookup <address>: query the lookup service directly
   * - classify <token>: show how a token is classified
   * - config: show the effective configuration
   * - init: create a default .iline-relay file
   * - log: show recent lookups
   */
  async run(args: string[]): Promise<number> {
    try {
      if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
        this.displayUsage();
        return args.length === 0 ? 1 : 0;
      }

      if (args[0] === '--version' || args[0] === '-v' || args[0] === 'version') {
        console.log(`iline-relay v${VERSION}`);
        return 0;
      }

      const subcommand = args[0];
      const { positional, options } = this.parseArgs(args.slice(1));

      switch (subcommand) {
        case 'lookup':
          if (positional.length < 1) {
            console.error('Error: lookup requires an address argument');
            console.error('Usage: iline-relay lookup <IP(4/6)>');
            return 1;
          }
          return await this.handleLookup(positional[0], options);

        case 'classify':
          if (positional.length < 1) {
            console.error('Error: classify requires a token argument');
            console.error('Usage: iline-relay classify <token>');
            return 1;
          }
          this.handleClassify(positional[0]);
          return 0;

        case 'config':
          return this.handleConfig(options);

        case 'init':
          await this.handleInit();
          return 0;

        case 'log':
          this.handleLog(options);
          return 0;

        default:
          throw new Error(`Unknown command: ${subcommand}`);
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : String(error));
      return 1;
    }
  }

  /**
   * Split flags from positional arguments
   *
   * Supports:
   * - --config <path>: Override project config file location
   * - --limit <n>: Number of log entries to show
   * - --outcome <outcome>: Only log entries with this outcome
   * - --since <date>: Only log entries at or after this time
   */
  private parseArgs(args: string[]): { positional: string[]; options: CLIOptions } {
    const positional: string[] = [];
    const options: CLIOptions = {};

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      if (arg === '--config') {
        if (i + 1 >= args.length) {
          throw new Error('--config requires a path argument');
        }
        options.configPath = args[++i];
      } else if (arg === '--limit') {
        const value = args[i + 1];
        if (value === undefined || !/^\d+$/.test(value)) {
          throw new Error('--limit requires a number');
        }
        options.limit = parseInt(value, 10);
        i++;
      } else if (arg === '--outcome') {
        const value = args[i + 1];
        if (!isOutcome(value)) {
          throw new Error(`--outcome requires one of: ${[...OUTCOMES].join(', ')}`);
        }
        options.outcome = value;
        i++;
      } else if (arg === '--since') {
        const value = args[i + 1];
        const since = value === undefined ? null : new Date(value);
        if (since === null || isNaN(since.getTime())) {
          throw new Error('--since requires a date');
        }
        options.since = since;
        i++;
      } else if (arg.startsWith('--')) {
        throw new Error(`Unknown flag: ${arg}`);
      } else {
        positional.push(arg);
      }
    }

    return { positional, options };
  }

  private displayUsage(): void {
    console.log(`
iline-relay - IRC frontend to an I-line lookup service

Usage:
  iline-relay lookup <IP(4/6)>      Query the lookup service for an address
  iline-relay classify <token>      Show how a host token is classified
  iline-relay config                Show the effective configuration
  iline-relay init                  Create default .iline-relay file
  iline-relay log                   View recent lookups

Flags:
  --config <path>                   Override project config file location
  --limit <n>                       Number of log entries to show (default: 50)
  --outcome <outcome>               Only show log entries with this outcome
  --since <date>                    Only show log entries from this time on

Examples:
  iline-relay lookup 192.0.2.1
  iline-relay classify ~c0000201
  iline-relay log --limit 10
  iline-relay log --outcome timeout --since 2026-01-01
    `.trim());
  }

  /**
   * Run one lookup through the worker and print the reply line
   */
  private async handleLookup(argument: string, options: CLIOptions): Promise<number> {
    const address = argument.trim().toLowerCase();
    if (!looksLikeAddress(address)) {
      this.formatter.displayError(`Not an IP(4/6) address: ${argument}`);
      return 1;
    }

    const { config } = this.loadConfig(options);
    const reply = await this.executor.execute(address, config);

    if (!reply) {
      this.formatter.displayError('Could not start the lookup worker');
      return 1;
    }

    console.log(`${this.formatter.formatPrefix(reply.bits, config)}${reply.text}`);
    return 0;
  }

  private handleClassify(token: string): void {
    const decoded = hexToIPv4(token);

    console.log(`Token: ${token}`);
    console.log(`Address: ${looksLikeAddress(token) ? 'yes' : 'no'}`);
    console.log(`Hostname: ${looksLikeHostname(token) ? 'yes' : 'no'}`);
    console.log(`Hex host: ${isHexHost(token) ? `yes (${decoded})` : 'no'}`);
    console.log(`Web gateway: ${isWebGatewayHost(token) ? 'yes' : 'no'}`);
  }

  /**
   * Print the merged configuration in config file syntax
   */
  private handleConfig(options: CLIOptions): number {
    const { config, errors } = this.loadConfig(options);

    for (const [name, key] of SETTING_NAMES) {
      console.log(`${name} = ${this.formatValue(config[key])}`);
    }

    for (const error of errors) {
      this.formatter.displayWarning(`${error.source} config line ${error.line}: ${error.message}`);
    }

    return errors.length > 0 ? 1 : 0;
  }

  /**
   * Handle init command - Create default .iline-relay file
   *
   * Steps:
   * 1. Check if .iline-relay exists in current directory
   * 2. If exists, prompt user for confirmation
   * 3. Copy default-config.txt to .iline-relay
   */
  private async handleInit(): Promise<void> {
    const targetPath = path.join(process.cwd(), '.iline-relay');
    const templatePath = path.join(__dirname, '..', 'templates', 'default-config.txt');

    if (fs.existsSync(targetPath)) {
      const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout
      });

      const answer = await new Promise<string>((resolve) => {
        rl.question('.iline-relay file already exists. Overwrite? [y/N]: ', (answer) => {
          rl.close();
          resolve(answer);
        });
      });

      if (answer.toLowerCase() !== 'y' && answer.toLowerCase() !== 'yes') {
        console.log('Init cancelled.');
        return;
      }
    }

    if (!fs.existsSync(templatePath)) {
      throw new Error(`Template file not found at ${templatePath}`);
    }

    fs.copyFileSync(templatePath, targetPath);

    console.log('✅ Created .iline-relay file in current directory');
    console.log('');
    console.log('Set "channels" to the network/#channel pairs to answer commands in.');
  }

  private handleLog(options: CLIOptions): void {
    const logger = new AuditLogger();
    const entries = logger.read({ limit: options.limit, outcome: options.outcome, since: options.since });

    if (entries.length === 0) {
      this.formatter.displayInfo(`No lookups logged in ${logger.path}`);
      return;
    }

    for (const entry of entries) {
      const parts = [entry.timestamp, `${entry.server}/${entry.channel}`, entry.nick];
      if (entry.requestedBy) {
        parts.push(`(asked by ${entry.requestedBy})`);
      }
      parts.push(entry.outcome);
      if (entry.address) {
        parts.push(entry.address);
      }
      if (entry.provenance) {
        parts.push(`[${entry.provenance}]`);
      }
      if (entry.reply) {
        parts.push(entry.reply);
      }
      console.log(parts.join(' '));
    }
  }

  private loadConfig(options: CLIOptions): LoadedConfig {
    return this.parser.loadAll(options.configPath);
  }

  private formatValue(value: IlineConfig[keyof IlineConfig]): string {
    if (Array.isArray(value)) {
      return value.join(', ');
    }
    if (typeof value === 'boolean') {
      return value ? 'on' : 'off';
    }
    return String(value);
  }
}
