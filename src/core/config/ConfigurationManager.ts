import * as fs from 'fs';
import * as path from 'path';

import { ZapConnectionConfig } from '../../types/config';
import { isRecord, readString } from '../../utils/helpers/common-helpers';
import { Logger } from '../../utils/logger/Logger';
import { validateConnectionConfig } from '../../utils/validators/config-validator';
import { UsageError, getErrorMessage } from '../errors';

export const DEFAULT_CONNECTION_CONFIG: Readonly<ZapConnectionConfig> = {
  zapPath: '/zap',
  port: 8090,
  zapUrl: 'http://127.0.0.1',
  apiKey: '',
  softFail: false,
};

/**
 * ConfigurationManager - loads and validates how to reach the ZAP daemon.
 *
 * Values from a JSON file fill in whatever the command line and environment
 * left at their defaults.
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;
  private logger: Logger;
  private currentConfig: ZapConnectionConfig | null = null;

  private constructor() {
    this.logger = new Logger({ prefix: 'ConfigurationManager' });
  }

  public static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  public setLogger(logger: Logger): void {
    this.logger = logger;
  }

  /**
   * Read a partial configuration from a JSON file
   */
  public loadFromFile(filePath: string): Partial<ZapConnectionConfig> {
    const absolutePath = path.resolve(filePath);
    this.logger.debug(`Loading configuration from: ${absolutePath}`);

    if (!fs.existsSync(absolutePath)) {
      throw new UsageError(`Configuration file not found: ${absolutePath}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(absolutePath, 'utf-8'));
    } catch (error) {
      throw new UsageError(`Cannot parse configuration file ${absolutePath}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
    if (!isRecord(parsed)) {
      throw new UsageError(`Configuration file ${absolutePath} must contain a JSON object`);
    }
    return parseConnectionFields(parsed);
  }

  /**
   * Merge sources over the defaults, validate and keep the result
   */
  public loadFromObject(...sources: Partial<ZapConnectionConfig>[]): ZapConnectionConfig {
    const merged: ZapConnectionConfig = { ...DEFAULT_CONNECTION_CONFIG };
    for (const source of sources) {
      for (const [key, value] of Object.entries(source)) {
        if (value !== undefined) Object.assign(merged, { [key]: value });
      }
    }

    const validation = validateConnectionConfig(merged);
    if (!validation.valid) {
      throw new UsageError(`Invalid configuration: ${validation.errors.join(', ')}`);
    }

    this.currentConfig = merged;
    this.logger.debug(`Using ZAP at ${merged.zapUrl}:${merged.port} (install path ${merged.zapPath})`);
    return merged;
  }

  public getConfig(): ZapConnectionConfig {
    if (!this.currentConfig) {
      throw new Error('No configuration loaded. Load a configuration first.');
    }
    return this.currentConfig;
  }

  public reset(): void {
    this.currentConfig = null;
  }
}

function parseConnectionFields(raw: Record<string, unknown>): Partial<ZapConnectionConfig> {
  const result: Partial<ZapConnectionConfig> = {};

  const zapPath = readString(raw, 'zapPath');
  if (zapPath !== undefined) result.zapPath = zapPath;

  const zapUrl = readString(raw, 'zapUrl');
  if (zapUrl !== undefined) result.zapUrl = zapUrl;

  const apiKey = readString(raw, 'apiKey');
  if (apiKey !== undefined) result.apiKey = apiKey;

  const logPath = readString(raw, 'logPath');
  if (logPath !== undefined) result.logPath = logPath;

  if (raw.port !== undefined) {
    const port = Number(raw.port);
    if (Number.isNaN(port)) {
      throw new UsageError(`Configuration field "port" must be a number, got ${String(raw.port)}`);
    }
    result.port = port;
  }

  if (typeof raw.softFail === 'boolean') result.softFail = raw.softFail;

  return result;
}
