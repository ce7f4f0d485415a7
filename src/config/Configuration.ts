import * as dotenv from 'dotenv';
import { existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

import { CLIENT_NAME } from '../constants.js';
import type { LogLevel } from '../infrastructure/logging/Logger.js';
import {
  EnvironmentSchema,
  summarizeIssues,
  type UpdateFailurePolicy
} from '../schemas/index.js';

export type EnvironmentSource = Readonly<Record<string, string | undefined>>;

/**
 * Application Configuration
 * Loads and validates environment variables for the ticket backend and logging
 */
export class Configuration {
  // Ticket backend
  public readonly apiUrl: string;
  public readonly apiTimeoutMs: number;

  // What to do with the local status when the backend rejects an update
  public readonly updateFailurePolicy: UpdateFailurePolicy;

  // Logging
  public readonly logLevel: LogLevel;
  public readonly logFilePath: string | null;

  constructor(env: EnvironmentSource = Configuration.loadEnvironment()) {
    // Empty values count as unset
    const present = Object.fromEntries(
      Object.entries(env).filter(([, value]) => value !== undefined && value.trim().length > 0)
    );

    const parsed = EnvironmentSchema.safeParse(present);
    if (!parsed.success) {
      throw new Error(`Invalid configuration: ${summarizeIssues(parsed.error)}`);
    }

    this.apiUrl = parsed.data.TICKET_API_URL;
    this.apiTimeoutMs = parsed.data.TICKET_API_TIMEOUT_MS;
    this.updateFailurePolicy = parsed.data.STATUS_UPDATE_FAILURE;
    this.logLevel = parsed.data.LOG_LEVEL;
    this.logFilePath = Configuration.resolveLogFile(parsed.data.LOG_FILE);
  }

  /**
   * Directory holding the optional .env file and the default log
   */
  static configDirectory(): string {
    return join(homedir(), '.config', CLIENT_NAME);
  }

  /**
   * Load .env into process.env and return it
   * The per-user config directory wins; the working directory is the fallback for development
   */
  static loadEnvironment(): EnvironmentSource {
    const envPath = join(Configuration.configDirectory(), '.env');
    if (existsSync(envPath)) {
      dotenv.config({ path: envPath });
    } else {
      dotenv.config();
    }
    return process.env;
  }

  private static resolveLogFile(value: string | undefined): string | null {
    if (value === undefined) {
      return join(Configuration.configDirectory(), 'logs', 'client.log');
    }
    return value.toLowerCase() === 'off' ? null : value;
  }

  /**
   * One-line summaries of the active configuration
   */
  public summary(): string[] {
    return [
      `API URL: ${this.apiUrl}`,
      `Request timeout: ${this.apiTimeoutMs}ms`,
      `On failed status update: ${this.updateFailurePolicy}`,
      `Log level: ${this.logLevel}`,
      `Log file: ${this.logFilePath ?? 'off'}`
    ];
  }
}
