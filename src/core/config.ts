/**
 * Centralized Configuration Module
 *
 * Type-safe environment variable management for the table controller.
 * All environment variables should be accessed through this module.
 */

import * as dotenv from 'dotenv';
import { ConfigValidationError } from './errors.js';

// Load environment variables from .env file
dotenv.config();

/**
 * Log levels supported by the application
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Node environments
 */
export type NodeEnv = 'development' | 'production' | 'test';

/**
 * Defaults applied to every controller unless its init options override them
 */
export interface TableDefaultsConfig {
  readonly pageSize: number;
  readonly copyItems: boolean;
  readonly clearSelectionOnPageChange: boolean;
  /** 0 disables the fetch deadline */
  readonly fetchTimeoutMs: number;
}

/**
 * Application configuration
 */
export interface AppConfig {
  readonly nodeEnv: NodeEnv;
  readonly logLevel: LogLevel;
  readonly table: TableDefaultsConfig;
}

/**
 * Parse and validate environment variables
 */
class Config {
  private readonly config: AppConfig;

  constructor() {
    this.config = this.parseEnvironment();
    this.validateConfig();
  }

  private parseEnvironment(): AppConfig {
    return {
      nodeEnv: this.getNodeEnv(),
      logLevel: this.getLogLevel(),
      table: {
        pageSize: this.getNumberEnv('TABLE_DEFAULT_PAGE_SIZE', 20),
        copyItems: this.getBooleanEnv('TABLE_COPY_ITEMS', false),
        clearSelectionOnPageChange: this.getBooleanEnv('TABLE_CLEAR_SELECTION_ON_PAGE_CHANGE', false),
        fetchTimeoutMs: this.getNumberEnv('TABLE_FETCH_TIMEOUT_MS', 0),
      },
    };
  }

  private getNodeEnv(): NodeEnv {
    const env = process.env.NODE_ENV?.toLowerCase();
    if (env === 'production' || env === 'test') {
      return env;
    }
    return 'development';
  }

  private getLogLevel(): LogLevel {
    const level = process.env.LOG_LEVEL?.toLowerCase();
    if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
      return level;
    }
    return 'info';
  }

  /**
   * Get numeric environment variable with default
   */
  private getNumberEnv(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      console.error(`Invalid number for ${key}="${value}", using default: ${defaultValue}`);
      return defaultValue;
    }
    return parsed;
  }

  /**
   * Get boolean environment variable with default
   */
  private getBooleanEnv(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private validateConfig(): void {
    if (this.config.table.pageSize <= 0) {
      throw new ConfigValidationError(
        `TABLE_DEFAULT_PAGE_SIZE must be positive, got ${this.config.table.pageSize}`,
        'TABLE_DEFAULT_PAGE_SIZE'
      );
    }

    if (this.config.table.fetchTimeoutMs < 0) {
      throw new ConfigValidationError(
        `TABLE_FETCH_TIMEOUT_MS must be non-negative, got ${this.config.table.fetchTimeoutMs}`,
        'TABLE_FETCH_TIMEOUT_MS'
      );
    }
  }

  public getConfig(): Readonly<AppConfig> {
    return this.config;
  }

  public get nodeEnv(): NodeEnv {
    return this.config.nodeEnv;
  }

  public get logLevel(): LogLevel {
    return this.config.logLevel;
  }

  /**
   * Get controller defaults
   */
  public get table(): Readonly<TableDefaultsConfig> {
    return this.config.table;
  }

  public get isDevelopment(): boolean {
    return this.config.nodeEnv === 'development';
  }

  public get isProduction(): boolean {
    return this.config.nodeEnv === 'production';
  }

  public get isTest(): boolean {
    return this.config.nodeEnv === 'test';
  }
}

// Create singleton instance
const configInstance = new Config();

export const config = configInstance;

// Export convenience accessors
export const tableDefaults = configInstance.table;
export const isDevelopment = configInstance.isDevelopment;
export const isProduction = configInstance.isProduction;
export const isTest = configInstance.isTest;
export const nodeEnv = configInstance.nodeEnv;
export const logLevel = configInstance.logLevel;
