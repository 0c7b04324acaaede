/**
 * Centralized Configuration Module
 *
 * Type-safe environment variable management for the NAV service client.
 * All environment variables should be accessed through this module.
 */

import * as dotenv from 'dotenv';
import { ConfigValidationError } from './errors.js';
import {
  NavEndpointsConfigSchema,
  formatZodIssues,
} from '../validation/schemas.js';
import type { NavEndpointsConfig } from '../connection/endpoint.js';

// Load environment variables from .env file
dotenv.config();

/**
 * Log levels supported by the application
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Node environments
 */
export type NodeEnv = 'development' | 'production' | 'test';

/**
 * Environment source (process.env or a test double)
 */
export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Application configuration
 */
export interface AppConfig {
  readonly nodeEnv: NodeEnv;
  readonly logLevel: LogLevel;
  /** HTTP timeout applied by the default transport, in milliseconds */
  readonly timeout: number;
}

const DEFAULT_ODATA_PORT = 7048;
const DEFAULT_SOAP_PORT = 7047;
const DEFAULT_TIMEOUT_MS = 100000;

function getNumberEnv(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigValidationError(`Invalid number for ${key}="${value}"`, key);
  }
  return parsed;
}

/**
 * Build the OData and SOAP endpoint descriptors from environment variables.
 *
 * Both endpoints share host, instance, company and credentials; they differ in
 * port and service type. A bearer token takes precedence over a username.
 *
 * @throws {ConfigValidationError} If the resulting descriptors are invalid
 */
export function loadNavEndpoints(env: Env = process.env): NavEndpointsConfig {
  const credentials = env.NAV_BEARER_TOKEN
    ? { kind: 'bearer', token: env.NAV_BEARER_TOKEN }
    : env.NAV_USERNAME
      ? { kind: 'basic', username: env.NAV_USERNAME, password: env.NAV_PASSWORD ?? '' }
      : { kind: 'ambient' };

  const shared = {
    host: env.NAV_HOST || 'http://localhost',
    serverInstance: env.NAV_SERVER_INSTANCE || 'BC',
    company: env.NAV_COMPANY || 'CRONUS',
    credentials,
  };

  const candidate = {
    odata: {
      ...shared,
      port: getNumberEnv(env, 'NAV_ODATA_PORT', DEFAULT_ODATA_PORT),
      serviceType: 'ODataV4',
    },
    soap: {
      ...shared,
      port: getNumberEnv(env, 'NAV_SOAP_PORT', DEFAULT_SOAP_PORT),
      serviceType: 'SOAP',
      objectType: env.NAV_OBJECT_TYPE || 'Page',
    },
  };

  const parsed = NavEndpointsConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigValidationError(
      'Invalid NAV endpoint configuration',
      undefined,
      { issues: formatZodIssues(parsed.error) }
    );
  }
  return parsed.data;
}

/**
 * Parse and validate environment variables
 */
class Config {
  private readonly config: AppConfig;
  private navEndpoints: NavEndpointsConfig | undefined;

  constructor(private readonly env: Env) {
    this.config = this.parseEnvironment();
  }

  /**
   * Parse environment variables with defaults
   */
  private parseEnvironment(): AppConfig {
    return {
      nodeEnv: this.getNodeEnv(),
      logLevel: this.getLogLevel(),
      timeout: getNumberEnv(this.env, 'NAV_TIMEOUT', DEFAULT_TIMEOUT_MS),
    };
  }

  /**
   * Get Node environment with validation
   */
  private getNodeEnv(): NodeEnv {
    const env = this.env.NODE_ENV?.toLowerCase();
    if (env === 'production' || env === 'test') {
      return env;
    }
    return 'development';
  }

  /**
   * Get log level with validation
   */
  private getLogLevel(): LogLevel {
    const level = this.env.LOG_LEVEL?.toLowerCase();
    if (
      level === 'debug' ||
      level === 'info' ||
      level === 'warn' ||
      level === 'error' ||
      level === 'silent'
    ) {
      return level;
    }
    return 'info';
  }

  public get nodeEnv(): NodeEnv {
    return this.config.nodeEnv;
  }

  public get logLevel(): LogLevel {
    return this.config.logLevel;
  }

  public get timeout(): number {
    return this.config.timeout;
  }

  /**
   * NAV endpoints, validated on first access so that importing the library
   * never fails on an incomplete environment.
   */
  public get nav(): NavEndpointsConfig {
    if (!this.navEndpoints) {
      this.navEndpoints = loadNavEndpoints(this.env);
    }
    return this.navEndpoints;
  }

  public get isDevelopment(): boolean {
    return this.config.nodeEnv === 'development';
  }

  public get isTest(): boolean {
    return this.config.nodeEnv === 'test';
  }
}

// Create singleton instance
const configInstance = new Config(process.env);

// Export the singleton
export const config = configInstance;

// Export convenience accessors
export const isDevelopment = configInstance.isDevelopment;
export const logLevel = configInstance.logLevel;
