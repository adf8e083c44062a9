import * as path from 'path';
import * as os from 'os';
import { ConfigError } from '../../domain/common/Errors';
import { LogLevel } from '../../domain/common/ILogger';

/**
 * CORS configuration options.
 */
export interface CorsConfig {
  enabled: boolean;
  origins: string[];
  credentials?: boolean;
}

/**
 * Language-model oracle configuration.
 */
export interface OracleConfig {
  apiKey: string | null;
  baseUrl?: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  maxRetries: number;
}

/**
 * Outbound channel configuration. Without a webhook URL messages are only logged.
 */
export interface ChannelConfig {
  webhookUrl?: string;
  timeoutMs: number;
}

/**
 * Conversation behaviour settings.
 */
export interface ConversationConfig {
  assistantDefaultName: string;
  postponeDefaultDays: number;
  historyWindow: number;
}

/**
 * Logging configuration.
 */
export interface LogConfig {
  level: LogLevel;
  format: 'json' | 'pretty';
}

export type NodeEnv = 'development' | 'production' | 'test';

/**
 * Complete configuration options.
 */
export interface ConfigOptions {
  // Server
  port: number;
  host: string;

  // Storage paths
  dataDir: string;
  promptsDir: string;

  // Collaborators
  oracle: OracleConfig;
  channel: ChannelConfig;
  conversation: ConversationConfig;
  cors: CorsConfig;

  // Operational
  log: LogConfig;

  // Environment
  nodeEnv: NodeEnv;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];
const LOG_FORMATS: readonly LogConfig['format'][] = ['json', 'pretty'];
const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];

/**
 * Expand ~ to home directory in paths.
 */
function expandPath(p: string): string {
  if (p.startsWith('~')) {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

function isOneOf<T extends string>(value: string, allowed: readonly T[]): value is T {
  return allowed.some(a => a === value);
}

function parseEnum<T extends string>(name: string, raw: string | undefined, allowed: readonly T[], fallback: T): T {
  if (raw === undefined || raw === '') return fallback;
  if (!isOneOf(raw, allowed)) {
    throw new ConfigError(`${name} must be one of: ${allowed.join(', ')}`);
  }
  return raw;
}

function parseNumber(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Centralized configuration class.
 * Loads configuration from environment variables with sensible defaults.
 */
export class Config implements Readonly<ConfigOptions> {
  private readonly config: ConfigOptions;

  constructor(env: NodeJS.ProcessEnv = process.env, overrides: Partial<ConfigOptions> = {}) {
    this.config = { ...this.loadFromEnvironment(env), ...overrides };
    this.validate();
  }

  private loadFromEnvironment(env: NodeJS.ProcessEnv): ConfigOptions {
    return {
      // Server
      port: parseNumber('PORT', env.PORT, 3000),
      host: env.HOST || '0.0.0.0',

      // Storage paths
      dataDir: expandPath(env.DATA_DIR || '~/.learning-coach/data'),
      promptsDir: expandPath(env.PROMPTS_DIR || path.resolve(__dirname, '../../../prompts')),

      // Oracle
      oracle: {
        apiKey: env.ORACLE_API_KEY || null,
        baseUrl: env.ORACLE_BASE_URL || undefined,
        model: env.ORACLE_MODEL || 'gpt-4o-mini',
        temperature: parseNumber('ORACLE_TEMPERATURE', env.ORACLE_TEMPERATURE, 0),
        timeoutMs: parseNumber('ORACLE_TIMEOUT_MS', env.ORACLE_TIMEOUT_MS, 30000),
        maxRetries: parseNumber('ORACLE_MAX_RETRIES', env.ORACLE_MAX_RETRIES, 2)
      },

      // Outbound channel
      channel: {
        webhookUrl: env.CHANNEL_WEBHOOK_URL || undefined,
        timeoutMs: parseNumber('CHANNEL_TIMEOUT_MS', env.CHANNEL_TIMEOUT_MS, 30000)
      },

      // Conversation
      conversation: {
        assistantDefaultName: env.ASSISTANT_DEFAULT_NAME || 'Study Buddy',
        postponeDefaultDays: parseNumber('POSTPONE_DEFAULT_DAYS', env.POSTPONE_DEFAULT_DAYS, 3),
        historyWindow: parseNumber('HISTORY_WINDOW', env.HISTORY_WINDOW, 20)
      },

      // CORS
      cors: {
        enabled: env.CORS_ENABLED !== 'false',
        origins: env.CORS_ORIGINS?.split(',').map(s => s.trim()) || ['*'],
        credentials: env.CORS_CREDENTIALS === 'true'
      },

      // Operational
      log: {
        level: parseEnum('LOG_LEVEL', env.LOG_LEVEL, LOG_LEVELS, 'info'),
        format: parseEnum('LOG_FORMAT', env.LOG_FORMAT, LOG_FORMATS, 'pretty')
      },

      // Environment
      nodeEnv: parseEnum('NODE_ENV', env.NODE_ENV, NODE_ENVS, 'development')
    };
  }

  /**
   * Validate configuration values.
   * @throws {ConfigError} if configuration is invalid
   */
  validate(): void {
    if (!Number.isInteger(this.config.port) || this.config.port < 1 || this.config.port > 65535) {
      throw new ConfigError('PORT must be between 1 and 65535');
    }

    // Credentials are required everywhere except under test
    if (!this.config.oracle.apiKey && this.config.nodeEnv !== 'test') {
      throw new ConfigError('ORACLE_API_KEY is required');
    }

    if (this.config.oracle.temperature < 0 || this.config.oracle.temperature > 2) {
      throw new ConfigError('ORACLE_TEMPERATURE must be between 0 and 2');
    }

    if (this.config.oracle.timeoutMs <= 0 || this.config.channel.timeoutMs <= 0) {
      throw new ConfigError('ORACLE_TIMEOUT_MS and CHANNEL_TIMEOUT_MS must be positive');
    }

    if (!Number.isInteger(this.config.oracle.maxRetries) || this.config.oracle.maxRetries < 0) {
      throw new ConfigError('ORACLE_MAX_RETRIES must be a non-negative integer');
    }

    if (!Number.isInteger(this.config.conversation.postponeDefaultDays) || this.config.conversation.postponeDefaultDays < 1) {
      throw new ConfigError('POSTPONE_DEFAULT_DAYS must be a positive integer');
    }

    if (!Number.isInteger(this.config.conversation.historyWindow) || this.config.conversation.historyWindow < 0) {
      throw new ConfigError('HISTORY_WINDOW must be a non-negative integer');
    }

    if (this.config.channel.webhookUrl) {
      try {
        new URL(this.config.channel.webhookUrl);
      } catch {
        throw new ConfigError(`Invalid CHANNEL_WEBHOOK_URL: ${this.config.channel.webhookUrl}`);
      }
    }
  }

  // Readonly accessors
  get port(): number { return this.config.port; }
  get host(): string { return this.config.host; }
  get dataDir(): string { return this.config.dataDir; }
  get promptsDir(): string { return this.config.promptsDir; }
  get oracle(): OracleConfig { return this.config.oracle; }
  get channel(): ChannelConfig { return this.config.channel; }
  get conversation(): ConversationConfig { return this.config.conversation; }
  get cors(): CorsConfig { return this.config.cors; }
  get log(): LogConfig { return this.config.log; }
  get nodeEnv(): NodeEnv { return this.config.nodeEnv; }

  get isTest(): boolean {
    return this.config.nodeEnv === 'test';
  }

  /**
   * Create a Config instance from an object (useful for testing).
   * Overrides are applied on top of the current environment.
   */
  static fromObject(overrides: Partial<ConfigOptions>, env: NodeJS.ProcessEnv = process.env): Config {
    return new Config(env, overrides);
  }

  /**
   * Get configuration as plain object, without credentials.
   */
  toJSON(): ConfigOptions {
    return {
      ...this.config,
      oracle: { ...this.config.oracle, apiKey: this.config.oracle.apiKey ? '***' : null }
    };
  }

  /**
   * Get a summary string for logging.
   */
  toString(): string {
    return [
      `Config:`,
      `  port: ${this.port}`,
      `  dataDir: ${this.dataDir}`,
      `  promptsDir: ${this.promptsDir}`,
      `  oracle.model: ${this.oracle.model}`,
      `  channel: ${this.channel.webhookUrl ? 'webhook' : 'log-only'}`,
      `  nodeEnv: ${this.nodeEnv}`
    ].join('\n');
  }
}
