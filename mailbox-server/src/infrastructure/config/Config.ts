import { ConfigError } from '../../domain/common/Errors';

/**
 * CORS configuration options.
 */
export interface CorsConfig {
  enabled: boolean;
  origins: string[];
  credentials?: boolean;
}

/**
 * Logging configuration.
 */
export interface LogConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  format: 'json' | 'pretty';
}

/**
 * Simulated mailbox settings.
 */
export interface MailboxConfig {
  /** Owner address: sender of sent mail, recipient of seeded mail */
  userAddress: string;
  seedOnStart: boolean;
  /** Upper bound for one generate_* tool call */
  maxGenerate: number;
}

/**
 * Complete configuration options.
 */
export interface ConfigOptions {
  // Server
  port: number;
  host: string;
  serverUrl: string;

  cors: CorsConfig;
  mailbox: MailboxConfig;

  // Operational
  log: LogConfig;

  // Environment
  nodeEnv: 'development' | 'production' | 'test';
}

const LOG_LEVELS: readonly LogConfig['level'][] = ['error', 'warn', 'info', 'debug'];
const LOG_FORMATS: readonly LogConfig['format'][] = ['json', 'pretty'];
const NODE_ENVS: readonly ConfigOptions['nodeEnv'][] = ['development', 'production', 'test'];

function pick<T extends string>(allowed: readonly T[], raw: string | undefined, fallback: T, name: string): T {
  if (raw === undefined || raw === '') return fallback;
  const match = allowed.find(v => v === raw);
  if (!match) {
    throw new ConfigError(`${name} must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

/**
 * Centralized configuration class.
 * Loads configuration from environment variables with sensible defaults.
 */
export class Config implements Readonly<ConfigOptions> {
  private readonly config: ConfigOptions;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadFromEnvironment(env);
    this.validate();
  }

  private loadFromEnvironment(env: NodeJS.ProcessEnv): ConfigOptions {
    const port = parseInt(env.PORT || '3000', 10);
    const host = env.HOST || '0.0.0.0';

    return {
      // Server
      port,
      host,
      serverUrl: env.SERVER_URL || `http://localhost:${port}`,

      // CORS
      cors: {
        enabled: env.CORS_ENABLED !== 'false',
        origins: env.CORS_ORIGINS?.split(',').map(s => s.trim()) || ['*'],
        credentials: env.CORS_CREDENTIALS === 'true'
      },

      mailbox: {
        userAddress: env.MAILBOX_USER_ADDRESS || 'user@example.com',
        seedOnStart: env.MAILBOX_SEED_ON_START !== 'false',
        maxGenerate: parseInt(env.MAILBOX_MAX_GENERATE || '50', 10)
      },

      // Operational
      log: {
        level: pick(LOG_LEVELS, env.LOG_LEVEL, 'info', 'LOG_LEVEL'),
        format: pick(LOG_FORMATS, env.LOG_FORMAT, 'pretty', 'LOG_FORMAT')
      },

      // Environment
      nodeEnv: pick(NODE_ENVS, env.NODE_ENV, 'development', 'NODE_ENV')
    };
  }

  /**
   * Validate configuration values.
   * @throws {ConfigError} if configuration is invalid
   */
  validate(): void {
    if (isNaN(this.config.port) || this.config.port < 1 || this.config.port > 65535) {
      throw new ConfigError('PORT must be between 1 and 65535');
    }

    const { maxGenerate, userAddress } = this.config.mailbox;
    if (isNaN(maxGenerate) || maxGenerate < 1 || maxGenerate > 500) {
      throw new ConfigError('MAILBOX_MAX_GENERATE must be between 1 and 500');
    }

    if (!userAddress.includes('@')) {
      throw new ConfigError('MAILBOX_USER_ADDRESS must be an email address');
    }
  }

  // Readonly accessors
  get port(): number { return this.config.port; }
  get host(): string { return this.config.host; }
  get serverUrl(): string { return this.config.serverUrl; }
  get cors(): CorsConfig { return this.config.cors; }
  get mailbox(): MailboxConfig { return this.config.mailbox; }
  get log(): LogConfig { return this.config.log; }
  get nodeEnv(): ConfigOptions['nodeEnv'] { return this.config.nodeEnv; }

  get isProduction(): boolean {
    return this.config.nodeEnv === 'production';
  }

  get isTest(): boolean {
    return this.config.nodeEnv === 'test';
  }

  /**
   * Create a Config instance from an object (useful for testing).
   */
  static fromObject(overrides: Partial<ConfigOptions>, env: NodeJS.ProcessEnv = {}): Config {
    const config = new Config(env);
    Object.assign(config.config, overrides);
    config.validate();
    return config;
  }

  /**
   * Get a summary string for logging.
   */
  toString(): string {
    return [
      `Config:`,
      `  port: ${this.port}`,
      `  host: ${this.host}`,
      `  mailbox.userAddress: ${this.mailbox.userAddress}`,
      `  mailbox.seedOnStart: ${this.mailbox.seedOnStart}`,
      `  log.level: ${this.log.level}`,
      `  nodeEnv: ${this.nodeEnv}`,
    ].join('\n');
  }
}
