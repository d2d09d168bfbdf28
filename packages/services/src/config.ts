/**
 * Configuration service
 *
 * Defaults, then an optional JSON file, then environment variables.
 * Read once at startup; nothing reconfigures it at runtime.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { isLogLevel, resolvePath, type LogLevel } from '@pixhold/utils';

export interface AppConfig {
  dataDir: string;
  uploadDir: string;
  dbPath: string;
  host: string;
  port: number;
  logLevel: LogLevel;
  logFile?: string;
  maxFileSize: number;
  publicBasePath: string;
  pageSize: number;
  /** `true` reflects the request origin, a string pins one */
  corsOrigin: boolean | string;
}

export const MIB = 1024 * 1024;

const DEFAULT_DATA_DIR = './data';

export function defaultConfig(dataDir: string = DEFAULT_DATA_DIR): AppConfig {
  const root = resolvePath(dataDir);
  return {
    dataDir: root,
    uploadDir: path.join(root, 'images'),
    dbPath: path.join(root, 'pixhold.sqlite'),
    host: '0.0.0.0',
    port: 8000,
    logLevel: 'info',
    maxFileSize: 5 * MIB,
    publicBasePath: '/images',
    pageSize: 10,
    corsOrigin: true
  };
}

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export class ConfigService {
  private config: AppConfig;

  constructor(initialConfig: Partial<AppConfig> = {}) {
    const { dataDir, ...rest } = initialConfig;
    this.config = defaultConfig(dataDir);
    this.merge(rest);
  }

  /**
   * Build from the process environment, honouring PIXHOLD_CONFIG
   */
  static fromEnv(env: Env = process.env): ConfigService {
    const dataDir = env['PIXHOLD_DATA_DIR'];
    const service = new ConfigService(dataDir ? { dataDir: resolvePath(dataDir) } : {});

    const configFile = env['PIXHOLD_CONFIG'];
    if (configFile) {
      service.loadFromFile(resolvePath(configFile));
    }

    service.merge(parseEnv(env));
    return service;
  }

  get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return this.config[key];
  }

  getAll(): AppConfig {
    return { ...this.config };
  }

  /** Merge partial config into current config */
  merge(partial: Partial<AppConfig>): void {
    const { dataDir, ...rest } = partial;

    if (dataDir !== undefined && dataDir !== this.config.dataDir) {
      // Derived paths follow dataDir unless they were set explicitly
      const previous = defaultConfig(this.config.dataDir);
      const next = defaultConfig(dataDir);
      if (this.config.uploadDir === previous.uploadDir) this.config.uploadDir = next.uploadDir;
      if (this.config.dbPath === previous.dbPath) this.config.dbPath = next.dbPath;
      this.config.dataDir = next.dataDir;
    }

    const defined = Object.fromEntries(
      Object.entries(rest).filter(([, value]) => value !== undefined)
    );
    Object.assign(this.config, defined);
  }

  /** Validate the current configuration */
  validate(): string[] {
    const errors: string[] = [];
    const c = this.config;

    if (!c.uploadDir) {
      errors.push('uploadDir is required');
    }
    if (!c.dbPath) {
      errors.push('dbPath is required');
    }
    if (!Number.isInteger(c.port) || c.port < 0 || c.port > 65535) {
      errors.push('port must be an integer between 0 and 65535');
    }
    if (!Number.isInteger(c.maxFileSize) || c.maxFileSize < 1) {
      errors.push('maxFileSize must be a positive integer');
    }
    if (!Number.isInteger(c.pageSize) || c.pageSize < 1) {
      errors.push('pageSize must be a positive integer');
    }
    if (!isLogLevel(c.logLevel)) {
      errors.push(`logLevel "${String(c.logLevel)}" is not a pino level`);
    }
    if (!c.publicBasePath) {
      errors.push('publicBasePath is required');
    }

    return errors;
  }

  /** Throws ConfigError listing every problem */
  assertValid(): AppConfig {
    const errors = this.validate();
    if (errors.length > 0) {
      throw new ConfigError(errors);
    }
    return this.getAll();
  }

  /** Load configuration from a JSON file */
  loadFromFile(configPath: string): void {
    if (!fs.existsSync(configPath)) {
      throw new ConfigError([`config file ${configPath} does not exist`]);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError([`config file ${configPath} is not valid JSON: ${String(err)}`]);
    }

    this.merge(parseFileConfig(parsed, path.dirname(configPath)));
  }
}

// ─── Parsing ────────────────────────────────────────────────────────

function parseInteger(name: string, raw: string): number {
  const value = Number(raw.trim());
  if (!Number.isInteger(value)) {
    throw new ConfigError([`${name} must be an integer, got "${raw}"`]);
  }
  return value;
}

function parseCorsOrigin(raw: string): boolean | string {
  const value = raw.trim();
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

function parseLogLevel(name: string, raw: string): LogLevel {
  const value = raw.trim().toLowerCase();
  if (!isLogLevel(value)) {
    throw new ConfigError([`${name} "${raw}" is not a pino level`]);
  }
  return value;
}

export function parseEnv(env: Env): Partial<AppConfig> {
  const out: Partial<AppConfig> = {};

  const uploadDir = env['PIXHOLD_UPLOAD_DIR'];
  const dbPath = env['PIXHOLD_DB_PATH'];
  const host = env['HOST'];
  const port = env['PORT'];
  const logLevel = env['LOG_LEVEL'];
  const logFile = env['PIXHOLD_LOG_FILE'];
  const maxFileSize = env['PIXHOLD_MAX_FILE_SIZE'];
  const publicBasePath = env['PIXHOLD_PUBLIC_BASE_PATH'];
  const pageSize = env['PIXHOLD_PAGE_SIZE'];
  const corsOrigin = env['PIXHOLD_CORS_ORIGIN'];

  if (uploadDir) out.uploadDir = resolvePath(uploadDir);
  if (dbPath) out.dbPath = dbPath === ':memory:' ? dbPath : resolvePath(dbPath);
  if (host) out.host = host;
  if (port) out.port = parseInteger('PORT', port);
  if (logLevel) out.logLevel = parseLogLevel('LOG_LEVEL', logLevel);
  if (logFile) out.logFile = resolvePath(logFile);
  if (maxFileSize) out.maxFileSize = parseInteger('PIXHOLD_MAX_FILE_SIZE', maxFileSize);
  if (publicBasePath) out.publicBasePath = publicBasePath;
  if (pageSize) out.pageSize = parseInteger('PIXHOLD_PAGE_SIZE', pageSize);
  if (corsOrigin) out.corsOrigin = parseCorsOrigin(corsOrigin);

  return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Picks the known keys out of a parsed JSON file. Relative paths resolve
 * against the file's directory.
 */
export function parseFileConfig(raw: unknown, baseDir: string): Partial<AppConfig> {
  if (!isRecord(raw)) {
    throw new ConfigError(['config file must contain a JSON object']);
  }

  const problems: string[] = [];
  const out: Partial<AppConfig> = {};

  const str = (key: keyof AppConfig): string | undefined => {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
      problems.push(`${key} must be a string`);
      return undefined;
    }
    return value;
  };
  const int = (key: keyof AppConfig): number | undefined => {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      problems.push(`${key} must be an integer`);
      return undefined;
    }
    return value;
  };

  const dataDir = str('dataDir');
  const uploadDir = str('uploadDir');
  const dbPath = str('dbPath');
  const host = str('host');
  const logLevel = str('logLevel');
  const logFile = str('logFile');
  const publicBasePath = str('publicBasePath');
  const port = int('port');
  const maxFileSize = int('maxFileSize');
  const pageSize = int('pageSize');

  if (dataDir !== undefined) out.dataDir = resolvePath(dataDir, baseDir);
  if (uploadDir !== undefined) out.uploadDir = resolvePath(uploadDir, baseDir);
  if (dbPath !== undefined) out.dbPath = dbPath === ':memory:' ? dbPath : resolvePath(dbPath, baseDir);
  if (host !== undefined) out.host = host;
  if (logFile !== undefined) out.logFile = resolvePath(logFile, baseDir);
  if (publicBasePath !== undefined) out.publicBasePath = publicBasePath;
  if (port !== undefined) out.port = port;
  if (maxFileSize !== undefined) out.maxFileSize = maxFileSize;
  if (pageSize !== undefined) out.pageSize = pageSize;

  if (logLevel !== undefined) {
    if (isLogLevel(logLevel)) {
      out.logLevel = logLevel;
    } else {
      problems.push(`logLevel "${logLevel}" is not a pino level`);
    }
  }

  const corsOrigin = raw['corsOrigin'];
  if (typeof corsOrigin === 'boolean' || typeof corsOrigin === 'string') {
    out.corsOrigin = corsOrigin;
  } else if (corsOrigin !== undefined) {
    problems.push('corsOrigin must be a boolean or a string');
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return out;
}
