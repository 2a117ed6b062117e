import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYAML } from 'yaml';
import type { LogLevel } from '@polybridge/types';
import { POLYBRIDGE_VERSION, getSchemaVersion } from '../version.js';
import { ConfigError } from '../errors/BridgeError.js';
import { isLogLevel } from '../logging/Logger.js';

/**
 * Project configuration.
 *
 * YAML Location: .polybridge/config.yaml (preferred) or .polybridge/config.json
 *
 * Example config.yaml:
 *
 * ```yaml
 * version: "0.1.0"
 * hierarchy: bridge/hierarchy.yaml   # relative to the project root
 * logLevel: debug
 * logFile: .polybridge/dispatch.log
 * ```
 */
export interface BridgeConfig {
  /**
   * Config schema version (major.minor.patch). If omitted, no version check
   * is performed.
   */
  version?: string;

  /** Hierarchy file, relative to the project root */
  hierarchy: string;

  logLevel: LogLevel;

  /** Optional log file; records at debug level regardless of logLevel */
  logFile?: string;
}

export const DEFAULT_CONFIG: BridgeConfig = {
  version: getSchemaVersion(POLYBRIDGE_VERSION),
  hierarchy: 'hierarchy.yaml',
  logLevel: 'warnings',
};

/**
 * Load config from a project directory.
 *
 * Priority:
 * 1. .polybridge/config.yaml
 * 2. .polybridge/config.json
 * 3. DEFAULT_CONFIG
 *
 * A file that cannot be parsed is reported through `logger.warn` and replaced
 * by the defaults. A file that parses but has invalid fields throws ConfigError.
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console
): BridgeConfig {
  const configDir = join(projectPath, '.polybridge');
  const candidates = [
    { path: join(configDir, 'config.yaml'), parse: (text: string): unknown => parseYAML(text) },
    { path: join(configDir, 'config.json'), parse: (text: string): unknown => JSON.parse(text) },
  ];

  for (const candidate of candidates) {
    if (!existsSync(candidate.path)) continue;

    let parsed: unknown;
    try {
      parsed = candidate.parse(readFileSync(candidate.path, 'utf-8'));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.warn(`Failed to parse ${candidate.path}: ${error.message}`);
      logger.warn('Using default configuration');
      return DEFAULT_CONFIG;
    }

    // Outside the try: invalid fields must throw
    return validateConfig(parsed ?? {}, candidate.path);
  }

  return DEFAULT_CONFIG;
}

/**
 * Check field types and merge over DEFAULT_CONFIG.
 */
export function validateConfig(raw: unknown, filePath?: string): BridgeConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw configInvalid('config must be a mapping', filePath);
  }

  const fields = new Map<string, unknown>(Object.entries(raw));
  validateVersion(fields.get('version'));

  const config: BridgeConfig = { ...DEFAULT_CONFIG };

  const version = fields.get('version');
  if (typeof version === 'string') config.version = version;

  const hierarchy = fields.get('hierarchy');
  if (hierarchy !== undefined && hierarchy !== null) {
    if (typeof hierarchy !== 'string' || !hierarchy.trim()) {
      throw configInvalid('hierarchy must be a non-empty string', filePath);
    }
    config.hierarchy = hierarchy;
  }

  const logLevel = fields.get('logLevel');
  if (logLevel !== undefined && logLevel !== null) {
    if (!isLogLevel(logLevel)) {
      throw configInvalid(
        `logLevel must be one of silent, errors, warnings, info, debug; got ${JSON.stringify(logLevel)}`,
        filePath
      );
    }
    config.logLevel = logLevel;
  }

  const logFile = fields.get('logFile');
  if (logFile !== undefined && logFile !== null) {
    if (typeof logFile !== 'string' || !logFile.trim()) {
      throw configInvalid('logFile must be a non-empty string', filePath);
    }
    config.logFile = logFile;
  }

  return config;
}

/**
 * Validate config version compatibility with the running version.
 * Compares major.minor.patch; a missing version passes.
 *
 * @param currentVersion - Override for testing (defaults to POLYBRIDGE_VERSION)
 */
export function validateVersion(configVersion: unknown, currentVersion?: string): void {
  if (configVersion === undefined || configVersion === null) {
    return;
  }

  if (typeof configVersion !== 'string') {
    throw configInvalid(`version must be a string, got ${typeof configVersion}`);
  }

  if (!configVersion.trim()) {
    throw configInvalid('version cannot be empty');
  }

  const current = currentVersion ?? POLYBRIDGE_VERSION;
  const expected = getSchemaVersion(current);

  if (getSchemaVersion(configVersion) !== expected) {
    throw new ConfigError(
      `Config version "${configVersion}" is not compatible with polybridge ${current}`,
      'ERR_CONFIG_INVALID',
      { version: configVersion },
      `Set version to "${expected}"`
    );
  }
}

function configInvalid(message: string, filePath?: string): ConfigError {
  return new ConfigError(`Config error: ${message}`, 'ERR_CONFIG_INVALID', filePath ? { filePath } : {});
}
