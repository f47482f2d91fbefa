import { isAbsolute, resolve } from 'node:path';

import { InvalidToolConfigError } from './errors.js';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/**
 * Runtime settings shared by both stand-ins.
 *
 * Everything comes from the environment because the real callers only ever
 * pass the arguments the genuine tools accept.
 */
export interface ToolConfig {
  /** Directory that files such as multiversion-config.yml are created in. */
  readonly workdir: string;
  readonly logLevel: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Parse a log level name, falling back to the default when unset.
 */
export function parseLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase() ?? '';
  if (value === '') {
    return DEFAULT_LOG_LEVEL;
  }
  if (!isLogLevel(value)) {
    throw new InvalidToolConfigError('MOCK_TOOLS_LOG_LEVEL', value);
  }
  return value;
}

/**
 * Load tool settings.
 *
 * MOCK_TOOLS_WORKDIR overrides the working directory; a relative value
 * resolves against `cwd`. MOCK_TOOLS_LOG_LEVEL picks the logger level.
 */
export function loadToolConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ToolConfig {
  const rawWorkdir = env['MOCK_TOOLS_WORKDIR']?.trim() ?? '';
  let workdir = cwd;
  if (rawWorkdir !== '') {
    workdir = isAbsolute(rawWorkdir) ? rawWorkdir : resolve(cwd, rawWorkdir);
  }

  return {
    workdir,
    logLevel: parseLogLevel(env['MOCK_TOOLS_LOG_LEVEL'])
  };
}
