import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command, CommanderError } from 'commander';

import { logger } from './logger.js';

export type ExitCode = 0 | 1;

export const VERSION = '0.1.0';

/**
 * Anything text can be written to. `process.stdout` satisfies it, and so do
 * the capturing sinks the tests use.
 */
export interface OutputSink {
  write(chunk: string): unknown;
}

export interface CliIo {
  readonly stdout: OutputSink;
  readonly stderr: OutputSink;
}

export const processIo: CliIo = {
  stdout: process.stdout,
  stderr: process.stderr
};

/**
 * Commander program that reports through `io` and throws instead of calling
 * process.exit, so `runProgram` can turn every outcome into an exit code.
 */
export function createProgram(name: string, description: string, io: CliIo): Command {
  return new Command()
    .name(name)
    .description(description)
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: text => {
        io.stdout.write(text);
      },
      writeErr: text => {
        io.stderr.write(text);
      }
    });
}

export async function runProgram(
  program: Command,
  argv: readonly string[],
  io: CliIo
): Promise<ExitCode> {
  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help and --version surface as errors with exit code 0.
      return error.exitCode === 0 ? 0 : 1;
    }

    logger.debug({ err: error, program: program.name() }, 'Command failed');
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`ERROR: ${message}\n`);
    return 1;
  }
}

/**
 * True when the module at `moduleUrl` is the script node was started with,
 * including when it was reached through an npm bin symlink.
 */
export function isEntryPoint(moduleUrl: string): boolean {
  const script = process.argv[1];
  if (script === undefined) {
    return false;
  }

  try {
    return moduleUrl === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}
