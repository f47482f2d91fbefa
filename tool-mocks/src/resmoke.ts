#!/usr/bin/env node
import { join } from 'node:path';

import { type CliIo, type ExitCode, type OutputSink, createProgram, isEntryPoint, processIo, runProgram } from './cli.js';
import { UnrecognizedSubcommandError } from './errors.js';
import { type FileSystemAdapter, NodeFileSystemAdapter } from './fileSystemAdapter.js';
import { applyLogLevel, logger } from './logger.js';
import { MULTIVERSION_CONFIG, MULTIVERSION_CONFIG_FILE, SUITE_CONFIG, renderTestDiscovery } from './templates.js';
import { type ToolConfig, loadToolConfig } from './toolConfig.js';

export const SUBCOMMANDS = ['multiversion-config', 'suiteconfig', 'test-discovery'] as const;

export type Subcommand = (typeof SUBCOMMANDS)[number];

export type RunResult =
  | { readonly kind: 'printed'; readonly subcommand: Subcommand }
  | { readonly kind: 'file-created'; readonly path: string }
  | { readonly kind: 'file-exists'; readonly path: string };

export interface RunDeps {
  readonly stdout: OutputSink;
  readonly fileSystem: FileSystemAdapter;
  /** Directory multiversion-config.yml is created in. */
  readonly workdir: string;
}

export interface ResmokeDeps {
  readonly io: CliIo;
  readonly fileSystem: FileSystemAdapter;
  readonly config: ToolConfig;
}

function isSubcommand(value: string): value is Subcommand {
  return SUBCOMMANDS.some(subcommand => subcommand === value);
}

export function parseSubcommand(value: string): Subcommand {
  if (!isSubcommand(value)) {
    throw new UnrecognizedSubcommandError(value, SUBCOMMANDS);
  }
  return value;
}

function unreachable(value: never): never {
  throw new UnrecognizedSubcommandError(String(value), SUBCOMMANDS);
}

async function writeMultiversionConfig(deps: RunDeps): Promise<RunResult> {
  const path = join(deps.workdir, MULTIVERSION_CONFIG_FILE);
  const created = await deps.fileSystem.createIfAbsent(path, MULTIVERSION_CONFIG);

  if (!created) {
    logger.debug({ path }, 'Multiversion config already present, leaving it untouched');
    return { kind: 'file-exists', path };
  }

  logger.debug({ path }, 'Wrote multiversion config');
  return { kind: 'file-created', path };
}

/**
 * Perform one already-validated subcommand.
 */
export async function execute(subcommand: Subcommand, deps: RunDeps): Promise<RunResult> {
  switch (subcommand) {
    case 'multiversion-config':
      return writeMultiversionConfig(deps);
    case 'suiteconfig':
      deps.stdout.write(SUITE_CONFIG);
      return { kind: 'printed', subcommand };
    case 'test-discovery':
      deps.stdout.write(renderTestDiscovery());
      return { kind: 'printed', subcommand };
    default:
      return unreachable(subcommand);
  }
}

/**
 * Validate `value` and perform the matching subcommand. An unknown value
 * throws UnrecognizedSubcommandError before anything is written.
 */
export async function run(value: string, deps: RunDeps): Promise<RunResult> {
  return execute(parseSubcommand(value), deps);
}

/**
 * Stand-in for `resmoke.py`. The real caller passes `--suite <name>` to
 * suiteconfig and test-discovery; it is accepted and ignored.
 */
export async function main(argv: readonly string[], deps: Partial<ResmokeDeps> = {}): Promise<ExitCode> {
  const io = deps.io ?? processIo;
  const program = createProgram('resmoke-mock', 'Print canned resmoke output', io);

  program
    .argument('<subcommand>', `one of: ${SUBCOMMANDS.join(', ')}`)
    .option('--suite <name>', 'suite to describe (ignored)')
    .action(async (value: string, options: { suite?: string }) => {
      const config = deps.config ?? loadToolConfig();
      applyLogLevel(config.logLevel);

      const result = await run(value, {
        stdout: io.stdout,
        fileSystem: deps.fileSystem ?? new NodeFileSystemAdapter(),
        workdir: config.workdir
      });
      logger.info({ subcommand: value, suite: options.suite, result }, 'Resmoke subcommand finished');
    });

  return runProgram(program, argv, io);
}

if (isEntryPoint(import.meta.url)) {
  process.exitCode = await main(process.argv.slice(2));
}
