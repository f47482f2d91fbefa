export { discover, main as burnInMain } from './burnInTests.js';
export type { BurnInDeps, BurnInOptions } from './burnInTests.js';
export { SUBCOMMANDS, execute, main as resmokeMain, parseSubcommand, run } from './resmoke.js';
export type { ResmokeDeps, RunDeps, RunResult, Subcommand } from './resmoke.js';
export { processIo } from './cli.js';
export type { CliIo, ExitCode, OutputSink } from './cli.js';
export { FileSystemAdapter, InMemoryFileSystemAdapter, NodeFileSystemAdapter } from './fileSystemAdapter.js';
export { InvalidToolConfigError, UnrecognizedSubcommandError } from './errors.js';
export { loadToolConfig } from './toolConfig.js';
export type { LogLevel, ToolConfig } from './toolConfig.js';
export * from './templates.js';
