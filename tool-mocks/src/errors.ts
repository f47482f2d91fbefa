/**
 * Raised when the resmoke stand-in is invoked with a subcommand it does not
 * know. Fatal: the CLI reports it and exits non-zero.
 */
export class UnrecognizedSubcommandError extends Error {
  public override readonly name = 'UnrecognizedSubcommandError';

  constructor(
    public readonly subcommand: string,
    public readonly validSubcommands: readonly string[]
  ) {
    super(`Unknown subcommand: ${subcommand}`);
  }
}

export class InvalidToolConfigError extends Error {
  public override readonly name = 'InvalidToolConfigError';

  constructor(
    public readonly variable: string,
    public readonly value: string
  ) {
    super(`Invalid value for ${variable}: ${value}`);
  }
}
