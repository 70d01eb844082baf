/**
 * Command-line options for `fnlc`.
 *
 * @module
 */

export interface CliOptions {
  help: boolean;
  version: boolean;
  verbose: boolean;
  strict: boolean;
  maxSteps?: number;
  inputPath?: string;
}

/** A malformed command line. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = `fnlc - normal-order reducer for the fn lambda calculus

Usage:
  fnlc <input.fnlc> [options]

Options:
  -V, --verbose        Print each beta-reduction step
      --strict         Reject programs that use unbound names
      --max-steps <n>  Give up after n beta-reductions
  -h, --help           Show this help message
  -v, --version        Show version information

Example:
  fnlc examples/church.fnlc --verbose`;

function parseStepCount(raw: string | undefined): number {
  if (raw === undefined) {
    throw new CliUsageError("--max-steps needs a value");
  }
  if (!/^[0-9]+$/.test(raw)) {
    throw new CliUsageError(
      `--max-steps expects a non-negative integer, got '${raw}'`,
    );
  }
  return Number.parseInt(raw, 10);
}

/**
 * @throws CliUsageError on unknown options, a bad --max-steps value, or
 * more than one input file.
 */
export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = {
    help: false,
    version: false,
    verbose: false,
    strict: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case "--help":
      case "-h":
        options.help = true;
        break;
      case "--version":
      case "-v":
        options.version = true;
        break;
      case "--verbose":
      case "-V":
        options.verbose = true;
        break;
      case "--strict":
        options.strict = true;
        break;
      case "--max-steps":
        options.maxSteps = parseStepCount(args[++i]);
        break;
      default:
        if (arg.startsWith("--max-steps=")) {
          options.maxSteps = parseStepCount(arg.slice("--max-steps=".length));
        } else if (arg.startsWith("-")) {
          throw new CliUsageError(`Unknown option: ${arg}`);
        } else if (options.inputPath === undefined) {
          options.inputPath = arg;
        } else {
          throw new CliUsageError(
            "Too many arguments. Use --help for usage information.",
          );
        }
        break;
    }
  }

  return options;
}
