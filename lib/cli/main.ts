import { readFileSync } from "node:fs";
import { VERSION } from "../shared/version.js";
import {
  type CliOptions,
  CliUsageError,
  parseArgs,
  USAGE,
} from "./options.js";
import { type Reporter, runSource } from "./run.js";

/**
 * Entry point shared by the binary and the tests.
 * @returns the process exit code.
 */
export function main(
  args: readonly string[],
  reporter: Reporter,
  readSource: (path: string) => string = (path) => readFileSync(path, "utf-8"),
): number {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (err) {
    if (err instanceof CliUsageError) {
      reporter.error(err.message);
      reporter.error("Use --help for usage information.");
      return 1;
    }
    throw err;
  }

  if (options.help) {
    reporter.note(USAGE);
    return 0;
  }
  if (options.version) {
    reporter.note(`fnlc v${VERSION}`);
    return 0;
  }
  if (options.inputPath === undefined) {
    reporter.error("No input file given. Use --help for usage information.");
    return 1;
  }

  let source: string;
  try {
    source = readSource(options.inputPath);
  } catch (err) {
    reporter.error(
      `Unable to read ${options.inputPath}: ${
        err instanceof Error ? err.message : String(err)
      }`,
    );
    return 1;
  }

  return runSource(source, options, reporter);
}
