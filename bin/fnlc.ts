#!/usr/bin/env node
/**
 * fnlc: reduce a program of the fn lambda calculus to normal form.
 *
 * Usage:
 *   fnlc <input.fnlc> [--verbose] [--strict] [--max-steps <n>]
 *   fnlc --help
 *   fnlc --version
 */
import tkexport from "terminal-kit";

import { main, type Reporter } from "../lib/index.js";

const { terminal } = tkexport;

const reporter: Reporter = {
  result(text) {
    terminal.green(text + "\n");
  },
  trace(text) {
    terminal.cyan(text + "\n");
  },
  note(text) {
    terminal("\n");
    terminal.yellow(text + "\n");
  },
  error(text) {
    terminal.red(text + "\n");
  },
};

process.exitCode = main(process.argv.slice(2), reporter);
