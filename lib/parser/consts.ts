/**
 * Parser constants.
 *
 * This module provides centralized constants used throughout the parser,
 * including the syntax tokens and character classes.
 *
 * @module
 */

// Character constants
export const LEFT_PAREN = "(";
export const RIGHT_PAREN = ")";
export const SEMICOLON = ";";
export const HASH = "#";
export const NEWLINE = "\n";

// Multi-character tokens
export const DEFINE = ":=";
export const FAT_ARROW = "=>";

// Keywords
export const FN = "fn" as const;

// Regex patterns
export const WHITESPACE_REGEX = /\s/;
export const IDENTIFIER_CHAR_REGEX = /[\p{L}\p{N}_']/u;
