import { ParseEntry, parse } from 'shell-quote';
import { InvalidArgumentError } from '../types';

// Variables are kept literal; the device shell expands them, not the host
function keepVariable(name: string): string {
  return `$${name}`;
}

// Operators, globs and comments stay literal for the device shell to interpret
function toLiteral(entry: ParseEntry): string {
  if (typeof entry === 'string') {
    return entry;
  }
  if ('comment' in entry) {
    return `#${entry.comment}`;
  }
  if (entry.op === 'glob') {
    return entry.pattern;
  }
  return entry.op;
}

function splitCommandString(command: string): string[] {
  return parse(command, keepVariable).map(toLiteral);
}

/**
 * Normalizes a command given either as one string (split with shell-lexing
 * rules, quotes honored) or as a list of strings. Anything else is rejected
 * with InvalidArgumentError. `undefined` and `null` yield an empty vector.
 */
export function tokenizeCommand(input: unknown): string[] {
  if (input === undefined || input === null) {
    return [];
  }

  if (typeof input === 'string') {
    return splitCommandString(input).map(token => token.trim());
  }

  if (Array.isArray(input) && input.every((item): item is string => typeof item === 'string')) {
    return input.map(token => token.trim());
  }

  throw new InvalidArgumentError(
    `Parameter "cmd" must be of type string or list of string, instead found: ${describeValue(input)}`,
    input
  );
}

// Single-quote a value for the device's POSIX shell
export function escapeShellArg(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function describeValue(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
