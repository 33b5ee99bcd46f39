/**
 * Argument parsing for the research CLI
 */

import * as fs from "fs";

export interface CliOptions {
  subject: string;
  role?: string;
  context?: string;
  iterations?: number;
  deadlineMs?: number;
  output?: string;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function readFlag(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  return arg ? arg.slice(prefix.length) : undefined;
}

function readPositiveInt(args: string[], name: string): number | undefined {
  const raw = readFlag(args, name);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new CliUsageError(`--${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Context given as a .txt or .md path is read from disk; anything else is
 * taken literally.
 */
export function resolveContext(
  value: string | undefined,
  readFile: (file: string) => string = (file) => fs.readFileSync(file, "utf8")
): string | undefined {
  if (!value) {
    return undefined;
  }
  if (/\.(txt|md)$/i.test(value)) {
    try {
      return readFile(value);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CliUsageError(`Could not read context file ${value}: ${message}`);
    }
  }
  return value;
}

export function parseCliArgs(
  args: string[],
  readFile?: (file: string) => string
): CliOptions {
  const subject = readFlag(args, "subject");
  if (!subject) {
    throw new CliUsageError("--subject is required");
  }

  return {
    subject,
    role: readFlag(args, "role"),
    context: resolveContext(readFlag(args, "context"), readFile),
    iterations: readPositiveInt(args, "iterations"),
    deadlineMs: readPositiveInt(args, "deadline"),
    output: readFlag(args, "output"),
  };
}
