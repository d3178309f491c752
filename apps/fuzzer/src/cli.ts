import { parseArgs } from "node:util";
import type { RunOverrides } from "@vecdiff/config";

export const USAGE = `Usage:
  vecdiff run [--tests N] [--seed S] [--services a,b] [--strict] [--batch-size N] [--results-dir DIR] [--no-cleanup]
  vecdiff check [--services a,b]`;

export type CliCommand =
  | { command: "run"; overrides: RunOverrides }
  | { command: "check"; services?: string[] }
  | { command: "help" };

/** Thrown for unusable command lines; the message is shown with the usage text */
export class UsageError extends Error {
  override name = "UsageError";
}

function integer(flag: string, raw: string | undefined, min: number): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new UsageError(`--${flag} expects an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function serviceList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  const names = raw
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  if (names.length === 0) throw new UsageError("--services expects a comma-separated list");
  return names;
}

export function parseCli(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;

  if (command === undefined || command === "help" || command === "--help" || command === "-h") {
    return { command: "help" };
  }

  try {
    if (command === "check") {
      const { values } = parseArgs({
        args: [...rest],
        options: { services: { type: "string" } },
        allowPositionals: false,
      });
      return { command: "check", services: serviceList(values.services) };
    }

    if (command === "run") {
      const { values } = parseArgs({
        args: [...rest],
        options: {
          tests: { type: "string" },
          seed: { type: "string" },
          services: { type: "string" },
          strict: { type: "boolean" },
          "batch-size": { type: "string" },
          "results-dir": { type: "string" },
          "no-cleanup": { type: "boolean" },
        },
        allowPositionals: false,
      });

      const overrides: RunOverrides = {
        numTests: integer("tests", values.tests, 0),
        seed: integer("seed", values.seed, Number.MIN_SAFE_INTEGER),
        services: serviceList(values.services),
        healthMode: values.strict ? "strict" : undefined,
        batchSize: integer("batch-size", values["batch-size"], 1),
        resultsDir: values["results-dir"],
        cleanup: values["no-cleanup"] ? false : undefined,
      };
      return { command: "run", overrides };
    }
  } catch (error) {
    if (error instanceof UsageError) throw error;
    // parseArgs reports unknown or malformed flags with a TypeError
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }

  throw new UsageError(`unknown command "${command}"`);
}
