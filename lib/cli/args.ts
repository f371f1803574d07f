/**
 * Argument helpers shared by the CLI commands
 */

import type { ParseArgsConfig } from "node:util";
import { FilterBuilder, isLogicalOperator, type LogicalOperator } from "../infrastructure/cvcue/filters/filter-builder";
import { Filter } from "../infrastructure/cvcue/filters/filter";
import { InvalidFilterExpressionError, InvalidOperatorError } from "../infrastructure/cvcue/errors";

/**
 * Bad command line; reported with usage text and exit code 2
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type OptionSpec = NonNullable<ParseArgsConfig["options"]>;

export const VERBOSE_OPTION = {
  verbose: { type: "boolean", short: "v", default: false },
} as const satisfies OptionSpec;

/**
 * Run a node:util parseArgs call, turning its parse failures into usage errors
 */
export function parseOrUsage<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseInteger(name: string, raw: string | undefined, fallback: number, min = 0): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new UsageError(`--${name} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

export function parseOptionalInteger(name: string, raw: string | undefined, min = 0): number | undefined {
  return raw === undefined ? undefined : parseInteger(name, raw, min, min);
}

const TRUE_VALUES = new Set(["true", "1", "yes", "y", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "n", "off"]);

export function parseBooleanOption(name: string, raw: string | undefined): boolean | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const normalised = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(normalised)) {
    return true;
  }
  if (FALSE_VALUES.has(normalised)) {
    return false;
  }
  throw new UsageError(`--${name} must be true or false, got '${raw}'`);
}

export function parseChoice<T extends string>(name: string, raw: string | undefined, choices: readonly T[], fallback: T): T {
  if (raw === undefined) {
    return fallback;
  }
  const match = choices.find((choice) => choice === raw);
  if (match === undefined) {
    throw new UsageError(`--${name} must be one of: ${choices.join(", ")}, got '${raw}'`);
  }
  return match;
}

export function parseFilterOperator(raw: string | undefined): LogicalOperator {
  if (raw === undefined) {
    return "AND";
  }
  if (!isLogicalOperator(raw)) {
    throw new UsageError(`--filter-operator must be AND or OR, got '${raw}'`);
  }
  return raw;
}

/**
 * Build a FilterBuilder from repeated `--filter property:operator:value` flags.
 * Returns undefined when no filter was given.
 */
export function buildFilters(expressions: readonly string[] | undefined, operator: LogicalOperator): FilterBuilder | undefined {
  if (!expressions || expressions.length === 0) {
    return undefined;
  }

  const builder = new FilterBuilder(operator);
  for (const expression of expressions) {
    try {
      builder.addFilter(Filter.parse(expression));
    } catch (error) {
      if (error instanceof InvalidFilterExpressionError || error instanceof InvalidOperatorError) {
        throw new UsageError(error.message);
      }
      throw error;
    }
  }
  return builder;
}
