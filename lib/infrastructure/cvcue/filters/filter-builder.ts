/**
 * Fluent builder that groups filters under a single AND/OR operator
 */

import { InvalidOperatorError } from "../errors";
import { Filter, type FilterValue } from "./filter";

export const LOGICAL_OPERATORS = ["AND", "OR"] as const;

export type LogicalOperator = (typeof LOGICAL_OPERATORS)[number];

export type FilterQueryParams = {
  operator: LogicalOperator;
  filter: string[];
};

export function isLogicalOperator(operator: string): operator is LogicalOperator {
  return (LOGICAL_OPERATORS as readonly string[]).includes(operator);
}

type ValueInput = FilterValue | readonly FilterValue[];

/**
 * @example
 * const fb = new FilterBuilder("AND")
 *   .contains("name", "Arista")
 *   .equals("active", true);
 * fb.toQueryParams();
 * // { operator: "AND", filter: ['{"property":"name",...}', '{"property":"active",...}'] }
 */
export class FilterBuilder {
  readonly operator: LogicalOperator;
  private readonly _filters: Filter[] = [];

  constructor(operator: string = "AND") {
    if (!isLogicalOperator(operator)) {
      throw new InvalidOperatorError(operator, LOGICAL_OPERATORS);
    }
    this.operator = operator;
  }

  get filters(): readonly Filter[] {
    return this._filters;
  }

  get size(): number {
    return this._filters.length;
  }

  add(property: string, operator: string, value: ValueInput): this {
    this._filters.push(new Filter(property, operator, value));
    return this;
  }

  /** Append an already-built filter. */
  addFilter(filter: Filter): this {
    this._filters.push(filter);
    return this;
  }

  contains(property: string, value: ValueInput): this {
    return this.add(property, "contains", value);
  }

  equals(property: string, value: ValueInput): this {
    return this.add(property, "equals", value);
  }

  notContains(property: string, value: ValueInput): this {
    return this.add(property, "notContains", value);
  }

  notEquals(property: string, value: ValueInput): this {
    return this.add(property, "notEquals", value);
  }

  greaterThan(property: string, value: ValueInput): this {
    return this.add(property, "greaterThan", value);
  }

  lessThan(property: string, value: ValueInput): this {
    return this.add(property, "lessThan", value);
  }

  greaterThanOrEquals(property: string, value: ValueInput): this {
    return this.add(property, "greaterThanOrEquals", value);
  }

  lessThanOrEquals(property: string, value: ValueInput): this {
    return this.add(property, "lessThanOrEquals", value);
  }

  /**
   * Query parameters for the API: empty when no filters were added,
   * otherwise the operator and one serialized filter per entry in insertion order.
   */
  toQueryParams(): FilterQueryParams | Record<string, never> {
    if (this._filters.length === 0) {
      return {};
    }

    return {
      operator: this.operator,
      filter: this._filters.map((f) => f.toString()),
    };
  }
}
