/**
 * CV-CUE Filter
 *
 * A single predicate for the managed-device list endpoints. The API receives
 * each filter as a JSON string in a repeated `filter` query parameter.
 */

import { InvalidFilterExpressionError, InvalidOperatorError } from "../errors";

/**
 * Friendly operator names mapped to the operator strings the API expects
 */
export const FILTER_OPERATOR_TOKENS = {
  equals: "=",
  lessThan: "<",
  greaterThan: ">",
  lessThanOrEquals: "<=",
  greaterThanOrEquals: ">=",
  notEquals: "!=",
  contains: "contains",
  notContains: "notcontains",
} as const;

export type FilterOperator = keyof typeof FILTER_OPERATOR_TOKENS;
export type FilterOperatorToken = (typeof FILTER_OPERATOR_TOKENS)[FilterOperator];

export type FilterValue = string | number | boolean;

export const FILTER_OPERATORS = Object.keys(FILTER_OPERATOR_TOKENS) as readonly FilterOperator[];

export interface SerializedFilter {
  property: string;
  operator: FilterOperatorToken;
  value: FilterValue[];
}

export function isFilterOperator(operator: string): operator is FilterOperator {
  return Object.prototype.hasOwnProperty.call(FILTER_OPERATOR_TOKENS, operator);
}

export class Filter {
  readonly property: string;
  readonly operator: FilterOperator;
  readonly value: readonly FilterValue[];

  /**
   * @param property - Field to filter on (e.g. "name", "macaddress")
   * @param operator - One of the friendly operator names in FILTER_OPERATOR_TOKENS
   * @param value - A single value or a list of values; a single value is stored as a one-element list
   *
   * @example
   * new Filter("name", "contains", ["Arista"]);
   * new Filter("active", "equals", true);
   */
  constructor(property: string, operator: string, value: FilterValue | readonly FilterValue[]) {
    if (!isFilterOperator(operator)) {
      throw new InvalidOperatorError(operator, FILTER_OPERATORS);
    }

    this.property = property;
    this.operator = operator;
    this.value = Object.freeze(isValueList(value) ? [...value] : [value]);
    Object.freeze(this);
  }

  /**
   * Parse a CLI-style `property:operator:value` expression.
   * Only the first two colons separate fields, so values such as MAC addresses survive intact.
   */
  static parse(expression: string): Filter {
    const first = expression.indexOf(":");
    const second = first === -1 ? -1 : expression.indexOf(":", first + 1);
    if (first <= 0 || second === -1) {
      throw new InvalidFilterExpressionError(expression);
    }

    const property = expression.slice(0, first);
    const operator = expression.slice(first + 1, second);
    const value = expression.slice(second + 1);
    return new Filter(property, operator, value);
  }

  get apiOperator(): FilterOperatorToken {
    return FILTER_OPERATOR_TOKENS[this.operator];
  }

  /**
   * Structured form sent to the API. Key order is property, operator, value.
   */
  toJSON(): SerializedFilter {
    return {
      property: this.property,
      operator: this.apiOperator,
      value: [...this.value],
    };
  }

  /**
   * Canonical string form used as a `filter` query parameter value
   */
  toString(): string {
    return JSON.stringify(this.toJSON());
  }
}

function isValueList(value: FilterValue | readonly FilterValue[]): value is readonly FilterValue[] {
  return Array.isArray(value);
}
