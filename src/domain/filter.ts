/**
 * Version filter expressions: `<software> [operator] [version]`
 *
 * Examples: "Synapse", "Synapse 1.60.0", "Dendrite >= 0.9.0", "Conduit != 0.4.0"
 */

import { ErrorCodes, InvalidFilterExpressionError } from './errors.js';
import {
  compareServerVersions,
  isComparable,
  parseFilterVersion,
  type ServerVersion,
} from './server-version.js';

export const COMPARISON_OPERATORS = ['=', '==', '===', '>', '>=', '<', '<=', '!=', '!==', '≠'] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

const OPERATOR_LIKE = /^[=<>!≠]+$/;

export interface VersionFilter {
  software: string;
  operator: ComparisonOperator;
  /** Absent when every version of the software should match */
  version?: ServerVersion;
}

export function isComparisonOperator(value: string): value is ComparisonOperator {
  return (COMPARISON_OPERATORS as readonly string[]).includes(value);
}

/**
 * Parse command arguments into a filter. The operator defaults to "=".
 * @throws InvalidFilterExpressionError on a bad operator or version
 */
export function parseVersionFilter(args: readonly string[]): VersionFilter {
  const [software, ...rest] = args;
  if (!software) {
    throw new InvalidFilterExpressionError(
      'Missing software name, usage: <software> [operator] [version]',
      ErrorCodes.FILTER_INVALID_OPERATOR
    );
  }

  let operator: ComparisonOperator = '=';
  const first = rest[0];
  if (first !== undefined && OPERATOR_LIKE.test(first)) {
    if (!isComparisonOperator(first)) {
      throw new InvalidFilterExpressionError(
        `Unknown operator ${first}, use one of ${COMPARISON_OPERATORS.join(' ')}`,
        ErrorCodes.FILTER_INVALID_OPERATOR
      );
    }
    operator = first;
    rest.shift();
  }

  const rawVersion = rest.join(' ').trim();
  if (!rawVersion) {
    if (operator !== '=' || first !== undefined) {
      throw new InvalidFilterExpressionError(
        `Operator ${operator} needs a version to compare against`,
        ErrorCodes.FILTER_INVALID_OPERATOR
      );
    }
    return { software, operator };
  }

  return { software, operator, version: parseFilterVersion(software, rawVersion) };
}

function applyOperator(operator: ComparisonOperator, comparison: -1 | 0 | 1): boolean {
  switch (operator) {
    case '=':
    case '==':
    case '===':
      return comparison === 0;
    case '!=':
    case '!==':
    case '≠':
      return comparison !== 0;
    case '>':
      return comparison > 0;
    case '>=':
      return comparison >= 0;
    case '<':
      return comparison < 0;
    case '<=':
      return comparison <= 0;
  }
}

/**
 * Whether a server's version satisfies the filter. Versions of the right
 * software that cannot be ordered against the filter version never match.
 */
export function matchesFilter(version: ServerVersion, filter: VersionFilter): boolean {
  if (version.software.toLowerCase() !== filter.software.toLowerCase()) return false;
  if (!filter.version) return true;
  if (!isComparable(version, filter.version)) return false;
  return applyOperator(filter.operator, compareServerVersions(version, filter.version));
}
