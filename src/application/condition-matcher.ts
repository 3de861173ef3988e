import { toNumber } from "../domain/conditions.js";
import type { ControlCondition, FieldValue, NumericOperator, TransactionRecord } from "../domain/types.js";

function isMissing(value: FieldValue | undefined): value is null | undefined {
  return value === null || value === undefined;
}

function compare(value: number, op: NumericOperator, threshold: number): boolean {
  switch (op) {
    case "gt":
      return value > threshold;
    case "gte":
      return value >= threshold;
    case "lt":
      return value < threshold;
    case "lte":
      return value <= threshold;
  }
}

function coerceBoolean(value: FieldValue): boolean | null {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true") {
      return true;
    }
    if (normalized === "false") {
      return false;
    }
  }
  return null;
}

/**
 * Evaluates one compiled condition. A missing or non-coercible value is a non-match.
 */
export function matchesCondition(record: TransactionRecord, condition: ControlCondition): boolean {
  const value = Object.hasOwn(record, condition.field) ? record[condition.field] : undefined;
  if (isMissing(value)) {
    return false;
  }

  switch (condition.kind) {
    case "membership_in":
      return condition.expected.some((candidate) => candidate === value);
    case "numeric_compare": {
      const numeric = toNumber(value);
      return numeric !== null && compare(numeric, condition.op, condition.threshold);
    }
    case "boolean_equals":
      return coerceBoolean(value) === condition.expected;
    case "equals":
      if (condition.mode === "case_insensitive" && typeof condition.expected === "string") {
        return String(value).toLowerCase() === condition.expected.toLowerCase();
      }
      return value === condition.expected;
  }
}

export function matchesRecord(record: TransactionRecord, conditions: readonly ControlCondition[]): boolean {
  return conditions.every((condition) => matchesCondition(record, condition));
}

/**
 * One match flag per record, in batch order. An empty condition set matches everything.
 */
export function matchConditions(
  records: readonly TransactionRecord[],
  conditions: readonly ControlCondition[],
): boolean[] {
  return records.map((record) => matchesRecord(record, conditions));
}
