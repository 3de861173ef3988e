import { AppError } from "../infra/app-error.js";
import type { ControlCondition, FieldValue, NumericOperator } from "./types.js";

const MEMBERSHIP_SUFFIX = "_in";

const DAY_SUFFIXES: ReadonlyArray<readonly [string, NumericOperator]> = [
  ["_gte_days", "gte"],
  ["_gt_days", "gt"],
  ["_lte_days", "lte"],
  ["_lt_days", "lt"],
];

const NUMERIC_SUFFIXES: ReadonlyArray<readonly [string, NumericOperator]> = [
  ["_gte", "gte"],
  ["_gt", "gt"],
  ["_lte", "lte"],
  ["_lt", "lt"],
];

// Authoring shorthands for the canonical day-count columns.
const FIELD_ALIASES: Readonly<Record<string, string>> = {
  account_age: "account_age_days",
  wallet_age: "wallet_age_days",
};

function invalidCondition(controlId: string, key: string, expectation: string): AppError {
  return new AppError(
    422,
    "invalid_control_condition",
    `Control '${controlId}' condition '${key}' ${expectation}.`,
  );
}

export function isFieldValue(value: unknown): value is FieldValue {
  return (
    value === null
    || typeof value === "string"
    || typeof value === "boolean"
    || (typeof value === "number" && Number.isFinite(value))
  );
}

export function canonicalField(field: string): string {
  return FIELD_ALIASES[field] ?? field;
}

/**
 * Numeric view of a record value or threshold: finite numbers as-is and
 * non-empty numeric strings parsed; anything else has no numeric value.
 */
export function toNumber(value: FieldValue | undefined): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function stripSuffix(
  key: string,
  suffixes: ReadonlyArray<readonly [string, NumericOperator]>,
): { field: string; op: NumericOperator } | null {
  for (const [suffix, op] of suffixes) {
    if (key.endsWith(suffix)) {
      return { field: key.slice(0, -suffix.length), op };
    }
  }
  return null;
}

export function compileCondition(controlId: string, key: string, expected: unknown): ControlCondition {
  if (key.endsWith(MEMBERSHIP_SUFFIX)) {
    const field = key.slice(0, -MEMBERSHIP_SUFFIX.length);
    if (field.length === 0) {
      throw invalidCondition(controlId, key, "must name a field before '_in'");
    }
    if (!Array.isArray(expected)) {
      throw invalidCondition(controlId, key, "must be a list of values");
    }
    const values: FieldValue[] = [];
    for (const item of expected) {
      if (!isFieldValue(item)) {
        throw invalidCondition(controlId, key, "must only contain scalar values");
      }
      values.push(item);
    }
    return { kind: "membership_in", key, field, expected: values };
  }

  const numeric = stripSuffix(key, DAY_SUFFIXES) ?? stripSuffix(key, NUMERIC_SUFFIXES);
  if (numeric) {
    if (numeric.field.length === 0) {
      throw invalidCondition(controlId, key, "must name a field before the comparison suffix");
    }
    if (typeof expected !== "number" && typeof expected !== "string") {
      throw invalidCondition(controlId, key, "must be a numeric threshold");
    }
    const threshold = toNumber(expected);
    if (threshold === null) {
      throw invalidCondition(controlId, key, "must be a numeric threshold");
    }
    return {
      kind: "numeric_compare",
      key,
      field: canonicalField(numeric.field),
      op: numeric.op,
      expected,
      threshold,
    };
  }

  if (typeof expected === "boolean") {
    return { kind: "boolean_equals", key, field: key, expected };
  }
  if (typeof expected === "string") {
    return { kind: "equals", key, field: key, mode: "case_insensitive", expected };
  }
  if (expected === null || (typeof expected === "number" && Number.isFinite(expected))) {
    return { kind: "equals", key, field: key, mode: "exact", expected };
  }
  throw invalidCondition(controlId, key, "must be a scalar value");
}

export function compileConditions(controlId: string, conditions: Record<string, unknown>): ControlCondition[] {
  return Object.entries(conditions).map(([key, expected]) => compileCondition(controlId, key, expected));
}

/**
 * Inverse of compilation, for listing controls the way they were authored.
 */
export function conditionsToMapping(conditions: readonly ControlCondition[]): Record<string, FieldValue | FieldValue[]> {
  const mapping: Record<string, FieldValue | FieldValue[]> = {};
  for (const condition of conditions) {
    mapping[condition.key] = condition.kind === "membership_in" ? [...condition.expected] : condition.expected;
  }
  return mapping;
}
