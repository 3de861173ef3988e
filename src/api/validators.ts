import { isControlAction } from "../domain/action-priority.js";
import { isRail } from "../application/control-set.js";
import type { MetricsSort } from "../application/control-run-queries.js";
import { RAILS, type ControlAction, type Rail } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export interface CreateControlRunInput {
  transactions: unknown[];
}

export function assertCreateControlRunInput(
  payload: unknown,
  maxBatchSize: number,
): asserts payload is CreateControlRunInput {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
  if (!Array.isArray(payload.transactions)) {
    throw new AppError(422, "invalid_transactions", "transactions must be an array.");
  }
  if (payload.transactions.length > maxBatchSize) {
    throw new AppError(
      413,
      "batch_too_large",
      `transactions must contain at most ${maxBatchSize} records.`,
    );
  }
}

export function normalizeLimit(value: unknown, fallback = 50, max = 500): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = typeof value === "string" ? Number(value) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new AppError(422, "invalid_limit", "limit must be a positive integer.");
  }
  return Math.min(parsed, max);
}

export function normalizeCursor(value: unknown): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(422, "invalid_cursor", "cursor must be a string.");
  }

  const cursor = value.trim();
  if (cursor.length === 0 || cursor.length > 512) {
    throw new AppError(422, "invalid_cursor", "cursor length must be between 1 and 512 characters.");
  }
  if (!/^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/.test(cursor)) {
    throw new AppError(422, "invalid_cursor", "cursor token format is invalid.");
  }

  return cursor;
}

export function normalizeRail(value: unknown): Rail | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(422, "invalid_rail", "rail must be a string.");
  }
  const rail = value.trim().toUpperCase();
  if (!isRail(rail)) {
    throw new AppError(422, "invalid_rail", `rail must be one of: ${RAILS.join(", ")}.`);
  }
  return rail;
}

export function normalizeFinalAction(value: unknown): ControlAction | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(422, "invalid_final_action", "final_action must be a string.");
  }
  const action = value.trim().toUpperCase();
  if (!isControlAction(action)) {
    throw new AppError(422, "invalid_final_action", "final_action must be one of: ALLOW, REVIEW, BLOCK.");
  }
  return action;
}

export function normalizeAmount(value: unknown, fieldName: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be a string.`);
  }
  const trimmed = value.trim();
  const parsed = trimmed.length > 0 ? Number(trimmed) : Number.NaN;
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be a non-negative number.`);
  }
  return parsed;
}

export function normalizeResourceId(value: unknown, fieldName: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be a string.`);
  }

  const normalized = value.trim();
  if (normalized.length === 0 || normalized.length > 255) {
    throw new AppError(
      422,
      `invalid_${fieldName}`,
      `${fieldName} length must be between 1 and 255 characters.`,
    );
  }
  return normalized;
}

export function normalizeMetricsSort(value: unknown): MetricsSort {
  if (value === undefined) {
    return "hits";
  }
  if (value === "hits" || value === "precision_proxy") {
    return value;
  }
  throw new AppError(422, "invalid_sort", "sort must be one of: hits, precision_proxy.");
}
