import type { ControlHit, ControlMetric, FieldValue, TransactionDecision } from "../domain/types.js";

export const DECISION_COLUMNS = [
  "tx_id",
  "rail",
  "timestamp",
  "user_id",
  "amount",
  "is_fraud_pattern",
  "final_action",
  "triggered_controls",
  "triggered_actions",
] as const;

export const HIT_COLUMNS = ["tx_id", "rail", "control_id", "severity", "action", "description"] as const;

export const METRIC_COLUMNS = ["control_id", "hits", "hit_rate", "precision_proxy"] as const;

export type DecisionTableRow = Record<(typeof DECISION_COLUMNS)[number], FieldValue>;
export type HitTableRow = Record<(typeof HIT_COLUMNS)[number], FieldValue>;
export type MetricTableRow = Record<(typeof METRIC_COLUMNS)[number], FieldValue>;

export interface OutputTable<TColumn extends string> {
  name: string;
  columns: readonly TColumn[];
  rows: Array<Record<TColumn, FieldValue>>;
}

export interface ControlRunTables {
  decisions: OutputTable<(typeof DECISION_COLUMNS)[number]>;
  hits: OutputTable<(typeof HIT_COLUMNS)[number]>;
  metrics: OutputTable<(typeof METRIC_COLUMNS)[number]>;
}

const LIST_SEPARATOR = ", ";

export function decisionTableRow(decision: TransactionDecision): DecisionTableRow {
  return {
    tx_id: decision.tx_id,
    rail: decision.rail,
    timestamp: decision.timestamp,
    user_id: decision.user_id,
    amount: decision.amount,
    is_fraud_pattern: decision.is_fraud_pattern,
    final_action: decision.final_action,
    triggered_controls: decision.triggered_controls.join(LIST_SEPARATOR),
    triggered_actions: decision.triggered_actions.join(LIST_SEPARATOR),
  };
}

export function hitTableRow(hit: ControlHit): HitTableRow {
  return { ...hit };
}

export function metricTableRow(metric: ControlMetric): MetricTableRow {
  return { ...metric };
}

export function buildControlRunTables(run: {
  decisions: readonly TransactionDecision[];
  hits: readonly ControlHit[];
  metrics: readonly ControlMetric[];
}): ControlRunTables {
  return {
    decisions: { name: "control_decisions", columns: DECISION_COLUMNS, rows: run.decisions.map(decisionTableRow) },
    hits: { name: "control_hits", columns: HIT_COLUMNS, rows: run.hits.map(hitTableRow) },
    metrics: { name: "control_metrics", columns: METRIC_COLUMNS, rows: run.metrics.map(metricTableRow) },
  };
}
