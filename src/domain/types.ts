export const RAILS = ["ACH", "CARD", "CRYPTO"] as const;
export type Rail = (typeof RAILS)[number];

export const CONTROL_ACTIONS = ["ALLOW", "REVIEW", "BLOCK"] as const;
export type ControlAction = (typeof CONTROL_ACTIONS)[number];

export type FieldValue = string | number | boolean | null;

export type NumericOperator = "gt" | "gte" | "lt" | "lte";

/**
 * A condition compiled from one `key: value` entry of a control definition.
 * `key` and `expected` keep the authored form for display.
 */
export type ControlCondition =
  | {
    kind: "equals";
    key: string;
    field: string;
    mode: "case_insensitive" | "exact";
    expected: string | number | null;
  }
  | {
    kind: "boolean_equals";
    key: string;
    field: string;
    expected: boolean;
  }
  | {
    kind: "membership_in";
    key: string;
    field: string;
    expected: FieldValue[];
  }
  | {
    kind: "numeric_compare";
    key: string;
    field: string;
    op: NumericOperator;
    expected: number | string;
    threshold: number;
  };

export interface Control {
  control_id: string;
  rail: Rail;
  severity: string;
  action: ControlAction;
  description: string;
  conditions: readonly ControlCondition[];
}

export interface TransactionRecord {
  tx_id: string;
  rail: string;
  timestamp: string;
  user_id: string;
  amount: number;
  is_fraud_pattern: boolean;
  [field: string]: FieldValue | undefined;
}

export const REQUIRED_TRANSACTION_FIELDS = [
  "tx_id",
  "rail",
  "timestamp",
  "user_id",
  "amount",
  "is_fraud_pattern",
] as const;

export interface ControlHit {
  tx_id: string;
  rail: string;
  control_id: string;
  severity: string;
  action: ControlAction;
  description: string;
}

export interface TransactionDecision {
  tx_id: string;
  rail: string;
  timestamp: string;
  user_id: string;
  amount: number;
  is_fraud_pattern: boolean;
  final_action: ControlAction;
  triggered_controls: string[];
  triggered_actions: string[];
}

export interface ControlMetric {
  control_id: string;
  hits: number;
  hit_rate: number;
  precision_proxy: number;
}

export type ActionCounts = Record<ControlAction, number>;

export interface DecisionSummary {
  transactions: number;
  by_action: ActionCounts;
  action_rate: number;
  by_rail: Record<string, ActionCounts>;
}

export interface ControlRunResult {
  run_id: string;
  evaluated_at: string;
  controls: number;
  decisions: TransactionDecision[];
  hits: ControlHit[];
  metrics: ControlMetric[];
  summary: DecisionSummary;
}
