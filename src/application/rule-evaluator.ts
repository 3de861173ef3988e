import type { Control, ControlHit, TransactionRecord } from "../domain/types.js";
import { matchConditions } from "./condition-matcher.js";
import { assertTransactionBatch } from "./transaction-batch.js";

export interface RuleEvaluationOptions {
  onControlSkipped?: (control: Control) => void;
}

/**
 * Runs every control against the records of its own rail and returns the flat
 * hit list, in control order then record order.
 */
export function evaluateControls(
  records: readonly TransactionRecord[],
  controls: readonly Control[],
  options: RuleEvaluationOptions = {},
): ControlHit[] {
  assertTransactionBatch(records);

  const hits: ControlHit[] = [];
  for (const control of controls) {
    const railRecords = records.filter((record) => record.rail === control.rail);
    if (railRecords.length === 0) {
      options.onControlSkipped?.(control);
      continue;
    }

    const matches = matchConditions(railRecords, control.conditions);
    for (const [index, record] of railRecords.entries()) {
      if (!matches[index]) {
        continue;
      }
      hits.push({
        tx_id: record.tx_id,
        rail: record.rail,
        control_id: control.control_id,
        severity: control.severity,
        action: control.action,
        description: control.description,
      });
    }
  }
  return hits;
}
