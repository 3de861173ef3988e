import type { ActionCounts, DecisionSummary, TransactionDecision } from "../domain/types.js";
import { roundTo4 } from "./monitoring-aggregator.js";

function emptyCounts(): ActionCounts {
  return { ALLOW: 0, REVIEW: 0, BLOCK: 0 };
}

export function summarizeDecisions(decisions: readonly TransactionDecision[]): DecisionSummary {
  const byAction = emptyCounts();
  const byRail: Record<string, ActionCounts> = {};

  for (const decision of decisions) {
    byAction[decision.final_action] += 1;
    const railCounts = byRail[decision.rail] ?? emptyCounts();
    railCounts[decision.final_action] += 1;
    byRail[decision.rail] = railCounts;
  }

  const transactions = decisions.length;
  const actioned = byAction.REVIEW + byAction.BLOCK;
  return {
    transactions,
    by_action: byAction,
    action_rate: transactions > 0 ? roundTo4(actioned / transactions) : 0,
    by_rail: byRail,
  };
}
