import { actionPriority } from "../domain/action-priority.js";
import type {
  ControlAction,
  ControlHit,
  ControlMetric,
  Rail,
  TransactionDecision,
} from "../domain/types.js";

export type MetricsSort = "hits" | "precision_proxy";

export interface DecisionFilter {
  rail?: Rail;
  finalAction?: ControlAction;
  controlId?: string;
  amountMin?: number;
  amountMax?: number;
}

export interface HitFilter {
  rail?: Rail;
  controlId?: string;
}

export interface Page<TItem> {
  data: TItem[];
  hasMore: boolean;
  nextOffset?: number;
}

/**
 * Drill-down view: matching decisions, most severe first, then largest amount.
 */
export function queryDecisions(
  decisions: readonly TransactionDecision[],
  filter: DecisionFilter,
): TransactionDecision[] {
  return decisions
    .filter((decision) => {
      if (filter.rail && decision.rail !== filter.rail) {
        return false;
      }
      if (filter.finalAction && decision.final_action !== filter.finalAction) {
        return false;
      }
      if (filter.controlId && !decision.triggered_controls.includes(filter.controlId)) {
        return false;
      }
      if (filter.amountMin !== undefined && decision.amount < filter.amountMin) {
        return false;
      }
      if (filter.amountMax !== undefined && decision.amount > filter.amountMax) {
        return false;
      }
      return true;
    })
    .sort((a, b) => {
      const byAction = actionPriority(b.final_action) - actionPriority(a.final_action);
      return byAction !== 0 ? byAction : b.amount - a.amount;
    });
}

export function queryHits(hits: readonly ControlHit[], filter: HitFilter): ControlHit[] {
  return hits.filter((hit) => {
    if (filter.rail && hit.rail !== filter.rail) {
      return false;
    }
    if (filter.controlId && hit.control_id !== filter.controlId) {
      return false;
    }
    return true;
  });
}

export function sortMetrics(metrics: readonly ControlMetric[], sort: MetricsSort): ControlMetric[] {
  if (sort === "hits") {
    return [...metrics];
  }
  return [...metrics].sort((a, b) => b.precision_proxy - a.precision_proxy || b.hits - a.hits);
}

export function paginate<TItem>(items: readonly TItem[], offset: number, limit: number): Page<TItem> {
  const data = items.slice(offset, offset + limit);
  const nextOffset = offset + data.length;
  const hasMore = nextOffset < items.length;
  return {
    data,
    hasMore,
    ...(hasMore ? { nextOffset } : {}),
  };
}
