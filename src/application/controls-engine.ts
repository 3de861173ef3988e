import type { Control, ControlRunResult, TransactionRecord } from "../domain/types.js";
import type { ClockPort } from "../infra/clock.js";
import { controlRunId } from "../infra/fingerprint.js";
import type { Logger } from "../infra/logger.js";
import { resolveDecisions } from "./decision-resolver.js";
import { aggregateControlMetrics } from "./monitoring-aggregator.js";
import { evaluateControls } from "./rule-evaluator.js";
import { summarizeDecisions } from "./run-summary.js";

export class ControlsEngine {
  constructor(
    private readonly controls: readonly Control[],
    private readonly clock: ClockPort,
    private readonly logger: Logger,
  ) {}

  listControls(): readonly Control[] {
    return this.controls;
  }

  /**
   * Evaluates the whole batch. Either all three tables are produced or the
   * batch is rejected before any control runs.
   */
  run(records: readonly TransactionRecord[]): ControlRunResult {
    const hits = evaluateControls(records, this.controls, {
      onControlSkipped: (control) => {
        this.logger.debug(
          { control_id: control.control_id, rail: control.rail },
          "control skipped: no transactions on rail",
        );
      },
    });
    const decisions = resolveDecisions(records, hits);
    const metrics = aggregateControlMetrics(records, hits);
    const summary = summarizeDecisions(decisions);
    const runId = controlRunId(this.controls, records);

    this.logger.info(
      {
        run_id: runId,
        transactions: records.length,
        controls: this.controls.length,
        hits: hits.length,
        firing_controls: metrics.length,
        by_action: summary.by_action,
      },
      "controls evaluated",
    );

    return {
      run_id: runId,
      evaluated_at: this.clock.nowIso(),
      controls: this.controls.length,
      decisions,
      hits,
      metrics,
      summary,
    };
  }
}
