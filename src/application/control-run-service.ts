import type { ControlRunResult } from "../domain/types.js";
import type { ClockPort } from "../infra/clock.js";
import type { Logger } from "../infra/logger.js";
import type { ControlRunSinkPort } from "../ports/control-run-sink.js";
import type { ControlSourcePort } from "../ports/control-source.js";
import type { TransactionSourcePort } from "../ports/transaction-source.js";
import { ControlsEngine } from "./controls-engine.js";

/**
 * Batch pipeline: load transactions and controls, evaluate, write the three
 * tables. Any load failure aborts before the sink is touched.
 */
export class ControlRunService {
  constructor(
    private readonly transactionSource: TransactionSourcePort,
    private readonly controlSource: ControlSourcePort,
    private readonly sink: ControlRunSinkPort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
  ) {}

  async run(): Promise<ControlRunResult> {
    const records = await this.transactionSource.loadTransactions();
    const controls = await this.controlSource.loadControls();
    this.logger.debug(
      {
        transactions: records.length,
        transactions_source: this.transactionSource.location,
        controls: controls.length,
        controls_source: this.controlSource.location,
      },
      "inputs loaded",
    );

    const engine = new ControlsEngine(controls, this.clock, this.logger);
    const result = engine.run(records);

    await this.sink.write(result);
    this.logger.info({ run_id: result.run_id, destination: this.sink.location }, "control outputs written");
    return result;
  }
}
