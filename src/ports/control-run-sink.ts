import type { ControlRunResult } from "../domain/types.js";

export interface ControlRunSinkPort {
  readonly location: string;
  /**
   * Replaces the previously written tables with this run's tables.
   */
  write(run: ControlRunResult): Promise<void>;
}

export interface ControlRunStorePort extends ControlRunSinkPort {
  getLatest(): Promise<ControlRunResult | null>;
}
