import type { ControlRunResult } from "../../domain/types.js";
import type { ControlRunStorePort } from "../../ports/control-run-sink.js";

export class InMemoryControlRunStore implements ControlRunStorePort {
  readonly location = "memory";
  private latest: ControlRunResult | null = null;

  async write(run: ControlRunResult): Promise<void> {
    this.latest = run;
  }

  async getLatest(): Promise<ControlRunResult | null> {
    return this.latest;
  }
}
