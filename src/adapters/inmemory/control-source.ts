import { parseControlSet } from "../../application/control-set.js";
import type { Control } from "../../domain/types.js";
import type { ControlSourcePort } from "../../ports/control-source.js";

/**
 * Control source over an already-parsed document, e.g. one embedded in tests
 * or received from another service.
 */
export class InMemoryControlSource implements ControlSourcePort {
  readonly location = "memory";

  constructor(private readonly document: unknown) {}

  async loadControls(): Promise<Control[]> {
    return parseControlSet(this.document, this.location);
  }
}
