import type { Control } from "../domain/types.js";

export interface ControlSourcePort {
  readonly location: string;
  loadControls(): Promise<Control[]>;
}
