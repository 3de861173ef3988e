import { parse, YAMLParseError } from "yaml";
import { parseControlSet } from "../../application/control-set.js";
import type { Control } from "../../domain/types.js";
import { AppError } from "../../infra/app-error.js";
import type { ControlSourcePort } from "../../ports/control-source.js";
import { readInputFile } from "./read-input-file.js";

export class YamlControlSource implements ControlSourcePort {
  constructor(readonly location: string) {}

  async loadControls(): Promise<Control[]> {
    const text = await readInputFile(this.location);
    let document: unknown;
    try {
      document = parse(text);
    } catch (error) {
      if (error instanceof YAMLParseError) {
        throw new AppError(422, "invalid_control_set", `${this.location} is not valid YAML: ${error.message}`);
      }
      throw error;
    }
    return parseControlSet(document, this.location);
  }
}
