import { isControlAction } from "../domain/action-priority.js";
import { compileConditions } from "../domain/conditions.js";
import { RAILS, type Control, type Rail } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";

const DEFAULT_SEVERITY = "MEDIUM";
const DEFAULT_ACTION = "REVIEW";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function invalidControl(label: string, message: string): AppError {
  return new AppError(422, "invalid_control", `Control ${label} ${message}.`);
}

export function isRail(value: string): value is Rail {
  return RAILS.some((rail) => rail === value);
}

function parseControl(raw: unknown, position: number): Control {
  if (!isObject(raw)) {
    throw invalidControl(`#${position}`, "must be a mapping");
  }

  const { control_id, rail, severity, action, description, conditions } = raw;
  if (typeof control_id !== "string" || control_id.trim().length === 0) {
    throw invalidControl(`#${position}`, "requires a non-empty control_id");
  }
  const label = `'${control_id}'`;
  if (typeof rail !== "string" || !isRail(rail)) {
    throw invalidControl(label, `rail must be one of: ${RAILS.join(", ")}`);
  }

  const resolvedSeverity = severity ?? DEFAULT_SEVERITY;
  if (typeof resolvedSeverity !== "string") {
    throw invalidControl(label, "severity must be a string");
  }
  const resolvedAction = action ?? DEFAULT_ACTION;
  if (typeof resolvedAction !== "string" || !isControlAction(resolvedAction)) {
    throw invalidControl(label, "action must be one of: ALLOW, REVIEW, BLOCK");
  }
  const resolvedDescription = description ?? "";
  if (typeof resolvedDescription !== "string") {
    throw invalidControl(label, "description must be a string");
  }
  const resolvedConditions = conditions ?? {};
  if (!isObject(resolvedConditions)) {
    throw invalidControl(label, "conditions must be a mapping");
  }

  return {
    control_id,
    rail,
    severity: resolvedSeverity,
    action: resolvedAction,
    description: resolvedDescription,
    conditions: compileConditions(control_id, resolvedConditions),
  };
}

/**
 * Builds the control set from a parsed configuration document (a sequence of
 * control mappings). Missing optional fields take their defaults; a repeated
 * control_id rejects the whole set.
 */
export function parseControlSet(document: unknown, source: string): Control[] {
  if (document === null || document === undefined) {
    return [];
  }
  if (!Array.isArray(document)) {
    throw new AppError(422, "invalid_control_set", `${source} must contain a list of controls.`);
  }

  const controls: Control[] = [];
  const seen = new Set<string>();
  for (const [index, raw] of document.entries()) {
    const control = parseControl(raw, index + 1);
    if (seen.has(control.control_id)) {
      throw new AppError(
        422,
        "duplicate_control_id",
        `Duplicate control_id '${control.control_id}' in ${source}.`,
      );
    }
    seen.add(control.control_id);
    controls.push(control);
  }
  return controls;
}
