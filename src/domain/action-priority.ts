import { CONTROL_ACTIONS, type ControlAction } from "./types.js";

const ACTION_PRIORITY: Record<ControlAction, number> = {
  ALLOW: 0,
  REVIEW: 1,
  BLOCK: 2,
};

export function isControlAction(value: string): value is ControlAction {
  return CONTROL_ACTIONS.some((action) => action === value);
}

export function actionPriority(action: string): number {
  return isControlAction(action) ? ACTION_PRIORITY[action] : 0;
}

/**
 * Highest-priority action among those triggered. Unknown actions rank with ALLOW,
 * and an empty set resolves to ALLOW.
 */
export function resolveFinalAction(actions: Iterable<string>): ControlAction {
  let best: ControlAction = "ALLOW";
  for (const action of actions) {
    if (isControlAction(action) && ACTION_PRIORITY[action] > ACTION_PRIORITY[best]) {
      best = action;
    }
  }
  return best;
}
