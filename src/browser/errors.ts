import type { ActionType } from '../schema/action.js';

// ── Errors ────────────────────────────────────────────────────

/** The owned browser is not in the state an action needs. */
export class BrowserStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BrowserStateError';
  }
}

/** An action's own check failed after the driver call succeeded. */
export class ActionError extends Error {
  readonly actionType: ActionType;

  constructor(actionType: ActionType, message: string) {
    super(`${actionType}: ${message}`);
    this.name = 'ActionError';
    this.actionType = actionType;
  }
}
