import type { Dispatcher } from '../core/dispatcher.js';
import type { Action } from '../schema/action.js';
import type { TemplateVars } from '../utils/template.js';
import * as log from '../utils/logger.js';
import { performAction } from './actions.js';
import type { ActionValue } from './actions.js';
import type { BrowserResource } from './resource.js';
import { describeTarget } from './selectors.js';

// ── Public types ─────────────────────────────────────────────

/** Runs browser actions somewhere that owns the browser. */
export interface ActionPerformer {
  perform(action: Action, vars: TemplateVars): Promise<ActionValue>;
}

export interface PerformerOptions {
  /** Default for "open" actions that don't set `headless`. */
  headless: boolean;
  /** How long a caller waits for its action's reply; unset waits forever. */
  waitTimeoutMs?: number | undefined;
}

// ── Factory ──────────────────────────────────────────────────

/**
 * Each `perform` call becomes exactly one operation on the browser Worker.
 * Callers may invoke it concurrently; the Worker still runs one at a time.
 */
export function createBrowserPerformer(
  dispatcher: Dispatcher<BrowserResource>,
  options: PerformerOptions,
): ActionPerformer {
  return {
    async perform(action: Action, vars: TemplateVars): Promise<ActionValue> {
      log.action(describeAction(action));

      const value = await dispatcher.submit(
        (resource) =>
          performAction(resource, action, { vars, headless: options.headless }),
        { timeoutMs: options.waitTimeoutMs },
      );

      if (action.type === 'capture_endpoint') {
        if (value) {
          log.capture(`Captured endpoint: ${value}`);
        } else {
          log.warn(`No finished request matched "${action.pattern}"`);
        }
      }

      return value;
    },
  };
}

// ── Description helper ───────────────────────────────────────

/** Human-readable one-liner for logs and step records. */
export function describeAction(action: Action): string {
  switch (action.type) {
    case 'open':
      return `Open ${action.url}`;
    case 'navigate':
      return `Navigate to ${action.url}`;
    case 'click': {
      const verb = action.double ? 'Double-click' : 'Click';
      const where = action.position
        ? ` at (${String(action.position.x)}, ${String(action.position.y)})`
        : '';
      return action.target
        ? `${verb} ${describeTarget(action.target)}${where}`
        : `${verb}${where}`;
    }
    case 'fill':
      return action.sequential
        ? `Type into ${describeTarget(action.target)} (${String(action.delay)}ms per key)`
        : `Fill ${describeTarget(action.target)}`;
    case 'press_key':
      return action.target
        ? `Press ${action.key} on ${describeTarget(action.target)}`
        : `Press ${action.key}`;
    case 'hover':
      return `Hover ${describeTarget(action.target)}`;
    case 'focus':
      return `Focus ${describeTarget(action.target)}`;
    case 'check':
      return action.expectChecked
        ? `Assert ${describeTarget(action.target)} is checked`
        : `Check ${describeTarget(action.target)}`;
    case 'select':
      return `Select ${action.options.join(', ')} in ${describeTarget(action.target)}`;
    case 'upload':
      return `Upload ${action.files.join(', ')} to ${describeTarget(action.target)}`;
    case 'scroll':
      return action.target
        ? `Scroll ${describeTarget(action.target)} (${action.method})`
        : `Scroll page (${action.method})`;
    case 'drag':
      return `Drag ${describeTarget(action.source)} to ${describeTarget(action.target)}`;
    case 'screenshot':
      return action.target
        ? `Screenshot ${describeTarget(action.target)} to ${action.path}`
        : `Screenshot page to ${action.path}`;
    case 'wait_for':
      return `Wait for ${describeTarget(action.target)}`;
    case 'derive_element':
      return `Derive "${action.name}" from ${describeTarget(action.target)}`;
    case 'capture_endpoint':
      return `Capture requests matching "${action.pattern}"`;
    case 'read_body':
      return 'Read page body';
    case 'close':
      return 'Close browser';
  }
}
