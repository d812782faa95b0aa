/**
 * Browser module.
 * Playwright actions that run as operations on the browser Worker.
 * Nothing here touches the browser except through those operations.
 */

export {
  createBrowserResource,
  createBrowserHost,
  requirePage,
} from './resource.js';
export type { BrowserResource } from './resource.js';
export { resolveTarget, describeTarget, SelectorError } from './selectors.js';
export { attachRequestCapture } from './capture.js';
export type { RequestCapture } from './capture.js';
export {
  performAction,
  toSelectOptions,
  derivedSelector,
  DERIVED_REF_ATTRIBUTE,
} from './actions.js';
export type { ActionEnv, ActionValue } from './actions.js';
export { createBrowserPerformer, describeAction } from './performer.js';
export type { ActionPerformer, PerformerOptions } from './performer.js';
export { BrowserStateError, ActionError } from './errors.js';
