import { chromium } from 'playwright';
import type { Browser, BrowserType, Page } from 'playwright';

import { createWorkerHost } from '../core/lifecycle.js';
import type { WorkerHost } from '../core/lifecycle.js';
import { BrowserStateError } from './errors.js';

// ── Owned resource ────────────────────────────────────────────

/**
 * The browser state a Worker owns. Only actions running on the Worker read
 * or write these fields.
 */
export interface BrowserResource {
  readonly launcher: BrowserType;
  browser: Browser | null;
  page: Page | null;
}

export function createBrowserResource(
  launcher: BrowserType = chromium,
): BrowserResource {
  return { launcher, browser: null, page: null };
}

export function requirePage(resource: BrowserResource): Page {
  if (!resource.page) {
    throw new BrowserStateError('No page is open; run an "open" action first');
  }
  return resource.page;
}

// ── Host ──────────────────────────────────────────────────────

/** One Worker per host; the browser itself launches on the first "open". */
export function createBrowserHost(
  launcher: BrowserType = chromium,
): WorkerHost<BrowserResource> {
  return createWorkerHost(() => createBrowserResource(launcher));
}
