import type { Page, Request } from 'playwright';

// ── Public interface ─────────────────────────────────────────

export interface RequestCapture {
  /** URLs of finished requests that matched, in completion order. */
  readonly urls: readonly string[];
  /** Detach the listener. Safe to call more than once. */
  detach(): void;
}

// ── Factory ──────────────────────────────────────────────────

/**
 * Record every finished request whose URL contains `pattern`.
 * The listener stays attached until `detach()`.
 */
export function attachRequestCapture(page: Page, pattern: string): RequestCapture {
  const urls: string[] = [];
  let attached = true;

  const onFinished = (request: Request): void => {
    const url = request.url();
    if (url.includes(pattern)) {
      urls.push(url);
    }
  };

  page.on('requestfinished', onFinished);

  return {
    urls,
    detach(): void {
      if (!attached) return;
      attached = false;
      page.off('requestfinished', onFinished);
    },
  };
}
