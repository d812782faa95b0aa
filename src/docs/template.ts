import * as log from '../utils/logger.js';
import { DocsError } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export type FetchLike = (url: string) => Promise<Response>;

// ── Template resolution ──────────────────────────────────────

const REMOTE = /^https?:\/\//i;

export function isRemoteTemplate(templateOrUrl: string): boolean {
  return REMOTE.test(templateOrUrl.trim());
}

/** Download a README template, e.g. from a raw GitHub URL. */
export async function fetchTemplate(
  url: string,
  fetchImpl: FetchLike = fetch,
): Promise<string> {
  const response = await fetchImpl(url);
  if (!response.ok) {
    throw new DocsError(
      `Failed to fetch README template from ${url} (status ${String(response.status)})`,
    );
  }
  log.detail(`Fetched README template from ${url}`);
  return response.text();
}

/** A template field holds either the Markdown itself or a URL to it. */
export async function resolveTemplate(
  templateOrUrl: string,
  fetchImpl: FetchLike = fetch,
): Promise<string> {
  if (isRemoteTemplate(templateOrUrl)) {
    return fetchTemplate(templateOrUrl.trim(), fetchImpl);
  }
  return templateOrUrl;
}
