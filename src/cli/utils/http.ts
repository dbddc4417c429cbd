import type { FetchResult, UrlFetcher } from '../validators/url-validators.js';

/**
 * Opens `url` with a GET and reports how it went. Redirects are followed.
 * No timeout is applied beyond the runtime's own.
 */
export async function openUrl(url: string): Promise<FetchResult> {
  let target: URL;
  try {
    target = new URL(url);
  } catch {
    return { kind: 'invalid-url' };
  }
  if (!target.hostname) {
    return { kind: 'invalid-url' };
  }

  let response: Response;
  try {
    response = await fetch(target, { method: 'GET', redirect: 'follow' });
  } catch (error) {
    if (!(error instanceof Error)) {
      throw error;
    }
    const cause = error.cause instanceof Error ? error.cause.message : error.message;
    return { kind: 'network-error', reason: cause };
  }

  // Only the status matters
  await response.body?.cancel();

  if (!response.ok) {
    return { kind: 'http-error', status: response.status, reason: response.statusText };
  }
  return { kind: 'ok', status: response.status };
}

export function createUrlFetcher(): UrlFetcher {
  return { open: openUrl };
}
