import type { Provider } from '../../types/index.js';
import { ProviderError } from '../../utils/errors.js';
import { createChildLogger } from '../../utils/logger.js';

const logger = createChildLogger('provider-http');

export const joinUrl = (baseUrl: string, path: string): string => {
  const normalizedBase = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  return `${normalizedBase}${normalizedPath}`;
};

interface PostJsonOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * POST a JSON payload to a provider endpoint and return the decoded reply.
 * Non-2xx answers become a ProviderError carrying the status and response text.
 */
export async function postJson<T>(provider: Provider, url: string, payload: unknown, options: PostJsonOptions = {}): Promise<T> {
  const response = await fetch(url, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      ...options.headers,
    },
    body: JSON.stringify(payload),
    signal: options.signal,
  });

  if (!response.ok) {
    const errorText = await response.text();
    logger.error({ provider, status: response.status, error: errorText }, 'Provider API error');
    throw new ProviderError(provider, `API error: ${response.status} - ${errorText}`, { status: response.status });
  }

  return (await response.json()) as T;
}
