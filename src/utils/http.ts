import type { Static, TSchema } from '@sinclair/typebox';
import { validate } from '../api/validation';
import { SourceUnavailableError, toSourceUnavailable } from './errors';

export type FetchFn = typeof fetch;

export interface FetchJsonOptions {
  timeoutMs: number;
  fetchFn?: FetchFn;
}

/**
 * GET a JSON document and check it against a schema
 *
 * Any failure (network, timeout, status, body shape) becomes a
 * SourceUnavailableError named after the source.
 */
export async function fetchJson<S extends TSchema>(
  source: string,
  url: string,
  schema: S,
  options: FetchJsonOptions
): Promise<Static<S>> {
  const fetchFn = options.fetchFn ?? fetch;

  let body: unknown;
  try {
    const response = await fetchFn(url, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    if (!response.ok) {
      throw new SourceUnavailableError(source, `GET ${url} failed with status ${response.status}`);
    }
    body = await response.json();
  } catch (err) {
    throw toSourceUnavailable(source, err);
  }

  const result = validate(schema, body);
  if (!result.valid) {
    throw new SourceUnavailableError(source, `Unexpected response from ${url} (${result.reason})`);
  }
  return result.value;
}
