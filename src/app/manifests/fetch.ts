import { formatErrorMessage } from "../../core/error-format.js";

export const DEFAULT_MANIFEST_TIMEOUT_MS = 10_000;

// =============================================================================
// TYPES
// =============================================================================

export type FetchResponseLike = {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
};

export type FetchLike = (
  url: string,
  init?: { signal?: AbortSignal },
) => Promise<FetchResponseLike>;

export type FetchOptions = {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
};

export type EndpointResult<T> =
  | { label: string; url: string; ok: true; value: T }
  | { label: string; url: string; ok: false; error: string };

// =============================================================================
// PUBLIC API
// =============================================================================

export async function fetchText(url: string, options: FetchOptions = {}): Promise<string> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const res = await fetchImpl(url, {
    signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_MANIFEST_TIMEOUT_MS),
  });
  if (!res.ok) {
    throw new Error(`GET ${url} returned ${res.status} ${res.statusText}`.trim());
  }
  return res.text();
}

/**
 * Fetch and parse every endpoint concurrently. A failing endpoint becomes an
 * error entry; it never fails the others.
 */
export async function fetchEndpoints<T>(
  endpoints: Record<string, string>,
  parse: (body: string) => T,
  options: FetchOptions = {},
): Promise<EndpointResult<T>[]> {
  return Promise.all(
    Object.entries(endpoints).map(async ([label, url]): Promise<EndpointResult<T>> => {
      try {
        const value = parse(await fetchText(url, options));
        return { label, url, ok: true, value };
      } catch (err) {
        return { label, url, ok: false, error: formatErrorMessage(err) };
      }
    }),
  );
}
