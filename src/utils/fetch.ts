/**
 * Run a fetch and consume its response under one timeout
 *
 * The timeout and an `options.signal` from the caller stay armed until
 * `consume` settles, so a server that sends headers and then stalls the
 * body is aborted like one that never answers.
 */
async function fetchAndConsume<T>(
  url: string | URL,
  options: RequestInit,
  timeoutMs: number,
  consume: (response: Response) => Promise<T>,
): Promise<T> {
  const { signal: callerSignal, ...init } = options;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, timeoutMs);

  const onCallerAbort = () => controller.abort();
  if (callerSignal?.aborted) {
    controller.abort();
  } else {
    callerSignal?.addEventListener("abort", onCallerAbort, { once: true });
  }

  try {
    const response = await fetch(url, {
      ...init,
      signal: controller.signal,
    });
    return await consume(response);
  } catch (error) {
    const aborted = controller.signal.aborted
      || (error instanceof Error && error.name === "AbortError");
    if (aborted) {
      if (callerSignal?.aborted) {
        throw new Error(`Request to ${url.toString()} was cancelled`);
      }
      throw new Error(
        `Request to ${url.toString()} timed out after ${timeoutMs}ms`,
      );
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
    callerSignal?.removeEventListener("abort", onCallerAbort);
  }
}

/**
 * Fetch with timeout using AbortController
 *
 * An `options.signal` from the caller is honored alongside the timeout:
 * whichever fires first aborts the request. Only the wait for headers is
 * bounded; use {@link fetchJsonWithTimeout} to bound the body as well.
 *
 * @param url - URL to fetch
 * @param options - Fetch options
 * @param timeoutMs - Timeout in milliseconds (default: 10000)
 * @returns Response from fetch
 * @throws Error if request times out or fails
 */
export async function fetchWithTimeout(
  url: string | URL,
  options: RequestInit = {},
  timeoutMs = 10000,
): Promise<Response> {
  return fetchAndConsume(url, options, timeoutMs, async (response) => response);
}

/**
 * Fetch JSON with timeout
 *
 * The timeout covers the whole exchange, body included.
 *
 * @param url - URL to fetch
 * @param options - Fetch options
 * @param timeoutMs - Timeout in milliseconds (default: 10000)
 * @returns Parsed JSON response, not yet validated
 * @throws Error if request times out, fails, response is not OK or body is not JSON
 */
export async function fetchJsonWithTimeout(
  url: string | URL,
  options: RequestInit = {},
  timeoutMs = 10000,
): Promise<unknown> {
  return fetchAndConsume(url, options, timeoutMs, async (response) => {
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }

    const text = await response.text();
    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch {
      throw new Error(`Invalid JSON in response from ${url.toString()}`);
    }
  });
}
