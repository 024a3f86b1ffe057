/**
 * Fetches a URL with a timeout using AbortController.
 * When `signal` is given (the inbound request deadline), its abort also
 * cancels the fetch.
 *
 * @throws Error with name 'AbortError' if the timeout or the outer signal fires
 */
export async function fetchWithTimeout(
  url: string,
  options: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const abortFromOuter = (): void => controller.abort();

  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener('abort', abortFromOuter, { once: true });
  }

  try {
    return await fetch(url, {
      ...options,
      signal: controller.signal,
    });
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', abortFromOuter);
  }
}

/**
 * Reads the body as JSON. Empty bodies become `{}`; non-JSON bodies become
 * `{ raw: text }`.
 */
export async function parseJson(response: Response): Promise<unknown> {
  const text = await response.text();

  if (text.trim() === '') {
    return {};
  }

  try {
    return JSON.parse(text) as unknown;
  } catch {
    return { raw: text };
  }
}
