/**
 * Fetch with a hard deadline. An aborted request surfaces as
 * ExternalServiceTimeout so callers can tell it apart from other failures.
 */

import { ExternalServiceTimeout } from './errors';

export async function fetchWithTimeout(
  service: string,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new ExternalServiceTimeout(service, timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
