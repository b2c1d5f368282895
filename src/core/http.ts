/**
 * fetch with a per-request timeout that covers the body as well as the
 * headers. Failures that never produced a complete response (timeout, DNS,
 * reset) become ErrTransport; status handling is left to callers.
 */
import { ErrTransport } from '../errors/errors.js';

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface HttpReply {
  status: number;
  ok: boolean;
  headers: Headers;
  /** Decoded JSON; undefined when the body is empty or not JSON */
  body: unknown;
}

function causeCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  const cause = error.cause;
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

export function parseJsonBody(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export async function fetchWithTimeout(
  resource: string,
  url: string,
  init: RequestInit,
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
): Promise<HttpReply> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, { ...init, signal: controller.signal });
    const text = await response.text();
    return { status: response.status, ok: response.ok, headers: response.headers, body: parseJsonBody(text) };
  } catch (error) {
    if (controller.signal.aborted || (error instanceof Error && error.name === 'AbortError')) {
      throw ErrTransport.create({ resource, detail: `timed out after ${timeoutMs}ms` });
    }
    throw ErrTransport.create(
      {
        resource,
        detail: error instanceof Error ? error.message : String(error),
        causeCode: causeCode(error),
      },
      undefined,
      error,
    );
  } finally {
    clearTimeout(timeout);
  }
}
