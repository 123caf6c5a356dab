import type { HttpMethod, ProbeErrorKind } from '@keepwatch/db';

import { toErrorMessage } from '../errors';
import { buildProbeTargets, validateHttpTarget } from './targets';
import type { CheckResult, EndpointConfig, ProbeOutcome } from './types';

export type ProbeConfig = {
  url: string;
  method: HttpMethod;
  timeoutMs: number;
  headers?: Record<string, string> | null;
};

export type ProbeAllConfig = {
  baseUrl: string;
  endpoints: EndpointConfig[];
  timeoutMs: number;
  headers?: Record<string, string> | null;
};

export const USER_AGENT = 'keepwatch/0.1';
export const DEFAULT_PROBE_TIMEOUT_MS = 10_000;

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

function statusOk(httpStatus: number): boolean {
  return httpStatus >= 200 && httpStatus < 400;
}

function failure(
  errorKind: ProbeErrorKind,
  error: string,
  latencyMs: number | null,
  httpStatus: number | null = null,
): ProbeOutcome {
  return { success: false, latencyMs, httpStatus, errorKind, error };
}

async function fetchWithTimeout(
  url: string,
  timeoutMs: number,
  init: RequestInit,
): Promise<Response> {
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(t);
  }
}

export async function runProbe(config: ProbeConfig): Promise<ProbeOutcome> {
  const targetErr = validateHttpTarget(config.url);
  if (targetErr) {
    return failure('unknown', targetErr, null);
  }

  const started = performance.now();

  try {
    const headers = new Headers(config.headers ?? undefined);
    if (!headers.has('user-agent')) {
      headers.set('User-Agent', USER_AGENT);
    }

    const res = await fetchWithTimeout(config.url, config.timeoutMs, {
      method: config.method,
      headers,
      redirect: 'manual',
    });

    const latencyMs = Math.round(performance.now() - started);
    const httpStatus = res.status;

    // Only the status line matters.
    await res.body?.cancel().catch(() => undefined);

    if (!statusOk(httpStatus)) {
      return failure('http_error', `Unexpected HTTP status: ${httpStatus}`, latencyMs, httpStatus);
    }

    return { success: true, latencyMs, httpStatus, errorKind: null, error: null };
  } catch (err) {
    const latencyMs = Math.round(performance.now() - started);
    if (isAbortError(err)) {
      return failure('timeout', `Timeout after ${config.timeoutMs}ms`, latencyMs);
    }
    if (err instanceof TypeError) {
      const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
      return failure('connection_error', `${err.message}${cause}`, latencyMs);
    }
    return failure('unknown', toErrorMessage(err), latencyMs);
  }
}

export async function probeAll(config: ProbeAllConfig, checkedAt: number): Promise<CheckResult[]> {
  const targets = buildProbeTargets(config.baseUrl, config.endpoints);

  return Promise.all(
    targets.map(async (target): Promise<CheckResult> => {
      const outcome = await runProbe({
        url: target.url,
        method: target.method,
        timeoutMs: config.timeoutMs,
        headers: config.headers ?? null,
      });
      return { ...outcome, path: target.path, method: target.method, checkedAt };
    }),
  );
}
