import type { HttpMethod } from '@keepwatch/db';

import type { EndpointConfig } from './types';

export type ProbeTarget = {
  path: string;
  method: HttpMethod;
  url: string;
};

function isValidPort(n: number): boolean {
  return Number.isInteger(n) && n >= 1 && n <= 65535;
}

export function normalizeEndpointPath(path: string): string {
  const trimmed = path.trim();
  if (trimmed.length === 0) return '/';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

export function joinUrl(baseUrl: string, path: string): string {
  const base = baseUrl.trim().replace(/\/+$/, '');
  return `${base}${normalizeEndpointPath(path)}`;
}

export function validateHttpTarget(target: string): string | null {
  let url: URL;
  try {
    url = new URL(target);
  } catch {
    return 'target must be a valid URL';
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return 'target protocol must be http or https';
  }

  if (!url.hostname) return 'target must include a hostname';
  if (url.username || url.password) return 'target must not embed credentials';

  const port = url.port ? Number(url.port) : url.protocol === 'http:' ? 80 : 443;
  if (!isValidPort(port)) return 'target port is invalid';

  return null;
}

// One target per (path, method), in configuration order.
export function buildProbeTargets(baseUrl: string, endpoints: EndpointConfig[]): ProbeTarget[] {
  const targets: ProbeTarget[] = [];
  for (const endpoint of endpoints) {
    const url = joinUrl(baseUrl, endpoint.path);
    for (const method of endpoint.methods) {
      targets.push({ path: endpoint.path, method, url });
    }
  }
  return targets;
}
