import type { AffectedEndpoint, NotificationSeverity } from '../monitor/types';

export type AlertPayload = {
  severity: NotificationSeverity;
  service_name: string;
  base_url: string;
  affected_endpoints: AffectedEndpoint[];
  started_at: number;
  duration_sec: number | null;
  error_summary: string | null;
  at: number;
};

type ServiceIdentity = Pick<AlertPayload, 'service_name' | 'base_url'>;

const DURATION_UNITS: ReadonlyArray<readonly [string, number]> = [
  ['d', 86_400],
  ['h', 3_600],
  ['m', 60],
  ['s', 1],
];

// Largest unit plus the next one down: "45s", "2m 5s", "1h 2m", "1d 1h".
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.round(seconds));
  const i = DURATION_UNITS.findIndex(([, size]) => total >= size);
  const unit = DURATION_UNITS[i];
  if (!unit) return '0s';

  const [label, size] = unit;
  const text = `${Math.floor(total / size)}${label}`;
  const next = DURATION_UNITS[i + 1];
  if (!next) return text;

  const rest = Math.floor((total % size) / next[1]);
  return rest > 0 ? `${text} ${rest}${next[0]}` : text;
}

function describeService(p: ServiceIdentity): string {
  return `${p.service_name} (${p.base_url})`;
}

export function alertText(payload: AlertPayload): string {
  if (payload.severity === 'recovered') {
    const lines = [`Service RECOVERED: ${describeService(payload)}`];
    if (payload.duration_sec !== null) {
      lines.push(`Downtime: ${formatDuration(payload.duration_sec)}`);
    }
    return lines.join('\n');
  }

  const lines = [`Service DOWN: ${describeService(payload)}`];
  if (payload.affected_endpoints.length > 0) {
    lines.push(`Affected: ${payload.affected_endpoints.map((e) => e.path).join(', ')}`);
  }
  if (payload.error_summary) lines.push(`Error: ${payload.error_summary}`);
  return lines.join('\n');
}

export function testAlertText(identity: ServiceIdentity): string {
  return `Test alert for ${describeService(identity)}\nNotifications from keepwatch reach this channel.`;
}
