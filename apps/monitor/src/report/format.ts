import { formatDuration } from '../notify/message';
import type { UptimeReport } from './aggregate';

export type ReportContext = {
  serviceName: string;
  baseUrl: string;
};

export function formatUtc(timestamp: number): string {
  return `${new Date(timestamp * 1000).toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

function formatMs(ms: number | null): string {
  return ms === null ? 'n/a' : `${ms}ms`;
}

export function reportSubject(report: UptimeReport, ctx: ReportContext): string {
  return `Daily uptime report: ${ctx.serviceName} ${report.uptimePct.toFixed(2)}%`;
}

export function formatReportText(report: UptimeReport, ctx: ReportContext): string {
  const lines = [
    `Daily uptime report for ${ctx.serviceName} (${ctx.baseUrl})`,
    `Window: ${formatUtc(report.windowStart)} - ${formatUtc(report.windowEnd)}`,
    '',
    `Uptime: ${report.uptimePct.toFixed(2)}% (${report.rating})`,
    `Checks: ${report.totalChecks} total, ${report.successfulChecks} ok, ${report.failedChecks} failed`,
    `Latency: avg ${formatMs(report.avgLatencyMs)}, p95 ${formatMs(report.p95LatencyMs)}`,
  ];

  if (report.endpoints.length > 0) {
    lines.push('', 'Endpoints:');
    for (const e of report.endpoints) {
      lines.push(
        `  ${e.path}: ${e.uptimePct.toFixed(2)}% (${e.successfulChecks}/${e.totalChecks}), avg ${formatMs(e.avgLatencyMs)}`,
      );
    }
  }

  lines.push('');
  if (report.incidents.length === 0) {
    lines.push('Incidents: none');
  } else {
    lines.push('Incidents:');
    for (const i of report.incidents) {
      const state = i.open ? 'ongoing' : `resolved ${formatUtc(i.endedAt ?? report.windowEnd)}`;
      const reason = i.reasons[0] ? ` - ${i.reasons[0]}` : '';
      lines.push(
        `  ${i.path}: down ${formatUtc(i.startedAt)} for ${formatDuration(i.durationSec)}, ${state}${reason}`,
      );
    }
  }

  return lines.join('\n');
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function formatReportHtml(report: UptimeReport, ctx: ReportContext): string {
  const e = escapeHtml;

  const endpointRows = report.endpoints
    .map(
      (ep) =>
        `<tr><td>${e(ep.path)}</td><td>${ep.uptimePct.toFixed(2)}%</td><td>${ep.successfulChecks}/${ep.totalChecks}</td><td>${formatMs(ep.avgLatencyMs)}</td></tr>`,
    )
    .join('');

  const incidentItems = report.incidents
    .map((i) => {
      const state = i.open ? 'ongoing' : 'resolved';
      return `<li><strong>${e(i.path)}</strong> down ${formatUtc(i.startedAt)} for ${formatDuration(i.durationSec)} (${state})${i.reasons[0] ? `: ${e(i.reasons[0])}` : ''}</li>`;
    })
    .join('');

  return [
    `<h2>Daily uptime report for ${e(ctx.serviceName)}</h2>`,
    `<p>${e(ctx.baseUrl)}<br>${formatUtc(report.windowStart)} - ${formatUtc(report.windowEnd)}</p>`,
    `<p><strong>Uptime: ${report.uptimePct.toFixed(2)}%</strong> (${report.rating})<br>`,
    `Checks: ${report.totalChecks} total, ${report.successfulChecks} ok, ${report.failedChecks} failed<br>`,
    `Latency: avg ${formatMs(report.avgLatencyMs)}, p95 ${formatMs(report.p95LatencyMs)}</p>`,
    endpointRows
      ? `<table><thead><tr><th>Endpoint</th><th>Uptime</th><th>Checks</th><th>Avg latency</th></tr></thead><tbody>${endpointRows}</tbody></table>`
      : '',
    incidentItems ? `<h3>Incidents</h3><ul>${incidentItems}</ul>` : '<p>No incidents.</p>',
  ].join('\n');
}
