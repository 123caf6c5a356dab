import type { probeAll } from './monitor/http';
import type { NotifierDeps } from './notify/dispatcher';
import type { MonitorConfig } from './schemas/config';

export type MonitorDeps = Omit<NotifierDeps, 'config'> & {
  config: MonitorConfig;
  // Replaces the HTTP probe fan-out.
  probe?: typeof probeAll;
};

export function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}
