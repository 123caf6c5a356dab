export type MonitorErrorCode =
  | 'STATE_STORE_IO_ERROR'
  | 'ALERT_DELIVERY_ERROR'
  | 'REPORT_GENERATION_ERROR'
  | 'CONFIG_INVALID';

// A fault of the monitor itself, as opposed to the monitored service being down.
export class MonitorError extends Error {
  constructor(
    public readonly code: MonitorErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'MonitorError';
  }
}

export function isMonitorError(err: unknown, code?: MonitorErrorCode): err is MonitorError {
  return err instanceof MonitorError && (code === undefined || err.code === code);
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function clipMessage(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}
