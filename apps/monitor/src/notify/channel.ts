import type { NotificationConfig, NotificationEventType } from '../schemas/config';

// `test.ping` is only sent on request and bypasses `enabled_events`.
export type ChannelEventType = NotificationEventType | 'test.ping';

export type ChannelMessage = {
  eventType: ChannelEventType;
  eventKey: string;
  subject: string;
  text: string;
  html: string | null;
  payload: Record<string, unknown>;
};

export type ChannelResult = {
  ok: boolean;
  httpStatus: number | null;
  error: string | null;
};

export type ChannelSender = (message: ChannelMessage) => Promise<ChannelResult>;

export const DEFAULT_DELIVERY_TIMEOUT_MS = 10_000;

export function channelAccepts(
  notification: NotificationConfig,
  eventType: NotificationEventType,
): boolean {
  const enabled = notification.enabled_events;
  return !enabled || enabled.includes(eventType);
}

export function deliveryTimeoutMs(notification: NotificationConfig): number {
  return notification.timeout_ms ?? DEFAULT_DELIVERY_TIMEOUT_MS;
}
