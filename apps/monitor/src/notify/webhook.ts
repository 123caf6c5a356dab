import { toErrorMessage } from '../errors';
import { USER_AGENT } from '../monitor/http';
import type { WebhookNotificationConfig } from '../schemas/config';
import { deliveryTimeoutMs, type ChannelMessage, type ChannelResult } from './channel';
import { renderTemplate, renderTemplateValue, type TemplateVars } from './template';

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

export function buildWebhookBody(
  config: WebhookNotificationConfig,
  message: ChannelMessage,
): unknown {
  const baseVars: TemplateVars = {
    ...message.payload,
    event: message.eventType,
    event_key: message.eventKey,
    message: message.text,
  };

  const text = config.message_template
    ? renderTemplate(config.message_template, baseVars)
    : message.text;
  const vars = { ...baseVars, message: text };

  if (config.payload_template !== undefined) {
    return renderTemplateValue(config.payload_template, vars);
  }

  return {
    event: message.eventType,
    event_key: message.eventKey,
    message: text,
    ...message.payload,
  };
}

export async function sendWebhook(
  config: WebhookNotificationConfig,
  message: ChannelMessage,
): Promise<ChannelResult> {
  const timeoutMs = deliveryTimeoutMs(config);

  const headers = new Headers(config.headers ?? undefined);
  if (!headers.has('content-type')) headers.set('Content-Type', 'application/json');
  if (!headers.has('user-agent')) headers.set('User-Agent', USER_AGENT);

  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(config.url, {
      method: config.method,
      headers,
      body: JSON.stringify(buildWebhookBody(config, message)),
      signal: controller.signal,
    });
    await res.body?.cancel().catch(() => undefined);

    if (res.status >= 200 && res.status < 300) {
      return { ok: true, httpStatus: res.status, error: null };
    }
    return { ok: false, httpStatus: res.status, error: `HTTP ${res.status}` };
  } catch (err) {
    if (isAbortError(err)) {
      return { ok: false, httpStatus: null, error: `Timeout after ${timeoutMs}ms` };
    }
    return { ok: false, httpStatus: null, error: toErrorMessage(err) };
  } finally {
    clearTimeout(t);
  }
}
