import { Resend } from 'resend';

import { toErrorMessage } from '../errors';
import type { EmailNotificationConfig } from '../schemas/config';
import { deliveryTimeoutMs, type ChannelMessage, type ChannelResult } from './channel';

export type EmailSendRequest = {
  from: string;
  to: string[];
  subject: string;
  text: string;
  html?: string;
};

export type EmailClient = {
  send(request: EmailSendRequest): Promise<{ id: string | null; error: string | null }>;
};

export function createResendClient(apiKey: string): EmailClient {
  const resend = new Resend(apiKey);
  return {
    async send(request) {
      const { data, error } = await resend.emails.send(request);
      return { id: data?.id ?? null, error: error ? error.message : null };
    },
  };
}

function timeoutAfter(ms: number): { promise: Promise<never>; cancel: () => void } {
  let t: ReturnType<typeof setTimeout> | undefined;
  const promise = new Promise<never>((_, reject) => {
    t = setTimeout(() => reject(new Error(`Timeout after ${ms}ms`)), ms);
  });
  return { promise, cancel: () => clearTimeout(t) };
}

export async function sendEmail(
  config: EmailNotificationConfig,
  message: ChannelMessage,
  client: EmailClient,
): Promise<ChannelResult> {
  const subject = config.subject_prefix
    ? `${config.subject_prefix} ${message.subject}`
    : message.subject;
  const timeout = timeoutAfter(deliveryTimeoutMs(config));

  try {
    const r = await Promise.race([
      client.send({
        from: config.from,
        to: config.to,
        subject,
        text: message.text,
        ...(message.html !== null ? { html: message.html } : {}),
      }),
      timeout.promise,
    ]);
    if (r.error !== null) {
      return { ok: false, httpStatus: null, error: r.error };
    }
    return { ok: true, httpStatus: null, error: null };
  } catch (err) {
    return { ok: false, httpStatus: null, error: toErrorMessage(err) };
  } finally {
    timeout.cancel();
  }
}
