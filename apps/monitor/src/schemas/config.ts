import { HTTP_METHODS } from '@keepwatch/db';
import { z } from 'zod';

import { normalizeEndpointPath } from '../monitor/targets';

export const notificationEventTypeSchema = z.enum([
  'service.down',
  'service.recovered',
  'report.daily',
]);
export type NotificationEventType = z.infer<typeof notificationEventTypeSchema>;

const httpUrlSchema = z
  .string()
  .url()
  .refine((val) => {
    try {
      const url = new URL(val);
      return url.protocol === 'http:' || url.protocol === 'https:';
    } catch {
      return false;
    }
  }, 'url protocol must be http or https');

const httpMethodSchema = z.enum(HTTP_METHODS);

const endpointObjectSchema = z
  .object({
    path: z.string().min(1).max(2_048),
    methods: z.array(httpMethodSchema).min(1).optional(),
  })
  .strict();

export const webhookNotificationSchema = z
  .object({
    type: z.literal('webhook'),
    url: httpUrlSchema,
    method: z.enum(['POST', 'PUT', 'PATCH']).default('POST'),
    headers: z.record(z.string()).optional(),
    timeout_ms: z.number().int().min(1).max(60_000).optional(),

    // Rendered into {{message}}; placeholders read the alert or report payload.
    message_template: z.string().min(1).max(10_000).optional(),

    // Strings inside this JSON value may reference payload fields, e.g. {{service_name}}.
    payload_template: z.unknown().optional(),

    // If omitted, the channel receives all events.
    enabled_events: z.array(notificationEventTypeSchema).min(1).optional(),
  })
  .strict();
export type WebhookNotificationConfig = z.infer<typeof webhookNotificationSchema>;

export const emailNotificationSchema = z
  .object({
    type: z.literal('email'),
    from: z.string().min(3).max(320),
    to: z.array(z.string().email()).min(1).max(50),
    api_key_env: z
      .string()
      .regex(/^[A-Z_][A-Z0-9_]*$/, 'api_key_env must be an environment variable name')
      .default('RESEND_API_KEY'),
    subject_prefix: z.string().max(100).optional(),
    timeout_ms: z.number().int().min(1).max(60_000).optional(),
    enabled_events: z.array(notificationEventTypeSchema).min(1).optional(),
  })
  .strict();
export type EmailNotificationConfig = z.infer<typeof emailNotificationSchema>;

export const notificationConfigSchema = z.discriminatedUnion('type', [
  webhookNotificationSchema,
  emailNotificationSchema,
]);
export type NotificationConfig = z.infer<typeof notificationConfigSchema>;

export const configFileSchema = z
  .object({
    service_name: z.string().min(1).max(200),
    base_url: httpUrlSchema,
    endpoints: z.array(z.union([z.string().min(1).max(2_048), endpointObjectSchema])).min(1),
    http_methods: z.array(httpMethodSchema).min(1).default(['GET', 'HEAD']),
    headers: z.record(z.string()).optional(),

    timeout_seconds: z.number().positive().max(300).default(10),
    check_interval_seconds: z.number().int().min(1).max(86_400).default(60),

    // HH:MM, UTC.
    report_schedule: z
      .string()
      .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'report_schedule must be HH:MM (UTC)')
      .default('00:00'),
    report_grace_minutes: z.number().int().min(1).max(1_440).default(5),

    down_threshold_cycles: z.number().int().min(1).max(100).default(1),

    notification: notificationConfigSchema.optional(),
  })
  .strict()
  .transform((raw, ctx) => {
    const endpoints = raw.endpoints.map((e) =>
      typeof e === 'string'
        ? { path: normalizeEndpointPath(e), methods: [...raw.http_methods] }
        : { path: normalizeEndpointPath(e.path), methods: e.methods ?? [...raw.http_methods] },
    );

    const seen = new Set<string>();
    for (const [i, e] of endpoints.entries()) {
      if (seen.has(e.path)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['endpoints', i],
          message: `duplicate endpoint path: ${e.path}`,
        });
        return z.NEVER;
      }
      seen.add(e.path);
      e.methods = [...new Set(e.methods)];
    }

    return {
      serviceName: raw.service_name,
      baseUrl: raw.base_url.replace(/\/+$/, ''),
      endpoints,
      headers: raw.headers ?? null,
      timeoutMs: Math.round(raw.timeout_seconds * 1000),
      checkIntervalSeconds: raw.check_interval_seconds,
      reportSchedule: raw.report_schedule,
      reportGraceMinutes: raw.report_grace_minutes,
      downThresholdCycles: raw.down_threshold_cycles,
      notification: raw.notification ?? null,
    };
  });

export type ConfigFileInput = z.input<typeof configFileSchema>;
export type MonitorConfig = z.output<typeof configFileSchema>;
