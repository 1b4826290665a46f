import type { Env } from '../config/env.js';
import { notifLog, maskEmail } from '../config/logger.js';
import { logErrorEvent } from '../config/appLogs.js';
import type { RequestStatus, ServiceRequest } from '../models/ServiceRequest.js';

export type NotificationEvent =
  | { type: 'RequestCreated' }
  | { type: 'StatusChanged'; from: RequestStatus; to: RequestStatus };

export type OutgoingMessage = {
  to: string;
  subject: string;
  text: string;
};

export interface NotificationDispatcher {
  /** Fire-and-forget. Never throws and never delays the caller. */
  notify(event: NotificationEvent, request: ServiceRequest): void;
  /** Resolves once every delivery started so far has settled. */
  idle(): Promise<void>;
  readonly enabled: boolean;
}

export type MailgunConfig = {
  domain?: string;
  apiKey?: string;
  baseUrl: string;
  from?: string;
  adminEmail?: string;
  timeoutMs: number;
};

export function mailgunConfigFromEnv(env: Env): MailgunConfig {
  return {
    domain: env.MAILGUN_DOMAIN,
    apiKey: env.MAILGUN_API_KEY,
    baseUrl: env.MAILGUN_BASE_URL,
    from: env.MAIL_FROM,
    adminEmail: env.ADMIN_NOTIFICATION_EMAIL,
    timeoutMs: env.NOTIFY_TIMEOUT_MS,
  };
}

function requestSummary(request: ServiceRequest): string {
  return [
    `Request #${request.id}`,
    `Category: ${request.category}`,
    `Priority: ${request.priority}`,
    `Department: ${request.department ?? 'N/A'}`,
    `Status: ${request.status}`,
  ].join('\n');
}

export function buildMessages(
  event: NotificationEvent,
  request: ServiceRequest,
  ctx: { adminEmail?: string }
): OutgoingMessage[] {
  if (event.type === 'RequestCreated') {
    const messages: OutgoingMessage[] = [
      {
        to: request.contact,
        subject: `[Service Desk] Request #${request.id} received`,
        text:
          `Hello ${request.requesterName},\n\n` +
          `We received your request and will get back to you soon.\n\n` +
          `${requestSummary(request)}\n`,
      },
    ];
    if (ctx.adminEmail) {
      messages.push({
        to: ctx.adminEmail,
        subject: `[Service Desk] New ${request.priority} request #${request.id}: ${request.category}`,
        text:
          `${request.requesterName} <${request.contact}> submitted a new request.\n\n` +
          `${requestSummary(request)}\n\n${request.description}\n`,
      });
    }
    return messages;
  }

  const assigned = request.assignedTo ? `\nAssigned to: ${request.assignedTo}` : '';
  return [
    {
      to: request.contact,
      subject: `[Service Desk] Request #${request.id} is now ${event.to}`,
      text:
        `Hello ${request.requesterName},\n\n` +
        `The status of your request changed from ${event.from} to ${event.to}.${assigned}\n\n` +
        `${requestSummary(request)}\n`,
    },
  ];
}

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Mailgun messages API client. Every delivery is a single attempt bounded by
 * `timeoutMs`; failures are logged and dropped.
 */
export function createMailgunNotifier(config: MailgunConfig, fetchImpl: FetchLike = fetch): NotificationDispatcher {
  const { domain, apiKey } = config;
  const enabled = Boolean(domain && apiKey);
  const from = config.from ?? `IT Service Desk <noreply@${domain ?? 'localhost'}>`;
  const inFlight = new Set<Promise<void>>();

  async function deliver(message: OutgoingMessage, requestId: number): Promise<void> {
    if (!domain || !apiKey) return;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), config.timeoutMs);
    try {
      const body = new URLSearchParams({ from, to: message.to, subject: message.subject, text: message.text });
      const res = await fetchImpl(`${config.baseUrl.replace(/\/+$/, '')}/v3/${domain}/messages`, {
        method: 'POST',
        headers: {
          Authorization: `Basic ${Buffer.from(`api:${apiKey}`).toString('base64')}`,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: body.toString(),
        signal: controller.signal,
      });
      if (!res.ok) {
        throw new Error(`Mailgun responded ${res.status}`);
      }
      notifLog.info('Notification delivered', { to: maskEmail(message.to), requestId });
    } catch (err) {
      logErrorEvent({
        category: 'EXTERNAL_SERVICE',
        severity: 'low',
        error: err,
        message: 'Notification delivery failed',
        operation: 'mailgun.send',
        retryable: false,
        metadata: { to: maskEmail(message.to), requestId },
      });
    } finally {
      clearTimeout(timer);
    }
  }

  function track(p: Promise<void>) {
    inFlight.add(p);
    void p.finally(() => inFlight.delete(p));
  }

  return {
    enabled,

    notify(event, request) {
      if (!enabled) {
        notifLog.debug('Email disabled; skipping notification', { event: event.type, requestId: request.id });
        return;
      }
      let messages: OutgoingMessage[];
      try {
        messages = buildMessages(event, request, { adminEmail: config.adminEmail });
      } catch (err) {
        notifLog.warn('Failed to build notification', { event: event.type, requestId: request.id, error: err });
        return;
      }
      for (const message of messages) track(deliver(message, request.id));
    },

    async idle() {
      while (inFlight.size) {
        await Promise.allSettled(Array.from(inFlight));
      }
    },
  };
}
