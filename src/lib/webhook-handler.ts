/**
 * Webhook processing: verify, then run each text-message event as an isolated
 * unit of work. A failing event is logged and never aborts its siblings.
 */

import { z } from 'zod';
import { settle } from './error-handlers.js';
import { AuthenticationError, ValidationError } from './errors.js';
import type { ReplyChannel } from './line-client.js';
import { loggers } from './logger.js';
import type { ProfileResolver } from './profile-resolver.js';
import { parseJson } from './safe-json.js';
import { verifyWebhookSignature } from './webhook-auth.js';
import type {
  Translator,
  WebhookEnvelope,
  WebhookEvent,
  WebhookOutcome,
} from '../types/index.js';

export const TRANSLATION_FAILED_NOTICE = "Sorry, I couldn't translate that message right now.";

const webhookEventSchema = z.object({
  type: z.string(),
  replyToken: z.string().optional(),
  source: z
    .object({
      type: z.string().optional(),
      userId: z.string().optional(),
    })
    .optional(),
  message: z
    .object({
      type: z.string(),
      id: z.string().optional(),
      text: z.string().optional(),
    })
    .optional(),
});

const webhookEnvelopeSchema = z.object({
  destination: z.string().optional(),
  events: z.array(z.unknown()).default([]),
});

type EventResult = 'skipped' | 'translated' | 'replied' | 'failed';

export interface WebhookProcessorOptions {
  translator: Translator;
  profiles: ProfileResolver;
  /** Null when no reply credential is configured */
  replies: ReplyChannel | null;
  channelSecret?: string;
  allowUnsigned?: boolean;
}

/**
 * Parse a verified body into an envelope. Events that do not match the
 * expected shape are dropped individually.
 */
export function parseWebhookEnvelope(rawBody: string): WebhookEnvelope {
  const json = parseJson(rawBody);
  if (!json.ok) {
    loggers.warn('Ignoring webhook body that is not JSON:', json.error);
    return { events: [] };
  }

  const parsed = webhookEnvelopeSchema.safeParse(json.value);
  if (!parsed.success) {
    loggers.warn('Ignoring webhook body that is not an event envelope');
    return { events: [] };
  }

  const events: WebhookEvent[] = [];
  for (const candidate of parsed.data.events) {
    const event = webhookEventSchema.safeParse(candidate);
    if (event.success) {
      events.push(event.data);
    } else {
      loggers.debug('Dropping malformed webhook event', event.error.issues[0]?.message);
    }
  }

  return { destination: parsed.data.destination, events };
}

function isTextMessageEvent(event: WebhookEvent): boolean {
  return event.type === 'message' && event.message?.type === 'text';
}

export class WebhookProcessor {
  private readonly translator: Translator;
  private readonly profiles: ProfileResolver;
  private readonly replies: ReplyChannel | null;
  private readonly channelSecret?: string;
  private readonly allowUnsigned: boolean;

  constructor(options: WebhookProcessorOptions) {
    this.translator = options.translator;
    this.profiles = options.profiles;
    this.replies = options.replies;
    this.channelSecret = options.channelSecret;
    this.allowUnsigned = options.allowUnsigned ?? false;
  }

  /**
   * Verify and process a webhook delivery.
   * @throws AuthenticationError before any event is looked at
   */
  async handle(rawBody: Uint8Array, signature: string | null | undefined): Promise<WebhookOutcome> {
    const verification = verifyWebhookSignature(rawBody, signature, this.channelSecret, {
      allowUnsigned: this.allowUnsigned,
    });
    if (!verification.valid) {
      // the caller only learns that verification failed
      loggers.webhookRejected(verification.error ?? 'unknown reason');
      throw new AuthenticationError();
    }

    const envelope = parseWebhookEnvelope(Buffer.from(rawBody).toString('utf8'));
    const outcome: WebhookOutcome = {
      received: envelope.events.length,
      translated: 0,
      replied: 0,
      skipped: 0,
      failed: 0,
    };

    for (const event of envelope.events) {
      const settled = await settle(() => this.processEvent(event));
      if (!settled.ok) {
        loggers.eventFailed(event.message?.id ?? 'unknown message', settled.error);
        outcome.failed++;
        continue;
      }

      switch (settled.value) {
        case 'replied':
          outcome.translated++;
          outcome.replied++;
          break;
        case 'translated':
          outcome.translated++;
          break;
        case 'skipped':
          outcome.skipped++;
          break;
        case 'failed':
          outcome.failed++;
      }
    }

    loggers.debug('Webhook processed', outcome);
    return outcome;
  }

  private async processEvent(event: WebhookEvent): Promise<EventResult> {
    const text = event.message?.text ?? '';
    if (!isTextMessageEvent(event) || !text.trim()) {
      return 'skipped';
    }

    const userId = event.source?.userId;
    const author = userId ? await this.profiles.displayNameFor(userId) : undefined;

    let rendered: string;
    try {
      const result = await this.translator.translate({ author, text });
      rendered = result.renderedText ?? '';
    } catch (error) {
      if (error instanceof ValidationError) {
        return 'skipped';
      }

      loggers.genericFailed('translate webhook message', error);
      await this.reply(event.replyToken, TRANSLATION_FAILED_NOTICE);
      return 'failed';
    }

    return (await this.reply(event.replyToken, rendered)) ? 'replied' : 'translated';
  }

  private async reply(replyToken: string | undefined, text: string): Promise<boolean> {
    if (!replyToken || !this.replies) {
      return false;
    }

    const response = await this.replies.replyText(replyToken, text);
    if (!response.ok) {
      loggers.replyFailed(replyToken, response.error ?? `HTTP ${response.status}`);
      return false;
    }

    return true;
  }
}
