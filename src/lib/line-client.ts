/**
 * Minimal LINE Messaging API client: profile lookup and reply
 */

import { httpGet, httpPostJson, type HttpResponse } from './http-client.js';

export const LINE_API_BASE = 'https://api.line.me';

/** LINE rejects text messages longer than this */
export const MAX_TEXT_MESSAGE_LENGTH = 5000;

export interface LineClientOptions {
  channelAccessToken: string;
  timeoutMs: number;
  baseUrl?: string;
}

export interface ProfileFetcher {
  getProfile(userId: string): Promise<HttpResponse<unknown>>;
}

export interface ReplyChannel {
  replyText(replyToken: string, text: string): Promise<HttpResponse<unknown>>;
}

export function truncateMessage(text: string, limit: number = MAX_TEXT_MESSAGE_LENGTH): string {
  const chars = Array.from(text);
  if (chars.length <= limit) {
    return text;
  }
  return chars.slice(0, limit - 1).join('') + '…';
}

export class LineMessagingClient implements ProfileFetcher, ReplyChannel {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;

  constructor(options: LineClientOptions) {
    this.baseUrl = options.baseUrl ?? LINE_API_BASE;
    this.headers = { Authorization: `Bearer ${options.channelAccessToken}` };
    this.timeoutMs = options.timeoutMs;
  }

  async getProfile(userId: string): Promise<HttpResponse<unknown>> {
    return httpGet(`${this.baseUrl}/v2/bot/profile/${encodeURIComponent(userId)}`, {
      headers: this.headers,
      timeout: this.timeoutMs,
    });
  }

  async replyText(replyToken: string, text: string): Promise<HttpResponse<unknown>> {
    return httpPostJson(
      `${this.baseUrl}/v2/bot/message/reply`,
      {
        replyToken,
        messages: [{ type: 'text', text: truncateMessage(text) }],
      },
      { headers: this.headers, timeout: this.timeoutMs }
    );
  }
}
