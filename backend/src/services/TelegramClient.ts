import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { describeError, DispatchError } from '../errors';
import { log } from '../utils/logger';
import type { InlineButton } from './DigestRenderer';

export const TELEGRAM_API_BASE = 'https://api.telegram.org';
export const MAX_MESSAGE_LENGTH = 4096;
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_DELAY_MS = 2_000;
const MAX_RETRY_AFTER_MS = 30_000;

/**
 * Outbound side of the messaging boundary. Digest code depends on this,
 * not on Telegram, so tests can record what would have been sent.
 */
export interface MessageDispatcher {
  sendMessage(recipientId: string, text: string, keyboard?: InlineButton[][]): Promise<void>;
}

/**
 * Everything the update poller needs from the bot
 */
export interface BotApi extends MessageDispatcher {
  editMessage(recipientId: string, messageId: number, text: string, keyboard?: InlineButton[][]): Promise<void>;
  answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void>;
  getUpdates(offset: number, timeoutSeconds: number, signal?: AbortSignal): Promise<TelegramUpdate[]>;
}

interface TelegramResponse<T> {
  ok: boolean;
  result?: T;
  description?: string;
  error_code?: number;
  parameters?: { retry_after?: number };
}

export interface TelegramChat {
  id: number;
}

export interface TelegramMessage {
  message_id: number;
  chat: TelegramChat;
  text?: string;
}

export interface TelegramCallbackQuery {
  id: string;
  data?: string;
  message?: TelegramMessage;
}

export interface TelegramUpdate {
  update_id: number;
  message?: TelegramMessage;
  callback_query?: TelegramCallbackQuery;
}

export type HttpPoster = Pick<AxiosInstance, 'post'>;

export interface TelegramClientOptions {
  botToken: string;
  http?: HttpPoster;
  maxAttempts?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

interface CallOptions {
  attempts?: number;
  request?: AxiosRequestConfig;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Split on line boundaries so no chunk exceeds the API limit; single
 * overlong lines are cut hard.
 */
export function splitMessage(text: string, limit: number = MAX_MESSAGE_LENGTH): string[] {
  if (text.length <= limit) return [text];

  const chunks: string[] = [];
  let current = '';
  for (const line of text.split('\n')) {
    let remaining = line;
    while (remaining.length > limit) {
      if (current) {
        chunks.push(current);
        current = '';
      }
      chunks.push(remaining.slice(0, limit));
      remaining = remaining.slice(limit);
    }
    const candidate = current ? `${current}\n${remaining}` : remaining;
    if (candidate.length > limit) {
      chunks.push(current);
      current = remaining;
    } else {
      current = candidate;
    }
  }
  if (current) chunks.push(current);
  return chunks;
}

function toReplyMarkup(keyboard: InlineButton[][]) {
  return {
    inline_keyboard: keyboard.map((row) =>
      row.map((button) => ({ text: button.text, callback_data: button.callbackData }))
    ),
  };
}

/**
 * Thin Telegram Bot API client. Sends are retried a bounded number of times
 * with exponential backoff; 429 answers honour retry_after, other 4xx answers
 * fail at once.
 */
export class TelegramClient implements BotApi {
  private http: HttpPoster;
  private maxAttempts: number;
  private retryDelayMs: number;
  private sleep: (ms: number) => Promise<void>;

  constructor(options: TelegramClientOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: `${TELEGRAM_API_BASE}/bot${options.botToken}/`,
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      });
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  public async sendMessage(recipientId: string, text: string, keyboard?: InlineButton[][]): Promise<void> {
    const chunks = splitMessage(text);
    for (let i = 0; i < chunks.length; i++) {
      const isLast = i === chunks.length - 1;
      await this.call<TelegramMessage>(recipientId, 'sendMessage', {
        chat_id: recipientId,
        text: chunks[i],
        parse_mode: 'HTML',
        disable_web_page_preview: true,
        ...(isLast && keyboard ? { reply_markup: toReplyMarkup(keyboard) } : {}),
      });
    }
  }

  public async editMessage(
    recipientId: string,
    messageId: number,
    text: string,
    keyboard?: InlineButton[][]
  ): Promise<void> {
    await this.call<unknown>(recipientId, 'editMessageText', {
      chat_id: recipientId,
      message_id: messageId,
      text,
      parse_mode: 'HTML',
      ...(keyboard ? { reply_markup: toReplyMarkup(keyboard) } : {}),
    });
  }

  public async answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void> {
    await this.call<boolean>('callback', 'answerCallbackQuery', { callback_query_id: callbackQueryId, text }, { attempts: 1 });
  }

  /**
   * Long-poll for updates. Not retried here; the poller loop owns backoff.
   */
  public async getUpdates(offset: number, timeoutSeconds: number, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    const result = await this.call<TelegramUpdate[]>(
      'updates',
      'getUpdates',
      { offset, timeout: timeoutSeconds, allowed_updates: ['message', 'callback_query'] },
      { attempts: 1, request: { timeout: (timeoutSeconds + 10) * 1000, signal } }
    );
    return result ?? [];
  }

  private async call<T>(
    recipientId: string,
    method: string,
    payload: Record<string, unknown>,
    options: CallOptions = {}
  ): Promise<T | undefined> {
    const attempts = options.attempts ?? this.maxAttempts;

    for (let attempt = 1; ; attempt++) {
      try {
        const response = await this.http.post<TelegramResponse<T>>(method, payload, options.request);
        if (!response.data.ok) {
          throw new DispatchError(
            `Telegram ${method} rejected: ${response.data.description ?? 'unknown error'}`,
            recipientId,
            attempt
          );
        }
        return response.data.result;
      } catch (error) {
        const delay = this.retryDelay(error, attempt);
        if (delay === null || attempt >= attempts) {
          if (error instanceof DispatchError) throw error;
          throw new DispatchError(`Telegram ${method} failed: ${this.describe(error)}`, recipientId, attempt, {
            cause: error,
          });
        }

        log.warn(
          `Telegram ${method} attempt ${attempt}/${attempts} failed for ${recipientId}, retrying in ${delay}ms: ${this.describe(error)}`,
          'TelegramClient'
        );
        await this.sleep(delay);
      }
    }
  }

  /**
   * Delay before the next attempt, or null when the failure is not worth retrying
   */
  private retryDelay(error: unknown, attempt: number): number | null {
    if (axios.isCancel(error)) return null;
    if (axios.isAxiosError<TelegramResponse<unknown>>(error) && error.response) {
      const status = error.response.status;
      if (status === 429) {
        const retryAfter = error.response.data?.parameters?.retry_after;
        if (retryAfter !== undefined) {
          return Math.min(retryAfter * 1000, MAX_RETRY_AFTER_MS);
        }
      } else if (status >= 400 && status < 500) {
        return null;
      }
    }
    if (error instanceof DispatchError) return null;
    return this.retryDelayMs * 2 ** (attempt - 1);
  }

  private describe(error: unknown): string {
    if (axios.isAxiosError<TelegramResponse<unknown>>(error)) {
      const description = error.response?.data?.description;
      const status = error.response?.status;
      if (status) return `HTTP ${status}${description ? ` ${description}` : ''}`;
      return error.code ?? error.message;
    }
    return describeError(error);
  }
}
