import { describeError, PersistenceError } from '../errors';
import type { RecipientPref } from '../types/preferences';
import { log } from '../utils/logger';
import { renderPreferenceAck, renderSettingsPrompt, type PreferenceOutcome } from './DigestRenderer';
import type { DigestRunner } from './DigestService';
import type { PreferenceStore } from './PreferenceStore';
import { parsePreferenceAction } from './preferenceActions';
import type { BotApi, TelegramCallbackQuery, TelegramMessage, TelegramUpdate } from './TelegramClient';

export interface PollerOptions {
  pollTimeoutSeconds?: number;
  errorBackoffMs?: number;
}

const DEFAULT_POLL_TIMEOUT_SECONDS = 25;
const DEFAULT_ERROR_BACKOFF_MS = 5_000;

function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve();
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done);
  });
}

/** "/report@my_bot extra" -> "/report" */
export function parseCommand(text: string): string | null {
  const first = text.trim().split(/\s+/)[0] ?? '';
  if (!first.startsWith('/')) return null;
  return first.split('@')[0].toLowerCase();
}

/**
 * Telegram Update Poller
 *
 * Long-polls getUpdates and turns settings-keyboard callbacks and chat
 * commands into preference changes and on-demand digests. Only chats listed
 * as recipients are served; everything else is dropped.
 */
export class TelegramUpdatePoller {
  private offset = 0;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private readonly recipients: Set<string>;
  private readonly pollTimeoutSeconds: number;
  private readonly errorBackoffMs: number;

  constructor(
    private readonly bot: BotApi,
    private readonly preferences: PreferenceStore,
    private readonly digests: DigestRunner,
    recipients: Iterable<string>,
    options: PollerOptions = {}
  ) {
    this.recipients = new Set(recipients);
    this.pollTimeoutSeconds = options.pollTimeoutSeconds ?? DEFAULT_POLL_TIMEOUT_SECONDS;
    this.errorBackoffMs = options.errorBackoffMs ?? DEFAULT_ERROR_BACKOFF_MS;
  }

  public start(): void {
    if (this.loop) {
      log.warn('Update poller already running', 'TelegramUpdatePoller');
      return;
    }
    this.controller = new AbortController();
    this.loop = this.poll(this.controller.signal);
    log.info(`Update poller started for ${this.recipients.size} chats`, 'TelegramUpdatePoller');
  }

  public async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    this.loop = null;
    this.controller = null;
    log.info('Update poller stopped', 'TelegramUpdatePoller');
  }

  public isRunning(): boolean {
    return this.loop !== null;
  }

  /**
   * Handle one update. Never throws; failures are logged so the poll offset
   * still advances past the update.
   */
  public async handleUpdate(update: TelegramUpdate): Promise<void> {
    try {
      if (update.callback_query) {
        await this.handleCallback(update.callback_query);
      } else if (update.message?.text) {
        await this.handleMessage(update.message);
      }
    } catch (error) {
      log.error(`Failed to handle update ${update.update_id}: ${describeError(error)}`, 'TelegramUpdatePoller');
    }
  }

  private async poll(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        const updates = await this.bot.getUpdates(this.offset, this.pollTimeoutSeconds, signal);
        for (const update of updates) {
          this.offset = Math.max(this.offset, update.update_id + 1);
          await this.handleUpdate(update);
        }
      } catch (error) {
        if (signal.aborted) break;
        log.warn(
          `getUpdates failed, retrying in ${this.errorBackoffMs}ms: ${describeError(error)}`,
          'TelegramUpdatePoller'
        );
        await pause(this.errorBackoffMs, signal);
      }
    }
  }

  private isRecipient(chatId: string): boolean {
    if (this.recipients.has(chatId)) return true;
    log.debug(`Ignoring update from unconfigured chat ${chatId}`, 'TelegramUpdatePoller');
    return false;
  }

  private async handleMessage(message: TelegramMessage): Promise<void> {
    const chatId = String(message.chat.id);
    const command = parseCommand(message.text ?? '');
    if (!command || !this.isRecipient(chatId)) return;

    switch (command) {
      case '/start':
      case '/settings': {
        const pref = await this.preferences.getOrDefault(chatId);
        const prompt = renderSettingsPrompt(pref);
        await this.bot.sendMessage(chatId, prompt.text, prompt.keyboard);
        break;
      }
      case '/report':
        await this.digests.buildAndDispatch('on_demand', [chatId]);
        break;
      default:
        log.debug(`Unknown command ${command} from ${chatId}`, 'TelegramUpdatePoller');
    }
  }

  private async handleCallback(query: TelegramCallbackQuery): Promise<void> {
    const message = query.message;
    if (!message) return;
    const chatId = String(message.chat.id);
    if (!this.isRecipient(chatId)) return;

    const action = parsePreferenceAction(query.data ?? '');
    let outcome: PreferenceOutcome;
    let pref: RecipientPref;

    if (!action) {
      outcome = 'unknown';
      pref = await this.preferences.getOrDefault(chatId);
    } else {
      try {
        pref =
          action.kind === 'language'
            ? await this.preferences.setLanguage(chatId, action.language)
            : await this.preferences.setViewMode(chatId, action.viewMode);
        outcome = 'saved';
      } catch (error) {
        if (!(error instanceof PersistenceError)) throw error;
        log.error(`Preference change for ${chatId} not saved: ${describeError(error)}`, 'TelegramUpdatePoller');
        outcome = 'failed';
        pref = await this.preferences.getOrDefault(chatId);
      }
    }

    await this.bot.answerCallbackQuery(query.id, renderPreferenceAck(pref.language, outcome));
    if (outcome === 'saved') {
      const prompt = renderSettingsPrompt(pref);
      await this.bot.editMessage(chatId, message.message_id, prompt.text, prompt.keyboard);
    }
  }
}
