import { v4 as uuidv4 } from 'uuid';
import { describeError, DispatchError } from '../errors';
import type { AggregatedView } from '../types/report';
import { log } from '../utils/logger';
import type { DataAggregator } from './DataAggregator';
import { renderDigest } from './DigestRenderer';
import type { NodeStateStore } from './NodeStateStore';
import type { PreferenceStore } from './PreferenceStore';
import type { MessageDispatcher } from './TelegramClient';

export type DigestTrigger = 'scheduled' | 'immediate' | 'on_demand' | 'single';

export interface RecipientFailure {
  recipientId: string;
  error: string;
}

export interface DigestRunResult {
  runId: string;
  trigger: DigestTrigger;
  generatedAt: Date;
  delivered: string[];
  failed: RecipientFailure[];
}

/** What the scheduler and the chat commands need from the digest path */
export interface DigestRunner {
  buildAndDispatch(trigger: DigestTrigger, recipients?: string[]): Promise<DigestRunResult>;
}

export interface DigestServiceDeps {
  store: NodeStateStore;
  aggregator: DataAggregator;
  preferences: PreferenceStore;
  dispatcher: MessageDispatcher;
  recipients: string[];
  now?: () => Date;
}

/**
 * The one build-and-dispatch path behind the timer, the send-on-update
 * trigger and the /report command.
 */
export class DigestService implements DigestRunner {
  private readonly now: () => Date;

  constructor(private readonly deps: DigestServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  public buildView(): AggregatedView {
    // Synchronous copy; later reports cannot change what this run renders
    const snapshot = this.deps.store.snapshot();
    return this.deps.aggregator.buildView(snapshot, this.now());
  }

  /**
   * Render and send one digest per recipient. A failure for one recipient is
   * logged and recorded; the rest still receive theirs.
   */
  public async buildAndDispatch(
    trigger: DigestTrigger,
    recipients: string[] = this.deps.recipients
  ): Promise<DigestRunResult> {
    const runId = uuidv4();
    const view = this.buildView();
    const result: DigestRunResult = { runId, trigger, generatedAt: view.generatedAt, delivered: [], failed: [] };

    log.info(
      `Digest run ${runId} (${trigger}): ${view.nodes.length} nodes, cluster ${view.clusterStatus}, ${recipients.length} recipients`,
      'DigestService'
    );

    for (const recipientId of recipients) {
      try {
        const pref = await this.deps.preferences.getOrDefault(recipientId);
        const text = renderDigest(view, pref.language, pref.viewMode);
        await this.deps.dispatcher.sendMessage(recipientId, text);
        result.delivered.push(recipientId);
      } catch (error) {
        const message = describeError(error);
        result.failed.push({ recipientId, error: message });
        const tries = error instanceof DispatchError ? ` after ${error.attempts} attempt(s)` : '';
        log.error(`Digest run ${runId}: delivery to ${recipientId} failed${tries}: ${message}`, 'DigestService');
      }
    }

    if (result.failed.length > 0) {
      log.warn(
        `Digest run ${runId} finished with ${result.failed.length}/${recipients.length} failed deliveries`,
        'DigestService'
      );
    } else {
      log.success(`Digest run ${runId} delivered to ${result.delivered.length} recipients`, 'DigestService');
    }
    return result;
  }
}
