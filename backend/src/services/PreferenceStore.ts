import type { QueryResultRow } from 'pg';
import type { Queryable } from '../database/database';
import { describeError, PersistenceError } from '../errors';
import type { RecipientConfig } from '../types/config';
import {
  DEFAULT_LANGUAGE,
  DEFAULT_VIEW_MODE,
  isLanguage,
  isViewMode,
  type Language,
  type PrefDefaults,
  type RecipientPref,
  type ViewMode,
} from '../types/preferences';
import { KeyedMutex } from '../utils/keyedMutex';
import { log } from '../utils/logger';

/**
 * Per-recipient language and view mode.
 *
 * getOrDefault never fails: an unknown recipient gets its configured default,
 * which is persisted on that first read. Setters persist before returning and
 * throw PersistenceError when the write does not land.
 */
export interface PreferenceStore {
  getOrDefault(recipientId: string): Promise<RecipientPref>;
  setLanguage(recipientId: string, language: Language): Promise<RecipientPref>;
  setViewMode(recipientId: string, viewMode: ViewMode): Promise<RecipientPref>;
}

/**
 * Per-recipient defaults from config, then the global default
 */
export class DefaultsResolver {
  private perRecipient: Map<string, PrefDefaults> = new Map();

  constructor(
    recipients: RecipientConfig[] = [],
    private readonly fallback: PrefDefaults = { language: DEFAULT_LANGUAGE, viewMode: DEFAULT_VIEW_MODE }
  ) {
    for (const recipient of recipients) {
      this.perRecipient.set(recipient.id, {
        language: recipient.defaultLanguage,
        viewMode: recipient.defaultViewMode,
      });
    }
  }

  public resolve(recipientId: string): PrefDefaults {
    return this.perRecipient.get(recipientId) ?? this.fallback;
  }

  public materialize(recipientId: string, now: Date = new Date()): RecipientPref {
    const { language, viewMode } = this.resolve(recipientId);
    return { recipientId, language, viewMode, createdAt: now, updatedAt: now };
  }
}

type PrefRow = {
  recipient_id: string;
  language: string;
  view_mode: string;
  created_at: Date;
  updated_at: Date;
};

const COLUMNS = 'recipient_id, language, view_mode, created_at, updated_at';

function toDate(value: unknown): Date {
  return value instanceof Date ? value : new Date(String(value));
}

function toPrefRow(row: QueryResultRow | undefined): PrefRow | undefined {
  if (!row) return undefined;
  const recipientId: unknown = row.recipient_id;
  if (typeof recipientId !== 'string') {
    throw new PersistenceError('Preference row has no recipient_id');
  }
  const language: unknown = row.language;
  const viewMode: unknown = row.view_mode;
  return {
    recipient_id: recipientId,
    language: typeof language === 'string' ? language : '',
    view_mode: typeof viewMode === 'string' ? viewMode : '',
    created_at: toDate(row.created_at),
    updated_at: toDate(row.updated_at),
  };
}

export class PostgresPreferenceStore implements PreferenceStore {
  // Last value read from or written to the database, per recipient
  private cache: Map<string, RecipientPref> = new Map();
  private mutex = new KeyedMutex();

  constructor(
    private readonly db: Queryable,
    private readonly defaults: DefaultsResolver
  ) {}

  public getOrDefault(recipientId: string): Promise<RecipientPref> {
    return this.mutex.run(recipientId, async () => {
      const fallback = this.defaults.resolve(recipientId);
      try {
        await this.db.run(
          `INSERT INTO recipient_prefs (recipient_id, language, view_mode)
           VALUES ($1, $2, $3)
           ON CONFLICT (recipient_id) DO NOTHING`,
          [recipientId, fallback.language, fallback.viewMode]
        );
        const row = toPrefRow(
          await this.db.get(`SELECT ${COLUMNS} FROM recipient_prefs WHERE recipient_id = $1`, [recipientId])
        );
        if (!row) {
          throw new PersistenceError(`Preference row for ${recipientId} missing after insert`);
        }
        return this.remember(row);
      } catch (error) {
        const cached = this.cache.get(recipientId);
        log.warn(
          `Preference lookup failed for ${recipientId}, using ${cached ? 'last known' : 'default'} preferences: ${describeError(error)}`,
          'PreferenceStore'
        );
        return cached ? { ...cached } : this.defaults.materialize(recipientId);
      }
    });
  }

  public setLanguage(recipientId: string, language: Language): Promise<RecipientPref> {
    return this.update(recipientId, 'language', language);
  }

  public setViewMode(recipientId: string, viewMode: ViewMode): Promise<RecipientPref> {
    return this.update(recipientId, 'view_mode', viewMode);
  }

  private update(recipientId: string, column: 'language' | 'view_mode', value: string): Promise<RecipientPref> {
    return this.mutex.run(recipientId, async () => {
      const fallback = this.defaults.resolve(recipientId);
      const insert = {
        language: column === 'language' ? value : fallback.language,
        view_mode: column === 'view_mode' ? value : fallback.viewMode,
      };

      let row: PrefRow | undefined;
      try {
        row = toPrefRow(
          await this.db.get(
            `INSERT INTO recipient_prefs (recipient_id, language, view_mode)
           VALUES ($1, $2, $3)
           ON CONFLICT (recipient_id)
           DO UPDATE SET ${column} = EXCLUDED.${column}, updated_at = CURRENT_TIMESTAMP
           RETURNING ${COLUMNS}`,
            [recipientId, insert.language, insert.view_mode]
          )
        );
      } catch (error) {
        throw new PersistenceError(`Failed to persist ${column} for ${recipientId}`, { cause: error });
      }
      if (!row) {
        throw new PersistenceError(`No row returned when persisting ${column} for ${recipientId}`);
      }

      log.info(`Preference updated: ${recipientId} ${column}=${value}`, 'PreferenceStore');
      return this.remember(row);
    });
  }

  private remember(row: PrefRow): RecipientPref {
    const fallback = this.defaults.resolve(row.recipient_id);
    const pref: RecipientPref = {
      recipientId: row.recipient_id,
      // Rows edited by hand may carry values this build does not support
      language: isLanguage(row.language) ? row.language : fallback.language,
      viewMode: isViewMode(row.view_mode) ? row.view_mode : fallback.viewMode,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
    this.cache.set(pref.recipientId, pref);
    return { ...pref };
  }
}

/**
 * Same contract backed by a Map. Used by single mode, which has no database,
 * and by tests; passing the same backing map to a new instance models a restart.
 */
export class InMemoryPreferenceStore implements PreferenceStore {
  constructor(
    private readonly defaults: DefaultsResolver,
    private readonly backing: Map<string, RecipientPref> = new Map()
  ) {}

  public async getOrDefault(recipientId: string): Promise<RecipientPref> {
    let pref = this.backing.get(recipientId);
    if (!pref) {
      pref = this.defaults.materialize(recipientId);
      this.backing.set(recipientId, pref);
    }
    return { ...pref };
  }

  public async setLanguage(recipientId: string, language: Language): Promise<RecipientPref> {
    return this.write(recipientId, { language });
  }

  public async setViewMode(recipientId: string, viewMode: ViewMode): Promise<RecipientPref> {
    return this.write(recipientId, { viewMode });
  }

  private write(recipientId: string, change: Partial<PrefDefaults>): RecipientPref {
    const now = new Date();
    const current = this.backing.get(recipientId) ?? this.defaults.materialize(recipientId, now);
    const next: RecipientPref = { ...current, ...change, updatedAt: now };
    this.backing.set(recipientId, next);
    return { ...next };
  }
}
