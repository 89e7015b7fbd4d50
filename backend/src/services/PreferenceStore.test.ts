import { describe, expect, it, vi, type Mock } from 'vitest';
import { PersistenceError } from '../errors';
import type { RecipientPref } from '../types/preferences';
import { DefaultsResolver, InMemoryPreferenceStore, PostgresPreferenceStore } from './PreferenceStore';

const defaults = new DefaultsResolver([
  { id: 'ru-chat', defaultLanguage: 'ru', defaultViewMode: 'detailed' },
]);

const created = new Date('2026-03-01T10:00:00Z');

function row(recipientId: string, language: string, viewMode: string) {
  return { recipient_id: recipientId, language, view_mode: viewMode, created_at: created, updated_at: created };
}

// Satisfies Queryable structurally
type MockDb = { run: Mock; get: Mock };

function mockDb(overrides: Partial<{ run: Mock; get: Mock }> = {}): MockDb {
  return {
    run: overrides.run ?? vi.fn(async () => ({ rows: [], rowCount: 0, command: 'INSERT', oid: 0, fields: [] })),
    get: overrides.get ?? vi.fn(async () => undefined),
  };
}

describe('DefaultsResolver', () => {
  it('prefers per-recipient config over the global default', () => {
    expect(defaults.resolve('ru-chat')).toEqual({ language: 'ru', viewMode: 'detailed' });
    expect(defaults.resolve('someone-else')).toEqual({ language: 'en', viewMode: 'compact' });
  });
});

describe('InMemoryPreferenceStore', () => {
  it('returns the configured default for a new recipient', async () => {
    const store = new InMemoryPreferenceStore(defaults);
    const pref = await store.getOrDefault('ru-chat');
    expect(pref).toMatchObject({ recipientId: 'ru-chat', language: 'ru', viewMode: 'detailed' });
  });

  it('keeps the default and later changes across a restart', async () => {
    const backing = new Map<string, RecipientPref>();
    const first = new InMemoryPreferenceStore(defaults, backing);
    await first.getOrDefault('42');
    await first.setViewMode('42', 'detailed');

    const restarted = new InMemoryPreferenceStore(defaults, backing);
    expect(await restarted.getOrDefault('42')).toMatchObject({ language: 'en', viewMode: 'detailed' });
  });

  it('changes one field without touching the other', async () => {
    const store = new InMemoryPreferenceStore(defaults);
    await store.setLanguage('ru-chat', 'en');
    expect(await store.getOrDefault('ru-chat')).toMatchObject({ language: 'en', viewMode: 'detailed' });
  });
});

describe('PostgresPreferenceStore', () => {
  it('inserts the default on first read and returns the stored row', async () => {
    const db = mockDb({ get: vi.fn(async () => row('ru-chat', 'ru', 'detailed')) });
    const store = new PostgresPreferenceStore(db, defaults);

    const pref = await store.getOrDefault('ru-chat');

    expect(pref).toEqual({
      recipientId: 'ru-chat',
      language: 'ru',
      viewMode: 'detailed',
      createdAt: created,
      updatedAt: created,
    });
    expect(db.run).toHaveBeenCalledWith(expect.stringContaining('ON CONFLICT (recipient_id) DO NOTHING'), [
      'ru-chat',
      'ru',
      'detailed',
    ]);
  });

  it('upserts the changed column only', async () => {
    const db = mockDb({ get: vi.fn(async () => row('42', 'ru', 'compact')) });
    const store = new PostgresPreferenceStore(db, defaults);

    const pref = await store.setLanguage('42', 'ru');

    expect(pref.language).toBe('ru');
    const [sql, params] = db.get.mock.calls[0];
    expect(sql).toContain('DO UPDATE SET language = EXCLUDED.language');
    expect(params).toEqual(['42', 'ru', 'compact']);
  });

  it('raises PersistenceError when the write fails', async () => {
    const db = mockDb({
      get: vi.fn(async () => {
        throw new Error('connection refused');
      }),
    });
    const store = new PostgresPreferenceStore(db, defaults);

    await expect(store.setViewMode('42', 'detailed')).rejects.toBeInstanceOf(PersistenceError);
  });

  it('falls back to the last persisted value when a read fails', async () => {
    const get = vi.fn(async (): Promise<ReturnType<typeof row> | undefined> => row('42', 'ru', 'detailed'));
    const db = mockDb({ get });
    const store = new PostgresPreferenceStore(db, defaults);
    await store.setLanguage('42', 'ru');

    get.mockRejectedValueOnce(new Error('timeout'));
    expect(await store.getOrDefault('42')).toMatchObject({ language: 'ru', viewMode: 'detailed' });
  });

  it('falls back to the configured default when nothing was ever read', async () => {
    const db = mockDb({
      run: vi.fn(async () => {
        throw new Error('timeout');
      }),
    });
    const store = new PostgresPreferenceStore(db, defaults);

    expect(await store.getOrDefault('ru-chat')).toMatchObject({ language: 'ru', viewMode: 'detailed' });
  });

  it('keeps the cache at the last persisted value after a failed write', async () => {
    const get = vi.fn(async (): Promise<ReturnType<typeof row> | undefined> => row('42', 'en', 'compact'));
    const db = mockDb({ get });
    const store = new PostgresPreferenceStore(db, defaults);
    await store.getOrDefault('42');

    get.mockRejectedValueOnce(new Error('disk full'));
    await expect(store.setLanguage('42', 'ru')).rejects.toBeInstanceOf(PersistenceError);

    get.mockRejectedValueOnce(new Error('still down'));
    expect(await store.getOrDefault('42')).toMatchObject({ language: 'en' });
  });

  it('serializes writes for the same recipient', async () => {
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const get = vi
      .fn()
      .mockImplementationOnce(async () => {
        order.push('language:start');
        await gate;
        order.push('language:end');
        return row('42', 'ru', 'compact');
      })
      .mockImplementationOnce(async () => {
        order.push('view');
        return row('42', 'ru', 'detailed');
      });
    const store = new PostgresPreferenceStore(mockDb({ get }), defaults);

    const language = store.setLanguage('42', 'ru');
    const view = store.setViewMode('42', 'detailed');
    await new Promise((resolve) => setImmediate(resolve));
    expect(order).toEqual(['language:start']);

    release();
    await Promise.all([language, view]);
    expect(order).toEqual(['language:start', 'language:end', 'view']);
  });

  it('coerces unsupported stored values to the defaults', async () => {
    const db = mockDb({ get: vi.fn(async () => row('ru-chat', 'xx', 'huge')) });
    const store = new PostgresPreferenceStore(db, defaults);
    expect(await store.getOrDefault('ru-chat')).toMatchObject({ language: 'ru', viewMode: 'detailed' });
  });
});
