export const LANGUAGES = ['en', 'ru'] as const;
export type Language = (typeof LANGUAGES)[number];

export const VIEW_MODES = ['compact', 'detailed'] as const;
export type ViewMode = (typeof VIEW_MODES)[number];

export const DEFAULT_LANGUAGE: Language = 'en';
export const DEFAULT_VIEW_MODE: ViewMode = 'compact';

export interface RecipientPref {
  recipientId: string;
  language: Language;
  viewMode: ViewMode;
  createdAt: Date;
  updatedAt: Date;
}

export interface PrefDefaults {
  language: Language;
  viewMode: ViewMode;
}

const LANGUAGE_SET: ReadonlySet<string> = new Set(LANGUAGES);
const VIEW_MODE_SET: ReadonlySet<string> = new Set(VIEW_MODES);

export function isLanguage(value: unknown): value is Language {
  return typeof value === 'string' && LANGUAGE_SET.has(value);
}

export function isViewMode(value: unknown): value is ViewMode {
  return typeof value === 'string' && VIEW_MODE_SET.has(value);
}
