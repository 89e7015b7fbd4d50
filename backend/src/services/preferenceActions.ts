import { isLanguage, isViewMode, type Language, type ViewMode } from '../types/preferences';

/**
 * Callback payloads carried by the settings keyboard buttons.
 * Telegram caps callback_data at 64 bytes; these stay well under.
 */
export type PreferenceAction =
  | { kind: 'language'; language: Language }
  | { kind: 'viewMode'; viewMode: ViewMode };

const PREFIX = 'pref';

export function encodePreferenceAction(action: PreferenceAction): string {
  return action.kind === 'language'
    ? `${PREFIX}:lang:${action.language}`
    : `${PREFIX}:view:${action.viewMode}`;
}

/** Returns null for anything that is not a well-formed preference payload */
export function parsePreferenceAction(data: string): PreferenceAction | null {
  const [prefix, field, value] = data.split(':');
  if (prefix !== PREFIX || value === undefined) return null;
  if (field === 'lang' && isLanguage(value)) return { kind: 'language', language: value };
  if (field === 'view' && isViewMode(value)) return { kind: 'viewMode', viewMode: value };
  return null;
}
