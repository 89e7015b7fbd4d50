import en from './en.json';
import ru from './ru.json';
import { DEFAULT_LANGUAGE, isLanguage, type Language } from '../types/preferences';

export type PhraseKey = keyof typeof en;
type PhraseTable = Record<PhraseKey, string>;

// ru.json must carry every key en.json has
const TABLES: Record<Language, PhraseTable> = { en, ru };

export function resolveLanguage(language: string): Language {
  return isLanguage(language) ? language : DEFAULT_LANGUAGE;
}

/**
 * Look up a phrase and fill {placeholders}. Unsupported languages use the default table.
 */
export function t(language: string, key: PhraseKey, params: Record<string, string | number> = {}): string {
  const phrase = TABLES[resolveLanguage(language)][key];
  return phrase.replace(/\{(\w+)\}/g, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(params, name) ? String(params[name]) : match
  );
}
