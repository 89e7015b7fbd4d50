import { t } from '../i18n';
import { LANGUAGES, VIEW_MODES, type Language, type RecipientPref, type ViewMode } from '../types/preferences';
import type { AggregatedView, NodeView, Tier } from '../types/report';
import { escapeHtml, formatPing, formatSpeed } from '../utils/formatters';
import { encodePreferenceAction } from './preferenceActions';

/**
 * Digest renderer
 *
 * Pure: output depends only on the view, language and view mode. Capture
 * ages are measured against view.generatedAt, never the wall clock, so the
 * same inputs always produce the same bytes. Language swaps phrases only.
 */

export const TIER_GLYPHS: Record<Tier, string> = {
  very_low: '🚨❌',
  low: '⚠️🐌',
  medium: '✅🚗',
  good: '👍🛜',
  excellent: '🚀⚡',
};

const OFFLINE_GLYPH = '🔴';
const ERROR_GLYPH = '❌';
const DIVIDER = '———';

export interface InlineButton {
  text: string;
  callbackData: string;
}

export interface RenderedMessage {
  text: string;
  keyboard?: InlineButton[][];
}

function nodeTitle(node: NodeView): string {
  return `${escapeHtml(node.meta.flag)} ${escapeHtml(node.meta.displayName)}`;
}

function tierText(tier: Tier, language: string): string {
  return `${TIER_GLYPHS[tier]} ${t(language, `tier_${tier}`)}`;
}

function ageText(minutes: number, language: string): string {
  return minutes === 0 ? t(language, 'just_now') : t(language, 'last_seen', { minutes });
}

function renderCompactNode(node: NodeView, language: string): string {
  const { report, tier } = node;
  if (!report && node.error !== undefined) {
    return `${nodeTitle(node)} — ${ERROR_GLYPH} ${t(language, 'error_detail', { error: escapeHtml(node.error) })}`;
  }
  if (node.freshness !== 'fresh' || !report || !tier) {
    return `${nodeTitle(node)} — ${OFFLINE_GLYPH} ${t(language, 'no_data')}`;
  }

  const dl = report.downloadMbps.toFixed(0);
  const ul = report.uploadMbps.toFixed(0);
  const ping = report.pingMs.toFixed(1);
  return `${nodeTitle(node)} — ⬇️ ${dl} / ⬆️ ${ul} Mbps · 📡 ${ping} ms — ${tierText(tier, language)}`;
}

function renderDetailedNode(node: NodeView, language: string): string[] {
  const lines = [`<b>${nodeTitle(node)}</b>`];
  const { report, tier } = node;

  if (!report && node.error !== undefined) {
    lines.push(`${ERROR_GLYPH} <b>${t(language, 'error')}</b>: ${escapeHtml(node.error)}`);
    if (node.meta.location) lines.push(`📍 ${t(language, 'location')}: ${escapeHtml(node.meta.location)}`);
    if (node.meta.description) lines.push(`📝 ${escapeHtml(node.meta.description)}`);
    return lines;
  }
  if (!report) {
    lines.push(`${OFFLINE_GLYPH} ${t(language, 'no_data')}`);
    return lines;
  }
  if (node.freshness !== 'fresh' || !tier) {
    lines.push(`${OFFLINE_GLYPH} ${t(language, 'stale')}, ${ageText(node.ageMinutes ?? 0, language)}`);
    return lines;
  }

  lines.push(
    `⬇️ ${t(language, 'download')}: ${formatSpeed(report.downloadMbps)}`,
    `⬆️ ${t(language, 'upload')}: ${formatSpeed(report.uploadMbps)}`,
    `📡 ${t(language, 'ping')}: ${formatPing(report.pingMs)}`,
    `📈 ${t(language, 'status')}: ${tierText(tier, language)}`
  );

  const extras: Array<[string, string | undefined]> = [
    [`🌐 ${t(language, 'test_server')}`, report.testServer],
    [`🏢 ${t(language, 'isp')}`, report.isp],
    [`📍 ${t(language, 'location')}`, report.location],
    [`💻 ${t(language, 'os')}`, report.osInfo],
  ];
  for (const [label, value] of extras) {
    if (value) lines.push(`${label}: ${escapeHtml(value)}`);
  }
  if (report.description) {
    lines.push(`📝 ${escapeHtml(report.description)}`);
  }

  lines.push(`🕐 ${ageText(node.ageMinutes ?? 0, language)}`);
  return lines;
}

function renderBanner(view: AggregatedView, language: string): string {
  const glyph = view.clusterStatus === 'ok' ? '✅' : '⚠️';
  const label = t(language, view.clusterStatus === 'ok' ? 'cluster_ok' : 'cluster_degraded');
  return `${glyph} ${label} (${t(language, 'summary', view.summary)})`;
}

export function renderCompact(view: AggregatedView, language: string): string {
  const lines = [`<b>${t(language, 'report_title')}</b>`, ''];
  if (view.nodes.length === 0) {
    lines.push(`${OFFLINE_GLYPH} ${t(language, 'no_data')}`);
  }
  for (const node of view.nodes) {
    lines.push(renderCompactNode(node, language));
  }
  return lines.join('\n');
}

export function renderDetailed(view: AggregatedView, language: string): string {
  const lines = [`<b>${t(language, 'report_title')}</b>`, renderBanner(view, language), ''];
  if (view.nodes.length === 0) {
    lines.push(`${OFFLINE_GLYPH} ${t(language, 'no_data')}`);
  }
  view.nodes.forEach((node, index) => {
    if (index > 0) {
      lines.push('', DIVIDER, '');
    }
    lines.push(...renderDetailedNode(node, language));
  });
  return lines.join('\n');
}

export function renderDigest(view: AggregatedView, language: string, viewMode: ViewMode): string {
  return viewMode === 'detailed' ? renderDetailed(view, language) : renderCompact(view, language);
}

function viewModeLabel(mode: ViewMode, language: Language): string {
  return t(language, mode === 'detailed' ? 'view_detailed' : 'view_compact');
}

function mark(label: string, selected: boolean): string {
  return selected ? `• ${label}` : label;
}

/**
 * Settings message with one keyboard row for language and one for view mode
 */
export function renderSettingsPrompt(pref: RecipientPref): RenderedMessage {
  const { language, viewMode } = pref;
  const text = [
    `<b>${t(language, 'settings_title')}</b>`,
    `${t(language, 'settings_language')}: ${t(language, 'language_name')}`,
    `${t(language, 'settings_view')}: ${viewModeLabel(viewMode, language)}`,
  ].join('\n');

  const keyboard: InlineButton[][] = [
    LANGUAGES.map((code) => ({
      text: mark(t(code, 'language_name'), code === language),
      callbackData: encodePreferenceAction({ kind: 'language', language: code }),
    })),
    VIEW_MODES.map((mode) => ({
      text: mark(viewModeLabel(mode, language), mode === viewMode),
      callbackData: encodePreferenceAction({ kind: 'viewMode', viewMode: mode }),
    })),
  ];

  return { text, keyboard };
}

export type PreferenceOutcome = 'saved' | 'failed' | 'unknown';

const ACK_KEYS = {
  saved: 'pref_saved',
  failed: 'pref_failed',
  unknown: 'pref_unknown',
} as const;

/** Short text shown in the callback answer popup */
export function renderPreferenceAck(language: string, outcome: PreferenceOutcome): string {
  return t(language, ACK_KEYS[outcome]);
}
