/**
 * Display helpers shared by the renderer and the node runtime.
 */

export function formatSpeed(speedMbps: number): string {
  if (speedMbps >= 1000) {
    return `${(speedMbps / 1000).toFixed(2)} Gbps`;
  }
  return `${speedMbps.toFixed(2)} Mbps`;
}

export function formatPing(pingMs: number): string {
  return `${pingMs.toFixed(2)} ms`;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
};

/** Escape text for Telegram's HTML parse mode */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"]/g, (char) => HTML_ESCAPES[char] ?? char);
}
