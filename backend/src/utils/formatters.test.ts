import { describe, expect, it } from 'vitest';
import { escapeHtml, formatPing, formatSpeed } from './formatters';

describe('formatters', () => {
  it('formats speeds in Mbps below a gigabit', () => {
    expect(formatSpeed(0)).toBe('0.00 Mbps');
    expect(formatSpeed(120.456)).toBe('120.46 Mbps');
    expect(formatSpeed(999.99)).toBe('999.99 Mbps');
  });

  it('switches to Gbps from 1000 Mbps', () => {
    expect(formatSpeed(1000)).toBe('1.00 Gbps');
    expect(formatSpeed(2500)).toBe('2.50 Gbps');
  });

  it('formats ping with two decimals', () => {
    expect(formatPing(7)).toBe('7.00 ms');
  });

  it('escapes HTML metacharacters', () => {
    expect(escapeHtml('<a href="x">R&D</a>')).toBe('&lt;a href=&quot;x&quot;&gt;R&amp;D&lt;/a&gt;');
    expect(escapeHtml('plain')).toBe('plain');
  });
});
