import { describe, expect, it } from 'vitest';
import { APP_NAME, escapeHtml, fmtPrice, htmlFor, subjectFor, textFor } from '../backend/src/emailTemplates.js';
import { makeSetup } from './helpers/setups.js';

const WHEN = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

describe('email templates', () => {
  it('puts direction, symbol, score and entry in the subject', () => {
    expect(subjectFor(makeSetup())).toBe('LONG BTCUSDT - score 75.0 @ 100.00');
  });

  it('formats prices by magnitude', () => {
    expect(fmtPrice(65000)).toBe('65000.00');
    expect(fmtPrice(2)).toBe('2.0000');
    expect(fmtPrice(0.5)).toBe('0.500000');
    expect(fmtPrice(undefined)).toBe('-');
  });

  it('escapes markup', () => {
    expect(escapeHtml(`<a href="x">&'`)).toBe('&lt;a href=&quot;x&quot;&gt;&amp;&#39;');
    const html = htmlFor(makeSetup({ reasons: ['<script>'] }), WHEN);
    expect(html).toContain('<li>&lt;script&gt;</li>');
    expect(html).toContain('Found at 2024-01-02T03:04:05.000Z.');
  });

  it('renders a plain-text body', () => {
    const lines = textFor(makeSetup(), WHEN).split('\n');
    expect(lines[0]).toBe(`${APP_NAME} - LONG BTCUSDT`);
    expect(lines).toContain('Entry: 100.00 / 98.5000');
    expect(lines).toContain('Timeframes: 15m LONG, 1h LONG, 4h NEUTRAL');
    expect(lines).toContain('R:R: 1.50');
    expect(lines.slice(-2)).toEqual(['- Multi-timeframe alignment: 15m, 1h (2/3)', '- High composite score 75.0/100']);
  });
});
