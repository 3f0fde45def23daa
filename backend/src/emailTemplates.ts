import type { TradeSetup } from './types.js';

export const APP_NAME = process.env.APP_NAME || 'Confluence Scanner';

export function subjectFor(setup: TradeSetup) {
  return `${setup.direction} ${setup.symbol} - score ${setup.score.toFixed(1)} @ ${fmtPrice(setup.entryPlan[0])}`;
}

function detailRows(setup: TradeSetup): Array<[string, string]> {
  const tfs = Object.entries(setup.timeframeConfluence).map(([tf, d]) => `${tf} ${d}`).join(', ');
  return [
    ['Symbol', setup.symbol],
    ['Exchange', setup.exchange],
    ['Direction', setup.direction],
    ['Score', `${setup.score.toFixed(1)}/100`],
    ['Confidence', `${(setup.confidence * 100).toFixed(0)}%`],
    ['Entry', setup.entryPlan.map(fmtPrice).join(' / ')],
    ['Stop loss', fmtPrice(setup.stopLoss)],
    ['Targets', setup.takeProfits.map(fmtPrice).join(' / ')],
    ['R:R', setup.riskRewardRatio.toFixed(2)],
    ['Timeframes', tfs || '-'],
  ];
}

export function htmlFor(setup: TradeSetup, when = new Date()) {
  const table = detailRows(setup).map(([k, v]) => `
    <tr><td style="padding:6px 10px;color:#666;">${escapeHtml(k)}</td>
    <td style="padding:6px 10px;font-weight:600;color:#111;">${escapeHtml(v)}</td></tr>
  `).join('');
  const reasons = setup.reasons.map((r) => `<li>${escapeHtml(r)}</li>`).join('');
  const accent = setup.direction === 'LONG' ? '#166534' : '#991b1b';

  return `
  <div style="font-family:Inter,Segoe UI,Arial,sans-serif;max-width:560px;margin:auto;border:1px solid #eee;border-radius:12px;overflow:hidden">
    <div style="background:#111;color:#fff;padding:14px 16px;font-size:16px"><strong>${escapeHtml(APP_NAME)}</strong></div>
    <div style="padding:16px">
      <h2 style="margin:0 0 8px 0;font-size:18px;color:${accent}">${setup.direction}: ${escapeHtml(setup.symbol)}</h2>
      <p style="margin:0 0 12px 0;color:#333">Found at ${escapeHtml(when.toISOString())}. This email is informational, not financial advice.</p>
      <table style="border-collapse:collapse;width:100%;font-size:14px">${table}</table>
      <ul style="margin:12px 0 0 0;padding-left:18px;font-size:13px;color:#333">${reasons}</ul>
    </div>
    <div style="background:#fafafa;color:#888;padding:10px 16px;font-size:12px">You are receiving this because you enabled email alerts.</div>
  </div>`;
}

export function textFor(setup: TradeSetup, when = new Date()) {
  return [
    `${APP_NAME} - ${setup.direction} ${setup.symbol}`,
    ...detailRows(setup).map(([k, v]) => `${k}: ${v}`),
    `When: ${when.toISOString()}`,
    '---',
    ...setup.reasons.map((r) => `- ${r}`),
  ].join('\n');
}

export function fmtPrice(v?: number) {
  if (v == null || Number.isNaN(v)) return '-';
  return v >= 100 ? v.toFixed(2) : v >= 1 ? v.toFixed(4) : v.toFixed(6);
}

export function escapeHtml(s: string) {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
