import type { DbConn } from './db/db.js';
import { canSendEmail, markEmailSent } from './db/emailGuards.js';
import { htmlFor, subjectFor, textFor } from './emailTemplates.js';
import { isEmailEnabled, sendMail } from './mailer.js';
import type { ScanResult, TradeSetup } from './types.js';

export type EmailOptions = {
  recipients: string[];
  minScore: number;
  cooldownMin: number;
  maxPerScan: number;
};

export function emailOptionsFromEnv(env: Record<string, string | undefined> = process.env): EmailOptions {
  return {
    recipients: (env.ALERT_EMAILS || '').split(',').map((s) => s.trim()).filter(Boolean),
    minScore: Number(env.EMAIL_MIN_SCORE || 70),
    cooldownMin: Number(env.EMAIL_COOLDOWN_MIN || 60),
    maxPerScan: Number(env.EMAIL_MAX_PER_SCAN || 3),
  };
}

// Used when no database is available
const memCooldown = new Map<string, number>();

export function cooldownKey(setup: TradeSetup) {
  return `${setup.symbol}|${setup.direction}`;
}

async function gate(db: DbConn | null, key: string, cooldownMin: number, now: number) {
  if (db) {
    try {
      return (await canSendEmail(db, key, cooldownMin, now)).allowed;
    } catch (e) {
      console.error('[email] db cooldown check failed; using memory cooldown', e);
    }
  }
  if (cooldownMin <= 0) return true;
  return now - (memCooldown.get(key) ?? 0) >= cooldownMin * 60_000;
}

async function mark(db: DbConn | null, key: string, now: number) {
  memCooldown.set(key, now);
  if (!db) return;
  try {
    await markEmailSent(db, key, now);
  } catch (e) {
    console.error('[email] db cooldown mark failed', e);
  }
}

/** Emails the ranked setups at or above `minScore`, one per symbol and direction per cooldown. */
export async function emailNotifySetups(
  db: DbConn | null,
  result: ScanResult,
  opts: EmailOptions = emailOptionsFromEnv(),
  now = Date.now(),
): Promise<TradeSetup[]> {
  if (!isEmailEnabled()) return [];
  if (opts.recipients.length === 0) {
    console.log('[email] skip: no recipients in ALERT_EMAILS');
    return [];
  }

  const sent: TradeSetup[] = [];
  for (const setup of result.setups) {
    if (sent.length >= opts.maxPerScan) break;
    if (setup.score < opts.minScore) continue;
    const key = cooldownKey(setup);
    if (!(await gate(db, key, opts.cooldownMin, now))) {
      console.log('[email] skip: cooldown active', { key });
      continue;
    }
    try {
      const when = new Date(now);
      const res = await sendMail({
        to: opts.recipients,
        subject: subjectFor(setup),
        html: htmlFor(setup, when),
        text: textFor(setup, when),
      });
      if (!res.ok) {
        console.log('[email] skip:', res.reason);
        break;
      }
      await mark(db, key, now);
      sent.push(setup);
      console.log('[email] sent', { key, messageId: res.messageId });
    } catch (e) {
      console.error('[email] sendMail error', e);
    }
  }
  return sent;
}

export function resetEmailCooldowns() {
  memCooldown.clear();
}
