import webpush from 'web-push';
import { ensureSchema, type DbConn } from './db/db.js';
import { fmtPrice } from './emailTemplates.js';
import type { ScanResult } from './types.js';

export type PushSubscriptionInput = {
  endpoint: string;
  keys: { p256dh: string; auth: string };
};

async function getKV(db: DbConn, key: string): Promise<string | null> {
  const row = await db.prepare('SELECT value FROM kv WHERE key = ?').get(key);
  return row ? String(row.value) : null;
}

async function setKV(db: DbConn, key: string, value: string) {
  await db.prepare('INSERT INTO kv(key, value) VALUES(?, ?) ON CONFLICT(key) DO UPDATE SET value=excluded.value').run(key, value);
}

/** Loads the VAPID pair from the kv table, generating and storing one on first use. */
export async function ensureVapid(db: DbConn) {
  await ensureSchema(db);
  let pub = await getKV(db, 'vapid_pub');
  let priv = await getKV(db, 'vapid_priv');
  if (!pub || !priv) {
    const keys = webpush.generateVAPIDKeys();
    await setKV(db, 'vapid_pub', keys.publicKey);
    await setKV(db, 'vapid_priv', keys.privateKey);
    pub = keys.publicKey;
    priv = keys.privateKey;
  }
  webpush.setVapidDetails(process.env.VAPID_SUBJECT || 'mailto:admin@example.com', pub, priv);
  return { publicKey: pub };
}

export async function saveSubscription(db: DbConn, sub: PushSubscriptionInput, now = Date.now()) {
  await ensureSchema(db);
  await db.prepare(`
    INSERT INTO push_subscriptions (endpoint, keys_p256dh, keys_auth, created_at)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(endpoint) DO UPDATE SET keys_p256dh=excluded.keys_p256dh, keys_auth=excluded.keys_auth
  `).run(sub.endpoint, sub.keys.p256dh, sub.keys.auth, now);
}

export async function removeSubscription(db: DbConn, endpoint: string) {
  await ensureSchema(db);
  return (await db.prepare('DELETE FROM push_subscriptions WHERE endpoint = ?').run(endpoint)).changes > 0;
}

export function pushPayloadFor(result: ScanResult, limit = 3) {
  const top = result.setups.slice(0, limit);
  return {
    title: `${result.totalSetupsFound} setup(s) on ${result.exchange}`,
    body: top.length
      ? top.map((s) => `${s.direction} ${s.symbol} ${s.score.toFixed(0)} @ ${fmtPrice(s.entryPlan[0])}`).join('\n')
      : 'No setups above the score threshold',
    scanId: result.scanId,
  };
}

export async function pushToAll(db: DbConn, payload: Record<string, unknown>) {
  await ensureSchema(db);
  const rows = await db.prepare('SELECT endpoint, keys_p256dh, keys_auth FROM push_subscriptions').all();
  let delivered = 0;
  await Promise.all(rows.map(async (r) => {
    const endpoint = String(r.endpoint);
    try {
      await webpush.sendNotification(
        { endpoint, keys: { p256dh: String(r.keys_p256dh), auth: String(r.keys_auth) } },
        JSON.stringify(payload),
      );
      delivered++;
    } catch (e) {
      // Gone subscriptions are removed
      if (e instanceof webpush.WebPushError && (e.statusCode === 404 || e.statusCode === 410)) {
        await removeSubscription(db, endpoint);
        console.log('[push] removed expired subscription');
      } else {
        console.error('[push] send failed', e);
      }
    }
  }));
  return delivered;
}
