import nodemailer, { type SendMailOptions } from 'nodemailer';
import { APP_NAME } from './emailTemplates.js';

export type MailConfig = {
  enabled: boolean;
  host: string | null;
  port: number;
  secure: boolean;
  user: string | null;
  pass: string;
  fromName: string;
  fromAddress: string;
};

export type MailPayload = {
  to: string | string[];
  subject: string;
  html: string;
  text?: string;
};

export type MailResult = { ok: true; messageId: string } | { ok: false; reason: 'EMAIL_DISABLED' | 'NO_TRANSPORT' };

export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<{ messageId: string }>;
}

export interface Mailer {
  readonly enabled: boolean;
  send(payload: MailPayload): Promise<MailResult>;
}

export function mailConfigFromEnv(env: Record<string, string | undefined> = process.env): MailConfig {
  const user = env.SMTP_USER?.trim() || null;
  return {
    enabled: (env.EMAIL_ENABLED || 'false').toLowerCase() === 'true',
    host: env.SMTP_HOST?.trim() || null,
    port: Number(env.SMTP_PORT || 587),
    secure: (env.SMTP_SECURE || 'false').toLowerCase() === 'true',
    user,
    pass: env.SMTP_PASS || '',
    fromName: env.EMAIL_FROM_NAME || APP_NAME,
    fromAddress: env.EMAIL_FROM_ADDRESS || user || 'no-reply@localhost',
  };
}

function smtpTransport(config: MailConfig): MailTransport | null {
  if (!config.host) return null;
  return nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.secure,
    auth: config.user ? { user: config.user, pass: config.pass } : undefined,
  });
}

/** `transport` replaces the SMTP transport built from `config`. */
export function createMailer(config: MailConfig, transport: MailTransport | null = smtpTransport(config)): Mailer {
  const from = `"${config.fromName}" <${config.fromAddress}>`;
  return {
    enabled: config.enabled,
    async send(payload) {
      if (!config.enabled) return { ok: false, reason: 'EMAIL_DISABLED' };
      if (!transport) return { ok: false, reason: 'NO_TRANSPORT' };
      const info = await transport.sendMail({
        from,
        to: Array.isArray(payload.to) ? payload.to.join(',') : payload.to,
        subject: payload.subject,
        text: payload.text,
        html: payload.html,
      });
      return { ok: true, messageId: info.messageId };
    },
  };
}

let mailer: Mailer | null = null;

function defaultMailer() {
  if (!mailer) mailer = createMailer(mailConfigFromEnv());
  return mailer;
}

export function sendMail(payload: MailPayload): Promise<MailResult> {
  return defaultMailer().send(payload);
}

export function isEmailEnabled() {
  return defaultMailer().enabled;
}
