import nodemailer, { type SendMailOptions } from 'nodemailer';
import { describe, expect, it } from 'vitest';
import { createMailer, mailConfigFromEnv, type MailConfig, type MailTransport } from '../backend/src/mailer.js';

const CONFIG: MailConfig = {
  enabled: true,
  host: 'smtp.example.com',
  port: 587,
  secure: false,
  user: 'alerts@example.com',
  pass: 'test-secret',
  fromName: 'Scanner',
  fromAddress: 'alerts@example.com',
};

describe('mailer', () => {
  it('reads SMTP settings from env', () => {
    expect(mailConfigFromEnv({ EMAIL_ENABLED: 'TRUE', SMTP_HOST: ' smtp.example.com ', SMTP_USER: 'me@example.com' })).toMatchObject({
      enabled: true,
      host: 'smtp.example.com',
      port: 587,
      secure: false,
      fromAddress: 'me@example.com',
    });
    expect(mailConfigFromEnv({})).toMatchObject({ enabled: false, host: null, fromAddress: 'no-reply@localhost' });
  });

  it('refuses to send when disabled or without a transport', async () => {
    const payload = { to: 'ops@example.com', subject: 's', html: '<p>h</p>' };
    await expect(createMailer({ ...CONFIG, enabled: false }).send(payload)).resolves.toEqual({ ok: false, reason: 'EMAIL_DISABLED' });
    await expect(createMailer({ ...CONFIG, host: null }).send(payload)).resolves.toEqual({ ok: false, reason: 'NO_TRANSPORT' });
  });

  it('hands the transport one message for every recipient', async () => {
    const seen: SendMailOptions[] = [];
    const json = nodemailer.createTransport({ jsonTransport: true });
    const transport: MailTransport = {
      async sendMail(options) {
        seen.push(options);
        return json.sendMail(options);
      },
    };

    const res = await createMailer(CONFIG, transport).send({
      to: ['a@example.com', 'b@example.com'],
      subject: 'LONG BTCUSDT',
      html: '<p>hi</p>',
      text: 'hi',
    });

    expect(res).toEqual({ ok: true, messageId: expect.any(String) });
    expect(seen).toEqual([{
      from: '"Scanner" <alerts@example.com>',
      to: 'a@example.com,b@example.com',
      subject: 'LONG BTCUSDT',
      text: 'hi',
      html: '<p>hi</p>',
    }]);
  });
});
