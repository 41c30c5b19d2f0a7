/**
 * SMTP Mailer Adapter
 *
 * Sends the signup confirmation email through nodemailer.
 * Port 465 uses implicit TLS, any other port upgrades with STARTTLS.
 */

import nodemailer, { Transporter } from 'nodemailer';
import { env } from '@/config/env';
import { ConfirmationEmail, IMailer } from '@/interfaces/IMailer';
import { createLogger } from '@/adapters/logging/LoggerFactory';

const logger = createLogger('SmtpMailer');

export interface SmtpMailerConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  from: string;
}

export function smtpConfigFromEnv(): SmtpMailerConfig {
  return {
    host: env.MAIL_SERVER,
    port: env.MAIL_PORT,
    username: env.MAIL_USERNAME,
    password: env.MAIL_PASSWORD,
    from: env.MAIL_FROM,
  };
}

export function renderConfirmationEmail(message: ConfirmationEmail): { text: string; html: string } {
  const text = [
    `Hi ${message.username},`,
    '',
    'Thanks for signing up. Confirm your email address by opening the link below:',
    message.confirmationUrl,
    '',
    'The link is valid for 7 days.',
  ].join('\n');

  const html = `<p>Hi ${message.username},</p>
<p>Thanks for signing up. Confirm your email address by opening the link below:</p>
<p><a href="${message.confirmationUrl}">Confirm email</a></p>
<p>The link is valid for 7 days.</p>`;

  return { text, html };
}

export class SmtpMailer implements IMailer {
  private readonly transporter: Transporter;

  constructor(private readonly config: SmtpMailerConfig = smtpConfigFromEnv()) {
    this.transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.port === 465,
      auth: config.username ? { user: config.username, pass: config.password } : undefined,
    });
  }

  async sendConfirmationEmail(message: ConfirmationEmail): Promise<void> {
    const { text, html } = renderConfirmationEmail(message);

    await this.transporter.sendMail({
      from: this.config.from,
      to: message.to,
      subject: 'Confirm your email',
      text,
      html,
    });

    logger.info({ to: message.to }, 'Confirmation email sent');
  }
}
