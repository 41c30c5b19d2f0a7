/**
 * Mailer Factory
 *
 * Selection Logic:
 * - MAILER_TYPE=smtp → SmtpMailer
 * - MAILER_TYPE=noop or unset → NoOpMailer (default, development)
 */

import { IMailer } from '@/interfaces/IMailer';
import { SmtpMailer } from './SmtpMailer';
import { NoOpMailer } from './NoOpMailer';

export function createMailer(mailerType: string = process.env.MAILER_TYPE || 'noop'): IMailer {
  switch (mailerType.toLowerCase()) {
    case 'smtp':
      return new SmtpMailer();

    case 'noop':
    default:
      return new NoOpMailer();
  }
}
