/**
 * No-Op Mailer Adapter
 *
 * Logs the confirmation link instead of sending it (MAILER_TYPE=noop).
 * Lets a local setup confirm accounts without an SMTP server.
 */

import { ConfirmationEmail, IMailer } from '@/interfaces/IMailer';
import { createLogger } from '@/adapters/logging/LoggerFactory';

const logger = createLogger('NoOpMailer');

export class NoOpMailer implements IMailer {
  async sendConfirmationEmail(message: ConfirmationEmail): Promise<void> {
    logger.info(
      { to: message.to, confirmationUrl: message.confirmationUrl },
      'Confirmation email not sent (noop mailer)'
    );
  }
}
