/**
 * Mailer Interface
 *
 * Outgoing mail used by the signup flow. Sending happens off the request path,
 * so implementations may be slow; callers never await them before responding.
 */
export interface ConfirmationEmail {
  to: string;
  username: string;
  confirmationUrl: string;
}

export interface IMailer {
  sendConfirmationEmail(message: ConfirmationEmail): Promise<void>;
}
