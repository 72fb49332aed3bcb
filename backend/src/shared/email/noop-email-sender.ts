/**
 * src/shared/email/noop-email-sender.ts
 *
 * WHY:
 * - The starter ships without an email transport. Sending is a no-op so the
 *   identity flows still run end to end.
 * - While this sender is registered, the account endpoints return the
 *   confirmation link in their response (see account.controller.ts).
 *
 * RULES:
 * - Logs the message type at debug level only. Links and codes are not logged.
 */

import type { EmailRecipient, EmailSender } from './email-sender';
import type { Logger } from '../logger/logger';

export class NoOpEmailSender implements EmailSender {
  constructor(private readonly logger: Logger) {}

  sendConfirmationLink(to: EmailRecipient, _link: string): Promise<void> {
    this.logger.debug('email.noop', { type: 'identity.confirmation-link', userId: to.userId });
    return Promise.resolve();
  }

  sendPasswordResetLink(to: EmailRecipient, _link: string): Promise<void> {
    this.logger.debug('email.noop', { type: 'identity.password-reset-link', userId: to.userId });
    return Promise.resolve();
  }

  sendPasswordResetCode(to: EmailRecipient, _code: string): Promise<void> {
    this.logger.debug('email.noop', { type: 'identity.password-reset-code', userId: to.userId });
    return Promise.resolve();
  }
}
