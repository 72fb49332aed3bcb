/**
 * src/shared/email/inmem-email-sender.ts
 *
 * WHY:
 * - Tests need to inspect what the identity flows sent without a mail server.
 * - drain() is the test contract: call it after the HTTP request completes
 *   to get all captured messages, then assert on their contents.
 *
 * RULES:
 * - drain() is only used by test helpers; production code never calls it.
 */

import type { EmailMessage, EmailRecipient, EmailSender } from './email-sender';

export class InMemEmailSender implements EmailSender {
  private readonly messages: EmailMessage[] = [];

  sendConfirmationLink(to: EmailRecipient, link: string): Promise<void> {
    this.messages.push({ type: 'identity.confirmation-link', ...to, link });
    return Promise.resolve();
  }

  sendPasswordResetLink(to: EmailRecipient, link: string): Promise<void> {
    this.messages.push({ type: 'identity.password-reset-link', ...to, link });
    return Promise.resolve();
  }

  sendPasswordResetCode(to: EmailRecipient, code: string): Promise<void> {
    this.messages.push({ type: 'identity.password-reset-code', ...to, code });
    return Promise.resolve();
  }

  /** Returns all captured messages and clears the outbox. */
  drain(): EmailMessage[] {
    return this.messages.splice(0, this.messages.length);
  }

  /** Most recent message of a type, without clearing the outbox. */
  last<T extends EmailMessage['type']>(type: T): Extract<EmailMessage, { type: T }> | undefined {
    for (let i = this.messages.length - 1; i >= 0; i--) {
      const m = this.messages[i];
      if (m && isType(m, type)) return m;
    }
    return undefined;
  }
}

function isType<T extends EmailMessage['type']>(
  m: EmailMessage,
  type: T,
): m is Extract<EmailMessage, { type: T }> {
  return m.type === type;
}
