/**
 * src/shared/email/email-sender.ts
 *
 * WHY:
 * - Decouples "the user needs a confirmation/reset link" from "here is how email is sent".
 * - Identity endpoints call the sender; the transport is chosen at service registration only.
 *
 * RULES:
 * - Message types are discriminated unions on the `type` field.
 * - Links and codes are allowed here (they are the payload). Never put password
 *   hashes or session ids in messages.
 */

export type EmailRecipient = {
  userId: string;
  email: string;
};

export type ConfirmationLinkEmail = EmailRecipient & {
  type: 'identity.confirmation-link';
  link: string;
};

export type PasswordResetLinkEmail = EmailRecipient & {
  type: 'identity.password-reset-link';
  link: string;
};

export type PasswordResetCodeEmail = EmailRecipient & {
  type: 'identity.password-reset-code';
  code: string;
};

export type EmailMessage = ConfirmationLinkEmail | PasswordResetLinkEmail | PasswordResetCodeEmail;

export interface EmailSender {
  sendConfirmationLink(to: EmailRecipient, link: string): Promise<void>;
  sendPasswordResetLink(to: EmailRecipient, link: string): Promise<void>;
  sendPasswordResetCode(to: EmailRecipient, code: string): Promise<void>;
}
