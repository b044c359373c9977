// packages/accounts/src/notifier.ts
import type { User } from '@erdbase/core';

export interface Mail {
  to: string;
  subject: string;
  body: string;
}

/** pino-compatible subset, so the Fastify logger fits */
export interface MailLogger {
  info(obj: object, msg?: string): void;
}

export interface UserNotifier {
  deliverConfirmationInstructions(user: User, url: string): Promise<Mail>;
  /** `user` carries the new, not yet saved, email */
  deliverUpdateEmailInstructions(user: User, url: string): Promise<Mail>;
  deliverResetPasswordInstructions(user: User, url: string): Promise<Mail>;
}

function mail(user: User, subject: string, action: string, url: string): Mail {
  return {
    to: user.email,
    subject,
    body: [
      `Hi ${user.name},`,
      '',
      `You can ${action} by visiting the URL below:`,
      '',
      url,
      '',
      "If you didn't request this, please ignore this.",
    ].join('\n'),
  };
}

/** no mail provider is wired in; mails end up in the log */
export class LoggingNotifier implements UserNotifier {
  constructor(private log: MailLogger) {}

  private async deliver(m: Mail): Promise<Mail> {
    this.log.info({ mail: { to: m.to, subject: m.subject }, body: m.body }, 'mail-delivered');
    return m;
  }

  deliverConfirmationInstructions(user: User, url: string) {
    return this.deliver(mail(user, 'Confirmation instructions', 'confirm your account', url));
  }

  deliverUpdateEmailInstructions(user: User, url: string) {
    return this.deliver(mail(user, 'Update email instructions', 'change your email', url));
  }

  deliverResetPasswordInstructions(user: User, url: string) {
    return this.deliver(mail(user, 'Reset password instructions', 'reset your password', url));
  }
}
