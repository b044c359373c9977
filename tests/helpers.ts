/* tests/helpers.ts */
import type { Clock, User } from '@erdbase/core';
import {
  AccountsService, LoggingNotifier, PasswordHasher, type Mail, type UserNotifier,
} from '@erdbase/accounts';
import { OrganizationsService } from '@erdbase/organizations';
import { ProjectsService } from '@erdbase/projects';
import { MemoryStore } from '@erdbase/store-memory';

export const PASSWORD = 'test-password-1';
export const PUBLIC_URL = 'http://app.test';
export const DAY_MS = 24 * 60 * 60 * 1000;

/** a clock tests move by hand */
export function fakeClock(start = '2024-03-01T10:00:00.000Z') {
  let t = new Date(start).getTime();
  const now: Clock = () => new Date(t);
  return {
    now,
    advance(ms: number) {
      t += ms;
    },
  };
}

/** keeps every mail; the link is the last thing before the footer */
export class RecordingNotifier implements UserNotifier {
  readonly mails: Mail[] = [];
  private inner = new LoggingNotifier({ info: () => undefined });

  private async keep(sent: Promise<Mail>): Promise<Mail> {
    const m = await sent;
    this.mails.push(m);
    return m;
  }

  deliverConfirmationInstructions(user: User, url: string) {
    return this.keep(this.inner.deliverConfirmationInstructions(user, url));
  }

  deliverUpdateEmailInstructions(user: User, url: string) {
    return this.keep(this.inner.deliverUpdateEmailInstructions(user, url));
  }

  deliverResetPasswordInstructions(user: User, url: string) {
    return this.keep(this.inner.deliverResetPasswordInstructions(user, url));
  }

  lastUrl(): string {
    const m = this.mails[this.mails.length - 1];
    const url = m?.body.match(/^https?:\/\/\S+$/m)?.[0];
    if (!url) throw new Error('no mail with a link was delivered');
    return url;
  }

  lastToken(): string {
    const url = this.lastUrl();
    return url.slice(url.lastIndexOf('/') + 1);
  }
}

export function registrationAttrs(overrides: Record<string, unknown> = {}) {
  return {
    name: 'Ada Lovelace',
    email: 'ada@example.com',
    avatar: 'https://img.example.com/ada.png',
    password: PASSWORD,
    ...overrides,
  };
}

export function setupServices() {
  const clock = fakeClock();
  const store = new MemoryStore();
  const notifier = new RecordingNotifier();
  const passwords = new PasswordHasher(4);
  const organizations = new OrganizationsService(store, clock.now);
  const accounts = new AccountsService({
    store,
    passwords,
    notifier,
    organizations,
    config: { publicUrl: PUBLIC_URL, sessionDays: 60 },
    now: clock.now,
  });
  const projects = new ProjectsService(store, organizations, clock.now);
  return { clock, store, notifier, passwords, organizations, accounts, projects };
}

/** the error a sync call throws */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected an error');
}
