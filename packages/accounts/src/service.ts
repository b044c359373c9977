// packages/accounts/src/service.ts
import { randomUUID } from 'node:crypto';
import type { AuthProvider, Clock, FieldErrors, Store, User, UserPatch } from '@erdbase/core';
import { Errors, addError, hasErrors, parseAttrs, uniqueSlug } from '@erdbase/core';
import type { OrganizationsService } from '@erdbase/organizations';
import type { Mail, UserNotifier } from './notifier';
import type { PasswordHasher } from './password';
import { buildToken, changeContext, digest, isExpired, type TokenValidity } from './tokens';
import {
  ProfilePatchSchema, asAttrs, confirmation, emailChange, githubRegistration, herokuRegistration,
  passwordChange, passwordRegistration, validPassword, validateCurrentPassword,
  type RegistrationFields, type UserRules,
} from './user';

export interface AccountsConfig {
  /** base of the links put in mails */
  publicUrl: string;
  sessionDays: number;
}

export interface AccountsDeps {
  store: Store;
  passwords: PasswordHasher;
  notifier: UserNotifier;
  organizations: OrganizationsService;
  config: AccountsConfig;
  now?: Clock;
}

export interface Session {
  user: User;
  token: string;
}

const SEARCH_LIMIT_MAX = 100;

/** a provider sign-in only reuses an account that provider created */
function sameIdentity(existing: User, fields: RegistrationFields): boolean {
  if (existing.provider !== fields.provider) return false;
  if (existing.providerUid === null || fields.providerUid === null) return true;
  return existing.providerUid === fields.providerUid;
}

export class AccountsService {
  private store: Store;
  private passwords: PasswordHasher;
  private notifier: UserNotifier;
  private organizations: OrganizationsService;
  private config: AccountsConfig;
  private now: Clock;

  constructor(deps: AccountsDeps) {
    this.store = deps.store;
    this.passwords = deps.passwords;
    this.notifier = deps.notifier;
    this.organizations = deps.organizations;
    this.config = deps.config;
    this.now = deps.now ?? (() => new Date());
  }

  private get rules(): UserRules {
    return {
      passwords: this.passwords,
      emailTaken: async (email) => (await this.store.findUserByEmail(email)) !== undefined,
    };
  }

  private get validity(): TokenValidity {
    return { sessionDays: this.config.sessionDays };
  }

  private url(path: string): string {
    return `${this.config.publicUrl.replace(/\/+$/, '')}${path}`;
  }

  private async insertUser(fields: RegistrationFields, confirmedAt: Date | null): Promise<User> {
    const now = this.now();
    const user = await this.store.insertUser({
      id: randomUUID(),
      slug: await uniqueSlug(fields.slug, (s) => this.store.userSlugExists(s)),
      name: fields.name,
      email: fields.email,
      provider: fields.provider,
      providerUid: fields.providerUid,
      avatar: fields.avatar,
      company: fields.company,
      location: fields.location,
      description: fields.description,
      githubUsername: fields.githubUsername,
      twitterUsername: fields.twitterUsername,
      isAdmin: false,
      hashedPassword: fields.hashedPassword,
      lastSignin: fields.lastSignin,
      createdAt: now,
      updatedAt: now,
      confirmedAt,
      deletedAt: null,
    });
    await this.organizations.createPersonal(user);
    return user;
  }

  private async createSession(user: User): Promise<string> {
    const { raw, token } = buildToken(user, 'session', null, this.now());
    await this.store.insertToken(token);
    return raw;
  }

  // ---- registration & sign in ----

  async registerWithPassword(attrs: unknown): Promise<User> {
    const fields = await passwordRegistration(asAttrs(attrs), this.now(), this.rules);
    const user = await this.insertUser(fields, null);
    await this.deliverConfirmation(user);
    return user;
  }

  /** creates the account on first sign in; provider accounts start confirmed */
  async signInWithProvider(provider: AuthProvider, attrs: unknown): Promise<Session> {
    const now = this.now();
    const a = { ...asAttrs(attrs), provider };
    const fields = provider === 'github' ? githubRegistration(a, now) : herokuRegistration(a, now);

    const existing = await this.store.findUserByEmail(fields.email);
    if (existing?.deletedAt) throw Errors.UNAUTHORIZED('account deleted');
    if (existing && !sameIdentity(existing, fields)) {
      throw Errors.CONFLICT(`${fields.email} is registered with another sign-in method`);
    }
    const user = existing
      ? await this.store.updateUser(existing.id, { lastSignin: now })
      : await this.insertUser(fields, now);
    return { user, token: await this.createSession(user) };
  }

  registerWithGithub(attrs: unknown): Promise<Session> {
    return this.signInWithProvider('github', attrs);
  }

  registerWithHeroku(attrs: unknown): Promise<Session> {
    return this.signInWithProvider('heroku', attrs);
  }

  async login(email: string, password: string): Promise<Session> {
    const found = await this.store.findUserByEmail(email);
    const user = found && !found.deletedAt ? found : undefined;
    const ok = await validPassword(user, password, this.passwords);
    if (!ok || !user) throw Errors.UNAUTHORIZED('invalid email or password');
    const updated = await this.store.updateUser(user.id, { lastSignin: this.now() });
    return { user: updated, token: await this.createSession(updated) };
  }

  async getUserBySessionToken(raw: string): Promise<User | undefined> {
    const token = await this.store.findToken(digest(raw), 'session');
    if (!token || isExpired(token, this.now(), this.validity)) return undefined;
    const user = await this.store.findUserById(token.userId);
    return user && !user.deletedAt ? user : undefined;
  }

  logout(raw: string): Promise<void> {
    return this.store.deleteToken(digest(raw), 'session');
  }

  // ---- confirmation ----

  async deliverConfirmation(user: User): Promise<Mail> {
    if (user.confirmedAt) throw Errors.CONFLICT('account already confirmed');
    const { raw, token } = buildToken(user, 'confirm', user.email, this.now());
    await this.store.insertToken(token);
    return this.notifier.deliverConfirmationInstructions(user, this.url(`/users/confirm/${raw}`));
  }

  async confirmUser(raw: string): Promise<User> {
    const now = this.now();
    const token = await this.store.findToken(digest(raw), 'confirm');
    const user = token && !isExpired(token, now, this.validity)
      ? await this.store.findUserById(token.userId)
      : undefined;
    if (!token || !user || user.deletedAt || user.email !== token.sentTo) {
      throw Errors.NOT_FOUND('confirmation token');
    }
    const updated = await this.store.updateUser(user.id, { ...confirmation(now), updatedAt: now });
    await this.store.deleteTokens(user.id, ['confirm']);
    return updated;
  }

  // ---- email & password ----

  /** validates and mails a link to the new address; nothing is saved yet */
  async requestEmailChange(user: User, currentPassword: unknown, attrs: unknown): Promise<User> {
    const errors: FieldErrors = {};
    await validateCurrentPassword(user, currentPassword, errors, this.passwords);
    const { email } = await emailChange(user, asAttrs(attrs), this.rules, errors);

    const applied: User = { ...user, email };
    const { raw, token } = buildToken(user, changeContext(user.email), email, this.now());
    await this.store.insertToken(token);
    await this.notifier.deliverUpdateEmailInstructions(applied, this.url(`/users/me/email/${raw}`));
    return applied;
  }

  async applyEmailChange(user: User, raw: string): Promise<User> {
    const now = this.now();
    const context = changeContext(user.email);
    const token = await this.store.findToken(digest(raw), context);
    if (!token || token.userId !== user.id || !token.sentTo || isExpired(token, now, this.validity)) {
      throw Errors.NOT_FOUND('email change token');
    }
    if (await this.store.findUserByEmail(token.sentTo)) {
      throw Errors.CONFLICT(`${token.sentTo} is already taken`);
    }
    const updated = await this.store.updateUser(user.id, { email: token.sentTo, confirmedAt: now, updatedAt: now });
    await this.store.deleteTokens(user.id, [context]);
    return updated;
  }

  /** every other session is dropped; the returned one replaces the caller's */
  async updatePassword(user: User, currentPassword: unknown, attrs: unknown): Promise<Session> {
    const errors: FieldErrors = {};
    await validateCurrentPassword(user, currentPassword, errors, this.passwords);
    const { hashedPassword } = await passwordChange(asAttrs(attrs), this.rules, {}, errors);
    const updated = await this.store.updateUser(user.id, { hashedPassword, updatedAt: this.now() });
    await this.store.deleteTokens(user.id);
    return { user: updated, token: await this.createSession(updated) };
  }

  /** silent when the email is unknown */
  async requestPasswordReset(email: string): Promise<Mail | undefined> {
    const user = await this.store.findUserByEmail(email);
    if (!user || user.deletedAt) return undefined;
    const { raw, token } = buildToken(user, 'reset_password', user.email, this.now());
    await this.store.insertToken(token);
    return this.notifier.deliverResetPasswordInstructions(user, this.url(`/users/reset-password/${raw}`));
  }

  async resetPassword(raw: string, attrs: unknown): Promise<User> {
    const now = this.now();
    const token = await this.store.findToken(digest(raw), 'reset_password');
    const user = token && !isExpired(token, now, this.validity)
      ? await this.store.findUserById(token.userId)
      : undefined;
    if (!token || !user || user.deletedAt || user.email !== token.sentTo) {
      throw Errors.NOT_FOUND('reset password token');
    }
    const { hashedPassword } = await passwordChange(asAttrs(attrs), this.rules);
    const updated = await this.store.updateUser(user.id, { hashedPassword, updatedAt: now });
    await this.store.deleteTokens(user.id);
    return updated;
  }

  // ---- profile ----

  async updateProfile(user: User, attrs: unknown): Promise<User> {
    const raw = asAttrs(attrs);
    const a = parseAttrs(ProfilePatchSchema, raw);
    const errors: FieldErrors = {};
    for (const field of ['name', 'avatar'] as const) {
      if (field in raw && a[field] === undefined) addError(errors, field, "can't be blank");
    }
    if (hasErrors(errors)) throw Errors.VALIDATION(errors);

    const patch: UserPatch = { updatedAt: this.now() };
    if (a.name !== undefined) patch.name = a.name;
    if (a.avatar !== undefined) patch.avatar = a.avatar;
    for (const field of ['company', 'location', 'description', 'githubUsername', 'twitterUsername'] as const) {
      // a blank value clears the field
      if (field in raw) patch[field] = a[field] ?? null;
    }
    return this.store.updateUser(user.id, patch);
  }

  async deleteUser(user: User): Promise<void> {
    const now = this.now();
    await this.store.updateUser(user.id, { deletedAt: now, updatedAt: now });
    await this.store.deleteTokens(user.id);
  }

  async searchUsers(query: string, limit = 20): Promise<User[]> {
    const q = query.trim();
    if (!q) return [];
    return this.store.searchUsers(q, Math.min(Math.max(limit, 1), SEARCH_LIMIT_MAX));
  }

  getUser(id: string): Promise<User | undefined> {
    return this.store.findUserById(id);
  }
}
