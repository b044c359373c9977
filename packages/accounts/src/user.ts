// packages/accounts/src/user.ts
// Attribute validation for every way a user row is created or changed.
// Each builder reads only the fields it knows, collects errors per field and
// throws a single VALIDATION error listing all of them.
import { z } from 'zod';
import type { AuthProvider, FieldErrors, User } from '@erdbase/core';
import {
  EmailSchema, Errors, addError, choice, fieldErrorsFromZod, hasErrors,
  normalizeEmail, optional, required, slugify, text,
} from '@erdbase/core';
import { BCRYPT_MAX_BYTES, type PasswordHasher } from './password';

export type UserAttrs = Record<string, unknown>;

export interface UserRules {
  passwords: PasswordHasher;
  emailTaken(email: string): Promise<boolean>;
}

export interface HashOptions {
  /** false keeps the clear password and skips hashing (form pre-validation) */
  hashPassword?: boolean;
}

export interface ProfileFields {
  company: string | null;
  location: string | null;
  description: string | null;
  githubUsername: string | null;
  twitterUsername: string | null;
}

export interface PasswordFields {
  hashedPassword: string | null;
  password?: string;
}

export interface RegistrationFields extends ProfileFields, PasswordFields {
  slug: string;
  name: string;
  email: string;
  avatar: string;
  provider: AuthProvider | null;
  providerUid: string | null;
  lastSignin: Date;
}

const ProfileShape = {
  company: optional(text()),
  location: optional(text()),
  description: optional(text()),
  githubUsername: optional(text()),
  twitterUsername: optional(text()),
};

const PasswordRegistrationSchema = z.object({
  name: required(text()),
  avatar: required(text()),
  ...ProfileShape,
});

const GithubRegistrationSchema = z.object({
  name: required(text()),
  email: required(text()),
  avatar: required(text()),
  provider: required(choice(['github', 'heroku'] as const)),
  providerUid: optional(text()),
  ...ProfileShape,
});

const HerokuRegistrationSchema = z.object({
  name: required(text()),
  email: required(text()),
  avatar: required(text()),
  provider: required(choice(['github', 'heroku'] as const)),
});

export const ProfilePatchSchema = z.object({
  name: optional(text()),
  avatar: optional(text()),
  ...ProfileShape,
});

const PasswordSchema = text({ min: 12, max: 72 });

export function asAttrs(v: unknown): UserAttrs {
  return v !== null && typeof v === 'object' && !Array.isArray(v) ? { ...v } : {};
}

function merge(errors: FieldErrors, more: FieldErrors): void {
  for (const [field, messages] of Object.entries(more)) {
    for (const m of messages) addError(errors, field, m);
  }
}

function check<T extends z.ZodTypeAny>(schema: T, attrs: UserAttrs, errors: FieldErrors): z.output<T> | undefined {
  const res = schema.safeParse(attrs);
  if (res.success) return res.data;
  merge(errors, fieldErrorsFromZod(res.error));
  return undefined;
}

function checkField<T extends z.ZodTypeAny>(
  schema: T, value: unknown, field: string, errors: FieldErrors
): z.output<T> | undefined {
  return check(z.object({ [field]: schema }), { [field]: value }, errors)?.[field];
}

function profileOf(a: Partial<Record<keyof ProfileFields, string>>): ProfileFields {
  return {
    company: a.company ?? null,
    location: a.location ?? null,
    description: a.description ?? null,
    githubUsername: a.githubUsername ?? null,
    twitterUsername: a.twitterUsername ?? null,
  };
}

async function validateEmail(value: unknown, rules: UserRules, errors: FieldErrors): Promise<string | undefined> {
  const email: string | undefined = checkField(required(EmailSchema), value, 'email', errors);
  if (email !== undefined && !errors.email && await rules.emailTaken(email)) {
    addError(errors, 'email', 'has already been taken');
  }
  return email;
}

function validatePassword(value: unknown, errors: FieldErrors): string | undefined {
  return checkField(required(PasswordSchema), value, 'password', errors);
}

/** hashing only happens once every other rule passed */
async function maybeHashPassword(
  password: string | undefined, rules: UserRules, opts: HashOptions, errors: FieldErrors
): Promise<PasswordFields> {
  if (opts.hashPassword === false || password === undefined || hasErrors(errors)) {
    return { hashedPassword: null, ...(opts.hashPassword === false && password !== undefined ? { password } : {}) };
  }
  if (Buffer.byteLength(password, 'utf8') > BCRYPT_MAX_BYTES) {
    addError(errors, 'password', `should be at most ${BCRYPT_MAX_BYTES} byte(s)`);
    return { hashedPassword: null };
  }
  return { hashedPassword: await rules.passwords.hash(password) };
}

export async function passwordRegistration(
  attrs: UserAttrs, now: Date, rules: UserRules, opts: HashOptions = {}
): Promise<RegistrationFields> {
  const errors: FieldErrors = {};
  const base = check(PasswordRegistrationSchema, attrs, errors);
  const email = await validateEmail(attrs.email, rules, errors);
  const password = validatePassword(attrs.password, errors);
  const secret = await maybeHashPassword(password, rules, opts, errors);
  if (!base || email === undefined || hasErrors(errors)) throw Errors.VALIDATION(errors);

  return {
    slug: slugify(base.name, 'user'),
    name: base.name,
    email,
    avatar: base.avatar,
    provider: null,
    providerUid: null,
    ...profileOf(base),
    ...secret,
    lastSignin: now,
  };
}

export function githubRegistration(attrs: UserAttrs, now: Date): RegistrationFields {
  const errors: FieldErrors = {};
  const a = check(GithubRegistrationSchema, attrs, errors);
  if (!a) throw Errors.VALIDATION(errors);
  return {
    slug: slugify(a.githubUsername ?? a.name, 'user'),
    name: a.name,
    email: a.email,
    avatar: a.avatar,
    provider: a.provider,
    providerUid: a.providerUid ?? null,
    ...profileOf(a),
    hashedPassword: null,
    lastSignin: now,
  };
}

export function herokuRegistration(attrs: UserAttrs, now: Date): RegistrationFields {
  const errors: FieldErrors = {};
  const a = check(HerokuRegistrationSchema, attrs, errors);
  if (!a) throw Errors.VALIDATION(errors);
  return {
    slug: slugify(a.name, 'user'),
    name: a.name,
    email: a.email,
    avatar: a.avatar,
    provider: a.provider,
    providerUid: null,
    ...profileOf({}),
    hashedPassword: null,
    lastSignin: now,
  };
}

/** `errors` may already hold findings, e.g. from validateCurrentPassword */
export async function emailChange(
  user: User, attrs: UserAttrs, rules: UserRules, errors: FieldErrors = {}
): Promise<{ email: string }> {
  const email: string | undefined = checkField(required(EmailSchema), attrs.email, 'email', errors);
  if (email !== undefined && normalizeEmail(email) === normalizeEmail(user.email)) {
    addError(errors, 'email', 'did not change');
  } else if (email !== undefined && !errors.email && await rules.emailTaken(email)) {
    addError(errors, 'email', 'has already been taken');
  }
  if (email === undefined || hasErrors(errors)) throw Errors.VALIDATION(errors);
  return { email };
}

export async function passwordChange(
  attrs: UserAttrs, rules: UserRules, opts: HashOptions = {}, errors: FieldErrors = {}
): Promise<PasswordFields> {
  if (attrs.passwordConfirmation !== undefined && attrs.passwordConfirmation !== attrs.password) {
    addError(errors, 'passwordConfirmation', 'does not match password');
  }
  const password = validatePassword(attrs.password, errors);
  const secret = await maybeHashPassword(password, rules, opts, errors);
  if (hasErrors(errors)) throw Errors.VALIDATION(errors);
  return secret;
}

export function confirmation(now: Date): Pick<User, 'confirmedAt'> {
  return { confirmedAt: now };
}

export async function validPassword(
  user: Pick<User, 'hashedPassword'> | null | undefined, password: string, hasher: PasswordHasher
): Promise<boolean> {
  if (user?.hashedPassword && password.length > 0) {
    return hasher.verify(password, user.hashedPassword);
  }
  return hasher.noUserVerify();
}

export async function validateCurrentPassword(
  user: Pick<User, 'hashedPassword'>, password: unknown, errors: FieldErrors, hasher: PasswordHasher
): Promise<void> {
  const ok = typeof password === 'string'
    ? await validPassword(user, password, hasher)
    : await hasher.noUserVerify();
  if (!ok) addError(errors, 'currentPassword', 'is not valid');
}
