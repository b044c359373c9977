// packages/accounts/src/tokens.ts
import { createHash, randomBytes, randomUUID } from 'node:crypto';
import type { TokenContext, User, UserToken } from '@erdbase/core';

const TOKEN_BYTES = 32;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface TokenValidity {
  sessionDays: number;
}

/** lifetime of a token, per context */
export function validityDays(context: TokenContext, v: TokenValidity): number {
  if (context === 'session') return v.sessionDays;
  if (context === 'reset_password') return 1;
  return 7; // confirm, change:*
}

export function changeContext(currentEmail: string): TokenContext {
  return `change:${currentEmail}`;
}

/** clients hold the raw token; only its sha256 is stored */
export function digest(raw: string): string {
  return createHash('sha256').update(Buffer.from(raw, 'base64url')).digest('base64url');
}

export function buildToken(
  user: Pick<User, 'id'>, context: TokenContext, sentTo: string | null, now: Date
): { raw: string; token: UserToken } {
  const raw = randomBytes(TOKEN_BYTES).toString('base64url');
  return {
    raw,
    token: { id: randomUUID(), userId: user.id, token: digest(raw), context, sentTo, createdAt: now },
  };
}

export function isExpired(token: UserToken, now: Date, v: TokenValidity): boolean {
  return now.getTime() - token.createdAt.getTime() > validityDays(token.context, v) * DAY_MS;
}
