// apps/http/src/auth.ts
import { createHash, timingSafeEqual } from 'node:crypto';
import type { FastifyRequest } from 'fastify';
import { Errors, type User } from '@erdbase/core';
import type { AccountsService } from '@erdbase/accounts';

declare module 'fastify' {
  interface FastifyRequest {
    user: User | null;
  }
}

export function bearerToken(req: FastifyRequest): string | undefined {
  const h = req.headers.authorization;
  const m = h?.match(/^Bearer\s+(\S+)$/i);
  return m?.[1];
}

export function currentUser(req: FastifyRequest): User {
  if (!req.user) throw Errors.UNAUTHORIZED();
  return req.user;
}

export const PROVIDER_SECRET_HEADER = 'x-provider-secret';

function sameSecret(given: string, expected: string): boolean {
  // equal-length digests, so the comparison time does not depend on the input
  const a = createHash('sha256').update(given).digest();
  const b = createHash('sha256').update(expected).digest();
  return timingSafeEqual(a, b);
}

export function makeAuth(accounts: AccountsService, providerSecret?: string) {
  async function requireUser(req: FastifyRequest): Promise<void> {
    const raw = bearerToken(req);
    const user = raw ? await accounts.getUserBySessionToken(raw) : undefined;
    if (!user) throw Errors.UNAUTHORIZED();
    req.user = user;
  }

  async function requireAdmin(req: FastifyRequest): Promise<void> {
    await requireUser(req);
    if (!currentUser(req).isAdmin) throw Errors.FORBIDDEN('admin only');
  }

  /** provider profiles are only taken from the front holding the shared secret */
  async function requireProviderSecret(req: FastifyRequest): Promise<void> {
    const given = req.headers[PROVIDER_SECRET_HEADER];
    if (!providerSecret || typeof given !== 'string' || !sameSecret(given, providerSecret)) {
      throw Errors.UNAUTHORIZED('provider secret required');
    }
  }

  return { requireUser, requireAdmin, requireProviderSecret };
}

export type Auth = ReturnType<typeof makeAuth>;
