import type { PublicUser, User } from '@erdbase/core';

export * from './password';
export * from './tokens';
export * from './notifier';
export * from './user';
export * from './service';

export function publicUser(user: User): PublicUser {
  const { hashedPassword: _hidden, ...rest } = user;
  return rest;
}
