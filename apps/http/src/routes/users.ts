// apps/http/src/routes/users.ts
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { LoginSchema } from '@erdbase/core';
import { publicUser } from '@erdbase/accounts';
import { bearerToken, currentUser } from '../auth';
import type { RouteDeps } from './deps';

const TokenParams = z.object({ token: z.string().min(1) });
const ProviderParams = z.object({ provider: z.enum(['github', 'heroku']) });
const CurrentPassword = z.object({ currentPassword: z.unknown() }).passthrough();
const ResetRequest = z.object({ email: z.string().min(1) });
const SearchQuery = z.object({
  q: z.string().default(''),
  limit: z.coerce.number().int().positive().optional(),
});

export const usersRoutes: FastifyPluginAsync<RouteDeps> = async (app, { accounts, auth }) => {
  // ---- public ----
  app.post('/users/register', {
    config: { rateLimit: { max: 10, timeWindow: '1 minute' } },
  }, async (req, reply) => {
    const user = await accounts.registerWithPassword(req.body);
    req.log.info({ userId: user.id }, 'user-registered');
    return reply.code(201).send({ user: publicUser(user) });
  });

  app.post('/users/auth/:provider', { preHandler: auth.requireProviderSecret }, async (req) => {
    const { provider } = ProviderParams.parse(req.params);
    const { user, token } = await accounts.signInWithProvider(provider, req.body);
    return { user: publicUser(user), token };
  });

  app.post('/users/login', {
    config: { rateLimit: { max: 20, timeWindow: '1 minute' } },
  }, async (req) => {
    const { email, password } = LoginSchema.parse(req.body);
    const { user, token } = await accounts.login(email, password);
    return { user: publicUser(user), token };
  });

  app.post('/users/confirm/:token', async (req) => {
    const { token } = TokenParams.parse(req.params);
    return { user: publicUser(await accounts.confirmUser(token)) };
  });

  app.post('/users/reset-password', {
    config: { rateLimit: { max: 5, timeWindow: '1 minute' } },
  }, async (req, reply) => {
    const { email } = ResetRequest.parse(req.body);
    await accounts.requestPasswordReset(email);
    // same answer whether or not the email is known
    return reply.code(204).send();
  });

  app.post('/users/reset-password/:token', async (req) => {
    const { token } = TokenParams.parse(req.params);
    return { user: publicUser(await accounts.resetPassword(token, req.body)) };
  });

  // ---- signed in ----
  app.delete('/users/session', { preHandler: auth.requireUser }, async (req, reply) => {
    const raw = bearerToken(req);
    if (raw) await accounts.logout(raw);
    return reply.code(204).send();
  });

  app.get('/users/me', { preHandler: auth.requireUser }, async (req) => {
    return { user: publicUser(currentUser(req)) };
  });

  app.put('/users/me', { preHandler: auth.requireUser }, async (req) => {
    return { user: publicUser(await accounts.updateProfile(currentUser(req), req.body)) };
  });

  app.put('/users/me/email', { preHandler: auth.requireUser }, async (req, reply) => {
    const { currentPassword } = CurrentPassword.parse(req.body ?? {});
    const applied = await accounts.requestEmailChange(currentUser(req), currentPassword, req.body);
    return reply.code(202).send({ user: publicUser(applied) });
  });

  app.post('/users/me/email/:token', { preHandler: auth.requireUser }, async (req) => {
    const { token } = TokenParams.parse(req.params);
    return { user: publicUser(await accounts.applyEmailChange(currentUser(req), token)) };
  });

  app.put('/users/me/password', { preHandler: auth.requireUser }, async (req) => {
    const { currentPassword } = CurrentPassword.parse(req.body ?? {});
    const { user, token } = await accounts.updatePassword(currentUser(req), currentPassword, req.body);
    return { user: publicUser(user), token };
  });

  app.delete('/users/me', { preHandler: auth.requireUser }, async (req, reply) => {
    await accounts.deleteUser(currentUser(req));
    return reply.code(204).send();
  });

  // ---- admin ----
  app.get('/admin/users', { preHandler: auth.requireAdmin }, async (req) => {
    const { q, limit } = SearchQuery.parse(req.query);
    const users = await accounts.searchUsers(q, limit);
    return { users: users.map(publicUser) };
  });
};
