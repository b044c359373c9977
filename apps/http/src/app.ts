// apps/http/src/app.ts
import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import type { Clock, Store } from '@erdbase/core';
import { AccountsService, LoggingNotifier, PasswordHasher, type UserNotifier } from '@erdbase/accounts';
import { OrganizationsService } from '@erdbase/organizations';
import { ProjectsService } from '@erdbase/projects';
import { makeAuth } from './auth';
import type { AppConfig } from './config';
import { sendError } from './errors';
import { healthRoutes } from './routes/health';
import { organizationsRoutes } from './routes/organizations';
import { projectsRoutes } from './routes/projects';
import { usersRoutes } from './routes/users';
import type { RouteDeps } from './routes/deps';

export interface BuildAppOptions {
  config: AppConfig;
  store: Store;
  logger?: FastifyServerOptions['logger'];
  /** defaults to mails written to the request log */
  notifier?: UserNotifier;
  now?: Clock;
}

export async function buildApp(opts: BuildAppOptions): Promise<FastifyInstance> {
  const { config, store } = opts;
  const app = Fastify({
    logger: opts.logger ?? { level: config.logLevel },
    bodyLimit: 5_000_000, // project content can be large
  });

  await app.register(cors, {
    origin: (origin, cb) => {
      const allow = config.corsOrigins;
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(new Error('CORS not allowed'), false);
    },
    credentials: true,
  });

  await app.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: '1 minute',
  });

  app.decorateRequest('user', null);

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  app.setErrorHandler((err, req, reply) => sendError(req, reply, err, config.debugErrors));

  const now = opts.now ?? (() => new Date());
  const organizations = new OrganizationsService(store, now);
  const accounts = new AccountsService({
    store,
    passwords: new PasswordHasher(config.bcryptRounds),
    notifier: opts.notifier ?? new LoggingNotifier(app.log),
    organizations,
    config: { publicUrl: config.publicUrl, sessionDays: config.sessionDays },
    now,
  });
  const projects = new ProjectsService(store, organizations, now);

  const deps: RouteDeps = { store, accounts, organizations, projects, auth: makeAuth(accounts, config.providerSecret) };
  await app.register(healthRoutes, deps);
  await app.register(usersRoutes, deps);
  await app.register(organizationsRoutes, deps);
  await app.register(projectsRoutes, deps);

  return app;
}
