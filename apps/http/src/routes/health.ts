// apps/http/src/routes/health.ts
import type { FastifyPluginAsync } from 'fastify';
import type { RouteDeps } from './deps';

export const healthRoutes: FastifyPluginAsync<RouteDeps> = async (app, { store }) => {
  app.get('/healthz', async () => ({ ok: true }));

  app.get('/readyz', async (_req, reply) => {
    const [h] = await Promise.allSettled([store.health()]);
    const health = h.status === 'fulfilled' ? h.value : { ok: false };
    const body = { ok: health.ok, store: { name: store.name, ...health } };
    return health.ok ? body : reply.code(503).send(body);
  });
};
