// apps/http/src/routes/organizations.ts
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { currentUser } from '../auth';
import type { RouteDeps } from './deps';

const OrgParams = z.object({ org: z.string().min(1) });
const MemberParams = OrgParams.extend({ userId: z.string().min(1) });

export const organizationsRoutes: FastifyPluginAsync<RouteDeps> = async (app, { organizations, auth }) => {
  app.addHook('preHandler', auth.requireUser);

  app.get('/organizations', async (req) => {
    return { organizations: await organizations.listForUser(currentUser(req)) };
  });

  app.post('/organizations', async (req, reply) => {
    const organization = await organizations.create(currentUser(req), req.body);
    return reply.code(201).send({ organization });
  });

  app.get('/organizations/:org', async (req) => {
    const { org } = OrgParams.parse(req.params);
    return { organization: await organizations.get(currentUser(req), org) };
  });

  app.put('/organizations/:org', async (req) => {
    const { org } = OrgParams.parse(req.params);
    return { organization: await organizations.update(currentUser(req), org, req.body) };
  });

  app.delete('/organizations/:org', async (req, reply) => {
    const { org } = OrgParams.parse(req.params);
    await organizations.delete(currentUser(req), org);
    return reply.code(204).send();
  });

  // ---- members ----
  app.get('/organizations/:org/members', async (req) => {
    const { org } = OrgParams.parse(req.params);
    return { members: await organizations.listMembers(currentUser(req), org) };
  });

  app.post('/organizations/:org/members', async (req, reply) => {
    const { org } = OrgParams.parse(req.params);
    const member = await organizations.addMember(currentUser(req), org, req.body);
    return reply.code(201).send({ member });
  });

  app.delete('/organizations/:org/members/:userId', async (req, reply) => {
    const { org, userId } = MemberParams.parse(req.params);
    await organizations.removeMember(currentUser(req), org, userId);
    return reply.code(204).send();
  });
};
