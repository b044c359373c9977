// apps/http/src/routes/projects.ts
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { Project } from '@erdbase/core';
import { currentUser } from '../auth';
import type { RouteDeps } from './deps';

const OrgParams = z.object({ org: z.string().min(1) });
const ProjectParams = OrgParams.extend({ project: z.string().min(1) });

// listings leave the (possibly large) content out
function summary({ content: _content, ...rest }: Project): Omit<Project, 'content'> {
  return rest;
}

export const projectsRoutes: FastifyPluginAsync<RouteDeps> = async (app, { projects, auth }) => {
  app.addHook('preHandler', auth.requireUser);

  app.get('/organizations/:org/projects', async (req) => {
    const { org } = OrgParams.parse(req.params);
    const list = await projects.list(currentUser(req), org);
    return { projects: list.map(summary) };
  });

  app.post('/organizations/:org/projects', async (req, reply) => {
    const { org } = OrgParams.parse(req.params);
    const project = await projects.create(currentUser(req), org, req.body);
    req.log.info({ projectId: project.id, storageKind: project.storageKind }, 'project-created');
    return reply.code(201).send({ project });
  });

  app.get('/organizations/:org/projects/:project', async (req) => {
    const { org, project } = ProjectParams.parse(req.params);
    return { project: await projects.get(currentUser(req), org, project) };
  });

  app.put('/organizations/:org/projects/:project', async (req) => {
    const { org, project } = ProjectParams.parse(req.params);
    return { project: await projects.update(currentUser(req), org, project, req.body) };
  });

  app.post('/organizations/:org/projects/:project/archive', async (req) => {
    const { org, project } = ProjectParams.parse(req.params);
    return { project: summary(await projects.archive(currentUser(req), org, project)) };
  });

  app.delete('/organizations/:org/projects/:project', async (req, reply) => {
    const { org, project } = ProjectParams.parse(req.params);
    await projects.delete(currentUser(req), org, project);
    return reply.code(204).send();
  });

  app.get('/organizations/:org/projects/:project/graph', async (req) => {
    const { org, project } = ProjectParams.parse(req.params);
    return { graph: await projects.graph(currentUser(req), org, project) };
  });
};
