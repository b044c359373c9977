// packages/projects/src/index.ts
import { randomUUID } from 'node:crypto';
import type { Clock, MemberRole, Project, ProjectStats, StorageKind, Store, User } from '@erdbase/core';
import {
  Errors, ProjectAttrsSchema, ProjectPatchSchema, parseAttrs, slugify, uniqueSlug,
} from '@erdbase/core';
import { buildSchemaGraph, computeStats, parseProjectContent, type SchemaGraph } from '@erdbase/erd';
import type { OrganizationsService } from '@erdbase/organizations';

const EMPTY_STATS: ProjectStats = { nbSources: 0, nbTables: 0, nbColumns: 0, nbRelations: 0 };

/**
 * Remote projects store their content; local ones keep it in the browser and
 * only send it along so the stats stay accurate.
 */
function contentFields(kind: StorageKind, content: string | undefined): Pick<Project, 'content'> & ProjectStats {
  if (content === undefined) {
    if (kind === 'remote') throw Errors.VALIDATION({ content: ["can't be blank"] });
    return { content: null, ...EMPTY_STATS };
  }
  const stats = computeStats(parseProjectContent(content));
  return { content: kind === 'remote' ? content : null, ...stats };
}

export class ProjectsService {
  constructor(
    private store: Store,
    private organizations: OrganizationsService,
    private now: Clock = () => new Date()
  ) {}

  private async find(user: User, orgSlug: string, projectSlug: string, min: MemberRole) {
    const { organization } = await this.organizations.access(user, orgSlug, min);
    const project = await this.store.findProject(organization.id, projectSlug);
    if (!project) throw Errors.NOT_FOUND(`project ${projectSlug}`);
    return project;
  }

  async create(user: User, orgSlug: string, attrs: unknown): Promise<Project> {
    const { organization } = await this.organizations.access(user, orgSlug, 'writer');
    const a = parseAttrs(ProjectAttrsSchema, attrs);
    const now = this.now();
    return this.store.insertProject({
      id: randomUUID(),
      organizationId: organization.id,
      slug: await uniqueSlug(slugify(a.name, 'project'), (s) => this.store.projectSlugExists(organization.id, s)),
      name: a.name,
      description: a.description ?? null,
      storageKind: a.storageKind,
      ...contentFields(a.storageKind, a.content),
      createdBy: user.id,
      updatedBy: user.id,
      createdAt: now,
      updatedAt: now,
      archivedAt: null,
    });
  }

  async list(user: User, orgSlug: string): Promise<Project[]> {
    const { organization } = await this.organizations.access(user, orgSlug);
    return this.store.listProjects(organization.id);
  }

  get(user: User, orgSlug: string, projectSlug: string): Promise<Project> {
    return this.find(user, orgSlug, projectSlug, 'reader');
  }

  async update(user: User, orgSlug: string, projectSlug: string, attrs: unknown): Promise<Project> {
    const project = await this.find(user, orgSlug, projectSlug, 'writer');
    const a = parseAttrs(ProjectPatchSchema, attrs);
    return this.store.updateProject(project.id, {
      ...(a.name !== undefined ? { name: a.name } : {}),
      ...(a.description !== undefined ? { description: a.description } : {}),
      ...(a.content !== undefined ? contentFields(project.storageKind, a.content) : {}),
      updatedBy: user.id,
      updatedAt: this.now(),
    });
  }

  async archive(user: User, orgSlug: string, projectSlug: string): Promise<Project> {
    const project = await this.find(user, orgSlug, projectSlug, 'writer');
    const now = this.now();
    return this.store.updateProject(project.id, { archivedAt: now, updatedBy: user.id, updatedAt: now });
  }

  async delete(user: User, orgSlug: string, projectSlug: string): Promise<void> {
    const project = await this.find(user, orgSlug, projectSlug, 'owner');
    await this.store.deleteProject(project.id);
  }

  async graph(user: User, orgSlug: string, projectSlug: string): Promise<SchemaGraph> {
    const project = await this.find(user, orgSlug, projectSlug, 'reader');
    if (project.content === null) {
      throw Errors.CONFLICT('local projects keep their content in the browser');
    }
    return buildSchemaGraph(parseProjectContent(project.content));
  }
}
