// packages/store-memory/src/index.ts
import type {
  Organization, OrganizationMember, OrganizationPatchRow, Project, ProjectPatchRow,
  Store, StoreHealth, TokenContext, User, UserPatch, UserToken,
} from '@erdbase/core';
import { AppError, USER_SEARCH_FIELDS, normalizeEmail } from '@erdbase/core';

const copy = <T>(v: T): T => structuredClone(v);

/** Map-backed store for dev mode and tests; rows go in and out as copies */
export class MemoryStore implements Store {
  name: 'memory' = 'memory';
  private users = new Map<string, User>();
  private tokens: UserToken[] = [];
  private organizations = new Map<string, Organization>();
  private members: OrganizationMember[] = [];
  private projects = new Map<string, Project>();

  // --- users ---
  async insertUser(input: User) {
    const user = { ...input, email: normalizeEmail(input.email) };
    for (const u of this.users.values()) {
      if (u.email === user.email) throw new AppError('CONFLICT', 'users.email already exists');
      if (u.slug === user.slug) throw new AppError('CONFLICT', 'users.slug already exists');
    }
    this.users.set(user.id, copy(user));
    return copy(user);
  }

  async updateUser(id: string, patch: UserPatch) {
    const cur = this.users.get(id);
    if (!cur) throw new AppError('NOT_FOUND', `user ${id} not found`);
    const next = { ...cur, ...patch };
    if (patch.email !== undefined) {
      next.email = normalizeEmail(patch.email);
      for (const u of this.users.values()) {
        if (u.id !== id && u.email === next.email) throw new AppError('CONFLICT', 'users.email already exists');
      }
    }
    this.users.set(id, copy(next));
    return copy(next);
  }

  async findUserById(id: string) {
    const u = this.users.get(id);
    return u && copy(u);
  }

  async findUserByEmail(email: string) {
    const key = normalizeEmail(email);
    for (const u of this.users.values()) if (u.email === key) return copy(u);
    return undefined;
  }

  async userSlugExists(slug: string) {
    for (const u of this.users.values()) if (u.slug === slug) return true;
    return false;
  }

  async searchUsers(query: string, limit: number) {
    const needle = query.toLowerCase();
    return [...this.users.values()]
      .filter((u) => u.deletedAt === null)
      .filter((u) => USER_SEARCH_FIELDS.some((f) => (u[f] ?? '').toLowerCase().includes(needle)))
      .sort((a, b) => a.name.localeCompare(b.name))
      .slice(0, limit)
      .map(copy);
  }

  // --- tokens ---
  async insertToken(token: UserToken) {
    this.tokens.push(copy(token));
  }

  async findToken(digest: string, context: TokenContext) {
    const t = this.tokens.find((x) => x.token === digest && x.context === context);
    return t && copy(t);
  }

  async deleteToken(digest: string, context: TokenContext) {
    this.tokens = this.tokens.filter((t) => !(t.token === digest && t.context === context));
  }

  async deleteTokens(userId: string, contexts?: TokenContext[]) {
    this.tokens = this.tokens.filter(
      (t) => t.userId !== userId || (contexts !== undefined && !contexts.includes(t.context))
    );
  }

  // --- organizations ---
  async insertOrganization(org: Organization) {
    for (const o of this.organizations.values()) {
      if (o.slug === org.slug) throw new AppError('CONFLICT', 'organizations.slug already exists');
    }
    this.organizations.set(org.id, copy(org));
    return copy(org);
  }

  async updateOrganization(id: string, patch: OrganizationPatchRow) {
    const cur = this.organizations.get(id);
    if (!cur) throw new AppError('NOT_FOUND', `organization ${id} not found`);
    const next = { ...cur, ...patch };
    this.organizations.set(id, copy(next));
    return copy(next);
  }

  async findOrganizationBySlug(slug: string) {
    for (const o of this.organizations.values()) {
      if (o.slug === slug && o.deletedAt === null) return copy(o);
    }
    return undefined;
  }

  async organizationSlugExists(slug: string) {
    for (const o of this.organizations.values()) if (o.slug === slug) return true;
    return false;
  }

  async listOrganizationsForUser(userId: string) {
    const ids = new Set(this.members.filter((m) => m.userId === userId).map((m) => m.organizationId));
    return [...this.organizations.values()]
      .filter((o) => ids.has(o.id) && o.deletedAt === null)
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(copy);
  }

  // --- members ---
  async insertMember(member: OrganizationMember) {
    if (this.members.some((m) => m.organizationId === member.organizationId && m.userId === member.userId)) {
      throw new AppError('CONFLICT', 'organization_members already exists');
    }
    this.members.push(copy(member));
  }

  async deleteMember(organizationId: string, userId: string) {
    this.members = this.members.filter((m) => !(m.organizationId === organizationId && m.userId === userId));
  }

  async findMember(organizationId: string, userId: string) {
    const m = this.members.find((x) => x.organizationId === organizationId && x.userId === userId);
    return m && copy(m);
  }

  async listMembers(organizationId: string) {
    return this.members.filter((m) => m.organizationId === organizationId).map(copy);
  }

  // --- projects ---
  async insertProject(project: Project) {
    if (await this.projectSlugExists(project.organizationId, project.slug)) {
      throw new AppError('CONFLICT', 'projects.slug already exists');
    }
    this.projects.set(project.id, copy(project));
    return copy(project);
  }

  async updateProject(id: string, patch: ProjectPatchRow) {
    const cur = this.projects.get(id);
    if (!cur) throw new AppError('NOT_FOUND', `project ${id} not found`);
    const next = { ...cur, ...patch };
    this.projects.set(id, copy(next));
    return copy(next);
  }

  async deleteProject(id: string) {
    this.projects.delete(id);
  }

  async findProject(organizationId: string, slug: string) {
    for (const p of this.projects.values()) {
      if (p.organizationId === organizationId && p.slug === slug) return copy(p);
    }
    return undefined;
  }

  async projectSlugExists(organizationId: string, slug: string) {
    for (const p of this.projects.values()) {
      if (p.organizationId === organizationId && p.slug === slug) return true;
    }
    return false;
  }

  async listProjects(organizationId: string) {
    return [...this.projects.values()]
      .filter((p) => p.organizationId === organizationId && p.archivedAt === null)
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
      .map(copy);
  }

  async health(): Promise<StoreHealth> {
    return { ok: true, details: { users: this.users.size, organizations: this.organizations.size } };
  }
}
