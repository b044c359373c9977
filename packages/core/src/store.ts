// packages/core/src/store.ts
import type {
  Organization, OrganizationMember, Project, TokenContext, User, UserToken,
} from './types';

export type UserPatch = Partial<Omit<User, 'id' | 'createdAt'>>;
export type OrganizationPatchRow = Partial<Omit<Organization, 'id' | 'createdAt' | 'createdBy' | 'isPersonal'>>;
export type ProjectPatchRow = Partial<Omit<Project, 'id' | 'organizationId' | 'createdAt' | 'createdBy'>>;

export const USER_SEARCH_FIELDS = [
  'slug', 'name', 'email', 'company', 'location', 'description', 'githubUsername', 'twitterUsername',
] as const satisfies readonly (keyof User)[];

export interface StoreHealth { ok: boolean; details?: Record<string, unknown> }

/**
 * Persistence for accounts, organizations and projects.
 * Lookups return deleted rows too; callers decide what a soft delete means,
 * except `searchUsers`, `findOrganizationBySlug` and `listOrganizationsForUser`
 * which skip them.
 */
export interface Store {
  name: 'mysql' | 'memory';

  insertUser(user: User): Promise<User>;
  updateUser(id: string, patch: UserPatch): Promise<User>;
  findUserById(id: string): Promise<User | undefined>;
  findUserByEmail(email: string): Promise<User | undefined>;
  userSlugExists(slug: string): Promise<boolean>;
  searchUsers(query: string, limit: number): Promise<User[]>;

  insertToken(token: UserToken): Promise<void>;
  findToken(digest: string, context: TokenContext): Promise<UserToken | undefined>;
  deleteToken(digest: string, context: TokenContext): Promise<void>;
  /** every token of the user, or only those in `contexts` */
  deleteTokens(userId: string, contexts?: TokenContext[]): Promise<void>;

  insertOrganization(org: Organization): Promise<Organization>;
  updateOrganization(id: string, patch: OrganizationPatchRow): Promise<Organization>;
  findOrganizationBySlug(slug: string): Promise<Organization | undefined>;
  organizationSlugExists(slug: string): Promise<boolean>;
  listOrganizationsForUser(userId: string): Promise<Organization[]>;

  insertMember(member: OrganizationMember): Promise<void>;
  deleteMember(organizationId: string, userId: string): Promise<void>;
  findMember(organizationId: string, userId: string): Promise<OrganizationMember | undefined>;
  listMembers(organizationId: string): Promise<OrganizationMember[]>;

  insertProject(project: Project): Promise<Project>;
  updateProject(id: string, patch: ProjectPatchRow): Promise<Project>;
  deleteProject(id: string): Promise<void>;
  findProject(organizationId: string, slug: string): Promise<Project | undefined>;
  projectSlugExists(organizationId: string, slug: string): Promise<boolean>;
  /** non-archived projects, most recently updated first */
  listProjects(organizationId: string): Promise<Project[]>;

  health(): Promise<StoreHealth>;
}
