// packages/organizations/src/index.ts
import { randomUUID } from 'node:crypto';
import type {
  Clock, MemberRole, Organization, OrganizationMember, Store, User,
} from '@erdbase/core';
import {
  Errors, MemberAttrsSchema, OrganizationAttrsSchema, OrganizationPatchSchema,
  parseAttrs, slugify, uniqueSlug,
} from '@erdbase/core';

const ROLE_RANK: Record<MemberRole, number> = { reader: 0, writer: 1, owner: 2 };

export function roleAtLeast(role: MemberRole, min: MemberRole): boolean {
  return ROLE_RANK[role] >= ROLE_RANK[min];
}

export interface Membership {
  organization: Organization;
  member: OrganizationMember;
}

export class OrganizationsService {
  constructor(private store: Store, private now: Clock = () => new Date()) {}

  private freeSlug(base: string) {
    return uniqueSlug(slugify(base, 'organization'), (s) => this.store.organizationSlugExists(s));
  }

  private async insertWithOwner(
    user: User,
    fields: Pick<Organization, 'name' | 'logo' | 'description' | 'isPersonal'>,
    slugBase: string
  ): Promise<Organization> {
    const now = this.now();
    const org = await this.store.insertOrganization({
      id: randomUUID(),
      slug: await this.freeSlug(slugBase),
      ...fields,
      createdBy: user.id,
      createdAt: now,
      updatedAt: now,
      deletedAt: null,
    });
    await this.store.insertMember({
      organizationId: org.id, userId: user.id, role: 'owner', createdBy: user.id, createdAt: now,
    });
    return org;
  }

  /** every user owns one; it mirrors their name and avatar */
  createPersonal(user: User): Promise<Organization> {
    return this.insertWithOwner(
      user,
      { name: user.name, logo: user.avatar, description: null, isPersonal: true },
      user.slug
    );
  }

  create(user: User, attrs: unknown): Promise<Organization> {
    const a = parseAttrs(OrganizationAttrsSchema, attrs);
    return this.insertWithOwner(
      user,
      { name: a.name, logo: a.logo ?? null, description: a.description ?? null, isPersonal: false },
      a.name
    );
  }

  listForUser(user: User): Promise<Organization[]> {
    return this.store.listOrganizationsForUser(user.id);
  }

  /**
   * Resolves an organization the user belongs to, with at least `min` role.
   * Non-members get NOT_FOUND so slugs of other organizations do not leak.
   */
  async access(user: User, slug: string, min: MemberRole = 'reader'): Promise<Membership> {
    const organization = await this.store.findOrganizationBySlug(slug);
    const member = organization && await this.store.findMember(organization.id, user.id);
    if (!organization || !member) throw Errors.NOT_FOUND(`organization ${slug}`);
    if (!roleAtLeast(member.role, min)) throw Errors.FORBIDDEN(`requires ${min} role`);
    return { organization, member };
  }

  async get(user: User, slug: string): Promise<Organization> {
    return (await this.access(user, slug)).organization;
  }

  async update(user: User, slug: string, attrs: unknown): Promise<Organization> {
    const { organization } = await this.access(user, slug, 'owner');
    const a = parseAttrs(OrganizationPatchSchema, attrs);
    return this.store.updateOrganization(organization.id, {
      ...(a.name !== undefined ? { name: a.name } : {}),
      ...(a.logo !== undefined ? { logo: a.logo } : {}),
      ...(a.description !== undefined ? { description: a.description } : {}),
      updatedAt: this.now(),
    });
  }

  async delete(user: User, slug: string): Promise<void> {
    const { organization } = await this.access(user, slug, 'owner');
    if (organization.isPersonal) throw Errors.CONFLICT('personal organizations cannot be deleted');
    const now = this.now();
    await this.store.updateOrganization(organization.id, { deletedAt: now, updatedAt: now });
  }

  async listMembers(user: User, slug: string): Promise<OrganizationMember[]> {
    const { organization } = await this.access(user, slug);
    return this.store.listMembers(organization.id);
  }

  async addMember(user: User, slug: string, attrs: unknown): Promise<OrganizationMember> {
    const { organization } = await this.access(user, slug, 'owner');
    if (organization.isPersonal) throw Errors.CONFLICT('personal organizations have a single member');
    const a = parseAttrs(MemberAttrsSchema, attrs);
    const invited = await this.store.findUserByEmail(a.email);
    if (!invited || invited.deletedAt) throw Errors.NOT_FOUND(`user ${a.email}`);
    if (await this.store.findMember(organization.id, invited.id)) {
      throw Errors.CONFLICT(`${a.email} is already a member`);
    }
    const member: OrganizationMember = {
      organizationId: organization.id,
      userId: invited.id,
      role: a.role,
      createdBy: user.id,
      createdAt: this.now(),
    };
    await this.store.insertMember(member);
    return member;
  }

  async removeMember(user: User, slug: string, userId: string): Promise<void> {
    const { organization } = await this.access(user, slug, 'owner');
    const members = await this.store.listMembers(organization.id);
    const target = members.find((m) => m.userId === userId);
    if (!target) throw Errors.NOT_FOUND(`member ${userId}`);
    if (target.role === 'owner' && members.filter((m) => m.role === 'owner').length === 1) {
      throw Errors.CONFLICT('an organization needs at least one owner');
    }
    await this.store.deleteMember(organization.id, userId);
  }
}
