/* packages/organizations/test/organizations.spec.ts */
import { describe, it, expect, beforeEach } from 'vitest';
import type { User } from '@erdbase/core';
import { roleAtLeast } from '../src';
import { registrationAttrs, setupServices } from '../../../tests/helpers';

type Services = ReturnType<typeof setupServices>;

describe('roleAtLeast', () => {
  it('ranks owner over writer over reader', () => {
    expect(roleAtLeast('owner', 'writer')).toBe(true);
    expect(roleAtLeast('writer', 'writer')).toBe(true);
    expect(roleAtLeast('reader', 'writer')).toBe(false);
  });
});

describe('OrganizationsService', () => {
  let s: Services;
  let ada: User;
  let grace: User;

  beforeEach(async () => {
    s = setupServices();
    ada = await s.accounts.registerWithPassword(registrationAttrs());
    grace = await s.accounts.registerWithPassword(registrationAttrs({ name: 'Grace Hopper', email: 'grace@example.com' }));
  });

  it('creates an organization owned by its creator', async () => {
    const org = await s.organizations.create(ada, { name: 'Acme Corp', description: 'Widgets' });
    expect(org).toMatchObject({ slug: 'acme-corp', isPersonal: false, description: 'Widgets', logo: null, createdBy: ada.id });
    expect(await s.organizations.listMembers(ada, 'acme-corp')).toEqual([
      { organizationId: org.id, userId: ada.id, role: 'owner', createdBy: ada.id, createdAt: s.clock.now() },
    ]);
    expect((await s.organizations.listForUser(ada)).map((o) => o.name)).toEqual(['Acme Corp', 'Ada Lovelace']);
  });

  it('hides organizations from non-members', async () => {
    await s.organizations.create(ada, { name: 'Acme Corp' });
    await expect(s.organizations.get(grace, 'acme-corp')).rejects.toMatchObject({
      code: 'NOT_FOUND', message: 'organization acme-corp not found',
    });
  });

  it('enforces roles', async () => {
    await s.organizations.create(ada, { name: 'Acme Corp' });
    await s.organizations.addMember(ada, 'acme-corp', { email: 'grace@example.com', role: 'reader' });
    expect((await s.organizations.get(grace, 'acme-corp')).name).toBe('Acme Corp');
    await expect(s.organizations.update(grace, 'acme-corp', { name: 'Mine' })).rejects.toMatchObject({
      code: 'FORBIDDEN', message: 'requires owner role',
    });
  });

  it('updates only the given fields', async () => {
    await s.organizations.create(ada, { name: 'Acme Corp', logo: 'acme.png' });
    const org = await s.organizations.update(ada, 'acme-corp', { description: 'Engines' });
    expect(org).toMatchObject({ name: 'Acme Corp', logo: 'acme.png', description: 'Engines' });
  });

  it('validates invitations', async () => {
    await s.organizations.create(ada, { name: 'Acme Corp' });
    await expect(s.organizations.addMember(ada, 'acme-corp', { email: 'grace', role: 'boss' })).rejects.toMatchObject({
      details: { email: ['must have the @ sign and no spaces'], role: ['is invalid'] },
    });
    await expect(s.organizations.addMember(ada, 'acme-corp', { email: 'nobody@example.com', role: 'reader' }))
      .rejects.toMatchObject({ code: 'NOT_FOUND', message: 'user nobody@example.com not found' });
    await s.organizations.addMember(ada, 'acme-corp', { email: 'grace@example.com', role: 'writer' });
    await expect(s.organizations.addMember(ada, 'acme-corp', { email: 'grace@example.com', role: 'reader' }))
      .rejects.toMatchObject({ code: 'CONFLICT', message: 'grace@example.com is already a member' });
  });

  it('keeps at least one owner', async () => {
    await s.organizations.create(ada, { name: 'Acme Corp' });
    await s.organizations.addMember(ada, 'acme-corp', { email: 'grace@example.com', role: 'reader' });
    await expect(s.organizations.removeMember(ada, 'acme-corp', ada.id)).rejects.toMatchObject({
      code: 'CONFLICT', message: 'an organization needs at least one owner',
    });
    await s.organizations.removeMember(ada, 'acme-corp', grace.id);
    expect((await s.organizations.listMembers(ada, 'acme-corp')).map((m) => m.userId)).toEqual([ada.id]);
    await expect(s.organizations.removeMember(ada, 'acme-corp', grace.id)).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });

  it('protects personal organizations', async () => {
    await expect(s.organizations.delete(ada, 'ada-lovelace')).rejects.toMatchObject({ code: 'CONFLICT' });
    await expect(s.organizations.addMember(ada, 'ada-lovelace', { email: 'grace@example.com', role: 'reader' }))
      .rejects.toMatchObject({ message: 'personal organizations have a single member' });
  });

  it('soft deletes', async () => {
    await s.organizations.create(ada, { name: 'Acme Corp' });
    await s.organizations.delete(ada, 'acme-corp');
    await expect(s.organizations.get(ada, 'acme-corp')).rejects.toMatchObject({ code: 'NOT_FOUND' });
    expect((await s.organizations.listForUser(ada)).map((o) => o.slug)).toEqual(['ada-lovelace']);
    // the slug stays reserved
    expect((await s.organizations.create(ada, { name: 'Acme Corp' })).slug).toBe('acme-corp-2');
  });
});
