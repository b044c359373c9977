// packages/store-mysql/src/schema.ts
// Table shapes as Kysely sees them. Names are camelCase here; CamelCasePlugin
// turns them into the snake_case columns MySQL holds.
import { sql, type ColumnType, type Kysely } from 'kysely';
import type { AuthProvider, MemberRole, StorageKind, TokenContext } from '@erdbase/core';

// TINYINT(1): written as booleans, read back as 0/1
type Flag = ColumnType<number, boolean, boolean>;

export interface UsersTable {
  id: string;
  slug: string;
  name: string;
  email: string;
  provider: AuthProvider | null;
  providerUid: string | null;
  avatar: string;
  company: string | null;
  location: string | null;
  description: string | null;
  githubUsername: string | null;
  twitterUsername: string | null;
  isAdmin: Flag;
  hashedPassword: string | null;
  lastSignin: Date;
  createdAt: Date;
  updatedAt: Date;
  confirmedAt: Date | null;
  deletedAt: Date | null;
}

export interface UserTokensTable {
  id: string;
  userId: string;
  token: string;
  context: TokenContext;
  sentTo: string | null;
  createdAt: Date;
}

export interface OrganizationsTable {
  id: string;
  slug: string;
  name: string;
  logo: string | null;
  description: string | null;
  isPersonal: Flag;
  createdBy: string;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

export interface OrganizationMembersTable {
  organizationId: string;
  userId: string;
  role: MemberRole;
  createdBy: string;
  createdAt: Date;
}

export interface ProjectsTable {
  id: string;
  organizationId: string;
  slug: string;
  name: string;
  description: string | null;
  storageKind: StorageKind;
  content: string | null;
  nbSources: number;
  nbTables: number;
  nbColumns: number;
  nbRelations: number;
  createdBy: string;
  updatedBy: string;
  createdAt: Date;
  updatedAt: Date;
  archivedAt: Date | null;
}

export interface Database {
  users: UsersTable;
  userTokens: UserTokensTable;
  organizations: OrganizationsTable;
  organizationMembers: OrganizationMembersTable;
  projects: ProjectsTable;
}

const uuid = sql`char(36)`;
const timestamp = sql`datetime(6)`;

/** creates missing tables; safe to run on every boot */
export async function migrate(db: Kysely<Database>): Promise<void> {
  await db.schema.createTable('users').ifNotExists()
    .addColumn('id', uuid, (c) => c.primaryKey())
    .addColumn('slug', 'varchar(255)', (c) => c.notNull().unique())
    .addColumn('name', 'varchar(255)', (c) => c.notNull())
    .addColumn('email', 'varchar(160)', (c) => c.notNull().unique())
    .addColumn('provider', 'varchar(32)')
    .addColumn('providerUid', 'varchar(255)')
    .addColumn('avatar', 'varchar(255)', (c) => c.notNull())
    .addColumn('company', 'varchar(255)')
    .addColumn('location', 'varchar(255)')
    .addColumn('description', 'text')
    .addColumn('githubUsername', 'varchar(255)')
    .addColumn('twitterUsername', 'varchar(255)')
    .addColumn('isAdmin', 'boolean', (c) => c.notNull().defaultTo(false))
    .addColumn('hashedPassword', 'varchar(255)')
    .addColumn('lastSignin', timestamp, (c) => c.notNull())
    .addColumn('createdAt', timestamp, (c) => c.notNull())
    .addColumn('updatedAt', timestamp, (c) => c.notNull())
    .addColumn('confirmedAt', timestamp)
    .addColumn('deletedAt', timestamp)
    .execute();

  await db.schema.createTable('userTokens').ifNotExists()
    .addColumn('id', uuid, (c) => c.primaryKey())
    .addColumn('userId', uuid, (c) => c.notNull())
    .addColumn('token', 'varchar(64)', (c) => c.notNull())
    .addColumn('context', 'varchar(255)', (c) => c.notNull())
    .addColumn('sentTo', 'varchar(160)')
    .addColumn('createdAt', timestamp, (c) => c.notNull())
    .addUniqueConstraint('user_tokens_context_token_unique', ['context', 'token'])
    .addForeignKeyConstraint('user_tokens_user_fk', ['userId'], 'users', ['id'], (fk) => fk.onDelete('cascade'))
    .execute();

  await db.schema.createTable('organizations').ifNotExists()
    .addColumn('id', uuid, (c) => c.primaryKey())
    .addColumn('slug', 'varchar(255)', (c) => c.notNull().unique())
    .addColumn('name', 'varchar(120)', (c) => c.notNull())
    .addColumn('logo', 'varchar(255)')
    .addColumn('description', 'text')
    .addColumn('isPersonal', 'boolean', (c) => c.notNull().defaultTo(false))
    .addColumn('createdBy', uuid, (c) => c.notNull())
    .addColumn('createdAt', timestamp, (c) => c.notNull())
    .addColumn('updatedAt', timestamp, (c) => c.notNull())
    .addColumn('deletedAt', timestamp)
    .addForeignKeyConstraint('organizations_created_by_fk', ['createdBy'], 'users', ['id'])
    .execute();

  await db.schema.createTable('organizationMembers').ifNotExists()
    .addColumn('organizationId', uuid, (c) => c.notNull())
    .addColumn('userId', uuid, (c) => c.notNull())
    .addColumn('role', 'varchar(16)', (c) => c.notNull())
    .addColumn('createdBy', uuid, (c) => c.notNull())
    .addColumn('createdAt', timestamp, (c) => c.notNull())
    .addPrimaryKeyConstraint('organization_members_pk', ['organizationId', 'userId'])
    .addForeignKeyConstraint('organization_members_org_fk', ['organizationId'], 'organizations', ['id'], (fk) => fk.onDelete('cascade'))
    .addForeignKeyConstraint('organization_members_user_fk', ['userId'], 'users', ['id'], (fk) => fk.onDelete('cascade'))
    .execute();

  await db.schema.createTable('projects').ifNotExists()
    .addColumn('id', uuid, (c) => c.primaryKey())
    .addColumn('organizationId', uuid, (c) => c.notNull())
    .addColumn('slug', 'varchar(255)', (c) => c.notNull())
    .addColumn('name', 'varchar(120)', (c) => c.notNull())
    .addColumn('description', 'text')
    .addColumn('storageKind', 'varchar(16)', (c) => c.notNull())
    .addColumn('content', sql`longtext`)
    .addColumn('nbSources', 'integer', (c) => c.notNull().defaultTo(0))
    .addColumn('nbTables', 'integer', (c) => c.notNull().defaultTo(0))
    .addColumn('nbColumns', 'integer', (c) => c.notNull().defaultTo(0))
    .addColumn('nbRelations', 'integer', (c) => c.notNull().defaultTo(0))
    .addColumn('createdBy', uuid, (c) => c.notNull())
    .addColumn('updatedBy', uuid, (c) => c.notNull())
    .addColumn('createdAt', timestamp, (c) => c.notNull())
    .addColumn('updatedAt', timestamp, (c) => c.notNull())
    .addColumn('archivedAt', timestamp)
    .addUniqueConstraint('projects_org_slug_unique', ['organizationId', 'slug'])
    .addForeignKeyConstraint('projects_org_fk', ['organizationId'], 'organizations', ['id'], (fk) => fk.onDelete('cascade'))
    .execute();
}
