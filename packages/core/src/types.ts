// --------------------
// Accounts
// --------------------
export type AuthProvider = 'github' | 'heroku';

export interface User {
  id: string;
  slug: string;
  name: string;
  email: string;
  provider: AuthProvider | null;   // null = email/password account
  providerUid: string | null;
  avatar: string;
  company: string | null;
  location: string | null;
  description: string | null;
  githubUsername: string | null;
  twitterUsername: string | null;
  isAdmin: boolean;
  hashedPassword: string | null;
  lastSignin: Date;
  createdAt: Date;
  updatedAt: Date;
  confirmedAt: Date | null;
  deletedAt: Date | null;
}

/** what gets sent to clients: never the password hash */
export type PublicUser = Omit<User, 'hashedPassword'>;

export type TokenContext =
  | 'session'
  | 'confirm'
  | 'reset_password'
  | `change:${string}`;

export interface UserToken {
  id: string;
  userId: string;
  token: string;         // sha256 digest of the raw token, base64url
  context: TokenContext;
  sentTo: string | null;
  createdAt: Date;
}

// --------------------
// Organizations
// --------------------
export type MemberRole = 'owner' | 'writer' | 'reader';

export interface Organization {
  id: string;
  slug: string;
  name: string;
  logo: string | null;
  description: string | null;
  isPersonal: boolean;
  createdBy: string;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

export interface OrganizationMember {
  organizationId: string;
  userId: string;
  role: MemberRole;
  createdBy: string;
  createdAt: Date;
}

// --------------------
// Projects
// --------------------
export type StorageKind = 'local' | 'remote';

export interface ProjectStats {
  nbSources: number;
  nbTables: number;
  nbColumns: number;
  nbRelations: number;
}

export interface Project extends ProjectStats {
  id: string;
  organizationId: string;
  slug: string;
  name: string;
  description: string | null;
  storageKind: StorageKind;
  content: string | null;  // JSON text, only for remote projects
  createdBy: string;
  updatedBy: string;
  createdAt: Date;
  updatedAt: Date;
  archivedAt: Date | null;
}

export type Clock = () => Date;
