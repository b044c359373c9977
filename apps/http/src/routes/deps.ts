// apps/http/src/routes/deps.ts
import type { Store } from '@erdbase/core';
import type { AccountsService } from '@erdbase/accounts';
import type { OrganizationsService } from '@erdbase/organizations';
import type { ProjectsService } from '@erdbase/projects';
import type { Auth } from '../auth';

export type RouteDeps = {
  store: Store;
  accounts: AccountsService;
  organizations: OrganizationsService;
  projects: ProjectsService;
  auth: Auth;
};
