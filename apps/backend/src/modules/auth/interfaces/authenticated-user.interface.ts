import { Role } from '@modules/access/enums/role.enum';

/** Caller identity decoded from the bearer token. */
export interface AuthenticatedUser {
  id: string;
  username: string;
  displayName: string;
  email?: string;
  roles: Role[];
}
