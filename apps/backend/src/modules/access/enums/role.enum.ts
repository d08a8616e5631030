export enum Role {
  USER = 'user',
  MODERATOR = 'moderator',
  ADMIN = 'admin',
}

const ROLE_VALUES: readonly string[] = Object.values(Role);

export function isRole(value: string): value is Role {
  return ROLE_VALUES.includes(value);
}

/**
 * Normalises role names coming from tokens or the identity service.
 * Matching is case-insensitive and unknown names are dropped.
 */
export function parseRoles(values: readonly string[]): Role[] {
  const roles = new Set<Role>();
  for (const value of values) {
    const normalised = value.trim().toLowerCase();
    if (isRole(normalised)) {
      roles.add(normalised);
    }
  }
  return [...roles];
}
