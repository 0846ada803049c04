export const USER_ROLES = ['super_admin', 'admin', 'staff'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export type AuthorizationRequirement = UserRole | readonly UserRole[];

export const SUPER_ADMIN_ONLY: readonly UserRole[] = ['super_admin'];
export const ADMIN_ROLES: readonly UserRole[] = ['super_admin', 'admin'];
export const STAFF_ROLES: readonly UserRole[] = ['super_admin', 'admin', 'staff'];

/** Who issued or edited a document, stamped as `created_by`. */
export type Identity = {
  userId: string;
  name: string;
  email: string;
};

export function identityFromUser(user: { sub: string; name: string; email: string }): Identity {
  return { userId: user.sub, name: user.name, email: user.email };
}
