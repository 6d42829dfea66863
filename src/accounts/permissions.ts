export const PERMISSIONS = [
  'lead:add',
  'lead:view',
  'lead:change',
  'lead:delete',
  'lead:assign',
  'product:view',
  'client:view',
  'form:view',
  'form:add',
  'agent:add',
  'agent:view',
  'agent:change',
  'user:view',
] as const;

export type Permission = (typeof PERMISSIONS)[number];

export const ROLE_SUPER_ADMINISTRATOR = 'Super Administrator';
export const ROLE_ADMIN = 'Admin';
export const ROLE_AGENT = 'Agent';
export const ROLE_NEW_USER = 'New User';

/**
 * Version-controlled role definitions. The seeder overwrites stored
 * permissions with these on every run.
 */
export const ROLE_DEFINITIONS: Record<string, readonly Permission[]> = {
  [ROLE_SUPER_ADMINISTRATOR]: PERMISSIONS,
  [ROLE_ADMIN]: [
    'lead:add',
    'lead:view',
    'lead:change',
    'lead:delete',
    'lead:assign',
    'product:view',
    'client:view',
    'form:view',
    'form:add',
    'agent:add',
    'agent:view',
    'agent:change',
    'user:view',
  ],
  [ROLE_AGENT]: [
    'lead:add',
    'lead:view',
    'lead:change',
    // Own drafts only; see LeadsService.remove.
    'lead:delete',
    'product:view',
    'client:view',
    'form:view',
  ],
  // No permissions until promoted.
  [ROLE_NEW_USER]: [],
};
