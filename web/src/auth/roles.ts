/**
 * Roles and what they may do
 *
 * Every route names the capability it needs; the table below is the only
 * place a role is mapped to permissions.
 */

export const ROLES = ['admin', 'teacher', 'student'] as const;
export type Role = typeof ROLES[number];

export const CAPABILITIES = [
  'patterns:read',
  'patterns:write',
  'lessons:read',
  'lessons:write',
  'attendance:write',
  'schedule:read',
  'schedule:generate',
] as const;
export type Capability = typeof CAPABILITIES[number];

const ROLE_CAPABILITIES: Record<Role, readonly Capability[]> = {
  admin: CAPABILITIES,
  teacher: [
    'patterns:read',
    'patterns:write',
    'lessons:read',
    'lessons:write',
    'attendance:write',
    'schedule:read',
  ],
  student: ['lessons:read', 'schedule:read'],
};

export function hasCapability(role: Role, capability: Capability): boolean {
  return ROLE_CAPABILITIES[role].includes(capability);
}
