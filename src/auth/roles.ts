import {
  RESOURCE_CATEGORIES,
  ResourceCategory,
} from '../resource/entities/resource.entity';

export const ROLES = [
  'SUPER_ADMIN',
  'ADMIN',
  'MANAGER',
  'TECHNICIAN',
  'USER',
] as const;

export type Role = (typeof ROLES)[number];

export type Capability =
  | 'booking:create'
  | 'booking:read'
  | 'booking:approve'
  | 'resource:manage';

export const isRole = (value: unknown): value is Role =>
  ROLES.some((role) => role === value);

const ALL_CAPABILITIES: ReadonlySet<Capability> = new Set<Capability>([
  'booking:create',
  'booking:read',
  'booking:approve',
  'resource:manage',
]);

export const ROLE_CAPABILITIES: Record<Role, ReadonlySet<Capability>> = {
  SUPER_ADMIN: ALL_CAPABILITIES,
  ADMIN: ALL_CAPABILITIES,
  MANAGER: new Set<Capability>([
    'booking:create',
    'booking:read',
    'booking:approve',
  ]),
  TECHNICIAN: new Set<Capability>(['booking:create', 'booking:read']),
  USER: new Set<Capability>(['booking:create', 'booking:read']),
};

// Categories each role may approve, consulted only with booking:approve
export const APPROVAL_SCOPES: Record<Role, readonly ResourceCategory[]> = {
  SUPER_ADMIN: RESOURCE_CATEGORIES,
  ADMIN: RESOURCE_CATEGORIES,
  MANAGER: RESOURCE_CATEGORIES,
  TECHNICIAN: [],
  USER: [],
};
