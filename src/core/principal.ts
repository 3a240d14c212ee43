/**
 * Principal lifecycle helpers.
 *
 * Principals are immutable values; every mutation returns a new object with
 * `updatedAt` bumped, or the same object when nothing changed.
 */

import { randomUUID } from 'node:crypto';
import { DEFAULT_ROLES } from './types.js';
import type { Principal, PrincipalView } from './types.js';
import { IdentityErrors } from '../utils/errors.js';

export interface NewPrincipal {
  username: string;
  email: string;
  passwordHash: string;
  roles?: readonly string[];
}

export function createPrincipal(input: NewPrincipal, now: Date = new Date()): Principal {
  const roles = input.roles && input.roles.length > 0 ? input.roles : DEFAULT_ROLES;

  return {
    id: randomUUID(),
    username: input.username,
    email: input.email,
    passwordHash: input.passwordHash,
    roles: [...new Set(roles)],
    active: true,
    createdAt: now,
    updatedAt: now,
  };
}

export function hasRole(principal: Principal, role: string): boolean {
  return principal.roles.includes(role);
}

export function grantRole(principal: Principal, role: string, now: Date = new Date()): Principal {
  if (hasRole(principal, role)) {
    return principal;
  }
  return { ...principal, roles: [...principal.roles, role], updatedAt: now };
}

/**
 * @throws {IdentityError} VALIDATION_FAILED when the role is the last one held
 */
export function revokeRole(principal: Principal, role: string, now: Date = new Date()): Principal {
  if (!hasRole(principal, role)) {
    return principal;
  }
  const roles = principal.roles.filter((r) => r !== role);
  if (roles.length === 0) {
    throw IdentityErrors.VALIDATION_FAILED(['Principal must keep at least one role']);
  }
  return { ...principal, roles, updatedAt: now };
}

export function setActive(principal: Principal, active: boolean, now: Date = new Date()): Principal {
  if (principal.active === active) {
    return principal;
  }
  return { ...principal, active, updatedAt: now };
}

export function toPrincipalView(principal: Principal): PrincipalView {
  return {
    id: principal.id,
    username: principal.username,
    email: principal.email,
    roles: [...principal.roles],
    is_active: principal.active,
    created_at: principal.createdAt.toISOString(),
    updated_at: principal.updatedAt.toISOString(),
  };
}
