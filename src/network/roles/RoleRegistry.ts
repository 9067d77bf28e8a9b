/**
 * RoleRegistry - role name → NetworkRole
 */

import { Logger } from '../core/Logger';
import { UnknownRoleError } from '../core/errors';
import { CleanRole, IsolateRole, NetworkRole, ProxyRole } from './NetworkRole';

export class RoleRegistry {
  private readonly roles: Map<string, NetworkRole> = new Map();

  register(role: NetworkRole): this {
    this.roles.set(role.name, role);
    return this;
  }

  /** Throws UnknownRoleError for names nobody registered */
  get(name: string): NetworkRole {
    const role = this.roles.get(name);
    if (!role) throw new UnknownRoleError(name, this.availableRoles());
    return role;
  }

  has(name: string): boolean {
    return this.roles.has(name);
  }

  availableRoles(): string[] {
    return [...this.roles.keys()].sort();
  }
}

export function createDefaultRegistry(logger: Logger): RoleRegistry {
  return new RoleRegistry()
    .register(new ProxyRole(logger))
    .register(new CleanRole(logger))
    .register(new IsolateRole(logger));
}
