import { ForbiddenException, Injectable, Logger } from '@nestjs/common';
import type { Permission } from './permissions';
import type { User } from './user.entity';

export type Action = Permission;

/** Anything owned by an agent (leads today). */
export interface AgentOwnedResource {
  agentId: number | null;
}

export type Actor = Pick<
  User,
  'id' | 'isActive' | 'isStaff' | 'isSuperuser' | 'userType' | 'roles'
> & {
  agent?: { id: number } | null;
};

/**
 * Single authorization decision point. Controllers and services ask
 * `can`/`assert` instead of checking roles or staff flags themselves.
 */
@Injectable()
export class AccessPolicy {
  private readonly logger = new Logger(AccessPolicy.name);

  can(actor: Actor, action: Action, resource?: AgentOwnedResource): boolean {
    if (!actor.isActive) {
      return false;
    }

    // Leads are always filed under an agent profile, superusers included.
    if (action === 'lead:add' && !actor.agent) {
      return false;
    }

    if (actor.isSuperuser) {
      return true;
    }

    if (!this.permissionsOf(actor).has(action)) {
      return false;
    }

    if (resource && !this.isStaff(actor)) {
      return (
        resource.agentId !== null && resource.agentId === actor.agent?.id
      );
    }

    return true;
  }

  assert(actor: Actor, action: Action, resource?: AgentOwnedResource): void {
    if (!this.can(actor, action, resource)) {
      this.logger.warn(`Denied ${action} for user ${actor.id}`);
      throw new ForbiddenException(
        `You do not have permission to perform ${action}`,
      );
    }
  }

  /** Staff see every agent's records. */
  isStaff(actor: Actor): boolean {
    return (
      actor.isStaff ||
      actor.isSuperuser ||
      actor.userType === 'admin' ||
      actor.userType === 'superuser'
    );
  }

  /**
   * Agent id the actor's queries are limited to: `null` for staff
   * (unrestricted), `undefined` when the actor owns nothing.
   */
  scopeFor(actor: Actor): number | null | undefined {
    if (this.isStaff(actor)) {
      return null;
    }
    return actor.agent?.id;
  }

  private permissionsOf(actor: Actor): Set<Permission> {
    const permissions = new Set<Permission>();
    for (const role of actor.roles ?? []) {
      role.permissions.forEach((permission) => permissions.add(permission));
    }
    return permissions;
  }
}
