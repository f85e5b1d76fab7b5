import { GasOptimizerError } from '../utils/errors';
import { logger } from '../utils/logger';

export type Role = 'admin' | 'keeper';

/**
 * Proof of a role, handed to every mutating call. Only capabilities issued by
 * the same {@link AccessControl} and not yet revoked are honoured; a structurally
 * identical object built by hand is rejected.
 */
export interface Capability {
  readonly role: Role;
  readonly holder: string;
}

export class AccessControl {
  private readonly issued = new WeakSet<Capability>();
  private readonly revoked = new WeakSet<Capability>();
  private keeper: Capability | null = null;
  private adminIssued = false;

  /** Creates the root admin capability. Callable once per instance. */
  issueAdmin(holder: string): Capability {
    if (this.adminIssued) {
      throw new GasOptimizerError('Unauthorized', 'Admin capability has already been issued');
    }
    this.adminIssued = true;
    return this.issue('admin', holder);
  }

  grantAdmin(admin: Capability, holder: string): Capability {
    this.requireRole(admin, 'admin');
    logger.info('Admin capability granted', { by: admin.holder, holder });
    return this.issue('admin', holder);
  }

  revoke(admin: Capability, capability: Capability): void {
    this.requireRole(admin, 'admin');
    this.revoked.add(capability);
    if (this.keeper === capability) {
      this.keeper = null;
    }
    logger.info('Capability revoked', { by: admin.holder, role: capability.role, holder: capability.holder });
  }

  /**
   * Revokes the current keeper and issues a new one. At most one keeper
   * capability is valid at any time.
   */
  rotateKeeper(admin: Capability, holder: string): Capability {
    this.requireRole(admin, 'admin');
    if (this.keeper) {
      this.revoked.add(this.keeper);
    }
    this.keeper = this.issue('keeper', holder);
    logger.info('Keeper rotated', { by: admin.holder, holder });
    return this.keeper;
  }

  currentKeeper(): string | null {
    return this.keeper ? this.keeper.holder : null;
  }

  hasRole(capability: Capability, role: Role): boolean {
    return this.issued.has(capability) && !this.revoked.has(capability) && capability.role === role;
  }

  requireRole(capability: Capability, role: Role): void {
    if (!this.hasRole(capability, role)) {
      throw new GasOptimizerError('Unauthorized', `Caller does not hold a valid ${role} capability`, {
        role,
        holder: capability.holder,
      });
    }
  }

  private issue(role: Role, holder: string): Capability {
    const capability: Capability = Object.freeze({ role, holder });
    this.issued.add(capability);
    return capability;
  }
}
