import { randomUUID } from 'crypto';

export interface SessionLease {
  leaseId: string;
  acquiredAt: Date;
}

/**
 * Grants at most one outstanding session lease per account identity.
 * All methods are synchronous, so two workers on the event loop can never
 * interleave inside acquire().
 */
export class SessionGate {
  private readonly leases = new Map<string, SessionLease>();

  acquire(accountId: string): boolean {
    if (this.leases.has(accountId)) {
      return false;
    }
    this.leases.set(accountId, { leaseId: randomUUID(), acquiredAt: new Date() });
    return true;
  }

  /** No-op when no lease is held */
  release(accountId: string): void {
    this.leases.delete(accountId);
  }

  isActive(accountId: string): boolean {
    return this.leases.has(accountId);
  }

  getLease(accountId: string): SessionLease | undefined {
    const lease = this.leases.get(accountId);
    return lease ? { ...lease } : undefined;
  }

  listActive(): ReadonlySet<string> {
    return new Set(this.leases.keys());
  }
}

let sessionGate: SessionGate | null = null;

export function getSessionGate(): SessionGate {
  if (!sessionGate) {
    sessionGate = new SessionGate();
  }
  return sessionGate;
}
