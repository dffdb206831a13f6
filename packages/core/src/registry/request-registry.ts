import type { HttpVerb } from '../types/request.js';

/**
 * Deterministic identifier for a request. Two dispatches with the same verb
 * and URL share it, which is what lets `cancelGET(path)` reach every GET in
 * flight for that path.
 */
export function identifierFor(verb: HttpVerb, url: URL | string): string {
  const href = typeof url === 'string' ? url : url.href;
  return `${verb} ${href}`;
}

interface RegistryEntry {
  controller: AbortController;
  members: number;
}

/**
 * Membership of one dispatch in a registry entry. `signal` aborts when the
 * entry is cancelled.
 */
export interface RegistryLease {
  readonly id: string;
  readonly signal: AbortSignal;
  /** Set once the lease has been released. */
  readonly completed: boolean;
}

class Lease implements RegistryLease {
  completed = false;

  constructor(
    readonly id: string,
    readonly entry: RegistryEntry,
  ) {}

  get signal(): AbortSignal {
    return this.entry.controller.signal;
  }
}

/**
 * Tracks in-flight requests by identifier.
 *
 * There is at most one live entry per identifier. A dispatch whose
 * identifier is already live joins that entry: it keeps its own transport
 * call but shares the entry's cancellation scope. The entry is dropped when
 * its last member deregisters, or immediately when it is cancelled.
 */
export class RequestRegistry {
  private entries = new Map<string, RegistryEntry>();

  get size(): number {
    return this.entries.size;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  register(id: string): RegistryLease {
    let entry = this.entries.get(id);
    if (!entry) {
      entry = { controller: new AbortController(), members: 0 };
      this.entries.set(id, entry);
    }
    entry.members += 1;
    return new Lease(id, entry);
  }

  deregister(lease: RegistryLease): void {
    if (!(lease instanceof Lease) || lease.completed) return;
    lease.completed = true;

    const entry = lease.entry;
    entry.members -= 1;
    // A cancelled entry may already have been replaced by a newer one
    if (entry.members <= 0 && this.entries.get(lease.id) === entry) {
      this.entries.delete(lease.id);
    }
  }

  /**
   * Abort the live entry for `id`. Returns false when nothing is in flight
   * under that identifier.
   */
  cancel(id: string, reason?: unknown): boolean {
    const entry = this.entries.get(id);
    if (!entry) return false;

    this.entries.delete(id);
    entry.controller.abort(reason);
    return true;
  }

  /** Cancel every live entry and return how many were cancelled. */
  cancelAll(reason?: unknown): number {
    const ids = [...this.entries.keys()];
    for (const id of ids) this.cancel(id, reason);
    return ids.length;
  }
}
