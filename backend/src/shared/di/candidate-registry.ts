/**
 * backend/src/shared/di/candidate-registry.ts
 *
 * WHY:
 * - Freezes, once at startup, which concrete classes are eligible to satisfy a
 *   capability. The tenant resolver only ever reads this table.
 *
 * HOW TO USE:
 * - const builder = new CandidateRegistryBuilder();
 * - builder.add(GreeterCapability, [AcmeGreeter, GlobexGreeter]);
 * - const registry = builder.build(); // same object on every call
 *
 * RULES:
 * - Discovery order is the only order. It is the tie-break for tenant matching.
 * - An empty candidate list is valid here; the failure surfaces at resolve time.
 * - No container access from this file.
 */

import type { Capability, ServiceClass } from './capability';
import { DiErrors } from './di.errors';

export type CandidateDescriptor = {
  readonly type: ServiceClass<unknown>;
  readonly displayName: string;
};

export type CandidateNameOverrides = ReadonlyMap<ServiceClass<unknown>, string>;

const EMPTY: readonly CandidateDescriptor[] = Object.freeze([]);

function isServiceClass(value: unknown): value is ServiceClass<unknown> {
  return typeof value === 'function';
}

/**
 * Filters a pool down to the classes that implement the capability and describes them.
 * Pool order is kept; a class listed twice keeps its first position.
 */
export function buildCandidates(
  capability: Capability<unknown>,
  pool: Iterable<unknown>,
  names?: CandidateNameOverrides,
): readonly CandidateDescriptor[] {
  const seen = new Set<ServiceClass<unknown>>();
  const out: CandidateDescriptor[] = [];

  for (const entry of pool) {
    if (!isServiceClass(entry)) continue;
    if (seen.has(entry)) continue;
    if (!capability.isSatisfiedBy(entry)) continue;

    seen.add(entry);
    out.push(Object.freeze({ type: entry, displayName: names?.get(entry) ?? entry.name }));
  }

  return Object.freeze(out);
}

export class CandidateRegistry {
  constructor(
    private readonly table: ReadonlyMap<symbol, readonly CandidateDescriptor[]>,
    private readonly names: readonly string[],
  ) {}

  candidatesFor(capability: Capability<unknown>): readonly CandidateDescriptor[] {
    return this.table.get(capability.id) ?? EMPTY;
  }

  capabilities(): readonly string[] {
    return this.names;
  }
}

type PendingEntry = {
  capability: Capability<unknown>;
  pool: readonly unknown[];
  names?: CandidateNameOverrides;
};

export class CandidateRegistryBuilder {
  private readonly pending = new Map<symbol, PendingEntry>();
  private built: CandidateRegistry | null = null;

  add(
    capability: Capability<unknown>,
    pool: Iterable<unknown>,
    opts: { names?: CandidateNameOverrides } = {},
  ): this {
    if (this.built) {
      throw DiErrors.registryFrozen({ capability: capability.name });
    }
    if (this.pending.has(capability.id)) {
      throw DiErrors.capabilityAlreadyRegistered({ capability: capability.name });
    }

    // Snapshot now: later mutation of the caller's array must not leak in.
    this.pending.set(capability.id, { capability, pool: [...pool], names: opts.names });
    return this;
  }

  /**
   * Builds the registry on the first call and returns that same instance afterwards.
   */
  build(): CandidateRegistry {
    if (this.built) return this.built;

    const table = new Map<symbol, readonly CandidateDescriptor[]>();
    const names: string[] = [];

    for (const [id, entry] of this.pending) {
      table.set(id, buildCandidates(entry.capability, entry.pool, entry.names));
      names.push(entry.capability.name);
    }

    this.built = new CandidateRegistry(table, Object.freeze(names));
    return this.built;
  }
}
