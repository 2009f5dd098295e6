import type {
  CredentialRecord,
  CredentialRegistry,
  EndpointTable,
  KeyState,
  KeyStateService,
  LocationRecord,
} from '../types/keri.js';

/** plain data behind a MemoryKeyStateStore */
export interface KeyStateSnapshot {
  states?: Record<string, KeyState>;
  /** witness AID -> its known locations */
  locations?: Record<string, LocationRecord[]>;
  roleEndpoints?: Record<string, EndpointTable>;
  witnessEndpoints?: Record<string, EndpointTable>;
  localIdentities?: string[];
  credentials?: CredentialRecord[];
}

/**
 * Key state and credential registry held in memory.
 *
 * Async loaders fill one of these before synthesis, so resolution itself runs
 * over data that can't change underneath it.
 */
export class MemoryKeyStateStore implements KeyStateService, CredentialRegistry {
  private readonly states: ReadonlyMap<string, KeyState>;
  private readonly locations: ReadonlyMap<string, LocationRecord[]>;
  private readonly roleEndpoints: ReadonlyMap<string, EndpointTable>;
  private readonly witnessEndpoints: ReadonlyMap<string, EndpointTable>;
  private readonly localIdentities: ReadonlySet<string>;
  private readonly credentials: readonly CredentialRecord[];

  constructor(snapshot: KeyStateSnapshot = {}) {
    this.states = new Map(Object.entries(snapshot.states ?? {}));
    this.locations = new Map(Object.entries(snapshot.locations ?? {}));
    this.roleEndpoints = new Map(Object.entries(snapshot.roleEndpoints ?? {}));
    this.witnessEndpoints = new Map(Object.entries(snapshot.witnessEndpoints ?? {}));
    this.localIdentities = new Set(snapshot.localIdentities ?? []);
    this.credentials = [...(snapshot.credentials ?? [])];
  }

  getState(aid: string): KeyState | null {
    return this.states.get(aid) ?? null;
  }

  getWitnessLocations(witness: string): LocationRecord[] {
    return [...(this.locations.get(witness) ?? [])];
  }

  getRoleEndpoints(aid: string): EndpointTable {
    return this.roleEndpoints.get(aid) ?? {};
  }

  getWitnessEndpoints(aid: string): EndpointTable {
    return this.witnessEndpoints.get(aid) ?? {};
  }

  hasLocalIdentity(aid: string): boolean {
    return this.localIdentities.has(aid);
  }

  findSelfAttested(aid: string, schema: string): CredentialRecord[] {
    return this.credentials.filter(
      c => c.issuer === aid && c.schema === schema && (c.issuee === undefined || c.issuee === aid),
    );
  }
}
