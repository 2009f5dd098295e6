import type {
  DIDDocument,
  DIDResolutionResult,
  DIDService,
  VerificationMethod,
  WitnessLocation,
} from '../types/did.js';
import type { CredentialRegistry, EndpointTable, KeyState, KeyStateService } from '../types/keri.js';
import { MismatchedIdentifierError, UnknownIdentifierError } from '../utils/errors.js';
import { didTimestamp } from '../utils/timestamps.js';
import { DES_ALIASES_SCHEMA, resolveDesignatedAliases } from './aliases.js';
import { generateVerificationMethods } from './thresholds.js';
import { parseDid } from './uri.js';

export const DID_CONTENT_TYPE = 'application/did+json';

/** collaborators of the synthesizer */
export interface DidDocumentSynthesizerDeps {
  keyStates: KeyStateService;
  registry: CredentialRegistry;
  /** schema SAID of designated aliases credentials (default: the well-known DA schema) */
  designatedAliasesSchema?: string;
  /** source of the `retrieved` timestamp (default: now) */
  clock?: () => Date;
}

/**
 * One service entry per (endpoint AID, role), flattened in enumeration order.
 */
export function addEnds(ends: EndpointTable): DIDService[] {
  return Object.entries(ends).flatMap(([role, eids]) =>
    Object.entries(eids).map(([eid, urls]) => ({
      id: `#${eid}/${role}`,
      type: role,
      serviceEndpoint: { ...urls },
    })),
  );
}

/** the document itself, fields in wire order */
export function genDidDocument(
  did: string,
  vms: VerificationMethod[],
  service: DIDService[],
  alsoKnownAs: string[],
): DIDDocument {
  return { id: did, verificationMethod: vms, service, alsoKnownAs };
}

/**
 * Builds did:webs DID documents and resolution results from key state.
 *
 * Pure over its collaborators -- no network calls, no mutation.
 */
export class DidDocumentSynthesizer {
  private readonly keyStates: KeyStateService;
  private readonly registry: CredentialRegistry;
  private readonly schema: string;
  private readonly clock: () => Date;

  constructor(deps: DidDocumentSynthesizerDeps) {
    this.keyStates = deps.keyStates;
    this.registry = deps.registry;
    this.schema = deps.designatedAliasesSchema ?? DES_ALIASES_SCHEMA;
    this.clock = deps.clock ?? (() => new Date());
  }

  /** the DID document for `did`, which must embed `aid` */
  generateDocument(did: string, aid: string): DIDDocument {
    const state = this.lookup(did, aid);
    return this.assemble(did, aid, state).document;
  }

  /** the document wrapped in resolution and document metadata */
  generateResolutionResult(did: string, aid: string): DIDResolutionResult {
    const state = this.lookup(did, aid);
    const { document, equivalentId } = this.assemble(did, aid, state);

    return {
      didDocument: document,
      didResolutionMetadata: {
        contentType: DID_CONTENT_TYPE,
        retrieved: didTimestamp(this.clock()),
      },
      didDocumentMetadata: {
        witnesses: this.witnessLocations(state),
        versionId: `${state.sequenceNumber}`,
        equivalentId,
      },
    };
  }

  resolve(did: string, aid: string, meta: true): DIDResolutionResult;
  resolve(did: string, aid: string, meta?: false): DIDDocument;
  resolve(did: string, aid: string, meta?: boolean): DIDDocument | DIDResolutionResult;
  resolve(did: string, aid: string, meta = false): DIDDocument | DIDResolutionResult {
    return meta ? this.generateResolutionResult(did, aid) : this.generateDocument(did, aid);
  }

  private lookup(did: string, aid: string): KeyState {
    const parsed = parseDid(did);
    if (parsed.aid !== aid) {
      throw new MismatchedIdentifierError(did, aid);
    }

    const state = this.keyStates.getState(aid);
    if (!state) {
      throw new UnknownIdentifierError(aid, did);
    }
    return state;
  }

  private assemble(did: string, aid: string, state: KeyState): { document: DIDDocument; equivalentId: string[] } {
    const vms = generateVerificationMethods(state.verifyingKeys, state.signingThreshold, did, aid);

    const local = this.keyStates.hasLocalIdentity(aid);
    const service = local
      ? [...addEnds(this.keyStates.getRoleEndpoints(aid)), ...addEnds(this.keyStates.getWitnessEndpoints(aid))]
      : [];
    const alsoKnownAs = local ? resolveDesignatedAliases(aid, this.registry, this.schema) : [];
    const equivalentId = alsoKnownAs.filter(alias => alias.startsWith('did:webs'));

    return { document: genDidDocument(did, vms, service, alsoKnownAs), equivalentId };
  }

  private witnessLocations(state: KeyState): WitnessLocation[] {
    return state.witnesses.flatMap((eid, idx) =>
      this.keyStates.getWitnessLocations(eid).map(loc => ({ idx, scheme: loc.scheme, url: loc.url })),
    );
  }
}
