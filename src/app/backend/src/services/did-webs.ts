/**
 * did:webs resolution over freshly loaded KERIA state.
 *
 * Each request loads a snapshot for its AID, then synthesizes from that
 * snapshot alone.
 */

import {
  DidDocumentSynthesizer,
  parseDid,
  reEncodeDid,
  toDidWeb,
  validatePrefix,
  type DIDDocument,
  type DIDResolutionResult,
  type KeyStateSource,
} from '@did-webs/node';

export interface DidWebsServiceOptions {
  designatedAliasesSchema?: string;
  clock?: () => Date;
}

export class DidWebsService {
  constructor(
    private readonly states: KeyStateSource,
    private readonly options: DidWebsServiceOptions = {},
  ) {}

  /**
   * Resolve a did:webs, did:web or did:keri. Legacy unencoded ports are
   * accepted and resolved under the canonical DID.
   */
  async resolve(did: string, meta: boolean): Promise<DIDDocument | DIDResolutionResult> {
    const canonical = reEncodeDid(did);
    const { aid } = parseDid(canonical);
    const synthesizer = await this.synthesizerFor(aid);
    return synthesizer.resolve(canonical, aid, meta);
  }

  /**
   * The did.json a did:web resolver fetches from `https://{domain}/{path}/{aid}/did.json`.
   *
   * @param domain - host with the port already encoded as `%3A`
   * @param path - DID path segments
   */
  async didJson(aid: string, domain: string, path: string[]): Promise<DIDDocument> {
    validatePrefix(aid);
    const did = ['did:webs', domain, ...path, aid].join(':');
    const synthesizer = await this.synthesizerFor(aid);
    return toDidWeb(synthesizer.generateDocument(did, aid));
  }

  private async synthesizerFor(aid: string): Promise<DidDocumentSynthesizer> {
    const store = await this.states.load(aid);
    return new DidDocumentSynthesizer({
      keyStates: store,
      registry: store,
      designatedAliasesSchema: this.options.designatedAliasesSchema,
      clock: this.options.clock,
    });
  }
}
