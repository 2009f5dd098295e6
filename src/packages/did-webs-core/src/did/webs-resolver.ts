/**
 * did:webs resolver client
 *
 * Queries a resolver service speaking the universal-resolver path
 * (`/1.0/identifiers/{did}`), such as the one in this repository's backend.
 */

import type { DIDDocument, DIDResolutionResult } from '../types/did.js';
import { isDidDocument, isDidResolutionResult } from './extractors.js';
import { fromDidWeb } from './scheme.js';
import { reEncodeDid } from './uri.js';

/** config for the did:webs resolver */
export interface DidWebsResolverConfig {
  /** Base URL of the resolver service (e.g., "http://localhost:7677") */
  resolverUrl: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
}

/**
 * Resolves did:webs and did:keri through a resolver service.
 *
 * DIDs are re-encoded before the request, so legacy unencoded-port did:webs
 * DIDs resolve too.
 */
export class DidWebsResolver {
  private readonly resolverUrl: string;
  private readonly timeoutMs: number;

  constructor(config: DidWebsResolverConfig) {
    this.resolverUrl = config.resolverUrl.replace(/\/$/, '');
    this.timeoutMs = config.timeoutMs ?? 10000;
  }

  /**
   * Resolve a DID to its document.
   *
   * @param did - did:webs:... or did:keri:...
   */
  async resolve(did: string): Promise<DIDDocument> {
    const body = await this.fetchBody(did);
    const document = isDidResolutionResult(body) ? body.didDocument : body;
    if (!isDidDocument(document)) {
      throw new Error('Invalid DID document: missing id or verificationMethod');
    }
    return this.restoreScheme(did, document);
  }

  /** Resolve a DID to the full resolution result, metadata included. */
  async resolveWithMetadata(did: string): Promise<DIDResolutionResult> {
    const body = await this.fetchBody(did);
    if (!isDidResolutionResult(body)) {
      throw new Error('DID resolver returned no resolution result');
    }
    return { ...body, didDocument: this.restoreScheme(did, body.didDocument) };
  }

  /** a did:webs request answered with a did:web document gets its scheme back */
  private restoreScheme(did: string, document: DIDDocument): DIDDocument {
    return did.toLowerCase().startsWith('did:webs:') ? fromDidWeb(document) : document;
  }

  private async fetchBody(did: string): Promise<unknown> {
    const encodedDid = encodeURIComponent(reEncodeDid(did));
    const url = `${this.resolverUrl}/1.0/identifiers/${encodedDid}`;

    const response = await fetch(url, {
      method: 'GET',
      headers: {
        'Accept': 'application/did+json, application/json',
      },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => 'Unknown error');
      throw new Error(
        `DID resolution failed: ${response.status} ${response.statusText} - ${errorText}`
      );
    }

    const responseText = await response.text();
    try {
      const parsed: unknown = JSON.parse(responseText);
      return parsed;
    } catch {
      throw new Error(`DID resolver returned invalid response: ${responseText.substring(0, 100)}`);
    }
  }
}
