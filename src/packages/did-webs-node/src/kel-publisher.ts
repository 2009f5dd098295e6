/**
 * KEL Publisher
 *
 * Serves the keri.cesr stream that sits next to did.json for did:webs
 * resolution: the AID's KEL from KERIA, followed by its designated aliases
 * credentials so a resolver can verify alsoKnownAs.
 */

import { getErrorMessage } from '@did-webs/core';

const DEFAULT_TIMEOUT_MS = 10000;

/** config for the KEL publisher */
export interface KelPublisherConfig {
  /** KERIA HTTP endpoint URL for CESR fetching (e.g., "http://localhost:3902") */
  keriaHttpUrl: string;
  /** timeout of the OOBI request in ms (default: 10000) */
  timeoutMs?: number;
}

/** source of designated aliases CESR, usually a KeriaStateLoader */
export interface DesignatedAliasesCesrSource {
  designatedAliasesCesr(aid: string): Promise<string>;
}

/** the KEL of an AID could not be fetched from KERIA */
export class KelUnavailableError extends Error {
  constructor(
    readonly aid: string,
    reason: string,
  ) {
    super(`Failed to fetch KERI CESR for AID ${aid}: ${reason}`);
    this.name = 'KelUnavailableError';
  }
}

export class KelPublisher {
  private readonly timeoutMs: number;

  constructor(
    private readonly config: KelPublisherConfig,
    private readonly aliases: DesignatedAliasesCesrSource,
  ) {
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Get KERI CESR for an AID.
   *
   * Returns the KEL in CESR format, enriched with the DA credential CESR
   * if available. A failure to read the credentials leaves the bare KEL.
   *
   * @throws KelUnavailableError when KERIA has no KEL for the AID
   */
  async getKeriCesr(aid: string): Promise<string> {
    const oobiUrl = `${this.config.keriaHttpUrl}/oobi/${aid}`;

    let kelCesr: string;
    try {
      const response = await fetch(oobiUrl, {
        signal: AbortSignal.timeout(this.timeoutMs),
        headers: {
          'Accept': 'application/cesr',
        },
      });

      if (!response.ok) {
        throw new Error(`KERIA returned ${response.status}: ${response.statusText}`);
      }

      kelCesr = await response.text();
    } catch (error) {
      throw new KelUnavailableError(aid, getErrorMessage(error));
    }
    if (kelCesr.length === 0) {
      throw new KelUnavailableError(aid, 'Empty CESR response from KERIA');
    }

    try {
      return kelCesr + (await this.aliases.designatedAliasesCesr(aid));
    } catch (error) {
      console.warn(`[kel-publisher] Serving KEL without DA credential for ${aid}: ${getErrorMessage(error)}`);
      return kelCesr;
    }
  }
}
