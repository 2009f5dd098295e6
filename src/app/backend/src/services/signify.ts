/**
 * SignifyClient provider
 *
 * One agent, unlocked by KERIA_PASSCODE, controls the local identities. The
 * loader gets its client for those AIDs and no client for anything else.
 */

import { ready, SignifyClient, Tier } from 'signify-ts';
import { getErrorMessage, type KeriaClient } from '@did-webs/node';

/** a KeriaClient that can also list the agent's own identifiers */
export interface AgentClient extends KeriaClient {
  identifiers(): { list(start?: number, end?: number): Promise<unknown> };
}

export interface SignifyOptions {
  keriaUrl: string;
  keriaBootUrl: string;
  passcode?: string;
}

export type ConnectAgent = (keriaUrl: string, keriaBootUrl: string, passcode: string) => Promise<AgentClient>;

/** Pad a Signify passcode to 21 characters (KERIA agent requirement) */
export function paddedSignifyPasscode(passcode: string): string {
  return passcode.padEnd(21, '_');
}

export const connectSignify: ConnectAgent = async (keriaUrl, keriaBootUrl, passcode) => {
  await ready();
  const client = new SignifyClient(keriaUrl, paddedSignifyPasscode(passcode), Tier.low, keriaBootUrl);
  await client.connect();
  return client;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** KERIA's default identifier page size */
const IDENTIFIER_PAGE_SIZE = 25;

/** prefixes of the identifiers the agent controls, across every page of the listing */
async function localPrefixes(client: AgentClient): Promise<string[]> {
  const prefixes: string[] = [];
  for (let start = 0; ; start += IDENTIFIER_PAGE_SIZE) {
    const listed: unknown = await client.identifiers().list(start, start + IDENTIFIER_PAGE_SIZE - 1);
    if (!isRecord(listed) || !Array.isArray(listed.aids) || typeof listed.total !== 'number') {
      throw new Error('KERIA returned a malformed identifier listing');
    }
    for (const hab of listed.aids) {
      if (isRecord(hab) && typeof hab.prefix === 'string') {
        prefixes.push(hab.prefix);
      }
    }
    if (listed.aids.length === 0 || start + IDENTIFIER_PAGE_SIZE >= listed.total) {
      return prefixes;
    }
  }
}

/**
 * Get-client callback for the loader. Connects once, on first use; a failed
 * connection is retried on the next call.
 */
export function createClientProvider(
  options: SignifyOptions,
  connect: ConnectAgent = connectSignify,
): (aid: string) => Promise<AgentClient | null> {
  let connecting: Promise<AgentClient> | null = null;

  return async (aid: string) => {
    const { passcode } = options;
    if (!passcode) {
      return null;
    }

    if (!connecting) {
      connecting = connect(options.keriaUrl, options.keriaBootUrl, passcode).catch((error: unknown) => {
        connecting = null;
        throw new Error(`Failed to connect to KERIA: ${getErrorMessage(error)}`);
      });
    }

    const client = await connecting;
    const prefixes = await localPrefixes(client);
    return prefixes.includes(aid) ? client : null;
  };
}
