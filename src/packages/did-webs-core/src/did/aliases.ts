import type { CredentialRecord, CredentialRegistry } from '../types/keri.js';

/** SAID of the well-known designated aliases credential schema */
export const DES_ALIASES_SCHEMA = 'EN6Oh5XSD5_q2Hgu-aqpdfbVepdpYpFlgz6zvJL5b_r5';

/** TEL event types of a credential that is still in force */
const ISSUED_STATUSES: ReadonlySet<string> = new Set(['iss', 'bis']);

/** issued by the AID to itself: no distinct issuee */
function isSelfAttested(record: CredentialRecord, aid: string): boolean {
  return record.issuer === aid && (record.issuee === undefined || record.issuee === aid);
}

function aliasIds(record: CredentialRecord): string[] {
  const ids = record.attributes.ids;
  if (!Array.isArray(ids)) {
    return [];
  }
  return ids.filter((id): id is string => typeof id === 'string');
}

/**
 * Designated aliases credentials of an AID that are still in force: self-attested,
 * of the given schema, last TEL event `iss` or `bis`.
 */
export function designatedAliasCredentials(
  aid: string,
  registry: CredentialRegistry,
  schema: string = DES_ALIASES_SCHEMA,
): CredentialRecord[] {
  return registry
    .findSelfAttested(aid, schema)
    .filter(record => record.schema === schema && isSelfAttested(record, aid))
    .filter(record => ISSUED_STATUSES.has(record.statusEventType));
}

/**
 * Designated aliases of an AID.
 *
 * Collects `a.ids` from every credential {@link designatedAliasCredentials}
 * returns, flattened in enumeration order.
 */
export function resolveDesignatedAliases(
  aid: string,
  registry: CredentialRegistry,
  schema: string = DES_ALIASES_SCHEMA,
): string[] {
  return designatedAliasCredentials(aid, registry, schema).flatMap(aliasIds);
}
