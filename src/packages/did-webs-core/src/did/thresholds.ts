/**
 * Signing-policy encoding.
 *
 * Turns the current keys and signing threshold of an AID into DID document
 * verification methods: one JsonWebKey per key, plus a ConditionalProof2022
 * when more than one signature is needed.
 */

import type {
  JsonWebKeyVerificationMethod,
  VerificationMethod,
  WeightedCondition,
} from '../types/did.js';
import type { Fraction, SigningPolicy, VerifyingKey } from '../types/keri.js';
import { InvalidPolicyError } from '../utils/errors.js';
import { verifyingKeyToJwk } from './key-conversion.js';
import { stripQuery } from './uri.js';

/** KERI `kt` as it appears in key state and events */
export type ThresholdValue = number | string | string[] | string[][];

function gcd(a: number, b: number): number {
  while (b !== 0) {
    [a, b] = [b, a % b];
  }
  return a;
}

function lcm(a: number, b: number): number {
  return (a / gcd(a, b)) * b;
}

function showWeight(weight: Fraction): string {
  return `${weight.numerator}/${weight.denominator}`;
}

/** reduce a weight to lowest terms, rejecting anything but a positive rational */
function reduce(weight: Fraction): Fraction {
  const { numerator, denominator } = weight;
  if (!Number.isSafeInteger(numerator) || !Number.isSafeInteger(denominator)) {
    throw new InvalidPolicyError(`Weight ${showWeight(weight)} is not a rational of integers`, showWeight(weight));
  }
  if (numerator <= 0 || denominator <= 0) {
    throw new InvalidPolicyError(`Weight ${showWeight(weight)} must be positive`, showWeight(weight));
  }
  const d = gcd(numerator, denominator);
  return { numerator: numerator / d, denominator: denominator / d };
}

/**
 * Normalize fractional weights to a common denominator.
 *
 * @returns the least common denominator and each weight's numerator over it
 */
export function weightedThresholdNumerators(weights: Fraction[]): { lcd: number; numerators: number[] } {
  const reduced = weights.map(reduce);
  const lcd = reduced.reduce((acc, w) => lcm(acc, w.denominator), 1);
  if (!Number.isSafeInteger(lcd)) {
    throw new InvalidPolicyError(`Common denominator of ${weights.map(showWeight).join(', ')} is too large`);
  }

  const numerators = reduced.map(w => {
    const n = (w.numerator * lcd) / w.denominator;
    if (!Number.isSafeInteger(n)) {
      throw new InvalidPolicyError(`Weight ${showWeight(w)} does not scale exactly to /${lcd}`, showWeight(w));
    }
    return n;
  });

  return { lcd, numerators };
}

/** parse "n" or "n/d" */
function parseFraction(text: string): Fraction {
  const parts = text.split('/');
  if (parts.length > 2 || parts.some(p => !/^\d+$/.test(p))) {
    throw new InvalidPolicyError(`Invalid weight format: ${text}`, text);
  }
  return {
    numerator: Number(parts[0]),
    denominator: parts.length === 2 ? Number(parts[1]) : 1,
  };
}

/**
 * Convert a KERI signing threshold into a signing policy.
 *
 * Numeric thresholds are hex strings (or numbers); weighted thresholds are
 * lists of fraction strings. For a multi-clause weighted threshold only the
 * first clause is encoded.
 *
 * @example
 * parseSigningThreshold('2')            // { kind: 'simple', threshold: 2 }
 * parseSigningThreshold(['1/2', '1/2']) // { kind: 'weighted', weights: [...] }
 */
export function parseSigningThreshold(kt: ThresholdValue): SigningPolicy {
  if (Array.isArray(kt)) {
    const first = kt[0];
    const clause: unknown[] = Array.isArray(first) ? first : kt;
    const weights = clause.map(w => {
      if (typeof w !== 'string') {
        throw new InvalidPolicyError('Nested weighted threshold clauses must hold fraction strings');
      }
      return parseFraction(w);
    });
    if (weights.length === 0) {
      throw new InvalidPolicyError('Weighted threshold has no weights');
    }
    return { kind: 'weighted', weights };
  }

  const threshold = typeof kt === 'number' ? kt : /^[0-9a-f]+$/i.test(kt) ? parseInt(kt, 16) : NaN;
  if (!Number.isSafeInteger(threshold) || threshold < 1) {
    throw new InvalidPolicyError(`Invalid signing threshold: ${String(kt)}`, String(kt));
  }
  return threshold === 1 ? { kind: 'single' } : { kind: 'simple', threshold };
}

function jsonWebKeyMethod(key: VerifyingKey, controller: string): JsonWebKeyVerificationMethod {
  return {
    id: `#${key.qb64}`,
    type: 'JsonWebKey',
    controller,
    publicKeyJwk: verifyingKeyToJwk(key),
  };
}

/**
 * Generate the verification methods for a key list and signing policy.
 *
 * Key methods come first, in key order; the threshold method, when there is
 * one, comes last and is addressed by the AID.
 *
 * @throws InvalidPolicyError when the policy does not fit the keys
 */
export function generateVerificationMethods(
  keys: VerifyingKey[],
  policy: SigningPolicy,
  did: string,
  aid: string,
): VerificationMethod[] {
  const controller = stripQuery(did);
  const keyMethods = keys.map(key => jsonWebKeyMethod(key, controller));
  const vms: VerificationMethod[] = [...keyMethods];

  switch (policy.kind) {
    case 'single':
      break;

    case 'simple': {
      if (!Number.isSafeInteger(policy.threshold) || policy.threshold < 1) {
        throw new InvalidPolicyError(`Signing threshold ${policy.threshold} must be an integer >= 1`);
      }
      if (policy.threshold > 1) {
        vms.push({
          id: `#${aid}`,
          type: 'ConditionalProof2022',
          controller,
          threshold: policy.threshold,
          conditionThreshold: keyMethods.map(vm => vm.id),
        });
      }
      break;
    }

    case 'weighted': {
      if (policy.weights.length !== keys.length) {
        throw new InvalidPolicyError(
          `Weighted threshold has ${policy.weights.length} weights for ${keys.length} keys`,
        );
      }
      const { lcd, numerators } = weightedThresholdNumerators(policy.weights);
      const conditions: WeightedCondition[] = keyMethods.map((vm, idx) => ({
        condition: vm.id,
        weight: numerators[idx],
      }));
      vms.push({
        id: `#${aid}`,
        type: 'ConditionalProof2022',
        controller,
        threshold: lcd / 2,
        conditionWeightedThreshold: conditions,
      });
      break;
    }
  }

  return vms;
}
