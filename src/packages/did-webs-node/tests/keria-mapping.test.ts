import { describe, it, expect } from 'vitest';
import {
  DES_ALIASES_SCHEMA,
  endpointTable,
  isEndRole,
  isKeriCredential,
  isKeriKeyState,
  locationRecords,
  mapCredential,
  mapKeyState,
  type KeriCredential,
  type KeriKeyState,
} from '../src/index.js';
import { AGENT_AID, AID, DA_SAID, KEY_1, KEY_2, WIT_A, WIT_B, keriaCredential, keriaState } from './fixtures.js';

function narrowState(value: unknown): KeriKeyState {
  if (!isKeriKeyState(value)) {
    throw new Error('fixture is not a key state');
  }
  return value;
}

function narrowCredential(value: unknown): KeriCredential {
  if (!isKeriCredential(value)) {
    throw new Error('fixture is not a credential');
  }
  return value;
}

describe('mapKeyState', () => {
  it('maps keys, weighted threshold, witnesses and hex sequence number', () => {
    const state = mapKeyState(narrowState(keriaState()));

    expect(state.verifyingKeys.map(key => key.qb64)).toEqual([KEY_1, KEY_2]);
    expect(Array.from(state.verifyingKeys[1].raw)).toEqual(new Array(32).fill(2));
    expect(state.signingThreshold).toEqual({
      kind: 'weighted',
      weights: [
        { numerator: 1, denominator: 2 },
        { numerator: 1, denominator: 2 },
      ],
    });
    expect(state.witnesses).toEqual([WIT_A, WIT_B]);
    expect(state.sequenceNumber).toBe(10);
  });

  it('maps a numeric threshold', () => {
    expect(mapKeyState(narrowState(keriaState({ kt: '2' }))).signingThreshold).toEqual({
      kind: 'simple',
      threshold: 2,
    });
    expect(mapKeyState(narrowState(keriaState({ kt: '1', k: [KEY_1] }))).signingThreshold).toEqual({
      kind: 'single',
    });
  });

  it('rejects a sequence number that is not hex', () => {
    expect(() => mapKeyState(narrowState(keriaState({ s: 'xyz' })))).toThrow(
      `Malformed sequence number in key state of ${AID}: xyz`,
    );
  });
});

describe('isKeriKeyState', () => {
  it.each([
    ['missing keys', { k: undefined }],
    ['numeric threshold list', { kt: [1, 1] }],
    ['numeric sequence number', { s: 10 }],
    ['witnesses not a list', { b: WIT_A }],
  ])('rejects %s', (_label, overrides) => {
    expect(isKeriKeyState(keriaState(overrides))).toBe(false);
  });

  it('accepts nested threshold clauses', () => {
    expect(isKeriKeyState(keriaState({ kt: [['1/2', '1/2'], ['1']] }))).toBe(true);
  });
});

describe('mapCredential', () => {
  it('maps a self-attested credential without issuee', () => {
    expect(mapCredential(narrowCredential(keriaCredential()))).toEqual({
      said: DA_SAID,
      issuer: AID,
      schema: DES_ALIASES_SCHEMA,
      attributes: {
        d: 'EAttributesPlaceholder',
        dt: '2024-01-01T00:00:00.000000+00:00',
        ids: [`did:web:example.com:${AID}`],
      },
      statusEventType: 'iss',
    });
  });

  it('moves the attribute issuee out of the attributes', () => {
    const record = mapCredential(narrowCredential(keriaCredential({ a: { i: AGENT_AID, LEI: '5493000000000000TEST' } }, 'rev')));

    expect(record.issuee).toBe(AGENT_AID);
    expect(record.attributes).toEqual({ LEI: '5493000000000000TEST' });
    expect(record.statusEventType).toBe('rev');
  });

  it('rejects credentials without status', () => {
    expect(isKeriCredential({ sad: keriaCredential().sad })).toBe(false);
    expect(isKeriCredential(keriaCredential({ a: { i: 42 } }))).toBe(false);
  });
});

describe('endpoint tables', () => {
  const book = {
    [WIT_A]: { http: 'http://wit-a.example.com:5642/', tcp: 'tcp://wit-a.example.com:5632/' },
    [AGENT_AID]: { https: 'https://agent.example.com/' },
  };

  it('lists the locations of an endpoint in book order', () => {
    expect(locationRecords(book, WIT_A)).toEqual([
      { scheme: 'http', url: 'http://wit-a.example.com:5642/' },
      { scheme: 'tcp', url: 'tcp://wit-a.example.com:5632/' },
    ]);
    expect(locationRecords(book, WIT_B)).toEqual([]);
    expect(locationRecords(book, 'constructor')).toEqual([]);
  });

  it('groups end roles by role and skips endpoints without locations', () => {
    expect(
      endpointTable(
        [
          { cid: AID, role: 'agent', eid: AGENT_AID },
          { cid: AID, role: 'witness', eid: WIT_A },
          { cid: AID, role: 'witness', eid: WIT_B },
          { cid: AID, role: 'mailbox', eid: AGENT_AID },
        ],
        book,
      ),
    ).toEqual({
      agent: { [AGENT_AID]: { https: 'https://agent.example.com/' } },
      witness: {
        [WIT_A]: { http: 'http://wit-a.example.com:5642/', tcp: 'tcp://wit-a.example.com:5632/' },
      },
      mailbox: { [AGENT_AID]: { https: 'https://agent.example.com/' } },
    });
  });

  it('recognizes end role records', () => {
    expect(isEndRole({ cid: AID, role: 'agent', eid: AGENT_AID })).toBe(true);
    expect(isEndRole({ cid: AID, role: 'agent' })).toBe(false);
  });
});
