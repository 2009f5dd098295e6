import { describe, it, expect } from 'vitest';
import {
  addEnds,
  DidDocumentSynthesizer,
  InvalidDidFormatError,
  MemoryKeyStateStore,
  MismatchedIdentifierError,
  UnknownIdentifierError,
  type KeyStateSnapshot,
} from '../src/index.js';
import {
  AGENT_AID,
  AID,
  DID_WEBS,
  KEY_1,
  KEY_2,
  KEY_3,
  KEYS,
  OTHER_AID,
  WIT_A,
  WIT_B,
  aliasCredential,
  singleKeyState,
} from './fixtures.js';

const CONTROLLER_URL = 'http://ctrl.example.com/';
const MAILBOX_URL = 'https://mailbox.example.com/';
const WIT_A_HTTP = 'http://wit-a.example.com:5642/';
const WIT_A_TCP = 'tcp://wit-a.example.com:5632/';
const WIT_B_HTTP = 'http://wit-b.example.com:5643/';

const ALIASES = [
  `did:web:example.com:dws:${AID}`,
  `did:webs:example.com:dws:${AID}`,
  `did:webs:example.com%3A8080:dws:${AID}`,
];

function snapshot(): KeyStateSnapshot {
  return {
    states: {
      [AID]: {
        verifyingKeys: KEYS,
        signingThreshold: { kind: 'simple', threshold: 2 },
        witnesses: [WIT_A, WIT_B],
        sequenceNumber: 3,
      },
      [OTHER_AID]: singleKeyState(),
    },
    locations: {
      [WIT_A]: [
        { scheme: 'http', url: WIT_A_HTTP },
        { scheme: 'tcp', url: WIT_A_TCP },
      ],
      [WIT_B]: [{ scheme: 'http', url: WIT_B_HTTP }],
    },
    roleEndpoints: {
      [AID]: {
        controller: { [AID]: { http: CONTROLLER_URL } },
        mailbox: { [AGENT_AID]: { https: MAILBOX_URL } },
      },
      [OTHER_AID]: {
        controller: { [OTHER_AID]: { http: CONTROLLER_URL } },
      },
    },
    witnessEndpoints: {
      [AID]: {
        witness: { [WIT_A]: { http: WIT_A_HTTP, tcp: WIT_A_TCP } },
      },
    },
    localIdentities: [AID],
    credentials: [
      aliasCredential({ attributes: { ids: ALIASES } }),
      aliasCredential({ issuer: OTHER_AID, attributes: { ids: [`did:webs:other.example.com:${OTHER_AID}`] } }),
    ],
  };
}

function synthesizer(): DidDocumentSynthesizer {
  const store = new MemoryKeyStateStore(snapshot());
  return new DidDocumentSynthesizer({
    keyStates: store,
    registry: store,
    clock: () => new Date('2024-05-06T07:08:09.123Z'),
  });
}

describe('addEnds', () => {
  it('emits one service per endpoint AID and role', () => {
    expect(
      addEnds({
        controller: { [AID]: { http: CONTROLLER_URL } },
        agent: { [AGENT_AID]: { http: 'http://agent.example.com/', https: 'https://agent.example.com/' } },
      }),
    ).toEqual([
      { id: `#${AID}/controller`, type: 'controller', serviceEndpoint: { http: CONTROLLER_URL } },
      {
        id: `#${AGENT_AID}/agent`,
        type: 'agent',
        serviceEndpoint: { http: 'http://agent.example.com/', https: 'https://agent.example.com/' },
      },
    ]);
  });

  it('emits nothing for an empty table', () => {
    expect(addEnds({})).toEqual([]);
  });
});

describe('DidDocumentSynthesizer', () => {
  it('builds the document of a local identity', () => {
    const doc = synthesizer().generateDocument(DID_WEBS, AID);

    expect(Object.keys(doc)).toEqual(['id', 'verificationMethod', 'service', 'alsoKnownAs']);
    expect(doc.id).toBe(DID_WEBS);
    expect(doc.verificationMethod.map(vm => vm.id)).toEqual([`#${KEY_1}`, `#${KEY_2}`, `#${KEY_3}`, `#${AID}`]);
    expect(doc.service).toEqual([
      { id: `#${AID}/controller`, type: 'controller', serviceEndpoint: { http: CONTROLLER_URL } },
      { id: `#${AGENT_AID}/mailbox`, type: 'mailbox', serviceEndpoint: { https: MAILBOX_URL } },
      { id: `#${WIT_A}/witness`, type: 'witness', serviceEndpoint: { http: WIT_A_HTTP, tcp: WIT_A_TCP } },
    ]);
    expect(doc.alsoKnownAs).toEqual(ALIASES);
  });

  it('keeps the query on the id and drops it from controllers', () => {
    const doc = synthesizer().generateDocument(`${DID_WEBS}?versionId=3`, AID);

    expect(doc.id).toBe(`${DID_WEBS}?versionId=3`);
    expect(new Set(doc.verificationMethod.map(vm => vm.controller))).toEqual(new Set([DID_WEBS]));
  });

  it('wraps the document in resolution metadata', () => {
    const result = synthesizer().generateResolutionResult(DID_WEBS, AID);

    expect(Object.keys(result)).toEqual(['didDocument', 'didResolutionMetadata', 'didDocumentMetadata']);
    expect(result.didResolutionMetadata).toEqual({
      contentType: 'application/did+json',
      retrieved: '2024-05-06T07:08:09Z',
    });
    expect(result.didDocumentMetadata).toEqual({
      witnesses: [
        { idx: 0, scheme: 'http', url: WIT_A_HTTP },
        { idx: 0, scheme: 'tcp', url: WIT_A_TCP },
        { idx: 1, scheme: 'http', url: WIT_B_HTTP },
      ],
      versionId: '3',
      equivalentId: [`did:webs:example.com:dws:${AID}`, `did:webs:example.com%3A8080:dws:${AID}`],
    });
  });

  it('leaves service and aliases empty for an identity that is not local', () => {
    const did = `did:webs:example.com:${OTHER_AID}`;
    const doc = synthesizer().generateDocument(did, OTHER_AID);

    expect(doc).toEqual({
      id: did,
      verificationMethod: [
        {
          id: `#${KEY_1}`,
          type: 'JsonWebKey',
          controller: did,
          publicKeyJwk: { kid: KEY_1, kty: 'OKP', crv: 'Ed25519', x: 'AQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQE' },
        },
      ],
      service: [],
      alsoKnownAs: [],
    });
  });

  it('selects document or result through resolve', () => {
    const synth = synthesizer();

    expect(synth.resolve(DID_WEBS, AID)).toEqual(synth.generateDocument(DID_WEBS, AID));
    expect(synth.resolve(DID_WEBS, AID, true)).toEqual(synth.generateResolutionResult(DID_WEBS, AID));
  });

  it('returns equal output for equal input', () => {
    const synth = synthesizer();
    expect(synth.generateResolutionResult(DID_WEBS, AID)).toEqual(synth.generateResolutionResult(DID_WEBS, AID));
  });

  it('rejects a DID that does not carry the requested AID', () => {
    expect(() => synthesizer().generateDocument(DID_WEBS, OTHER_AID)).toThrow(MismatchedIdentifierError);
  });

  it('rejects an AID without key state', () => {
    const did = `did:webs:example.com:${WIT_A}`;
    expect(() => synthesizer().generateDocument(did, WIT_A)).toThrow(UnknownIdentifierError);
  });

  it('rejects a malformed DID', () => {
    expect(() => synthesizer().generateDocument('did:webs:example.com', AID)).toThrow(InvalidDidFormatError);
  });
});
