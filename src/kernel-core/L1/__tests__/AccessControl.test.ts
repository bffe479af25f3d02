import { describe, test, expect } from '@jest/globals';
import { AccessControl } from '../AccessControl.js';
import { Identity } from '../Identity.js';
import { genesisState } from '../../L2/State.js';
import type { RegistryState } from '../../L2/State.js';
import type { RecordRow } from '../../L0/Ontology.js';

const owner = Identity.fromHex('11'.repeat(32));
const author = Identity.fromHex('22'.repeat(32));
const colleague = Identity.fromHex('33'.repeat(32));

const state: RegistryState = {
    ...genesisState(owner.toHex()),
    institutions: {
        VERIFIED_LAB: { id: 'VERIFIED_LAB', name: 'Verified Lab', verified: true, admin: owner.toHex() },
        PENDING_LAB: { id: 'PENDING_LAB', name: 'Pending Lab', verified: false, admin: colleague.toHex() }
    },
    memberships: {
        [author.toHex()]: 'VERIFIED_LAB',
        [colleague.toHex()]: 'PENDING_LAB',
        [owner.toHex()]: 'VERIFIED_LAB'
    }
};

const record: RecordRow = {
    id: 1,
    parasiteName: 'Toxoplasma gondii',
    classification: 'Apicomplexa',
    location: 'Brazil',
    recordedAt: 1,
    author: author.toHex(),
    metadataHash: '44'.repeat(32),
    status: 'ACTIVE',
    version: 1,
    previousVersion: null
};

describe('L1 Access Control', () => {
    const access = new AccessControl();

    test('owner is the genesis identity', () => {
        expect(access.isOwner(state, owner)).toBe(true);
        expect(access.isOwner(state, author)).toBe(false);
    });

    test('institution admin is per institution', () => {
        expect(access.isInstitutionAdmin(state, colleague, 'PENDING_LAB')).toBe(true);
        expect(access.isInstitutionAdmin(state, colleague, 'VERIFIED_LAB')).toBe(false);
        expect(access.isInstitutionAdmin(state, colleague, 'UNKNOWN')).toBe(false);
    });

    test('verified membership requires a verified institution', () => {
        expect(access.isVerifiedMember(state, author)).toBe(true);
        expect(access.isVerifiedMember(state, colleague)).toBe(false);
        expect(access.isVerifiedMember(state, Identity.fromHex('55'.repeat(32)))).toBe(false);
    });

    test('author and admin of own institution may amend', () => {
        expect(access.canAmendRecord(state, author, record)).toBe(true);
        expect(access.canAmendRecord(state, owner, record)).toBe(true);
        // Override follows the caller's own institution, whatever the author's
        expect(access.canAmendRecord(state, colleague, record)).toBe(true);
        expect(access.canAmendRecord(state, Identity.fromHex('55'.repeat(32)), record)).toBe(false);
    });
});
