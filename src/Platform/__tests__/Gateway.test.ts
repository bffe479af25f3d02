import { describe, test, expect, beforeEach } from '@jest/globals';
import { RegistryGateway, parseCommand, signCommand } from '../Gateway.js';
import type { SignedCommand } from '../Gateway.js';
import { RegistryKernel } from '../../kernel-core/Kernel.js';
import { Identity } from '../../kernel-core/L1/Identity.js';
import { generateKeyPair } from '../../kernel-core/L0/Crypto.js';
import type { KeyPair } from '../../kernel-core/L0/Crypto.js';
import type { Operation } from '../../kernel-core/L0/Ontology.js';
import { ErrorCode } from '../../kernel-core/Errors.js';
import type { Result } from '../../kernel-core/Errors.js';

const ownerKeys = generateKeyPair();
const researcherKeys = generateKeyPair();
const researcher = Identity.fromPublicKey(researcherKeys.publicKey);

let counter = 0;
const command = (keys: KeyPair, operation: Operation, args: Record<string, unknown>, commandId = `cmd-${++counter}`): SignedCommand =>
    signCommand({ commandId, publicKey: keys.publicKey, operation, args, timestamp: '2026-01-01T00:00:00.000Z' }, keys.privateKey);

const codeOf = <T>(result: Result<T>): ErrorCode | undefined => (result.ok ? undefined : result.error.code);

const recordArgs = {
    parasiteName: 'Onchocerca volvulus',
    classification: 'Nematoda',
    location: 'Cameroon',
    metadataHash: '3c'.repeat(32)
};

describe('Registry Gateway', () => {
    let kernel: RegistryKernel;
    let gateway: RegistryGateway;

    beforeEach(() => {
        kernel = RegistryKernel.genesis(Identity.fromPublicKey(ownerKeys.publicKey));
        gateway = new RegistryGateway(kernel);
    });

    const enroll = () => {
        expect(gateway.execute(command(ownerKeys, 'REGISTER_INSTITUTION', { id: 'CRFILMT', name: 'Filariasis Research Centre' })).ok).toBe(true);
        expect(gateway.execute(command(ownerKeys, 'VERIFY_INSTITUTION', { id: 'CRFILMT' })).ok).toBe(true);
        expect(gateway.execute(command(ownerKeys, 'SET_MEMBERSHIP', { researcher: researcherKeys.publicKey, institutionId: 'CRFILMT' })).ok).toBe(true);
    };

    test('signed commands drive the full write surface', () => {
        enroll();
        expect(kernel.getResearcherMembership(researcher)).toBe('CRFILMT');

        expect(gateway.execute(command(researcherKeys, 'ADD_RECORD', recordArgs))).toEqual({ ok: true, value: 1 });
        expect(gateway.execute(command(researcherKeys, 'UPDATE_RECORD', { ...recordArgs, existingId: 1 }))).toEqual({ ok: true, value: 2 });
        expect(kernel.getParasiteRecord(2)?.author.equals(researcher)).toBe(true);
    });

    test('the command id is recorded on the ledger', () => {
        gateway.execute(command(ownerKeys, 'REGISTER_INSTITUTION', { id: 'CRFILMT', name: 'Centre' }, 'register-crfilmt'));
        expect(kernel.Ledger.getTip()?.action.commandId).toBe('register-crfilmt');
    });

    describe('authentication', () => {
        test('tampered arguments invalidate the signature', () => {
            const signed = command(ownerKeys, 'REGISTER_INSTITUTION', { id: 'CRFILMT', name: 'Centre' });
            const tampered = { ...signed, args: { id: 'CRFILMT', name: 'Forged Centre' } };
            expect(codeOf(gateway.execute(tampered))).toBe(ErrorCode.SIGNATURE_INVALID);
            expect(kernel.getInstitutionDetails('CRFILMT')).toBeUndefined();
        });

        test('a signature by another key is rejected', () => {
            const signed = command(researcherKeys, 'REGISTER_INSTITUTION', { id: 'CRFILMT', name: 'Centre' });
            const impersonation = { ...signed, publicKey: ownerKeys.publicKey };
            expect(codeOf(gateway.execute(impersonation))).toBe(ErrorCode.SIGNATURE_INVALID);
        });

        test('authenticated callers are still subject to authorization', () => {
            const result = gateway.execute(command(researcherKeys, 'REGISTER_INSTITUTION', { id: 'ROGUE', name: 'Rogue' }));
            expect(codeOf(result)).toBe(ErrorCode.NOT_AUTHORIZED);
        });
    });

    describe('replay protection', () => {
        test('a committed command cannot be submitted twice', () => {
            const signed = command(ownerKeys, 'REGISTER_INSTITUTION', { id: 'CRFILMT', name: 'Centre' });
            expect(gateway.execute(signed).ok).toBe(true);
            expect(codeOf(gateway.execute(signed))).toBe(ErrorCode.REPLAY_DETECTED);
        });

        test('a rejected command may be resubmitted once it can succeed', () => {
            const signed = command(researcherKeys, 'ADD_RECORD', recordArgs);
            expect(codeOf(gateway.execute(signed))).toBe(ErrorCode.NOT_VERIFIED);

            enroll();
            expect(gateway.execute(signed)).toEqual({ ok: true, value: 1 });
        });

        test('spent command ids are recovered from the ledger', () => {
            const signed = command(ownerKeys, 'REGISTER_INSTITUTION', { id: 'CRFILMT', name: 'Centre' });
            gateway.execute(signed);

            const restarted = new RegistryGateway(kernel);
            expect(codeOf(restarted.execute(signed))).toBe(ErrorCode.REPLAY_DETECTED);
        });
    });

    describe('parsing', () => {
        const malformed: Array<[string, unknown]> = [
            ['a non-object', 'hello'],
            ['an unknown operation', { commandId: 'x', publicKey: ownerKeys.publicKey, operation: 'DELETE_RECORD', args: {}, timestamp: 't', signature: 's' }],
            ['missing args', { commandId: 'x', publicKey: ownerKeys.publicKey, operation: 'ADD_RECORD', timestamp: 't', signature: 's' }],
            ['a missing signature', { commandId: 'x', publicKey: ownerKeys.publicKey, operation: 'ADD_RECORD', args: {}, timestamp: 't' }]
        ];

        test.each(malformed)('rejects %s', (_label, input) => {
            expect(() => parseCommand(input)).toThrow('INVALID_FIELD');
            expect(codeOf(gateway.execute(input))).toBe(ErrorCode.INVALID_FIELD);
        });

        test('argument types are checked once the signature holds', () => {
            enroll();
            const result = gateway.execute(command(researcherKeys, 'UPDATE_RECORD', { ...recordArgs, existingId: '1' }));
            expect(codeOf(result)).toBe(ErrorCode.INVALID_FIELD);
        });

        test('metadata hashes are normalized to lowercase', () => {
            enroll();
            gateway.execute(command(researcherKeys, 'ADD_RECORD', { ...recordArgs, metadataHash: '3C'.repeat(32) }));
            expect(kernel.getParasiteRecord(1)?.metadataHash).toBe('3c'.repeat(32));
        });
    });
});
