import { describe, test, expect, beforeAll, afterAll, jest } from '@jest/globals';
import fc from 'fast-check';
import { RegistryKernel } from '../Kernel.js';
import { Identity } from '../L1/Identity.js';
import { ReplayEngine } from '../L0/Replay.js';

const owner = Identity.fromHex('0a'.repeat(32));
const member = Identity.fromHex('0b'.repeat(32));
const stranger = Identity.fromHex('0c'.repeat(32));

// Generators
const genCaller = fc.constantFrom(member, stranger, owner);
const genRegion = fc.constantFrom('Nigeria', 'Ghana', 'Kenya');
const genHash = fc.constantFrom('11'.repeat(32), '22'.repeat(32));

const genOp = fc.oneof(
    fc.record({ kind: fc.constant('add' as const), caller: genCaller, location: genRegion, metadataHash: genHash }),
    fc.record({ kind: fc.constant('update' as const), caller: genCaller, location: genRegion, metadataHash: genHash, target: fc.integer({ min: 1, max: 12 }) })
);

const setupKernel = (): RegistryKernel => {
    const kernel = RegistryKernel.genesis(owner);
    kernel.registerInstitution('FIELD_LAB', 'Field Laboratory', owner);
    kernel.verifyInstitution('FIELD_LAB', owner);
    kernel.setResearcherMembership(member, 'FIELD_LAB', owner);
    return kernel;
};

describe('Kernel Property Verification', () => {
    beforeAll(() => {
        // Rejections are expected in bulk here
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterAll(() => {
        jest.restoreAllMocks();
    });

    test('ids stay contiguous and the ledger invariants hold under any command mix', () => {
        fc.assert(
            fc.property(fc.array(genOp, { maxLength: 25 }), (ops) => {
                const kernel = setupKernel();
                let committed = 0;
                let lastId = 0;

                for (const op of ops) {
                    const fields = { parasiteName: 'Trypanosoma brucei', classification: 'Protozoa', location: op.location, metadataHash: op.metadataHash };
                    const result = op.kind === 'add'
                        ? kernel.addParasiteRecord(fields, op.caller)
                        : kernel.updateParasiteRecord(op.target, fields, op.caller);

                    if (result.ok) {
                        committed++;
                        expect(result.value).toBe(lastId + 1);
                        lastId = result.value;
                    }
                }

                expect(kernel.getTotalRecords()).toBe(committed);
                expect(kernel.verifyIntegrity()).toEqual({ chainValid: true, violations: [] });
                expect(kernel.Ledger.getHistory()).toHaveLength(4 + committed);
            }),
            { numRuns: 60 }
        );
    });

    test('replaying the ledger reproduces the same state', () => {
        fc.assert(
            fc.property(fc.array(genOp, { maxLength: 15 }), (ops) => {
                const kernel = setupKernel();
                for (const op of ops) {
                    const fields = { parasiteName: 'Giardia lamblia', classification: 'Protozoa', location: op.location, metadataHash: op.metadataHash };
                    if (op.kind === 'add') kernel.addParasiteRecord(fields, op.caller);
                    else kernel.updateParasiteRecord(op.target, fields, op.caller);
                }

                const replayed = new ReplayEngine().replay(kernel.Ledger.getHistory(), owner);
                expect(replayed.snapshot()).toEqual(kernel.snapshot());
                expect(replayed.Ledger.getTip()?.evidenceId).toBe(kernel.Ledger.getTip()?.evidenceId);
            }),
            { numRuns: 30 }
        );
    });
});
