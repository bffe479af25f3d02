import { Identity } from '../L1/Identity.js';
import type { AccessControl } from '../L1/AccessControl.js';
import type { ParasiteRecord, RecordArgs, RecordId, RecordRow } from '../L0/Ontology.js';
import { lookup } from '../L2/State.js';
import type { RegistryState, StateDraft } from '../L2/State.js';
import { ActiveRecordGuard, AmendGuard, VerifiedMemberGuard, enforce } from '../L0/Guards.js';
import { assertRecordArgs } from '../L0/Invariants.js';
import { ErrorCode, RegistryError } from '../Errors.js';
import type { GeoStatsAggregator } from './GeoStats.js';

const key = (id: RecordId): string => String(id);

export function toParasiteRecord(row: RecordRow): ParasiteRecord {
    return { ...row, author: Identity.fromHex(row.author) };
}

/**
 * The versioned record ledger. Records are never edited: an update archives
 * the current head and appends its successor.
 *
 * Lineage: (none) -> ACTIVE(v1) -> ARCHIVED(v1) + ACTIVE(v2) -> ...
 */
export class RecordStore {
    constructor(
        private access: AccessControl,
        private geoStats: GeoStatsAggregator
    ) { }

    public add(draft: StateDraft, args: RecordArgs, caller: Identity, sequence: number): RecordId {
        enforce(VerifiedMemberGuard({ access: this.access, state: draft, caller }));
        assertRecordArgs(args);

        return this.append(draft, args, caller, sequence, null);
    }

    public update(draft: StateDraft, existingId: RecordId, args: RecordArgs, caller: Identity, sequence: number): RecordId {
        const existing = lookup(draft.records, key(existingId));
        if (!existing) throw new RegistryError(ErrorCode.INVALID_RECORD, `Record ${existingId} does not exist`);
        enforce(ActiveRecordGuard({ record: existing }));
        enforce(AmendGuard({ access: this.access, state: draft, caller, record: existing }));
        assertRecordArgs(args);

        existing.status = 'ARCHIVED';
        return this.append(draft, args, caller, sequence, existing);
    }

    public get(state: RegistryState, id: RecordId): ParasiteRecord | undefined {
        const row = lookup(state.records, key(id));
        return row ? toParasiteRecord(row) : undefined;
    }

    /**
     * The record followed by every ancestor, newest first. Ids strictly
     * decrease along the chain, so the walk ends after `version` steps.
     */
    public history(state: RegistryState, id: RecordId): ParasiteRecord[] {
        const head = lookup(state.records, key(id));
        if (!head) throw new RegistryError(ErrorCode.INVALID_RECORD, `Record ${id} does not exist`);

        const chain: ParasiteRecord[] = [];
        let current: RecordRow | undefined = head;
        while (current) {
            chain.push(toParasiteRecord(current));
            if (current.previousVersion === null) break;
            if (current.previousVersion >= current.id || chain.length >= head.version) {
                throw new RegistryError(ErrorCode.INTEGRITY_BREACH, `Lineage of record ${id} is not a backward chain`);
            }
            current = lookup(state.records, key(current.previousVersion));
        }
        return chain;
    }

    public total(state: RegistryState): number {
        return state.recordCount;
    }

    private append(
        draft: StateDraft,
        args: RecordArgs,
        caller: Identity,
        sequence: number,
        predecessor: RecordRow | null
    ): RecordId {
        const id = draft.recordCount + 1;
        draft.recordCount = id;
        draft.records[key(id)] = {
            id,
            parasiteName: args.parasiteName,
            classification: args.classification,
            location: args.location,
            recordedAt: sequence,
            author: caller.toHex(),
            metadataHash: args.metadataHash,
            status: 'ACTIVE',
            version: predecessor ? predecessor.version + 1 : 1,
            previousVersion: predecessor ? predecessor.id : null
        };

        this.geoStats.increment(draft, args.location, sequence);
        return id;
    }
}
