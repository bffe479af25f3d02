// src/kernel-core/L0/Invariants.ts
import type { RecordArgs, RecordRow } from './Ontology.js';
import { lookup } from '../L2/State.js';
import type { RegistryState } from '../L2/State.js';
import { ErrorCode, RegistryError } from '../Errors.js';

// --- 1. Field Constraints ---

export const FIELD_LIMITS = {
    parasiteName: 100,
    classification: 50,
    location: 100,
    institutionId: 50,
    institutionName: 100
} as const;

export type BoundedField = keyof typeof FIELD_LIMITS;

const PRINTABLE_ASCII = /^[\x20-\x7E]+$/;

export function assertField(field: BoundedField, value: string): void {
    const limit = FIELD_LIMITS[field];
    if (value.length === 0 || value.length > limit) {
        throw new RegistryError(ErrorCode.INVALID_FIELD, `${field} must be 1-${limit} characters`, { field, length: value.length });
    }
    if (!PRINTABLE_ASCII.test(value)) {
        throw new RegistryError(ErrorCode.INVALID_FIELD, `${field} must be printable ASCII`, { field });
    }
}

export function assertMetadataHash(value: string): void {
    if (!/^[0-9a-f]{64}$/.test(value)) {
        throw new RegistryError(ErrorCode.INVALID_FIELD, 'metadataHash must be exactly 32 bytes', { field: 'metadataHash' });
    }
}

export function assertRecordArgs(args: RecordArgs): void {
    assertField('parasiteName', args.parasiteName);
    assertField('classification', args.classification);
    assertField('location', args.location);
    assertMetadataHash(args.metadataHash);
}

// --- 2. Ledger Invariants ---

export interface LedgerInvariant {
    id: string;
    boundary: string;
    description: string;
    check: (state: RegistryState) => string | null;
}

export interface InvariantViolation {
    invariantId: string;
    boundary: string;
    message: string;
}

const rows = (state: RegistryState): RecordRow[] =>
    Object.values(state.records).sort((a, b) => a.id - b.id);

export const INV_REC_01: LedgerInvariant = {
    id: 'INV-REC-01',
    boundary: 'Identifier Allocation',
    description: 'Record ids are exactly 1..recordCount',
    check: (state) => {
        const all = rows(state);
        if (all.length !== state.recordCount) return `Counter ${state.recordCount} but ${all.length} records`;
        const gap = all.find((r, i) => r.id !== i + 1);
        return gap ? `Unexpected record id ${gap.id}` : null;
    }
};

export const INV_REC_02: LedgerInvariant = {
    id: 'INV-REC-02',
    boundary: 'Version Lineage',
    description: 'Version 1 iff no predecessor, otherwise predecessor version + 1 with a smaller id',
    check: (state) => {
        for (const r of rows(state)) {
            if (r.previousVersion === null) {
                if (r.version !== 1) return `Record ${r.id} has no predecessor but version ${r.version}`;
                continue;
            }
            const prev = lookup(state.records, String(r.previousVersion));
            if (!prev) return `Record ${r.id} points at missing record ${r.previousVersion}`;
            if (prev.id >= r.id) return `Record ${r.id} points forward to ${prev.id}`;
            if (r.version !== prev.version + 1) return `Record ${r.id} version ${r.version} does not follow ${prev.version}`;
        }
        return null;
    }
};

export const INV_REC_03: LedgerInvariant = {
    id: 'INV-REC-03',
    boundary: 'Single Active Head',
    description: 'Each record has at most one successor; superseded records are archived, heads are active',
    check: (state) => {
        const successors = new Map<number, number>();
        for (const r of rows(state)) {
            if (r.previousVersion === null) continue;
            const existing = successors.get(r.previousVersion);
            if (existing !== undefined) return `Record ${r.previousVersion} superseded twice (${existing}, ${r.id})`;
            successors.set(r.previousVersion, r.id);
        }
        for (const r of rows(state)) {
            const superseded = successors.has(r.id);
            if (superseded && r.status !== 'ARCHIVED') return `Superseded record ${r.id} is still active`;
            if (!superseded && r.status !== 'ACTIVE') return `Head record ${r.id} is archived`;
        }
        return null;
    }
};

export const INV_GEO_01: LedgerInvariant = {
    id: 'INV-GEO-01',
    boundary: 'Geographic Aggregation',
    description: 'Every record creation is counted exactly once in its region',
    check: (state) => {
        const perRegion = new Map<string, number>();
        for (const r of rows(state)) perRegion.set(r.location, (perRegion.get(r.location) ?? 0) + 1);
        for (const stat of Object.values(state.geoStats)) {
            const expected = perRegion.get(stat.region) ?? 0;
            if (stat.totalCases !== expected) return `Region ${stat.region} counts ${stat.totalCases}, expected ${expected}`;
            perRegion.delete(stat.region);
        }
        const [missing] = perRegion.keys();
        return missing === undefined ? null : `Region ${missing} has records but no aggregate`;
    }
};

export const INV_INST_01: LedgerInvariant = {
    id: 'INV-INST-01',
    boundary: 'Membership Integrity',
    description: 'Memberships reference registered institutions',
    check: (state) => {
        for (const [member, institutionId] of Object.entries(state.memberships)) {
            if (!lookup(state.institutions, institutionId)) return `Member ${member} belongs to unknown institution ${institutionId}`;
        }
        return null;
    }
};

export const AllInvariants: LedgerInvariant[] = [INV_REC_01, INV_REC_02, INV_REC_03, INV_GEO_01, INV_INST_01];

export function checkLedgerInvariants(state: RegistryState): InvariantViolation[] {
    const violations: InvariantViolation[] = [];
    for (const inv of AllInvariants) {
        const message = inv.check(state);
        if (message !== null) violations.push({ invariantId: inv.id, boundary: inv.boundary, message });
    }
    return violations;
}
