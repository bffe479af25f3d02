/**
 * REGISTRY ONTOLOGY
 * The single source of truth for the registry's primitives and the
 * write actions recorded on the ledger.
 */
import type { Identity } from '../L1/Identity.js';

// --- 1. Keys ---
export type RecordId = number;
export type InstitutionId = string;
export type IdentityKey = string; // Identity.toHex()
export type MetadataHash = string; // 32 bytes, lowercase hex
export type Region = string;

// --- 2. Parasite Record ---
export type RecordStatus = 'ACTIVE' | 'ARCHIVED';

export interface RecordRow {
    id: RecordId;
    parasiteName: string;
    classification: string;
    location: string;
    recordedAt: number; // Commit sequence
    author: IdentityKey;
    metadataHash: MetadataHash;
    status: RecordStatus;
    version: number;
    previousVersion: RecordId | null;
}

export interface ParasiteRecord extends Omit<RecordRow, 'author'> {
    author: Identity;
}

/** Caller-supplied content of a record version. */
export interface RecordFields {
    parasiteName: string;
    classification: string;
    location: string;
    metadataHash: MetadataHash | Uint8Array;
}

// --- 3. Institution ---
export interface InstitutionRow {
    id: InstitutionId;
    name: string;
    verified: boolean;
    admin: IdentityKey;
}

export interface Institution extends Omit<InstitutionRow, 'admin'> {
    admin: Identity;
}

// --- 4. Geographic Aggregate ---
export interface GeoStat {
    region: Region;
    totalCases: number;
    lastUpdated: number;
}

// --- 5. Actions (ledger entries) ---
export interface RecordArgs {
    parasiteName: string;
    classification: string;
    location: string;
    metadataHash: MetadataHash;
}

interface ActionBase {
    caller: IdentityKey;
    commandId?: string;
}

export interface InitializeAction extends ActionBase {
    operation: 'INITIALIZE';
    args: { owner: IdentityKey };
}

export interface AddRecordAction extends ActionBase {
    operation: 'ADD_RECORD';
    args: RecordArgs;
}

export interface UpdateRecordAction extends ActionBase {
    operation: 'UPDATE_RECORD';
    args: RecordArgs & { existingId: RecordId };
}

export interface RegisterInstitutionAction extends ActionBase {
    operation: 'REGISTER_INSTITUTION';
    args: { id: InstitutionId; name: string };
}

export interface VerifyInstitutionAction extends ActionBase {
    operation: 'VERIFY_INSTITUTION';
    args: { id: InstitutionId };
}

export interface SetMembershipAction extends ActionBase {
    operation: 'SET_MEMBERSHIP';
    args: { researcher: IdentityKey; institutionId: InstitutionId };
}

export type WriteAction =
    | AddRecordAction
    | UpdateRecordAction
    | RegisterInstitutionAction
    | VerifyInstitutionAction
    | SetMembershipAction;

export type RegistryAction = InitializeAction | WriteAction;

export type Operation = WriteAction['operation'];

export const OPERATIONS: readonly Operation[] = [
    'ADD_RECORD',
    'UPDATE_RECORD',
    'REGISTER_INSTITUTION',
    'VERIFY_INSTITUTION',
    'SET_MEMBERSHIP'
];
