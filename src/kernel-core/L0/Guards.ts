// src/kernel-core/L0/Guards.ts
import type { Identity } from '../L1/Identity.js';
import type { AccessControl } from '../L1/AccessControl.js';
import type { InstitutionId, RecordRow } from './Ontology.js';
import type { RegistryState } from '../L2/State.js';
import { ErrorCode, RegistryError } from '../Errors.js';

// --- Guard Pattern ---
export type GuardResult =
    | { ok: true }
    | { ok: false; code: ErrorCode; violation: string };

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, violation: string): GuardResult => ({ ok: false, code, violation });

interface AuthContext {
    access: AccessControl;
    state: RegistryState;
    caller: Identity;
}

// --- Concrete Guards ---

// 1. Registry administration
export const OwnerGuard: Guard<AuthContext> = ({ access, state, caller }) => {
    if (!access.isOwner(state, caller)) {
        return FAIL(ErrorCode.NOT_AUTHORIZED, 'Authority Violation: only the registry owner may administer institutions');
    }
    return OK;
};

// 2. Membership assignment
export const MembershipGuard: Guard<AuthContext & { institutionId: InstitutionId }> = ({ access, state, caller, institutionId }) => {
    if (access.isOwner(state, caller) || access.isInstitutionAdmin(state, caller, institutionId)) return OK;
    return FAIL(ErrorCode.NOT_AUTHORIZED, `Authority Violation: caller does not administer institution ${institutionId}`);
};

// 3. Writing records
export const VerifiedMemberGuard: Guard<AuthContext> = ({ access, state, caller }) => {
    if (!access.isVerifiedMember(state, caller)) {
        return FAIL(ErrorCode.NOT_VERIFIED, 'Verification Required: caller is not a member of a verified institution');
    }
    return OK;
};

// 4. Amending records
export const ActiveRecordGuard: Guard<{ record: RecordRow }> = ({ record }) => {
    if (record.status !== 'ACTIVE') return FAIL(ErrorCode.INVALID_RECORD, `Record ${record.id} is archived`);
    return OK;
};

export const AmendGuard: Guard<AuthContext & { record: RecordRow }> = ({ access, state, caller, record }) => {
    if (!access.canAmendRecord(state, caller, record)) {
        return FAIL(ErrorCode.NOT_AUTHORIZED, `Authority Violation: caller is neither author of record ${record.id} nor its institution admin`);
    }
    return OK;
};

/** Turns a failed guard into the rejection that aborts the transition. */
export function enforce(result: GuardResult): void {
    if (!result.ok) throw new RegistryError(result.code, result.violation);
}
