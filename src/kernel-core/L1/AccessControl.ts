import type { Identity } from './Identity.js';
import type { InstitutionId, RecordRow } from '../L0/Ontology.js';
import { lookup } from '../L2/State.js';
import type { RegistryState } from '../L2/State.js';

/**
 * Authorization predicates. Stateless: every question is asked of the state
 * view handed in, so a draft sees its own pending changes.
 */
export class AccessControl {
    public isOwner(state: RegistryState, caller: Identity): boolean {
        return state.owner === caller.toHex();
    }

    public isInstitutionAdmin(state: RegistryState, caller: Identity, institutionId: InstitutionId): boolean {
        const institution = lookup(state.institutions, institutionId);
        return institution !== undefined && institution.admin === caller.toHex();
    }

    public isVerifiedMember(state: RegistryState, caller: Identity): boolean {
        const institutionId = lookup(state.memberships, caller.toHex());
        if (institutionId === undefined) return false;
        return lookup(state.institutions, institutionId)?.verified === true;
    }

    // Author, or admin of the caller's own institution
    public canAmendRecord(state: RegistryState, caller: Identity, record: RecordRow): boolean {
        if (record.author === caller.toHex()) return true;
        const institutionId = lookup(state.memberships, caller.toHex());
        return institutionId !== undefined && this.isInstitutionAdmin(state, caller, institutionId);
    }
}
