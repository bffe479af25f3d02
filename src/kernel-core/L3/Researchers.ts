import type { Identity } from '../L1/Identity.js';
import type { AccessControl } from '../L1/AccessControl.js';
import type { InstitutionId } from '../L0/Ontology.js';
import { lookup } from '../L2/State.js';
import type { RegistryState, StateDraft } from '../L2/State.js';
import { MembershipGuard, enforce } from '../L0/Guards.js';
import { assertField } from '../L0/Invariants.js';
import { ErrorCode, RegistryError } from '../Errors.js';

/** Researcher -> institution membership. One institution per researcher. */
export class ResearcherDirectory {
    constructor(private access: AccessControl) { }

    public membershipOf(state: RegistryState, researcher: Identity): InstitutionId | undefined {
        return lookup(state.memberships, researcher.toHex());
    }

    public setMembership(draft: StateDraft, researcher: Identity, institutionId: InstitutionId, caller: Identity): void {
        enforce(MembershipGuard({ access: this.access, state: draft, caller, institutionId }));
        assertField('institutionId', institutionId);

        if (!lookup(draft.institutions, institutionId)) {
            throw new RegistryError(ErrorCode.INVALID_INSTITUTION, `Institution ${institutionId} does not exist`);
        }

        draft.memberships[researcher.toHex()] = institutionId;
    }
}
