import { Identity } from '../L1/Identity.js';
import type { AccessControl } from '../L1/AccessControl.js';
import type { Institution, InstitutionId } from '../L0/Ontology.js';
import { lookup } from '../L2/State.js';
import type { RegistryState, StateDraft } from '../L2/State.js';
import { OwnerGuard, enforce } from '../L0/Guards.js';
import { assertField } from '../L0/Invariants.js';
import { ErrorCode, RegistryError } from '../Errors.js';

export class InstitutionRegistry {
    constructor(private access: AccessControl) { }

    /**
     * Owner-only. The registering owner becomes the institution admin.
     * Re-registering an existing id is rejected rather than overwritten.
     */
    public register(draft: StateDraft, id: InstitutionId, name: string, caller: Identity): void {
        enforce(OwnerGuard({ access: this.access, state: draft, caller }));
        assertField('institutionId', id);
        assertField('institutionName', name);

        if (lookup(draft.institutions, id)) {
            throw new RegistryError(ErrorCode.INSTITUTION_EXISTS, `Institution ${id} is already registered`);
        }

        draft.institutions[id] = { id, name, verified: false, admin: caller.toHex() };
    }

    // Idempotent: verifying twice is a successful no-op
    public verify(draft: StateDraft, id: InstitutionId, caller: Identity): void {
        enforce(OwnerGuard({ access: this.access, state: draft, caller }));

        const institution = lookup(draft.institutions, id);
        if (!institution) throw new RegistryError(ErrorCode.INVALID_INSTITUTION, `Institution ${id} does not exist`);

        institution.verified = true;
    }

    public get(state: RegistryState, id: InstitutionId): Institution | undefined {
        const row = lookup(state.institutions, id);
        if (!row) return undefined;
        return { ...row, admin: Identity.fromHex(row.admin) };
    }
}
