import { createDraft, finishDraft } from 'immer';
import type { Draft } from 'immer';
import type {
    GeoStat, IdentityKey, InstitutionId, InstitutionRow, RecordRow, Region
} from '../L0/Ontology.js';

// --- State ---
export interface RegistryState {
    owner: IdentityKey;
    sequence: number; // Last committed sequence value
    recordCount: number; // Allocation counter
    records: Record<string, RecordRow>;
    institutions: Record<InstitutionId, InstitutionRow>;
    memberships: Record<IdentityKey, InstitutionId>;
    geoStats: Record<Region, GeoStat>;
}

export type StateDraft = Draft<RegistryState>;

// Keyed by caller-supplied strings, so tables carry no prototype
const table = <T>(): Record<string, T> => Object.create(null);

/** Own entries only; `constructor` or `__proto__` are ordinary keys. */
export function lookup<T>(rows: Record<string, T>, key: string): T | undefined {
    return Object.hasOwn(rows, key) ? rows[key] : undefined;
}

export function genesisState(owner: IdentityKey): RegistryState {
    return {
        owner,
        sequence: 0,
        recordCount: 0,
        records: table(),
        institutions: table(),
        memberships: table(),
        geoStats: table()
    };
}

/**
 * Holds the single current state. Every transition is drafted against the
 * frozen current state and only swapped in once `commit` has returned.
 */
export class StateModel {
    private current: RegistryState;

    constructor(owner: IdentityKey) {
        this.current = finishDraft(createDraft(genesisState(owner)));
    }

    public get view(): RegistryState { return this.current; }

    public apply<T>(
        mutate: (draft: StateDraft) => T,
        commit: (next: RegistryState) => void
    ): T {
        const draft = createDraft(this.current);
        const value = mutate(draft);
        const next = finishDraft(draft);
        commit(next);
        this.current = next;
        return value;
    }
}
