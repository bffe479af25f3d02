import { Identity } from './L1/Identity.js';
import { AccessControl } from './L1/AccessControl.js';
import { StateModel } from './L2/State.js';
import type { RegistryState, StateDraft } from './L2/State.js';
import { InstitutionRegistry } from './L3/Institutions.js';
import { ResearcherDirectory } from './L3/Researchers.js';
import { GeoStatsAggregator } from './L3/GeoStats.js';
import { RecordStore } from './L3/Records.js';
import { AuditLog } from './L5/Audit.js';
import type { IEventStore } from './L5/Audit.js';
import { checkLedgerInvariants } from './L0/Invariants.js';
import type { InvariantViolation } from './L0/Invariants.js';
import type {
    AddRecordAction, GeoStat, Institution, InstitutionId, MetadataHash, ParasiteRecord,
    RecordArgs, RecordFields, RecordId, RegisterInstitutionAction, RegistryAction,
    SetMembershipAction, UpdateRecordAction, VerifyInstitutionAction, WriteAction
} from './L0/Ontology.js';
import { ErrorCode, RegistryError, fail, ok } from './Errors.js';
import type { Result } from './Errors.js';

export interface IntegrityReport {
    chainValid: boolean;
    violations: InvariantViolation[];
}

export function toMetadataHex(input: MetadataHash | Uint8Array): MetadataHash {
    return typeof input === 'string' ? input.toLowerCase() : Buffer.from(input).toString('hex');
}

function toRecordArgs(fields: RecordFields): RecordArgs {
    return {
        parasiteName: fields.parasiteName,
        classification: fields.classification,
        location: fields.location,
        metadataHash: toMetadataHex(fields.metadataHash)
    };
}

const short = (key: string): string => `${key.slice(0, 8)}…`;

/**
 * The registry: one owned state, one ledger, one owner fixed at genesis.
 * Every write runs as a single drafted transition that is either committed
 * (state swapped and evidence appended) or discarded whole.
 */
export class RegistryKernel {
    private state: StateModel;
    private access = new AccessControl();
    private institutions: InstitutionRegistry;
    private researchers: ResearcherDirectory;
    private geoStats = new GeoStatsAggregator();
    private records: RecordStore;

    private constructor(owner: Identity, private audit: AuditLog) {
        this.state = new StateModel(owner.toHex());
        this.institutions = new InstitutionRegistry(this.access);
        this.researchers = new ResearcherDirectory(this.access);
        this.records = new RecordStore(this.access, this.geoStats);
    }

    /** A fresh registry. The genesis entry fixes the owner at sequence 0. */
    public static genesis(owner: Identity, store?: IEventStore): RegistryKernel {
        const kernel = new RegistryKernel(owner, new AuditLog(store));
        kernel.audit.append({ operation: 'INITIALIZE', caller: owner.toHex(), args: { owner: owner.toHex() } }, 0);
        console.log(`[RegistryKernel] Genesis: owner ${short(owner.toHex())}`);
        return kernel;
    }

    public get Ledger(): AuditLog { return this.audit; }
    public get Owner(): Identity { return Identity.fromHex(this.state.view.owner); }
    public get Sequence(): number { return this.state.view.sequence; }

    /** Frozen view of every table, for inspection and comparison. */
    public snapshot(): RegistryState { return this.state.view; }

    // --- Writes ---

    public addParasiteRecord(fields: RecordFields, caller: Identity): Result<RecordId> {
        return this.addRecord({ operation: 'ADD_RECORD', caller: caller.toHex(), args: toRecordArgs(fields) });
    }

    public updateParasiteRecord(existingId: RecordId, fields: RecordFields, caller: Identity): Result<RecordId> {
        return this.updateRecord({
            operation: 'UPDATE_RECORD',
            caller: caller.toHex(),
            args: { existingId, ...toRecordArgs(fields) }
        });
    }

    public registerInstitution(id: InstitutionId, name: string, caller: Identity): Result<void> {
        return this.registerInst({ operation: 'REGISTER_INSTITUTION', caller: caller.toHex(), args: { id, name } });
    }

    public verifyInstitution(id: InstitutionId, caller: Identity): Result<void> {
        return this.verifyInst({ operation: 'VERIFY_INSTITUTION', caller: caller.toHex(), args: { id } });
    }

    public setResearcherMembership(researcher: Identity, institutionId: InstitutionId, caller: Identity): Result<void> {
        return this.setMembership({
            operation: 'SET_MEMBERSHIP',
            caller: caller.toHex(),
            args: { researcher: researcher.toHex(), institutionId }
        });
    }

    /**
     * Entry point for actions arriving as data (signed commands, replay).
     * The action is recorded on the ledger exactly as given.
     */
    public execute(action: RegistryAction): Result<RecordId | void> {
        switch (action.operation) {
            case 'ADD_RECORD': return this.addRecord(action);
            case 'UPDATE_RECORD': return this.updateRecord(action);
            case 'REGISTER_INSTITUTION': return this.registerInst(action);
            case 'VERIFY_INSTITUTION': return this.verifyInst(action);
            case 'SET_MEMBERSHIP': return this.setMembership(action);
            case 'INITIALIZE':
                return fail(new RegistryError(ErrorCode.NOT_AUTHORIZED, 'Registry is already initialized'));
        }
    }

    // --- Reads ---

    public getParasiteRecord(id: RecordId): ParasiteRecord | undefined {
        return this.records.get(this.state.view, id);
    }

    public getParasiteRecordHistory(id: RecordId): Result<ParasiteRecord[]> {
        try {
            return ok(this.records.history(this.state.view, id));
        } catch (e) {
            if (e instanceof RegistryError) return fail(e);
            throw e;
        }
    }

    public getGeographicStats(region: string): GeoStat | undefined {
        return this.geoStats.get(this.state.view, region);
    }

    public getInstitutionDetails(id: InstitutionId): Institution | undefined {
        return this.institutions.get(this.state.view, id);
    }

    public getResearcherMembership(researcher: Identity): InstitutionId | undefined {
        return this.researchers.membershipOf(this.state.view, researcher);
    }

    public getTotalRecords(): number {
        return this.records.total(this.state.view);
    }

    public verifyIntegrity(): IntegrityReport {
        return {
            chainValid: this.audit.verifyChain(),
            violations: checkLedgerInvariants(this.state.view)
        };
    }

    // --- Transitions ---

    private addRecord(action: AddRecordAction): Result<RecordId> {
        return this.commit(action, (draft, caller, sequence) =>
            this.records.add(draft, action.args, caller, sequence));
    }

    private updateRecord(action: UpdateRecordAction): Result<RecordId> {
        const { existingId, ...args } = action.args;
        return this.commit(action, (draft, caller, sequence) =>
            this.records.update(draft, existingId, args, caller, sequence));
    }

    private registerInst(action: RegisterInstitutionAction): Result<void> {
        return this.commit(action, (draft, caller) =>
            this.institutions.register(draft, action.args.id, action.args.name, caller));
    }

    private verifyInst(action: VerifyInstitutionAction): Result<void> {
        return this.commit(action, (draft, caller) =>
            this.institutions.verify(draft, action.args.id, caller));
    }

    private setMembership(action: SetMembershipAction): Result<void> {
        return this.commit(action, (draft, caller) =>
            this.researchers.setMembership(draft, Identity.fromHex(action.args.researcher), action.args.institutionId, caller));
    }

    /**
     * ATOMIC BOUNDARY. Guards and mutations run against a draft; the evidence
     * is appended (and persisted) before the finished state is swapped in.
     * A RegistryError anywhere before the swap discards the draft.
     */
    private commit<T>(
        action: WriteAction,
        mutate: (draft: StateDraft, caller: Identity, sequence: number) => T
    ): Result<T> {
        try {
            const value = this.state.apply(
                (draft) => {
                    const caller = Identity.fromHex(action.caller);
                    const sequence = draft.sequence + 1;
                    draft.sequence = sequence;
                    return mutate(draft, caller, sequence);
                },
                (next) => { this.audit.append(action, next.sequence); }
            );
            return ok(value);
        } catch (e) {
            if (e instanceof RegistryError) {
                console.warn(`[RegistryKernel] Rejected ${action.operation} from ${short(action.caller)}: ${e.message}`);
                return fail(e);
            }
            throw e;
        }
    }
}
