import { RegistryKernel } from '../Kernel.js';
import { Identity } from '../L1/Identity.js';
import { AuditLog } from '../L5/Audit.js';
import type { IEventStore, Evidence } from '../L5/Audit.js';
import { ErrorCode, RegistryError } from '../Errors.js';

export class ReplayEngine {
    /**
     * Opens the registry persisted in `store`: replays its history when there
     * is one, otherwise writes a new genesis for `owner`.
     */
    public open(store: IEventStore, owner?: Identity): RegistryKernel {
        if (store.getLatest() === null) {
            if (!owner) throw new Error('Replay Error: empty store and no owner to initialize with');
            return RegistryKernel.genesis(owner, store);
        }
        const kernel = this.replay(store.getHistory(), owner);
        kernel.Ledger.attach(store);
        return kernel;
    }

    /**
     * Rebuilds a kernel by re-executing every committed action. Each replayed
     * commit must reproduce the stored evidence exactly.
     */
    public replay(history: Evidence[], expectedOwner?: Identity): RegistryKernel {
        console.log(`[ReplayEngine] Starting replay of ${history.length} events...`);

        if (!AuditLog.verify(history)) {
            throw new RegistryError(ErrorCode.INTEGRITY_BREACH, 'Stored evidence chain does not verify');
        }

        const [genesis, ...entries] = history;
        if (!genesis || genesis.action.operation !== 'INITIALIZE') {
            throw new RegistryError(ErrorCode.INTEGRITY_BREACH, 'History does not start with a genesis entry');
        }

        const owner = Identity.fromHex(genesis.action.args.owner);
        if (expectedOwner && !expectedOwner.equals(owner)) {
            throw new RegistryError(ErrorCode.INTEGRITY_BREACH, 'Configured owner differs from the stored genesis owner');
        }

        const kernel = RegistryKernel.genesis(owner);

        for (const entry of entries) {
            const result = kernel.execute(entry.action);
            if (!result.ok) {
                throw new RegistryError(
                    ErrorCode.INTEGRITY_BREACH,
                    `Replay Failure at sequence ${entry.sequence}: ${result.error.message}`
                );
            }
            const tip = kernel.Ledger.getTip();
            if (tip?.evidenceId !== entry.evidenceId) {
                throw new RegistryError(ErrorCode.INTEGRITY_BREACH, `Replay diverged at sequence ${entry.sequence}`);
            }
        }

        console.log(`[ReplayEngine] Replay complete at sequence ${kernel.Sequence}.`);
        return kernel;
    }
}
