// src/kernel-core/L5/Audit.ts
import { hash, canonicalize, ZERO_HASH } from '../L0/Crypto.js';
import type { RegistryAction } from '../L0/Ontology.js';

/**
 * Event Store Port. Synchronous: a commit is persisted before the kernel
 * swaps in the new state, with nothing interleaving in between.
 */
export interface IEventStore {
    append(evidence: Evidence): void;
    getHistory(): Evidence[];
    getLatest(): Evidence | null;
}

// --- Evidence (one committed write) ---
export interface Evidence {
    evidenceId: string; // The identifying hash
    previousEvidenceId: string; // Chain linkage
    sequence: number;
    action: RegistryAction;
}

export class AuditLog {
    private chain: Evidence[] = [];

    constructor(private store?: IEventStore) { }

    public append(action: RegistryAction, sequence: number): Evidence {
        const tip = this.getTip();
        const previousHash = tip ? tip.evidenceId : ZERO_HASH;

        if (tip && sequence !== tip.sequence + 1) {
            throw new Error(`Audit Violation: sequence ${sequence} does not follow ${tip.sequence}`);
        }

        const evidence: Evidence = {
            evidenceId: AuditLog.calculateHash(previousHash, sequence, action),
            previousEvidenceId: previousHash,
            sequence,
            action
        };

        // Immutability Law
        Object.freeze(evidence);

        this.store?.append(evidence);
        this.chain.push(evidence);
        return evidence;
    }

    /**
     * Starts persisting to `store`, whose history must be exactly this
     * log's chain (the state a replay leaves behind).
     */
    public attach(store: IEventStore): void {
        const latest = store.getLatest();
        const tip = this.getTip();
        if (latest?.evidenceId !== tip?.evidenceId) {
            throw new Error(`Audit Violation: store tip ${latest?.evidenceId ?? 'none'} does not match log tip ${tip?.evidenceId ?? 'none'}`);
        }
        this.store = store;
    }

    public getHistory(): Evidence[] { return [...this.chain]; }

    public getTip(): Evidence | null {
        return this.chain[this.chain.length - 1] ?? null;
    }

    // Historical Legitimacy
    public verifyChain(): boolean {
        return AuditLog.verify(this.chain);
    }

    public static verify(history: Evidence[]): boolean {
        let prev = ZERO_HASH;
        let expectedSequence = 0;

        for (const entry of history) {
            if (entry.previousEvidenceId !== prev) return false;
            if (entry.sequence !== expectedSequence) return false;
            if (AuditLog.calculateHash(prev, entry.sequence, entry.action) !== entry.evidenceId) return false;

            prev = entry.evidenceId;
            expectedSequence++;
        }
        return true;
    }

    public static calculateHash(prevHash: string, sequence: number, action: RegistryAction): string {
        // Canonical Evidence Tuple: [PreviousHash, Sequence, ActionHash]
        const canonical: [string, number, string] = [prevHash, sequence, hash(canonicalize(action))];
        return hash(canonicalize(canonical));
    }
}
