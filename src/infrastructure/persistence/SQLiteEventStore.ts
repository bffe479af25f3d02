import Database from 'better-sqlite3';
import type { IEventStore, Evidence } from '../../kernel-core/L5/Audit.js';
import type { RegistryAction } from '../../kernel-core/L0/Ontology.js';

interface AuditRow {
    sequence: number;
    evidenceId: string;
    previousEvidenceId: string;
    operation: string;
    caller: string;
    action: string;
}

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;

    constructor(dbPath: string = 'registry.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS audit_log (
                sequence INTEGER PRIMARY KEY,
                evidenceId TEXT UNIQUE NOT NULL,
                previousEvidenceId TEXT NOT NULL,
                operation TEXT NOT NULL,
                caller TEXT NOT NULL,
                action TEXT NOT NULL
            )
        `);
    }

    append(evidence: Evidence): void {
        const stmt = this.db.prepare(`
            INSERT INTO audit_log (
                sequence, evidenceId, previousEvidenceId, operation, caller, action
            ) VALUES (
                ?, ?, ?, ?, ?, ?
            )
        `);

        stmt.run(
            evidence.sequence,
            evidence.evidenceId,
            evidence.previousEvidenceId,
            evidence.action.operation,
            evidence.action.caller,
            JSON.stringify(evidence.action)
        );
    }

    getHistory(): Evidence[] {
        const stmt = this.db.prepare<[], AuditRow>('SELECT * FROM audit_log ORDER BY sequence ASC');
        return stmt.all().map((row) => this.mapRowToEvidence(row));
    }

    getLatest(): Evidence | null {
        const stmt = this.db.prepare<[], AuditRow>('SELECT * FROM audit_log ORDER BY sequence DESC LIMIT 1');
        const row = stmt.get();

        if (!row) return null;
        return this.mapRowToEvidence(row);
    }

    private mapRowToEvidence(row: AuditRow): Evidence {
        // Integrity of the parsed action is established by the hash chain on replay
        const action: RegistryAction = JSON.parse(row.action);
        return {
            evidenceId: row.evidenceId,
            previousEvidenceId: row.previousEvidenceId,
            sequence: row.sequence,
            action
        };
    }

    public close() {
        this.db.close();
    }
}
