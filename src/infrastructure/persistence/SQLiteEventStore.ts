import Database from 'better-sqlite3';
import type { IEventStore, Evidence, EvidenceStatus } from '../../kernel-core/L5/Audit.js';
import type { ClaimEventRecord, Extrinsic } from '../../kernel-core/L0/Ontology.js';

interface AuditRow {
    sequence: number;
    evidenceId: string;
    previousEvidenceId: string;
    blockNumber: number;
    signer: string;
    nonce: number;
    extrinsic: string;
    status: EvidenceStatus;
    code: string | null;
    reason: string | null;
    events: string;
}

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;

    constructor(dbPath: string = 'claims.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS audit_log (
                sequence INTEGER PRIMARY KEY AUTOINCREMENT,
                evidenceId TEXT UNIQUE NOT NULL,
                previousEvidenceId TEXT NOT NULL,
                blockNumber INTEGER NOT NULL,
                signer TEXT NOT NULL,
                nonce INTEGER NOT NULL,
                extrinsic TEXT NOT NULL,
                status TEXT NOT NULL,
                code TEXT,
                reason TEXT,
                events TEXT NOT NULL
            )
        `);
    }

    async append(evidence: Evidence): Promise<void> {
        const stmt = this.db.prepare(`
            INSERT INTO audit_log (
                evidenceId, previousEvidenceId, blockNumber, signer, nonce, extrinsic, status, code, reason, events
            ) VALUES (
                ?, ?, ?, ?, ?, ?, ?, ?, ?, ?
            )
        `);

        stmt.run(
            evidence.evidenceId,
            evidence.previousEvidenceId,
            evidence.blockNumber,
            evidence.extrinsic.signer,
            evidence.extrinsic.nonce,
            JSON.stringify(evidence.extrinsic),
            evidence.status,
            evidence.code ?? null,
            evidence.reason ?? null,
            JSON.stringify(evidence.events)
        );
    }

    async getHistory(): Promise<Evidence[]> {
        const stmt = this.db.prepare<[], AuditRow>('SELECT * FROM audit_log ORDER BY sequence ASC');
        return stmt.all().map(row => this.mapRowToEvidence(row));
    }

    async getLatest(): Promise<Evidence | null> {
        const stmt = this.db.prepare<[], AuditRow>('SELECT * FROM audit_log ORDER BY sequence DESC LIMIT 1');
        const row = stmt.get();

        if (!row) return null;
        return this.mapRowToEvidence(row);
    }

    private mapRowToEvidence(row: AuditRow): Evidence {
        const extrinsic: Extrinsic = JSON.parse(row.extrinsic);
        const events: ClaimEventRecord[] = JSON.parse(row.events);
        return {
            evidenceId: row.evidenceId,
            previousEvidenceId: row.previousEvidenceId,
            blockNumber: row.blockNumber,
            extrinsic,
            status: row.status,
            events,
            ...(row.code !== null ? { code: row.code } : {}),
            ...(row.reason !== null ? { reason: row.reason } : {})
        };
    }

    public close() {
        this.db.close();
    }
}
