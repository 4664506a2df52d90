import Database from 'better-sqlite3';
import { z } from 'zod';
import { ErrorCode, AccessError } from '../../kernel-core/Errors.js';
import { assertTip, decodeState, encodeState } from '../../kernel-core/L2/State.js';
import type { IStateStore } from '../../kernel-core/L2/State.js';
import { AccessEventSchema } from '../../kernel-core/L5/Audit.js';
import type { AccessState, Evidence } from '../../kernel-core/L0/Ontology.js';

const StateRow = z.object({ state: z.string() });
const TipRow = z.object({ evidenceId: z.string() });

const EvidenceRow = z.object({
    evidenceId: z.string(),
    previousEvidenceId: z.string(),
    objectId: z.string(),
    sequence: z.number().int(),
    operation: z.string(),
    caller: z.string(),
    event: z.string(),
    timestamp: z.number().int()
});

export class SQLiteStateStore implements IStateStore {
    private db: Database.Database;

    constructor(dbPath: string = 'access.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS access_state (
                objectId TEXT PRIMARY KEY,
                state TEXT NOT NULL
            );
            CREATE TABLE IF NOT EXISTS access_evidence (
                objectId TEXT NOT NULL,
                sequence INTEGER NOT NULL,
                evidenceId TEXT UNIQUE NOT NULL,
                previousEvidenceId TEXT NOT NULL,
                operation TEXT NOT NULL,
                caller TEXT NOT NULL,
                event TEXT NOT NULL,
                timestamp INTEGER NOT NULL,
                PRIMARY KEY (objectId, sequence)
            )
        `);
    }

    load(objectId: string): AccessState | null {
        const row: unknown = this.db.prepare('SELECT state FROM access_state WHERE objectId = ?').get(objectId);
        if (row === undefined) return null;
        return decodeState(this.parseRow(StateRow, row).state);
    }

    commit(objectId: string, state: AccessState, evidence: readonly Evidence[], expectedTip: string | null): void {
        const tip = this.db.prepare(
            'SELECT evidenceId FROM access_evidence WHERE objectId = ? ORDER BY sequence DESC LIMIT 1'
        );
        const upsert = this.db.prepare(`
            INSERT INTO access_state (objectId, state) VALUES (?, ?)
            ON CONFLICT(objectId) DO UPDATE SET state = excluded.state
        `);
        const append = this.db.prepare(`
            INSERT INTO access_evidence (
                objectId, sequence, evidenceId, previousEvidenceId, operation, caller, event, timestamp
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        `);

        // Tip check and writes share one IMMEDIATE transaction
        const write = this.db.transaction(() => {
            const row: unknown = tip.get(objectId);
            const actual = row === undefined ? null : this.parseRow(TipRow, row).evidenceId;
            assertTip(objectId, actual, expectedTip);

            upsert.run(objectId, encodeState(state));
            for (const e of evidence) {
                append.run(
                    objectId,
                    e.sequence,
                    e.evidenceId,
                    e.previousEvidenceId,
                    e.operation,
                    e.caller,
                    JSON.stringify(e.event),
                    e.timestamp
                );
            }
        });
        write.immediate();
    }

    getHistory(objectId: string): Evidence[] {
        const rows: unknown[] = this.db
            .prepare('SELECT * FROM access_evidence WHERE objectId = ? ORDER BY sequence ASC')
            .all(objectId);
        return rows.map((row) => this.mapRowToEvidence(row));
    }

    getLatest(objectId: string): Evidence | null {
        const row: unknown = this.db
            .prepare('SELECT * FROM access_evidence WHERE objectId = ? ORDER BY sequence DESC LIMIT 1')
            .get(objectId);
        if (row === undefined) return null;
        return this.mapRowToEvidence(row);
    }

    close(): void {
        this.db.close();
    }

    private mapRowToEvidence(row: unknown): Evidence {
        const r = this.parseRow(EvidenceRow, row);
        let event: unknown;
        try {
            event = JSON.parse(r.event);
        } catch (e) {
            throw new AccessError(ErrorCode.STATE_CORRUPTED, `Evidence ${r.evidenceId} has unreadable event: ${String(e)}`);
        }
        return Object.freeze({
            evidenceId: r.evidenceId,
            previousEvidenceId: r.previousEvidenceId,
            objectId: r.objectId,
            sequence: r.sequence,
            operation: r.operation,
            caller: r.caller,
            event: this.parseRow(AccessEventSchema, event),
            timestamp: r.timestamp
        });
    }

    private parseRow<T>(schema: z.ZodType<T>, row: unknown): T {
        const parsed = schema.safeParse(row);
        if (!parsed.success) {
            throw new AccessError(ErrorCode.STATE_CORRUPTED, 'Stored row failed validation', {
                issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
            });
        }
        return parsed.data;
    }
}
