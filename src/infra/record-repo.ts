import { Database } from 'sqlite';
import { v4 as uuidv4 } from 'uuid';
import pino from 'pino';
import type {
    InvestmentRecord,
    NewInvestmentRecord,
    RecordPatch,
    RecordStatus,
    UpdateGuard
} from '../domain/entities';
import { DuplicateCodeError, StoreUnavailableError, ValidationError } from '../domain/errors';
import { isAmountInRange } from '../domain/investment';

const logger = pino({ name: 'infra/records', level: process.env.LOG_LEVEL || 'info' });

/**
 * Durable access to investment records.
 *
 * Lookups return null instead of throwing when nothing matches. Every store failure
 * surfaces as StoreUnavailableError; callers decide whether to retry.
 */
export interface RecordRepository {
    append(record: NewInvestmentRecord): Promise<string>;
    findById(recordId: string): Promise<InvestmentRecord | null>;
    findLatest(userId: string): Promise<InvestmentRecord | null>;
    findByAssignedCode(code: string): Promise<InvestmentRecord | null>;
    /** Writes every field in one statement. False when the row is missing or the guard does not hold. */
    updateFields(recordId: string, patch: RecordPatch, guard?: UpdateGuard): Promise<boolean>;
    /** Lazy full scan in insertion order. Each call starts from the beginning. */
    listAll(): AsyncIterable<InvestmentRecord>;
}

interface RecordRow {
    seq: number;
    record_id: string;
    user_id: string;
    name: string;
    national_id: string;
    amount: number;
    referral_code: string;
    assigned_code: string | null;
    created_at: string;
    expected_payout_date: string;
    proof_reference: string | null;
    status: string;
    reviewer_note: string;
}

const STATUSES: readonly RecordStatus[] = ['AwaitingProof', 'ProofSubmitted', 'Approved', 'Rejected'];

const PATCH_COLUMNS: [keyof RecordPatch, string][] = [
    ['assignedCode', 'assigned_code'],
    ['proofReference', 'proof_reference'],
    ['status', 'status'],
    ['reviewerNote', 'reviewer_note']
];

function isRecordStatus(value: string): value is RecordStatus {
    return STATUSES.some(s => s === value);
}

function isUniqueViolation(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === 'SQLITE_CONSTRAINT'
        && err instanceof Error && err.message.includes('UNIQUE');
}

export class SqliteRecordRepository implements RecordRepository {
    constructor(private db: Database, private batchSize: number = 200) { }

    async append(record: NewInvestmentRecord): Promise<string> {
        if (!isAmountInRange(record.amount)) {
            throw new ValidationError(`Amount out of range: ${record.amount}`);
        }
        const recordId = uuidv4();

        await this.query('append', () => this.db.run(
            `INSERT INTO investment_records (
                record_id, user_id, name, national_id, amount, referral_code, assigned_code,
                created_at, expected_payout_date, proof_reference, status, reviewer_note
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            [
                recordId,
                record.userId,
                record.name,
                record.nationalId,
                record.amount,
                record.referralCode,
                record.assignedCode,
                record.createdAt.toISOString(),
                record.expectedPayoutDate.toISOString(),
                record.proofReference,
                record.status,
                record.reviewerNote
            ]
        ));

        logger.info({ recordId, userId: record.userId }, 'Record appended');
        return recordId;
    }

    async findById(recordId: string): Promise<InvestmentRecord | null> {
        const row = await this.query('findById', () =>
            this.db.get<RecordRow>(`SELECT * FROM investment_records WHERE record_id = ?`, [recordId]));
        return row ? this.mapRowToRecord(row) : null;
    }

    async findLatest(userId: string): Promise<InvestmentRecord | null> {
        const row = await this.query('findLatest', () => this.db.get<RecordRow>(
            `SELECT * FROM investment_records WHERE user_id = ? ORDER BY created_at DESC, seq DESC LIMIT 1`,
            [userId]
        ));
        return row ? this.mapRowToRecord(row) : null;
    }

    async findByAssignedCode(code: string): Promise<InvestmentRecord | null> {
        const row = await this.query('findByAssignedCode', () =>
            this.db.get<RecordRow>(`SELECT * FROM investment_records WHERE assigned_code = ?`, [code]));
        return row ? this.mapRowToRecord(row) : null;
    }

    async updateFields(recordId: string, patch: RecordPatch, guard: UpdateGuard = {}): Promise<boolean> {
        const sets: string[] = [];
        const params: (string | null)[] = [];
        for (const [key, column] of PATCH_COLUMNS) {
            const value = patch[key];
            if (value === undefined) continue;
            sets.push(`${column} = ?`);
            params.push(value);
        }
        if (sets.length === 0) {
            return (await this.findById(recordId)) !== null;
        }

        let where = 'record_id = ?';
        params.push(recordId);
        if (guard.expectedStatus) {
            where += ' AND status = ?';
            params.push(guard.expectedStatus);
        }
        // An assigned code never changes once set
        if (patch.assignedCode) {
            where += ' AND (assigned_code IS NULL OR assigned_code = ?)';
            params.push(patch.assignedCode);
        }

        try {
            const result = await this.db.run(
                `UPDATE investment_records SET ${sets.join(', ')} WHERE ${where}`,
                params
            );
            const updated = (result.changes ?? 0) > 0;
            if (!updated) {
                logger.warn({ recordId, guard }, 'Update matched no row');
            }
            return updated;
        } catch (err) {
            if (patch.assignedCode && isUniqueViolation(err)) {
                throw new DuplicateCodeError(patch.assignedCode);
            }
            logger.error({ err, recordId }, 'updateFields failed');
            throw new StoreUnavailableError('Record store unavailable', err);
        }
    }

    async *listAll(): AsyncGenerator<InvestmentRecord> {
        let after = 0;
        for (;;) {
            const rows = await this.query('listAll', () => this.db.all<RecordRow[]>(
                `SELECT * FROM investment_records WHERE seq > ? ORDER BY seq ASC LIMIT ?`,
                [after, this.batchSize]
            ));
            for (const row of rows) {
                after = row.seq;
                yield this.mapRowToRecord(row);
            }
            if (rows.length < this.batchSize) return;
        }
    }

    private async query<T>(op: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (err) {
            logger.error({ err, op }, 'Record store call failed');
            throw new StoreUnavailableError(`Record store unavailable (${op})`, err);
        }
    }

    private mapRowToRecord(row: RecordRow): InvestmentRecord {
        if (!isRecordStatus(row.status)) {
            throw new StoreUnavailableError(`Unknown status "${row.status}" on record ${row.record_id}`);
        }
        return {
            recordId: row.record_id,
            userId: row.user_id,
            name: row.name,
            nationalId: row.national_id,
            amount: row.amount,
            referralCode: row.referral_code,
            assignedCode: row.assigned_code,
            createdAt: new Date(row.created_at),
            expectedPayoutDate: new Date(row.expected_payout_date),
            proofReference: row.proof_reference,
            status: row.status,
            reviewerNote: row.reviewer_note
        };
    }
}
