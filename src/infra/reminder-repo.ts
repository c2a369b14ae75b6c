import { Database } from 'sqlite';

export interface ReminderEntry {
    recordId: string;
    userId: string;
    fireAt: number;
    firedAt: number | null;
}

export interface ReminderStore {
    upsert(entry: { recordId: string; userId: string; fireAt: number }): Promise<void>;
    /** Marks the reminder as spent. Returns false when it had already fired or does not exist. */
    markFired(recordId: string, at: number): Promise<boolean>;
    listPending(): Promise<ReminderEntry[]>;
}

interface ReminderRow {
    record_id: string;
    user_id: string;
    fire_at: number;
    fired_at: number | null;
}

export class SqliteReminderStore implements ReminderStore {
    constructor(private db: Database) { }

    async upsert(entry: { recordId: string; userId: string; fireAt: number }): Promise<void> {
        await this.db.run(
            `INSERT INTO reminders (record_id, user_id, fire_at, fired_at)
             VALUES (?, ?, ?, NULL)
             ON CONFLICT(record_id) DO UPDATE SET user_id = ?, fire_at = ?, fired_at = NULL`,
            [entry.recordId, entry.userId, entry.fireAt, entry.userId, entry.fireAt]
        );
    }

    async markFired(recordId: string, at: number): Promise<boolean> {
        const result = await this.db.run(
            `UPDATE reminders SET fired_at = ? WHERE record_id = ? AND fired_at IS NULL`,
            [at, recordId]
        );
        return (result.changes ?? 0) > 0;
    }

    async listPending(): Promise<ReminderEntry[]> {
        const rows = await this.db.all<ReminderRow[]>(
            `SELECT * FROM reminders WHERE fired_at IS NULL ORDER BY fire_at ASC`
        );
        return rows.map(row => ({
            recordId: row.record_id,
            userId: row.user_id,
            fireAt: row.fire_at,
            firedAt: row.fired_at
        }));
    }
}
