import { Database } from 'sqlite';
import type { DomainEvent, EventPayload, EventType } from '../domain/events';
import { v4 as uuidv4 } from 'uuid';
import pino from 'pino';

const logger = pino({ name: 'infra/ledger', level: process.env.LOG_LEVEL || 'info' });

const EVENT_TYPES: readonly EventType[] = [
    'MenuShown', 'FlowStarted', 'FlowCancelled', 'RecordRegistered', 'ProofSubmitted',
    'RecordApproved', 'RecordRejected', 'UnauthorizedAction', 'ReminderSent', 'BroadcastSent'
];

interface EventRow {
    uuid: string;
    type: string;
    payload: string;
    timestamp: number;
    user_id: string | null;
    record_id: string | null;
    amount: number | null;
    external_ref: string | null;
}

/** Append-only audit trail. Record state lives in the record repository, never here. */
export class LedgerRepository {
    constructor(private db: Database) { }

    async recordEvent(event: Omit<DomainEvent, 'id'>): Promise<string> {
        const eventUuid = uuidv4();
        const timestamp = event.timestamp || Date.now();

        await this.db.run(
            `INSERT INTO events (
                uuid, type, payload, timestamp, user_id, record_id, amount, external_ref
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
            [
                eventUuid,
                event.type,
                JSON.stringify(event.payload),
                timestamp,
                event.user_id || null,
                event.record_id || null,
                event.amount ?? null,
                event.external_ref || null
            ]
        );

        logger.debug({ type: event.type, userId: event.user_id }, 'Event recorded');
        return eventUuid;
    }

    async getEventsByUser(userId: string): Promise<DomainEvent[]> {
        const rows = await this.db.all<EventRow[]>(
            `SELECT * FROM events WHERE user_id = ? ORDER BY timestamp ASC, id ASC`,
            [userId]
        );
        return rows.flatMap(row => this.mapRowToEvent(row));
    }

    async getEventsByRecord(recordId: string): Promise<DomainEvent[]> {
        const rows = await this.db.all<EventRow[]>(
            `SELECT * FROM events WHERE record_id = ? ORDER BY timestamp ASC, id ASC`,
            [recordId]
        );
        return rows.flatMap(row => this.mapRowToEvent(row));
    }

    private mapRowToEvent(row: EventRow): DomainEvent[] {
        const type = EVENT_TYPES.find(t => t === row.type);
        if (!type) {
            logger.warn({ type: row.type }, 'Skipping event of unknown type');
            return [];
        }
        const payload: EventPayload = {};
        const parsed: unknown = JSON.parse(row.payload);
        if (typeof parsed === 'object' && parsed !== null) {
            for (const [key, value] of Object.entries(parsed)) {
                if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
                    payload[key] = value;
                }
            }
        }
        return [{
            id: row.uuid,
            type,
            payload,
            timestamp: row.timestamp,
            user_id: row.user_id ?? undefined,
            record_id: row.record_id ?? undefined,
            amount: row.amount ?? undefined,
            external_ref: row.external_ref ?? undefined
        }];
    }
}
