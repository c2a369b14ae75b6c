import { Database } from 'sqlite';
import pino from 'pino';
import type { MediaRef } from '../app/transport';

const logger = pino({ name: 'infra/session', level: process.env.LOG_LEVEL || 'info' });

export type SessionState =
    | 'AMOUNT_ENTRY'
    | 'INVEST_CONFIRM'
    | 'REFERRAL_ENTRY'
    | 'REGISTER_CONFIRM'
    | 'NAME_ENTRY'
    | 'NATIONAL_ID_ENTRY'
    | 'DATA_CONFIRM'
    | 'AWAITING_PROOF'
    | 'MENU'
    | 'REINVEST_AMOUNT'
    | 'REINVEST_CONFIRM'
    | 'BROADCAST_MEDIA'
    | 'BROADCAST_TEXT';

const STATES: readonly SessionState[] = [
    'AMOUNT_ENTRY', 'INVEST_CONFIRM', 'REFERRAL_ENTRY', 'REGISTER_CONFIRM', 'NAME_ENTRY',
    'NATIONAL_ID_ENTRY', 'DATA_CONFIRM', 'AWAITING_PROOF', 'MENU', 'REINVEST_AMOUNT',
    'REINVEST_CONFIRM', 'BROADCAST_MEDIA', 'BROADCAST_TEXT'
];

export interface SessionContext {
    amount?: number;
    referralCode?: string;
    name?: string;
    nationalId?: string;
    recordId?: string;
    broadcastMedia?: MediaRef | null;
}

export interface UserSession {
    userId: string;
    state: SessionState;
    context: SessionContext;
}

interface SessionRow {
    user_id: string;
    state: string;
    context: string;
}

function isSessionState(value: string): value is SessionState {
    return STATES.some(s => s === value);
}

function readContext(raw: string): SessionContext {
    const parsed: unknown = JSON.parse(raw);
    const context: SessionContext = {};
    if (typeof parsed !== 'object' || parsed === null) return context;

    const value = (key: string): unknown => (key in parsed ? Reflect.get(parsed, key) : undefined);
    const amount = value('amount');
    if (typeof amount === 'number') context.amount = amount;
    for (const key of ['referralCode', 'name', 'nationalId', 'recordId'] as const) {
        const v = value(key);
        if (typeof v === 'string') context[key] = v;
    }
    const media = value('broadcastMedia');
    if (media === null) {
        context.broadcastMedia = null;
    } else if (typeof media === 'object' && media !== null && 'reference' in media && typeof media.reference === 'string'
        && 'mediaType' in media && (media.mediaType === 'image' || media.mediaType === 'document')) {
        context.broadcastMedia = { reference: media.reference, mediaType: media.mediaType };
    }
    return context;
}

export class SessionRepository {
    constructor(private db: Database) { }

    async getState(userId: string): Promise<UserSession | null> {
        const row = await this.db.get<SessionRow>(`SELECT * FROM user_sessions WHERE user_id = ?`, [userId]);
        if (!row) return null;
        if (!isSessionState(row.state)) {
            logger.warn({ userId, state: row.state }, 'Dropping session with unknown state');
            await this.clearState(userId);
            return null;
        }
        return {
            userId: row.user_id,
            state: row.state,
            context: readContext(row.context)
        };
    }

    async setState(userId: string, state: SessionState, context: SessionContext = {}): Promise<void> {
        await this.db.run(
            `INSERT INTO user_sessions (user_id, state, context)
             VALUES (?, ?, ?)
             ON CONFLICT(user_id) DO UPDATE SET state = ?, context = ?`,
            [userId, state, JSON.stringify(context), state, JSON.stringify(context)]
        );
    }

    async clearState(userId: string): Promise<void> {
        await this.db.run(`DELETE FROM user_sessions WHERE user_id = ?`, [userId]);
    }
}
