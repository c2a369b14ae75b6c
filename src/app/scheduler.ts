import pino from 'pino';
import type { RecordRepository } from '../infra/record-repo';
import type { ReminderStore } from '../infra/reminder-repo';
import type { LedgerRepository } from '../infra/ledger';
import type { ReminderControl } from '../domain/approval-service';
import type { ChatTransport, ConnectionEvents } from './transport';

const logger = pino({ name: 'app/scheduler', level: process.env.LOG_LEVEL || 'info' });

export const DEFAULT_REMINDER_DELAY_MS = 600 * 1000;

export const REMINDER_TEXT = "¿Sigues ahí? Aún no hemos procesado tu comprobante. Si necesitas ayuda escribe 'Soporte'.";

/**
 * One-shot nudges for submissions still undecided after the delay.
 *
 * The record is re-read at fire time, so an early decision needs no cancellation. Arm times
 * are persisted and rearmOutstanding() picks them up again after a restart.
 */
export class ReminderScheduler implements ReminderControl {
    private timers = new Map<string, NodeJS.Timeout>();
    private inFlight = new Set<Promise<void>>();

    constructor(
        private records: RecordRepository,
        private store: ReminderStore,
        private transport: ChatTransport,
        private ledger: LedgerRepository | null,
        private delayMs: number = DEFAULT_REMINDER_DELAY_MS,
        private now: () => number = () => Date.now()
    ) { }

    async arm(recordId: string, userId: string, delayMs: number = this.delayMs): Promise<void> {
        const fireAt = this.now() + delayMs;
        await this.store.upsert({ recordId, userId, fireAt });
        this.schedule(recordId, delayMs);
        logger.info({ recordId, userId, fireAt }, 'Reminder armed');
    }

    async disarm(recordId: string): Promise<void> {
        this.clearTimer(recordId);
        try {
            await this.store.markFired(recordId, this.now());
        } catch (err) {
            // The fire-time status check still keeps a stale reminder silent
            logger.warn({ err, recordId }, 'Could not mark reminder as spent');
        }
    }

    /** Re-schedules every reminder that had not fired when the process stopped. */
    async rearmOutstanding(): Promise<number> {
        const pending = await this.store.listPending();
        const now = this.now();
        for (const entry of pending) {
            this.schedule(entry.recordId, Math.max(0, entry.fireAt - now));
        }
        logger.info({ count: pending.length }, 'Outstanding reminders re-armed');
        return pending.length;
    }

    /** Re-arms outstanding reminders whenever the transport comes up, never before. */
    rearmOnOpen(connection: ConnectionEvents): void {
        connection.onOpen(() => {
            const rearming: Promise<void> = this.rearmOutstanding()
                .then(() => undefined)
                .catch(err => {
                    logger.error({ err }, 'Could not re-arm reminders');
                })
                .finally(() => {
                    this.inFlight.delete(rearming);
                });
            this.inFlight.add(rearming);
        });
    }

    get armedCount(): number {
        return this.timers.size;
    }

    /** Resolves once every reminder (or re-arm pass) that has started is done. */
    async flush(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.all([...this.inFlight]);
        }
    }

    stop(): void {
        for (const timer of this.timers.values()) {
            clearTimeout(timer);
        }
        this.timers.clear();
    }

    private schedule(recordId: string, delayMs: number): void {
        this.clearTimer(recordId);
        const timer = setTimeout(() => {
            this.timers.delete(recordId);
            const firing = this.fire(recordId).finally(() => {
                this.inFlight.delete(firing);
            });
            this.inFlight.add(firing);
        }, delayMs);
        this.timers.set(recordId, timer);
    }

    private clearTimer(recordId: string): void {
        const timer = this.timers.get(recordId);
        if (timer) {
            clearTimeout(timer);
            this.timers.delete(recordId);
        }
    }

    private async fire(recordId: string): Promise<void> {
        try {
            // Spend the reminder first: at most one nudge per arm, even if sending fails
            const claimed = await this.store.markFired(recordId, this.now());
            if (!claimed) return;

            const record = await this.records.findById(recordId);
            if (!record || record.status !== 'ProofSubmitted') {
                logger.debug({ recordId, status: record?.status }, 'Reminder skipped, already decided');
                return;
            }

            await this.transport.sendMessage(record.userId, REMINDER_TEXT);
            logger.info({ recordId, userId: record.userId }, 'Reminder sent');

            if (this.ledger) {
                await this.ledger.recordEvent({
                    type: 'ReminderSent',
                    user_id: record.userId,
                    record_id: recordId,
                    payload: {},
                    timestamp: this.now()
                });
            }
        } catch (err) {
            logger.error({ err, recordId }, 'Reminder job failed');
        }
    }
}
