import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ReminderScheduler, REMINDER_TEXT } from '../../app/scheduler';
import { FakeConnection, FakeTransport, InMemoryRecordRepository, InMemoryReminderStore, newRecord } from '../helpers/fakes';

const USER = '573001112233';
const DELAY = 600000;

describe('ReminderScheduler', () => {
    let records: InMemoryRecordRepository;
    let store: InMemoryReminderStore;
    let transport: FakeTransport;
    let scheduler: ReminderScheduler;

    beforeEach(() => {
        vi.useFakeTimers();
        vi.setSystemTime(new Date('2024-01-01T12:00:00.000Z'));
        records = new InMemoryRecordRepository();
        store = new InMemoryReminderStore();
        transport = new FakeTransport();
        scheduler = new ReminderScheduler(records, store, transport, null, DELAY);
    });

    afterEach(() => {
        scheduler.stop();
        vi.useRealTimers();
    });

    async function elapse(ms: number) {
        await vi.advanceTimersByTimeAsync(ms);
        await scheduler.flush();
    }

    it('nudges exactly once when nobody decides in time', async () => {
        const recordId = await records.append(newRecord({ status: 'ProofSubmitted', proofReference: 'proof-1' }));
        await scheduler.arm(recordId, USER);

        await elapse(DELAY - 1);
        expect(transport.sent).toEqual([]);

        await elapse(1);
        expect(transport.sent).toEqual([{ to: USER, text: REMINDER_TEXT, buttons: undefined }]);

        await elapse(DELAY * 3);
        expect(transport.sent).toHaveLength(1);
        expect(store.entries.get(recordId)?.firedAt).toBe(new Date('2024-01-01T12:10:00.000Z').getTime());
    });

    it('stays silent when the record was decided before the timer fired', async () => {
        const recordId = await records.append(newRecord({ status: 'ProofSubmitted' }));
        await scheduler.arm(recordId, USER);
        await records.updateFields(recordId, { status: 'Approved', assignedCode: '4821' });

        await elapse(DELAY);
        expect(transport.sent).toEqual([]);
    });

    it('cancels the timer on disarm', async () => {
        const recordId = await records.append(newRecord({ status: 'ProofSubmitted' }));
        await scheduler.arm(recordId, USER);
        expect(scheduler.armedCount).toBe(1);

        await scheduler.disarm(recordId);
        expect(scheduler.armedCount).toBe(0);
        expect(await store.listPending()).toEqual([]);

        await elapse(DELAY);
        expect(transport.sent).toEqual([]);
    });

    it('re-arms reminders persisted by a previous run', async () => {
        const recordId = await records.append(newRecord({ status: 'ProofSubmitted' }));
        await store.upsert({ recordId, userId: USER, fireAt: Date.now() + 1000 });

        expect(await scheduler.rearmOutstanding()).toBe(1);
        await elapse(1000);
        expect(transport.textsTo(USER)).toEqual([REMINDER_TEXT]);
    });

    it('fires overdue reminders right after a restart', async () => {
        const recordId = await records.append(newRecord({ status: 'ProofSubmitted' }));
        await store.upsert({ recordId, userId: USER, fireAt: Date.now() - 5000 });

        await scheduler.rearmOutstanding();
        await elapse(1);
        expect(transport.textsTo(USER)).toEqual([REMINDER_TEXT]);
    });

    it('keeps overdue reminders pending until the connection opens', async () => {
        const recordId = await records.append(newRecord({ status: 'ProofSubmitted' }));
        await store.upsert({ recordId, userId: USER, fireAt: Date.now() - 5000 });
        const connection = new FakeConnection();
        scheduler.rearmOnOpen(connection);

        await elapse(DELAY);
        expect(transport.sent).toEqual([]);
        expect(scheduler.armedCount).toBe(0);
        expect((await store.listPending()).map(e => e.recordId)).toEqual([recordId]);

        connection.open();
        await scheduler.flush();
        await elapse(1);
        expect(transport.textsTo(USER)).toEqual([REMINDER_TEXT]);
    });

    it('does not nudge again when the connection reopens', async () => {
        const recordId = await records.append(newRecord({ status: 'ProofSubmitted' }));
        await store.upsert({ recordId, userId: USER, fireAt: Date.now() + 1000 });
        const connection = new FakeConnection();
        scheduler.rearmOnOpen(connection);

        connection.open();
        await scheduler.flush();
        connection.open();
        await scheduler.flush();
        expect(scheduler.armedCount).toBe(1);

        await elapse(1000);
        connection.open();
        await scheduler.flush();
        await elapse(DELAY);
        expect(transport.textsTo(USER)).toEqual([REMINDER_TEXT]);
    });

    it('does not retry a nudge that could not be delivered', async () => {
        const recordId = await records.append(newRecord({ status: 'ProofSubmitted' }));
        transport.failing.add(USER);
        await scheduler.arm(recordId, USER);

        await elapse(DELAY);
        transport.failing.clear();
        await elapse(DELAY);

        expect(transport.sent).toEqual([]);
        expect(await store.listPending()).toEqual([]);
    });

    it('restarts the countdown when a proof is sent again', async () => {
        const recordId = await records.append(newRecord({ status: 'ProofSubmitted' }));
        await scheduler.arm(recordId, USER);
        await elapse(DELAY / 2);
        await scheduler.arm(recordId, USER);

        await elapse(DELAY / 2);
        expect(transport.sent).toEqual([]);
        await elapse(DELAY / 2);
        expect(transport.textsTo(USER)).toEqual([REMINDER_TEXT]);
    });
});
