import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Database } from 'sqlite';
import { openDatabase } from '../../infra/database';
import { SqliteRecordRepository } from '../../infra/record-repo';
import { SqliteReminderStore } from '../../infra/reminder-repo';
import { SessionRepository } from '../../infra/session-repo';
import { LedgerRepository } from '../../infra/ledger';
import { DuplicateCodeError, StoreUnavailableError, ValidationError } from '../../domain/errors';
import { newRecord } from '../helpers/fakes';

describe('SqliteRecordRepository', () => {
    let db: Database;
    let records: SqliteRecordRepository;

    beforeEach(async () => {
        db = await openDatabase(':memory:');
        records = new SqliteRecordRepository(db, 2);
    });

    afterEach(async () => {
        await db.close();
    });

    it('round-trips every field', async () => {
        const input = newRecord({ referralCode: '4821' });
        const recordId = await records.append(input);

        expect(await records.findById(recordId)).toEqual({ ...input, recordId });
    });

    it('refuses amounts outside the range', async () => {
        await expect(records.append(newRecord({ amount: 150000 }))).rejects.toBeInstanceOf(ValidationError);
    });

    it('returns null for unknown ids and codes', async () => {
        expect(await records.findById('missing')).toBeNull();
        expect(await records.findLatest('573000000000')).toBeNull();
        expect(await records.findByAssignedCode('0000')).toBeNull();
    });

    it('finds the latest record by creation time', async () => {
        await records.append(newRecord({ amount: 200000, createdAt: new Date('2024-01-01T12:00:00.000Z') }));
        const second = await records.append(newRecord({ amount: 450000, createdAt: new Date('2024-01-05T09:00:00.000Z') }));

        expect((await records.findLatest('573001112233'))?.recordId).toBe(second);
    });

    it('breaks creation-time ties by insertion order', async () => {
        await records.append(newRecord());
        const second = await records.append(newRecord({ amount: 250000 }));

        expect((await records.findLatest('573001112233'))?.recordId).toBe(second);
    });

    it('updates only the patched fields', async () => {
        const recordId = await records.append(newRecord());

        expect(await records.updateFields(recordId, { proofReference: 'proof-1', status: 'ProofSubmitted' })).toBe(true);

        const stored = await records.findById(recordId);
        expect(stored?.status).toBe('ProofSubmitted');
        expect(stored?.proofReference).toBe('proof-1');
        expect(stored?.assignedCode).toBeNull();
        expect(stored?.amount).toBe(300000);
    });

    it('applies the update only while the expected status holds', async () => {
        const recordId = await records.append(newRecord({ status: 'ProofSubmitted' }));

        expect(await records.updateFields(recordId, { status: 'Rejected', reviewerNote: 'ilegible' }, { expectedStatus: 'AwaitingProof' })).toBe(false);
        expect(await records.updateFields(recordId, { status: 'Rejected', reviewerNote: 'ilegible' }, { expectedStatus: 'ProofSubmitted' })).toBe(true);
        expect((await records.findById(recordId))?.reviewerNote).toBe('ilegible');
    });

    it('reports a missing record as not updated', async () => {
        expect(await records.updateFields('missing', { status: 'Approved' })).toBe(false);
    });

    it('never replaces an assigned code', async () => {
        const recordId = await records.append(newRecord({ status: 'ProofSubmitted' }));
        await records.updateFields(recordId, { assignedCode: '4821', status: 'Approved' });

        expect(await records.updateFields(recordId, { assignedCode: '5930' })).toBe(false);
        expect((await records.findById(recordId))?.assignedCode).toBe('4821');
    });

    it('rejects an assigned code already owned by another record', async () => {
        const first = await records.append(newRecord({ status: 'ProofSubmitted' }));
        const second = await records.append(newRecord({ userId: '573004445566', status: 'ProofSubmitted' }));
        await records.updateFields(first, { assignedCode: '4821', status: 'Approved' });

        await expect(records.updateFields(second, { assignedCode: '4821', status: 'Approved' })).rejects.toBeInstanceOf(DuplicateCodeError);
        expect((await records.findById(second))?.status).toBe('ProofSubmitted');
    });

    it('looks records up by assigned code', async () => {
        const recordId = await records.append(newRecord({ status: 'ProofSubmitted' }));
        await records.updateFields(recordId, { assignedCode: '4821', status: 'Approved' });

        expect((await records.findByAssignedCode('4821'))?.recordId).toBe(recordId);
    });

    it('lists every record in insertion order across batches', async () => {
        const ids: string[] = [];
        for (const amount of [200000, 250000, 300000, 350000, 400000]) {
            ids.push(await records.append(newRecord({ amount })));
        }

        const seen: string[] = [];
        for await (const record of records.listAll()) {
            seen.push(record.recordId);
        }
        expect(seen).toEqual(ids);
    });

    it('surfaces a closed store as unavailable', async () => {
        const closed = await openDatabase(':memory:');
        await closed.close();
        const broken = new SqliteRecordRepository(closed);

        await expect(broken.findLatest('573001112233')).rejects.toBeInstanceOf(StoreUnavailableError);
    });
});

describe('SessionRepository', () => {
    let db: Database;
    let sessions: SessionRepository;

    beforeEach(async () => {
        db = await openDatabase(':memory:');
        sessions = new SessionRepository(db);
    });

    afterEach(async () => {
        await db.close();
    });

    it('stores state with its context', async () => {
        await sessions.setState('573001112233', 'DATA_CONFIRM', { amount: 300000, referralCode: 'none', name: 'Ana Pérez', nationalId: '1020304050' });
        await sessions.setState('573001112233', 'AWAITING_PROOF', { recordId: 'rec-1' });

        expect(await sessions.getState('573001112233')).toEqual({
            userId: '573001112233',
            state: 'AWAITING_PROOF',
            context: { recordId: 'rec-1' }
        });
    });

    it('keeps broadcast media in the context', async () => {
        await sessions.setState('573009998877', 'BROADCAST_TEXT', { broadcastMedia: { reference: 'img-1', mediaType: 'image' } });

        expect((await sessions.getState('573009998877'))?.context.broadcastMedia).toEqual({ reference: 'img-1', mediaType: 'image' });
    });

    it('drops sessions in a state it no longer knows', async () => {
        await db.run(`INSERT INTO user_sessions (user_id, state, context) VALUES (?, ?, ?)`, ['573001112233', 'LEGACY_STATE', '{}']);

        expect(await sessions.getState('573001112233')).toBeNull();
        expect(await db.get(`SELECT * FROM user_sessions WHERE user_id = ?`, ['573001112233'])).toBeUndefined();
    });

    it('clears state', async () => {
        await sessions.setState('573001112233', 'MENU');
        await sessions.clearState('573001112233');
        expect(await sessions.getState('573001112233')).toBeNull();
    });
});

describe('SqliteReminderStore', () => {
    let db: Database;
    let store: SqliteReminderStore;

    beforeEach(async () => {
        db = await openDatabase(':memory:');
        store = new SqliteReminderStore(db);
    });

    afterEach(async () => {
        await db.close();
    });

    it('marks a reminder fired only once', async () => {
        await store.upsert({ recordId: 'rec-1', userId: '573001112233', fireAt: 1000 });

        expect(await store.markFired('rec-1', 2000)).toBe(true);
        expect(await store.markFired('rec-1', 3000)).toBe(false);
        expect(await store.markFired('rec-2', 3000)).toBe(false);
    });

    it('re-opens a reminder when armed again', async () => {
        await store.upsert({ recordId: 'rec-1', userId: '573001112233', fireAt: 1000 });
        await store.markFired('rec-1', 2000);
        await store.upsert({ recordId: 'rec-1', userId: '573001112233', fireAt: 5000 });

        expect(await store.listPending()).toEqual([{ recordId: 'rec-1', userId: '573001112233', fireAt: 5000, firedAt: null }]);
    });
});

describe('LedgerRepository', () => {
    let db: Database;
    let ledger: LedgerRepository;

    beforeEach(async () => {
        db = await openDatabase(':memory:');
        ledger = new LedgerRepository(db);
    });

    afterEach(async () => {
        await db.close();
    });

    it('returns events by user and by record in order', async () => {
        await ledger.recordEvent({ type: 'RecordRegistered', user_id: '573001112233', record_id: 'rec-1', payload: { amount: 300000 }, timestamp: 1000 });
        await ledger.recordEvent({ type: 'RecordApproved', user_id: '573001112233', record_id: 'rec-1', amount: 300000, payload: { code: '4821' }, timestamp: 2000 });
        await ledger.recordEvent({ type: 'MenuShown', user_id: '573004445566', payload: {}, timestamp: 1500 });

        const byUser = await ledger.getEventsByUser('573001112233');
        expect(byUser.map(e => e.type)).toEqual(['RecordRegistered', 'RecordApproved']);
        expect(byUser[1].payload).toEqual({ code: '4821' });
        expect(byUser[1].amount).toBe(300000);

        expect((await ledger.getEventsByRecord('rec-1')).map(e => e.timestamp)).toEqual([1000, 2000]);
    });
});
