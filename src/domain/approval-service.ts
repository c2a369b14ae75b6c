import pino from 'pino';
import type { RecordRepository } from '../infra/record-repo';
import type { LedgerRepository } from '../infra/ledger';
import type { ChatTransport } from '../app/transport';
import type { EventType } from './events';
import type { InvestmentRecord, RecordStatus } from './entities';
import { ReferralCodeGenerator } from './referral-code';
import { DuplicateCodeError, StoreUnavailableError } from './errors';
import { canTransition, computePayout, DEFAULT_TIME_ZONE, formatAssignedCode, formatDate, formatMoney } from './investment';

const logger = pino({ name: 'domain/approval', level: process.env.LOG_LEVEL || 'info' });

const MAX_CLAIMS = 5;
const RETRY_LATER = '⚠️ No se pudo registrar la decisión. Intenta de nuevo en unos minutos.';

export type ApprovalOutcome =
    | { status: 'approved'; assignedCode: string; alreadyApproved: boolean }
    | { status: 'not_found' }
    | { status: 'not_reviewable'; current: RecordStatus | null }
    | { status: 'store_unavailable' };

export type RejectionOutcome =
    | 'awaiting_reason'
    | 'rejected'
    | 'empty_reason'
    | 'not_pending'
    | 'not_found'
    | 'not_reviewable'
    | 'store_unavailable';

export interface ReminderControl {
    disarm(recordId: string): Promise<void>;
}

/**
 * Reviewers waiting to type a rejection reason, keyed by reviewer.
 * One reviewer handles one rejection at a time; a new tap replaces the old one.
 */
export class PendingRejections {
    private byReviewer = new Map<string, string>();

    begin(reviewerId: string, recordId: string): string | undefined {
        const previous = this.byReviewer.get(reviewerId);
        this.byReviewer.set(reviewerId, recordId);
        return previous;
    }

    peek(reviewerId: string): string | undefined {
        return this.byReviewer.get(reviewerId);
    }

    complete(reviewerId: string): void {
        this.byReviewer.delete(reviewerId);
    }

    cancel(reviewerId: string): boolean {
        return this.byReviewer.delete(reviewerId);
    }
}

export class ApprovalService {
    readonly pending = new PendingRejections();

    constructor(
        private records: RecordRepository,
        private codes: ReferralCodeGenerator,
        private transport: ChatTransport,
        private reminders: ReminderControl,
        private ledger: LedgerRepository,
        private now: () => Date = () => new Date(),
        private timeZone: string = DEFAULT_TIME_ZONE
    ) { }

    async approve(recordId: string, reviewerId: string): Promise<ApprovalOutcome> {
        try {
            const record = await this.records.findById(recordId);
            if (!record) {
                await this.notify(reviewerId, '⚠️ No se encontró esa inversión.');
                return { status: 'not_found' };
            }

            if (record.status === 'Approved' && record.assignedCode) {
                await this.notify(reviewerId, `ℹ️ Esta inversión ya estaba aprobada. Código: ${formatAssignedCode(record.assignedCode)}`);
                return { status: 'approved', assignedCode: record.assignedCode, alreadyApproved: true };
            }

            if (!canTransition(record.status, 'Approved')) {
                await this.notify(reviewerId, `⚠️ Esta inversión no se puede aprobar (estado: ${record.status}).`);
                return { status: 'not_reviewable', current: record.status };
            }

            const outcome = await this.commitApproval(record, reviewerId);
            if (outcome.status !== 'approved') {
                await this.notify(reviewerId, '⚠️ Esta inversión ya fue decidida por otro revisor.');
                return outcome;
            }
            if (outcome.alreadyApproved) {
                await this.notify(reviewerId, `ℹ️ Esta inversión ya estaba aprobada. Código: ${formatAssignedCode(outcome.assignedCode)}`);
                return outcome;
            }

            const code = formatAssignedCode(outcome.assignedCode);
            await this.notify(record.userId, `✅ *¡Transacción aprobada!*

🔑 Tu código de usuario es: *${code}*

💵 Invertiste: *${formatMoney(record.amount)}* COP
💰 Recibirás: *${formatMoney(computePayout(record.amount))}* COP
📅 Fecha estimada de pago: *${formatDate(record.expectedPayoutDate, this.timeZone)}*

Comparte tu código: quien se registre con él quedará como tu referido.`);
            await this.notify(reviewerId, `✅ Aprobaste la inversión de ${record.name} (${formatMoney(record.amount)} COP). Código: ${code}`);

            await this.reminders.disarm(recordId);
            await this.audit('RecordApproved', record, { reviewer: reviewerId, code: outcome.assignedCode });
            return outcome;
        } catch (err) {
            if (err instanceof StoreUnavailableError) {
                logger.error({ err, recordId, reviewerId }, 'Approve failed');
                await this.notify(reviewerId, RETRY_LATER);
                return { status: 'store_unavailable' };
            }
            throw err;
        }
    }

    async beginRejection(recordId: string, reviewerId: string): Promise<RejectionOutcome> {
        try {
            const record = await this.records.findById(recordId);
            if (!record) {
                await this.notify(reviewerId, '⚠️ No se encontró esa inversión.');
                return 'not_found';
            }
            if (!canTransition(record.status, 'Rejected')) {
                await this.notify(reviewerId, `⚠️ Esta inversión ya fue decidida (estado: ${record.status}).`);
                return 'not_reviewable';
            }

            const previous = this.pending.begin(reviewerId, recordId);
            if (previous && previous !== recordId) {
                logger.info({ reviewerId, previous, recordId }, 'Replacing pending rejection');
                await this.notify(reviewerId, 'ℹ️ Se descartó el rechazo que tenías pendiente.');
            }
            await this.notify(reviewerId, `✍️ Escribe el *motivo* del rechazo para ${record.name} (${formatMoney(record.amount)} COP). Envía el texto ahora:`);
            return 'awaiting_reason';
        } catch (err) {
            if (err instanceof StoreUnavailableError) {
                logger.error({ err, recordId, reviewerId }, 'Reject tap failed');
                await this.notify(reviewerId, RETRY_LATER);
                return 'store_unavailable';
            }
            throw err;
        }
    }

    isAwaitingReason(reviewerId: string): boolean {
        return this.pending.peek(reviewerId) !== undefined;
    }

    async cancelRejection(reviewerId: string): Promise<boolean> {
        const cancelled = this.pending.cancel(reviewerId);
        if (cancelled) {
            await this.notify(reviewerId, 'ℹ️ Rechazo cancelado. El comprobante sigue pendiente.');
        }
        return cancelled;
    }

    async completeRejection(reviewerId: string, text: string): Promise<RejectionOutcome> {
        const recordId = this.pending.peek(reviewerId);
        if (!recordId) return 'not_pending';

        const reason = text.trim();
        if (!reason) {
            await this.notify(reviewerId, '⚠️ El motivo no puede estar vacío. Escribe el motivo del rechazo:');
            return 'empty_reason';
        }

        try {
            const record = await this.records.findById(recordId);
            if (!record) {
                this.pending.complete(reviewerId);
                await this.notify(reviewerId, '⚠️ No se encontró esa inversión.');
                return 'not_found';
            }

            const updated = await this.records.updateFields(
                recordId,
                { status: 'Rejected', reviewerNote: reason },
                { expectedStatus: 'ProofSubmitted' }
            );
            this.pending.complete(reviewerId);
            if (!updated) {
                await this.notify(reviewerId, '⚠️ Esta inversión ya fue decidida por otro revisor.');
                return 'not_reviewable';
            }

            await this.notify(record.userId, `❌ Tu comprobante fue rechazado.\nMotivo: ${reason}\nPor favor revisa y vuelve a enviarlo.`);
            await this.notify(reviewerId, `Motivo enviado y participante notificado: ${record.name}`);

            await this.reminders.disarm(recordId);
            await this.audit('RecordRejected', record, { reviewer: reviewerId, reason });
            return 'rejected';
        } catch (err) {
            if (err instanceof StoreUnavailableError) {
                // Keep the reviewer waiting so the same reason can be sent again
                logger.error({ err, recordId, reviewerId }, 'Reject failed');
                await this.notify(reviewerId, RETRY_LATER);
                return 'store_unavailable';
            }
            throw err;
        }
    }

    private async commitApproval(record: InvestmentRecord, reviewerId: string): Promise<ApprovalOutcome> {
        const note = `approved by ${reviewerId} at ${this.now().toISOString()}`;

        for (let claim = 1; claim <= MAX_CLAIMS; claim++) {
            const code = record.assignedCode ?? await this.codes.mint();
            try {
                const updated = await this.records.updateFields(
                    record.recordId,
                    { assignedCode: code, status: 'Approved', reviewerNote: note },
                    { expectedStatus: record.status }
                );
                if (updated) {
                    return { status: 'approved', assignedCode: code, alreadyApproved: false };
                }
            } catch (err) {
                if (err instanceof DuplicateCodeError && !record.assignedCode) {
                    logger.warn({ recordId: record.recordId, code, claim }, 'Code taken concurrently, minting again');
                    continue;
                }
                throw err;
            }

            // Guard missed: someone else decided in between
            const current = await this.records.findById(record.recordId);
            if (current?.status === 'Approved' && current.assignedCode) {
                return { status: 'approved', assignedCode: current.assignedCode, alreadyApproved: true };
            }
            return { status: 'not_reviewable', current: current?.status ?? null };
        }
        throw new StoreUnavailableError(`No unique code after ${MAX_CLAIMS} claims`);
    }

    private async notify(to: string, text: string): Promise<void> {
        try {
            await this.transport.sendMessage(to, text);
        } catch (err) {
            logger.error({ err, to }, 'Notification failed');
        }
    }

    private async audit(type: EventType, record: InvestmentRecord, payload: Record<string, string>): Promise<void> {
        try {
            await this.ledger.recordEvent({
                type,
                user_id: record.userId,
                record_id: record.recordId,
                amount: record.amount,
                payload,
                timestamp: this.now().getTime()
            });
        } catch (err) {
            logger.error({ err, type, recordId: record.recordId }, 'Audit event not recorded');
        }
    }
}
