import pino from 'pino';
import type { AppConfig } from '../config';
import type { RecordRepository } from '../infra/record-repo';
import type { SessionRepository, UserSession, SessionContext } from '../infra/session-repo';
import type { LedgerRepository } from '../infra/ledger';
import type { EventPayload, EventType } from '../domain/events';
import { NO_REFERRAL, type InvestmentRecord } from '../domain/entities';
import { StoreUnavailableError, ValidationError } from '../domain/errors';
import {
    acceptsProof,
    computeExpectedPayoutDate,
    computePayout,
    formatAssignedCode,
    formatDate,
    formatMoney,
    parseAmount,
    parseYesNo,
    PAYOUT_DAYS
} from '../domain/investment';
import { listReferrals, lookupReferrer } from '../domain/referrals';
import { reviewButtons, type ChatTransport, type InboundEvent, type MediaRef } from './transport';

const logger = pino({ name: 'app/intake', level: process.env.LOG_LEVEL || 'info' });

export type ParticipantEvent = Extract<InboundEvent, { kind: 'text' | 'media' }>;

export type IntakeSettings = Pick<AppConfig, 'reviewerIds' | 'paymentInstructions' | 'supportContact' | 'openingHours' | 'timeZone'>;

export interface ReminderArming {
    arm(recordId: string, userId: string): Promise<void>;
}

const RESTART_KEYWORDS = ['/start', 'inicio', 'reiniciar', 'cancelar'];

const AMOUNT_PROMPT = `💰 *Montos de inversión disponibles*

200.000 · 250.000 · 300.000 · 350.000
400.000 · 450.000 · 500.000

Elige uno de los montos o escribe otro (usa puntos):`;
const AMOUNT_INVALID = '❌ Ingresa un monto válido con puntos (ej: 200.000).';
const AMOUNT_OUT_OF_RANGE = '⚠️ El monto debe estar entre 200.000 y 500.000 COP.';
const YES_NO = 'Responde *Sí* o *No*.';
const REFERRAL_PROMPT = "🔑 ¿Vienes referido por alguien? Escribe su código (ej: INV-1234) o *No*.";
const REGISTER_PROMPT = '📝 ¿Deseas continuar con el registro? (Sí / No)';
const NAME_PROMPT = '✍️ Escribe tu *nombre completo*:';
const PROOF_PROMPT = '⚠️ Envía una imagen o documento como comprobante.';
const STORE_DOWN = '⚠️ Tuvimos un problema guardando tus datos. Intenta de nuevo en unos minutos.';

const MENU_TEXT = `👉 *¿Qué deseas hacer?*

1. Mis referidos
2. Nueva inversión
3. Soporte
4. Horarios de atención
5. Salir

Responde con un número.`;

function normalize(input: string): string {
    return input.trim().toLowerCase().normalize('NFD').replace(/[\u0300-\u036f]/g, '');
}

export function isRestart(input: string): boolean {
    return RESTART_KEYWORDS.includes(normalize(input));
}

/**
 * Participant dialogue: amount, confirmation, referral, registration and proof, followed by
 * the menu and the re-investment shortcut. Nothing is durable until DATA_CONFIRM appends
 * the record; abandoning earlier only drops the session.
 */
export class IntakeFlow {
    constructor(
        private sessions: SessionRepository,
        private records: RecordRepository,
        private transport: ChatTransport,
        private reminders: ReminderArming,
        private ledger: LedgerRepository,
        private settings: IntakeSettings,
        private now: () => Date = () => new Date()
    ) { }

    async handle(event: ParticipantEvent): Promise<void> {
        const userId = event.from;
        try {
            if (event.kind === 'text' && isRestart(event.text)) {
                await this.restart(userId);
                return;
            }

            const session = await this.sessions.getState(userId);
            if (!session) {
                await this.handleWithoutSession(userId, event);
                return;
            }
            await this.step(session, event);
        } catch (err) {
            if (err instanceof StoreUnavailableError) {
                logger.error({ err, userId }, 'Store unavailable during intake');
                await this.send(userId, STORE_DOWN);
                return;
            }
            throw err;
        }
    }

    async startIntake(userId: string): Promise<void> {
        await this.sessions.setState(userId, 'AMOUNT_ENTRY', {});
        await this.audit('FlowStarted', userId, { flow: 'intake' });
        await this.send(userId, AMOUNT_PROMPT);
    }

    async showMenu(userId: string): Promise<void> {
        await this.sessions.setState(userId, 'MENU', {});
        await this.audit('MenuShown', userId, {});
        await this.send(userId, MENU_TEXT);
    }

    private async restart(userId: string): Promise<void> {
        const previous = await this.sessions.getState(userId);
        await this.sessions.clearState(userId);
        if (previous) {
            await this.audit('FlowCancelled', userId, { reason: 'user_restart', state: previous.state });
        }
        await this.startIntake(userId);
    }

    private async handleWithoutSession(userId: string, event: ParticipantEvent): Promise<void> {
        const latest = await this.records.findLatest(userId);
        if (event.kind === 'media' && latest && acceptsProof(latest.status)) {
            await this.submitProof(userId, latest, event.media);
            return;
        }
        if (latest) {
            await this.showMenu(userId);
            return;
        }
        await this.startIntake(userId);
    }

    private async step(session: UserSession, event: ParticipantEvent): Promise<void> {
        const { userId, context } = session;
        const input = event.kind === 'text' ? event.text.trim() : '';

        switch (session.state) {
            case 'AMOUNT_ENTRY':
            case 'REINVEST_AMOUNT': {
                const amount = await this.readAmount(userId, input);
                if (amount === null) return;
                const again = session.state === 'REINVEST_AMOUNT';
                await this.sessions.setState(userId, again ? 'REINVEST_CONFIRM' : 'INVEST_CONFIRM', { amount });
                await this.send(userId, `✅ ¿Deseas invertir *${formatMoney(amount)}* COP${again ? ' nuevamente' : ''}?\nEn ${PAYOUT_DAYS} días recibirás *${formatMoney(computePayout(amount))}* COP.\n\n${YES_NO}`);
                return;
            }

            case 'INVEST_CONFIRM': {
                const answer = parseYesNo(input);
                if (answer === null) {
                    await this.send(userId, YES_NO);
                    return;
                }
                if (answer === 'no') {
                    await this.endDialogue(userId, '❌ Gracias por ingresar, vuelve cuando estés seguro.');
                    return;
                }
                await this.sessions.setState(userId, 'REFERRAL_ENTRY', context);
                await this.send(userId, REFERRAL_PROMPT);
                return;
            }

            case 'REFERRAL_ENTRY':
                await this.handleReferral(userId, input, context);
                return;

            case 'REGISTER_CONFIRM': {
                const answer = parseYesNo(input);
                if (answer === null) {
                    await this.send(userId, YES_NO);
                    return;
                }
                if (answer === 'no') {
                    await this.endDialogue(userId, '❌ Gracias, vuelve cuando estés seguro.');
                    return;
                }
                await this.sessions.setState(userId, 'NAME_ENTRY', context);
                await this.send(userId, NAME_PROMPT);
                return;
            }

            case 'NAME_ENTRY': {
                if (!input) {
                    await this.send(userId, '⚠️ Por favor escribe tu nombre completo.');
                    return;
                }
                await this.sessions.setState(userId, 'NATIONAL_ID_ENTRY', { ...context, name: input });
                await this.send(userId, '🆔 Ahora escribe tu *número de cédula*:');
                return;
            }

            case 'NATIONAL_ID_ENTRY': {
                if (!input) {
                    await this.send(userId, '⚠️ Escribe tu número de cédula.');
                    return;
                }
                await this.sessions.setState(userId, 'DATA_CONFIRM', { ...context, nationalId: input });
                await this.send(userId, `✅ Confirma tus datos:\n\n👤 Nombre: ${context.name ?? ''}\n🆔 Cédula: ${input}\n\n¿Son correctos? (Sí / No)`);
                return;
            }

            case 'DATA_CONFIRM': {
                const answer = parseYesNo(input);
                if (answer === null) {
                    await this.send(userId, YES_NO);
                    return;
                }
                if (answer === 'no') {
                    await this.sessions.setState(userId, 'NAME_ENTRY', { amount: context.amount, referralCode: context.referralCode });
                    await this.send(userId, '❌ Corrige tus datos. Escribe tu nombre completo:');
                    return;
                }
                await this.register(userId, context);
                return;
            }

            case 'AWAITING_PROOF': {
                if (event.kind !== 'media') {
                    await this.send(userId, PROOF_PROMPT);
                    return;
                }
                const record = context.recordId ? await this.records.findById(context.recordId) : null;
                if (!record || record.userId !== userId || !acceptsProof(record.status)) {
                    await this.sessions.clearState(userId);
                    await this.handleWithoutSession(userId, event);
                    return;
                }
                await this.submitProof(userId, record, event.media);
                return;
            }

            case 'MENU':
                await this.handleMenu(userId, event, input);
                return;

            case 'REINVEST_CONFIRM': {
                const answer = parseYesNo(input);
                if (answer === null) {
                    await this.send(userId, YES_NO);
                    return;
                }
                if (answer === 'no' || context.amount === undefined) {
                    await this.showMenu(userId);
                    return;
                }
                await this.registerReinvestment(userId, context.amount);
                return;
            }

            case 'BROADCAST_MEDIA':
            case 'BROADCAST_TEXT':
                // Only reviewers reach these states; anything else landing here starts over
                await this.sessions.clearState(userId);
                await this.handleWithoutSession(userId, event);
                return;
        }
    }

    private async readAmount(userId: string, input: string): Promise<number | null> {
        try {
            return parseAmount(input);
        } catch (err) {
            if (err instanceof ValidationError) {
                await this.send(userId, err.reason === 'out_of_range' ? AMOUNT_OUT_OF_RANGE : AMOUNT_INVALID);
                return null;
            }
            throw err;
        }
    }

    private async handleReferral(userId: string, input: string, context: SessionContext): Promise<void> {
        const answer = parseYesNo(input);
        if (!input || answer === 'no') {
            await this.sessions.setState(userId, 'REGISTER_CONFIRM', { ...context, referralCode: NO_REFERRAL });
            await this.send(userId, REGISTER_PROMPT);
            return;
        }
        if (answer === 'yes') {
            await this.send(userId, "Escribe el código de quien te refirió (ej: INV-1234) o 'No'.");
            return;
        }

        const referrer = await lookupReferrer(this.records, input);
        if (!referrer || !referrer.assignedCode || referrer.userId === userId) {
            await this.send(userId, "⚠️ Código no válido. Ingresa otro código o escribe 'No'.");
            return;
        }

        await this.sessions.setState(userId, 'REGISTER_CONFIRM', { ...context, referralCode: referrer.assignedCode });
        await this.send(userId, `✅ Vienes referido por *${referrer.name}* (código ${formatAssignedCode(referrer.assignedCode)}).`);
        await this.send(userId, REGISTER_PROMPT);
    }

    private async register(userId: string, context: SessionContext): Promise<void> {
        const { amount, name, nationalId } = context;
        if (amount === undefined || !name || !nationalId) {
            logger.warn({ userId, context }, 'Incomplete registration context, restarting');
            await this.startIntake(userId);
            return;
        }

        const createdAt = this.now();
        const expectedPayoutDate = computeExpectedPayoutDate(createdAt);
        const recordId = await this.records.append({
            userId,
            name,
            nationalId,
            amount,
            referralCode: context.referralCode ?? NO_REFERRAL,
            assignedCode: null,
            createdAt,
            expectedPayoutDate,
            proofReference: null,
            status: 'AwaitingProof',
            reviewerNote: ''
        });

        await this.sessions.setState(userId, 'AWAITING_PROOF', { recordId });
        await this.audit('RecordRegistered', userId, { amount, referral: context.referralCode ?? NO_REFERRAL }, recordId);

        await this.send(userId, `🎉 ¡Registro inicial exitoso, ${name}!

Envía el comprobante de tu pago y luego espera la validación.

${this.settings.paymentInstructions}

Fecha estimada de pago: *${formatDate(expectedPayoutDate, this.settings.timeZone)}* (${PAYOUT_DAYS} días desde hoy).`);
    }

    private async registerReinvestment(userId: string, amount: number): Promise<void> {
        const latest = await this.records.findLatest(userId);
        if (!latest) {
            await this.startIntake(userId);
            return;
        }

        // New row with the same identity; the assigned code belongs to the earlier record
        const createdAt = this.now();
        const expectedPayoutDate = computeExpectedPayoutDate(createdAt);
        const recordId = await this.records.append({
            userId,
            name: latest.name,
            nationalId: latest.nationalId,
            amount,
            referralCode: latest.referralCode,
            assignedCode: null,
            createdAt,
            expectedPayoutDate,
            proofReference: null,
            status: 'AwaitingProof',
            reviewerNote: ''
        });

        await this.sessions.setState(userId, 'AWAITING_PROOF', { recordId });
        await this.audit('RecordRegistered', userId, { amount, reinvestment: true }, recordId);
        await this.send(userId, `✅ Envía el comprobante de ${formatMoney(amount)} COP.

${this.settings.paymentInstructions}

Fecha estimada de pago: *${formatDate(expectedPayoutDate, this.settings.timeZone)}*`);
    }

    private async submitProof(userId: string, record: InvestmentRecord, media: MediaRef): Promise<void> {
        const resubmission = record.status === 'Rejected';
        const updated = await this.records.updateFields(
            record.recordId,
            { proofReference: media.reference, status: 'ProofSubmitted' },
            { expectedStatus: record.status }
        );
        if (!updated) {
            await this.send(userId, '⚠️ No pudimos registrar tu comprobante. Intenta enviarlo de nuevo.');
            return;
        }

        await this.sessions.setState(userId, 'MENU', {});
        await this.audit('ProofSubmitted', userId, { resubmission }, record.recordId, media.reference);

        const caption = `📩 *${resubmission ? 'Comprobante reenviado' : 'Nuevo comprobante recibido'}*

👤 ${record.name}
🆔 ${record.nationalId}
💰 ${formatMoney(record.amount)} COP
🔗 Referido: ${record.referralCode === NO_REFERRAL ? 'Ninguno' : formatAssignedCode(record.referralCode)}

ID: ${record.recordId}`;

        for (const reviewerId of this.settings.reviewerIds) {
            try {
                await this.transport.sendMedia(reviewerId, media, caption, reviewButtons(record.recordId));
            } catch (err) {
                logger.error({ err, reviewerId, recordId: record.recordId }, 'Could not forward proof to reviewer');
            }
        }

        try {
            await this.reminders.arm(record.recordId, userId);
        } catch (err) {
            logger.error({ err, recordId: record.recordId }, 'Reminder not armed');
        }

        await this.send(userId, '⏳ Espera de 5 a 10 minutos mientras validamos tu transacción.');
        await this.send(userId, MENU_TEXT);
    }

    private async handleMenu(userId: string, event: ParticipantEvent, input: string): Promise<void> {
        if (event.kind === 'media') {
            const latest = await this.records.findLatest(userId);
            if (latest && acceptsProof(latest.status)) {
                await this.submitProof(userId, latest, event.media);
            } else if (latest?.status === 'ProofSubmitted') {
                await this.send(userId, '⏳ Tu comprobante ya está en revisión.');
            } else {
                await this.send(userId, 'ℹ️ No tienes comprobantes pendientes por enviar.');
            }
            return;
        }

        const option = normalize(input);
        switch (true) {
            case option === '1' || option.includes('referidos'):
                await this.sendReferrals(userId);
                break;
            case option === '2' || option.includes('nueva inversion'):
                await this.startReinvestment(userId);
                break;
            case option === '3' || option.includes('soporte'):
                await this.send(userId, `📞 *Soporte*\n\n${this.settings.supportContact}`);
                break;
            case option === '4' || option.includes('horario'):
                await this.send(userId, `🕑 *Horarios de Atención*\n\n${this.settings.openingHours}`);
                break;
            case option === '5' || option === 'salir' || option === 'no':
                await this.endDialogue(userId, '🙏 Gracias por confiar en nosotros. Nos vemos en 10 días con tu pago (o antes si tienes referidos).');
                break;
            default:
                await this.send(userId, MENU_TEXT);
                break;
        }
    }

    private async sendReferrals(userId: string): Promise<void> {
        const { ownCodes, referrals } = await listReferrals(this.records, userId);
        if (ownCodes.length === 0) {
            await this.send(userId, 'No tienes código asignado aún. Registra tu inversión y espera la aprobación.');
            return;
        }
        if (referrals.length === 0) {
            await this.send(userId, '📋 No tienes referidos registrados.');
            return;
        }
        const lines = referrals.map(r => `${r.name} - ${r.nationalId} (Monto: ${formatMoney(r.amount)})`);
        await this.send(userId, `📋 Tus referidos:\n\n${lines.join('\n')}`);
    }

    private async startReinvestment(userId: string): Promise<void> {
        const latest = await this.records.findLatest(userId);
        if (!latest) {
            await this.startIntake(userId);
            return;
        }
        await this.sessions.setState(userId, 'REINVEST_AMOUNT', {});
        await this.audit('FlowStarted', userId, { flow: 'reinvestment' });
        await this.send(userId, '💰 Selecciona el nuevo monto (entre 200.000 y 500.000 COP):');
    }

    private async endDialogue(userId: string, text: string): Promise<void> {
        await this.sessions.clearState(userId);
        await this.send(userId, text);
    }

    private async send(to: string, text: string): Promise<void> {
        try {
            await this.transport.sendMessage(to, text);
        } catch (err) {
            logger.error({ err, to }, 'Could not send message');
        }
    }

    private async audit(type: EventType, userId: string, payload: EventPayload, recordId?: string, externalRef?: string): Promise<void> {
        try {
            await this.ledger.recordEvent({
                type,
                user_id: userId,
                record_id: recordId,
                external_ref: externalRef,
                payload,
                timestamp: this.now().getTime()
            });
        } catch (err) {
            logger.error({ err, type, userId }, 'Audit event not recorded');
        }
    }
}
