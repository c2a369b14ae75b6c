import pino from 'pino';
import type { RecordRepository } from '../infra/record-repo';
import type { SessionRepository, UserSession } from '../infra/session-repo';
import type { LedgerRepository } from '../infra/ledger';
import { parseYesNo } from '../domain/investment';
import type { ChatTransport, InboundEvent } from './transport';

const logger = pino({ name: 'app/broadcast', level: process.env.LOG_LEVEL || 'info' });

export interface BroadcastResult {
    sent: number;
    failed: number;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class BroadcastService {
    constructor(
        private sessions: SessionRepository,
        private records: RecordRepository,
        private transport: ChatTransport,
        private ledger: LedgerRepository,
        private pauseMs: number = 200
    ) { }

    async start(reviewerId: string): Promise<void> {
        await this.sessions.setState(reviewerId, 'BROADCAST_MEDIA', {});
        await this.transport.sendMessage(reviewerId, "📢 *Difusión*\n\nEnvía una imagen o documento para adjuntar, o escribe *NO* para enviar solo texto.");
    }

    /** Drops the draft; nothing has been sent to participants at this point. */
    async cancel(session: UserSession): Promise<void> {
        const reviewerId = session.userId;
        await this.sessions.clearState(reviewerId);
        await this.transport.sendMessage(reviewerId, '🛑 Difusión cancelada. No se envió ningún mensaje.');

        try {
            await this.ledger.recordEvent({
                type: 'FlowCancelled',
                user_id: reviewerId,
                payload: { reason: 'user_restart', state: session.state },
                timestamp: Date.now()
            });
        } catch (err) {
            logger.error({ err }, 'Audit event not recorded');
        }
    }

    async step(session: UserSession, event: InboundEvent): Promise<void> {
        const reviewerId = session.userId;

        if (session.state === 'BROADCAST_MEDIA') {
            if (event.kind === 'media') {
                await this.sessions.setState(reviewerId, 'BROADCAST_TEXT', { broadcastMedia: event.media });
            } else if (event.kind === 'text' && parseYesNo(event.text) === 'no') {
                await this.sessions.setState(reviewerId, 'BROADCAST_TEXT', { broadcastMedia: null });
            } else {
                await this.transport.sendMessage(reviewerId, '⚠️ Envía una imagen, un documento o escribe *NO*.');
                return;
            }
            await this.transport.sendMessage(reviewerId, '✍️ Escribe el texto del mensaje:');
            return;
        }

        const text = event.kind === 'text' ? event.text.trim() : '';
        if (!text) {
            await this.transport.sendMessage(reviewerId, '⚠️ El mensaje no puede estar vacío. Escribe el texto:');
            return;
        }

        await this.sessions.clearState(reviewerId);
        await this.transport.sendMessage(reviewerId, '⏳ Enviando difusión...');
        const result = await this.send(text, session.context.broadcastMedia ?? null);
        await this.transport.sendMessage(reviewerId, `✅ Difusión terminada.\nEnviados: ${result.sent}\nFallidos: ${result.failed}`);

        try {
            await this.ledger.recordEvent({
                type: 'BroadcastSent',
                user_id: reviewerId,
                payload: { sent: result.sent, failed: result.failed, withMedia: Boolean(session.context.broadcastMedia) },
                timestamp: Date.now()
            });
        } catch (err) {
            logger.error({ err }, 'Audit event not recorded');
        }
    }

    private async recipients(): Promise<string[]> {
        const users = new Set<string>();
        for await (const record of this.records.listAll()) {
            users.add(record.userId);
        }
        return [...users];
    }

    private async send(text: string, media: UserSession['context']['broadcastMedia']): Promise<BroadcastResult> {
        const result: BroadcastResult = { sent: 0, failed: 0 };
        const users = await this.recipients();

        for (const [i, userId] of users.entries()) {
            if (i > 0 && this.pauseMs > 0) await sleep(this.pauseMs);
            try {
                if (media) {
                    await this.transport.sendMedia(userId, media, text);
                } else {
                    await this.transport.sendMessage(userId, text);
                }
                result.sent++;
            } catch (err) {
                result.failed++;
                logger.warn({ err, userId }, 'Broadcast delivery failed');
            }
        }

        logger.info({ ...result, recipients: users.length }, 'Broadcast finished');
        return result;
    }
}
