import pino from 'pino';
import type { SessionRepository } from '../infra/session-repo';
import type { LedgerRepository } from '../infra/ledger';
import type { ApprovalService } from '../domain/approval-service';
import { UnauthorizedError } from '../domain/errors';
import type { BroadcastService } from './broadcast';
import { isRestart, type IntakeFlow } from './intake-flow';
import type { ChatTransport, InboundEvent } from './transport';

const logger = pino({ name: 'app/handler', level: process.env.LOG_LEVEL || 'info' });

const DENIED = '⛔ Acción no permitida.';
const GENERIC_FAILURE = '⚠️ Ocurrió un error. Intenta de nuevo más tarde.';

export class MessageHandler {
    private reviewers: Set<string>;

    constructor(
        private transport: ChatTransport,
        private sessions: SessionRepository,
        private intake: IntakeFlow,
        private approvals: ApprovalService,
        private broadcast: BroadcastService,
        private ledger: LedgerRepository,
        reviewerIds: string[]
    ) {
        this.reviewers = new Set(reviewerIds);
    }

    isReviewer(userId: string): boolean {
        return this.reviewers.has(userId);
    }

    async handle(event: InboundEvent): Promise<void> {
        const userId = event.from;
        logger.info({ userId, kind: event.kind }, 'Processing message');

        try {
            await this.route(event);
        } catch (err) {
            if (err instanceof UnauthorizedError) {
                await this.deny(err.identity, event);
                return;
            }
            logger.error({ err, userId }, 'Error handling message');
            try {
                await this.transport.sendMessage(userId, GENERIC_FAILURE);
            } catch (sendErr) {
                logger.error({ err: sendErr, userId }, 'Could not report failure to user');
            }
        }
    }

    private async route(event: InboundEvent): Promise<void> {
        const userId = event.from;

        if (event.kind === 'action') {
            if (!this.isReviewer(userId)) throw new UnauthorizedError(userId);
            if (event.action === 'approve') {
                await this.approvals.approve(event.recordId, userId);
            } else {
                await this.approvals.beginRejection(event.recordId, userId);
            }
            return;
        }

        const text = event.kind === 'text' ? event.text.trim() : '';

        if (text.toLowerCase() === '/broadcast') {
            if (!this.isReviewer(userId)) throw new UnauthorizedError(userId);
            if (this.approvals.isAwaitingReason(userId)) {
                await this.approvals.cancelRejection(userId);
            }
            await this.broadcast.start(userId);
            return;
        }

        if (!this.isReviewer(userId)) {
            await this.intake.handle(event);
            return;
        }

        if (event.kind === 'text' && this.approvals.isAwaitingReason(userId)) {
            if (isRestart(text)) {
                await this.approvals.cancelRejection(userId);
            } else {
                await this.approvals.completeRejection(userId, text);
            }
            return;
        }

        const session = await this.sessions.getState(userId);
        if (session && (session.state === 'BROADCAST_MEDIA' || session.state === 'BROADCAST_TEXT')) {
            if (isRestart(text)) {
                await this.broadcast.cancel(session);
            } else {
                await this.broadcast.step(session, event);
            }
            return;
        }

        await this.intake.handle(event);
    }

    private async deny(identity: string, event: InboundEvent): Promise<void> {
        logger.warn({ userId: identity, kind: event.kind }, 'Unauthorized action');
        try {
            await this.transport.sendMessage(identity, DENIED);
            await this.ledger.recordEvent({
                type: 'UnauthorizedAction',
                user_id: identity,
                record_id: event.kind === 'action' ? event.recordId : undefined,
                payload: { action: event.kind === 'action' ? event.action : 'broadcast' },
                timestamp: Date.now()
            });
        } catch (err) {
            logger.error({ err, userId: identity }, 'Could not record denial');
        }
    }
}
