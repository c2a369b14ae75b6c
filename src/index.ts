import 'dotenv/config';
import pino from 'pino';
import { loadConfig } from './config';
import { ConfigError } from './domain/errors';
import { openDatabase } from './infra/database';
import { WhatsAppService } from './infra/baileys';
import { SessionRepository } from './infra/session-repo';
import { LedgerRepository } from './infra/ledger';
import { SqliteRecordRepository } from './infra/record-repo';
import { SqliteReminderStore } from './infra/reminder-repo';
import { ReferralCodeGenerator } from './domain/referral-code';
import { ApprovalService } from './domain/approval-service';
import { ReminderScheduler } from './app/scheduler';
import { IntakeFlow } from './app/intake-flow';
import { BroadcastService } from './app/broadcast';
import { MessageHandler } from './app/message-handler';

const logger = pino({ transport: { target: 'pino-pretty' }, level: process.env.LOG_LEVEL || 'info' });

async function main() {
    try {
        const config = loadConfig();
        logger.info({ reviewers: config.reviewerIds.length }, 'Referral intake bot initializing...');

        const db = await openDatabase(config.databasePath);

        const records = new SqliteRecordRepository(db);
        const sessions = new SessionRepository(db);
        const ledger = new LedgerRepository(db);
        const wa = new WhatsAppService(config.waAuthDir);

        const scheduler = new ReminderScheduler(records, new SqliteReminderStore(db), wa, ledger, config.reminderDelayMs);
        const approvals = new ApprovalService(
            records,
            new ReferralCodeGenerator(records),
            wa,
            scheduler,
            ledger,
            () => new Date(),
            config.timeZone
        );
        const intake = new IntakeFlow(sessions, records, wa, scheduler, ledger, config);
        const broadcast = new BroadcastService(sessions, records, wa, ledger, config.broadcastPauseMs);
        const handler = new MessageHandler(wa, sessions, intake, approvals, broadcast, ledger, config.reviewerIds);

        wa.onMessage(async (event) => {
            await handler.handle(event);
        });

        scheduler.rearmOnOpen(wa);
        await wa.connect();

        const shutdown = async (signal: string) => {
            logger.info({ signal }, 'Shutting down');
            scheduler.stop();
            await scheduler.flush();
            await db.close();
            process.exit(0);
        };
        for (const signal of ['SIGINT', 'SIGTERM'] as const) {
            process.once(signal, () => {
                shutdown(signal).catch(err => {
                    logger.error({ err }, 'Shutdown failed');
                    process.exit(1);
                });
            });
        }
    } catch (err) {
        if (err instanceof ConfigError) {
            logger.fatal({ missing: err.missing }, err.message);
        } else {
            logger.fatal(err, 'Startup failed');
        }
        process.exit(1);
    }
}

main();
