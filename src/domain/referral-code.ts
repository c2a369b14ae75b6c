import { randomInt } from 'crypto';
import pino from 'pino';
import type { RecordRepository } from '../infra/record-repo';
import { StoreUnavailableError } from './errors';

const logger = pino({ name: 'domain/referral-code', level: process.env.LOG_LEVEL || 'info' });

const MAX_DRAWS = 50;

export type CodeSource = () => string;

export const fourDigitCode: CodeSource = () => String(randomInt(1000, 10000));

/**
 * Draws short numeric codes until one is not taken.
 *
 * The lookup only makes a collision unlikely. Two concurrent mints may still draw the
 * same free code; the repository's unique index rejects the loser, who mints again.
 */
export class ReferralCodeGenerator {
    constructor(private records: RecordRepository, private draw: CodeSource = fourDigitCode) { }

    async mint(): Promise<string> {
        for (let attempt = 1; attempt <= MAX_DRAWS; attempt++) {
            const code = this.draw();
            const existing = await this.records.findByAssignedCode(code);
            if (!existing) return code;
            logger.debug({ code, attempt }, 'Code collision, drawing again');
        }
        throw new StoreUnavailableError(`Code space exhausted after ${MAX_DRAWS} draws`);
    }
}
