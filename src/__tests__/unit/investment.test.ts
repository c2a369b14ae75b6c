import { describe, it, expect } from 'vitest';
import {
    acceptsProof,
    canTransition,
    computeExpectedPayoutDate,
    computePayout,
    formatAssignedCode,
    formatDate,
    formatMoney,
    isAmountInRange,
    normalizeReferralCode,
    parseAmount,
    parseYesNo
} from '../../domain/investment';
import { ValidationError } from '../../domain/errors';

function reasonOf(input: string): string | undefined {
    try {
        parseAmount(input);
        return undefined;
    } catch (err) {
        return err instanceof ValidationError ? err.reason : 'unexpected';
    }
}

describe('parseAmount', () => {
    it('accepts dotted, comma and plain amounts', () => {
        expect(parseAmount('250.000')).toBe(250000);
        expect(parseAmount('$300,000')).toBe(300000);
        expect(parseAmount(' 450000 ')).toBe(450000);
    });

    it('accepts both range bounds', () => {
        expect(parseAmount('200.000')).toBe(200000);
        expect(parseAmount('500.000')).toBe(500000);
    });

    it('rejects amounts outside the range', () => {
        expect(reasonOf('199.999')).toBe('out_of_range');
        expect(reasonOf('500.001')).toBe('out_of_range');
        expect(reasonOf('100')).toBe('out_of_range');
    });

    it('rejects text that is not a whole number', () => {
        expect(reasonOf('trescientos mil')).toBe('not_a_number');
        expect(reasonOf('')).toBe('not_a_number');
        expect(reasonOf('-250.000')).toBe('not_a_number');
    });
});

describe('isAmountInRange', () => {
    it('requires an integer between the bounds', () => {
        expect(isAmountInRange(200000)).toBe(true);
        expect(isAmountInRange(250000.5)).toBe(false);
        expect(isAmountInRange(600000)).toBe(false);
    });
});

describe('payout', () => {
    it('pays 1.9 times the amount', () => {
        expect(computePayout(300000)).toBe(570000);
        expect(computePayout(250000)).toBe(475000);
        expect(computePayout(500000)).toBe(950000);
    });

    it('is due exactly ten days after creation', () => {
        const due = computeExpectedPayoutDate(new Date('2024-01-01T00:00:00.000Z'));
        expect(due.toISOString()).toBe('2024-01-11T00:00:00.000Z');
        expect(formatDate(due, 'UTC')).toBe('2024-01-11');
    });

    it('crosses month ends', () => {
        const due = computeExpectedPayoutDate(new Date('2024-02-25T08:30:00.000Z'));
        expect(formatDate(due, 'UTC')).toBe('2024-03-06');
    });
});

describe('formatDate', () => {
    it('shows the calendar date of the local zone', () => {
        // 21:30 on the 10th in Bogotá
        const lateEvening = new Date('2024-01-11T02:30:00.000Z');
        expect(formatDate(lateEvening)).toBe('2024-01-10');
        expect(formatDate(lateEvening, 'America/Bogota')).toBe('2024-01-10');
        expect(formatDate(lateEvening, 'UTC')).toBe('2024-01-11');
    });

    it('gives an evening registration the local payout day', () => {
        const due = computeExpectedPayoutDate(new Date('2024-01-02T00:30:00.000Z'));
        expect(formatDate(due)).toBe('2024-01-11');
    });
});

describe('formatMoney', () => {
    it('groups thousands with dots', () => {
        expect(formatMoney(570000)).toBe('570.000');
        expect(formatMoney(1250000)).toBe('1.250.000');
        expect(formatMoney(950)).toBe('950');
    });
});

describe('parseYesNo', () => {
    it('understands accented and short answers', () => {
        expect(parseYesNo('Sí')).toBe('yes');
        expect(parseYesNo('SI')).toBe('yes');
        expect(parseYesNo('1')).toBe('yes');
        expect(parseYesNo('No')).toBe('no');
        expect(parseYesNo(' n ')).toBe('no');
    });

    it('returns null for anything else', () => {
        expect(parseYesNo('tal vez')).toBeNull();
        expect(parseYesNo('')).toBeNull();
    });
});

describe('referral codes', () => {
    it('accepts the code with or without its prefix', () => {
        expect(normalizeReferralCode('4821')).toBe('4821');
        expect(normalizeReferralCode('INV-4821')).toBe('4821');
        expect(normalizeReferralCode(' inv-4821 ')).toBe('4821');
    });

    it('formats codes for display', () => {
        expect(formatAssignedCode('4821')).toBe('INV-4821');
    });
});

describe('status transitions', () => {
    it('allows the review lifecycle', () => {
        expect(canTransition('AwaitingProof', 'ProofSubmitted')).toBe(true);
        expect(canTransition('ProofSubmitted', 'Approved')).toBe(true);
        expect(canTransition('ProofSubmitted', 'Rejected')).toBe(true);
        expect(canTransition('Rejected', 'ProofSubmitted')).toBe(true);
    });

    it('treats approval as terminal', () => {
        expect(canTransition('Approved', 'Rejected')).toBe(false);
        expect(canTransition('Approved', 'ProofSubmitted')).toBe(false);
        expect(acceptsProof('Approved')).toBe(false);
    });

    it('waits for a proof only before review or after a rejection', () => {
        expect(acceptsProof('AwaitingProof')).toBe(true);
        expect(acceptsProof('Rejected')).toBe(true);
        expect(acceptsProof('ProofSubmitted')).toBe(false);
    });

    it('never approves without a proof', () => {
        expect(canTransition('AwaitingProof', 'Approved')).toBe(false);
        expect(canTransition('Rejected', 'Approved')).toBe(false);
    });
});
