import { ValidationError } from './errors';
import type { RecordStatus } from './entities';

export const MIN_AMOUNT = 200000;
export const MAX_AMOUNT = 500000;
export const PAYOUT_DAYS = 10;
export const DEFAULT_TIME_ZONE = 'America/Bogota';

const DAY_MS = 24 * 60 * 60 * 1000;

const TRANSITIONS: Record<RecordStatus, RecordStatus[]> = {
    AwaitingProof: ['ProofSubmitted'],
    ProofSubmitted: ['ProofSubmitted', 'Approved', 'Rejected'],
    Approved: [],
    Rejected: ['ProofSubmitted'] // resubmission reopens the same record
};

export function canTransition(from: RecordStatus, to: RecordStatus): boolean {
    return TRANSITIONS[from].includes(to);
}

/** True while the record is waiting for a first proof or a corrected one. */
export function acceptsProof(status: RecordStatus): boolean {
    return status !== 'ProofSubmitted' && canTransition(status, 'ProofSubmitted');
}

/**
 * Parses a participant-typed amount such as "250.000", "$300,000" or "450000".
 * Throws ValidationError when the text is not a whole number or falls outside the accepted range.
 */
export function parseAmount(input: string): number {
    const digits = input.trim().replace(/^\$/, '').replace(/[.,\s]/g, '');
    if (!/^\d+$/.test(digits)) {
        throw new ValidationError(`Not a number: ${input}`, 'not_a_number');
    }
    const amount = Number(digits);
    if (!isAmountInRange(amount)) {
        throw new ValidationError(`Amount out of range: ${amount}`, 'out_of_range');
    }
    return amount;
}

export function isAmountInRange(amount: number): boolean {
    return Number.isInteger(amount) && amount >= MIN_AMOUNT && amount <= MAX_AMOUNT;
}

// amount * 1.9, kept in integer arithmetic
export function computePayout(amount: number): number {
    return Math.floor((amount * 19) / 10);
}

export function computeExpectedPayoutDate(createdAt: Date): Date {
    return new Date(createdAt.getTime() + PAYOUT_DAYS * DAY_MS);
}

export function formatMoney(n: number): string {
    return String(n).replace(/\B(?=(\d{3})+(?!\d))/g, '.');
}

/** Calendar date (YYYY-MM-DD) as seen in the given IANA time zone. */
export function formatDate(d: Date, timeZone: string = DEFAULT_TIME_ZONE): string {
    const parts = new Intl.DateTimeFormat('en-US', { timeZone, year: 'numeric', month: '2-digit', day: '2-digit' }).formatToParts(d);
    const part = (type: Intl.DateTimeFormatPartTypes) => parts.find(p => p.type === type)?.value ?? '';
    return `${part('year')}-${part('month')}-${part('day')}`;
}

export function isValidTimeZone(timeZone: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone });
        return true;
    } catch {
        return false;
    }
}

export type YesNo = 'yes' | 'no';

export function parseYesNo(input: string): YesNo | null {
    const normalized = input.trim().toLowerCase().normalize('NFD').replace(/[\u0300-\u036f]/g, '');
    if (['si', 's', 'yes', 'ok', '1'].includes(normalized)) return 'yes';
    if (['no', 'n', '2'].includes(normalized)) return 'no';
    return null;
}

export const CODE_PREFIX = 'INV-';

export function formatAssignedCode(code: string): string {
    return `${CODE_PREFIX}${code}`;
}

/** Accepts both "4821" and "INV-4821". */
export function normalizeReferralCode(input: string): string {
    const trimmed = input.trim();
    if (trimmed.toUpperCase().startsWith(CODE_PREFIX)) {
        return trimmed.slice(CODE_PREFIX.length).trim();
    }
    return trimmed;
}
