import { ConfigError } from './domain/errors';
import { DEFAULT_TIME_ZONE, isValidTimeZone } from './domain/investment';

export interface AppConfig {
    waAuthDir: string;
    databasePath: string;
    reviewerIds: string[];
    reminderDelayMs: number;
    broadcastPauseMs: number;
    paymentInstructions: string;
    supportContact: string;
    openingHours: string;
    timeZone: string;
}

const REQUIRED = ['WA_AUTH_DIR', 'DATABASE_PATH', 'REVIEWER_IDS'] as const;

const DEFAULT_PAYMENT_INSTRUCTIONS = 'Realiza la consignación a la cuenta indicada por tu asesor y envía aquí la foto del comprobante.';
const DEFAULT_SUPPORT_CONTACT = '✉️ Escríbenos por este mismo chat dentro del horario de atención y un asesor te responderá.';
const DEFAULT_OPENING_HOURS = '📅 Lunes a Sábado: 8:00 AM - 7:00 PM\n📅 Domingo: 8:00 AM - 12:00 PM';

function positiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number, allowZero = false): number {
    const raw = env[key]?.trim();
    if (!raw) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0 || (!allowZero && value === 0)) {
        throw new ConfigError([], `${key} must be a ${allowZero ? 'non-negative' : 'positive'} integer, got "${raw}"`);
    }
    return value;
}

// Phone numbers are kept bare; a pasted JID loses its suffix
export function parseReviewerIds(raw: string): string[] {
    const ids = raw
        .split(',')
        .map(id => id.trim().replace(/@s\.whatsapp\.net$/, ''))
        .filter(id => id.length > 0);
    return [...new Set(ids)];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const missing = REQUIRED.filter(key => !env[key]?.trim());
    const reviewerIds = parseReviewerIds(env.REVIEWER_IDS ?? '');
    if (!missing.includes('REVIEWER_IDS') && reviewerIds.length === 0) {
        missing.push('REVIEWER_IDS');
    }
    if (missing.length > 0) {
        throw new ConfigError([...missing]);
    }

    const timeZone = env.TIME_ZONE?.trim() || DEFAULT_TIME_ZONE;
    if (!isValidTimeZone(timeZone)) {
        throw new ConfigError([], `TIME_ZONE must be an IANA time zone, got "${timeZone}"`);
    }

    return {
        waAuthDir: (env.WA_AUTH_DIR ?? '').trim(),
        databasePath: (env.DATABASE_PATH ?? '').trim(),
        reviewerIds,
        reminderDelayMs: positiveInt(env, 'REMINDER_DELAY_SECONDS', 600) * 1000,
        broadcastPauseMs: positiveInt(env, 'BROADCAST_PAUSE_MS', 200, true),
        paymentInstructions: env.PAYMENT_INSTRUCTIONS?.trim() || DEFAULT_PAYMENT_INSTRUCTIONS,
        supportContact: env.SUPPORT_CONTACT?.trim() || DEFAULT_SUPPORT_CONTACT,
        openingHours: env.OPENING_HOURS?.trim() || DEFAULT_OPENING_HOURS,
        timeZone
    };
}
