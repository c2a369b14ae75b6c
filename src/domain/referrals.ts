import type { RecordRepository } from '../infra/record-repo';
import { NO_REFERRAL, type InvestmentRecord, type ReferralSummary } from './entities';
import { normalizeReferralCode } from './investment';

export interface ReferralListing {
    ownCodes: string[];
    referrals: ReferralSummary[];
}

/** Resolves a typed referral code to the record that owns it. */
export async function lookupReferrer(records: RecordRepository, input: string): Promise<InvestmentRecord | null> {
    const code = normalizeReferralCode(input);
    if (!code) return null;
    return records.findByAssignedCode(code);
}

// Full scan: a participant may own several codes, one per approved investment
export async function listReferrals(records: RecordRepository, userId: string): Promise<ReferralListing> {
    const ownCodes = new Set<string>();
    const candidates: InvestmentRecord[] = [];

    for await (const record of records.listAll()) {
        if (record.userId === userId && record.assignedCode) {
            ownCodes.add(record.assignedCode);
        }
        if (record.referralCode !== NO_REFERRAL) {
            candidates.push(record);
        }
    }

    const referrals = candidates
        .filter(r => ownCodes.has(r.referralCode))
        .map(r => ({ name: r.name, nationalId: r.nationalId, amount: r.amount }));

    return { ownCodes: [...ownCodes], referrals };
}
