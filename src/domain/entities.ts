export type RecordStatus = 'AwaitingProof' | 'ProofSubmitted' | 'Approved' | 'Rejected';

export const NO_REFERRAL = 'none';

export interface InvestmentRecord {
    recordId: string;
    userId: string; // Phone number, without the JID suffix
    name: string;
    nationalId: string;
    amount: number;
    referralCode: string; // AssignedCode of the referrer, or NO_REFERRAL
    assignedCode: string | null; // Minted on approval, immutable afterwards
    createdAt: Date;
    expectedPayoutDate: Date;
    proofReference: string | null;
    status: RecordStatus;
    reviewerNote: string;
}

export type NewInvestmentRecord = Omit<InvestmentRecord, 'recordId'>;

// Fields the workflows are allowed to touch after creation
export type RecordPatch = Partial<Pick<InvestmentRecord, 'assignedCode' | 'proofReference' | 'status' | 'reviewerNote'>>;

export interface UpdateGuard {
    expectedStatus?: RecordStatus;
}

export type ReviewAction = 'approve' | 'reject';

export interface ReferralSummary {
    name: string;
    nationalId: string;
    amount: number;
}
