export type EventType =
    // Router / UX Events
    | 'MenuShown'
    | 'FlowStarted'
    | 'FlowCancelled'
    // Intake
    | 'RecordRegistered'
    | 'ProofSubmitted'
    // Review
    | 'RecordApproved'
    | 'RecordRejected'
    | 'UnauthorizedAction'
    // Outbound
    | 'ReminderSent'
    | 'BroadcastSent';

export type EventPayload = Record<string, string | number | boolean | null>;

export interface DomainEvent {
    id?: string;
    type: EventType;
    payload: EventPayload;
    timestamp: number;
    user_id?: string;
    record_id?: string;
    amount?: number;
    external_ref?: string;
}
