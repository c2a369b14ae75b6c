import type { ReviewAction } from '../domain/entities';

export interface MediaRef {
    reference: string; // Opaque handle owned by the transport
    mediaType: 'image' | 'document';
}

export interface ActionButton {
    label: string;
    action: ReviewAction;
    recordId: string;
}

export type InboundEvent =
    | { kind: 'text'; from: string; text: string }
    | { kind: 'media'; from: string; media: MediaRef; caption: string }
    | { kind: 'action'; from: string; action: ReviewAction; recordId: string };

/** Outbound side of the chat transport. Identities are bare user ids, never transport addresses. */
export interface ChatTransport {
    sendMessage(to: string, text: string, buttons?: ActionButton[]): Promise<void>;
    sendMedia(to: string, media: MediaRef, caption: string, buttons?: ActionButton[]): Promise<void>;
}

/** Link state of a transport that can drop; listeners run on every (re)connect. */
export interface ConnectionEvents {
    onOpen(listener: () => void): void;
}

const ACTION_PATTERN = /^(approve|reject)\|(\S+)$/i;

export function encodeAction(action: ReviewAction, recordId: string): string {
    return `${action}|${recordId}`;
}

export function decodeAction(payload: string): { action: ReviewAction; recordId: string } | null {
    const match = ACTION_PATTERN.exec(payload.trim());
    if (!match) return null;
    const action: ReviewAction = match[1].toLowerCase() === 'approve' ? 'approve' : 'reject';
    return { action, recordId: match[2] };
}

export function reviewButtons(recordId: string): ActionButton[] {
    return [
        { label: '✅ Aprobar', action: 'approve', recordId },
        { label: '❌ Rechazar', action: 'reject', recordId }
    ];
}
