import type { WAMessage } from '@whiskeysockets/baileys';
import { decodeAction, type InboundEvent } from '../app/transport';

const USER_SUFFIX = '@s.whatsapp.net';

export function toJid(userId: string): string {
    return userId.includes('@') ? userId : `${userId}${USER_SUFFIX}`;
}

/** Bare phone number for a one-to-one chat, null for groups, broadcasts and status updates. */
export function fromJid(jid: string | null | undefined): string | null {
    if (!jid || !jid.endsWith(USER_SUFFIX)) return null;
    const userId = jid.slice(0, -USER_SUFFIX.length).split(':')[0];
    return userId || null;
}

export function parseInbound(msg: WAMessage): InboundEvent | null {
    const from = fromJid(msg.key.remoteJid);
    const content = msg.message;
    if (!from || !content || msg.key.fromMe) return null;

    const image = content.imageMessage;
    const document = content.documentMessage ?? content.documentWithCaptionMessage?.message?.documentMessage;
    if ((image || document) && msg.key.id) {
        return {
            kind: 'media',
            from,
            media: { reference: msg.key.id, mediaType: image ? 'image' : 'document' },
            caption: image?.caption || document?.caption || ''
        };
    }

    const text = content.buttonsResponseMessage?.selectedButtonId
        || content.conversation
        || content.extendedTextMessage?.text
        || '';

    const action = decodeAction(text);
    if (action) {
        return { kind: 'action', from, ...action };
    }
    return { kind: 'text', from, text };
}
