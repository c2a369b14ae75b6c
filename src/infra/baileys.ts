import { makeWASocket, useMultiFileAuthState, DisconnectReason, type WASocket, type WAMessage, fetchLatestBaileysVersion } from '@whiskeysockets/baileys';
import pino from 'pino';
import { Boom } from '@hapi/boom';
import path from 'path';
import fs from 'fs';
import * as qrcode from 'qrcode-terminal';
import { encodeAction, type ActionButton, type ChatTransport, type ConnectionEvents, type InboundEvent, type MediaRef } from '../app/transport';
import { parseInbound, toJid } from './whatsapp-inbound';

const logger = pino({ name: 'infra/baileys', level: process.env.LOG_LEVEL || 'info' });

const MEDIA_CACHE_SIZE = 500;

// Actions go out as typed commands; parseInbound turns the echo back into an action event
function renderButtons(buttons: ActionButton[]): string {
    const lines = buttons.map(b => `${b.label}: responde *${encodeAction(b.action, b.recordId)}*`);
    return `\n\n${lines.join('\n')}`;
}

export class WhatsAppService implements ChatTransport, ConnectionEvents {
    private sock: WASocket | undefined;
    private messageHandler: ((event: InboundEvent) => Promise<void>) | undefined;
    private media = new Map<string, WAMessage>();
    private openListeners: Array<() => void> = [];

    constructor(private authDir: string) { }

    async connect(): Promise<void> {
        const authPath = path.resolve(this.authDir);
        if (!fs.existsSync(authPath)) {
            fs.mkdirSync(authPath, { recursive: true });
        }

        const { state, saveCreds } = await useMultiFileAuthState(authPath);
        const { version, isLatest } = await fetchLatestBaileysVersion();

        logger.info(`Using Baileys v${version.join('.')} (isLatest: ${isLatest})`);

        this.sock = makeWASocket({
            version,
            auth: state,
            logger: pino({ level: 'silent' }) as any,
            browser: ['Desktop', 'Chrome', '114.0.5735.199'],
            markOnlineOnConnect: true,
            syncFullHistory: false
        });

        this.sock.ev.on('creds.update', saveCreds);

        this.sock.ev.on('connection.update', (update) => {
            const { connection, lastDisconnect, qr } = update;

            if (qr) {
                console.log('\n📱 Escanea este código QR con WhatsApp:\n');
                qrcode.generate(qr, { small: true });
                console.log('\n👆 Abre WhatsApp → Dispositivos vinculados → Vincular dispositivo\n');
            }

            if (connection === 'close') {
                const error = lastDisconnect?.error;
                const statusCode = error instanceof Boom ? error.output.statusCode : undefined;
                const shouldReconnect = statusCode !== DisconnectReason.loggedOut;

                logger.warn({ statusCode }, 'Connection closed');

                if (shouldReconnect) {
                    logger.info('Reconnecting in 5 seconds');
                    setTimeout(() => {
                        this.connect().catch(err => logger.error({ err }, 'Reconnect failed'));
                    }, 5000);
                } else {
                    logger.error(`Logged out. Delete ${authPath} and start again to pair a new device.`);
                }
            } else if (connection === 'open') {
                console.log('\n✅ ¡WhatsApp conectado exitosamente!\n');
                logger.info('WhatsApp Connection Opened!');
                for (const listener of this.openListeners) listener();
            }
        });

        this.sock.ev.on('messages.upsert', async (m) => {
            if (m.type !== 'notify') return;

            for (const msg of m.messages) {
                const event = parseInbound(msg);
                if (!event) continue;

                if (event.kind === 'media') {
                    this.remember(event.media.reference, msg);
                }

                if (this.messageHandler) {
                    try {
                        await this.messageHandler(event);
                    } catch (e) {
                        logger.error(e, 'Error handling message');
                    }
                }
            }
        });
    }

    onMessage(handler: (event: InboundEvent) => Promise<void>) {
        this.messageHandler = handler;
    }

    onOpen(listener: () => void) {
        this.openListeners.push(listener);
    }

    async sendMessage(to: string, text: string, buttons?: ActionButton[]): Promise<void> {
        const sock = this.requireSocket();
        const body = buttons && buttons.length > 0 ? text + renderButtons(buttons) : text;
        await sock.sendMessage(toJid(to), { text: body });
    }

    async sendMedia(to: string, media: MediaRef, caption: string, buttons?: ActionButton[]): Promise<void> {
        const sock = this.requireSocket();
        const original = this.media.get(media.reference);
        if (original) {
            await sock.sendMessage(toJid(to), { forward: original });
        } else {
            logger.warn({ reference: media.reference }, 'Media no longer cached, sending caption only');
        }
        await this.sendMessage(to, caption, buttons);
    }

    private requireSocket(): WASocket {
        if (!this.sock) {
            throw new Error('Cannot send message: Socket not initialized');
        }
        return this.sock;
    }

    private remember(reference: string, msg: WAMessage): void {
        this.media.set(reference, msg);
        if (this.media.size > MEDIA_CACHE_SIZE) {
            const oldest = this.media.keys().next();
            if (!oldest.done) this.media.delete(oldest.value);
        }
    }
}
