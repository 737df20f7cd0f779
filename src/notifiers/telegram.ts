import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { SCANNER_CONFIG } from '../config/constants';
import { DeliveryError } from '../utils/errors';
import logger from '../utils/logger';

export interface Notifier {
    send(text: string): Promise<void>;
}

const SendMessageResponseSchema = z.object({
    ok: z.boolean(),
    description: z.string().optional(),
}).passthrough();

/**
 * Telegram Bot API sendMessage, plain text.
 */
export class TelegramNotifier implements Notifier {
    private readonly http: AxiosInstance;
    private readonly chatId: string;
    private readonly timeoutMs: number;

    constructor(http: AxiosInstance, chatId: string, timeoutMs: number = SCANNER_CONFIG.EXTERNAL_TIMEOUT_MS) {
        this.http = http;
        this.chatId = chatId.trim();
        this.timeoutMs = timeoutMs;
    }

    static create(token: string, chatId: string, timeoutMs: number = SCANNER_CONFIG.EXTERNAL_TIMEOUT_MS): TelegramNotifier {
        return new TelegramNotifier(
            axios.create({
                baseURL: `https://api.telegram.org/bot${token}`,
                timeout: timeoutMs,
                headers: { 'Content-Type': 'application/json' },
            }),
            chatId,
            timeoutMs
        );
    }

    async send(text: string): Promise<void> {
        const response = await this.http.post<unknown>('/sendMessage', {
            chat_id: this.chatId,
            text,
            disable_web_page_preview: true,
        }, {
            signal: AbortSignal.timeout(this.timeoutMs),
            // Telegram reports refusals in the body; read it instead of throwing on 4xx
            validateStatus: () => true,
        });

        const parsed = SendMessageResponseSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new DeliveryError(`Telegram HTTP ${response.status}: unexpected response body`);
        }
        if (!parsed.data.ok) {
            throw new DeliveryError(`Telegram HTTP ${response.status}: ${parsed.data.description ?? 'unknown error'}`);
        }

        logger.info(`[TELEGRAM] Sent notification: ${text}`);
    }
}

/**
 * Used when no bot token is configured: messages only reach the log.
 */
export class LogNotifier implements Notifier {
    async send(text: string): Promise<void> {
        logger.info(`[NOTIFY] ${text}`);
    }
}
