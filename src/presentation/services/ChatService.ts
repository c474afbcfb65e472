import axios from 'axios';

export const MAX_MESSAGE_LENGTH = 4000;

export interface InlineButton {
    text: string;
    callbackData: string;
}

/**
 * Thin client for the Telegram Bot API. Sending never throws: a failed
 * notification is logged and dropped.
 */
export class ChatService {
    private readonly botToken: string;
    private readonly baseUrl: string;

    constructor(botToken: string) {
        this.botToken = botToken;
        this.baseUrl = `https://api.telegram.org/bot${botToken}`;
    }

    /**
     * Sends a text message, optionally with rows of inline buttons.
     */
    async sendMessage(chatId: number, text: string, buttons?: InlineButton[][]): Promise<void> {
        if (!this.botToken) {
            console.warn('Telegram bot token not configured, skipping message send');
            return;
        }

        const replyMarkup = buttons ? toInlineKeyboard(buttons) : undefined;

        try {
            // Ensure text is within limits
            const content = text.length > MAX_MESSAGE_LENGTH
                ? text.substring(0, MAX_MESSAGE_LENGTH) + '... (truncated)'
                : text;

            await axios.post(`${this.baseUrl}/sendMessage`, {
                chat_id: chatId,
                text: content,
                parse_mode: 'Markdown',
                reply_markup: replyMarkup,
            });
        } catch (error) {
            // Retry without Markdown if it fails (user text often has unbalanced * or _)
            if (axios.isAxiosError(error) && error.response?.status === 400) {
                try {
                    console.warn(`[ChatService] Markdown send failed, retrying as plain text...`);
                    const plain = text.length > MAX_MESSAGE_LENGTH ? text.substring(0, MAX_MESSAGE_LENGTH) + '...' : text;

                    await axios.post(`${this.baseUrl}/sendMessage`, {
                        chat_id: chatId,
                        text: plain,
                        reply_markup: replyMarkup,
                        // No parse_mode = Plain Text
                    });
                    return;
                } catch (retryError) {
                    console.error(`[ChatService] Retry failed:`, retryError);
                }
            }
            console.error(`Failed to send Telegram message to chat ${chatId}:`, error);
        }
    }

    /**
     * Stops the loading spinner on a pressed inline button.
     */
    async answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void> {
        if (!this.botToken) {
            return;
        }

        try {
            await axios.post(`${this.baseUrl}/answerCallbackQuery`, {
                callback_query_id: callbackQueryId,
                text,
            });
        } catch (error) {
            console.error(`[ChatService] Failed to answer callback query ${callbackQueryId}:`, error);
        }
    }

    /**
     * Removes the inline buttons from an earlier message so they cannot be pressed twice.
     */
    async clearButtons(chatId: number, messageId: number): Promise<void> {
        if (!this.botToken) {
            return;
        }

        try {
            await axios.post(`${this.baseUrl}/editMessageReplyMarkup`, {
                chat_id: chatId,
                message_id: messageId,
                reply_markup: { inline_keyboard: [] },
            });
        } catch (error) {
            console.warn(`[ChatService] Could not clear buttons on message ${messageId}:`, error);
        }
    }
}

function toInlineKeyboard(buttons: InlineButton[][]) {
    return {
        inline_keyboard: buttons.map((row) =>
            row.map((button) => ({ text: button.text, callback_data: button.callbackData }))
        ),
    };
}
