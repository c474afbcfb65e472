import { Router, Request, Response, NextFunction } from 'express';
import { ConversationService, ReplySink } from '../../application/ConversationService';
import { ConversationEvent, ReplyButton, eventFromAction } from '../../domain/services/ConversationMachine';
import { GoogleAuthService } from '../../infrastructure/google/GoogleAuthService';
import { asyncHandler, UnauthorizedError } from '../middleware/errorHandler';
import { ChatService, InlineButton } from '../services/ChatService';
import {
    AUTH_MESSAGES,
    HELP_MESSAGE,
    NOT_ALLOWED_MESSAGE,
    TEXT_ONLY_MESSAGE,
    UNKNOWN_ACTION_MESSAGE,
    UNKNOWN_COMMAND_MESSAGE,
    WELCOME_MESSAGE,
    errorMessage,
    templateHelpMessage,
} from '../botMessages';

/**
 * Telegram update types (minimal definitions).
 */
export interface TelegramUpdate {
    update_id: number;
    message?: TelegramMessage;
    callback_query?: TelegramCallbackQuery;
}

export interface TelegramUser {
    id: number;
    username?: string;
}

export interface TelegramMessage {
    message_id: number;
    from?: TelegramUser;
    chat: {
        id: number;
        type: string;
    };
    text?: string;
}

export interface TelegramCallbackQuery {
    id: string;
    from: TelegramUser;
    message?: TelegramMessage;
    data?: string;
}

export interface TelegramWebhookDependencies {
    conversation: ConversationService;
    googleAuth: GoogleAuthService;
    chat: ChatService;
    webhookSecret: string;
    /** Empty allows everyone */
    allowedUserIds: number[];
}

export interface ParsedCommand {
    name: string;
    args: string;
}

const COMMAND_PATTERN = /^\/([A-Za-z_]+)(?:@[A-Za-z0-9_]+)?(?:\s+([\s\S]*))?$/;

/**
 * Splits `/command@botname args` into its name and argument text.
 */
export function parseCommand(text: string): ParsedCommand | null {
    const match = COMMAND_PATTERN.exec(text.trim());
    if (!match) {
        return null;
    }
    return { name: match[1].toLowerCase(), args: (match[2] ?? '').trim() };
}

/**
 * Middleware to validate Telegram webhook secret token.
 */
function validateTelegramSecret(secretToken: string) {
    return (req: Request, res: Response, next: NextFunction) => {
        if (!secretToken) {
            // If no secret is configured, skip validation (dev mode)
            return next();
        }

        const receivedToken = req.headers['x-telegram-bot-api-secret-token'];

        if (receivedToken !== secretToken) {
            console.warn('[Telegram] Invalid webhook secret token received');
            throw new UnauthorizedError('Invalid webhook secret');
        }

        next();
    };
}

/**
 * Creates the Telegram webhook route.
 */
export function createTelegramWebhookRoutes(deps: TelegramWebhookDependencies): Router {
    const router = Router();

    /**
     * POST /telegram-webhook
     *
     * Receives Telegram updates (messages and button presses).
     * Protected by secret token validation.
     */
    router.post(
        '/telegram-webhook',
        validateTelegramSecret(deps.webhookSecret),
        asyncHandler(async (req: Request, res: Response) => {
            const update: TelegramUpdate = req.body;

            // Acknowledge receipt immediately to avoid timeouts
            res.status(200).json({ ok: true });

            try {
                await processUpdate(update, deps);
            } catch (error) {
                console.error('[Telegram] Webhook processing error:', error);
            }
        })
    );

    return router;
}

function isAllowed(userId: number, allowedUserIds: number[]): boolean {
    return allowedUserIds.length === 0 || allowedUserIds.includes(userId);
}

function toInlineButtons(buttons: ReplyButton[][] | undefined): InlineButton[][] | undefined {
    return buttons?.map((row) => row.map((button) => ({ text: button.text, callbackData: button.action })));
}

function replySink(chat: ChatService, chatId: number): ReplySink {
    return (reply) => chat.sendMessage(chatId, reply.text, toInlineButtons(reply.buttons));
}

/**
 * Processes a Telegram update: a button press or a message.
 */
export async function processUpdate(update: TelegramUpdate, deps: TelegramWebhookDependencies): Promise<void> {
    if (update.callback_query) {
        await processCallbackQuery(update.callback_query, deps);
        return;
    }

    const message = update.message;
    if (!message) {
        return;
    }

    const chatId = message.chat.id;
    const userId = message.from?.id ?? chatId;

    if (!isAllowed(userId, deps.allowedUserIds)) {
        console.warn(`[Telegram] Ignoring message from unauthorized user ${userId}`);
        await deps.chat.sendMessage(chatId, NOT_ALLOWED_MESSAGE);
        return;
    }

    try {
        if (message.text === undefined || message.text.trim().length === 0) {
            await deps.chat.sendMessage(chatId, TEXT_ONLY_MESSAGE);
            return;
        }

        const command = parseCommand(message.text);
        if (command) {
            console.log(`[Telegram] /${command.name} from user ${userId}`);
            await processCommand(command, userId, chatId, deps);
            return;
        }

        await deps.conversation.handle(userId, chatId, { type: 'input', text: message.text }, replySink(deps.chat, chatId));
    } catch (error) {
        console.error(`[Telegram] Failed to process message from user ${userId}:`, error);
        await deps.chat.sendMessage(chatId, errorMessage(error));
    }
}

async function processCallbackQuery(query: TelegramCallbackQuery, deps: TelegramWebhookDependencies): Promise<void> {
    const userId = query.from.id;
    const chatId = query.message?.chat.id ?? userId;

    if (!isAllowed(userId, deps.allowedUserIds)) {
        console.warn(`[Telegram] Ignoring button press from unauthorized user ${userId}`);
        await deps.chat.answerCallbackQuery(query.id, NOT_ALLOWED_MESSAGE);
        return;
    }

    await deps.chat.answerCallbackQuery(query.id);

    const event = eventFromAction(query.data ?? '');
    if (!event) {
        await deps.chat.sendMessage(chatId, UNKNOWN_ACTION_MESSAGE);
        return;
    }

    if (query.message) {
        await deps.chat.clearButtons(chatId, query.message.message_id);
    }

    try {
        console.log(`[Telegram] Button "${query.data}" from user ${userId}`);
        await deps.conversation.handle(userId, chatId, event, replySink(deps.chat, chatId));
    } catch (error) {
        console.error(`[Telegram] Failed to process button press from user ${userId}:`, error);
        await deps.chat.sendMessage(chatId, errorMessage(error));
    }
}

async function processCommand(
    command: ParsedCommand,
    userId: number,
    chatId: number,
    deps: TelegramWebhookDependencies
): Promise<void> {
    const send = replySink(deps.chat, chatId);
    const dispatch = (event: ConversationEvent) => deps.conversation.handle(userId, chatId, event, send);

    switch (command.name) {
        case 'start':
            await deps.chat.sendMessage(chatId, WELCOME_MESSAGE);
            return;
        case 'help':
            await deps.chat.sendMessage(chatId, HELP_MESSAGE);
            return;
        case 'template':
            await deps.chat.sendMessage(chatId, templateHelpMessage());
            return;
        case 'status':
            await deps.chat.sendMessage(chatId, deps.conversation.describeStatus(userId));
            return;
        case 'post':
            await dispatch({ type: 'post' });
            return;
        case 'cancel':
            await dispatch({ type: 'cancel' });
            return;
        case 'edit':
            await dispatch({ type: 'edit', field: command.args || undefined });
            return;
        case 'auth':
            await deps.chat.sendMessage(chatId, startAuthorization(deps.googleAuth));
            return;
        case 'complete_auth':
            await deps.chat.sendMessage(chatId, await completeAuthorization(deps.googleAuth, command.args));
            return;
        default:
            await deps.chat.sendMessage(chatId, UNKNOWN_COMMAND_MESSAGE);
    }
}

function startAuthorization(googleAuth: GoogleAuthService): string {
    switch (googleAuth.getStatus()) {
        case 'not_configured':
            return AUTH_MESSAGES.notConfigured;
        case 'authorized':
            return AUTH_MESSAGES.alreadyAuthorized;
        case 'auth_required':
            return AUTH_MESSAGES.link(googleAuth.createAuthUrl());
    }
}

async function completeAuthorization(googleAuth: GoogleAuthService, code: string): Promise<string> {
    const status = googleAuth.getStatus();
    if (status === 'not_configured') {
        return AUTH_MESSAGES.notConfigured;
    }
    if (!code) {
        return status === 'authorized' ? AUTH_MESSAGES.completed : AUTH_MESSAGES.stillPending;
    }

    try {
        await googleAuth.completeAuthorization(code);
        return AUTH_MESSAGES.completed;
    } catch (error) {
        console.error('[Telegram] Code exchange failed:', error);
        return AUTH_MESSAGES.failed(error instanceof Error ? error.message : 'Unknown error');
    }
}
