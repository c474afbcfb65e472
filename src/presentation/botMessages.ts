import { REVIEW_FIELDS } from '../domain/entities/ReviewFields';
import { describePlaceholders } from '../domain/services/TemplateEngine';

export const WELCOME_MESSAGE =
    `🎬 *Movie Post Bot*\n\n` +
    `I collect the details of a movie review step by step and publish it to your Blogger blog.\n\n` +
    `Use /post to start a new post, or /help to see every command.`;

export const HELP_MESSAGE =
    `📖 *Commands*\n\n` +
    `/post - Start creating a new movie post\n` +
    `/cancel - Cancel the post in progress\n` +
    `/edit [field] - Change a field before publishing\n` +
    `/status - Show which fields are filled in\n` +
    `/template - Show the placeholders the post template uses\n` +
    `/auth - Connect the bot to your Blogger account\n` +
    `/complete\\_auth [code] - Finish connecting with a pasted code\n` +
    `/help - Show this message\n\n` +
    `*Fields, in order:* ${REVIEW_FIELDS.map((field) => field.label).join(', ')}`;

export const NOT_ALLOWED_MESSAGE = '⛔ Sorry, this bot only works for its owner.';
export const UNKNOWN_COMMAND_MESSAGE = '❓ Unknown command. Use /help to see what I can do.';
export const TEXT_ONLY_MESSAGE = '✍️ Please answer with a text message.';
export const UNKNOWN_ACTION_MESSAGE = 'That button is no longer valid.';

export function templateHelpMessage(): string {
    const lines = describePlaceholders().map(({ token, description }) => `• \`${token}\` - ${description}`);
    return `🧩 *Template placeholders*\n\n${lines.join('\n')}`;
}

export function errorMessage(error: unknown): string {
    const reason = error instanceof Error ? error.message : 'Unknown error';
    return `❌ Something went wrong while handling that: ${reason}\nPlease try again.`;
}

export const AUTH_MESSAGES = {
    notConfigured: '⚠️ Google OAuth is not configured. Set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET and restart the bot.',
    alreadyAuthorized: '✅ Blogger access is already authorized. You can publish posts.',
    completed: '✅ Authorization complete. You can publish posts now.',
    stillPending: '⏳ Blogger is not authorized yet. Use /auth to get the authorization link.',
    link: (url: string) =>
        `🔐 *Blogger authorization*\n\n` +
        `1. Open this link and allow access:\n${url}\n\n` +
        `2. You will be sent back to the bot's callback page. If that page cannot be reached, ` +
        `copy the code value from its address and send /complete\\_auth followed by the code.`,
    failed: (reason: string) => `❌ Authorization failed: ${reason}\nUse /auth to try again.`,
};
