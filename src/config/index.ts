import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;

    // Telegram
    telegramBotToken: string;
    telegramWebhookSecret: string;
    /** Empty means anyone who finds the bot may use it */
    telegramAllowedUserIds: number[];

    // Blogger
    bloggerBlogId: string;

    // Google OAuth
    googleClientId: string;
    googleClientSecret: string;
    googleRedirectUri: string;
    googleTokenPath: string;

    // Template
    postTemplatePath: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Proactive cleanup: trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarIdList(key: string): number[] {
    const value = getEnvVar(key, '');
    if (!value) {
        return [];
    }
    return value.split(',').map((part) => {
        const id = Number(part.trim());
        if (!Number.isInteger(id)) {
            throw new Error(`Environment variable ${key} must list numeric ids, got: ${part.trim()}`);
        }
        return id;
    });
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    const port = getEnvVarNumber('PORT', 3000);

    return {
        // Server
        port,
        environment: getEnvVar('NODE_ENV', 'development'),

        // Telegram
        telegramBotToken: getEnvVar('TELEGRAM_BOT_TOKEN', ''),
        telegramWebhookSecret: getEnvVar('TELEGRAM_WEBHOOK_SECRET', ''),
        telegramAllowedUserIds: getEnvVarIdList('TELEGRAM_ALLOWED_USER_IDS'),

        // Blogger
        bloggerBlogId: getEnvVar('BLOGGER_BLOG_ID', ''),

        // Google OAuth
        googleClientId: getEnvVar('GOOGLE_CLIENT_ID', ''),
        googleClientSecret: getEnvVar('GOOGLE_CLIENT_SECRET', ''),
        googleRedirectUri: getEnvVar('GOOGLE_REDIRECT_URI', `http://localhost:${port}/oauth/callback`),
        googleTokenPath: getEnvVar('GOOGLE_TOKEN_PATH', './data/google-token.json'),

        // Template
        postTemplatePath: getEnvVar('POST_TEMPLATE_PATH', './templates/post_template.html'),
    };
}

/**
 * Validates that the settings needed to run the bot are present.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.telegramBotToken) {
        errors.push('TELEGRAM_BOT_TOKEN is required to talk to Telegram');
    }
    if (!config.bloggerBlogId) {
        errors.push('BLOGGER_BLOG_ID is required to know where to publish');
    }
    if (!config.googleClientId || !config.googleClientSecret) {
        errors.push('GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET are required for Blogger access');
    }
    if (config.environment === 'production' && !config.telegramWebhookSecret) {
        errors.push('TELEGRAM_WEBHOOK_SECRET is required in production');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
