import { Config, getConfig, loadConfig, resetConfig, validateConfig } from '../../src/config/index';

const CONFIG_KEYS = [
    'PORT',
    'NODE_ENV',
    'TELEGRAM_BOT_TOKEN',
    'TELEGRAM_WEBHOOK_SECRET',
    'TELEGRAM_ALLOWED_USER_IDS',
    'BLOGGER_BLOG_ID',
    'GOOGLE_CLIENT_ID',
    'GOOGLE_CLIENT_SECRET',
    'GOOGLE_REDIRECT_URI',
    'GOOGLE_TOKEN_PATH',
    'POST_TEMPLATE_PATH',
];

const VALID: Config = {
    port: 3000,
    environment: 'development',
    telegramBotToken: 'test-bot-token',
    telegramWebhookSecret: '',
    telegramAllowedUserIds: [],
    bloggerBlogId: 'blog-1',
    googleClientId: 'test-client-id',
    googleClientSecret: 'test-client-secret',
    googleRedirectUri: 'http://localhost:3000/oauth/callback',
    googleTokenPath: './data/google-token.json',
    postTemplatePath: './templates/post_template.html',
};

describe('ConfigLoader', () => {
    const originalEnv = process.env;

    beforeEach(() => {
        process.env = { ...originalEnv };
        for (const key of CONFIG_KEYS) {
            delete process.env[key];
        }
        resetConfig();
    });

    afterAll(() => {
        process.env = originalEnv;
    });

    it('should fall back to defaults', () => {
        const config = loadConfig();

        expect(config).toEqual({
            port: 3000,
            environment: 'development',
            telegramBotToken: '',
            telegramWebhookSecret: '',
            telegramAllowedUserIds: [],
            bloggerBlogId: '',
            googleClientId: '',
            googleClientSecret: '',
            googleRedirectUri: 'http://localhost:3000/oauth/callback',
            googleTokenPath: './data/google-token.json',
            postTemplatePath: './templates/post_template.html',
        });
    });

    it('should strip quotes and whitespace from environment variables', () => {
        process.env.TELEGRAM_BOT_TOKEN = '"test-bot-token"';
        process.env.BLOGGER_BLOG_ID = "  'blog-1'  ";
        process.env.GOOGLE_CLIENT_SECRET = '  test-client-secret ';

        const config = loadConfig();

        expect(config.telegramBotToken).toBe('test-bot-token');
        expect(config.bloggerBlogId).toBe('blog-1');
        expect(config.googleClientSecret).toBe('test-client-secret');
    });

    it('should handle numeric variables with quotes and derive the redirect URI from the port', () => {
        process.env.PORT = '"4000"';

        const config = loadConfig();

        expect(config.port).toBe(4000);
        expect(config.googleRedirectUri).toBe('http://localhost:4000/oauth/callback');
    });

    it('should reject a non-numeric port', () => {
        process.env.PORT = 'eighty';
        expect(() => loadConfig()).toThrow('Environment variable PORT must be a number, got: eighty');
    });

    it('should parse the allowed user id list', () => {
        process.env.TELEGRAM_ALLOWED_USER_IDS = '123, 456,789';
        expect(loadConfig().telegramAllowedUserIds).toEqual([123, 456, 789]);
    });

    it('should reject a malformed user id list', () => {
        process.env.TELEGRAM_ALLOWED_USER_IDS = '123,abc';
        expect(() => loadConfig()).toThrow(
            'Environment variable TELEGRAM_ALLOWED_USER_IDS must list numeric ids, got: abc'
        );
    });

    it('should cache the config until reset', () => {
        process.env.BLOGGER_BLOG_ID = 'first';
        const first = getConfig();
        process.env.BLOGGER_BLOG_ID = 'second';

        expect(getConfig()).toBe(first);

        resetConfig();
        expect(getConfig().bloggerBlogId).toBe('second');
    });

    describe('validateConfig', () => {
        it('should accept a complete configuration', () => {
            expect(validateConfig(VALID)).toEqual([]);
        });

        it('should list every missing setting', () => {
            const errors = validateConfig({
                ...VALID,
                telegramBotToken: '',
                bloggerBlogId: '',
                googleClientSecret: '',
            });

            expect(errors).toEqual([
                'TELEGRAM_BOT_TOKEN is required to talk to Telegram',
                'BLOGGER_BLOG_ID is required to know where to publish',
                'GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET are required for Blogger access',
            ]);
        });

        it('should require a webhook secret in production', () => {
            expect(validateConfig({ ...VALID, environment: 'production' })).toEqual([
                'TELEGRAM_WEBHOOK_SECRET is required in production',
            ]);
        });
    });
});
