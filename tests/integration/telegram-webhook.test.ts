/**
 * Integration Tests: Telegram webhook and OAuth callback
 * Drives the Express app over HTTP with the Telegram Bot API stubbed by nock.
 */

import path from 'path';
import nock from 'nock';
import request from 'supertest';
import { Application } from 'express';
import { ConversationService } from '../../src/application/ConversationService';
import { SessionManager } from '../../src/application/SessionManager';
import { Config } from '../../src/config';
import { BlogPostRequest, BlogPostResult } from '../../src/domain/ports/IBlogPublisher';
import { GoogleAuthService } from '../../src/infrastructure/google/GoogleAuthService';
import { loadPostTemplate } from '../../src/infrastructure/templates/PostTemplateLoader';
import { createApp } from '../../src/presentation/app';
import { ChatService } from '../../src/presentation/services/ChatService';

const TELEGRAM_API = 'https://api.telegram.org';
const BOT_PATH = '/bottest-bot-token';
const USER_ID = 111;

const config: Config = {
    port: 3000,
    environment: 'test',
    telegramBotToken: 'test-bot-token',
    telegramWebhookSecret: 'test-secret',
    telegramAllowedUserIds: [USER_ID],
    bloggerBlogId: 'blog-1',
    googleClientId: '',
    googleClientSecret: '',
    googleRedirectUri: 'http://localhost:3000/oauth/callback',
    googleTokenPath: './data/test-token.json',
    postTemplatePath: path.join(__dirname, '../../templates/post_template.html'),
};

function textUpdate(updateId: number, text: string) {
    return {
        update_id: updateId,
        message: {
            message_id: updateId,
            from: { id: USER_ID },
            chat: { id: USER_ID, type: 'private' },
            text,
        },
    };
}

async function waitFor(condition: () => boolean, timeoutMs = 3000): Promise<void> {
    const start = Date.now();
    while (!condition()) {
        if (Date.now() - start > timeoutMs) {
            throw new Error('Timed out waiting for condition');
        }
        await new Promise((resolve) => setTimeout(resolve, 10));
    }
}

describe('Integration: Telegram webhook & OAuth callback', () => {
    let app: Application;
    let googleAuth: GoogleAuthService;
    let publish: jest.Mock<Promise<BlogPostResult>, [BlogPostRequest]>;
    let sent: string[];

    beforeAll(() => {
        nock.disableNetConnect();
        nock.enableNetConnect(/(127\.0\.0\.1|localhost)/);
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    beforeEach(() => {
        nock.cleanAll();
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });

        sent = [];
        nock(TELEGRAM_API)
            .persist()
            .post(`${BOT_PATH}/sendMessage`)
            .reply(200, (uri, body) => {
                if (typeof body === 'object' && typeof body.text === 'string') {
                    sent.push(body.text);
                }
                return { ok: true };
            });
        nock(TELEGRAM_API).persist().post(`${BOT_PATH}/answerCallbackQuery`).reply(200, { ok: true });
        nock(TELEGRAM_API).persist().post(`${BOT_PATH}/editMessageReplyMarkup`).reply(200, { ok: true });

        publish = jest.fn<Promise<BlogPostResult>, [BlogPostRequest]>().mockResolvedValue({
            success: true,
            postId: '9001',
            url: 'https://blog.example.com/2025/08/inception.html',
        });
        googleAuth = new GoogleAuthService(
            { clientId: '', clientSecret: '', redirectUri: config.googleRedirectUri },
            { load: () => null, save: () => undefined }
        );

        app = createApp(config, {
            conversation: new ConversationService({
                sessions: new SessionManager(),
                template: loadPostTemplate(config.postTemplatePath),
                publisher: { publish },
                blogId: config.bloggerBlogId,
            }),
            googleAuth,
            chat: new ChatService(config.telegramBotToken),
        });
    });

    afterEach(() => {
        nock.cleanAll();
        jest.restoreAllMocks();
    });

    it('should report health', async () => {
        const response = await request(app).get('/health');

        expect(response.status).toBe(200);
        expect(response.body.status).toBe('ok');
        expect(response.body.version).toBe('1.0.0');
    });

    it('should reject webhook calls without the secret token', async () => {
        const response = await request(app).post('/telegram-webhook').send(textUpdate(1, '/post'));

        expect(response.status).toBe(401);
        expect(response.body).toEqual({ error: { message: 'Invalid webhook secret', code: 'UnauthorizedError' } });
    });

    it('should acknowledge an update and reply through the Bot API', async () => {
        const response = await request(app)
            .post('/telegram-webhook')
            .set('X-Telegram-Bot-Api-Secret-Token', 'test-secret')
            .send(textUpdate(1, '/post'));

        expect(response.status).toBe(200);
        expect(response.body).toEqual({ ok: true });

        await waitFor(() => sent.length === 1);
        expect(sent[0]).toBe('📝 Step 1/8: Please enter the movie title:');
    });

    it('should collect every field and publish after Publish is pressed', async () => {
        const messages = [
            '/post',
            'Inception',
            'Sci-Fi, Thriller',
            'Inception',
            '9.0',
            'A dream within a dream.',
            '1,2,3',
            'https://www.youtube.com/watch?v=YoHD9XEInc0',
            '2025/08/inc2010',
        ];
        for (const [i, text] of messages.entries()) {
            await request(app)
                .post('/telegram-webhook')
                .set('X-Telegram-Bot-Api-Secret-Token', 'test-secret')
                .send(textUpdate(i + 1, text))
                .expect(200);
            await waitFor(() => sent.length === i + 1);
        }
        expect(sent[sent.length - 1].startsWith('📋 *Post Summary:*')).toBe(true);

        await request(app)
            .post('/telegram-webhook')
            .set('X-Telegram-Bot-Api-Secret-Token', 'test-secret')
            .send({
                update_id: 100,
                callback_query: {
                    id: 'cb-100',
                    from: { id: USER_ID },
                    message: { message_id: 9, chat: { id: USER_ID, type: 'private' } },
                    data: 'post_confirm',
                },
            })
            .expect(200);

        await waitFor(() => sent.length === messages.length + 2);
        expect(sent.slice(-2)).toEqual([
            '📤 Publishing post to Blogger...',
            '✅ Post published successfully!\n\n🔗 URL: https://blog.example.com/2025/08/inception.html',
        ]);

        expect(publish).toHaveBeenCalledTimes(1);
        const [post] = publish.mock.calls[0];
        expect(post.blogId).toBe('blog-1');
        expect(post.title).toBe('Inception');
        expect(post.labels).toEqual(['Sci-Fi', 'Thriller']);
        expect(post.content.split('<figure class="movie-scene">')).toHaveLength(4);
        expect(post.content).toContain('src="https://www.youtube.com/embed/YoHD9XEInc0"');
        expect(post.content).not.toContain('{{');
    });

    it('should answer unknown routes with 404', async () => {
        const response = await request(app).get('/nowhere');
        expect(response.status).toBe(404);
    });

    describe('GET /oauth/callback', () => {
        it('should store tokens for a valid code', async () => {
            const complete = jest.spyOn(googleAuth, 'completeAuthorization').mockResolvedValue(undefined);

            const response = await request(app).get('/oauth/callback').query({ code: 'test-code', state: 'state-1' });

            expect(response.status).toBe(200);
            expect(response.text).toContain('<h1>Authorization successful</h1>');
            expect(complete).toHaveBeenCalledWith('test-code', 'state-1');
        });

        it('should show the failure when the exchange fails', async () => {
            jest.spyOn(console, 'error').mockImplementation(() => { });
            jest.spyOn(googleAuth, 'completeAuthorization').mockRejectedValue(
                new Error('OAuth state mismatch, please restart authorization with /auth')
            );

            const response = await request(app).get('/oauth/callback').query({ code: 'test-code', state: 'forged' });

            expect(response.status).toBe(400);
            expect(response.text).toContain('<p>OAuth state mismatch, please restart authorization with /auth</p>');
        });

        it('should show the failure when consent was refused', async () => {
            const response = await request(app).get('/oauth/callback').query({ error: 'access_denied' });

            expect(response.status).toBe(400);
            expect(response.text).toContain('Google returned: access_denied.');
        });

        it('should escape the values it echoes back', async () => {
            const response = await request(app).get('/oauth/callback').query({ error: '<b>denied</b>' });

            expect(response.status).toBe(400);
            expect(response.text).toContain('Google returned: &lt;b&gt;denied&lt;/b&gt;.');
        });

        it('should reject a callback without a code', async () => {
            const response = await request(app).get('/oauth/callback');

            expect(response.status).toBe(400);
            expect(response.body).toEqual({ error: { message: 'Missing authorization code', code: 'BadRequestError' } });
        });
    });
});
