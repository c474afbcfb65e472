import { ConversationService } from '../../../src/application/ConversationService';
import { SessionManager } from '../../../src/application/SessionManager';
import { TemplateError } from '../../../src/domain/errors';
import { BlogPostRequest, BlogPostResult, IBlogPublisher } from '../../../src/domain/ports/IBlogPublisher';
import { ConversationEvent, ConversationReply } from '../../../src/domain/services/ConversationMachine';
import { PostTemplate, parseTemplate } from '../../../src/domain/services/TemplateEngine';

const TEMPLATE =
    '<h1>{{title}}</h1><p>{{labels}} {{poster}} {{rating}} {{source}}</p><p>{{review}}</p>' +
    '{{#gallery}}{{#scene}}<img src="{{sceneImage}}.jpg">{{/scene}}{{/gallery}}' +
    '{{#youtube}}<iframe src="{{youtubeEmbed}}"></iframe>{{/youtube}}';

const EXPECTED_HTML =
    '<h1>Inception</h1><p>Sci-Fi, Thriller Inception 9.0 2025/08/inc2010</p><p>A dream within a dream.</p>' +
    '<img src="Inception-1.jpg"><img src="Inception-2.jpg"><img src="Inception-3.jpg">' +
    '<iframe src="https://www.youtube.com/embed/YoHD9XEInc0"></iframe>';

const FILL_IN: ConversationEvent[] = [
    { type: 'post' },
    ...[
        'Inception',
        'Sci-Fi, Thriller',
        'Inception',
        '9.0',
        'A dream within a dream.',
        '1,2,3',
        'https://youtu.be/YoHD9XEInc0',
        '2025/08/inc2010',
    ].map((text): ConversationEvent => ({ type: 'input', text })),
];

const USER_ID = 7;
const CHAT_ID = 70;

describe('ConversationService', () => {
    let sessions: SessionManager;
    let template: PostTemplate;
    let publish: jest.Mock<Promise<BlogPostResult>, [BlogPostRequest]>;
    let send: jest.Mock<Promise<void>, [ConversationReply]>;
    let service: ConversationService;

    async function feed(events: ConversationEvent[]): Promise<void> {
        for (const event of events) {
            await service.handle(USER_ID, CHAT_ID, event, send);
        }
    }

    function lastReply(): ConversationReply | undefined {
        const calls = send.mock.calls;
        return calls.length > 0 ? calls[calls.length - 1][0] : undefined;
    }

    beforeEach(() => {
        sessions = new SessionManager();
        template = parseTemplate(TEMPLATE);
        publish = jest.fn<Promise<BlogPostResult>, [BlogPostRequest]>();
        send = jest.fn<Promise<void>, [ConversationReply]>().mockResolvedValue(undefined);
        const publisher: IBlogPublisher = { publish };
        service = new ConversationService({ sessions, template, publisher, blogId: 'blog-1' });
    });

    it('renders the template and publishes the post on confirm', async () => {
        publish.mockResolvedValue({ success: true, postId: 'p1', url: 'https://blog.example.com/inception.html' });

        await feed([...FILL_IN, { type: 'confirm' }]);

        expect(publish).toHaveBeenCalledTimes(1);
        expect(publish).toHaveBeenCalledWith({
            blogId: 'blog-1',
            title: 'Inception',
            content: EXPECTED_HTML,
            labels: ['Sci-Fi', 'Thriller'],
        });

        const texts = send.mock.calls.map(([reply]) => reply.text);
        expect(texts.slice(-2)).toEqual([
            '📤 Publishing post to Blogger...',
            '✅ Post published successfully!\n\n🔗 URL: https://blog.example.com/inception.html',
        ]);
        expect(service.getSession(USER_ID)).toBeNull();
    });

    it('keeps the session ready after a publisher failure and retries with the same values', async () => {
        publish.mockResolvedValueOnce({ success: false, error: 'HTTP 503: Backend Error', authRequired: false });

        await feed([...FILL_IN, { type: 'confirm' }]);

        const session = service.getSession(USER_ID);
        expect(session?.state).toEqual({ kind: 'readyToPublish' });
        expect(session?.values.title).toBe('Inception');
        expect(lastReply()?.text).toBe(
            '❌ Failed to publish post:\nHTTP 503: Backend Error\n\n' +
            'Your answers are kept. Press Publish to try again or Edit to change something.'
        );

        publish.mockResolvedValueOnce({ success: true, postId: 'p2' });
        await feed([{ type: 'confirm' }]);

        expect(publish).toHaveBeenCalledTimes(2);
        expect(publish.mock.calls[1][0]).toEqual(publish.mock.calls[0][0]);
        expect(lastReply()?.text).toBe('✅ Post published successfully!');
        expect(service.getSession(USER_ID)).toBeNull();
    });

    it('tells the user to authorize when the publisher needs it', async () => {
        publish.mockResolvedValue({ success: false, error: 'Blogger authorization required', authRequired: true });

        await feed([...FILL_IN, { type: 'confirm' }]);

        expect(lastReply()?.text).toContain('Use /auth to connect your Google account');
    });

    it('reports an exception thrown by the publisher as a failed publish', async () => {
        publish.mockRejectedValue(new Error('socket hang up'));

        await feed([...FILL_IN, { type: 'confirm' }]);

        expect(service.getSession(USER_ID)?.state).toEqual({ kind: 'readyToPublish' });
        expect(lastReply()?.text.startsWith('❌ Failed to publish post:\nsocket hang up')).toBe(true);
    });

    it('does not call the publisher when rendering fails', async () => {
        jest.spyOn(template, 'render').mockImplementation(() => {
            throw new TemplateError('MissingValue', 'No value for {{title}}');
        });

        await feed([...FILL_IN, { type: 'confirm' }]);

        expect(publish).not.toHaveBeenCalled();
        expect(service.getSession(USER_ID)?.state).toEqual({ kind: 'readyToPublish' });
        expect(lastReply()?.text.startsWith('❌ Could not build the post HTML:\nNo value for {{title}}')).toBe(true);
    });

    it('processes events for one user in arrival order', async () => {
        await Promise.all([
            service.handle(USER_ID, CHAT_ID, { type: 'post' }, send),
            service.handle(USER_ID, CHAT_ID, { type: 'input', text: 'Inception' }, send),
            service.handle(USER_ID, CHAT_ID, { type: 'input', text: 'Drama' }, send),
        ]);

        expect(service.getSession(USER_ID)?.values).toEqual({ title: 'Inception', labels: ['Drama'] });
    });

    it('stores the new state even when a reply cannot be delivered', async () => {
        send.mockRejectedValueOnce(new Error('telegram down'));

        await feed([{ type: 'post' }]);

        expect(service.getSession(USER_ID)?.state).toEqual({ kind: 'collecting', step: 0 });
    });

    it('drops the session on cancel', async () => {
        await feed([{ type: 'post' }, { type: 'cancel' }]);

        expect(service.getSession(USER_ID)).toBeNull();
        expect(sessions.size).toBe(0);
        expect(lastReply()?.text).toBe('❌ Post creation cancelled.');
    });

    it('describes the status of the current session', async () => {
        expect(service.describeStatus(USER_ID)).toContain('No active post creation in progress.');

        await feed([{ type: 'post' }]);

        expect(service.describeStatus(USER_ID)).toContain('➡️ Title: currently asking');
    });
});
