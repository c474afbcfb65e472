/**
 * ConversationService - Feeds chat events through the conversation machine.
 *
 * Looks up (or starts) the user's session, applies the event, stores the
 * result and sends the reply. When an event moves the session to
 * `publishing`, renders the template and calls the publisher before the
 * user's next event is processed.
 */

import { isComplete } from '../domain/entities/ReviewFields';
import { ReviewSession, createReviewSession } from '../domain/entities/ReviewSession';
import { PublishError, TemplateError } from '../domain/errors';
import { IBlogPublisher } from '../domain/ports/IBlogPublisher';
import {
    ConversationEvent,
    ConversationReply,
    TransitionResult,
    describeStatus,
    transition,
} from '../domain/services/ConversationMachine';
import { PostTemplate } from '../domain/services/TemplateEngine';
import { SessionManager } from './SessionManager';

export type ReplySink = (reply: ConversationReply) => Promise<void>;

export interface ConversationServiceOptions {
    sessions: SessionManager;
    template: PostTemplate;
    publisher: IBlogPublisher;
    /** Fixed publishing target */
    blogId: string;
}

export class ConversationService {
    private readonly sessions: SessionManager;
    private readonly template: PostTemplate;
    private readonly publisher: IBlogPublisher;
    private readonly blogId: string;

    constructor(options: ConversationServiceOptions) {
        this.sessions = options.sessions;
        this.template = options.template;
        this.publisher = options.publisher;
        this.blogId = options.blogId;
    }

    /**
     * Handles one event for one user. Resolves once every reply for the
     * event has been sent, including the outcome of a publish.
     */
    async handle(userId: number, chatId: number, event: ConversationEvent, send: ReplySink): Promise<void> {
        await this.sessions.runExclusive(userId, async () => {
            const session = this.sessions.get(userId) ?? createReviewSession(userId, chatId);
            const result = await this.apply(session, event, send);

            if (result.session?.state.kind === 'publishing') {
                const outcome = await this.publish(result.session);
                await this.apply(result.session, outcome, send);
            }
        });
    }

    getSession(userId: number): ReviewSession | null {
        return this.sessions.get(userId);
    }

    describeStatus(userId: number): string {
        return describeStatus(this.sessions.get(userId));
    }

    private async apply(session: ReviewSession, event: ConversationEvent, send: ReplySink): Promise<TransitionResult> {
        const result = transition(session, event);

        if (result.session && result.session.state.kind !== 'idle') {
            this.sessions.save(result.session);
        } else {
            this.sessions.delete(session.userId);
        }

        if (result.reply) {
            try {
                await send(result.reply);
            } catch (error) {
                // State is already stored; a lost reply must not block publishing.
                console.error(`[Conversation] Failed to deliver reply to user ${session.userId}:`, error);
            }
        }
        return result;
    }

    /**
     * Renders and publishes, translating every failure into an event.
     */
    private async publish(session: ReviewSession): Promise<ConversationEvent> {
        const values = session.values;
        try {
            if (!isComplete(values)) {
                throw new TemplateError('MissingValue', 'Some fields are still empty');
            }

            const html = this.template.render(values);
            const result = await this.publisher.publish({
                blogId: this.blogId,
                title: values.title,
                content: html,
                labels: values.labels,
            });
            if (!result.success) {
                throw new PublishError(result.error, result.authRequired);
            }

            console.log(`[Conversation] User ${session.userId} published post ${result.postId}`);
            return { type: 'publishSucceeded', url: result.url };
        } catch (error) {
            if (error instanceof TemplateError) {
                console.error(`[Conversation] Render failed (${error.kind}): ${error.message}`);
                return { type: 'renderFailed', reason: error.message };
            }
            if (error instanceof PublishError) {
                console.error(`[Conversation] Publish failed: ${error.message}`);
                return { type: 'publishFailed', reason: error.message, authRequired: error.authRequired };
            }
            console.error('[Conversation] Unexpected publish error:', error);
            return { type: 'publishFailed', reason: error instanceof Error ? error.message : 'Unknown error' };
        }
    }
}
