/**
 * ReviewSession Entity
 *
 * Per-user record of conversation progress and the values collected so far.
 * Memory-resident only; a restart drops every session.
 */

import { FieldName, ReviewValues } from './ReviewFields';

export type ConversationState =
    | { kind: 'idle' }
    | { kind: 'collecting'; step: number }
    | { kind: 'editing'; field: FieldName }
    | { kind: 'readyToPublish' }
    | { kind: 'publishing' };

export interface ReviewSession {
    /** Telegram user id */
    userId: number;
    /** Chat the conversation is happening in */
    chatId: number;
    values: Partial<ReviewValues>;
    state: ConversationState;
    createdAt: Date;
    updatedAt: Date;
}

export function createReviewSession(userId: number, chatId: number): ReviewSession {
    const now = new Date();
    return {
        userId,
        chatId,
        values: {},
        state: { kind: 'idle' },
        createdAt: now,
        updatedAt: now,
    };
}

/**
 * Returns a copy of the session with the given changes applied.
 */
export function updateSession(
    session: ReviewSession,
    changes: Partial<Pick<ReviewSession, 'values' | 'state'>>
): ReviewSession {
    return {
        ...session,
        ...changes,
        updatedAt: new Date(),
    };
}
