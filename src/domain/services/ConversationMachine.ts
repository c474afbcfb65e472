/**
 * ConversationMachine
 *
 * Pure transition function for the post-authoring conversation. Every
 * incoming message or button press becomes an event; the machine returns the
 * next session (null when the session is discarded) and an optional reply.
 *
 *   idle --post--> collecting(0) --valid--> collecting(i+1) ... --> readyToPublish
 *   readyToPublish --edit(f)--> editing(f) --valid--> readyToPublish
 *   readyToPublish --confirm--> publishing --ok--> (discarded)
 *                                          --fail--> readyToPublish
 *   any --cancel--> (discarded)
 */

import {
    FIELD_ORDER,
    FieldName,
    FieldSpec,
    REVIEW_FIELDS,
    ReviewValues,
    applyInput,
    findField,
    formatFieldValue,
    isFieldName,
} from '../entities/ReviewFields';
import { ReviewSession, updateSession } from '../entities/ReviewSession';

export type ConversationEvent =
    | { type: 'post' }
    | { type: 'input'; text: string }
    | { type: 'cancel' }
    | { type: 'edit'; field?: string }
    | { type: 'confirm' }
    | { type: 'publishSucceeded'; url?: string }
    | { type: 'publishFailed'; reason: string; authRequired?: boolean }
    | { type: 'renderFailed'; reason: string };

export type ReplyAction = 'post_confirm' | 'post_cancel' | 'post_edit' | `edit_${FieldName}`;

export interface ReplyButton {
    text: string;
    action: ReplyAction;
}

export interface ConversationReply {
    text: string;
    /** Rows of inline buttons */
    buttons?: ReplyButton[][];
}

export interface TransitionResult {
    session: ReviewSession | null;
    reply: ConversationReply | null;
}

export const REVIEW_PREVIEW_LENGTH = 100;

const FIELD_ICONS: Record<FieldName, string> = {
    title: '🎬',
    labels: '🏷️',
    poster: '🖼️',
    rating: '⭐',
    review: '📝',
    scenes: '🎞️',
    youtube: '📺',
    source: '📂',
};

const SUMMARY_BUTTONS: ReplyButton[][] = [
    [{ text: '✏️ Edit', action: 'post_edit' }],
    [{ text: '❌ Cancel', action: 'post_cancel' }],
    [{ text: '✅ Publish', action: 'post_confirm' }],
];

const MESSAGES = {
    noSession: 'Please use /post to start creating a new movie post.',
    cancelled: '❌ Post creation cancelled.',
    nothingToCancel: 'No active post creation to cancel.',
    nothingToEdit: 'No active post to edit. Use /post to start creating a post.',
    expired: 'Session expired. Please use /post to start again.',
    publishing: '📤 Publishing post to Blogger...',
    busy: '⏳ Still publishing your post, please wait.',
    pickField: 'Which field would you like to edit?',
};

function stepPrompt(step: number): string {
    const field = REVIEW_FIELDS[step];
    return `📝 Step ${step + 1}/${REVIEW_FIELDS.length}: ${field.prompt}`;
}

function truncate(text: string, max: number): string {
    return text.length > max ? `${text.substring(0, max)}...` : text;
}

/**
 * Summary of the collected values with the publish/edit/cancel buttons.
 */
export function summarize(values: Partial<ReviewValues>): ConversationReply {
    const lines = REVIEW_FIELDS.map((field) => {
        const value = formatFieldValue(values, field.name);
        const shown = field.name === 'review' ? truncate(value, REVIEW_PREVIEW_LENGTH) : value;
        return `${FIELD_ICONS[field.name]} *${field.label}:* ${shown}`;
    });
    return {
        text: `📋 *Post Summary:*\n\n${lines.join('\n')}\n\nWhat would you like to do?`,
        buttons: SUMMARY_BUTTONS,
    };
}

function fieldPicker(prefix?: string): ConversationReply {
    return {
        text: prefix ? `${prefix}\n\n${MESSAGES.pickField}` : MESSAGES.pickField,
        buttons: REVIEW_FIELDS.map((field): ReplyButton[] => [{ text: field.label, action: `edit_${field.name}` }]),
    };
}

function editPrompt(session: ReviewSession, field: FieldSpec): string {
    return `Current value: ${formatFieldValue(session.values, field.name)}\n\n${field.prompt}`;
}

/**
 * Read-only progress report for /status.
 */
export function describeStatus(session: ReviewSession | null): string {
    if (!session || session.state.kind === 'idle') {
        return '📝 No active post creation in progress.\nUse /post to start creating a new movie post.';
    }

    const state = session.state;
    const current = state.kind === 'collecting' ? state.step : REVIEW_FIELDS.length;
    const lines = REVIEW_FIELDS.map((field, i) => {
        if (i < current) {
            const value = formatFieldValue(session.values, field.name);
            const shown = field.name === 'review' ? truncate(value, 50) : value;
            return `✅ ${field.label}: ${shown}`;
        }
        if (i === current) {
            return `➡️ ${field.label}: currently asking`;
        }
        return `⏳ ${field.label}: pending`;
    });

    let footer = `Progress: ${current}/${REVIEW_FIELDS.length} fields completed`;
    if (state.kind === 'editing') {
        footer += `\nEditing: ${findField(state.field)?.label ?? state.field}`;
    } else if (state.kind === 'readyToPublish') {
        footer += '\nReady to publish.';
    } else if (state.kind === 'publishing') {
        footer += '\nPublishing...';
    }

    return `📊 *Current Post Status:*\n\n${lines.join('\n')}\n\n${footer}`;
}

function handleInput(session: ReviewSession, text: string): TransitionResult {
    const state = session.state;
    switch (state.kind) {
        case 'idle':
            return { session: null, reply: { text: MESSAGES.noSession } };

        case 'collecting': {
            const field = REVIEW_FIELDS[state.step];
            const result = applyInput(session.values, field, text);
            if (!result.ok) {
                return { session, reply: { text: `❌ ${result.error.message}\n\n${stepPrompt(state.step)}` } };
            }
            const nextStep = state.step + 1;
            if (nextStep >= REVIEW_FIELDS.length) {
                return {
                    session: updateSession(session, { values: result.value, state: { kind: 'readyToPublish' } }),
                    reply: summarize(result.value),
                };
            }
            return {
                session: updateSession(session, { values: result.value, state: { kind: 'collecting', step: nextStep } }),
                reply: { text: stepPrompt(nextStep) },
            };
        }

        case 'editing': {
            const field = REVIEW_FIELDS[FIELD_ORDER.indexOf(state.field)];
            const result = applyInput(session.values, field, text);
            if (!result.ok) {
                return { session, reply: { text: `❌ ${result.error.message}\n\n${field.prompt}` } };
            }
            const summary = summarize(result.value);
            return {
                session: updateSession(session, { values: result.value, state: { kind: 'readyToPublish' } }),
                reply: { ...summary, text: `✅ ${field.label} updated successfully!\n\n${summary.text}` },
            };
        }

        case 'readyToPublish':
            return { session, reply: summarize(session.values) };

        case 'publishing':
            return { session, reply: { text: MESSAGES.busy } };
    }
}

function handleEdit(session: ReviewSession, requested: string | undefined): TransitionResult {
    const state = session.state;
    switch (state.kind) {
        case 'idle':
            return { session: null, reply: { text: MESSAGES.nothingToEdit } };
        case 'collecting':
            return {
                session,
                reply: {
                    text: `✋ Please finish the remaining fields first. You can edit any field from the summary.\n\n${stepPrompt(state.step)}`,
                },
            };
        case 'publishing':
            return { session, reply: { text: MESSAGES.busy } };
        case 'readyToPublish':
        case 'editing': {
            if (!requested || !requested.trim()) {
                return { session, reply: fieldPicker() };
            }
            const field = findField(requested);
            if (!field) {
                return { session, reply: fieldPicker(`❓ Unknown field "${requested.trim()}".`) };
            }
            return {
                session: updateSession(session, { state: { kind: 'editing', field: field.name } }),
                reply: { text: editPrompt(session, field) },
            };
        }
    }
}

function handleConfirm(session: ReviewSession): TransitionResult {
    const state = session.state;
    switch (state.kind) {
        case 'idle':
            return { session: null, reply: { text: MESSAGES.expired } };
        case 'collecting':
            return { session, reply: { text: `Not every field is filled in yet.\n\n${stepPrompt(state.step)}` } };
        case 'editing': {
            const field = findField(state.field);
            return { session, reply: { text: `Finish editing first.\n\n${field?.prompt ?? ''}`.trim() } };
        }
        case 'publishing':
            return { session, reply: { text: MESSAGES.busy } };
        case 'readyToPublish':
            return {
                session: updateSession(session, { state: { kind: 'publishing' } }),
                reply: { text: MESSAGES.publishing },
            };
    }
}

function backToReady(session: ReviewSession, text: string): TransitionResult {
    return {
        session: updateSession(session, { state: { kind: 'readyToPublish' } }),
        reply: { text, buttons: SUMMARY_BUTTONS },
    };
}

/**
 * Applies one event to a session. An idle session stands in for a user
 * with no session yet.
 */
export function transition(session: ReviewSession, event: ConversationEvent): TransitionResult {
    switch (event.type) {
        case 'post':
            return {
                session: updateSession(session, { values: {}, state: { kind: 'collecting', step: 0 } }),
                reply: { text: stepPrompt(0) },
            };

        case 'cancel':
            return {
                session: null,
                reply: { text: session.state.kind === 'idle' ? MESSAGES.nothingToCancel : MESSAGES.cancelled },
            };

        case 'input':
            return handleInput(session, event.text);

        case 'edit':
            return handleEdit(session, event.field);

        case 'confirm':
            return handleConfirm(session);

        case 'publishSucceeded':
            if (session.state.kind !== 'publishing') {
                return { session, reply: null };
            }
            return {
                session: null,
                reply: { text: `✅ Post published successfully!${event.url ? `\n\n🔗 URL: ${event.url}` : ''}` },
            };

        case 'publishFailed': {
            if (session.state.kind !== 'publishing') {
                return { session, reply: null };
            }
            const hint = event.authRequired
                ? '🔐 Blogger authorization is required. Use /auth to connect your Google account, then press Publish again.'
                : 'Your answers are kept. Press Publish to try again or Edit to change something.';
            return backToReady(session, `❌ Failed to publish post:\n${event.reason}\n\n${hint}`);
        }

        case 'renderFailed':
            if (session.state.kind !== 'publishing') {
                return { session, reply: null };
            }
            return backToReady(
                session,
                `❌ Could not build the post HTML:\n${event.reason}\n\nYour answers are kept. Fix the template and press Publish again.`
            );
    }
}

/**
 * Maps inline button data back to an event.
 */
export function eventFromAction(action: string): ConversationEvent | null {
    switch (action) {
        case 'post_confirm':
            return { type: 'confirm' };
        case 'post_cancel':
            return { type: 'cancel' };
        case 'post_edit':
            return { type: 'edit' };
    }
    if (action.startsWith('edit_')) {
        const field = action.substring('edit_'.length);
        return isFieldName(field) ? { type: 'edit', field } : null;
    }
    return null;
}
