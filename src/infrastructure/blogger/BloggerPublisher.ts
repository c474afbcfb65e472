/**
 * BloggerPublisher
 *
 * Publishes posts through the Blogger API v3 (`posts.insert`).
 */

import { google } from 'googleapis';
import { BlogPostRequest, BlogPostResult, IBlogPublisher } from '../../domain/ports/IBlogPublisher';
import { GoogleAuthService } from '../google/GoogleAuthService';

function readStatus(response: unknown): number | undefined {
    if (typeof response === 'object' && response !== null && 'status' in response) {
        return typeof response.status === 'number' ? response.status : undefined;
    }
    return undefined;
}

/**
 * HTTP status and message from a googleapis error, if it carries one.
 */
export function describeGoogleError(error: unknown): { message: string; status?: number } {
    if (!(error instanceof Error)) {
        return { message: 'Unknown error' };
    }
    const status = 'response' in error ? readStatus(error.response) : undefined;
    return status ? { message: `HTTP ${status}: ${error.message}`, status } : { message: error.message };
}

function isAuthFailure(status: number | undefined, message: string): boolean {
    return status === 401 || /invalid_grant|no refresh token|invalid_token/i.test(message);
}

export class BloggerPublisher implements IBlogPublisher {
    private readonly auth: GoogleAuthService;

    constructor(auth: GoogleAuthService) {
        this.auth = auth;
    }

    async publish(request: BlogPostRequest): Promise<BlogPostResult> {
        const status = this.auth.getStatus();
        if (status !== 'authorized') {
            const error = status === 'not_configured'
                ? 'Google OAuth client is not configured'
                : 'Blogger authorization required';
            return { success: false, error, authRequired: true };
        }

        try {
            console.log(`[Blogger] Publishing "${request.title}" to blog ${request.blogId}`);

            const blogger = google.blogger({ version: 'v3', auth: this.auth.getClient() });
            const response = await blogger.posts.insert({
                blogId: request.blogId,
                requestBody: {
                    title: request.title,
                    content: request.content,
                    labels: request.labels.length > 0 ? request.labels : undefined,
                },
            });

            const post = response.data;
            console.log(`[Blogger] Post created: ${post.url ?? post.id ?? 'unknown'}`);

            return {
                success: true,
                postId: post.id ?? '',
                url: post.url ?? undefined,
            };
        } catch (error) {
            const { message, status: httpStatus } = describeGoogleError(error);
            console.error(`[Blogger] Failed to publish: ${message}`);
            return {
                success: false,
                error: message,
                authRequired: isAuthFailure(httpStatus, message),
            };
        }
    }
}
