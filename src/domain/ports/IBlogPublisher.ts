/**
 * IBlogPublisher Port
 *
 * Boundary to the service that publishes a finished HTML document to the
 * configured blog. One call per post; no retries.
 */

export interface BlogPostRequest {
    /** Target blog, supplied by configuration */
    blogId: string;
    title: string;
    /** Finished HTML body */
    content: string;
    labels: string[];
}

export type BlogPostResult =
    | { success: true; postId: string; url?: string }
    | { success: false; error: string; authRequired: boolean };

export interface IBlogPublisher {
    /**
     * Publishes one post.
     * Failures are returned, not thrown.
     */
    publish(request: BlogPostRequest): Promise<BlogPostResult>;
}
