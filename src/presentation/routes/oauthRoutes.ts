import { Router, Request, Response } from 'express';
import { GoogleAuthService } from '../../infrastructure/google/GoogleAuthService';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
};

/**
 * Escapes text for the callback result page, which echoes Google's query values.
 */
function escapeHtml(value: string): string {
    return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function resultPage(title: string, body: string): string {
    return `<!DOCTYPE html>
<html>
<head><meta charset="utf-8"><title>${escapeHtml(title)}</title></head>
<body style="font-family: sans-serif; text-align: center; padding: 48px;">
<h1>${escapeHtml(title)}</h1>
<p>${escapeHtml(body)}</p>
</body>
</html>`;
}

function queryString(value: unknown): string | undefined {
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Creates the Google OAuth redirect route.
 */
export function createOAuthRoutes(googleAuth: GoogleAuthService): Router {
    const router = Router();

    /**
     * GET /oauth/callback
     *
     * Google redirects here after the user grants (or refuses) Blogger access.
     */
    router.get(
        '/oauth/callback',
        asyncHandler(async (req: Request, res: Response) => {
            const denied = queryString(req.query.error);
            if (denied) {
                console.warn(`[OAuth] Authorization denied: ${denied}`);
                res.status(400).type('html').send(
                    resultPage('Authorization failed', `Google returned: ${denied}. Send /auth to the bot to try again.`)
                );
                return;
            }

            const code = queryString(req.query.code);
            if (!code) {
                throw new BadRequestError('Missing authorization code');
            }

            try {
                await googleAuth.completeAuthorization(code, queryString(req.query.state));
            } catch (error) {
                const reason = error instanceof Error ? error.message : 'Unknown error';
                console.error(`[OAuth] Code exchange failed: ${reason}`);
                res.status(400).type('html').send(resultPage('Authorization failed', reason));
                return;
            }

            res.type('html').send(
                resultPage('Authorization successful', 'Blogger access is set up. You can close this window and return to Telegram.')
            );
        })
    );

    return router;
}
