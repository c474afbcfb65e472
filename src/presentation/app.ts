import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { ConversationService } from '../application/ConversationService';
import { SessionManager } from '../application/SessionManager';
import { BloggerPublisher } from '../infrastructure/blogger/BloggerPublisher';
import { FileTokenStore } from '../infrastructure/google/FileTokenStore';
import { GoogleAuthService } from '../infrastructure/google/GoogleAuthService';
import { loadPostTemplate } from '../infrastructure/templates/PostTemplateLoader';
import { ChatService } from './services/ChatService';

// Route imports
import { createTelegramWebhookRoutes } from './routes/telegramWebhook';
import { createOAuthRoutes } from './routes/oauthRoutes';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';

export const APP_VERSION = '1.0.0';

export interface AppDependencies {
    conversation: ConversationService;
    googleAuth: GoogleAuthService;
    chat: ChatService;
}

/**
 * Creates and configures the Express application.
 */
export function createApp(config: Config, dependencies: AppDependencies = createDependencies(config)): Application {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json());

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: APP_VERSION,
        });
    });

    // Routes
    app.use(createTelegramWebhookRoutes({
        conversation: dependencies.conversation,
        googleAuth: dependencies.googleAuth,
        chat: dependencies.chat,
        webhookSecret: config.telegramWebhookSecret,
        allowedUserIds: config.telegramAllowedUserIds,
    }));
    app.use(createOAuthRoutes(dependencies.googleAuth));

    // Error handlers (must be last)
    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}

/**
 * Creates all dependencies with proper wiring. Throws when the post
 * template cannot be loaded.
 */
export function createDependencies(config: Config): AppDependencies {
    const template = loadPostTemplate(config.postTemplatePath);

    const googleAuth = new GoogleAuthService(
        {
            clientId: config.googleClientId,
            clientSecret: config.googleClientSecret,
            redirectUri: config.googleRedirectUri,
        },
        new FileTokenStore(config.googleTokenPath)
    );

    const conversation = new ConversationService({
        sessions: new SessionManager(),
        template,
        publisher: new BloggerPublisher(googleAuth),
        blogId: config.bloggerBlogId,
    });

    return {
        conversation,
        googleAuth,
        chat: new ChatService(config.telegramBotToken),
    };
}
