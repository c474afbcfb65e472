/**
 * GoogleAuthService
 *
 * Owns the OAuth2 client used for Blogger. Tokens come from the token store
 * at startup; refreshed tokens are written back as Google issues them.
 */

import { google, Auth } from 'googleapis';
import { v4 as uuidv4 } from 'uuid';
import { TokenStore } from './FileTokenStore';

export const BLOGGER_SCOPES = ['https://www.googleapis.com/auth/blogger'];

export type AuthStatus = 'authorized' | 'auth_required' | 'not_configured';

export interface GoogleAuthOptions {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
}

export class GoogleAuthService {
    private readonly client: Auth.OAuth2Client | null;
    private readonly tokenStore: TokenStore;
    private pendingState: string | null = null;

    constructor(options: GoogleAuthOptions, tokenStore: TokenStore) {
        this.tokenStore = tokenStore;

        if (!options.clientId || !options.clientSecret) {
            console.warn('[GoogleAuth] Client credentials not configured, publishing is disabled');
            this.client = null;
            return;
        }

        const client = new google.auth.OAuth2(options.clientId, options.clientSecret, options.redirectUri);
        const saved = tokenStore.load();
        if (saved) {
            client.setCredentials(saved);
            console.log('[GoogleAuth] Loaded stored credentials');
        }
        client.on('tokens', (tokens: Auth.Credentials) => this.persistRefreshedTokens(client, tokens));
        this.client = client;
    }

    getStatus(): AuthStatus {
        if (!this.client) {
            return 'not_configured';
        }
        const { refresh_token, access_token, expiry_date } = this.client.credentials;
        if (refresh_token) {
            return 'authorized';
        }
        if (access_token && (!expiry_date || expiry_date > Date.now())) {
            return 'authorized';
        }
        return 'auth_required';
    }

    /**
     * Authenticated client for Google API calls.
     */
    getClient(): Auth.OAuth2Client {
        if (!this.client) {
            throw new Error('Google OAuth client is not configured');
        }
        return this.client;
    }

    /**
     * Consent URL for the Blogger scope. Each call issues a fresh `state`
     * value that the callback must echo back.
     */
    createAuthUrl(): string {
        const client = this.getClient();
        this.pendingState = uuidv4();
        return client.generateAuthUrl({
            access_type: 'offline',
            prompt: 'consent',
            scope: BLOGGER_SCOPES,
            state: this.pendingState,
        });
    }

    /**
     * Exchanges an authorization code for tokens and stores them.
     * @param state - value returned by Google on redirect; omitted when the
     *   user pastes the code by hand
     */
    async completeAuthorization(code: string, state?: string): Promise<void> {
        const client = this.getClient();
        if (state !== undefined && state !== this.pendingState) {
            throw new Error('OAuth state mismatch, please restart authorization with /auth');
        }

        const { tokens } = await client.getToken(code.trim());
        client.setCredentials(tokens);
        this.tokenStore.save(tokens);
        this.pendingState = null;
        console.log('[GoogleAuth] Authorization completed, tokens stored');
    }

    private persistRefreshedTokens(client: Auth.OAuth2Client, tokens: Auth.Credentials): void {
        // Refresh responses usually omit refresh_token; keep the one we have.
        const merged: Auth.Credentials = { ...client.credentials, ...tokens };
        try {
            this.tokenStore.save(merged);
            console.log('[GoogleAuth] Refreshed tokens saved');
        } catch (error) {
            console.error('[GoogleAuth] Failed to save refreshed tokens:', error);
        }
    }
}
