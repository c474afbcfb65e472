import fs from 'fs';
import path from 'path';
import { Auth } from 'googleapis';

/**
 * Where OAuth tokens live between restarts.
 */
export interface TokenStore {
    load(): Auth.Credentials | null;
    save(tokens: Auth.Credentials): void;
}

function isCredentials(value: unknown): value is Auth.Credentials {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return false;
    }
    return Object.values(value).every(
        (field) => field === null || typeof field === 'string' || typeof field === 'number'
    );
}

/**
 * Token store backed by a JSON file.
 */
export class FileTokenStore implements TokenStore {
    private readonly tokenPath: string;

    constructor(tokenPath: string) {
        this.tokenPath = path.resolve(process.cwd(), tokenPath);
    }

    load(): Auth.Credentials | null {
        try {
            if (!fs.existsSync(this.tokenPath)) {
                return null;
            }
            const parsed: unknown = JSON.parse(fs.readFileSync(this.tokenPath, 'utf-8'));
            if (!isCredentials(parsed)) {
                console.warn(`[GoogleAuth] Ignoring malformed token file ${this.tokenPath}`);
                return null;
            }
            return parsed;
        } catch (error) {
            console.error('[GoogleAuth] Failed to read token file:', error);
            return null;
        }
    }

    save(tokens: Auth.Credentials): void {
        const dir = path.dirname(this.tokenPath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
        fs.writeFileSync(this.tokenPath, JSON.stringify(tokens, null, 2), { mode: 0o600 });
    }
}
