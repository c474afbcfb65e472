import { ReviewSession } from '../domain/entities/ReviewSession';

const noop = (): void => undefined;

/**
 * Owns every live session, keyed by Telegram user id.
 *
 * Sessions are memory-resident: a restart drops them all. Work for one user
 * runs strictly in arrival order through `runExclusive`; different users
 * never wait on each other.
 */
export class SessionManager {
    private sessions: Map<number, ReviewSession> = new Map();
    private locks: Map<number, Promise<void>> = new Map();

    get(userId: number): ReviewSession | null {
        return this.sessions.get(userId) || null;
    }

    save(session: ReviewSession): void {
        this.sessions.set(session.userId, session);
    }

    delete(userId: number): boolean {
        return this.sessions.delete(userId);
    }

    get size(): number {
        return this.sessions.size;
    }

    /**
     * Runs `task` after every earlier task for the same user has settled.
     * A failing task rejects only its own caller; the queue keeps going.
     */
    async runExclusive<T>(userId: number, task: () => Promise<T>): Promise<T> {
        const previous = this.locks.get(userId) ?? Promise.resolve();
        const current = previous.then(task);
        const settled = current.then(noop, noop);
        this.locks.set(userId, settled);

        try {
            return await current;
        } finally {
            if (this.locks.get(userId) === settled) {
                this.locks.delete(userId);
            }
        }
    }
}
