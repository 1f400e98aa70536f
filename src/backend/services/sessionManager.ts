/**
 * Session Manager Service
 *
 * Keeps the live conversation sessions of one server instance, keyed by id.
 * Each session owns its own vector index and history; the manager only
 * creates, looks up and drops them. Nothing is persisted: indexes are
 * rebuilt per uploaded document, so sessions end with the process.
 *
 * The number of live sessions is capped; creating one past the cap drops
 * the session that was used least recently.
 *
 * Design Pattern: Repository Pattern
 * - Encapsulates session lookup behind a small API
 * - The server never holds sessions in module-level state
 */

import {
    ChunkingStrategy,
    LanguageModelCapability,
    SessionSummary,
    UploadedDocument,
} from '../../shared/types';
import { ConfigurationError } from '../errors';
import {
    ConversationSession,
    DEFAULT_SESSION_CONFIG,
    SessionConfig,
    SessionDependencies,
} from './conversationSession';

export interface SessionManagerConfig {
    /** Defaults for every session created by this manager */
    session: SessionConfig;
    /** Live sessions kept before the least recently used is dropped */
    maxSessions: number;
}

export const DEFAULT_MAX_SESSIONS = 100;

export class SessionManager {
    private readonly sessions = new Map<string, ConversationSession>();
    private readonly dependencies: SessionDependencies;
    private readonly config: SessionManagerConfig;

    constructor(
        dependencies: SessionDependencies | LanguageModelCapability,
        config: Partial<SessionManagerConfig> = {}
    ) {
        this.dependencies =
            'capability' in dependencies ? dependencies : { capability: dependencies };
        this.config = {
            session: config.session ?? DEFAULT_SESSION_CONFIG,
            maxSessions: config.maxSessions ?? DEFAULT_MAX_SESSIONS,
        };

        if (!Number.isInteger(this.config.maxSessions) || this.config.maxSessions < 1) {
            throw new ConfigurationError(
                `maxSessions must be a positive integer, got ${this.config.maxSessions}`
            );
        }
    }

    /**
     * Creates a session and indexes its document. A document that fails to
     * extract or index leaves no session behind.
     */
    async createSession(
        document: UploadedDocument,
        strategy: ChunkingStrategy = { mode: 'automatic' },
        overrides: Partial<SessionConfig> = {}
    ): Promise<ConversationSession> {
        const session = new ConversationSession(this.dependencies, {
            ...this.config.session,
            ...overrides,
        });
        await session.loadDocument(document, strategy);

        this.sessions.set(session.id, session);
        this.evictOverflow();
        return session;
    }

    /**
     * Looks up a session and marks it as recently used.
     */
    getSession(id: string): ConversationSession | null {
        const session = this.sessions.get(id);
        if (!session) {
            return null;
        }
        // Map keeps insertion order: re-inserting moves the session to the end
        this.sessions.delete(id);
        this.sessions.set(id, session);
        return session;
    }

    /**
     * Summaries of all sessions, most recently created first.
     */
    listSessions(): SessionSummary[] {
        return [...this.sessions.values()]
            .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
            .map((session) => session.summary());
    }

    /**
     * @returns true if deleted, false if the session didn't exist
     */
    deleteSession(id: string): boolean {
        return this.sessions.delete(id);
    }

    get size(): number {
        return this.sessions.size;
    }

    private evictOverflow(): void {
        for (const id of this.sessions.keys()) {
            if (this.sessions.size <= this.config.maxSessions) {
                return;
            }
            this.sessions.delete(id);
            console.log(`Session limit reached, dropped least recently used session ${id}`);
        }
    }
}

export function createSessionManager(
    dependencies: SessionDependencies | LanguageModelCapability,
    config?: Partial<SessionManagerConfig>
): SessionManager {
    return new SessionManager(dependencies, config);
}
