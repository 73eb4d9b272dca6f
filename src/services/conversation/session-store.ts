import { config } from '../../config';
import { cloneConversationState, ConversationState, createConversationState } from '../../models/conversation-state';
import { logger } from '../logging';

export interface TurnOutcome<T> {
    state: ConversationState;
    result: T;
}

export type Turn<T> = (current: ConversationState) => Promise<TurnOutcome<T>>;

/**
 * In-memory conversation sessions keyed by an opaque session id.
 *
 * Turns for the same key run one after another; different keys never wait
 * on each other. A turn receives a copy of the stored state and its returned
 * state replaces the stored one only if the turn resolves and the session was
 * not deleted or cleared meanwhile. Idle sessions are dropped after `ttlMs`.
 */
export class SessionStore {
    private sessions = new Map<string, ConversationState>();
    private locks = new Map<string, Promise<void>>();
    private timers = new Map<string, NodeJS.Timeout>();
    // Bumped by delete/clear while a turn is queued or running for the key.
    private generations = new Map<string, number>();
    private epoch = 0;

    constructor(private readonly ttlMs: number = config.session.ttlMinutes * 60_000) {}

    get size(): number {
        return this.sessions.size;
    }

    has(key: string): boolean {
        return this.sessions.has(key);
    }

    /** Snapshot of the stored state, or undefined for an unknown key. */
    get(key: string): ConversationState | undefined {
        const state = this.sessions.get(key);
        return state ? cloneConversationState(state) : undefined;
    }

    withSession<T>(key: string, turn: Turn<T>): Promise<T> {
        const previous = this.locks.get(key) ?? Promise.resolve();
        const run = previous.then(() => this.execute(key, turn));

        const tail: Promise<void> = run
            .then(() => undefined, () => undefined)
            .then(() => {
                if (this.locks.get(key) === tail) {
                    this.locks.delete(key);
                    this.generations.delete(key);
                }
            });
        this.locks.set(key, tail);

        return run;
    }

    delete(key: string): boolean {
        if (this.locks.has(key)) {
            this.generations.set(key, (this.generations.get(key) ?? 0) + 1);
        }
        this.clearTimer(key);
        return this.sessions.delete(key);
    }

    clear(): number {
        const count = this.sessions.size;
        for (const key of [...this.timers.keys()]) this.clearTimer(key);
        this.sessions.clear();
        this.generations.clear();
        this.epoch += 1;
        return count;
    }

    private async execute<T>(key: string, turn: Turn<T>): Promise<T> {
        const stored = this.sessions.get(key);
        if (!stored) {
            logger.info('Creating conversation session', { sessionId: key });
        }

        const generation = this.generationOf(key);
        const working = stored ? cloneConversationState(stored) : createConversationState();
        const outcome = await turn(working);

        if (this.generationOf(key) !== generation) {
            logger.debug('Dropping turn for a session deleted mid-turn', { sessionId: key });
            return outcome.result;
        }

        this.sessions.set(key, outcome.state);
        this.touch(key);
        return outcome.result;
    }

    private generationOf(key: string): string {
        return `${this.epoch}:${this.generations.get(key) ?? 0}`;
    }

    private touch(key: string) {
        this.clearTimer(key);
        const timer = setTimeout(() => {
            this.sessions.delete(key);
            this.timers.delete(key);
            logger.debug('Evicted idle session', { sessionId: key });
        }, this.ttlMs);
        timer.unref();
        this.timers.set(key, timer);
    }

    private clearTimer(key: string) {
        const timer = this.timers.get(key);
        if (timer) clearTimeout(timer);
        this.timers.delete(key);
    }
}
