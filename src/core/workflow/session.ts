/**
 * Chat session: the conversation so far plus per-session preferences.
 *
 * Saved to `.studymate/sessions/` so a chat can be resumed later.
 *
 * Dependency direction: session.ts → utils/fs, config/defaults, zod
 * Used by: orchestrator, question queue, chat command
 */

import { join } from 'node:path';
import { readdirSync } from 'node:fs';
import { z } from 'zod';
import { ALL_BRANCHES, type Branch } from '../../agents/types.js';
import { CONFIG_DIR_NAME } from '../config/defaults.js';
import { ensureDir, fileExists, readJsonFile, writeJsonFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../errors.js';

const SESSIONS_DIR = 'sessions';

const branchSchema = z.custom<Branch>(
    (value) => typeof value === 'string' && ALL_BRANCHES.some((b) => b === value),
    'Unknown tool',
);

export const sessionMessageSchema = z.object({
    role: z.enum(['user', 'assistant']),
    content: z.string(),
    toolUsed: branchSchema.optional(),
    timestamp: z.string(),
});

export const sessionDataSchema = z.object({
    id: z.string().min(1),
    createdAt: z.string(),
    updatedAt: z.string(),
    examDate: z.string().optional(),
    messages: z.array(sessionMessageSchema),
});

export type SessionMessage = z.infer<typeof sessionMessageSchema>;
export type SessionData = z.infer<typeof sessionDataSchema>;

function generateSessionId(now: Date): string {
    const random = Math.random().toString(36).slice(2, 6);
    return `session-${now.getTime().toString(36)}-${random}`;
}

export class StudySession {
    readonly id: string;
    readonly createdAt: string;
    /** Preferred exam date (`YYYY-MM-DD`) for study plans in this session. */
    examDate?: string;
    private updatedAt: string;
    private readonly entries: SessionMessage[];
    private readonly clock: () => Date;

    constructor(options: { id?: string; examDate?: string; createdAt?: string; clock?: () => Date } = {}) {
        this.clock = options.clock ?? (() => new Date());
        const now = this.clock();
        this.id = options.id ?? generateSessionId(now);
        this.createdAt = options.createdAt ?? now.toISOString();
        this.updatedAt = this.createdAt;
        this.examDate = options.examDate;
        this.entries = [];
    }

    get messages(): readonly SessionMessage[] {
        return this.entries;
    }

    append(role: SessionMessage['role'], content: string, toolUsed?: Branch): void {
        const timestamp = this.clock().toISOString();
        this.entries.push({ role, content, timestamp, ...(toolUsed ? { toolUsed } : {}) });
        this.updatedAt = timestamp;
    }

    /** Add a question and its answer together. */
    recordExchange(question: string, answer: string, toolUsed: Branch): void {
        this.append('user', question);
        this.append('assistant', answer, toolUsed);
    }

    clear(): void {
        this.entries.length = 0;
        this.updatedAt = this.clock().toISOString();
    }

    toJSON(): SessionData {
        return {
            id: this.id,
            createdAt: this.createdAt,
            updatedAt: this.updatedAt,
            ...(this.examDate !== undefined ? { examDate: this.examDate } : {}),
            messages: this.entries.map((m) => ({ ...m })),
        };
    }

    static fromJSON(data: SessionData, clock?: () => Date): StudySession {
        const session = new StudySession({ id: data.id, examDate: data.examDate, createdAt: data.createdAt, clock });
        session.entries.push(...data.messages.map((m) => ({ ...m })));
        session.updatedAt = data.updatedAt;
        return session;
    }
}

function getSessionsDir(projectRoot: string): string {
    return join(projectRoot, CONFIG_DIR_NAME, SESSIONS_DIR);
}

/**
 * Save a session to disk.
 *
 * @returns the session file path
 */
export function saveSession(projectRoot: string, session: StudySession): string {
    const sessionsDir = getSessionsDir(projectRoot);
    ensureDir(sessionsDir);

    const sessionPath = join(sessionsDir, `${session.id}.json`);
    writeJsonFile(sessionPath, session.toJSON());
    logger.debug(`Session saved: ${session.id}`);

    return sessionPath;
}

function readSessionFile(path: string): SessionData | null {
    try {
        const parsed = sessionDataSchema.safeParse(readJsonFile(path));
        if (parsed.success) return parsed.data;
        logger.debug(`Invalid session file ${path}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    } catch (err) {
        logger.debug(`Unreadable session file ${path}: ${errorMessage(err)}`);
    }
    return null;
}

/**
 * Load a saved session, or null when it is missing or invalid.
 */
export function loadSession(projectRoot: string, sessionId: string, clock?: () => Date): StudySession | null {
    const sessionPath = join(getSessionsDir(projectRoot), `${sessionId}.json`);
    if (!fileExists(sessionPath)) return null;

    const data = readSessionFile(sessionPath);
    if (!data) {
        logger.warn(`Failed to load session: ${sessionId}`);
        return null;
    }
    return StudySession.fromJSON(data, clock);
}

/**
 * List all saved sessions, most recently updated first. Invalid files are skipped.
 */
export function listSessions(projectRoot: string): SessionData[] {
    const sessionsDir = getSessionsDir(projectRoot);
    if (!fileExists(sessionsDir)) return [];

    return readdirSync(sessionsDir)
        .filter((f) => f.endsWith('.json'))
        .map((f) => readSessionFile(join(sessionsDir, f)))
        .filter((data): data is SessionData => data !== null)
        .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
}
