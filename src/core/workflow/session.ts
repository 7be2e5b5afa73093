/**
 * Session persistence: the durable session record and its hand-off document.
 *
 * Sessions are saved to `.reviewloop/sessions/<id>.json` after every
 * change the orchestrator makes, so an interrupted run leaves a record to
 * inspect, roll back, or continue from. Records are archived, never deleted.
 * Completed sessions also get `.reviewloop/handoffs/<id>.json`.
 *
 * Dependency direction: session.ts → utils/fs, engine, findings, core/errors
 * Used by: workflow runner, cli status/rollback/start commands
 */

import { join } from 'node:path';
import { z } from 'zod';
import { CONFIG_DIR_NAME } from '../config/defaults.js';
import { errorMessage } from '../errors.js';
import { fileExists, listJsonFiles, readJsonFile, writeJsonFile } from '../../utils/fs.js';
import { createLogger } from '../../utils/logger.js';
import { Phase, isTerminal, type Session } from './engine.js';

const log = createLogger('sessions');

const SESSIONS_DIR = 'sessions';
const HANDOFFS_DIR = 'handoffs';
const STATUS_TASK_WIDTH = 60;

export type StatusFilter = 'all' | 'active' | 'complete';

/** One line of `reviewloop status`. */
export interface SessionSummary {
    id: string;
    phase: Session['phase'];
    mode: Session['mode'];
    specialist: string;
    iteration: number;
    task: string;
    updatedAt: number;
}

export interface HandoffDocument {
    title: string;
    body: {
        sessionId: string;
        task: string;
        mode: Session['mode'];
        specialist?: string;
        iterations: Session['iterations'];
        verdicts: { reviewer: string; verdict: string; overriddenBy?: string }[];
        validation: { iteration: number; outcome: string; layers: string[] }[];
        technicalDebt: { id: string; raisedBy: string; severity: string; description: string; justification: string }[];
        startCommit: string;
        completedAt: number;
    };
}

/**
 * Generate a session id from the task description.
 */
export function generateSessionId(task: string, now: number = Date.now()): string {
    const slug = task
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '')
        .slice(0, 30);
    return `${slug || 'session'}-${now.toString(36)}`;
}

/** The fields status scanning and rollback rely on. */
const sessionRecordShape = z.object({
    id: z.string().min(1),
    task: z.string(),
    phase: z.nativeEnum(Phase),
    mode: z.enum(['full', 'lightweight']),
    iterations: z.object({ validationRuns: z.number() }).passthrough(),
    startMarker: z.object({ commit: z.string(), branch: z.string() }).passthrough(),
    audit: z.array(z.unknown()),
    findings: z.array(z.unknown()),
    updatedAt: z.number(),
}).passthrough();

/** Narrow a parsed JSON value to a session record. */
export function isSessionRecord(value: unknown): value is Session {
    return sessionRecordShape.safeParse(value).success;
}

export class SessionStore {
    private readonly projectRoot: string;

    constructor(projectRoot: string) {
        this.projectRoot = projectRoot;
    }

    get sessionsDir(): string {
        return join(this.projectRoot, CONFIG_DIR_NAME, SESSIONS_DIR);
    }

    get handoffsDir(): string {
        return join(this.projectRoot, CONFIG_DIR_NAME, HANDOFFS_DIR);
    }

    sessionPath(id: string): string {
        return join(this.sessionsDir, `${id}.json`);
    }

    save(session: Session): void {
        writeJsonFile(this.sessionPath(session.id), session);
        log.debug(`Session saved: ${session.id} (${session.phase})`);
    }

    /**
     * Load a session by id. Returns null when no record exists or it is malformed.
     * @throws {ConfigError} when the record is not valid JSON
     */
    load(id: string): Session | null {
        const path = this.sessionPath(id);
        if (!fileExists(path)) return null;

        const raw = readJsonFile(path);
        if (!isSessionRecord(raw)) {
            log.warn(`Session record ${id} is malformed`);
            return null;
        }
        return raw;
    }

    /**
     * Every readable session, most recently updated first.
     * Unreadable records are reported and left out.
     */
    list(filter: StatusFilter = 'all'): Session[] {
        const sessions: Session[] = [];

        for (const file of listJsonFiles(this.sessionsDir)) {
            try {
                const raw = readJsonFile(file);
                if (isSessionRecord(raw)) {
                    sessions.push(raw);
                } else {
                    log.warn(`Skipping malformed session record ${file}`);
                }
            } catch (err) {
                log.warn(`Skipping unreadable session record ${file}: ${errorMessage(err)}`);
            }
        }

        return filterSessions(sessions, filter).sort((a, b) => b.updatedAt - a.updatedAt);
    }

    /**
     * Write the completion hand-off document. Returns its path.
     */
    writeHandoff(session: Session): string {
        const path = join(this.handoffsDir, `${session.id}.json`);
        writeJsonFile(path, buildHandoff(session));
        log.info(`Hand-off written: ${path}`);
        return path;
    }
}

export function filterSessions(sessions: readonly Session[], filter: StatusFilter): Session[] {
    switch (filter) {
        case 'active':
            return sessions.filter((s) => !isTerminal(s));
        case 'complete':
            return sessions.filter((s) => s.phase === Phase.Complete);
        default:
            return [...sessions];
    }
}

export function summarize(session: Session): SessionSummary {
    const task = session.task.length > STATUS_TASK_WIDTH
        ? `${session.task.slice(0, STATUS_TASK_WIDTH - 3)}...`
        : session.task;

    return {
        id: session.id,
        phase: session.phase,
        mode: session.mode,
        specialist: session.specialist ?? 'unknown',
        iteration: session.iterations.validationRuns,
        task,
        updatedAt: session.updatedAt,
    };
}

/**
 * Build the hand-off document for a completed session.
 */
export function buildHandoff(session: Session): HandoffDocument {
    const body: HandoffDocument['body'] = {
        sessionId: session.id,
        task: session.task,
        mode: session.mode,
        iterations: { ...session.iterations },
        verdicts: Object.values(session.verdicts).map((record) =>
            record.overriddenBy
                ? { reviewer: record.reviewer, verdict: record.verdict, overriddenBy: record.overriddenBy }
                : { reviewer: record.reviewer, verdict: record.verdict },
        ),
        validation: session.validationRuns.map((run) => ({
            iteration: run.iteration,
            outcome: run.outcome,
            layers: run.layers.map((layer) => `${layer.name}: ${layer.outcome}`),
        })),
        technicalDebt: session.findings
            .filter((f) => f.status === 'deferred_accepted')
            .map((f) => ({
                id: f.id,
                raisedBy: f.raisedBy,
                severity: f.severity,
                description: f.description,
                justification: f.justification ?? '',
            })),
        startCommit: session.startMarker.commit,
        completedAt: session.updatedAt,
    };
    if (session.specialist) body.specialist = session.specialist;

    return { title: `Completed: ${session.task}`, body };
}
