/**
 * Rollback: return the repository to a session's start marker.
 *
 *   inspect  diff of the working tree against the start snapshot (no changes)
 *   soft     move back to the start commit, keep the work unstaged
 *   hard     restore the tree to the start snapshot, discarding the session's work
 *
 * Dependency direction: rollback.ts → git/client (port), engine, core/errors
 * Used by: cli rollback command
 */

import { WorkflowError } from '../errors.js';
import type { RepositoryPort } from '../../git/client.js';
import { createLogger } from '../../utils/logger.js';
import type { Session } from './engine.js';

const log = createLogger('rollback');

export type RollbackAction = 'inspect' | 'soft' | 'hard';

export interface RollbackResult {
    action: RollbackAction;
    sessionId: string;
    commit: string;
    /** Tree state the hard revert restores. */
    snapshot: string;
    /** Files that differed from the marker before the action. */
    files: string[];
    /** Set for `inspect`. */
    diff?: string;
}

/**
 * Apply a rollback action for a session.
 * @throws {WorkflowError} when the session has no usable start marker
 */
export async function rollback(
    session: Session,
    repository: RepositoryPort,
    action: RollbackAction,
): Promise<RollbackResult> {
    const marker = session.startMarker;
    if (!marker.commit) {
        throw new WorkflowError(`Session ${session.id} has no start commit to roll back to`, { sessionId: session.id });
    }

    const files = await repository.changedFiles(marker);
    const result: RollbackResult = { action, sessionId: session.id, commit: marker.commit, snapshot: marker.snapshot, files };

    switch (action) {
        case 'inspect':
            result.diff = await repository.diff(marker);
            break;
        case 'soft':
            await repository.softRevert(marker);
            break;
        case 'hard':
            if (marker.dirty) {
                log.info('Uncommitted work from before the session is restored from the start snapshot');
            }
            await repository.hardRevert(marker);
            break;
    }

    log.debug(`${action} rollback of ${session.id} to ${marker.commit.slice(0, 12)} (${files.length} file(s))`);
    return result;
}
