/**
 * Git client: wraps simple-git for start markers, change listing, and rollback.
 *
 * The orchestrator talks to the repository only through `RepositoryPort`,
 * so tests can stand in an in-memory repository.
 *
 * Dependency direction: client.ts → simple-git, node:fs, core/errors, utils
 * Used by: workflow runner, rollback, cli
 */

import { rmSync } from 'node:fs';
import { resolve } from 'node:path';
import { simpleGit, type SimpleGit } from 'simple-git';
import { GitError, errorMessage } from '../core/errors.js';
import type { StartMarker } from '../core/workflow/engine.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('git');

const SNAPSHOT_REF_PREFIX = 'refs/reviewloop/snapshots/';

/** Snapshot commits are tool-made; they do not need the user's identity. */
const SNAPSHOT_IDENTITY = {
    GIT_AUTHOR_NAME: 'reviewloop',
    GIT_AUTHOR_EMAIL: 'reviewloop@localhost',
    GIT_COMMITTER_NAME: 'reviewloop',
    GIT_COMMITTER_EMAIL: 'reviewloop@localhost',
};

/** What the workflow needs from a repository. */
export interface RepositoryPort {
    /** Record HEAD, the branch and a snapshot of the working tree. */
    captureStartMarker(now?: number): Promise<StartMarker>;
    /** Paths that differ from the start snapshot, including untracked files. */
    changedFiles(marker: StartMarker): Promise<string[]>;
    /** Unified diff of the working tree against the start snapshot. */
    diff(marker: StartMarker): Promise<string>;
    /** Move back to the marker, keeping changes in the working tree unstaged. */
    softRevert(marker: StartMarker): Promise<void>;
    /** Restore the working tree to the start snapshot, untracked files included. */
    hardRevert(marker: StartMarker): Promise<void>;
    createBranch(name: string): Promise<void>;
}

/**
 * Git client for workflow operations.
 */
export class GitClient implements RepositoryPort {
    private readonly git: SimpleGit;
    private readonly projectRoot: string;

    constructor(projectRoot: string) {
        this.projectRoot = projectRoot;
        this.git = simpleGit(projectRoot);
    }

    /**
     * Check if the project is a Git repository.
     */
    async isRepo(): Promise<boolean> {
        try {
            return await this.git.checkIsRepo();
        } catch (err) {
            log.debug(`checkIsRepo failed: ${errorMessage(err)}`);
            return false;
        }
    }

    /**
     * Record HEAD and, when the tree is dirty, a snapshot commit of the
     * working tree so pre-existing edits are not counted as the session's.
     */
    async captureStartMarker(now: number = Date.now()): Promise<StartMarker> {
        try {
            const commit = (await this.git.revparse(['HEAD'])).trim();
            const status = await this.git.status();
            const dirty = !status.isClean();
            const snapshot = dirty ? await this.snapshotCommit(commit, now) : commit;
            if (dirty) {
                log.info(`Working tree is dirty; start snapshot ${snapshot.slice(0, 12)}`);
            }
            return {
                commit,
                snapshot,
                branch: status.current ?? 'HEAD',
                dirty,
                capturedAt: now,
            };
        } catch (err) {
            throw new GitError(
                `Failed to capture start marker: ${errorMessage(err)}`,
                { projectRoot: this.projectRoot },
            );
        }
    }

    async changedFiles(marker: StartMarker): Promise<string[]> {
        try {
            const current = await this.worktreeTree();
            const names = await this.git.raw(['diff', '--name-only', marker.snapshot, current]);
            const files = names.split('\n').map((line) => line.trim()).filter(Boolean);
            return [...new Set(files)].sort();
        } catch (err) {
            throw new GitError(
                `Failed to list changed files: ${errorMessage(err)}`,
                { snapshot: marker.snapshot },
            );
        }
    }

    async diff(marker: StartMarker): Promise<string> {
        try {
            const current = await this.worktreeTree();
            return await this.git.raw(['diff', marker.snapshot, current]);
        } catch (err) {
            throw new GitError(
                `Failed to get diff: ${errorMessage(err)}`,
                { snapshot: marker.snapshot },
            );
        }
    }

    async softRevert(marker: StartMarker): Promise<void> {
        try {
            await this.git.reset(['--mixed', marker.commit]);
            log.info(`Reset to ${marker.commit.slice(0, 12)}; changes kept unstaged`);
        } catch (err) {
            throw new GitError(
                `Failed to soft-revert to ${marker.commit}: ${errorMessage(err)}`,
                { commit: marker.commit },
            );
        }
    }

    /**
     * Reset to the start commit, drop untracked files, then lay the start
     * snapshot back over the tree. Content matches the start exactly; edits
     * that were staged at the start come back unstaged.
     */
    async hardRevert(marker: StartMarker): Promise<void> {
        try {
            await this.git.reset(['--hard', marker.commit]);
            await this.git.clean('f', ['-d']);
            if (marker.snapshot !== marker.commit) {
                await this.git.raw(['read-tree', '--reset', '-u', marker.snapshot]);
                await this.git.reset(['--mixed', marker.commit]);
            }
            log.info(`Hard reset to ${marker.snapshot.slice(0, 12)}`);
        } catch (err) {
            throw new GitError(
                `Failed to hard-revert to ${marker.snapshot}: ${errorMessage(err)}`,
                { commit: marker.commit, snapshot: marker.snapshot },
            );
        }
    }

    /**
     * Create and switch to a new branch for the session.
     */
    async createBranch(branchName: string): Promise<void> {
        try {
            await this.git.checkoutLocalBranch(branchName);
            log.info(`Created and switched to branch: ${branchName}`);
        } catch (err) {
            throw new GitError(
                `Failed to create branch "${branchName}": ${errorMessage(err)}`,
                { branch: branchName },
            );
        }
    }

    /**
     * Generate a safe branch name from a task description.
     */
    static toBranchName(prefix: string, task: string): string {
        const slug = task
            .toLowerCase()
            .replace(/[^a-z0-9]+/g, '-')
            .replace(/^-+|-+$/g, '')
            .slice(0, 50);
        return `${prefix}${slug}`;
    }

    // ── Private helpers ──

    /** Commit the working tree on top of `parent` and pin it under a ref so gc keeps it. */
    private async snapshotCommit(parent: string, now: number): Promise<string> {
        const tree = await this.worktreeTree();
        const git = simpleGit(this.projectRoot).env({ ...process.env, ...SNAPSHOT_IDENTITY });
        const message = `reviewloop start snapshot ${new Date(now).toISOString()}`;
        const sha = (await git.raw(['commit-tree', tree, '-p', parent, '--no-gpg-sign', '-m', message])).trim();
        await this.git.raw(['update-ref', `${SNAPSHOT_REF_PREFIX}${sha}`, sha]);
        return sha;
    }

    /**
     * Tree object of the working tree as `git add -A` would stage it.
     * Built in a throwaway index; the user's index is left alone.
     */
    private async worktreeTree(): Promise<string> {
        const indexPath = resolve(this.projectRoot, (await this.git.revparse(['--git-path', 'reviewloop-index'])).trim());
        const git = simpleGit(this.projectRoot).env({ ...process.env, GIT_INDEX_FILE: indexPath });
        try {
            await git.raw(['read-tree', 'HEAD']);
            await git.raw(['add', '-A']);
            return (await git.raw(['write-tree'])).trim();
        } finally {
            rmSync(indexPath, { force: true });
        }
    }
}
