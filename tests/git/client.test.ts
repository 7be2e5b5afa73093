/**
 * Tests for the Git client: branch naming, and start snapshots against a
 * throwaway repository in a temp directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { simpleGit } from 'simple-git';
import { GitClient } from '../../src/git/client.js';
import { rollback } from '../../src/core/workflow/rollback.js';
import { makeSession } from '../support/fakes.js';

const gitInstalled = (await simpleGit().version()).installed;

describe('GitClient.toBranchName', () => {
    it('slugs the task under the prefix', () => {
        expect(GitClient.toBranchName('reviewloop/', 'Add rate limiting (v2)')).toBe('reviewloop/add-rate-limiting-v2');
    });

    it('caps the slug at fifty characters', () => {
        expect(GitClient.toBranchName('rl/', 'word '.repeat(20))).toBe(`rl/${'word-'.repeat(10).slice(0, 50)}`);
    });
});

describe.skipIf(!gitInstalled)('GitClient start snapshots', () => {
    let repoDir: string;
    let client: GitClient;

    const read = (name: string): string => readFileSync(join(repoDir, name), 'utf-8');
    const write = (name: string, content: string): void => writeFileSync(join(repoDir, name), content);

    beforeEach(async () => {
        repoDir = mkdtempSync(join(tmpdir(), 'reviewloop-git-'));
        const git = simpleGit(repoDir);
        await git.init();
        await git.addConfig('user.name', 'Test User');
        await git.addConfig('user.email', 'test@example.com');
        await git.addConfig('commit.gpgsign', 'false');
        write('a.txt', 'committed\n');
        await git.add('a.txt');
        await git.commit('initial');
        client = new GitClient(repoDir);
    });

    afterEach(() => {
        rmSync(repoDir, { recursive: true, force: true });
    });

    it('uses HEAD as the snapshot of a clean tree', async () => {
        const marker = await client.captureStartMarker(42);

        expect(marker.dirty).toBe(false);
        expect(marker.snapshot).toBe(marker.commit);
        expect(marker.capturedAt).toBe(42);
        expect(await client.changedFiles(marker)).toEqual([]);
    });

    it('does not count edits made before the session as its change', async () => {
        write('a.txt', 'user work in progress\n');
        write('notes.txt', 'scratch\n');

        const marker = await client.captureStartMarker();

        expect(marker.dirty).toBe(true);
        expect(marker.snapshot).not.toBe(marker.commit);
        expect(await client.changedFiles(marker)).toEqual([]);

        write('a.txt', 'session edit\n');
        write('b.txt', 'new file\n');
        expect(await client.changedFiles(marker)).toEqual(['a.txt', 'b.txt']);
        expect(await client.diff(marker)).toContain('-user work in progress\n+session edit');
    });

    it('hard revert restores the tree as it was when the session started', async () => {
        write('a.txt', 'user work in progress\n');
        write('notes.txt', 'scratch\n');
        const marker = await client.captureStartMarker();

        write('a.txt', 'session edit\n');
        write('b.txt', 'new file\n');
        write('notes.txt', 'session overwrote this\n');
        await rollback(makeSession({ startMarker: marker }), client, 'hard');

        expect(read('a.txt')).toBe('user work in progress\n');
        expect(read('notes.txt')).toBe('scratch\n');
        expect(existsSync(join(repoDir, 'b.txt'))).toBe(false);
        expect(await client.changedFiles(marker)).toEqual([]);

        const status = await simpleGit(repoDir).status();
        expect(status.modified).toEqual(['a.txt']);
        expect(status.not_added).toEqual(['notes.txt']);
    });

    it('hard revert on a clean start discards every session change', async () => {
        const marker = await client.captureStartMarker();
        write('a.txt', 'session edit\n');
        write('b.txt', 'new file\n');

        await client.hardRevert(marker);

        expect(read('a.txt')).toBe('committed\n');
        expect(existsSync(join(repoDir, 'b.txt'))).toBe(false);
        expect((await simpleGit(repoDir).status()).isClean()).toBe(true);
    });

    it('keeps the snapshot reachable after capture', async () => {
        write('a.txt', 'user work in progress\n');
        const marker = await client.captureStartMarker();

        const refs = await simpleGit(repoDir).raw(['for-each-ref', '--format=%(objectname)', 'refs/reviewloop/snapshots/']);
        expect(refs.trim()).toBe(marker.snapshot);
    });
});
