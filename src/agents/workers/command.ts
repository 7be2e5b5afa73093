/**
 * Command worker: backs an actor with an external program.
 *
 * For each message the program is started in the project root with the
 * request as JSON on stdin. It answers by printing one JSON message per
 * line on stdout; other lines (progress output) are ignored.
 *
 * Environment given to the program:
 *   REVIEWLOOP_ACTOR      actor name
 *   REVIEWLOOP_ROLE       implementer | reviewer
 *   REVIEWLOOP_READ_ONLY  "1" when it must not modify the repository
 *
 * Dependency direction: command.ts → execa, messaging/protocol, core/errors
 * Used by: agents/factory
 */

import { execa } from 'execa';
import type { WorkerConfig } from '../../core/config/types.js';
import { WorkerError } from '../../core/errors.js';
import { outboundMessageSchema } from '../../core/messaging/protocol.js';
import { createLogger } from '../../utils/logger.js';
import type { OutboundMessage, Worker, WorkerRequest } from '../types.js';

const log = createLogger('worker');

/**
 * Parse a worker's stdout into outbound messages.
 * @throws {WorkerError} when a JSON-looking line is not a valid message
 */
export function parseWorkerOutput(stdout: string): OutboundMessage[] {
    const messages: OutboundMessage[] = [];
    const lines = stdout.split('\n').map((line) => line.trim());

    lines.forEach((line, index) => {
        if (!line.startsWith('{')) return;

        let raw: unknown;
        try {
            raw = JSON.parse(line);
        } catch (err) {
            throw new WorkerError(`Worker output line ${index + 1} is not valid JSON`, {
                line,
                originalError: err instanceof Error ? err.message : String(err),
            });
        }

        const parsed = outboundMessageSchema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
            throw new WorkerError(`Worker output line ${index + 1} is not a message: ${issues}`, { line });
        }
        messages.push(parsed.data);
    });

    return messages;
}

export class CommandWorker implements Worker {
    private readonly config: WorkerConfig;
    private readonly cwd: string;

    constructor(config: WorkerConfig, cwd: string) {
        this.config = config;
        this.cwd = cwd;
    }

    async perform(request: WorkerRequest): Promise<OutboundMessage[]> {
        const display = [this.config.command, ...this.config.args].join(' ');
        log.debug(`${request.actor} ← ${request.message.kind}: ${display}`);

        const result = await execa(this.config.command, this.config.args, {
            cwd: this.cwd,
            input: JSON.stringify(request),
            reject: false, // Don't throw on non-zero exit
            timeout: this.config.timeoutMs,
            env: {
                ...process.env,
                REVIEWLOOP_ACTOR: request.actor,
                REVIEWLOOP_ROLE: request.role,
                REVIEWLOOP_READ_ONLY: request.readOnly ? '1' : '0',
            },
        });

        if (result.timedOut) {
            throw new WorkerError(`Worker for ${request.actor} timed out after ${this.config.timeoutMs}ms`, {
                actor: request.actor,
                command: display,
            });
        }
        if (result.failed) {
            throw new WorkerError(`Worker for ${request.actor} failed (exit code: ${result.exitCode ?? 'none'})`, {
                actor: request.actor,
                command: display,
                stderr: result.stderr.slice(0, 2000),
            });
        }

        return parseWorkerOutput(result.stdout);
    }
}
