/**
 * Actor factory: builds the session roster from config.
 *
 * Wires together the message bus + actor config + worker factory
 * to produce one implementer and the configured reviewers.
 *
 * Dependency direction: factory.ts → agents/roles/*, agents/workers/*, config, core/errors
 * Used by: workflow runner
 */

import type { AppConfig } from '../core/config/types.js';
import { resolveBlockingThreshold } from '../core/config/manager.js';
import { ConfigError } from '../core/errors.js';
import type { MessageBus } from '../core/messaging/bus.js';
import type { RosterEntry } from '../core/workflow/engine.js';
import { ImplementerActor } from './roles/implementer.js';
import { ReviewerActor } from './roles/reviewer.js';
import { CommandWorker } from './workers/command.js';
import type { ActorSpec, WorkerFactory } from './types.js';

export interface Roster {
    implementer: ImplementerActor;
    reviewers: ReviewerActor[];
}

/**
 * Worker factory backing every actor with its configured command.
 */
export function commandWorkers(config: AppConfig, projectRoot: string): WorkerFactory {
    return (spec: ActorSpec) => {
        if (spec.role === 'implementer') {
            return new CommandWorker(config.implementer.worker, projectRoot);
        }
        const reviewer = config.reviewers.find((r) => r.name === spec.name);
        if (!reviewer) {
            throw new ConfigError(`No reviewer named "${spec.name}" in config`, { reviewer: spec.name });
        }
        return new CommandWorker(reviewer.worker, projectRoot);
    };
}

/**
 * Create (but do not start) the actors for a session.
 */
export function createRoster(config: AppConfig, bus: MessageBus, workers: WorkerFactory): Roster {
    const implementer = new ImplementerActor(
        config.implementer.name,
        bus,
        workers({ name: config.implementer.name, role: 'implementer' }),
    );

    const reviewers = config.reviewers.map((reviewer) => {
        const threshold = resolveBlockingThreshold(config, reviewer);
        return new ReviewerActor(
            reviewer.name,
            reviewer.domain,
            threshold,
            bus,
            workers({ name: reviewer.name, role: 'reviewer', domain: reviewer.domain, blockingThreshold: threshold }),
        );
    });

    return { implementer, reviewers };
}

/** Persistable view of the roster with current statuses. */
export function rosterEntries(roster: Roster): RosterEntry[] {
    return [
        { name: roster.implementer.name, role: 'implementer', status: roster.implementer.status },
        ...roster.reviewers.map((reviewer): RosterEntry => ({
            name: reviewer.name,
            role: 'reviewer',
            domain: reviewer.domain,
            blockingThreshold: reviewer.blockingThreshold,
            status: reviewer.status,
        })),
    ];
}
