/**
 * Gate controller: synchronization barriers over actor confirmations.
 *
 * A gate waits for every required actor to send one qualifying message.
 * The confirmed set only grows; confirming twice is a no-op. Each round
 * lasts `timeoutMs`; a timed-out gate may be extended until `maxRounds`
 * is reached, after which the orchestrator escalates.
 *
 * This is the only place in the system that reads the wall clock.
 *
 * Dependency direction: gates.ts → core/errors, messaging/bus, utils/logger
 * Used by: workflow runner
 */

import { WorkflowError } from '../errors.js';
import type { Message } from '../messaging/bus.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('gates');

export type GateStatus = 'open' | 'satisfied' | 'timed_out';

export interface GateOptions {
    timeoutMs: number;
    maxRounds: number;
}

export interface Confirmation {
    actor: string;
    messageId: string;
    kind: string;
    at: number;
    round: number;
}

/** Read-only view of a gate; the controller owns the state. */
export interface Gate {
    readonly name: string;
    readonly required: readonly string[];
    readonly confirmed: readonly string[];
    readonly confirmations: readonly Confirmation[];
    readonly timeoutMs: number;
    readonly maxRounds: number;
    readonly round: number;
    readonly openedAt: number;
    readonly roundStartedAt: number;
    readonly status: GateStatus;
}

/** Confirmed vs outstanding actors of a gate that could not be satisfied. */
export interface GateEscalation {
    gate: string;
    rounds: number;
    maxRounds: number;
    confirmed: string[];
    outstanding: string[];
    waitedMs: number;
}

interface GateState {
    name: string;
    required: string[];
    confirmed: string[];
    confirmations: Confirmation[];
    timeoutMs: number;
    maxRounds: number;
    round: number;
    openedAt: number;
    roundStartedAt: number;
    status: GateStatus;
}

export class GateController {
    private readonly gates = new Map<string, GateState>();
    private readonly clock: () => number;

    constructor(clock: () => number = Date.now) {
        this.clock = clock;
    }

    /**
     * Open a gate over `required` actors.
     * @throws {WorkflowError} if a gate with this name is still open
     */
    open(name: string, required: readonly string[], options: GateOptions): Gate {
        if (this.gates.has(name)) {
            throw new WorkflowError(`Gate "${name}" is already open`, { gate: name });
        }
        if (options.maxRounds < 1 || options.timeoutMs <= 0) {
            throw new WorkflowError(`Gate "${name}" needs a positive timeout and at least one round`, { gate: name, ...options });
        }

        const now = this.clock();
        const state: GateState = {
            name,
            required: [...new Set(required)],
            confirmed: [],
            confirmations: [],
            timeoutMs: options.timeoutMs,
            maxRounds: options.maxRounds,
            round: 1,
            openedAt: now,
            roundStartedAt: now,
            status: 'open',
        };
        if (state.required.length === 0) state.status = 'satisfied';

        this.gates.set(name, state);
        log.debug(`Opened "${name}" over [${state.required.join(', ')}]`);
        return state;
    }

    /**
     * Record a confirmation. Returns true when the confirmed set grew.
     * Actors outside the required set and repeat confirmations change nothing.
     */
    record(gate: Gate, actor: string, message: Message): boolean {
        const state = this.state(gate);

        if (!state.required.includes(actor)) {
            log.debug(`"${state.name}" ignores confirmation from ${actor} (not required)`);
            return false;
        }
        if (state.confirmed.includes(actor)) {
            return false;
        }

        state.confirmed.push(actor);
        state.confirmations.push({
            actor,
            messageId: message.id,
            kind: message.kind,
            at: this.clock(),
            round: state.round,
        });
        this.evaluate(state);
        return true;
    }

    /**
     * Current status. A complete confirmed set wins over an elapsed deadline.
     */
    poll(gate: Gate): GateStatus {
        return this.evaluate(this.state(gate));
    }

    /** Milliseconds left in the current round (0 once it elapsed). */
    remaining(gate: Gate): number {
        const state = this.state(gate);
        return Math.max(0, state.roundStartedAt + state.timeoutMs - this.clock());
    }

    /**
     * Start another round after a timeout. Returns false once rounds are exhausted.
     */
    extend(gate: Gate): boolean {
        const state = this.state(gate);
        if (this.evaluate(state) !== 'timed_out') return false;
        if (state.round >= state.maxRounds) return false;

        state.round += 1;
        state.roundStartedAt = this.clock();
        state.status = 'open';
        log.info(`"${state.name}" extended to round ${state.round}/${state.maxRounds}`);
        return true;
    }

    outstanding(gate: Gate): string[] {
        const state = this.state(gate);
        return state.required.filter((actor) => !state.confirmed.includes(actor));
    }

    escalation(gate: Gate): GateEscalation {
        const state = this.state(gate);
        return {
            gate: state.name,
            rounds: state.round,
            maxRounds: state.maxRounds,
            confirmed: [...state.confirmed],
            outstanding: this.outstanding(state),
            waitedMs: this.clock() - state.openedAt,
        };
    }

    /** Destroy a gate once its phase advances. */
    close(gate: Gate): void {
        this.gates.delete(gate.name);
    }

    get(name: string): Gate | undefined {
        return this.gates.get(name);
    }

    /** Every open gate, for the persisted confirmation table. */
    list(): Gate[] {
        for (const state of this.gates.values()) this.evaluate(state);
        return [...this.gates.values()];
    }

    // ── Private helpers ──

    private state(gate: Gate): GateState {
        const state = this.gates.get(gate.name);
        if (!state) {
            throw new WorkflowError(`Gate "${gate.name}" is not open`, { gate: gate.name });
        }
        return state;
    }

    private evaluate(state: GateState): GateStatus {
        if (state.required.every((actor) => state.confirmed.includes(actor))) {
            state.status = 'satisfied';
        } else if (this.clock() >= state.roundStartedAt + state.timeoutMs) {
            state.status = 'timed_out';
        } else {
            state.status = 'open';
        }
        return state.status;
    }
}
