/**
 * External check runner: sequences validation layers over a change.
 *
 * Layers run one after another because later layers assume earlier ones
 * held (a change must compile before it is linted). The first failing
 * layer stops the run; the layers after it are reported as skipped.
 * Conditional layers only join the sequence when a changed file matches
 * one of their triggers. The verification level picks which layers are in
 * the sequence at all: `quick` < `standard` < `full`, each level adding its
 * layers to those of the shallower ones.
 *
 * The runner owns sequencing only. What a layer checks is opaque to it.
 *
 * Dependency direction: checks.ts → execa, config/types, core/errors, utils
 * Used by: workflow runner
 */

import { execa } from 'execa';
import { verificationLevelSchema } from '../config/schema.js';
import type { CheckLayerConfig, VerificationLevel } from '../config/types.js';
import { CheckError, errorMessage } from '../errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('checks');

/** Longest layer output routed back to the implementer. */
export const MAX_FAILURE_OUTPUT = 2000;

/** The change under validation. */
export interface Change {
    /** Working directory of the repository. */
    root: string;
    /** Changed paths, relative to `root`. */
    files: readonly string[];
}

export type LayerOutcome = 'pass' | 'fail' | 'skipped';

export interface LayerResult {
    name: string;
    purpose: string;
    outcome: LayerOutcome;
    output: string;
    hint: string;
    durationMs: number;
}

export interface ValidationRun {
    iteration: number;
    layers: LayerResult[];
    outcome: 'pass' | 'fail';
    /** Name of the layer that stopped the run. */
    failedLayer?: string;
    startedAt: number;
    finishedAt: number;
}

/** What a layer reports. */
export interface CheckReport {
    passed: boolean;
    output: string;
}

export interface CheckLayer {
    name: string;
    purpose: string;
    hint?: string;
    /** When present and non-empty, the layer only runs if a changed file matches. */
    triggers?: readonly RegExp[];
    /** Shallowest level that runs the layer; a layer without one runs at every level. */
    level?: VerificationLevel;
    /** Resolves with the report; throws `CheckError` when the layer cannot run at all. */
    run(change: Change): Promise<CheckReport>;
}

/** Structured failure context sent back to the implementer. */
export interface FailureContext {
    iteration: number;
    layer: string;
    purpose: string;
    output: string;
    truncated: boolean;
    hint: string;
}

/**
 * Whether a layer belongs in the sequence for this change.
 */
export function isLayerActive(layer: CheckLayer, change: Change): boolean {
    const triggers = layer.triggers ?? [];
    if (triggers.length === 0) return true;
    return change.files.some((file) => triggers.some((pattern) => pattern.test(normalizePath(file))));
}

const LEVEL_ORDER: readonly VerificationLevel[] = verificationLevelSchema.options;

/** Whether a run at `selected` depth includes a layer of `layerLevel`. */
export function includesLevel(selected: VerificationLevel, layerLevel: VerificationLevel): boolean {
    return LEVEL_ORDER.indexOf(layerLevel) <= LEVEL_ORDER.indexOf(selected);
}

/** The layers a run at `level` uses, in their configured order. */
export function selectLayers<T extends CheckLayer>(layers: readonly T[], level: VerificationLevel): T[] {
    return layers.filter((layer) => includesLevel(level, layer.level ?? 'quick'));
}

export class CheckRunner {
    private readonly layers: readonly CheckLayer[];
    private readonly clock: () => number;

    constructor(layers: readonly CheckLayer[], clock: () => number = Date.now) {
        this.layers = layers;
        this.clock = clock;
    }

    /**
     * Run the active layers in order, stopping at the first failure.
     */
    async run(change: Change, iteration: number): Promise<ValidationRun> {
        const startedAt = this.clock();
        const results: LayerResult[] = [];
        let failedLayer: string | undefined;

        for (const layer of this.layers) {
            if (!isLayerActive(layer, change)) {
                log.debug(`${layer.name}: not triggered by this change`);
                continue;
            }

            const base = { name: layer.name, purpose: layer.purpose, hint: layer.hint ?? '' };

            if (failedLayer) {
                results.push({ ...base, outcome: 'skipped', output: '', durationMs: 0 });
                continue;
            }

            const layerStart = this.clock();
            let report: CheckReport;
            try {
                report = await layer.run(change);
            } catch (err) {
                // A layer that cannot run has not passed.
                const failure = err instanceof CheckError
                    ? err
                    : new CheckError(errorMessage(err), { layer: layer.name });
                log.error(`${layer.name} could not run: ${failure.message}`);
                report = { passed: false, output: `Layer could not run: ${failure.message}` };
            }

            const outcome: LayerOutcome = report.passed ? 'pass' : 'fail';
            results.push({ ...base, outcome, output: report.output, durationMs: this.clock() - layerStart });

            if (report.passed) {
                log.success(`${layer.name} passed`);
            } else {
                log.warn(`${layer.name} failed`);
                failedLayer = layer.name;
            }
        }

        const run: ValidationRun = {
            iteration,
            layers: results,
            outcome: failedLayer ? 'fail' : 'pass',
            startedAt,
            finishedAt: this.clock(),
        };
        if (failedLayer) run.failedLayer = failedLayer;
        return run;
    }
}

/**
 * Package the first failing layer of a run for the implementer.
 * Returns undefined for a passing run.
 */
export function failureContext(run: ValidationRun): FailureContext | undefined {
    const failed = run.layers.find((layer) => layer.outcome === 'fail');
    if (!failed) return undefined;

    const truncated = failed.output.length > MAX_FAILURE_OUTPUT;
    return {
        iteration: run.iteration,
        layer: failed.name,
        purpose: failed.purpose,
        output: truncated ? `${failed.output.slice(0, MAX_FAILURE_OUTPUT)}...` : failed.output,
        truncated,
        hint: failed.hint,
    };
}

/**
 * Build a layer that runs a configured command in the change's root.
 * A non-zero exit or a timeout is a failed check; a command that never
 * started throws `CheckError`.
 */
export function commandLayer(config: CheckLayerConfig): CheckLayer {
    const layer: CheckLayer = {
        name: config.name,
        purpose: config.purpose,
        hint: config.hint,
        triggers: config.triggers.map((source) => new RegExp(source)),
        level: config.level,
        async run(change: Change): Promise<CheckReport> {
            const display = [config.command, ...config.args].join(' ');
            log.info(`Running ${config.name}: ${display}`);

            const result = await execa(config.command, config.args, {
                cwd: change.root,
                reject: false, // Don't throw on non-zero exit
                all: true,
                timeout: config.timeoutMs,
                env: { ...process.env, FORCE_COLOR: '0' }, // Disable color for cleaner output
            });

            const output = result.all ?? '';
            if (result.timedOut) {
                return { passed: false, output: `${display} timed out after ${config.timeoutMs}ms\n${output}` };
            }
            if (result.failed && result.exitCode === undefined && !result.isTerminated) {
                throw new CheckError(`${display} could not be started`, { layer: config.name, command: config.command });
            }
            if (result.failed) {
                const code = result.exitCode ?? 'none';
                return { passed: false, output: output || `${display} failed (exit code: ${code})` };
            }
            return { passed: true, output };
        },
    };
    return layer;
}

/** Build the configured layers a run at `level` uses. */
export function commandLayers(configs: readonly CheckLayerConfig[], level: VerificationLevel = 'full'): CheckLayer[] {
    return selectLayers(configs.map(commandLayer), level);
}

function normalizePath(file: string): string {
    return file.replace(/\\/g, '/').replace(/^\.\//, '');
}
