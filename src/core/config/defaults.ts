/**
 * Default configuration values.
 *
 * `reviewloop init` writes these to `.reviewloop/config.json`; the worker
 * commands are placeholders the project replaces with its own agent CLI.
 *
 * Dependency direction: defaults.ts → types.ts
 * Used by: manager.ts, init.ts, orchestrator
 */

import type { AppConfig, ReviewerDomain, Severity, WorkerConfig } from './types.js';

/** The directory name where config and sessions are stored inside a project. */
export const CONFIG_DIR_NAME = '.reviewloop';

/** The config file name. */
export const CONFIG_FILE_NAME = 'config.json';

/**
 * Blocking threshold per reviewer domain: findings at or above it block
 * approval, findings below it are recorded as accepted technical debt.
 */
export const DEFAULT_DOMAIN_THRESHOLDS: Record<ReviewerDomain, Severity> = {
    security: 'low',
    test: 'medium',
    'code-quality': 'high',
    dry: 'critical',
    operations: 'high',
    observability: 'medium',
};

function placeholderWorker(role: string): WorkerConfig {
    return { command: 'agent', args: ['--role', role], timeoutMs: 30 * 60_000 };
}

/**
 * Full default configuration.
 */
export const DEFAULT_CONFIG: AppConfig = {
    version: 1,

    implementer: {
        name: 'implementer',
        worker: placeholderWorker('implementer'),
    },

    reviewers: [
        { name: 'security', domain: 'security', worker: placeholderWorker('security-reviewer') },
        { name: 'test', domain: 'test', worker: placeholderWorker('test-reviewer') },
        { name: 'code-quality', domain: 'code-quality', worker: placeholderWorker('code-reviewer') },
        { name: 'dry', domain: 'dry', worker: placeholderWorker('dry-reviewer') },
    ],

    domainThresholds: { ...DEFAULT_DOMAIN_THRESHOLDS },

    workflow: {
        maxValidationAttempts: 3,
        maxReviewCycles: 3,
        maxReverdictRounds: 3,
        planningGate: { timeoutMs: 30 * 60_000, maxRounds: 3 },
        reviewGate: { timeoutMs: 60 * 60_000, maxRounds: 3 },
        reflectionDeadlineMs: 15 * 60_000,
        humanApproval: true,
        autoCreateBranch: false,
        branchPrefix: 'reviewloop/',
        verificationLevel: 'full',
    },

    validation: {
        layers: [
            {
                name: 'compile',
                purpose: 'catches type errors',
                command: 'npx',
                args: ['tsc', '--noEmit'],
                hint: 'Fix compilation errors before proceeding',
                triggers: [],
                level: 'quick',
                timeoutMs: 10 * 60_000,
            },
            {
                name: 'format',
                purpose: 'catches style violations',
                command: 'npx',
                args: ['prettier', '--check', '.'],
                hint: 'Run the formatter and commit the result',
                triggers: [],
                level: 'quick',
                timeoutMs: 10 * 60_000,
            },
            {
                name: 'guards',
                purpose: 'catches banned patterns such as secrets in logs',
                command: 'npm',
                args: ['run', 'guards', '--if-present'],
                hint: 'Review guard output and fix violations',
                triggers: [],
                level: 'quick',
                timeoutMs: 10 * 60_000,
            },
            {
                name: 'tests',
                purpose: 'catches behavior regressions',
                command: 'npm',
                args: ['test'],
                hint: 'Fix failing tests',
                triggers: [],
                level: 'standard',
                timeoutMs: 20 * 60_000,
            },
            {
                name: 'lint',
                purpose: 'catches suspicious constructs',
                command: 'npx',
                args: ['eslint', '.'],
                hint: 'Fix lint warnings',
                triggers: [],
                level: 'full',
                timeoutMs: 10 * 60_000,
            },
            {
                name: 'dependency-audit',
                purpose: 'catches vulnerable or disallowed dependencies',
                command: 'npm',
                args: ['audit', '--audit-level=high'],
                hint: 'Upgrade or replace the flagged dependency',
                triggers: [],
                level: 'full',
                timeoutMs: 5 * 60_000,
            },
            {
                name: 'migrations',
                purpose: 'catches schema migrations that do not apply cleanly',
                command: 'npm',
                args: ['run', 'check:migrations', '--if-present'],
                hint: 'Make the migration apply on a fresh database',
                triggers: ['(^|/)migrations?/', '\\.sql$'],
                level: 'standard',
                timeoutMs: 10 * 60_000,
            },
            {
                name: 'interface-contracts',
                purpose: 'catches breaking interface definition changes',
                command: 'npm',
                args: ['run', 'check:contracts', '--if-present'],
                hint: 'Keep interface changes backward compatible or version them',
                triggers: ['\\.proto$', '(^|/)openapi[^/]*\\.(json|ya?ml)$', '\\.graphql$'],
                level: 'standard',
                timeoutMs: 10 * 60_000,
            },
        ],
    },

    modes: {
        sensitivePaths: [
            {
                category: 'authentication/crypto',
                patterns: ['(^|/)(auth|authn|authz|crypto|oauth)(/|[._-])', '(^|/)[^/]*(jwt|password|credential)[^/]*$'],
            },
            {
                category: 'schema/interface-contract',
                patterns: ['(^|/)migrations?/', '\\.sql$', '\\.proto$', '(^|/)(schema|openapi)[^/]*\\.(json|ya?ml|graphql)$'],
            },
            {
                category: 'dependency-manifest',
                patterns: [
                    '(^|/)package(-lock)?\\.json$',
                    '(^|/)(yarn\\.lock|pnpm-lock\\.yaml)$',
                    '(^|/)Cargo\\.(toml|lock)$',
                    '(^|/)go\\.(mod|sum)$',
                    '(^|/)(requirements[^/]*\\.txt|pyproject\\.toml)$',
                ],
            },
            {
                category: 'shared/common',
                patterns: ['(^|/)(common|shared)/'],
            },
            {
                category: 'instrumentation',
                patterns: ['(^|/)(observability|telemetry|metrics|tracing)(/|[._-])'],
            },
        ],
    },

    specialists: [
        { label: 'auth', keywords: ['auth', 'authentication', 'login', 'jwt', 'oauth', 'token signing'] },
        { label: 'database', keywords: ['database', 'migration', 'schema', 'sql', 'query plan'] },
        { label: 'protocol', keywords: ['protobuf', 'wire format', 'signaling', 'message schema'] },
        { label: 'infrastructure', keywords: ['kubernetes', 'docker', 'helm', 'deployment', 'ci pipeline'] },
        { label: 'observability', keywords: ['metrics', 'tracing', 'dashboard', 'alerting', 'log format'] },
        { label: 'backend', keywords: ['endpoint', 'handler', 'rate limiting', 'http api', 'service'] },
    ],
};
