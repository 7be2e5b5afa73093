/**
 * Tests for parsing command worker output.
 */

import { describe, it, expect } from 'vitest';
import { parseWorkerOutput } from '../../../src/agents/workers/command.js';
import { WorkerError } from '../../../src/core/errors.js';

describe('parseWorkerOutput', () => {
    it('reads one message per JSON line and ignores other lines', () => {
        const stdout = [
            'Reviewing src/limiter.ts...',
            '{"to":"orchestrator","kind":"finding-raised","body":"No burst cap","payload":{"severity":"low"}}',
            '',
            '  {"to":"orchestrator","kind":"verdict","payload":{"verdict":"resolved"}}  ',
            'done',
        ].join('\n');

        expect(parseWorkerOutput(stdout)).toEqual([
            { to: 'orchestrator', kind: 'finding-raised', body: 'No burst cap', payload: { severity: 'low' } },
            { to: 'orchestrator', kind: 'verdict', payload: { verdict: 'resolved' } },
        ]);
    });

    it('returns nothing for plain output', () => {
        expect(parseWorkerOutput('thinking...\nnothing to say')).toEqual([]);
    });

    it('rejects a JSON-looking line that does not parse', () => {
        expect(() => parseWorkerOutput('{"to": "orchestrator",')).toThrow(WorkerError);
        expect(() => parseWorkerOutput('ok\n{oops')).toThrow('Worker output line 2 is not valid JSON');
    });

    it('rejects an object that is not a message', () => {
        expect(() => parseWorkerOutput('{"kind":"verdict"}')).toThrow('Worker output line 1 is not a message: to: Required');
    });
});
