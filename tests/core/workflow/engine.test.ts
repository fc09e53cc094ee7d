/**
 * Tests for the question cycle state machine.
 */

import { describe, it, expect } from 'vitest';
import {
    createCycleContext,
    transition,
    isTerminal,
    type CycleContext,
} from '../../../src/core/workflow/engine.js';
import { WorkflowError } from '../../../src/core/errors.js';
import type { Branch } from '../../../src/agents/types.js';

function routedTo(branch: Branch): CycleContext {
    let ctx = createCycleContext('question');
    ctx = transition(ctx, { type: 'ROUTE' }, 1);
    return transition(ctx, { type: 'BRANCH_SELECTED', payload: { branch } }, 2);
}

describe('createCycleContext', () => {
    it('starts with an empty context', () => {
        const ctx = createCycleContext('What is photosynthesis?');
        expect(ctx.state).toBe('start');
        expect(ctx.question).toBe('What is photosynthesis?');
        expect(ctx.chunks).toEqual([]);
        expect(ctx.context).toBe('');
        expect(ctx.history).toHaveLength(0);
        expect(isTerminal(ctx)).toBe(false);
    });
});

describe('transition', () => {
    it('moves start to routing on ROUTE', () => {
        const ctx = transition(createCycleContext('q'), { type: 'ROUTE' }, 100);
        expect(ctx.state).toBe('routing');
        expect(ctx.history).toEqual([{ from: 'start', to: 'routing', event: 'ROUTE', timestamp: 100 }]);
    });

    it('enters the selected branch', () => {
        const ctx = routedTo('quiz');
        expect(ctx.state).toBe('quiz');
        expect(ctx.branch).toBe('quiz');
    });

    it('runs a document search through synthesis', () => {
        const chunks = [{ text: 'Chlorophyll absorbs light.', sourceId: 'bio.pdf', similarityRank: 1 }];
        let ctx = routedTo('document-search');
        ctx = transition(
            ctx,
            { type: 'CONTEXT_GATHERED', payload: { chunks, context: 'Chlorophyll absorbs light.' } },
            3,
        );
        expect(ctx.state).toBe('synthesizing');
        expect(ctx.chunks).toEqual(chunks);

        ctx = transition(ctx, { type: 'ANSWER_READY', payload: { answer: 'It absorbs light.' } }, 4);

        expect(isTerminal(ctx)).toBe(true);
        expect(ctx.answer).toBe('It absorbs light.');
        expect(ctx.context).toBe('Chlorophyll absorbs light.');
        expect(ctx.history.map((h) => h.to)).toEqual(['routing', 'document-search', 'synthesizing', 'terminal']);
    });

    it('lets a generator answer directly', () => {
        const chunks = [{ text: 'Trees are graphs.', sourceId: 'ds.txt', similarityRank: 1 }];
        const ctx = transition(
            routedTo('flashcards'),
            { type: 'ANSWER_READY', payload: { answer: 'cards', chunks, context: 'Trees are graphs.' } },
            3,
        );

        expect(ctx.state).toBe('terminal');
        expect(ctx.chunks).toEqual(chunks);
        expect(ctx.context).toBe('Trees are graphs.');
    });

    it('rejects synthesis context for a generator branch', () => {
        expect(() =>
            transition(routedTo('quiz'), { type: 'CONTEXT_GATHERED', payload: { chunks: [], context: '' } }),
        ).toThrow(WorkflowError);
    });

    it('rejects an answer before context is gathered for web search', () => {
        expect(() => transition(routedTo('web-search'), { type: 'ANSWER_READY', payload: { answer: 'x' } })).toThrow(
            'Invalid transition: ANSWER_READY in state "web-search"',
        );
    });

    it('rejects a second ROUTE', () => {
        const ctx = transition(createCycleContext('q'), { type: 'ROUTE' });
        expect(() => transition(ctx, { type: 'ROUTE' })).toThrow(WorkflowError);
    });

    it('allows nothing after terminal', () => {
        const done = transition(routedTo('study-plan'), { type: 'ANSWER_READY', payload: { answer: 'plan' } });
        expect(() => transition(done, { type: 'ANSWER_READY', payload: { answer: 'again' } })).toThrow(WorkflowError);
    });

    it('does not mutate the previous context', () => {
        const start = createCycleContext('q');
        transition(start, { type: 'ROUTE' });
        expect(start.state).toBe('start');
        expect(start.history).toHaveLength(0);
    });
});
