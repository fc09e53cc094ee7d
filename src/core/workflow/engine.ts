/**
 * Question cycle state machine.
 *
 * One question drives exactly one pass:
 *   start → routing → <branch> → synthesizing → terminal   (document-search, web-search)
 *   start → routing → <branch> → terminal                  (the six generators)
 *
 * Contexts are immutable; `transition` returns a new one or throws.
 *
 * Dependency direction: engine.ts → agents/types, knowledge/types, core/errors
 * Used by: orchestrator
 */

import type { Branch } from '../../agents/types.js';
import { isGeneratorBranch } from '../../agents/types.js';
import type { ContextChunk } from '../../knowledge/types.js';
import { WorkflowError } from '../errors.js';

export type CycleState = 'start' | 'routing' | Branch | 'synthesizing' | 'terminal';

export type CycleEvent =
    | { type: 'ROUTE' }
    | { type: 'BRANCH_SELECTED'; payload: { branch: Branch } }
    | { type: 'CONTEXT_GATHERED'; payload: { chunks: readonly ContextChunk[]; context: string } }
    | {
          type: 'ANSWER_READY';
          payload: { answer: string; chunks?: readonly ContextChunk[]; context?: string };
      };

/** One step in the cycle's history. */
export interface TransitionRecord {
    from: CycleState;
    to: CycleState;
    event: CycleEvent['type'];
    timestamp: number;
}

export interface CycleContext {
    readonly question: string;
    readonly state: CycleState;
    readonly branch?: Branch;
    readonly chunks: readonly ContextChunk[];
    /** The context text handed to the answering step. */
    readonly context: string;
    readonly answer?: string;
    readonly history: readonly TransitionRecord[];
}

export function createCycleContext(question: string): CycleContext {
    return { question, state: 'start', chunks: [], context: '', history: [] };
}

export function isTerminal(ctx: CycleContext): boolean {
    return ctx.state === 'terminal';
}

function invalid(ctx: CycleContext, event: CycleEvent): WorkflowError {
    return new WorkflowError(`Invalid transition: ${event.type} in state "${ctx.state}"`, {
        state: ctx.state,
        event: event.type,
    });
}

function resolveNext(ctx: CycleContext, event: CycleEvent): Partial<CycleContext> & { state: CycleState } {
    switch (event.type) {
        case 'ROUTE':
            if (ctx.state !== 'start') throw invalid(ctx, event);
            return { state: 'routing' };

        case 'BRANCH_SELECTED':
            if (ctx.state !== 'routing') throw invalid(ctx, event);
            return { state: event.payload.branch, branch: event.payload.branch };

        case 'CONTEXT_GATHERED':
            if (ctx.state !== 'document-search' && ctx.state !== 'web-search') throw invalid(ctx, event);
            return { state: 'synthesizing', chunks: event.payload.chunks, context: event.payload.context };

        case 'ANSWER_READY': {
            const fromGenerator = ctx.branch !== undefined && ctx.state === ctx.branch && isGeneratorBranch(ctx.branch);
            if (ctx.state !== 'synthesizing' && !fromGenerator) throw invalid(ctx, event);
            return {
                state: 'terminal',
                answer: event.payload.answer,
                ...(event.payload.chunks ? { chunks: event.payload.chunks } : {}),
                ...(event.payload.context !== undefined ? { context: event.payload.context } : {}),
            };
        }
    }
}

/**
 * Apply an event to the cycle.
 *
 * @throws {WorkflowError} if the event is not allowed in the current state
 */
export function transition(ctx: CycleContext, event: CycleEvent, now: number = Date.now()): CycleContext {
    const next = resolveNext(ctx, event);

    return {
        ...ctx,
        ...next,
        history: [...ctx.history, { from: ctx.state, to: next.state, event: event.type, timestamp: now }],
    };
}
