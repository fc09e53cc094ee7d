import { describe, it, expect, vi } from 'vitest';
import { AnswerSynthesizer } from '../../src/agents/synthesizer.js';
import { estimateTokens } from '../../src/agents/base.js';
import { ProviderError } from '../../src/core/errors.js';
import type { ChatChunk } from '../../src/providers/types.js';
import { ScriptedProvider } from '../helpers/fakes.js';

/** Yields one chunk, then drops the connection. */
class BrokenStreamProvider extends ScriptedProvider {
    override async *stream(): AsyncIterable<ChatChunk> {
        yield { content: 'partial', done: false };
        throw new Error('socket closed');
    }
}

describe('AnswerSynthesizer', () => {
    it('puts context and question in the prompt and returns the reply verbatim', async () => {
        const provider = new ScriptedProvider('  Chlorophyll absorbs light.  ');
        const synthesizer = new AnswerSynthesizer(provider, { model: 'synth-model' });

        const answer = await synthesizer.synthesize('What does chlorophyll do?', 'Chlorophyll absorbs light.');

        expect(answer).toBe('  Chlorophyll absorbs light.  ');
        expect(provider.userPrompt()).toBe(
            [
                'CONTEXT:',
                'Chlorophyll absorbs light.',
                '',
                'QUESTION:',
                'What does chlorophyll do?',
                '',
                'If the context does not contain the answer, say that you could not find it in the available material.',
                '',
                'ANSWER:',
            ].join('\n'),
        );
    });

    it('uses a custom system prompt', async () => {
        const provider = new ScriptedProvider('ok');
        const synthesizer = new AnswerSynthesizer(provider, { model: 'synth-model', systemPrompt: 'Be terse.' });

        await synthesizer.synthesize('q', 'c');

        expect(provider.calls[0]?.options?.systemPrompt).toBe('Be terse.');
    });

    it('streams chunks and estimates usage', async () => {
        const onUsage = vi.fn();
        const chunks: string[] = [];
        const onComplete = vi.fn();
        const synthesizer = new AnswerSynthesizer(new ScriptedProvider('Hello world'), {
            model: 'synth-model',
            onUsage,
        });

        const output = await synthesizer.answer('q', 'c', { onChunk: (text) => chunks.push(text), onComplete });

        expect(chunks).toEqual(['Hello ', 'world']);
        expect(onComplete).toHaveBeenCalledWith('Hello world');
        expect(output.content).toBe('Hello world');
        expect(output.model).toBe('synth-model');
        expect(output.usage.completionTokens).toBe(estimateTokens('Hello world'));
        expect(onUsage).toHaveBeenCalledWith('synthesizer', 'synth-model', output.usage);
    });

    it('falls back to a single call when the stream fails before any text', async () => {
        const provider = new ScriptedProvider('Recovered answer');
        provider.streamFailure = new Error('stream unsupported');
        const onComplete = vi.fn();
        const synthesizer = new AnswerSynthesizer(provider, { model: 'synth-model' });

        const output = await synthesizer.answer('q', 'c', { onChunk: () => undefined, onComplete });

        expect(output.content).toBe('Recovered answer');
        expect(output.tokensUsed).toBe(15);
        expect(onComplete).toHaveBeenCalledWith('Recovered answer');
        expect(provider.calls).toHaveLength(1);
    });

    it('fails when the stream breaks after text arrived', async () => {
        const synthesizer = new AnswerSynthesizer(new BrokenStreamProvider('unused'), { model: 'synth-model' });

        const result = synthesizer.answer('q', 'c', { onChunk: () => undefined });

        await expect(result).rejects.toThrow(ProviderError);
        await expect(result).rejects.toThrow('failed: socket closed');
    });
});

describe('estimateTokens', () => {
    it('rounds up a quarter of the character count', () => {
        expect(estimateTokens('')).toBe(0);
        expect(estimateTokens('abcde')).toBe(2);
    });
});
