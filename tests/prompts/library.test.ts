import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
    generateDefaultPrompts,
    getDefaultPrompt,
    getPromptsDir,
    loadRolePrompt,
} from '../../src/prompts/library.js';
import { createAgents, modelConfigFor } from '../../src/agents/factory.js';
import { clearProviderCache } from '../../src/providers/registry.js';
import { getDefaultConfig } from '../../src/core/config/manager.js';
import { ALL_MODEL_ROLES } from '../../src/agents/types.js';
import { LogLevel, logger } from '../../src/utils/logger.js';

let projectRoot: string;

beforeEach(() => {
    projectRoot = mkdtempSync(join(tmpdir(), 'studymate-prompts-'));
    clearProviderCache();
    logger.setLogLevel(LogLevel.Silent);
});

afterEach(() => {
    rmSync(projectRoot, { recursive: true, force: true });
    logger.setLogLevel(LogLevel.Info);
});

describe('prompt library', () => {
    it('has a non-empty built-in prompt for every role', () => {
        for (const role of ALL_MODEL_ROLES) {
            expect(getDefaultPrompt(role).trim().length).toBeGreaterThan(0);
        }
    });

    it('writes one file per role and keeps existing files', () => {
        expect(generateDefaultPrompts(projectRoot)).toEqual([...ALL_MODEL_ROLES]);

        writeFileSync(join(getPromptsDir(projectRoot), 'quiz.md'), 'Custom quiz prompt', 'utf-8');

        expect(generateDefaultPrompts(projectRoot)).toEqual([]);
        expect(readdirSync(getPromptsDir(projectRoot)).sort()).toEqual(ALL_MODEL_ROLES.map((r) => `${r}.md`).sort());
        expect(loadRolePrompt(projectRoot, 'quiz')).toBe('Custom quiz prompt');
    });

    it('uses the built-in prompt when the file is missing or empty', () => {
        expect(loadRolePrompt(projectRoot, 'router')).toBe(getDefaultPrompt('router'));

        generateDefaultPrompts(projectRoot);
        writeFileSync(join(getPromptsDir(projectRoot), 'router.md'), '  \n', 'utf-8');

        expect(loadRolePrompt(projectRoot, 'router')).toBe(getDefaultPrompt('router'));
    });
});

describe('createAgents', () => {
    it('builds the router, synthesizer and all six generators', () => {
        const agents = createAgents(getDefaultConfig(), projectRoot);

        expect(agents.router.role).toBe('router');
        expect(agents.synthesizer.role).toBe('synthesizer');
        expect(Object.keys(agents.generators).sort()).toEqual([
            'explain-concept',
            'flashcards',
            'important-questions',
            'long-form-answer',
            'quiz',
            'study-plan',
        ]);
        expect(agents.generators.quiz.role).toBe('quiz');
    });

    it('maps generator roles to the shared generator model', () => {
        const config = getDefaultConfig();
        expect(modelConfigFor('flashcards', config)).toBe(config.models.generators);
        expect(modelConfigFor('router', config)).toBe(config.models.router);
    });
});
