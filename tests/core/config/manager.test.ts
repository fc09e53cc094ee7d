/**
 * Tests for the config manager (load, save, validate, merge).
 *
 * Uses a temp directory to simulate project configs on disk.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
    loadConfig,
    saveConfig,
    configExists,
    getConfigPath,
    mergeConfig,
    getDefaultConfig,
    applyEnvironment,
    resolveProjectPath,
} from '../../../src/core/config/manager.js';
import { DEFAULT_CONFIG, CONFIG_DIR_NAME, CONFIG_FILE_NAME } from '../../../src/core/config/defaults.js';
import { ConfigError } from '../../../src/core/errors.js';

let testDir: string;

beforeEach(() => {
    testDir = join(tmpdir(), `studymate-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
});

afterEach(() => {
    if (existsSync(testDir)) {
        rmSync(testDir, { recursive: true, force: true });
    }
});

describe('configExists', () => {
    it('returns false when no config exists', () => {
        expect(configExists(testDir)).toBe(false);
    });

    it('returns true after saving config', () => {
        saveConfig(testDir, DEFAULT_CONFIG);
        expect(configExists(testDir)).toBe(true);
    });
});

describe('getConfigPath', () => {
    it('returns the path under .studymate', () => {
        expect(getConfigPath(testDir)).toBe(join(testDir, CONFIG_DIR_NAME, CONFIG_FILE_NAME));
    });
});

describe('saveConfig', () => {
    it('saves valid config and creates directories', () => {
        saveConfig(testDir, DEFAULT_CONFIG);
        expect(existsSync(getConfigPath(testDir))).toBe(true);
    });

    it('throws ConfigError for invalid config', () => {
        const invalid = { ...DEFAULT_CONFIG, search: { ...DEFAULT_CONFIG.search, maxResults: 0 } };
        expect(() => saveConfig(testDir, invalid)).toThrow(ConfigError);
    });
});

describe('loadConfig', () => {
    it('loads a previously saved config', () => {
        saveConfig(testDir, DEFAULT_CONFIG);
        const loaded = loadConfig(testDir, {});

        expect(loaded.version).toBe(1);
        expect(loaded.providers.ollama?.baseUrl).toBe('http://localhost:11434');
        expect(loaded.models.router.provider).toBe('ollama');
        expect(loaded.retrieval.topK.quiz).toBe(3);
    });

    it('throws ConfigError when no config exists', () => {
        expect(() => loadConfig(testDir, {})).toThrow('No configuration found. Run "studymate init" first.');
    });

    it('throws ConfigError for corrupted JSON', () => {
        mkdirSync(join(testDir, CONFIG_DIR_NAME), { recursive: true });
        writeFileSync(getConfigPath(testDir), '{ broken json }', 'utf-8');

        expect(() => loadConfig(testDir, {})).toThrow(ConfigError);
    });

    it('fills defaults for sections missing from the file', () => {
        mkdirSync(join(testDir, CONFIG_DIR_NAME), { recursive: true });
        writeFileSync(
            getConfigPath(testDir),
            JSON.stringify({
                providers: {},
                models: DEFAULT_CONFIG.models,
                embeddings: DEFAULT_CONFIG.embeddings,
            }),
            'utf-8',
        );

        const loaded = loadConfig(testDir, {});
        expect(loaded.knowledge.chunkSize).toBe(1000);
        expect(loaded.knowledge.chunkOverlap).toBe(200);
        expect(loaded.search.maxResults).toBe(3);
        expect(loaded.study.hoursPerDay).toBe(3);
    });

    it('takes the search key from TAVILY_API_KEY when the file has none', () => {
        saveConfig(testDir, DEFAULT_CONFIG);
        const loaded = loadConfig(testDir, { TAVILY_API_KEY: 'test-secret' });
        expect(loaded.search.apiKey).toBe('test-secret');
    });
});

describe('applyEnvironment', () => {
    it('keeps a key that is already configured', () => {
        const config = getDefaultConfig({ search: { apiKey: 'from-file' } });
        expect(applyEnvironment(config, { TAVILY_API_KEY: 'from-env' }).search.apiKey).toBe('from-file');
    });
});

describe('resolveProjectPath', () => {
    it('resolves relative paths against the project root', () => {
        expect(resolveProjectPath(testDir, 'knowledge-base')).toBe(join(testDir, 'knowledge-base'));
    });

    it('keeps absolute paths', () => {
        const absolute = join(tmpdir(), 'docs');
        expect(resolveProjectPath(testDir, absolute)).toBe(absolute);
    });
});

describe('mergeConfig', () => {
    it('deep merges nested objects', () => {
        const result = mergeConfig(
            { study: { quizQuestions: 5, flashcards: 10 } },
            { study: { quizQuestions: 8 } },
        );
        expect(result).toEqual({ study: { quizQuestions: 8, flashcards: 10 } });
    });

    it('replaces arrays instead of concatenating', () => {
        const result = mergeConfig(
            { search: { includeDomains: ['a.edu'] } },
            { search: { includeDomains: ['b.org'] } },
        );
        expect(result).toEqual({ search: { includeDomains: ['b.org'] } });
    });

    it('skips undefined source values', () => {
        expect(mergeConfig({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
    });
});

describe('getDefaultConfig', () => {
    it('returns default config without overrides', () => {
        const config = getDefaultConfig();
        expect(config.version).toBe(1);
        expect(config.models.generators.provider).toBe('ollama');
        expect(config.embeddings.model).toBe('all-minilm');
    });

    it('applies partial overrides', () => {
        const config = getDefaultConfig({ study: { quizQuestions: 12 } });
        expect(config.study.quizQuestions).toBe(12);
        expect(config.study.flashcards).toBe(10);
    });

    it('does not share nested objects with DEFAULT_CONFIG', () => {
        const config = getDefaultConfig();
        config.study.flashcards = 99;
        expect(DEFAULT_CONFIG.study.flashcards).toBe(10);
    });
});
