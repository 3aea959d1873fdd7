import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fc from 'fast-check';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { SessionStore, decodeSessionState } from './session-store.js';
import { createEmptyAnswers, type AnswerSet } from '../types/common.js';
import { WARNING_MESSAGES } from '../constants/messages.js';
import { silentLogger, type Logger } from '../utils/logger.js';

const createSpyLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const sampleAnswers: AnswerSet = {
  commitType: 'feat',
  scope: 'api',
  shortDescription: 'add health endpoint',
  longDescription: 'Line one.\nLine two.',
  breakingChange: true,
  breakingChangeNote: 'drops /status',
};

describe('SessionStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'git-cc-session-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should place the swap file in the repository root', () => {
    expect(new SessionStore(root, silentLogger).filePath).toBe(join(root, '.git-cc.swp'));
  });

  it('should report a missing file and load empty answers', async () => {
    const store = new SessionStore(root, silentLogger);

    expect(await store.read()).toEqual({ status: 'missing' });
    expect(await store.load()).toEqual(createEmptyAnswers());
  });

  it('should restore saved answers and announce it', async () => {
    const logger = createSpyLogger();
    const store = new SessionStore(root, logger);

    expect(await store.save(sampleAnswers)).toBe(true);

    expect(await store.load()).toEqual(sampleAnswers);
    expect(logger.warn).toHaveBeenCalledWith(WARNING_MESSAGES.SESSION_RESTORED);
  });

  it('should write field-tagged JSON with a version', async () => {
    const store = new SessionStore(root, silentLogger);
    await store.save(sampleAnswers);

    const persisted: unknown = JSON.parse(await readFile(store.filePath, 'utf-8'));

    expect(persisted).toEqual({
      version: 1,
      commit_type: 'feat',
      scope: 'api',
      short_description: 'add health endpoint',
      long_description: 'Line one.\nLine two.',
      breaking_change: true,
      breaking_change_note: 'drops /status',
    });
  });

  it('should leave no temporary files behind', async () => {
    const store = new SessionStore(root, silentLogger);

    await store.save(sampleAnswers);
    await store.save({ ...sampleAnswers, scope: 'cli' });

    expect(await readdir(root)).toEqual(['.git-cc.swp']);
    expect((await store.load()).scope).toBe('cli');
  });

  it('should replace a temp file left by an interrupted save', async () => {
    const store = new SessionStore(root, silentLogger);
    await writeFile(join(root, '.git-cc.swp.tmp'), '{"commit_type": "fe', 'utf-8');

    expect(await store.save(sampleAnswers)).toBe(true);

    expect(await readdir(root)).toEqual(['.git-cc.swp']);
    expect(await store.load()).toEqual(sampleAnswers);
  });

  it('should not announce a restore when no field carried a value', async () => {
    const logger = createSpyLogger();
    const store = new SessionStore(root, logger);
    await writeFile(store.filePath, '{}', 'utf-8');

    expect(await store.load()).toEqual(createEmptyAnswers());
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should announce a restore when only the breaking flag was set', async () => {
    const logger = createSpyLogger();
    const store = new SessionStore(root, logger);
    await writeFile(store.filePath, JSON.stringify({ breaking_change: true }), 'utf-8');

    expect(await store.load()).toEqual({ ...createEmptyAnswers(), breakingChange: true });
    expect(logger.warn).toHaveBeenCalledWith(WARNING_MESSAGES.SESSION_RESTORED);
  });

  it('should treat invalid JSON as an empty session', async () => {
    const store = new SessionStore(root, silentLogger);
    await writeFile(store.filePath, '{"commit_type": "fe', 'utf-8');

    const result = await store.read();

    expect(result.status).toBe('corrupt');
    expect(await store.load()).toEqual(createEmptyAnswers());
  });

  it.each(['[1, 2]', '"feat"', 'null', '42'])('should treat %s as corrupt', async (content) => {
    const store = new SessionStore(root, silentLogger);
    await writeFile(store.filePath, content, 'utf-8');

    expect((await store.read()).status).toBe('corrupt');
    expect(await store.load()).toEqual(createEmptyAnswers());
  });

  it('should treat an unreadable path as corrupt without throwing', async () => {
    const store = new SessionStore(root, silentLogger);
    await mkdir(store.filePath);

    expect((await store.read()).status).toBe('corrupt');
    expect(await store.load()).toEqual(createEmptyAnswers());
  });

  it('should restore what it can from a partial record', async () => {
    const store = new SessionStore(root, silentLogger);
    await writeFile(
      store.filePath,
      JSON.stringify({ commit_type: 'fix', breaking_change: 'yes', added_later: 1 }),
      'utf-8'
    );

    expect(await store.load()).toEqual({ ...createEmptyAnswers(), commitType: 'fix' });
  });

  it('should report a failed save and keep going', async () => {
    const logger = createSpyLogger();
    const store = new SessionStore(join(root, 'missing-dir'), logger);

    expect(await store.save(sampleAnswers)).toBe(false);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(await readdir(root)).toEqual([]);
  });

  it('should clear the swap file and tolerate clearing twice', async () => {
    const store = new SessionStore(root, silentLogger);
    await store.save(sampleAnswers);

    await store.clear();
    await store.clear();

    expect(await store.read()).toEqual({ status: 'missing' });
  });

  it('should round-trip arbitrary answers', async () => {
    const store = new SessionStore(root, silentLogger);

    await fc.assert(
      fc.asyncProperty(
        fc.record({
          commitType: fc.string(),
          scope: fc.string(),
          shortDescription: fc.string(),
          longDescription: fc.string(),
          breakingChange: fc.boolean(),
          breakingChangeNote: fc.string(),
        }),
        async (answers) => {
          await store.save(answers);
          expect(await store.load()).toEqual(answers);
        }
      ),
      { numRuns: 50 }
    );
  });
});

describe('decodeSessionState', () => {
  it('should ignore an unknown version number and keep the fields', () => {
    const result = decodeSessionState(JSON.stringify({ version: 7, scope: 'api' }));

    expect(result).toEqual({
      status: 'restored',
      answers: { ...createEmptyAnswers(), scope: 'api' },
    });
  });
});
