import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { GenerationAdapter, validateTranscript } from '../GenerationAdapter.js';
import { MockStrategy } from '../MockStrategy.js';
import { composeOpening } from '../DiscussionPromptBuilder.js';
import { GenerationFailed, MalformedOutputError } from '../errors.js';
import type { IGenerationStrategy } from '../interfaces/index.js';
import { FakeStrategy, hangUntilAborted, line, makeRequest, steppingClock } from './helpers/fixtures.js';

const T0 = '2026-01-01T00:00:00.000Z';
const LATER = '2026-01-01T00:00:05.000Z';

function succeeding(name: string, available = true): FakeStrategy {
  return new FakeStrategy({
    name,
    available,
    generate: async () => [line('Ada', `hello from ${name}`, LATER)],
  });
}

function failing(name: string, reason: string): FakeStrategy {
  return new FakeStrategy({
    name,
    generate: async () => {
      throw new Error(reason);
    },
  });
}

describe('GenerationAdapter', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses the first available strategy and prepends the opening line', async () => {
    const first = succeeding('first');
    const second = succeeding('second');
    const adapter = new GenerationAdapter([first, second], { timeoutMs: 1000, now: steppingClock() });

    const outcome = await adapter.generate(makeRequest());

    expect(outcome.strategy).toBe('first');
    expect(outcome.messages).toEqual([
      { speaker: 'system', content: composeOpening('Harbour expansion'), timestamp: T0 },
      { speaker: 'Ada', content: 'hello from first', timestamp: LATER },
    ]);
    expect(outcome.attempts).toEqual([
      { strategy: 'first', outcome: 'succeeded', durationMs: expect.any(Number) },
    ]);
    expect(second.calls).toBe(0);
  });

  it('reports strategies in the order they are tried', () => {
    const adapter = new GenerationAdapter([succeeding('a'), succeeding('b')], { timeoutMs: 1000 });
    expect(adapter.order).toEqual(['a', 'b']);
  });

  it('skips unavailable strategies without treating them as fallbacks', async () => {
    const offline = succeeding('offline', false);
    const online = succeeding('online');
    const onStatus = vi.fn();
    const adapter = new GenerationAdapter([offline, online], { timeoutMs: 1000, now: steppingClock() });

    const outcome = await adapter.generate(makeRequest(), { onStatus });

    expect(offline.calls).toBe(0);
    expect(outcome.strategy).toBe('online');
    expect(outcome.attempts[0]).toEqual({ strategy: 'offline', outcome: 'skipped', durationMs: 0 });
    expect(onStatus).toHaveBeenCalledTimes(1);
    expect(onStatus).toHaveBeenCalledWith('Trying online...', 'online');
  });

  it('treats a throwing availability check as unavailable', async () => {
    const broken: IGenerationStrategy = {
      name: 'broken',
      label: 'Broken',
      isAvailable: () => {
        throw new Error('no credentials file');
      },
      generate: async () => [],
    };
    const adapter = new GenerationAdapter([broken, succeeding('ok')], { timeoutMs: 1000, now: steppingClock() });

    const outcome = await adapter.generate(makeRequest());

    expect(outcome.strategy).toBe('ok');
    expect(outcome.attempts[0].outcome).toBe('skipped');
  });

  it('falls back after a failure and says so', async () => {
    const onStatus = vi.fn();
    const adapter = new GenerationAdapter([failing('a', 'boom'), succeeding('b')], { timeoutMs: 1000, now: steppingClock() });

    const outcome = await adapter.generate(makeRequest(), { onStatus });

    expect(outcome.strategy).toBe('b');
    expect(onStatus.mock.calls).toEqual([
      ['Trying a...', 'a'],
      ['Falling back: Trying b...', 'b'],
    ]);
    expect(outcome.attempts[0]).toMatchObject({ strategy: 'a', outcome: 'failed', reason: 'boom' });
  });

  it('aborts a strategy that overruns its timeout and moves on', async () => {
    const hanging = new FakeStrategy({ name: 'slow', generate: (_req, signal) => hangUntilAborted(signal) });
    const adapter = new GenerationAdapter([hanging, succeeding('fast')], { timeoutMs: 50, now: steppingClock() });

    const outcome = await adapter.generate(makeRequest());

    expect(outcome.strategy).toBe('fast');
    expect(hanging.lastSignal?.aborted).toBe(true);
    expect(outcome.attempts[0]).toMatchObject({
      strategy: 'slow',
      outcome: 'timed_out',
      reason: 'slow did not finish within 50ms',
    });
  });

  it('discards an empty transcript as malformed', async () => {
    const empty = new FakeStrategy({ name: 'empty', generate: async () => [] });
    const adapter = new GenerationAdapter([empty, succeeding('b')], { timeoutMs: 1000, now: steppingClock() });

    const outcome = await adapter.generate(makeRequest());

    expect(outcome.strategy).toBe('b');
    expect(outcome.attempts[0]).toMatchObject({ outcome: 'malformed', reason: 'Transcript has no messages' });
  });

  it('discards a transcript timestamped before its opening line', async () => {
    const stale = new FakeStrategy({
      name: 'stale',
      generate: async () => [line('Ada', 'too early', '2025-12-31T23:59:59.000Z')],
    });
    const adapter = new GenerationAdapter([stale, succeeding('b')], { timeoutMs: 1000, now: steppingClock() });

    const outcome = await adapter.generate(makeRequest());

    expect(outcome.attempts[0]).toMatchObject({
      outcome: 'malformed',
      reason: 'Message 1 is timestamped before the message preceding it',
    });
  });

  it('throws GenerationFailed listing every failed attempt', async () => {
    const adapter = new GenerationAdapter(
      [succeeding('off', false), failing('a', 'boom'), failing('b', 'bust')],
      { timeoutMs: 1000, now: steppingClock() },
    );

    const error = await adapter.generate(makeRequest()).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(GenerationFailed);
    if (!(error instanceof GenerationFailed)) return;
    expect(error.message).toBe('All generation strategies failed (a: boom; b: bust)');
    expect(error.attempts.map((a) => a.outcome)).toEqual(['skipped', 'failed', 'failed']);
  });

  it('throws GenerationFailed when nothing is available', async () => {
    const adapter = new GenerationAdapter([succeeding('off', false)], { timeoutMs: 1000 });
    await expect(adapter.generate(makeRequest())).rejects.toThrow('No generation strategy is available');
  });

  it('produces a complete transcript from the mock strategy alone', async () => {
    const clock = steppingClock();
    const adapter = new GenerationAdapter([new MockStrategy({ now: clock })], { timeoutMs: 1000, now: clock });

    const outcome = await adapter.generate(makeRequest());

    expect(outcome.strategy).toBe('mock');
    expect(outcome.messages.map((m) => m.speaker)).toEqual(['system', 'Ada', 'Bram', 'Ada', 'Bram']);
    expect(outcome.messages[1].content).toBe(
      'Speaking as someone methodical, my first thought on "Harbour expansion" is about harbour engineer.',
    );
    expect(outcome.messages[3].content).toBe(
      'Building on what Bram said, Ada would add one concrete next step for "Harbour expansion" before we move on.',
    );
    expect(outcome.messages.map((m) => m.timestamp)).toEqual([
      '2026-01-01T00:00:00.000Z',
      '2026-01-01T00:00:01.000Z',
      '2026-01-01T00:00:02.000Z',
      '2026-01-01T00:00:03.000Z',
      '2026-01-01T00:00:04.000Z',
    ]);
  });
});

describe('validateTranscript()', () => {
  it('accepts non-decreasing timestamps', () => {
    expect(() => validateTranscript([line('system', 'open', T0), line('Ada', 'same instant', T0)])).not.toThrow();
  });

  it('rejects a blank turn', () => {
    expect(() => validateTranscript([line('system', 'open', T0), line('Ada', '   ', LATER)]))
      .toThrow(new MalformedOutputError('Message 1 is blank'));
  });

  it('rejects an unparseable timestamp', () => {
    expect(() => validateTranscript([line('system', 'open', T0), line('Ada', 'hi', 'yesterday')]))
      .toThrow('Message 1 has an invalid timestamp');
  });
});
