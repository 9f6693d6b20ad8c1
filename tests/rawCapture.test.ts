import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { RawCapture } from '../src/ima/rawCapture.js';
import type { StreamStats } from '../src/ima/stream.js';
import type { RawLogSettings } from '../src/ima/types.js';
import { silentLogger } from './helpers.js';

const clock = () => new Date(2026, 0, 2, 3, 4, 5, 6);

function stats(overrides: Partial<StreamStats> = {}): StreamStats {
  return {
    chunkCount: 2,
    parsedCount: 1,
    failedCount: 1,
    decodeFailures: 0,
    bytes: 8,
    elapsedMs: 1500,
    fullResponse: 'data: x\n',
    ...overrides,
  };
}

describe('RawCapture', () => {
  let dir: string;
  const settings = (overrides: Partial<RawLogSettings> = {}): RawLogSettings => ({
    enabled: true,
    dir,
    maxBytes: 1024,
    onSuccess: false,
    ...overrides,
  });

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'ima-raw-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes a metadata header and the raw body after a stream error', async () => {
    const capture = new RawCapture(settings(), silentLogger, clock);
    const file = await capture.persist({ traceId: 'abcd1234', attempt: 0, question: 'q', stats: stats({ streamError: 'Timeout' }) });
    expect(file).toBe(path.join(dir, 'sse_20260102_030405_006_abcd1234_attempt1.log'));

    const content = await readFile(path.join(dir, 'sse_20260102_030405_006_abcd1234_attempt1.log'), 'utf8');
    const split = content.indexOf('\n\n');
    expect(JSON.parse(content.slice(0, split))).toMatchObject({
      traceId: 'abcd1234',
      attempt: 1,
      question: 'q',
      chunkCount: 2,
      elapsedSeconds: 1.5,
      responseBytes: 8,
      truncated: false,
      streamError: 'Timeout',
    });
    expect(content.slice(split + 2)).toBe('data: x\n');
  });

  it('truncates the body at the byte limit', async () => {
    const capture = new RawCapture(settings({ maxBytes: 4 }), silentLogger, clock);
    const file = await capture.persist({ traceId: 't', attempt: 1, stats: stats({ streamError: 'x' }) });
    const content = await readFile(file ?? '', 'utf8');
    expect(content.endsWith('\n\ndata')).toBe(true);
    expect(content).toContain('"truncated": true');
    expect(path.basename(file ?? '')).toBe('sse_20260102_030405_006_t_attempt2.log');
  });

  it('skips clean streams unless asked to keep them', async () => {
    expect(await new RawCapture(settings(), silentLogger, clock).persist({ traceId: 't', attempt: 0, stats: stats() })).toBeUndefined();
    expect(await readdir(dir)).toEqual([]);

    const keep = new RawCapture(settings({ onSuccess: true }), silentLogger, clock);
    expect(await keep.persist({ traceId: 't', attempt: 0, stats: stats() })).toBeDefined();
  });

  it('does nothing when disabled', async () => {
    const capture = new RawCapture(settings({ enabled: false, onSuccess: true }), silentLogger, clock);
    expect(capture.shouldPersist('error')).toBe(false);
    expect(await capture.persist({ traceId: 't', attempt: 0, stats: stats({ streamError: 'x' }) })).toBeUndefined();
  });
});
