/**
 * Job and Result Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import { tmpdir } from 'os';
import { join } from 'path';
import { InMemoryJobStore } from '../src/main/jobs/job-store';
import { FileResultStore, InMemoryResultStore } from '../src/main/jobs/result-store';
import type { Job } from '../src/shared/types/job';

function makeJob(id: string, createdAt: number = 1): Job {
  return {
    id,
    kind: 'convert',
    status: 'queued',
    progress: 0,
    message: 'Job queued',
    params: { targetSpeaker: 'custom', conversionStrength: 0.8 },
    createdAt,
  };
}

describe('InMemoryJobStore', () => {
  let store: InMemoryJobStore;

  beforeEach(() => {
    store = new InMemoryJobStore();
  });

  it('should create and read a job', () => {
    store.create(makeJob('a'));
    expect(store.get('a')).toEqual(makeJob('a'));
    expect(store.get('b')).toBeUndefined();
  });

  it('should refuse duplicate ids', () => {
    store.create(makeJob('a'));
    expect(() => store.create(makeJob('a'))).toThrow('Job already exists: a');
  });

  it('should merge updates and return the new record', () => {
    store.create(makeJob('a'));
    const updated = store.update('a', { status: 'processing', progress: 10, startedAt: 5 });

    expect(updated).toMatchObject({ id: 'a', status: 'processing', progress: 10, startedAt: 5 });
    expect(store.get('a')?.message).toBe('Job queued');
    expect(store.update('missing', { progress: 1 })).toBeUndefined();
  });

  it('should hand out detached copies', () => {
    const job = makeJob('a');
    store.create(job);
    job.progress = 50;

    const copy = store.get('a');
    if (copy) copy.status = 'failed';

    expect(store.get('a')).toMatchObject({ progress: 0, status: 'queued' });
  });

  it('should list and delete jobs', () => {
    store.create(makeJob('a'));
    store.create(makeJob('b'));
    expect(store.list().map((job) => job.id)).toEqual(['a', 'b']);
    expect(store.delete('a')).toBe(true);
    expect(store.delete('a')).toBe(false);
    expect(store.list()).toHaveLength(1);
  });
});

describe('InMemoryResultStore', () => {
  it('should store bytes under a .wav reference', async () => {
    const results = new InMemoryResultStore();
    const ref = await results.put('job-1', Buffer.from('RIFF'));

    expect(ref).toBe('job-1.wav');
    expect((await results.get(ref))?.toString()).toBe('RIFF');
    expect(await results.delete(ref)).toBe(true);
    expect(await results.get(ref)).toBeUndefined();
  });

  it('should reject keys that are not path safe', async () => {
    const results = new InMemoryResultStore();
    await expect(results.put('../escape', Buffer.from('x'))).rejects.toThrow(
      'Invalid result key: ../escape'
    );
  });
});

describe('FileResultStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'reshaper-results-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('should write results into the output directory', async () => {
    const outputDir = join(dir, 'outputs');
    const results = new FileResultStore(outputDir);
    const ref = await results.put('job-1', Buffer.from('RIFFdata'));

    expect(ref).toBe('job-1.wav');
    expect(await fs.pathExists(join(outputDir, 'job-1.wav'))).toBe(true);
    expect((await results.get(ref))?.toString()).toBe('RIFFdata');
  });

  it('should delete stored results', async () => {
    const results = new FileResultStore(dir);
    const ref = await results.put('job-2', Buffer.from('x'));

    expect(await results.delete(ref)).toBe(true);
    expect(await results.delete(ref)).toBe(false);
    expect(await results.get(ref)).toBeUndefined();
  });

  it('should not resolve references outside the directory', async () => {
    const results = new FileResultStore(dir);
    expect(await results.get('../secret.wav')).toBeUndefined();
    expect(await results.get('job-1.txt')).toBeUndefined();
    expect(await results.delete('../secret.wav')).toBe(false);
  });
});
