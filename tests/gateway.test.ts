/**
 * Gateway Tests
 * A live gateway on a free loopback port, driven by ws clients and raw sockets
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { connect } from 'net';
import { WebSocket } from 'ws';
import { Gateway } from '../src/main/gateway';
import { requestPathname } from '../src/main/gateway/http-server';
import { JobManager } from '../src/main/jobs/job-manager';
import { toneWav } from './helpers/signals';

interface Frame {
  type: string;
  event?: string;
  ok?: boolean;
  seq?: number;
  error?: string;
  payload?: unknown;
}

interface PushedUpdate {
  jobId: string;
  status: string;
  progress: number;
  message: string;
}

function toFrame(raw: string): Frame {
  const value: unknown = JSON.parse(raw);
  if (typeof value !== 'object' || value === null || !('type' in value) || typeof value.type !== 'string') {
    throw new Error(`Unexpected frame: ${raw}`);
  }
  return {
    type: value.type,
    event: 'event' in value && typeof value.event === 'string' ? value.event : undefined,
    ok: 'ok' in value && typeof value.ok === 'boolean' ? value.ok : undefined,
    seq: 'seq' in value && typeof value.seq === 'number' ? value.seq : undefined,
    error: 'error' in value && typeof value.error === 'string' ? value.error : undefined,
    payload: 'payload' in value ? value.payload : undefined,
  };
}

function updateOf(frame: Frame): PushedUpdate | null {
  const p = frame.payload;
  if (
    frame.event !== 'job:updated' ||
    typeof p !== 'object' ||
    p === null ||
    !('jobId' in p && typeof p.jobId === 'string') ||
    !('status' in p && typeof p.status === 'string') ||
    !('progress' in p && typeof p.progress === 'number') ||
    !('message' in p && typeof p.message === 'string')
  ) {
    return null;
  }
  return { jobId: p.jobId, status: p.status, progress: p.progress, message: p.message };
}

/**
 * WebSocket client that keeps every frame it receives
 */
class FrameCollector {
  readonly frames: Frame[] = [];
  private waiters: Array<() => void> = [];

  private constructor(readonly ws: WebSocket) {
    ws.on('message', (data) => {
      this.frames.push(toFrame(data.toString()));
      for (const wake of this.waiters.splice(0)) wake();
    });
  }

  static async connect(port: number): Promise<FrameCollector> {
    const ws = new WebSocket(`ws://127.0.0.1:${port}`);
    const collector = new FrameCollector(ws);
    await new Promise<void>((resolve, reject) => {
      ws.once('open', () => resolve());
      ws.once('error', reject);
    });
    return collector;
  }

  send(message: unknown): void {
    this.ws.send(typeof message === 'string' ? message : JSON.stringify(message));
  }

  /**
   * First frame matching `predicate`, received already or yet to come
   */
  async waitFor(predicate: (frame: Frame) => boolean, timeoutMs = 15000): Promise<Frame> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const found = this.frames.find(predicate);
      if (found) return found;
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new Error('No matching frame arrived');
      }
      await new Promise<void>((resolve) => {
        const timer = setTimeout(resolve, remaining);
        this.waiters.push(() => {
          clearTimeout(timer);
          resolve();
        });
      });
    }
  }

  updatesFor(jobId: string): PushedUpdate[] {
    const updates: PushedUpdate[] = [];
    for (const frame of this.frames) {
      const update = updateOf(frame);
      if (update && update.jobId === jobId) updates.push(update);
    }
    return updates;
  }

  close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) return Promise.resolve();
    return new Promise((resolve) => {
      this.ws.once('close', () => resolve());
      this.ws.close();
    });
  }
}

function isCompletion(jobId: string): (frame: Frame) => boolean {
  return (frame) => {
    const update = updateOf(frame);
    return update !== null && update.jobId === jobId && update.status === 'completed';
  };
}

function isPong(frame: Frame): boolean {
  const p = frame.payload;
  return frame.type === 'res' && typeof p === 'object' && p !== null && 'pong' in p;
}

/**
 * Send raw bytes and collect the whole reply
 */
function rawRequest(port: number, request: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const socket = connect(port, '127.0.0.1', () => {
      socket.write(request);
    });
    const chunks: Buffer[] = [];
    socket.on('data', (chunk) => chunks.push(chunk));
    socket.on('end', () => resolve(Buffer.concat(chunks).toString('latin1')));
    socket.on('error', reject);
  });
}

describe('Gateway', () => {
  let jobs: JobManager;
  let gateway: Gateway;
  const clients: FrameCollector[] = [];

  const openClient = async (): Promise<FrameCollector> => {
    const client = await FrameCollector.connect(gateway.port);
    clients.push(client);
    return client;
  };

  beforeEach(async () => {
    jobs = new JobManager({ maxConcurrentJobs: 1 });
    gateway = new Gateway(jobs, { host: '127.0.0.1', port: 0, maxUploadBytes: 1024 * 1024 });
    await gateway.start();
  });

  afterEach(async () => {
    await Promise.all(clients.splice(0).map((client) => client.close()));
    await gateway.stop();
    await jobs.shutdown();
  });

  describe('lifecycle', () => {
    it('should bind a free port and stop cleanly', async () => {
      expect(gateway.isRunning).toBe(true);
      expect(gateway.port).toBeGreaterThan(0);

      await gateway.stop();
      expect(gateway.isRunning).toBe(false);
    });

    it('should reject start when the port is already in use', async () => {
      const second = new Gateway(jobs, { host: '127.0.0.1', port: gateway.port });

      await expect(second.start()).rejects.toThrow('EADDRINUSE');
      expect(second.isRunning).toBe(false);
      expect(gateway.isRunning).toBe(true);
    });

    it('should tell clients it is shutting down', async () => {
      const client = await openClient();
      const closed = new Promise<number>((resolve) => {
        client.ws.once('close', (code) => resolve(code));
      });

      await gateway.stop();

      const frame = await client.waitFor((f) => f.event === 'shutdown');
      expect(frame.payload).toEqual({ reason: 'gateway stopping' });
      expect(await closed).toBe(1001);
    });
  });

  describe('job events', () => {
    it('should push every update of a job with increasing seq', async () => {
      const client = await openClient();
      expect(gateway.clientCount).toBe(1);

      const { jobId } = jobs.submitConversion(toneWav(150, 0.1));
      await client.waitFor(isCompletion(jobId));

      const updates = client.updatesFor(jobId);
      expect(updates.map((u) => u.progress)).toEqual([0, 0, 10, 15, 25, 40, 85, 95, 100]);
      expect(updates[0]).toEqual({ jobId, status: 'queued', progress: 0, message: 'Job queued' });
      expect(updates[updates.length - 1]).toEqual({
        jobId,
        status: 'completed',
        progress: 100,
        message: 'Conversion completed',
      });

      const seqs = client.frames.map((f) => f.seq ?? 0);
      for (let i = 1; i < seqs.length; i++) {
        expect(seqs[i]).toBeGreaterThan(seqs[i - 1]);
      }
    });

    it('should only push subscribed jobs to a subscribed client', async () => {
      const filtered = await openClient();
      const open = await openClient();

      filtered.send({ type: 'subscribe', jobId: 'other-id' });
      const ack = await filtered.waitFor((f) => f.type === 'res');
      expect(ack).toEqual({
        type: 'res',
        ok: true,
        event: undefined,
        seq: undefined,
        error: undefined,
        payload: { subscriptions: ['other-id'] },
      });

      const { jobId } = jobs.submitConversion(toneWav(150, 0.1));
      await open.waitFor(isCompletion(jobId));

      // Replies follow anything already queued on the socket
      filtered.send({ type: 'ping' });
      await filtered.waitFor(isPong);

      expect(filtered.updatesFor(jobId)).toEqual([]);
      expect(filtered.frames).toHaveLength(2);
    });

    it('should send the current state to a late subscriber', async () => {
      const { jobId } = jobs.submitConversion(toneWav(150, 0.1));
      await jobs.waitFor(jobId);

      const client = await openClient();
      client.send({ type: 'subscribe', jobId });
      const event = await client.waitFor((f) => f.type === 'event');

      expect(client.frames[0].payload).toEqual({ subscriptions: [jobId] });
      expect(updateOf(event)).toEqual({
        jobId,
        status: 'completed',
        progress: 100,
        message: 'Conversion completed',
      });
    });

    it('should stop filtering once the last subscription is dropped', async () => {
      const client = await openClient();
      client.send({ type: 'subscribe', jobId: 'other-id' });
      client.send({ type: 'unsubscribe', jobId: 'other-id' });
      const ack = await client.waitFor((f) => f.type === 'res' && f !== client.frames[0]);
      expect(ack.payload).toEqual({ subscriptions: [] });

      const { jobId } = jobs.submitConversion(toneWav(150, 0.1));
      await client.waitFor(isCompletion(jobId));
      expect(client.updatesFor(jobId)).toHaveLength(9);
    });

    it('should answer an unrecognized message with an error', async () => {
      const client = await openClient();
      client.send('hello');

      const reply = await client.waitFor((f) => f.type === 'res');
      expect(reply.ok).toBe(false);
      expect(reply.error).toBe('Unrecognized message');
    });
  });

  describe('HTTP transport', () => {
    it('should serve the API on the same port', async () => {
      const res = await fetch(`http://127.0.0.1:${gateway.port}/health`);
      expect(res.status).toBe(200);
      expect(res.headers.get('access-control-allow-origin')).toBe('*');
      expect(await res.json()).toMatchObject({ status: 'healthy' });
    });

    it('should ignore a malformed Host header', async () => {
      const reply = await rawRequest(
        gateway.port,
        'GET /health HTTP/1.1\r\nHost: a b\r\nConnection: close\r\n\r\n'
      );
      expect(reply.startsWith('HTTP/1.1 200 OK\r\n')).toBe(true);
      expect(gateway.isRunning).toBe(true);
    });
  });
});

describe('requestPathname', () => {
  it('should return the path of a request target', () => {
    expect(requestPathname('/jobs/abc?x=1')).toBe('/jobs/abc');
    expect(requestPathname(undefined)).toBe('/');
  });

  it('should return null for a target that does not parse', () => {
    expect(requestPathname('//a b/health')).toBeNull();
  });
});
