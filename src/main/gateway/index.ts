/**
 * @fileoverview Voice Reshaper Gateway - HTTP API and job event push
 * @module gateway
 *
 * @description
 * One HTTP server carries both the REST API (see http-server.ts) and a
 * WebSocket endpoint. Every `job:updated` event from the JobManager is
 * pushed to connected sockets as
 * `{ type: 'event', event: 'job:updated', payload, seq }`.
 *
 * A socket receives all jobs until it subscribes; after
 * `{ type: 'subscribe', jobId }` it only receives the jobs it named.
 *
 * @example
 * const gateway = await startGateway(getJobManager(), { port: 8787 });
 * // later
 * await stopGateway();
 */

import { EventEmitter } from 'events';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { createServer, IncomingMessage, Server } from 'http';
import { v4 as uuidv4 } from 'uuid';
import { createModuleLogger } from '../utils/logger';
import { getErrorMessage } from '../../shared/utils';
import type { JobUpdate } from '../../shared/types/job';
import type { JobManager } from '../jobs/job-manager';
import { listSpeakerPresets } from '../voice/speaker-presets';
import { addHttpRoutes } from './http-server';

const logger = createModuleLogger('Gateway');

// =============================================================================
// Types and Interfaces
// =============================================================================

export interface GatewayConfig {
  /** Listen port; 0 picks a free port */
  port: number;
  /** Bind host (loopback by default) */
  host: string;
  /** Largest accepted decoded audio file */
  maxUploadBytes: number;
}

export const DEFAULT_GATEWAY_CONFIG: GatewayConfig = {
  port: 8787,
  host: '127.0.0.1',
  maxUploadBytes: 104857600,
};

/**
 * Connected WebSocket client
 */
export interface GatewayClient {
  id: string;
  ws: WebSocket;
  connectedAt: number;
  /** Job ids this client asked for; empty means every job */
  subscriptions: Set<string>;
}

/**
 * Server-pushed event
 */
export interface GatewayEvent {
  type: 'event';
  event: string;
  payload?: unknown;
  seq: number;
}

/**
 * Reply to a client message
 */
export interface GatewayResponse {
  type: 'res';
  ok: boolean;
  payload?: unknown;
  error?: string;
}

/**
 * Messages a client may send
 */
export type ClientMessage =
  | { type: 'subscribe'; jobId: string }
  | { type: 'unsubscribe'; jobId: string }
  | { type: 'ping' };

/**
 * Parse and validate a raw client message
 */
export function parseClientMessage(raw: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || !('type' in parsed)) {
    return null;
  }

  const type = parsed.type;
  if (type === 'ping') {
    return { type };
  }
  if (type === 'subscribe' || type === 'unsubscribe') {
    const jobId = 'jobId' in parsed ? parsed.jobId : undefined;
    if (typeof jobId === 'string' && jobId.length > 0) {
      return { type, jobId };
    }
  }
  return null;
}

/**
 * Whether a client with these subscriptions should receive an update for `jobId`
 */
export function wantsJob(subscriptions: ReadonlySet<string>, jobId: string): boolean {
  return subscriptions.size === 0 || subscriptions.has(jobId);
}

export interface GatewayEvents {
  started: () => void;
  stopped: () => void;
  'client-connected': (client: GatewayClient) => void;
  'client-disconnected': (clientId: string) => void;
  error: (error: Error) => void;
}

// =============================================================================
// Gateway Class
// =============================================================================

export class Gateway extends EventEmitter {
  private _config: GatewayConfig;
  private _jobs: JobManager;
  private _server: Server | null = null;
  private _wss: WebSocketServer | null = null;
  private _clients: Map<string, GatewayClient> = new Map();
  private _startTime: number = Date.now();
  private _eventSeq: number = 0;
  private _isRunning: boolean = false;
  private _unsubscribeJobs: (() => void) | null = null;

  constructor(jobs: JobManager, config: Partial<GatewayConfig> = {}) {
    super();
    this._jobs = jobs;
    this._config = { ...DEFAULT_GATEWAY_CONFIG, ...config };
  }

  // ===========================================================================
  // Lifecycle Methods
  // ===========================================================================

  /**
   * Start listening for HTTP and WebSocket connections
   */
  async start(): Promise<void> {
    if (this._isRunning) {
      logger.warn('Gateway already running');
      return;
    }

    const server = createServer();
    addHttpRoutes(server, {
      jobs: this._jobs,
      listSpeakers: listSpeakerPresets,
      maxUploadBytes: this._config.maxUploadBytes,
      startTime: this._startTime,
    });

    // Bind before the WebSocket server attaches; it forwards later server errors
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        logger.error('HTTP server error', { error: error.message });
        reject(error);
      };
      server.once('error', onError);
      server.listen(this._config.port, this._config.host, () => {
        server.off('error', onError);
        resolve();
      });
    });

    const wss = new WebSocketServer({ server });
    wss.on('connection', (ws, req) => {
      this._handleConnection(ws, req);
    });
    wss.on('error', (error) => {
      logger.error('WebSocket server error', { error: error.message });
      this._emitError(error);
    });

    this._server = server;
    this._wss = wss;
    this._unsubscribeJobs = this._jobs.onChange((update) => {
      this.broadcastJobUpdate(update);
    });

    this._startTime = Date.now();
    this._isRunning = true;
    logger.info('Gateway started', { host: this._config.host, port: this.port });
    this.emit('started');
  }

  /**
   * Close client sockets and stop listening
   */
  async stop(): Promise<void> {
    if (!this._isRunning) {
      return;
    }

    logger.info('Stopping gateway...');

    if (this._unsubscribeJobs) {
      this._unsubscribeJobs();
      this._unsubscribeJobs = null;
    }

    this.broadcast('shutdown', { reason: 'gateway stopping' });

    for (const client of this._clients.values()) {
      client.ws.close(1001, 'Gateway shutting down');
    }
    this._clients.clear();

    const wss = this._wss;
    if (wss) {
      await new Promise<void>((resolve) => {
        wss.close(() => resolve());
      });
      this._wss = null;
    }

    const server = this._server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
      this._server = null;
    }

    this._isRunning = false;
    logger.info('Gateway stopped');
    this.emit('stopped');
  }

  /**
   * Re-emit a server error for listeners, if any are attached
   */
  private _emitError(error: Error): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }

  // ===========================================================================
  // Connection Handling
  // ===========================================================================

  private _handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const client: GatewayClient = {
      id: uuidv4(),
      ws,
      connectedAt: Date.now(),
      subscriptions: new Set(),
    };
    this._clients.set(client.id, client);

    logger.debug('Client connected', { clientId: client.id, ip: req.socket.remoteAddress });

    ws.on('message', (data) => {
      this._handleMessage(client, data);
    });

    ws.on('close', () => {
      this._clients.delete(client.id);
      logger.debug('Client disconnected', { clientId: client.id });
      this.emit('client-disconnected', client.id);
    });

    ws.on('error', (error) => {
      logger.error('Client WebSocket error', { clientId: client.id, error: error.message });
    });

    this.emit('client-connected', client);
  }

  private _handleMessage(client: GatewayClient, data: RawData): void {
    const message = parseClientMessage(data.toString());
    if (!message) {
      this._send(client.ws, { type: 'res', ok: false, error: 'Unrecognized message' });
      return;
    }

    switch (message.type) {
      case 'ping':
        this._send(client.ws, { type: 'res', ok: true, payload: { pong: Date.now() } });
        return;
      case 'subscribe':
        client.subscriptions.add(message.jobId);
        break;
      case 'unsubscribe':
        client.subscriptions.delete(message.jobId);
        break;
    }

    this._send(client.ws, {
      type: 'res',
      ok: true,
      payload: { subscriptions: Array.from(client.subscriptions) },
    });

    // Send the current state so a late subscriber does not miss a finished job
    if (message.type === 'subscribe') {
      try {
        const job = this._jobs.status(message.jobId);
        this._sendEvent(client, 'job:updated', {
          jobId: job.id,
          status: job.status,
          progress: job.progress,
          message: job.message,
        });
      } catch (error) {
        logger.debug('Subscribed to unknown job', {
          jobId: message.jobId,
          error: getErrorMessage(error),
        });
      }
    }
  }

  private _send(ws: WebSocket, message: GatewayResponse | GatewayEvent): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  private _sendEvent(client: GatewayClient, event: string, payload: unknown): void {
    this._send(client.ws, { type: 'event', event, payload, seq: ++this._eventSeq });
  }

  // ===========================================================================
  // Broadcasting
  // ===========================================================================

  /**
   * Broadcast event to all connected clients
   *
   * @param filter - Optional filter function to select clients
   */
  broadcast(event: string, payload?: unknown, filter?: (client: GatewayClient) => boolean): void {
    const message: GatewayEvent = {
      type: 'event',
      event,
      payload,
      seq: ++this._eventSeq,
    };

    const data = JSON.stringify(message);

    for (const client of this._clients.values()) {
      if (client.ws.readyState === WebSocket.OPEN && (!filter || filter(client))) {
        client.ws.send(data);
      }
    }
  }

  broadcastJobUpdate(update: JobUpdate): void {
    this.broadcast('job:updated', update, (client) => wantsJob(client.subscriptions, update.jobId));
  }

  // ===========================================================================
  // Public Getters
  // ===========================================================================

  /**
   * Bound port (resolves port 0 after start)
   */
  get port(): number {
    const address = this._server?.address();
    return address && typeof address === 'object' ? address.port : this._config.port;
  }

  get isRunning(): boolean {
    return this._isRunning;
  }

  get clientCount(): number {
    return this._clients.size;
  }

  get config(): GatewayConfig {
    return { ...this._config };
  }

  // Type-safe event emitter methods
  on<K extends keyof GatewayEvents>(event: K, listener: GatewayEvents[K]): this {
    return super.on(event, listener);
  }

  emit<K extends keyof GatewayEvents>(event: K, ...args: Parameters<GatewayEvents[K]>): boolean {
    return super.emit(event, ...args);
  }
}

// =============================================================================
// Singleton Instance
// =============================================================================

let gatewayInstance: Gateway | null = null;

/**
 * Start the gateway with optional configuration
 */
export async function startGateway(
  jobs: JobManager,
  config?: Partial<GatewayConfig>
): Promise<Gateway> {
  if (gatewayInstance?.isRunning) {
    logger.warn('Gateway already running');
    return gatewayInstance;
  }

  gatewayInstance = new Gateway(jobs, config);
  await gatewayInstance.start();
  return gatewayInstance;
}

export function getGateway(): Gateway | null {
  return gatewayInstance;
}

/**
 * Stop the gateway
 */
export async function stopGateway(): Promise<void> {
  if (gatewayInstance) {
    await gatewayInstance.stop();
    gatewayInstance = null;
  }
}

export default Gateway;
