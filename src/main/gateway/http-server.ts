/**
 * @fileoverview HTTP API for the Voice Reshaper gateway
 * @module gateway/http-server
 *
 * @description
 * REST endpoints for submitting conversion and cloning jobs, polling them
 * and downloading results. Audio travels as base64-encoded WAV inside JSON.
 *
 * - GET  /health
 * - GET  /speakers
 * - POST /convert          { audio, targetSpeaker?, conversionStrength? }
 * - POST /clone            { referenceAudio, targetAudio, similarityThreshold? }
 * - GET  /jobs/:id
 * - GET  /jobs/:id/result
 * - GET  /queue/status
 *
 * Routing is separated from the socket layer: `handleApiRequest` maps a
 * method, path and raw body to an `ApiResponse`, and `addHttpRoutes`
 * adapts it to a Node HTTP server.
 */

import { IncomingMessage, ServerResponse, Server } from 'http';
import type { JobManager } from '../jobs/job-manager';
import { DEFAULT_CONVERSION_STRENGTH, DEFAULT_SIMILARITY_THRESHOLD } from '../jobs/job-manager';
import type { SpeakerPreset } from '../../shared/types/voice';
import type { ConversionParams, CloningParams } from '../../shared/types/job';
import { DEFAULT_SPEAKER_ID } from '../voice/speaker-presets';
import { NotFoundError, ReshaperError } from '../utils/errors';
import { getErrorMessage } from '../../shared/utils';
import { createModuleLogger } from '../utils/logger';

const logger = createModuleLogger('HTTPServer');

// =============================================================================
// Types
// =============================================================================

/**
 * Everything the routes need from the running service
 */
export interface ApiContext {
  jobs: JobManager;
  listSpeakers: () => SpeakerPreset[];
  /** Largest accepted decoded audio file */
  maxUploadBytes: number;
  /** Service start time (ms since epoch) */
  startTime: number;
}

export interface ApiRequest {
  method: string;
  pathname: string;
  body?: Buffer;
}

export interface ApiResponse {
  status: number;
  /** JSON payload; ignored when `body` is set */
  json?: unknown;
  body?: Buffer;
  contentType?: string;
  headers?: Record<string, string>;
}

type RouteHandler = (
  request: ApiRequest,
  params: string[],
  ctx: ApiContext
) => Promise<ApiResponse> | ApiResponse;

interface Route {
  method: 'GET' | 'POST';
  pattern: RegExp | string;
  handler: RouteHandler;
}

/**
 * Input validation result
 */
interface ValidationResult<T> {
  valid: boolean;
  sanitized?: T;
  error?: string;
}

// =============================================================================
// Validation
// =============================================================================

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const DATA_URI_PREFIX = /^data:[^;,]*;base64,/;

function jsonError(status: number, error: string): ApiResponse {
  return { status, json: { error } };
}

function parseJsonObject(body: Buffer | undefined): ValidationResult<Record<string, unknown>> {
  if (!body || body.length === 0) {
    return { valid: false, error: 'Request body is required' };
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString('utf8'));
  } catch {
    return { valid: false, error: 'Invalid JSON body' };
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { valid: false, error: 'Request body must be a JSON object' };
  }
  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(parsed)) {
    fields[key] = value;
  }
  return { valid: true, sanitized: fields };
}

/**
 * Decode a base64 (optionally data-URI) audio field
 */
export function validateAudioField(
  value: unknown,
  field: string,
  maxBytes: number
): ValidationResult<Buffer> {
  if (typeof value !== 'string' || value.trim() === '') {
    return { valid: false, error: `${field} is required` };
  }
  const encoded = value.replace(DATA_URI_PREFIX, '').replace(/\s+/g, '');
  if (encoded.length === 0 || encoded.length % 4 === 1 || !BASE64_PATTERN.test(encoded)) {
    return { valid: false, error: `${field} must be base64-encoded audio` };
  }
  const decoded = Buffer.from(encoded, 'base64');
  if (decoded.length === 0) {
    return { valid: false, error: `${field} is empty` };
  }
  if (decoded.length > maxBytes) {
    return { valid: false, error: `${field} exceeds the upload limit of ${maxBytes} bytes` };
  }
  return { valid: true, sanitized: decoded };
}

/**
 * Optional number in [0, 1]
 */
export function validateBlendField(
  value: unknown,
  field: string,
  fallback: number
): ValidationResult<number> {
  if (value === undefined || value === null) {
    return { valid: true, sanitized: fallback };
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
    return { valid: false, error: `${field} must be a number between 0 and 1` };
  }
  return { valid: true, sanitized: value };
}

function validateSpeakerField(value: unknown): ValidationResult<string> {
  if (value === undefined || value === null) {
    return { valid: true, sanitized: DEFAULT_SPEAKER_ID };
  }
  if (typeof value !== 'string' || value.length === 0 || value.length > 64) {
    return { valid: false, error: 'targetSpeaker must be a non-empty string' };
  }
  return { valid: true, sanitized: value };
}

/**
 * Map a thrown error to an HTTP response
 */
function errorResponse(error: unknown): ApiResponse {
  if (error instanceof NotFoundError) {
    return jsonError(404, error.message);
  }
  if (error instanceof ReshaperError) {
    if (error.code === 'INPUT_ERROR') return jsonError(400, error.message);
    if (error.code === 'SHUTTING_DOWN') return jsonError(503, error.message);
  }
  logger.error('Route handler error', { error: getErrorMessage(error) });
  return jsonError(500, 'Internal server error');
}

// =============================================================================
// Routes
// =============================================================================

const routes: Route[] = [];

/**
 * Register an API route
 */
function registerRoute(method: Route['method'], pattern: string | RegExp, handler: RouteHandler): void {
  routes.push({ method, pattern, handler });
}

registerRoute('GET', '/health', (_request, _params, ctx) => ({
  status: 200,
  json: {
    status: 'healthy',
    uptime: Date.now() - ctx.startTime,
    queue: ctx.jobs.getStats(),
  },
}));

registerRoute('GET', '/speakers', (_request, _params, ctx) => ({
  status: 200,
  json: { speakers: ctx.listSpeakers() },
}));

registerRoute('POST', '/convert', (request, _params, ctx) => {
  const body = parseJsonObject(request.body);
  if (!body.valid || !body.sanitized) return jsonError(400, body.error ?? 'Invalid body');
  const fields = body.sanitized;

  const audio = validateAudioField(fields.audio, 'audio', ctx.maxUploadBytes);
  if (!audio.valid || !audio.sanitized) return jsonError(400, audio.error ?? 'Invalid audio');

  const speaker = validateSpeakerField(fields.targetSpeaker);
  if (speaker.sanitized === undefined) return jsonError(400, speaker.error ?? 'Invalid speaker');

  const strength = validateBlendField(
    fields.conversionStrength,
    'conversionStrength',
    DEFAULT_CONVERSION_STRENGTH
  );
  if (strength.sanitized === undefined) return jsonError(400, strength.error ?? 'Invalid strength');

  const params: ConversionParams = {
    targetSpeaker: speaker.sanitized,
    conversionStrength: strength.sanitized,
  };
  const submission = ctx.jobs.submitConversion(audio.sanitized, params);
  return { status: 202, json: submission };
});

registerRoute('POST', '/clone', (request, _params, ctx) => {
  const body = parseJsonObject(request.body);
  if (!body.valid || !body.sanitized) return jsonError(400, body.error ?? 'Invalid body');
  const fields = body.sanitized;

  const reference = validateAudioField(fields.referenceAudio, 'referenceAudio', ctx.maxUploadBytes);
  if (!reference.valid || !reference.sanitized) {
    return jsonError(400, reference.error ?? 'Invalid reference audio');
  }

  const target = validateAudioField(fields.targetAudio, 'targetAudio', ctx.maxUploadBytes);
  if (!target.valid || !target.sanitized) {
    return jsonError(400, target.error ?? 'Invalid target audio');
  }

  const similarity = validateBlendField(
    fields.similarityThreshold,
    'similarityThreshold',
    DEFAULT_SIMILARITY_THRESHOLD
  );
  if (similarity.sanitized === undefined) {
    return jsonError(400, similarity.error ?? 'Invalid similarity');
  }

  const params: CloningParams = { similarityThreshold: similarity.sanitized };
  const submission = ctx.jobs.submitCloning(reference.sanitized, target.sanitized, params);
  return { status: 202, json: submission };
});

registerRoute('GET', /^\/jobs\/([^/]+)$/, (_request, params, ctx) => ({
  status: 200,
  json: ctx.jobs.status(params[0]),
}));

registerRoute('GET', /^\/jobs\/([^/]+)\/result$/, async (_request, params, ctx) => {
  const jobId = params[0];
  const result = await ctx.jobs.getResult(jobId);
  if (!result) {
    const job = ctx.jobs.status(jobId);
    return { status: 409, json: { error: 'Job is not completed', status: job.status } };
  }
  return {
    status: 200,
    body: result,
    contentType: 'audio/wav',
    headers: { 'Content-Disposition': `attachment; filename="${jobId}.wav"` },
  };
});

registerRoute('GET', '/queue/status', (_request, _params, ctx) => ({
  status: 200,
  json: ctx.jobs.getStats(),
}));

// =============================================================================
// Dispatch
// =============================================================================

function safeDecode(part: string): string {
  try {
    return decodeURIComponent(part);
  } catch {
    return part;
  }
}

/**
 * Route a request. Unknown paths yield 404, a known path with the wrong method 405.
 */
export async function handleApiRequest(request: ApiRequest, ctx: ApiContext): Promise<ApiResponse> {
  let pathMatched = false;

  for (const route of routes) {
    let params: string[] | null = null;
    if (typeof route.pattern === 'string') {
      params = request.pathname === route.pattern ? [] : null;
    } else {
      const match = route.pattern.exec(request.pathname);
      params = match ? match.slice(1).map(safeDecode) : null;
    }
    if (!params) continue;

    pathMatched = true;
    if (route.method !== request.method) continue;

    try {
      return await route.handler(request, params, ctx);
    } catch (error) {
      return errorResponse(error);
    }
  }

  return pathMatched ? jsonError(405, 'Method not allowed') : jsonError(404, 'Not found');
}

// =============================================================================
// HTTP Server Integration
// =============================================================================

/**
 * Read a request body, rejecting bodies above `limit` bytes
 */
export function readBody(req: IncomingMessage, limit: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        reject(new RangeError(`Request body exceeds ${limit} bytes`));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });

    req.on('end', () => resolve(Buffer.concat(chunks)));
    req.on('error', reject);
  });
}

function writeResponse(res: ServerResponse, response: ApiResponse): void {
  const headers: Record<string, string> = { ...response.headers };
  if (response.body) {
    headers['Content-Type'] = response.contentType ?? 'application/octet-stream';
    res.writeHead(response.status, headers);
    res.end(response.body);
    return;
  }
  headers['Content-Type'] = 'application/json';
  res.writeHead(response.status, headers);
  res.end(JSON.stringify(response.json ?? {}));
}

/**
 * Path of a request target, or null when it does not parse. The Host header
 * is client-controlled so it never takes part.
 */
export function requestPathname(rawUrl: string | undefined): string | null {
  try {
    return new URL(rawUrl || '/', 'http://localhost').pathname;
  } catch {
    return null;
  }
}

/**
 * Attach the API to an HTTP server
 */
export function addHttpRoutes(server: Server, ctx: ApiContext): void {
  // Two base64 files plus JSON framing
  const bodyLimit = Math.ceil((ctx.maxUploadBytes * 4) / 3) * 2 + 64 * 1024;

  server.on('request', (req: IncomingMessage, res: ServerResponse) => {
    const pathname = requestPathname(req.url);
    const method = req.method || 'GET';

    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    if (pathname === null) {
      writeResponse(res, jsonError(400, 'Invalid request URL'));
      return;
    }

    const bodyPromise = method === 'POST' ? readBody(req, bodyLimit) : Promise.resolve(undefined);

    bodyPromise
      .then((body) => handleApiRequest({ method, pathname, body }, ctx))
      .then((response) => writeResponse(res, response))
      .catch((error: unknown) => {
        logger.warn('Request rejected', { path: pathname, error: getErrorMessage(error) });
        if (!res.headersSent) {
          writeResponse(res, jsonError(400, getErrorMessage(error)));
        }
      });
  });

  logger.info('HTTP routes added to gateway', { routes: routes.length });
}

export default addHttpRoutes;
