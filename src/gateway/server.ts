/**
 * Gateway - Gateway Server
 *
 * HTTP + WebSocket front of the verification gateway.
 * Uses Node.js built-in http module with a manual router.
 *
 * HTTP routes:
 *   public  - liveness and provider health
 *   client  - API key in `X-API-Key` (or bearer): verify, credits, usage
 *   admin   - `Authorization: Bearer <adminToken>`: keys, credits, services
 *
 * WebSocket subscribers receive `api_call` and `credit_balance` events.
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import pino from 'pino';
import type { Static, TSchema } from '@sinclair/typebox';
import {
  InvalidRequestError,
  isGatewayError,
  type ApiKeyGrant,
  type GatewayConfig,
  type UsageLogEntry,
} from '@verigate/core';
import type { CreditLedger } from '@verigate/ledger';

import { GatewayAuth, presentedApiKey } from './auth.js';
import type { HealthMonitor } from './health.js';
import {
  apiCallPayload,
  authToken,
  decode,
  encode,
  parseBody,
  serverMsg,
  CreateKeyBodySchema,
  TopUpBodySchema,
  VerifyBodySchema,
  type CreditBalancePayload,
  type ServerMessage,
} from './protocol.js';
import { grantCovers, type AccessGate } from '../pipeline/access-gate.js';
import type { KeyManager } from '../pipeline/key-manager.js';
import type { RequestPipeline } from '../pipeline/request-pipeline.js';
import type { ServiceRegistry } from '../pipeline/service-registry.js';
import type { UsageLogger } from '../pipeline/usage-logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GatewayServerOptions {
  config: GatewayConfig['gateway'];
  host?: string;
  port?: number;
  auth?: GatewayAuth;
  health: HealthMonitor;
  pipeline: RequestPipeline;
  gate: AccessGate;
  ledger: CreditLedger;
  services: ServiceRegistry;
  keys: KeyManager;
  usage: UsageLogger;
  logger?: pino.Logger;
}

type Access = 'public' | 'client' | 'admin';

interface RouteContext {
  req: IncomingMessage;
  res: ServerResponse;
  params: Record<string, string>;
  query: URLSearchParams;
}

interface Route {
  method: string;
  pattern: RegExp;
  access: Access;
  handler: (ctx: RouteContext) => Promise<void>;
}

/** Who a WebSocket connection is allowed to watch. */
type Subscriber = { scope: 'admin' } | { scope: 'caller'; callerId: string };

type BodyRead = { ok: true; value: unknown } | { ok: false; reason: 'too_large' | 'invalid_json' };

type TypedBody<T> = { ok: true; value: T } | { ok: false; error: InvalidRequestError; raw: unknown };

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const WS_AUTH_TIMEOUT_MS = 10_000;
const DEFAULT_LIST_LIMIT = 50;
const MAX_LIST_LIMIT = 500;

// ---------------------------------------------------------------------------
// GatewayServer
// ---------------------------------------------------------------------------

export class GatewayServer {
  private server: Server | null = null;
  private wss: WebSocketServer | null = null;
  private readonly host: string;
  private readonly port: number;
  private readonly maxBodyBytes: number;
  private readonly log: pino.Logger;

  // Subsystems
  private readonly auth: GatewayAuth;
  private readonly health: HealthMonitor;
  private readonly pipeline: RequestPipeline;
  private readonly gate: AccessGate;
  private readonly ledger: CreditLedger;
  private readonly services: ServiceRegistry;
  private readonly keys: KeyManager;
  private readonly usage: UsageLogger;

  // Route table
  private readonly routes: Route[] = [];

  // Authenticated WebSocket clients
  private readonly wsClients = new Map<WebSocket, Subscriber>();
  private unsubscribeUsage: (() => void) | null = null;

  constructor(options: GatewayServerOptions) {
    this.host = options.host ?? options.config.host;
    this.port = options.port ?? options.config.port;
    this.maxBodyBytes = options.config.maxBodyBytes;
    this.log = options.logger ?? pino({ name: 'verigate:gateway' });

    this.auth = options.auth ?? new GatewayAuth(options.config.adminToken);
    this.health = options.health;
    this.pipeline = options.pipeline;
    this.gate = options.gate;
    this.ledger = options.ledger;
    this.services = options.services;
    this.keys = options.keys;
    this.usage = options.usage;

    this.registerRoutes();
  }

  /**
   * Start the HTTP + WebSocket server. Resolves with the bound port.
   */
  async start(): Promise<number> {
    const server = createServer((req, res) => {
      this.handleHttpRequest(req, res).catch((err: unknown) => {
        this.log.error({ err, method: req.method, url: req.url }, 'Unhandled request error');
        this.sendJson(res, 500, { status: 'service_unavailable', code: 'INTERNAL', message: 'Internal error' });
      });
    });
    this.server = server;

    this.wss = new WebSocketServer({ server });
    this.wss.on('connection', (ws, req) => this.handleWsConnection(ws, req));

    this.unsubscribeUsage = this.usage.onEntry((entry) => this.publishUsage(entry));

    return new Promise<number>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        const address = server.address();
        const port = isAddressInfo(address) ? address.port : this.port;
        this.log.info({ host: this.host, port }, 'Gateway listening');
        resolve(port);
      });
    });
  }

  /**
   * Close every subscriber, then the listener.
   */
  async stop(): Promise<void> {
    this.unsubscribeUsage?.();
    this.unsubscribeUsage = null;

    for (const ws of this.wsClients.keys()) {
      ws.close(1001, 'Server shutting down');
    }
    this.wsClients.clear();

    if (this.wss) {
      this.wss.close();
      this.wss = null;
    }

    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
    this.log.info('Gateway stopped');
  }

  /** Number of authenticated WebSocket subscribers. */
  get subscriberCount(): number {
    return this.wsClients.size;
  }

  // -----------------------------------------------------------------------
  // HTTP Request Handler
  // -----------------------------------------------------------------------

  private async handleHttpRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const start = Date.now();
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', 'http://gateway.local');

    this.setCorsHeaders(res);

    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    for (const route of this.routes) {
      if (route.method !== method) continue;

      const match = url.pathname.match(route.pattern);
      if (!match) continue;

      if (route.access === 'admin' && !this.auth.validateAdmin(req)) {
        this.sendJson(res, 401, { status: 'unauthenticated', code: 'UNAUTHENTICATED', message: 'Admin token required' });
        return;
      }

      const params: Record<string, string> = {};
      if (match.groups) {
        for (const [name, value] of Object.entries(match.groups)) {
          if (value !== undefined) params[name] = decodeURIComponent(value);
        }
      }

      try {
        await route.handler({ req, res, params, query: url.searchParams });
      } catch (err: unknown) {
        this.sendError(res, err, `${method} ${url.pathname}`);
      }

      this.log.debug({ method, path: url.pathname, status: res.statusCode, ms: Date.now() - start }, 'HTTP request');
      return;
    }

    this.sendJson(res, 404, { status: 'not_found', code: 'ROUTE_NOT_FOUND', message: 'Not found' });
  }

  // -----------------------------------------------------------------------
  // WebSocket Handler
  // -----------------------------------------------------------------------

  private handleWsConnection(ws: WebSocket, req: IncomingMessage): void {
    const ip = req.socket.remoteAddress ?? 'unknown';
    this.log.debug({ ip }, 'WebSocket connected');

    // The first message must be an auth frame
    const authTimeout = setTimeout(() => {
      if (!this.wsClients.has(ws)) {
        ws.close(4001, 'Authentication timeout');
      }
    }, WS_AUTH_TIMEOUT_MS);

    ws.once('message', (data: RawData) => {
      clearTimeout(authTimeout);
      this.authenticateWs(ws, data).catch((err: unknown) => {
        this.log.error({ ip, err }, 'WebSocket authentication failed');
        ws.close(1011, 'Internal error');
      });
    });

    ws.on('close', () => {
      clearTimeout(authTimeout);
      this.wsClients.delete(ws);
      this.log.debug({ ip }, 'WebSocket disconnected');
    });

    ws.on('error', (err) => {
      this.log.warn({ ip, err: err.message }, 'WebSocket error');
      this.wsClients.delete(ws);
    });
  }

  private async authenticateWs(ws: WebSocket, data: RawData): Promise<void> {
    const msg = decode(rawText(data));
    const token = msg ? authToken(msg) : null;
    if (!msg || !token) {
      ws.close(4001, 'Invalid auth frame');
      return;
    }

    let subscriber: Subscriber;
    if (this.auth.isAdminToken(token)) {
      subscriber = { scope: 'admin' };
    } else {
      try {
        const grant = await this.gate.authenticate(token);
        subscriber = { scope: 'caller', callerId: grant.callerId };
      } catch (err: unknown) {
        if (!isGatewayError(err)) throw err;
        ws.close(4001, 'Invalid token');
        return;
      }
    }

    if (ws.readyState !== WebSocket.OPEN) return;

    this.wsClients.set(ws, subscriber);
    ws.send(encode(serverMsg('status', msg.id, { authenticated: true, scope: subscriber.scope })));
    ws.on('message', (raw: RawData) => this.handleWsMessage(ws, raw));
  }

  private handleWsMessage(ws: WebSocket, data: RawData): void {
    const msg = decode(rawText(data));
    if (!msg) {
      ws.send(encode(serverMsg('error', '0', { code: 'INVALID_MESSAGE', message: 'Invalid message format' })));
      return;
    }

    switch (msg.type) {
      case 'ping':
        ws.send(encode(serverMsg('pong', msg.id, { timestamp: Date.now() })));
        break;

      case 'auth':
        ws.send(encode(serverMsg('error', msg.id, { code: 'ALREADY_AUTHENTICATED', message: 'Already authenticated' })));
        break;
    }
  }

  /**
   * Send a message to every subscriber allowed to see `callerId`'s events.
   */
  broadcast(msg: ServerMessage, callerId: string | null): void {
    const data = encode(msg);
    for (const [ws, subscriber] of this.wsClients) {
      if (ws.readyState !== WebSocket.OPEN) continue;
      if (subscriber.scope === 'caller' && subscriber.callerId !== callerId) continue;
      ws.send(data);
    }
  }

  private publishUsage(entry: UsageLogEntry): void {
    this.broadcast(serverMsg('api_call', '0', apiCallPayload(entry)), entry.callerId);
    if (entry.callerId !== null && entry.balanceAfter !== null) {
      this.publishBalance({ callerId: entry.callerId, balance: entry.balanceAfter });
    }
  }

  private publishBalance(payload: CreditBalancePayload): void {
    this.broadcast(serverMsg('credit_balance', '0', payload), payload.callerId);
  }

  // -----------------------------------------------------------------------
  // Route Registration
  // -----------------------------------------------------------------------

  private registerRoutes(): void {
    // Health
    this.addRoute('GET', /^\/health$/, 'public', this.handleHealth);
    this.addRoute('GET', /^\/health\/providers$/, 'public', this.handleProviderHealth);

    // Client
    this.addRoute('POST', /^\/api\/v1\/verify$/, 'client', this.handleVerify);
    this.addRoute('GET', /^\/api\/v1\/credits$/, 'client', this.handleClientCredits);
    this.addRoute('GET', /^\/api\/v1\/usage$/, 'client', this.handleClientUsage);
    this.addRoute('GET', /^\/api\/v1\/services$/, 'client', this.handleClientServices);

    // Admin - keys
    this.addRoute('GET', /^\/api\/v1\/admin\/keys$/, 'admin', this.handleListKeys);
    this.addRoute('POST', /^\/api\/v1\/admin\/keys$/, 'admin', this.handleCreateKey);
    this.addRoute('DELETE', /^\/api\/v1\/admin\/keys\/(?<keyId>[^/]+)$/, 'admin', this.handleRevokeKey);
    this.addRoute(
      'POST',
      /^\/api\/v1\/admin\/keys\/(?<keyId>[^/]+)\/services\/(?<serviceId>[^/]+)$/,
      'admin',
      this.handleGrantService,
    );
    this.addRoute(
      'DELETE',
      /^\/api\/v1\/admin\/keys\/(?<keyId>[^/]+)\/services\/(?<serviceId>[^/]+)$/,
      'admin',
      this.handleRevokeService,
    );

    // Admin - credits
    this.addRoute('GET', /^\/api\/v1\/admin\/credits\/(?<callerId>[^/]+)$/, 'admin', this.handleGetCredits);
    this.addRoute('POST', /^\/api\/v1\/admin\/credits\/(?<callerId>[^/]+)$/, 'admin', this.handleTopUp);

    // Admin - callers
    this.addRoute('GET', /^\/api\/v1\/admin\/callers\/suspended$/, 'admin', this.handleListSuspended);
    this.addRoute('POST', /^\/api\/v1\/admin\/callers\/(?<callerId>[^/]+)\/suspend$/, 'admin', this.handleSuspend);
    this.addRoute('POST', /^\/api\/v1\/admin\/callers\/(?<callerId>[^/]+)\/reactivate$/, 'admin', this.handleReactivate);

    // Admin - services
    this.addRoute('GET', /^\/api\/v1\/admin\/services$/, 'admin', this.handleListServices);
    this.addRoute('POST', /^\/api\/v1\/admin\/services\/(?<serviceId>[^/]+)\/enable$/, 'admin', this.handleEnableService);
    this.addRoute('POST', /^\/api\/v1\/admin\/services\/(?<serviceId>[^/]+)\/disable$/, 'admin', this.handleDisableService);

    // Admin - usage
    this.addRoute('GET', /^\/api\/v1\/admin\/usage$/, 'admin', this.handleAdminUsage);
  }

  private addRoute(method: string, pattern: RegExp, access: Access, handler: (ctx: RouteContext) => Promise<void>): void {
    this.routes.push({ method, pattern, access, handler: handler.bind(this) });
  }

  // -----------------------------------------------------------------------
  // Route Handlers - public
  // -----------------------------------------------------------------------

  private async handleHealth({ res }: RouteContext): Promise<void> {
    this.sendJson(res, 200, this.health.getLiveness());
  }

  private async handleProviderHealth({ res, query }: RouteContext): Promise<void> {
    const report = query.get('refresh') === 'true' ? await this.health.check() : this.health.getReport();
    this.sendJson(res, report.status === 'down' ? 503 : 200, report);
  }

  // -----------------------------------------------------------------------
  // Route Handlers - client
  // -----------------------------------------------------------------------

  private async handleVerify({ req, res }: RouteContext): Promise<void> {
    const apiKey = presentedApiKey(req);
    const parsed = await this.parseTypedBody(req, VerifyBodySchema);
    if (!parsed.ok) {
      const { httpStatus, ...payload } = await this.pipeline.reject(apiKey, verifyFields(parsed.raw), parsed.error);
      this.sendJson(res, httpStatus, payload);
      return;
    }
    const body = parsed.value;

    // Abort resolution if the caller goes away before we answer
    const controller = new AbortController();
    const onClose = (): void => {
      if (!res.writableFinished) controller.abort();
    };
    res.on('close', onClose);

    try {
      const result = await this.pipeline.execute({
        apiKey,
        serviceId: body.serviceId,
        lookupKey: body.lookupKey,
        signal: controller.signal,
      });
      const { httpStatus, ...payload } = result;
      this.sendJson(res, httpStatus, payload);
    } finally {
      res.off('close', onClose);
    }
  }

  private async handleClientCredits({ req, res }: RouteContext): Promise<void> {
    const grant = await this.authenticateClient(req);
    const account = await this.ledger.getAccount(grant.callerId);
    this.sendJson(res, 200, { callerId: account.callerId, balance: account.balance });
  }

  private async handleClientUsage({ req, res, query }: RouteContext): Promise<void> {
    const grant = await this.authenticateClient(req);
    const entries = await this.usage.listByCaller(grant.callerId, parseLimit(query));
    this.sendJson(res, 200, { entries });
  }

  private async handleClientServices({ req, res }: RouteContext): Promise<void> {
    const grant = await this.authenticateClient(req);
    const services = this.services
      .list()
      .filter((s) => grantCovers(grant, s.id))
      .map((s) => ({ id: s.id, name: s.name, active: s.active, cost: s.cost, keyPattern: s.keyPattern ?? null }));
    this.sendJson(res, 200, { services });
  }

  // -----------------------------------------------------------------------
  // Route Handlers - admin
  // -----------------------------------------------------------------------

  private async handleListKeys({ res, query }: RouteContext): Promise<void> {
    const callerId = query.get('callerId');
    if (!callerId) {
      throw new InvalidRequestError('callerId query parameter is required');
    }
    this.sendJson(res, 200, { keys: await this.keys.listKeys(callerId) });
  }

  private async handleCreateKey({ req, res }: RouteContext): Promise<void> {
    const body = await this.readTypedBody(req, CreateKeyBodySchema);
    const created = await this.keys.createKey(body.callerId, body.name, body.services);
    this.sendJson(res, 201, created);
  }

  private async handleRevokeKey({ res, params }: RouteContext): Promise<void> {
    const keyId = requireParam(params, 'keyId');
    await this.keys.revokeKey(keyId);
    this.sendJson(res, 200, { success: true, keyId });
  }

  private async handleGrantService({ res, params }: RouteContext): Promise<void> {
    const key = await this.keys.grantService(requireParam(params, 'keyId'), requireParam(params, 'serviceId'));
    this.sendJson(res, 200, { key });
  }

  private async handleRevokeService({ res, params }: RouteContext): Promise<void> {
    const key = await this.keys.revokeService(requireParam(params, 'keyId'), requireParam(params, 'serviceId'));
    this.sendJson(res, 200, { key });
  }

  private async handleGetCredits({ res, params, query }: RouteContext): Promise<void> {
    const callerId = requireParam(params, 'callerId');
    const account = await this.ledger.getAccount(callerId);
    const history = await this.ledger.history(callerId, parseLimit(query));
    this.sendJson(res, 200, { callerId, balance: account.balance, history });
  }

  private async handleTopUp({ req, res, params }: RouteContext): Promise<void> {
    const callerId = requireParam(params, 'callerId');
    const body = await this.readTypedBody(req, TopUpBodySchema);
    const balance = await this.ledger.topUp(callerId, body.amount);
    this.publishBalance({ callerId, balance });
    this.sendJson(res, 200, { callerId, balance });
  }

  private async handleListSuspended({ res }: RouteContext): Promise<void> {
    this.sendJson(res, 200, { callers: await this.gate.listSuspended() });
  }

  private async handleSuspend({ res, params }: RouteContext): Promise<void> {
    const callerId = requireParam(params, 'callerId');
    const changed = await this.gate.setSuspended(callerId, true);
    for (const [ws, subscriber] of this.wsClients) {
      if (subscriber.scope === 'caller' && subscriber.callerId === callerId) {
        this.wsClients.delete(ws);
        ws.close(4003, 'Caller suspended');
      }
    }
    this.sendJson(res, 200, { callerId, suspended: true, changed });
  }

  private async handleReactivate({ res, params }: RouteContext): Promise<void> {
    const callerId = requireParam(params, 'callerId');
    const changed = await this.gate.setSuspended(callerId, false);
    this.sendJson(res, 200, { callerId, suspended: false, changed });
  }

  private async handleListServices({ res }: RouteContext): Promise<void> {
    this.sendJson(res, 200, { services: this.services.list() });
  }

  private async handleEnableService({ res, params }: RouteContext): Promise<void> {
    const service = await this.services.setActive(requireParam(params, 'serviceId'), true);
    this.sendJson(res, 200, { service });
  }

  private async handleDisableService({ res, params }: RouteContext): Promise<void> {
    const service = await this.services.setActive(requireParam(params, 'serviceId'), false);
    this.sendJson(res, 200, { service });
  }

  private async handleAdminUsage({ res, query }: RouteContext): Promise<void> {
    const callerId = query.get('callerId');
    const limit = parseLimit(query);
    const entries = callerId ? await this.usage.listByCaller(callerId, limit) : await this.usage.listRecent(limit);
    this.sendJson(res, 200, { entries });
  }

  // -----------------------------------------------------------------------
  // Helpers
  // -----------------------------------------------------------------------

  private authenticateClient(req: IncomingMessage): Promise<ApiKeyGrant> {
    return this.gate.authenticate(presentedApiKey(req));
  }

  /**
   * Read a JSON body and check it against `schema`; throws
   * InvalidRequestError on any mismatch.
   */
  private async readTypedBody<S extends TSchema>(req: IncomingMessage, schema: S): Promise<Static<S>> {
    const parsed = await this.parseTypedBody(req, schema);
    if (!parsed.ok) throw parsed.error;
    return parsed.value;
  }

  /** Like readTypedBody, but hands back the error and whatever JSON was read. */
  private async parseTypedBody<S extends TSchema>(req: IncomingMessage, schema: S): Promise<TypedBody<Static<S>>> {
    const read = await this.readBody(req);
    if (!read.ok) {
      const message =
        read.reason === 'too_large' ? `Request body exceeds ${this.maxBodyBytes} bytes` : 'Invalid JSON body';
      return { ok: false, error: new InvalidRequestError(message), raw: undefined };
    }
    const parsed = parseBody(schema, read.value);
    if (!parsed.ok) {
      return {
        ok: false,
        error: new InvalidRequestError('Request body failed validation', { errors: parsed.errors }),
        raw: read.value,
      };
    }
    return { ok: true, value: parsed.value };
  }

  /**
   * Set CORS headers for browser dashboards.
   */
  private setCorsHeaders(res: ServerResponse): void {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, X-API-Key');
    res.setHeader('Access-Control-Max-Age', '86400');
  }

  private sendError(res: ServerResponse, err: unknown, where: string): void {
    if (isGatewayError(err)) {
      this.sendJson(res, err.httpStatus, {
        status: err.status,
        code: err.code,
        message: err.message,
        details: err.context,
      });
      return;
    }
    this.log.error({ err, where }, 'Error handling request');
    this.sendJson(res, 500, { status: 'service_unavailable', code: 'INTERNAL', message: 'Internal error' });
  }

  /**
   * Send a JSON response.
   */
  private sendJson(res: ServerResponse, statusCode: number, data: unknown): void {
    if (res.headersSent || res.destroyed) return;

    const body = JSON.stringify(data);
    res.writeHead(statusCode, {
      'Content-Type': 'application/json',
      'Content-Length': Buffer.byteLength(body),
    });
    res.end(body);
  }

  /**
   * Read and parse a JSON request body, bounded by `maxBodyBytes`.
   */
  private readBody(req: IncomingMessage): Promise<BodyRead> {
    return new Promise((resolve) => {
      const chunks: Buffer[] = [];
      let totalLength = 0;
      let settled = false;

      const finish = (result: BodyRead): void => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      req.on('data', (chunk: Buffer) => {
        totalLength += chunk.length;
        if (totalLength > this.maxBodyBytes) {
          finish({ ok: false, reason: 'too_large' });
          return;
        }
        chunks.push(chunk);
      });

      req.on('end', () => {
        const text = Buffer.concat(chunks).toString('utf-8');
        if (!text.trim()) {
          finish({ ok: true, value: {} });
          return;
        }
        try {
          finish({ ok: true, value: JSON.parse(text) });
        } catch {
          finish({ ok: false, reason: 'invalid_json' });
        }
      });

      req.on('error', () => finish({ ok: false, reason: 'invalid_json' }));
    });
  }
}

// ---------------------------------------------------------------------------
// Module helpers
// ---------------------------------------------------------------------------

/** serviceId / lookupKey of a refused verify body, where it had them. */
function verifyFields(raw: unknown): { serviceId: string; lookupKey: string } {
  const fields = { serviceId: '', lookupKey: '' };
  if (typeof raw !== 'object' || raw === null) return fields;
  if ('serviceId' in raw && typeof raw.serviceId === 'string') fields.serviceId = raw.serviceId;
  if ('lookupKey' in raw && typeof raw.lookupKey === 'string') fields.lookupKey = raw.lookupKey.trim();
  return fields;
}

function isAddressInfo(value: string | AddressInfo | null): value is AddressInfo {
  return value !== null && typeof value === 'object';
}

function rawText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  return data.toString('utf-8');
}

function requireParam(params: Record<string, string>, name: string): string {
  const value = params[name];
  if (!value) {
    throw new InvalidRequestError(`Missing path parameter "${name}"`);
  }
  return value;
}

function parseLimit(query: URLSearchParams): number {
  const raw = query.get('limit');
  if (raw === null) return DEFAULT_LIST_LIMIT;
  const limit = Number.parseInt(raw, 10);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidRequestError('limit must be a positive integer');
  }
  return Math.min(limit, MAX_LIST_LIMIT);
}
