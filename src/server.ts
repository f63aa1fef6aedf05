import express, { type Express, type IRoute, type Request, type RequestHandler, type Response } from 'express';
import cors from 'cors';
import http from 'node:http';
import { randomUUID } from 'node:crypto';
import { Endpoint, endpointName, type HttpMethod } from './endpoint.js';
import { MockServerError, expectationsFailedError, registrationClosedError } from './errors.js';
import { RequestLogger } from './logger.js';
import { bodyText, queryOf, type Matcher } from './matchers.js';
import { FailureCollector, type TestReporter } from './reporter.js';
import { resolveConfig, type MockServerConfig, type PartialDeep } from './config.js';
import type { Scenario } from './scenario.js';

/** Anything with a node:test style `after` hook. */
export interface CleanupContext {
  after(fn: () => Promise<void>): void;
}

function bindMethod(route: IRoute, method: HttpMethod, handler: RequestHandler) {
  switch (method) {
    case 'GET':
      route.get(handler);
      break;
    case 'POST':
      route.post(handler);
      break;
    case 'PUT':
      route.put(handler);
      break;
    case 'PATCH':
      route.patch(handler);
      break;
    case 'DELETE':
      route.delete(handler);
      break;
    case 'HEAD':
      route.head(handler);
      break;
    case 'OPTIONS':
      route.options(handler);
      break;
  }
}

/**
 * HTTP test double. Declare endpoints and their scenarios, `start()`, exercise the code
 * under test against `url()`, then `cleanup()` to check every expectation and close.
 *
 * Registering the same method and path twice adds a scenario to the existing endpoint.
 */
export class MockServer {
  private readonly config: MockServerConfig;
  private readonly application: Express;
  private readonly endpoints = new Map<string, Endpoint>();
  private readonly logger: RequestLogger;
  private reporter: TestReporter = new FailureCollector();
  private server?: http.Server;
  private closing?: Promise<void>;
  private started = false;
  private routesBound = false;
  private verified = false;

  constructor(options: PartialDeep<MockServerConfig> = {}) {
    this.config = resolveConfig(options);
    this.logger = new RequestLogger(this.config.logging.maxEntries);
    this.application = express();
    if (this.config.cors) {
      // Preflights reach registered OPTIONS endpoints instead of being answered by cors.
      this.application.use(cors((_req, callback) => callback(null, { preflightContinue: this.servesOptions() })));
    }
    this.application.use(express.raw({ type: () => true, limit: this.config.bodyLimit }));
  }

  get(path: string, ...matchers: Matcher[]): Scenario {
    return this.register('GET', path, matchers);
  }

  post(path: string, ...matchers: Matcher[]): Scenario {
    return this.register('POST', path, matchers);
  }

  put(path: string, ...matchers: Matcher[]): Scenario {
    return this.register('PUT', path, matchers);
  }

  patch(path: string, ...matchers: Matcher[]): Scenario {
    return this.register('PATCH', path, matchers);
  }

  delete(path: string, ...matchers: Matcher[]): Scenario {
    return this.register('DELETE', path, matchers);
  }

  head(path: string, ...matchers: Matcher[]): Scenario {
    return this.register('HEAD', path, matchers);
  }

  options(path: string, ...matchers: Matcher[]): Scenario {
    return this.register('OPTIONS', path, matchers);
  }

  register(method: HttpMethod, path: string, matchers: Matcher[] = []): Scenario {
    if (this.routesBound) throw registrationClosedError('endpoints');
    const name = endpointName(method, path);
    let endpoint = this.endpoints.get(name);
    if (!endpoint) {
      endpoint = new Endpoint(method, path);
      this.endpoints.set(name, endpoint);
    }
    return endpoint.addScenario(matchers);
  }

  endpoint(method: HttpMethod, path: string): Endpoint | undefined {
    return this.endpoints.get(endpointName(method, path));
  }

  /** The Express app, for routes the helpers do not cover. Add them before `start()`. */
  app(): Express {
    return this.application;
  }

  /**
   * Freezes every endpoint, binds the routes and listens.
   * All endpoints and scenarios must be declared before calling this. Failures reported
   * before the call are carried over to `reporter`. After `LISTEN_FAILED` it may be called again.
   */
  async start(reporter: TestReporter = this.reporter): Promise<void> {
    if (this.started) {
      throw new MockServerError({ code: 'ALREADY_STARTED', message: 'Mock server is already started.' });
    }
    this.started = true;
    if (reporter !== this.reporter) {
      this.reporter.failures().forEach((failure) => reporter.error(failure));
      this.reporter = reporter;
    }
    this.bindRoutes();

    try {
      this.server = await this.listen();
    } catch (error) {
      this.started = false;
      throw error;
    }

    if (this.config.logging.verbose) {
      console.log('\nHTTP Scenario Mock');
      console.log(`Server:    ${this.url()}`);
      console.log(`Endpoints: ${this.endpoints.size}`);
      console.log('');
    }
  }

  /** Registers `cleanup()` as an after hook of a node:test context. */
  autoCleanup(context: CleanupContext): this {
    context.after(() => this.cleanup());
    return this;
  }

  port(): number {
    if (!this.server) {
      throw new MockServerError({ code: 'NOT_STARTED', message: 'Mock server is not started.' });
    }
    const address = this.server.address();
    return typeof address === 'object' && address ? address.port : this.config.port;
  }

  url(): string {
    return `http://${this.config.host}:${this.port()}`;
  }

  /** Journaled requests, newest first; pass an endpoint name, or null for unmatched requests. */
  requests(endpoint?: string | null) {
    return this.logger.list(endpoint);
  }

  failures(): readonly string[] {
    return this.reporter.failures();
  }

  assertNotCalled(method: HttpMethod, path: string) {
    const name = endpointName(method, path);
    const endpoint = this.endpoints.get(name);
    if (!endpoint) {
      this.reporter.error(`unknown endpoint: ${name}`);
      return;
    }
    if (endpoint.timesCalled() > 0) {
      this.reporter.error(`endpoint was called when not expected: ${name}`);
    }
  }

  /**
   * Stops accepting connections, then compares every scenario's call count with its
   * expected count. Mismatches go to the reporter; the sweep runs once.
   */
  verify(): readonly string[] {
    this.stopAccepting();
    if (!this.verified) {
      this.verified = true;
      for (const endpoint of this.endpoints.values()) {
        endpoint.verify().forEach((failure) => this.reporter.error(failure));
      }
    }
    return this.reporter.failures();
  }

  /** Closes the listener and drops open connections. Safe to call more than once. */
  async teardown(): Promise<void> {
    this.stopAccepting();
    this.server?.closeAllConnections();
    await this.closing;
  }

  /** Verification, then teardown; throws when any failure was reported. */
  async cleanup(): Promise<void> {
    const failures = this.verify();
    await this.teardown();
    if (failures.length > 0) {
      throw expectationsFailedError([...failures]);
    }
  }

  private servesOptions(): boolean {
    for (const endpoint of this.endpoints.values()) {
      if (endpoint.method === 'OPTIONS') return true;
    }
    return false;
  }

  private stopAccepting() {
    if (!this.server || this.closing) return;
    const server = this.server;
    this.closing = new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    server.closeIdleConnections();
  }

  private listen(): Promise<http.Server> {
    const server = http.createServer(this.application);
    return new Promise<http.Server>((resolve, reject) => {
      const onError = (error: Error) => {
        server.off('listening', onListening);
        reject(
          new MockServerError({
            code: 'LISTEN_FAILED',
            message: `Failed to listen on ${this.config.host}:${this.config.port}: ${error.message}`,
            cause: error
          })
        );
      };
      const onListening = () => {
        server.off('error', onError);
        resolve(server);
      };
      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(this.config.port, this.config.host);
    });
  }

  private bindRoutes() {
    if (this.routesBound) return;
    this.routesBound = true;
    const byPath = new Map<string, Endpoint[]>();
    for (const endpoint of this.endpoints.values()) {
      endpoint.freeze();
      const group = byPath.get(endpoint.path) ?? [];
      group.push(endpoint);
      byPath.set(endpoint.path, group);
    }

    for (const [routePath, group] of byPath) {
      const route = this.application.route(routePath);
      for (const endpoint of group) {
        bindMethod(route, endpoint.method, this.handlerFor(endpoint));
      }
      const allowed = group.map((endpoint) => endpoint.method);
      route.all((req, res) => this.rejectRoute(req, res, 405, allowed));
    }

    this.application.use((req, res) => this.rejectRoute(req, res, 404));
  }

  private handlerFor(endpoint: Endpoint): RequestHandler {
    return (req, res, next) => {
      // Express hands HEAD to the GET handler when the path has no HEAD endpoint.
      if (req.method !== endpoint.method) {
        next();
        return;
      }
      const start = Date.now();
      const scenario = endpoint.handle(req, res, this.reporter);
      this.journal(req, res, start, endpoint.name, scenario);
    };
  }

  private rejectRoute(req: Request, res: Response, status: 404 | 405, allowed: HttpMethod[] = []) {
    const start = Date.now();
    this.reporter.error(`no matching route found for ${req.method} ${req.path}`);
    if (allowed.length > 0) {
      res.setHeader('Allow', allowed.join(', '));
    }
    res.status(status).end();
    this.journal(req, res, start, null);
  }

  private journal(req: Request, res: Response, start: number, endpoint: string | null, scenario?: number) {
    const body = bodyText(req);
    this.logger.log({
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      method: req.method,
      path: req.path,
      query: queryOf(req),
      headers: req.headers,
      body: body.length > 0 ? body : undefined,
      endpoint,
      scenario: scenario !== undefined && scenario >= 0 ? scenario : undefined,
      response: {
        status: res.statusCode,
        latency: Date.now() - start
      }
    });
  }
}
