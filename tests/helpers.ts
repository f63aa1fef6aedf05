import type { MockRequest } from '../src/matchers.js';
import type { ResponseSink } from '../src/recorder.js';

export class FakeResponse implements ResponseSink {
  headersSent = false;
  headers: Record<string, string[]> = {};
  statusCode = 200;
  body?: Buffer;
  ended = false;
  calls: string[] = [];

  setHeader(name: string, value: string[]) {
    if (this.headersSent) {
      throw new Error('Cannot set headers after they are sent to the client');
    }
    this.calls.push('setHeader');
    this.headers[name] = [...value];
    return this;
  }

  status(code: number) {
    this.calls.push('status');
    this.statusCode = code;
    return this;
  }

  end(body?: Buffer) {
    this.calls.push('end');
    this.headersSent = true;
    this.ended = true;
    this.body = body;
    return this;
  }
}

export function fakeRequest(overrides: Partial<MockRequest> = {}): MockRequest {
  return {
    method: 'GET',
    path: '/',
    originalUrl: '/',
    headersDistinct: {},
    body: {},
    ...overrides
  };
}
