import { isDeepStrictEqual } from 'node:util';
import type { TestReporter } from './reporter.js';

/** The parts of an Express request the matchers read. */
export interface MockRequest {
  method: string;
  path: string;
  originalUrl: string;
  headersDistinct: NodeJS.Dict<string[]>;
  body: unknown;
}

/**
 * Validates the live request and reports mismatches through the reporter.
 * A matcher never throws on mismatch and never decides whether a response is sent.
 */
export type Matcher = (reporter: TestReporter, req: MockRequest) => void;

export type ValueList = Record<string, string | string[]>;

function toLists(values: ValueList): Record<string, string[]> {
  const result: Record<string, string[]> = {};
  for (const [key, value] of Object.entries(values)) {
    result[key] = Array.isArray(value) ? [...value] : [value];
  }
  return result;
}

export function queryOf(req: MockRequest): Record<string, string[]> {
  const url = new URL(req.originalUrl, 'http://localhost');
  const result: Record<string, string[]> = {};
  for (const [key, value] of url.searchParams) {
    const values = result[key] ?? [];
    values.push(value);
    result[key] = values;
  }
  return result;
}

export function bodyText(req: MockRequest): string {
  if (Buffer.isBuffer(req.body)) return req.body.toString('utf8');
  if (typeof req.body === 'string') return req.body;
  return '';
}

function describe(req: MockRequest) {
  return `${req.method} ${req.path}`;
}

/** The whole query must match; missing and extra parameters both fail. */
export function matchQueryParams(expected: ValueList): Matcher {
  const want = toLists(expected);
  return (reporter, req) => {
    const actual = queryOf(req);
    if (!isDeepStrictEqual(actual, want)) {
      reporter.error(
        `query params mismatch for ${describe(req)}: expected ${JSON.stringify(want)}, received ${JSON.stringify(actual)}`
      );
    }
  };
}

/** Only the listed headers are compared; names are case-insensitive. */
export function matchHeaders(expected: ValueList): Matcher {
  const want = toLists(expected);
  return (reporter, req) => {
    for (const [name, values] of Object.entries(want)) {
      const key = name.toLowerCase();
      const actual = req.headersDistinct[key] ?? [];
      if (!isDeepStrictEqual(actual, values)) {
        reporter.error(
          `header "${key}" mismatch for ${describe(req)}: expected ${JSON.stringify(values)}, received ${JSON.stringify(actual)}`
        );
      }
    }
  };
}

/** A string is read as JSON text; other values are compared as they are. */
export function matchJsonBody(expected: unknown): Matcher {
  const want: unknown = typeof expected === 'string' ? JSON.parse(expected) : expected;
  return (reporter, req) => {
    let actual: unknown;
    try {
      actual = JSON.parse(bodyText(req));
    } catch (error) {
      reporter.error(`request body for ${describe(req)} is not valid JSON: ${(error as Error).message}`);
      return;
    }
    if (!isDeepStrictEqual(actual, want)) {
      reporter.error(
        `JSON body mismatch for ${describe(req)}: expected ${JSON.stringify(want)}, received ${JSON.stringify(actual)}`
      );
    }
  };
}
