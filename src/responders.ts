import fs from 'node:fs';
import path from 'node:path';
import { MockServerError } from './errors.js';
import type { ResponseRecorder } from './recorder.js';

/** One step of building a response. Responders of a scenario run in declaration order. */
export type Responder = (recorder: ResponseRecorder) => void;

export function statusCode(code: number): Responder {
  return (recorder) => {
    recorder.writeHeader(code);
  };
}

export function headers(values: Record<string, string | string[]>): Responder {
  return (recorder) => {
    for (const [name, value] of Object.entries(values)) {
      const list = Array.isArray(value) ? value : [value];
      list.forEach((item) => recorder.addHeader(name, item));
    }
  };
}

/** Strings are sent verbatim; anything else goes through JSON.stringify. */
export function jsonBody(json: unknown): Responder {
  const text = typeof json === 'string' ? json : JSON.stringify(json);
  return (recorder) => {
    recorder.addHeader('Content-Type', 'application/json');
    recorder.write(text);
  };
}

/** Reads the file when the responder is declared, not when it is served. */
export function jsonFileBody(filePath: string): Responder {
  const resolved = path.resolve(filePath);
  let content: Buffer;
  try {
    content = fs.readFileSync(resolved);
  } catch (error) {
    throw new MockServerError({
      code: 'FIXTURE_READ_FAILED',
      message: `Failed to read JSON fixture ${resolved}: ${(error as Error).message}`,
      cause: error
    });
  }

  return (recorder) => {
    recorder.addHeader('Content-Type', 'application/json');
    recorder.write(content);
  };
}

export function stringBody(text: string): Responder {
  return (recorder) => {
    recorder.write(text);
  };
}
