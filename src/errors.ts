export type MockServerErrorCode =
  | 'LISTEN_FAILED'
  | 'ALREADY_STARTED'
  | 'NOT_STARTED'
  | 'REGISTRATION_CLOSED'
  | 'INVALID_TIMES'
  | 'FIXTURE_READ_FAILED'
  | 'CONFIG_NOT_FOUND'
  | 'INVALID_DECLARATION'
  | 'EXPECTATIONS_FAILED';

export interface MockServerErrorDetails {
  code: MockServerErrorCode;
  message: string;
  /** Failures collected by the reporter, set for EXPECTATIONS_FAILED. */
  failures?: string[];
  cause?: unknown;
}

/**
 * Setup and lifecycle errors. Request-time problems never surface as this error;
 * they go through the TestReporter instead.
 */
export class MockServerError extends Error {
  readonly details: MockServerErrorDetails;

  constructor(details: MockServerErrorDetails) {
    super(details.message, { cause: details.cause });
    this.name = 'MockServerError';
    this.details = details;
    Object.setPrototypeOf(this, MockServerError.prototype);
  }

  get code(): MockServerErrorCode {
    return this.details.code;
  }

  get failures(): string[] {
    return this.details.failures ?? [];
  }
}

export function registrationClosedError(subject: string): MockServerError {
  return new MockServerError({
    code: 'REGISTRATION_CLOSED',
    message: `Cannot modify ${subject} after the server has started.`
  });
}

export function expectationsFailedError(failures: string[]): MockServerError {
  const lines = failures.map((failure) => `  - ${failure}`).join('\n');
  return new MockServerError({
    code: 'EXPECTATIONS_FAILED',
    message: `Mock server recorded ${failures.length} failure(s):\n${lines}`,
    failures: [...failures]
  });
}

/** Message of anything thrown, whether or not it is an `Error`. */
export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
