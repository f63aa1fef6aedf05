import { AtomicCounter } from './counter.js';
import { MockServerError, messageOf, registrationClosedError } from './errors.js';
import type { Matcher, MockRequest } from './matchers.js';
import { ResponseRecorder, type ResponseSink } from './recorder.js';
import type { Responder } from './responders.js';
import type { TestReporter } from './reporter.js';

/**
 * One mocked case of an endpoint: what the request must look like, what to answer,
 * and how many times it is expected to be hit.
 */
export class Scenario {
  private expected = 1;
  private responders: Responder[] = [];
  private readonly calls = new AtomicCounter();
  private frozen = false;

  constructor(
    readonly endpointName: string,
    private readonly matchers: readonly Matcher[]
  ) {}

  times(n: number): this {
    if (this.frozen) throw registrationClosedError(`scenario of ${this.endpointName}`);
    if (!Number.isInteger(n) || n < 1) {
      throw new MockServerError({
        code: 'INVALID_TIMES',
        message: `times must be an integer >= 1 for ${this.endpointName}, got ${n}`
      });
    }
    this.expected = n;
    return this;
  }

  respond(...responders: Responder[]): this {
    if (this.frozen) throw registrationClosedError(`scenario of ${this.endpointName}`);
    this.responders = responders;
    return this;
  }

  expectedTimes(): number {
    return this.expected;
  }

  timesCalled(): number {
    return this.calls.get();
  }

  freeze() {
    this.frozen = true;
  }

  /** Counts the call, then runs every matcher. A throwing matcher is reported, not propagated. */
  match(reporter: TestReporter, req: MockRequest) {
    this.calls.getAndIncrement();
    for (const matcher of this.matchers) {
      try {
        matcher(reporter, req);
      } catch (error) {
        reporter.error(`matcher for ${this.endpointName} threw: ${messageOf(error)}`);
      }
    }
  }

  writeTo(res: ResponseSink) {
    const recorder = new ResponseRecorder();
    for (const responder of this.responders) {
      responder(recorder);
    }
    recorder.flush(res);
  }
}
