import { AtomicCounter } from './counter.js';
import { messageOf, registrationClosedError } from './errors.js';
import type { Matcher, MockRequest } from './matchers.js';
import type { ResponseSink } from './recorder.js';
import type { TestReporter } from './reporter.js';
import { Scenario } from './scenario.js';

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type EndpointState = 'registering' | 'serving' | 'verified';

export function endpointName(method: HttpMethod, path: string): string {
  return `${method} ${path}`;
}

/**
 * A method + path served by an ordered list of scenarios.
 *
 * The response plan lists scenario indices, each repeated `times` times, in declaration
 * order. Request N is served by `plan[min(N, plan.length - 1)]`, so once the plan is used
 * up the last scenario keeps answering.
 */
export class Endpoint {
  readonly name: string;
  private readonly scenarios: Scenario[] = [];
  private readonly requests = new AtomicCounter();
  private plan: readonly number[] = [];
  private current: EndpointState = 'registering';

  constructor(
    readonly method: HttpMethod,
    readonly path: string
  ) {
    this.name = endpointName(method, path);
  }

  state(): EndpointState {
    return this.current;
  }

  addScenario(matchers: readonly Matcher[] = []): Scenario {
    if (this.current !== 'registering') throw registrationClosedError(this.name);
    const scenario = new Scenario(this.name, matchers);
    this.scenarios.push(scenario);
    return scenario;
  }

  scenarioList(): readonly Scenario[] {
    return [...this.scenarios];
  }

  freeze() {
    if (this.current !== 'registering') return;
    const plan: number[] = [];
    this.scenarios.forEach((scenario, index) => {
      scenario.freeze();
      for (let i = 0; i < scenario.expectedTimes(); i += 1) {
        plan.push(index);
      }
    });
    this.plan = plan;
    this.current = 'serving';
  }

  responsePlan(): readonly number[] {
    return this.plan;
  }

  timesCalled(): number {
    return this.requests.get();
  }

  /**
   * Serves one request and returns the index of the scenario that answered it,
   * or -1 when the endpoint has no scenario.
   */
  handle(req: MockRequest, res: ResponseSink, reporter: TestReporter): number {
    const n = this.requests.getAndIncrement();
    if (this.plan.length === 0) {
      reporter.error(`endpoint ${this.name} has no scenario to serve the request`);
      res.status(500);
      res.end();
      return -1;
    }

    const index = this.plan[Math.min(n, this.plan.length - 1)];
    const scenario = this.scenarios[index];
    scenario.match(reporter, req);

    try {
      scenario.writeTo(res);
    } catch (error) {
      reporter.error(`responder for ${this.name} threw: ${messageOf(error)}`);
      if (!res.headersSent) {
        res.status(500);
      }
      res.end();
    }
    return index;
  }

  /** One message per scenario whose call count differs from its expected count. */
  verify(): string[] {
    this.current = 'verified';
    const total = this.scenarios.length;
    const failures: string[] = [];

    this.scenarios.forEach((scenario, index) => {
      const label = `${this.name} [scenario ${index + 1}/${total}]`;
      const called = scenario.timesCalled();
      const expected = scenario.expectedTimes();
      if (called === expected) return;
      if (called === 0) {
        failures.push(`expected endpoint was not called: ${label}`);
        return;
      }
      failures.push(`endpoint ${label} was called ${called} times, expected ${expected}`);
    });

    return failures;
  }
}
