/**
 * Failure channel shared by matchers, the router fallbacks and verification.
 * Reporting a failure never stops the request or the test; failures accumulate.
 */
export interface TestReporter {
  error(message: string): void;
  failures(): readonly string[];
}

export class FailureCollector implements TestReporter {
  private readonly entries: string[] = [];

  error(message: string) {
    this.entries.push(message);
  }

  failures(): readonly string[] {
    return [...this.entries];
  }

  failed(): boolean {
    return this.entries.length > 0;
  }
}
