export interface RequestLogEntry {
  id: string;
  timestamp: string;
  method: string;
  path: string;
  query: Record<string, string[]>;
  headers: Record<string, string | string[] | undefined>;
  body?: string;
  /** Name of the endpoint that served the request, null when no route matched. */
  endpoint: string | null;
  scenario?: number;
  response: {
    status: number;
    latency: number;
  };
}

/** Bounded journal of served requests, newest first. */
export class RequestLogger {
  private entries: RequestLogEntry[] = [];
  private readonly maxEntries: number;

  constructor(maxEntries: number) {
    this.maxEntries = Math.max(0, maxEntries);
  }

  log(entry: RequestLogEntry) {
    if (this.maxEntries === 0) return;
    this.entries.unshift(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.length = this.maxEntries;
    }
  }

  /** `null` selects the requests no route matched. */
  list(endpoint?: string | null): RequestLogEntry[] {
    if (endpoint === undefined) return [...this.entries];
    return this.entries.filter((entry) => entry.endpoint === endpoint);
  }
}
