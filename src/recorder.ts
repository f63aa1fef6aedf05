export type HeaderMap = Map<string, string[]>;

/** The parts of an Express response the recorder and endpoints write to. */
export interface ResponseSink {
  headersSent: boolean;
  setHeader(name: string, value: string[]): unknown;
  status(code: number): unknown;
  end(body?: Buffer): unknown;
}

/**
 * Collects the mutations of every responder for one request so that the order they were
 * declared in does not matter. A live response fixes its status on the first body write;
 * the recorder only touches the live response in `flush`, after all responders ran.
 */
export class ResponseRecorder {
  private readonly headerMap: HeaderMap = new Map();
  private bodyBuffer: Buffer = Buffer.alloc(0);
  private status = 0;

  /** Header names are stored lower-cased. */
  header(): HeaderMap {
    return this.headerMap;
  }

  addHeader(name: string, value: string) {
    const key = name.toLowerCase();
    const values = this.headerMap.get(key);
    if (values) {
      values.push(value);
    } else {
      this.headerMap.set(key, [value]);
    }
  }

  setHeader(name: string, value: string) {
    this.headerMap.set(name.toLowerCase(), [value]);
  }

  /** Replaces the body; successive writes do not append. */
  write(body: string | Buffer): number {
    this.bodyBuffer = typeof body === 'string' ? Buffer.from(body, 'utf8') : body;
    return this.bodyBuffer.length;
  }

  writeHeader(statusCode: number) {
    this.status = statusCode;
  }

  /** 0 when no responder set a status. */
  statusCode(): number {
    return this.status;
  }

  body(): Buffer {
    return this.bodyBuffer;
  }

  flush(res: ResponseSink) {
    for (const [name, values] of this.headerMap) {
      res.setHeader(name, values);
    }

    if (this.status > 0) {
      res.status(this.status);
    }

    if (this.bodyBuffer.length > 0) {
      res.end(this.bodyBuffer);
      return;
    }
    res.end();
  }
}
