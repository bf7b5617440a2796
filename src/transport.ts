/**
 * HTTP transport used by the client and by wallpaper downloads.
 *
 * The client only depends on the `Transport` interface; `FetchTransport` is
 * the default implementation on top of the global fetch.
 */

import { USER_AGENT } from "./constants.js";
import type { ParameterSet } from "./types.js";

export interface TransportRequest {
  url: string;
  query?: ParameterSet;
  headers?: Record<string, string>;
}

export interface TransportResponse {
  readonly status: number;
  /** Rejects when the body cannot be read to the end */
  text(): Promise<string>;
  buffer(): Promise<Buffer>;
  stream(): AsyncIterable<Uint8Array>;
  /** Release a body that will not be read */
  cancel(): Promise<void>;
}

export interface Transport {
  /** Resolves with any status code; rejects only on network-level faults */
  get(request: TransportRequest): Promise<TransportResponse>;
}

/**
 * Aborts its controller when no progress is reported for `timeoutMs`.
 * Waiting for headers and each body read are timed separately, so a slow
 * but steady download is never cut off.
 */
class IdleDeadline {
  private timer: NodeJS.Timeout | undefined;

  constructor(
    private readonly controller: AbortController,
    private readonly timeoutMs: number
  ) {}

  reset(): void {
    this.clear();
    this.timer = setTimeout(() => {
      this.controller.abort(
        new Error(`No response data received for ${this.timeoutMs} ms`)
      );
    }, this.timeoutMs);
    this.timer.unref();
  }

  clear(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}

async function* readBody(
  response: Response,
  deadline: IdleDeadline
): AsyncGenerator<Uint8Array> {
  if (!response.body) return;
  const reader = response.body.getReader();
  try {
    for (;;) {
      deadline.reset();
      const { done, value } = await reader.read();
      // Time spent by the consumer between reads does not count
      deadline.clear();
      if (done) return;
      yield value;
    }
  } finally {
    deadline.clear();
    reader.releaseLock();
  }
}

class FetchResponse implements TransportResponse {
  constructor(
    private readonly response: Response,
    private readonly deadline: IdleDeadline
  ) {}

  get status(): number {
    return this.response.status;
  }

  async text(): Promise<string> {
    return (await this.buffer()).toString("utf-8");
  }

  async buffer(): Promise<Buffer> {
    const chunks: Uint8Array[] = [];
    for await (const chunk of this.stream()) {
      chunks.push(chunk);
    }
    return Buffer.concat(chunks);
  }

  stream(): AsyncIterable<Uint8Array> {
    return readBody(this.response, this.deadline);
  }

  async cancel(): Promise<void> {
    this.deadline.clear();
    const { body } = this.response;
    if (body && !body.locked) {
      await body.cancel();
    }
  }
}

export class FetchTransport implements Transport {
  /** Longest wait for headers or for the next chunk of a body */
  constructor(private readonly timeoutMs: number) {}

  async get(request: TransportRequest): Promise<TransportResponse> {
    const url = new URL(request.url);
    for (const [key, value] of Object.entries(request.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const controller = new AbortController();
    const deadline = new IdleDeadline(controller, this.timeoutMs);
    deadline.reset();

    try {
      const response = await fetch(url, {
        headers: {
          "User-Agent": USER_AGENT,
          ...request.headers,
        },
        signal: controller.signal,
      });
      return new FetchResponse(response, deadline);
    } finally {
      // Body reads arm their own deadline
      deadline.clear();
    }
  }
}
