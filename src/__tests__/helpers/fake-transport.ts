import type {
  Transport,
  TransportRequest,
  TransportResponse,
} from "../../transport.js";

export interface FakeReply {
  status: number;
  body?: unknown;
  bytes?: Buffer;
  /** Thrown by get() itself */
  error?: Error;
  /** Thrown while the body is read, after the status arrived */
  bodyError?: Error;
}

/**
 * Replays queued replies in order and records every request it receives.
 */
export class FakeTransport implements Transport {
  readonly requests: TransportRequest[] = [];
  /** Number of responses released without reading their body */
  cancelled = 0;
  private readonly replies: FakeReply[];

  constructor(...replies: FakeReply[]) {
    this.replies = replies;
  }

  enqueue(...replies: FakeReply[]): void {
    this.replies.push(...replies);
  }

  async get(request: TransportRequest): Promise<TransportResponse> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (!reply) {
      throw new Error(`Unexpected request to ${request.url}`);
    }
    if (reply.error) {
      throw reply.error;
    }
    return this.toResponse(reply);
  }

  private toResponse(reply: FakeReply): TransportResponse {
    const bytes = reply.bytes ?? Buffer.from(JSON.stringify(reply.body ?? {}));
    const { bodyError } = reply;
    const onCancel = () => {
      this.cancelled += 1;
    };

    return {
      status: reply.status,
      async text() {
        if (bodyError) throw bodyError;
        return bytes.toString("utf-8");
      },
      async buffer() {
        if (bodyError) throw bodyError;
        return bytes;
      },
      async *stream() {
        // Two chunks to exercise streaming writes
        const middle = Math.floor(bytes.length / 2);
        yield bytes.subarray(0, middle);
        if (bodyError) throw bodyError;
        yield bytes.subarray(middle);
      },
      async cancel() {
        onCancel();
      },
    };
  }
}
