import { classifyErrorMessage } from '../errors/error-code.js';
import { ApiError, ResponseDecodeError } from '../errors/errors.js';
import type {
  RemoteOperation,
  ResponseSchema,
  Transport,
  TransportRequest,
} from '../transport/types.js';

type FakeReply =
  | { data: unknown }
  /** Provider rejection carrying `message` in the error envelope. */
  | { providerError: string; status?: number }
  | { error: Error };

/** Builds the ApiError the axios transport would raise for `message`. */
export function providerError(message: string, status = 400): ApiError {
  return new ApiError(status, classifyErrorMessage(message), {
    error: {
      code: status,
      message,
      errors: [{ domain: 'global', reason: 'invalid', message }],
    },
  });
}

/**
 * In-process transport for tests. Replies are scripted per remote operation
 * and handed out in order; every request is recorded.
 */
export class FakeTransport implements Transport {
  readonly requests: TransportRequest[] = [];
  private readonly replies = new Map<RemoteOperation, FakeReply[]>();

  reply(operation: RemoteOperation, ...replies: FakeReply[]): this {
    const queue = this.replies.get(operation) ?? [];
    queue.push(...replies);
    this.replies.set(operation, queue);
    return this;
  }

  requestsFor(operation: RemoteOperation): TransportRequest[] {
    return this.requests.filter((request) => request.operation === operation);
  }

  async send<T>(request: TransportRequest, schema: ResponseSchema<T>): Promise<T> {
    this.requests.push(request);

    const reply = this.replies.get(request.operation)?.shift();
    if (!reply) {
      throw new Error(`No reply scripted for ${request.operation}`);
    }
    if ('error' in reply) {
      throw reply.error;
    }
    if ('providerError' in reply) {
      throw providerError(reply.providerError, reply.status);
    }

    const parsed = schema.safeParse(reply.data);
    if (!parsed.success) {
      throw new ResponseDecodeError(
        `Unexpected response from ${request.operation}`,
        reply.data,
        parsed.error.issues,
      );
    }
    return parsed.data;
  }
}

export type { FakeReply };
