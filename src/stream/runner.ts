import type { ResponseRequest } from "../api/request.js";
import type { ResponseTransport } from "../api/transport.js";
import { ChatStreamError, TransportError, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { ResponseAccumulator } from "./accumulator.js";
import { DONE_SENTINEL, decodeStreamEvent } from "./decoder.js";
import type { ConversationSession } from "./session.js";
import { readSseData, type ByteChunk } from "./sse.js";
import { isTerminalUpdate, type StreamUpdate } from "./types.js";

export type StreamResponseOptions = {
  transport: ResponseTransport;
  session?: ConversationSession;
  signal?: AbortSignal;
  /** When false, undecodable events are logged and skipped instead of failing the stream. */
  strictDecoding?: boolean;
  logger?: Logger;
};

const ABORTED = Symbol("aborted");

/**
 * Runs one request through transport, SSE framing, decoding and accumulation.
 * Updates are yielded eagerly in arrival order and the sequence always ends with
 * exactly one of `completed`, `failed` or `cancelled`.
 */
export async function* streamResponse(
  request: ResponseRequest,
  options: StreamResponseOptions,
): AsyncGenerator<StreamUpdate, void, undefined> {
  const logger = options.logger ?? silentLogger;
  const strictDecoding = options.strictDecoding ?? true;
  const accumulator = new ResponseAccumulator(options.session);

  // Internal controller so the connection is released however the run ends.
  const controller = new AbortController();
  const external = options.signal;
  const onAbort = () => controller.abort(external?.reason);
  if (external?.aborted) {
    controller.abort(external.reason);
  } else {
    external?.addEventListener("abort", onAbort, { once: true });
  }

  let payloads: AsyncGenerator<string> | null = null;
  let pendingRead = false;

  try {
    if (controller.signal.aborted) {
      yield* emit(accumulator.cancel());
      return;
    }

    // async wrapper so a transport that throws synchronously still fails the run
    const opening = (async () => options.transport(request, controller.signal))();
    let body: AsyncIterable<ByteChunk> | typeof ABORTED;
    try {
      body = await raceAbort(opening, controller.signal);
    } catch (error) {
      yield* emit(controller.signal.aborted ? accumulator.cancel() : accumulator.failWith(toStreamError(error)));
      return;
    }
    if (body === ABORTED) {
      void releaseLateBody(opening, logger);
      yield* emit(accumulator.cancel());
      return;
    }

    payloads = readSseData(body);
    while (true) {
      if (controller.signal.aborted) {
        logger.debug("stream cancelled");
        yield* emit(accumulator.cancel());
        return;
      }

      let next: IteratorResult<string> | typeof ABORTED;
      pendingRead = true;
      try {
        next = await raceAbort(payloads.next(), controller.signal);
      } catch (error) {
        pendingRead = false;
        yield* emit(controller.signal.aborted ? accumulator.cancel() : accumulator.failWith(toStreamError(error)));
        return;
      }
      if (next === ABORTED) {
        yield* emit(accumulator.cancel());
        return;
      }
      pendingRead = false;

      if (next.done) {
        logger.debug("transport closed");
        break;
      }

      const payload = next.value;
      if (payload.trim() === DONE_SENTINEL) {
        logger.debug("received [DONE]");
        break;
      }

      const decoded = decodeStreamEvent(payload);
      if (!decoded.ok) {
        if (strictDecoding) {
          yield* emit(accumulator.failWith(decoded.error));
          return;
        }
        logger.warn(`skipping undecodable event: ${decoded.error.message}`);
        continue;
      }

      if (decoded.event.kind === "ignored") {
        logger.debug(`ignoring event type ${decoded.event.rawType}`);
      }

      const update = accumulator.apply(decoded.event);
      if (!update) {
        continue;
      }
      yield update;
      if (isTerminalUpdate(update)) {
        return;
      }
    }

    yield* emit(accumulator.finish());
  } finally {
    external?.removeEventListener("abort", onAbort);
    controller.abort();
    if (payloads) {
      const closing = payloads.return(undefined).catch((error: unknown) => {
        logger.debug(`closing stream failed: ${errorMessage(error)}`);
        return undefined;
      });
      // a read still in flight would hold the close until it settles
      if (pendingRead) {
        void closing;
      } else {
        await closing;
      }
    }
  }
}

/** Drains a run into an array. Mostly for tests and non-interactive callers. */
export async function collectUpdates(updates: AsyncIterable<StreamUpdate>): Promise<StreamUpdate[]> {
  const collected: StreamUpdate[] = [];
  for await (const update of updates) {
    collected.push(update);
  }
  return collected;
}

function* emit(update: StreamUpdate | null): Generator<StreamUpdate> {
  if (update) {
    yield update;
  }
}

// A transport that ignores the signal may still hand over a body after the run was cancelled.
async function releaseLateBody(opening: Promise<AsyncIterable<ByteChunk>>, logger: Logger): Promise<void> {
  try {
    const body = await opening;
    await body[Symbol.asyncIterator]().return?.();
  } catch (error) {
    logger.debug(`releasing cancelled stream failed: ${errorMessage(error)}`);
  }
}

function toStreamError(error: unknown): ChatStreamError {
  if (error instanceof ChatStreamError) {
    return error;
  }
  return new TransportError(`stream read failed: ${errorMessage(error)}`);
}

function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T | typeof ABORTED> {
  if (signal.aborted) {
    return Promise.resolve(ABORTED);
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => resolve(ABORTED);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
