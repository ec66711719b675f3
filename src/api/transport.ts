import { TransportError, errorMessage } from "../errors.js";
import { isRecord, readTrimmedString, safeJsonParse } from "../json.js";
import { silentLogger, type Logger } from "../logger.js";
import type { ByteChunk } from "../stream/sse.js";
import type { ResponseRequest } from "./request.js";

/**
 * Opens one streaming response. Resolves once the server has accepted the
 * request; the iterable yields the raw event-stream body. Returning from the
 * iterator early releases the connection.
 */
export type ResponseTransport = (request: ResponseRequest, signal: AbortSignal) => Promise<AsyncIterable<ByteChunk>>;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type FetchTransportOptions = {
  apiKey: string;
  baseUrl: string;
  organizationId?: string;
  fetch?: FetchLike;
  logger?: Logger;
};

type ResponseBody = NonNullable<Response["body"]>;

export function createFetchTransport(options: FetchTransportOptions): ResponseTransport {
  const doFetch: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  const logger = options.logger ?? silentLogger;
  const url = `${options.baseUrl.replace(/\/+$/, "")}/v1/responses`;

  return async (request, signal) => {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "text/event-stream",
      Authorization: `Bearer ${options.apiKey}`,
    };
    if (options.organizationId) {
      headers["OpenAI-Organization"] = options.organizationId;
    }

    logger.debug(`POST ${url}`, {
      model: request.model,
      previous_response_id: request.previous_response_id ?? null,
      input_items: request.input.length,
    });

    let response: Response;
    try {
      response = await doFetch(url, {
        method: "POST",
        headers,
        body: JSON.stringify(request),
        signal,
      });
    } catch (error) {
      throw new TransportError(`request failed: ${errorMessage(error)}`, null, { cause: errorMessage(error) });
    }

    logger.debug(`response status ${response.status}`);

    if (!response.ok) {
      const serverMessage = await readServerErrorMessage(response);
      const message = serverMessage
        ? `status code ${response.status} ${serverMessage}`
        : `status code ${response.status}`;
      throw new TransportError(message, response.status, { serverMessage: serverMessage || undefined });
    }

    if (!response.body) {
      throw new TransportError("response has no body", response.status);
    }
    return readBody(response.body);
  };
}

async function* readBody(body: ResponseBody): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  let finished = false;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      if (value) {
        yield value;
      }
    }
  } finally {
    if (!finished) {
      await reader.cancel();
    }
  }
}

/** Reads `{ "error": { "message": ... } }` from a failed response; "" when absent. */
export async function readServerErrorMessage(response: Response): Promise<string> {
  let raw: string;
  try {
    raw = await response.text();
  } catch {
    return "";
  }
  const parsed = safeJsonParse(raw);
  if (!parsed.ok || !isRecord(parsed.value)) {
    return raw.trim().slice(0, 500);
  }
  const error = parsed.value.error;
  if (isRecord(error)) {
    return readTrimmedString(error.message);
  }
  return readTrimmedString(parsed.value.message);
}
