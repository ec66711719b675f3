import { buildInputFromHistory, buildResponseRequest } from "./api/request.js";
import { createFetchTransport } from "./api/transport.js";
import { loadChatStreamConfig } from "./config.js";
import { parseContentSegments } from "./content/parser.js";
import type { ContentSegment } from "./content/types.js";
import { createConsoleLogger } from "./logger.js";
import { streamResponse } from "./stream/runner.js";
import { ConversationSession } from "./stream/session.js";
import { StreamedTextPrinter } from "./terminal-output.js";

const argv = process.argv.slice(2);

void main(argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[chatstream] fatal: ${message}`);
  process.exitCode = 1;
});

async function main(args: string[]): Promise<void> {
  const prompt = args.join(" ").trim();
  if (!prompt) {
    console.error("usage:");
    console.error('  chatstream "<prompt>"   # stream one response to stdout');
    process.exitCode = 1;
    return;
  }

  const config = loadChatStreamConfig();
  if (!config.apiKey) {
    console.error("[chatstream] missing API key. Set CHATSTREAM_API_KEY or OPENAI_API_KEY.");
    process.exitCode = 1;
    return;
  }

  const logger = createConsoleLogger({ debug: config.debug });
  const transport = createFetchTransport({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    organizationId: config.organizationId,
    logger,
  });
  const session = new ConversationSession();
  const request = buildResponseRequest({
    model: config.model,
    input: buildInputFromHistory([], prompt),
    instructions: config.instructions,
    maxOutputTokens: config.maxOutputTokens,
    temperature: config.temperature,
    previousResponseId: session.previousResponseId,
  });

  const printer = new StreamedTextPrinter((text) => {
    process.stdout.write(text);
  });
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once("SIGINT", onSigint);

  try {
    for await (const update of streamResponse(request, {
      transport,
      session,
      signal: controller.signal,
      strictDecoding: config.strictDecoding,
      logger,
    })) {
      switch (update.type) {
        case "started":
          logger.debug(`response ${update.responseId} started`);
          break;
        case "delta":
          printer.append(update.text);
          break;
        case "snapshot":
          printer.sync(update.text);
          break;
        case "completed":
          printer.sync(update.text);
          process.stdout.write("\n");
          if (update.incompleteReason) {
            logger.warn(`response incomplete: ${update.incompleteReason}`);
          }
          printSegments(parseContentSegments(update.text));
          break;
        case "failed":
          logger.error(update.message, update.error?.toJSON());
          process.exitCode = 1;
          break;
        case "cancelled":
          logger.warn("cancelled");
          process.exitCode = 130;
          break;
      }
    }
  } finally {
    process.off("SIGINT", onSigint);
  }
}

function printSegments(segments: ContentSegment[]): void {
  const summary = segments.map((segment, index) => `${index}: ${describeSegment(segment)}`);
  console.error(`[chatstream] segments:\n${summary.join("\n")}`);
}

function describeSegment(segment: ContentSegment): string {
  switch (segment.kind) {
    case "text":
    case "streaming_text":
      return `${segment.kind} (${segment.text.length} chars)`;
    case "code":
      return `code ${segment.language || "(plain)"} (${segment.code.split("\n").length} lines)`;
    case "partial_code":
      return `partial_code ${segment.language || "(plain)"}`;
    case "attachments":
      return `attachments (${segment.attachments.length})`;
    case "generated_images":
      return `generated_images (${segment.images.length})`;
  }
}
