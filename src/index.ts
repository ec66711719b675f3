export * from "./errors.js";
export * from "./logger.js";
export * from "./chat-types.js";
export * from "./api/request.js";
export * from "./api/transport.js";
export * from "./stream/types.js";
export * from "./stream/sse.js";
export * from "./stream/decoder.js";
export * from "./stream/session.js";
export * from "./stream/accumulator.js";
export * from "./stream/runner.js";
export * from "./content/types.js";
export * from "./content/parser.js";
export * from "./content/diff.js";
export * from "./content/tracker.js";
