import fs from "node:fs";
import path from "node:path";
import { config as loadDotEnv } from "dotenv";
import { ConfigError } from "./errors.js";

const localEnvPath = path.resolve(process.cwd(), ".env.local");
if (fs.existsSync(localEnvPath)) {
  loadDotEnv({ path: localEnvPath, quiet: true });
}
loadDotEnv({ quiet: true });

export const DEFAULT_BASE_URL = "https://api.openai.com";
export const DEFAULT_MODEL = "gpt-4.1";
export const DEFAULT_MAX_OUTPUT_TOKENS = 1000;
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_INSTRUCTIONS =
  "You are a helpful assistant. Use the conversation history to provide contextual responses.";

export type ChatStreamConfig = {
  apiKey: string;
  baseUrl: string;
  organizationId?: string;
  model: string;
  instructions: string;
  maxOutputTokens: number;
  temperature: number;
  debug: boolean;
  strictDecoding: boolean;
};

export function parseBaseUrl(value: string | undefined): string {
  const raw = value?.trim() || DEFAULT_BASE_URL;
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError(`Invalid CHATSTREAM_BASE_URL "${raw}". Use an absolute http(s) URL.`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError(`Invalid CHATSTREAM_BASE_URL "${raw}". Use an absolute http(s) URL.`);
  }
  return raw.replace(/\/+$/, "");
}

export function parseMaxOutputTokens(value: string | undefined): number {
  const normalized = value?.trim();
  if (!normalized) {
    return DEFAULT_MAX_OUTPUT_TOKENS;
  }
  const parsed = Number(normalized);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(
      `Invalid CHATSTREAM_MAX_OUTPUT_TOKENS "${value}". Use a positive integer.`,
    );
  }
  return parsed;
}

export function parseTemperature(value: string | undefined): number {
  const normalized = value?.trim();
  if (!normalized) {
    return DEFAULT_TEMPERATURE;
  }
  const parsed = Number(normalized);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 2) {
    throw new ConfigError(`Invalid CHATSTREAM_TEMPERATURE "${value}". Use a number between 0 and 2.`);
  }
  return parsed;
}

export function parseBooleanFlag(value: string | undefined, fallback: boolean): boolean {
  const normalized = (value ?? "").trim().toLowerCase();
  if (!normalized) {
    return fallback;
  }
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw new ConfigError(`Invalid boolean "${value}". Use true or false.`);
}

export function loadChatStreamConfig(env: NodeJS.ProcessEnv = process.env): ChatStreamConfig {
  return {
    apiKey: env.CHATSTREAM_API_KEY?.trim() || env.OPENAI_API_KEY?.trim() || "",
    baseUrl: parseBaseUrl(env.CHATSTREAM_BASE_URL || env.OPENAI_BASE_URL),
    organizationId: env.CHATSTREAM_ORGANIZATION?.trim() || env.OPENAI_ORG_ID?.trim() || undefined,
    model: env.CHATSTREAM_MODEL?.trim() || DEFAULT_MODEL,
    instructions: env.CHATSTREAM_INSTRUCTIONS?.trim() || DEFAULT_INSTRUCTIONS,
    maxOutputTokens: parseMaxOutputTokens(env.CHATSTREAM_MAX_OUTPUT_TOKENS),
    temperature: parseTemperature(env.CHATSTREAM_TEMPERATURE),
    debug: parseBooleanFlag(env.CHATSTREAM_DEBUG, false),
    strictDecoding: parseBooleanFlag(env.CHATSTREAM_STRICT_DECODING, true),
  };
}
