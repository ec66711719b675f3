export function safeJsonParse(raw: string): { ok: true; value: unknown } | { ok: false; error: Error } {
  try {
    return {
      ok: true,
      value: JSON.parse(raw),
    };
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readTrimmedString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}
