import { TtsProxyError } from "../../../../../packages/core/src/errors.js"

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function requireObjectBody(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    throw new TtsProxyError("Request body is required.", "VALIDATION_ERROR", 2, 400)
  }
  return body
}

export function requireString(raw: Record<string, unknown>, key: string): string {
  const value = raw[key]
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new TtsProxyError(`${key} is required.`, "VALIDATION_ERROR", 2, 400)
  }
  return value
}
