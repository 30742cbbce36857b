import { TtsProxyError } from "../../../../../packages/core/src/errors.js"
import { requireObjectBody } from "../../shared/request/body.js"

/** A null or empty backend clears the preference. */
export function parseSwitchBody(body: unknown): string | null {
  const raw = requireObjectBody(body)
  const backend = raw.backend
  if (backend === null || backend === undefined) {
    return null
  }
  if (typeof backend !== "string") {
    throw new TtsProxyError("backend must be a string or null.", "VALIDATION_ERROR", 2, 400)
  }
  const trimmed = backend.trim()
  return trimmed.length === 0 ? null : trimmed
}
