export type TtsProxyErrorCode =
  | "VALIDATION_ERROR"
  | "VOICE_NOT_FOUND"
  | "UNKNOWN_BACKEND"
  | "NOT_FOUND"
  | "NO_BACKEND_AVAILABLE"
  | "BACKEND_UNAVAILABLE"
  | "GENERATION_ERROR"
  | "TRANSCODE_ERROR"
  | "CONFIG_ERROR"
  | "INTERNAL_ERROR"

export class TtsProxyError extends Error {
  code: TtsProxyErrorCode
  exitCode: number
  httpStatus: number

  constructor(message: string, code: TtsProxyErrorCode, exitCode = 1, httpStatus = 500) {
    super(message)
    this.name = "TtsProxyError"
    this.code = code
    this.exitCode = exitCode
    this.httpStatus = httpStatus
  }
}

export function noBackendAvailable(message = "No TTS backend available."): TtsProxyError {
  return new TtsProxyError(message, "NO_BACKEND_AVAILABLE", 2, 503)
}
