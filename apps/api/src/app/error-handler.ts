import type { FastifyError, FastifyInstance, FastifyReply } from "fastify"

import { TtsProxyError } from "../../../../packages/core/src/errors.js"
import { createChildLogger } from "../../../../packages/core/src/logger.js"

const log = createChildLogger("http")

function sendError(reply: FastifyReply, statusCode: number, code: string, message: string): void {
  void reply.code(statusCode).send({
    ok: false,
    error: {
      code,
      message,
    },
  })
}

export function registerApiErrorHandlers(server: FastifyInstance): void {
  server.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.code === "FST_ERR_CTP_INVALID_JSON_BODY" || error instanceof SyntaxError) {
      sendError(reply, 400, "VALIDATION_ERROR", "Invalid JSON body.")
      return
    }

    if (error instanceof TtsProxyError) {
      if (error.httpStatus >= 500) {
        log.error({ method: request.method, url: request.url, code: error.code, err: error }, "request failed")
      }
      sendError(reply, error.httpStatus, error.code, error.message)
      return
    }

    if (error.validation) {
      sendError(reply, 400, "VALIDATION_ERROR", error.message)
      return
    }

    log.error({ method: request.method, url: request.url, err: error }, "unhandled error")
    const message = error instanceof Error ? error.message : "Unknown error"
    sendError(reply, 500, "INTERNAL_ERROR", message)
  })

  server.setNotFoundHandler((_request, reply) => {
    sendError(reply, 404, "NOT_FOUND", "Route not found.")
  })
}
