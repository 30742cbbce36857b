import Fastify, { type FastifyInstance } from "fastify"

import { createChildLogger } from "../../../../packages/core/src/logger.js"
import { backendsRoutes } from "../features/backends/routes.js"
import type { ApiRouteOptions } from "../features/options.js"
import { speechRoutes } from "../features/speech/routes.js"
import { statusRoutes } from "../features/status/routes.js"
import { voicePrefsRoutes } from "../features/voice-prefs/routes.js"
import { voicesRoutes } from "../features/voices/routes.js"
import { registerApiErrorHandlers } from "./error-handler.js"

export type CreateApiAppOptions = ApiRouteOptions

const log = createChildLogger("http")

export function createApiApp(options: CreateApiAppOptions): FastifyInstance {
  const server = Fastify({
    logger: false,
    bodyLimit: 5 * 1024 * 1024,
  })

  registerApiErrorHandlers(server)

  server.addHook("onResponse", async (request, reply) => {
    log.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        durationMs: Math.round(reply.elapsedTime),
      },
      "request completed",
    )
  })

  server.register(statusRoutes, options)
  server.register(
    async (v1) => {
      v1.register(speechRoutes, options)
      v1.register(voicesRoutes, options)
      v1.register(backendsRoutes, options)
      v1.register(voicePrefsRoutes, options)
    },
    { prefix: "/v1" },
  )

  return server
}
