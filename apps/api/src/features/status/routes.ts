import type { FastifyPluginAsync } from "fastify"

import { TtsProxyError } from "../../../../../packages/core/src/errors.js"
import type { ApiRouteOptions } from "../options.js"

export const SERVICE_NAME = "Unified TTS Proxy"
export const SERVICE_VERSION = "0.1.0"
const MODEL_OWNER = "unified-tts"

export const statusRoutes: FastifyPluginAsync<ApiRouteOptions> = async (fastify, options) => {
  const { router, voices } = options.runtime

  const activeBackendName = async (): Promise<string | null> => {
    try {
      return (await router.getActiveBackend()).name
    } catch (error) {
      if (error instanceof TtsProxyError && error.code === "NO_BACKEND_AVAILABLE") {
        return null
      }
      throw error
    }
  }

  fastify.get("/", async () => ({
    ok: true,
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    active_backend: await activeBackendName(),
    voice_count: voices.size,
    endpoints: {
      speech: "POST /v1/audio/speech",
      voices: "GET /v1/voices",
      backends: "GET /v1/backends",
      voice_prefs: "GET /v1/voice-prefs",
      health: "GET /health",
    },
  }))

  fastify.get("/health", async (_request, reply) => {
    const backend = await activeBackendName()
    if (!backend) {
      return reply.code(503).send({ ok: false, status: "error", message: "No backend available" })
    }
    return { ok: true, status: "ok", backend }
  })

  fastify.get("/v1/models", async () => ({
    object: "list",
    data: [
      { id: "tts-1", object: "model", owned_by: MODEL_OWNER },
      { id: "tts-1-hd", object: "model", owned_by: MODEL_OWNER },
      ...router.names.map((name) => ({ id: name, object: "model", owned_by: MODEL_OWNER })),
    ],
  }))
}
