import type { FastifyPluginAsync } from "fastify"

import { TtsProxyError } from "../../../../../packages/core/src/errors.js"
import type { ApiRouteOptions } from "../options.js"

export const voicesRoutes: FastifyPluginAsync<ApiRouteOptions> = async (fastify, options) => {
  const { runtime } = options

  fastify.get("/voices", async () => {
    const library = runtime.voices.list()

    let backendName: string | null = null
    let backendVoices: string[] = []
    try {
      const backend = await runtime.router.getActiveBackend()
      backendName = backend.name
      backendVoices = backend.listVoices ? await backend.listVoices() : []
    } catch (error) {
      if (!(error instanceof TtsProxyError && error.code === "NO_BACKEND_AVAILABLE")) {
        throw error
      }
    }

    const voices = [...new Set([...library, ...backendVoices])]
    return {
      ok: true,
      voices,
      count: voices.length,
      backend: backendName,
      library: runtime.voices.listDetailed(),
    }
  })

  fastify.post("/voices/refresh", async () => {
    const count = await runtime.voices.refresh()
    return {
      ok: true,
      status: "ok",
      voice_count: count,
    }
  })
}
