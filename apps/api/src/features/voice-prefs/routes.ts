import type { FastifyPluginAsync } from "fastify"

import { TtsProxyError } from "../../../../../packages/core/src/errors.js"
import { requireObjectBody, requireString } from "../../shared/request/body.js"
import type { ApiRouteOptions } from "../options.js"

const voiceParamsSchema = {
  type: "object",
  properties: {
    voice: { type: "string", minLength: 1 },
  },
  required: ["voice"],
} as const

const voicePrefBodySchema = {
  type: "object",
  properties: {
    backend: { type: "string", minLength: 1 },
  },
  required: ["backend"],
} as const

export const voicePrefsRoutes: FastifyPluginAsync<ApiRouteOptions> = async (fastify, options) => {
  const { preferences, router } = options.runtime

  fastify.get("/voice-prefs", async () => ({
    ok: true,
    preferences: preferences.listAll(),
  }))

  fastify.post<{ Params: { voice: string } }>(
    "/voice-prefs/:voice",
    {
      schema: {
        params: voiceParamsSchema,
        body: voicePrefBodySchema,
      },
    },
    async (request) => {
      const { voice } = request.params
      const backend = requireString(requireObjectBody(request.body), "backend").trim()
      if (!router.getBackend(backend)) {
        throw new TtsProxyError(`Unknown backend: ${backend}`, "UNKNOWN_BACKEND", 2, 400)
      }

      preferences.set(voice, backend)
      return {
        ok: true,
        status: "ok",
        voice,
        backend,
      }
    },
  )

  fastify.delete<{ Params: { voice: string } }>(
    "/voice-prefs/:voice",
    {
      schema: {
        params: voiceParamsSchema,
      },
    },
    async (request) => ({
      ok: true,
      status: "ok",
      removed: preferences.remove(request.params.voice),
    }),
  )
}
