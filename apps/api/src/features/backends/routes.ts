import type { FastifyPluginAsync } from "fastify"

import { TtsProxyError } from "../../../../../packages/core/src/errors.js"
import { getProfile } from "../../../../../packages/core/src/features/profiles/profiles.js"
import type { ApiRouteOptions } from "../options.js"
import { parseSwitchBody } from "./dto.js"

const switchBodySchema = {
  type: "object",
  properties: {
    backend: { type: ["string", "null"] },
  },
  required: ["backend"],
} as const

export const backendsRoutes: FastifyPluginAsync<ApiRouteOptions> = async (fastify, options) => {
  const { router } = options.runtime

  fastify.get("/backends", async () => {
    const backends = await router.listBackends()
    return {
      ok: true,
      backends: backends.map((backend) => ({ ...backend, profile: getProfile(backend.name) })),
      preferred: router.preferred,
    }
  })

  fastify.post(
    "/backends/switch",
    {
      schema: {
        body: switchBodySchema,
      },
    },
    async (request) => {
      const backend = parseSwitchBody(request.body)
      if (!router.setPreferred(backend)) {
        throw new TtsProxyError(`Unknown backend: ${backend}`, "UNKNOWN_BACKEND", 2, 400)
      }
      return {
        ok: true,
        status: "ok",
        preferred: router.preferred,
      }
    },
  )
}
