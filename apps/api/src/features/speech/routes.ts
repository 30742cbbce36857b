import type { FastifyPluginAsync } from "fastify"

import { synthesizeSpeech } from "../../../../../packages/core/src/features/speech/service.js"
import type { ApiRouteOptions } from "../options.js"
import { MAX_GAP_MS, parseSpeechBody } from "./dto.js"

const speechBodySchema = {
  type: "object",
  properties: {
    model: { type: "string" },
    input: { type: "string", minLength: 1 },
    voice: { type: "string", minLength: 1 },
    response_format: { type: "string" },
    speed: { type: "number", minimum: 0.25, maximum: 4 },
    gap_ms: { type: ["integer", "null"], minimum: 0, maximum: MAX_GAP_MS },
  },
  required: ["input", "voice"],
} as const

export const speechRoutes: FastifyPluginAsync<ApiRouteOptions> = async (fastify, options) => {
  fastify.post(
    "/audio/speech",
    {
      schema: {
        body: speechBodySchema,
      },
    },
    async (request, reply) => {
      const body = parseSpeechBody(request.body)
      const result = await synthesizeSpeech(options.runtime, body)

      return reply
        .header("content-type", result.contentType)
        .header("x-tts-backend", result.backend)
        .header("x-tts-chunks", String(result.chunks))
        .send(result.audio)
    },
  )
}
