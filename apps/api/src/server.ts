import type { AppConfig } from "../../../packages/core/src/config.js"
import { TtsProxyError } from "../../../packages/core/src/errors.js"
import { createRuntime, type ProxyRuntime, type RuntimeOverrides } from "../../../packages/core/src/features/runtime/runtime.js"
import { createChildLogger } from "../../../packages/core/src/logger.js"
import { createApiApp } from "./app/create-api-app.js"

const log = createChildLogger("server")

export type StartApiServerOptions = {
  config: AppConfig
  host?: string
  port?: number
  overrides?: RuntimeOverrides
}

export type StartedApiServer = {
  host: string
  port: number
  runtime: ProxyRuntime
  close: () => Promise<void>
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string"
}

export async function startApiServer(options: StartApiServerOptions): Promise<StartedApiServer> {
  const host = options.host ?? options.config.host
  const port = options.port ?? options.config.port
  const runtime = await createRuntime(options.config, options.overrides)
  const app = createApiApp({ runtime })

  try {
    await app.listen({ host, port })
  } catch (error) {
    runtime.close()
    if (isErrnoException(error) && error.code === "EADDRINUSE") {
      throw new TtsProxyError(`Port ${port} on ${host} is already in use.`, "CONFIG_ERROR", 2, 500)
    }
    throw error
  }

  const address = app.server.address()
  const boundPort = address && typeof address === "object" ? address.port : port
  log.info({ host, port: boundPort, backends: runtime.router.names }, "unified TTS proxy listening")

  return {
    host,
    port: boundPort,
    runtime,
    close: async () => {
      await app.close()
      runtime.close()
    },
  }
}
