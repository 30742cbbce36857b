import process from "node:process"

import pino, { type Logger } from "pino"
import { z } from "zod"

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export type LoggerSettings = {
  level: LogLevel
  pretty: boolean
}

export const loggerEnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  LOG_PRETTY: z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform((value) => value === "true" || value === "1"),
})

/**
 * Reads the log settings field by field. An invalid value falls back to its
 * default here; `loadConfig` is what reports it.
 */
export function loggerSettingsFromEnv(env: NodeJS.ProcessEnv): LoggerSettings {
  const level = loggerEnvSchema.shape.LOG_LEVEL.safeParse(env.LOG_LEVEL)
  const pretty = loggerEnvSchema.shape.LOG_PRETTY.safeParse(env.LOG_PRETTY)
  return {
    level: level.success ? level.data : "info",
    pretty: pretty.success ? pretty.data : false,
  }
}

export function createRootLogger(settings: LoggerSettings): Logger {
  return pino({
    name: "unified-tts",
    level: settings.level,
    ...(settings.pretty && {
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname,name",
          messageFormat: "[{component}] {msg}",
        },
      },
    }),
    // ElevenLabs keys travel in the xi-api-key header.
    redact: {
      paths: ["apiKey", "*.apiKey", "elevenLabsApiKey", "*.elevenLabsApiKey", "headers['xi-api-key']"],
      censor: "[redacted]",
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
  })
}

export const logger = createRootLogger(loggerSettingsFromEnv(process.env))

const componentLoggers = new Set<Logger>()

export function createChildLogger(component: string): Logger {
  const child = logger.child({ component })
  componentLoggers.add(child)
  return child
}

/** Children copy the level when created, so existing ones are updated too. */
export function setLogLevel(level: LogLevel): void {
  logger.level = level
  for (const child of componentLoggers) {
    child.level = level
  }
}
