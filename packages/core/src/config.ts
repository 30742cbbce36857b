/**
 * Environment configuration.
 *
 * Every setting can be overridden through the environment or a `.env` file in the
 * working directory.
 */

import * as dotenv from "dotenv"
import { z } from "zod"

import { TtsProxyError } from "./errors.js"
import { resolveDbPath, resolveVoiceDir } from "./lib/paths.js"
import { loggerEnvSchema, type LoggerSettings } from "./logger.js"

export const DEFAULT_BACKEND_ORDER = [
  "vibevoice",
  "higgs",
  "openaudio",
  "kyutai",
  "kokoro",
  "voxcpm15",
  "qwen3_tts",
  "elevenlabs",
] as const

const commaList = (value: string): string[] =>
  value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)

const envSchema = z.object({
  // ===== Server =====
  UNIFIED_TTS_HOST: z.string().min(1).default("0.0.0.0"),
  UNIFIED_TTS_PORT: z.coerce.number().int().min(1).max(65535).default(8765),

  // ===== Storage =====
  UNIFIED_TTS_VOICE_DIR: z.string().optional(),
  UNIFIED_TTS_DB_PATH: z.string().optional(),

  // ===== Routing =====
  UNIFIED_TTS_BACKENDS: z.string().default(DEFAULT_BACKEND_ORDER.join(",")).transform(commaList),
  UNIFIED_TTS_PREFERRED_BACKEND: z.string().trim().optional(),
  UNIFIED_TTS_CHUNK_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),

  // ===== Backend hosts =====
  OPENAUDIO_HOST: z.string().url().default("http://localhost:9877"),
  KOKORO_HOST: z.string().url().default("http://localhost:8880"),
  HIGGS_HOST: z.string().url().default("http://localhost:8085"),
  VIBEVOICE_HOST: z.string().url().default("http://localhost:8086"),
  QWEN3_TTS_HOST: z.string().url().default("http://localhost:7871"),
  VOXCPM15_HOST: z.string().url().optional(),
  VOXCPM15_HOSTS: z.string().default("http://localhost:7870").transform(commaList),
  KYUTAI_HOSTS: z.string().default("http://localhost:8899"),

  // ===== Cloud =====
  ELEVENLABS_API_KEY: z.string().default(""),

  // ===== Tools =====
  UNIFIED_TTS_FFMPEG_CLI: z.string().optional(),
}).merge(loggerEnvSchema)

export type KyutaiHost = {
  name: string
  url: string
}

export type AppConfig = {
  host: string
  port: number
  voiceDir: string
  dbPath: string
  backendOrder: string[]
  preferredBackend: string | null
  chunkConcurrency: number
  hosts: {
    openaudio: string
    kokoro: string
    higgs: string
    vibevoice: string
    qwen3Tts: string
    voxcpm15: string | null
    voxcpm15Fleet: string[]
    kyutai: KyutaiHost[]
  }
  elevenLabsApiKey: string
  ffmpegCli: string | null
  logging: LoggerSettings
}

/**
 * Accepts `url`, `url1,url2` or `name1=url1,name2=url2`.
 */
export function parseKyutaiHosts(value: string): KyutaiHost[] {
  const parts = commaList(value)

  if (value.includes("=")) {
    const hosts: KyutaiHost[] = []
    for (const part of parts) {
      const separator = part.indexOf("=")
      if (separator === -1) {
        continue
      }
      hosts.push({
        name: part.slice(0, separator).trim(),
        url: part.slice(separator + 1).trim(),
      })
    }
    return hosts
  }

  if (parts.length > 1) {
    return parts.map((url, index) => ({ name: `host${index}`, url }))
  }

  return parts.map((url) => ({ name: "default", url }))
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ")
    throw new TtsProxyError(`Invalid configuration. ${details}`, "CONFIG_ERROR", 2, 500)
  }

  const values = parsed.data
  const preferred = values.UNIFIED_TTS_PREFERRED_BACKEND

  return {
    host: values.UNIFIED_TTS_HOST,
    port: values.UNIFIED_TTS_PORT,
    voiceDir: resolveVoiceDir(values.UNIFIED_TTS_VOICE_DIR),
    dbPath: resolveDbPath(values.UNIFIED_TTS_DB_PATH),
    backendOrder: values.UNIFIED_TTS_BACKENDS,
    preferredBackend: preferred && preferred.length > 0 ? preferred : null,
    chunkConcurrency: values.UNIFIED_TTS_CHUNK_CONCURRENCY,
    hosts: {
      openaudio: values.OPENAUDIO_HOST,
      kokoro: values.KOKORO_HOST,
      higgs: values.HIGGS_HOST,
      vibevoice: values.VIBEVOICE_HOST,
      qwen3Tts: values.QWEN3_TTS_HOST,
      voxcpm15: values.VOXCPM15_HOST ?? null,
      voxcpm15Fleet: values.VOXCPM15_HOSTS,
      kyutai: parseKyutaiHosts(values.KYUTAI_HOSTS),
    },
    elevenLabsApiKey: values.ELEVENLABS_API_KEY,
    ffmpegCli: values.UNIFIED_TTS_FFMPEG_CLI?.trim() || null,
    logging: { level: values.LOG_LEVEL, pretty: values.LOG_PRETTY },
  }
}

/**
 * Loads `.env` from the working directory before reading the environment.
 */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config()
  return loadConfig(process.env)
}
