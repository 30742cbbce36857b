import fs from "node:fs"
import path from "node:path"

import { Command, InvalidArgumentError } from "commander"

import { startApiServer } from "../../api/src/server.js"
import { loadConfigFromEnvironment, type AppConfig } from "../../../packages/core/src/config.js"
import { TtsProxyError } from "../../../packages/core/src/errors.js"
import { chunkText, countWords } from "../../../packages/core/src/features/chunking/chunker.js"
import { inspectProxyHealth } from "../../../packages/core/src/features/doctor/doctor.js"
import { getProfile, isKnownProfile, listProfiles } from "../../../packages/core/src/features/profiles/profiles.js"
import { createRuntime, type RuntimeOverrides } from "../../../packages/core/src/features/runtime/runtime.js"
import { BackendRouter } from "../../../packages/core/src/features/routing/router.js"
import { synthesizeSpeech } from "../../../packages/core/src/features/speech/service.js"
import { VoiceLibrary } from "../../../packages/core/src/features/voices/library.js"
import { loadVoiceNamespaces } from "../../../packages/core/src/features/voices/namespaces.js"
import { SqliteVoicePreferenceStore } from "../../../packages/core/src/features/voices/preferences.js"
import { parseAudioFormat } from "../../../packages/core/src/lib/audio/formats.js"
import { resolveDbPath, resolvePath, resolveVoiceDir } from "../../../packages/core/src/lib/paths.js"
import { createBackends } from "../../../packages/core/src/lib/tts/providers/index.js"
import { setLogLevel } from "../../../packages/core/src/logger.js"

export type CliIo = {
  stdout: (text: string) => void
  stderr: (text: string) => void
  exit: (code: number) => void
}

export type CreateProgramOptions = {
  io?: CliIo
  loadConfig?: () => AppConfig
  overrides?: RuntimeOverrides
  /** Resolves when `serve` should shut down; defaults to SIGINT/SIGTERM. */
  waitForShutdown?: () => Promise<void>
}

type GlobalOptions = {
  dbPath?: string
  voiceDir?: string
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  exit: (code) => process.exit(code),
}

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    process.once("SIGINT", () => resolve())
    process.once("SIGTERM", () => resolve())
  })
}

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10)
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError("Expected a valid port in range 1..65535.")
  }
  return port
}

export function createProgram(options: CreateProgramOptions = {}): Command {
  const io = options.io ?? processIo
  const loadConfig = options.loadConfig ?? loadConfigFromEnvironment

  const printJson = (value: unknown): void => {
    io.stdout(`${JSON.stringify(value, null, 2)}\n`)
  }

  const printError = (message: string, jsonMode: boolean, code: string, exitCode: number): void => {
    if (jsonMode) {
      printJson({
        ok: false,
        error: {
          code,
          message,
        },
      })
    } else {
      io.stderr(`${message}\n`)
    }
    io.exit(exitCode)
  }

  const handleActionError = (error: unknown, jsonMode: boolean): void => {
    if (error instanceof TtsProxyError) {
      printError(error.message, jsonMode, error.code, error.exitCode)
      return
    }

    const message = error instanceof Error ? error.message : "Unknown error"
    if (message.includes("Could not locate the bindings file") || message.includes("better_sqlite3.node")) {
      printError(
        "SQLite native bindings are missing for better-sqlite3. Run `npm rebuild better-sqlite3`.",
        jsonMode,
        "SQLITE_BINDINGS_MISSING",
        2,
      )
      return
    }

    printError(message, jsonMode, "INTERNAL_ERROR", 1)
  }

  const runAction = async (jsonMode: boolean, action: () => Promise<void> | void): Promise<void> => {
    try {
      await action()
    } catch (error) {
      handleActionError(error, jsonMode)
    }
  }

  const program = new Command()

  // Global flags override the environment.
  const resolveConfig = (): AppConfig => {
    const config = loadConfig()
    setLogLevel(config.logging.level)
    const globals = program.opts<GlobalOptions>()
    return {
      ...config,
      dbPath: globals.dbPath ? resolveDbPath(globals.dbPath) : config.dbPath,
      voiceDir: globals.voiceDir ? resolveVoiceDir(globals.voiceDir) : config.voiceDir,
    }
  }

  const withPreferences = async (action: (store: SqliteVoicePreferenceStore) => Promise<void> | void) => {
    const store = SqliteVoicePreferenceStore.open(resolveConfig().dbPath)
    try {
      await action(store)
    } finally {
      store.close()
    }
  }

  program
    .name("unified-tts")
    .description("OpenAI-compatible TTS proxy in front of several TTS backends")
    .version("0.1.0")
    .option("--db-path <path>", "Path to the voice preference database")
    .option("--voice-dir <path>", "Directory of cloning voices")
    .exitOverride()

  program.configureOutput({
    writeOut: (str) => io.stdout(str),
    writeErr: (str) => io.stderr(str),
  })

  program.addHelpText(
    "afterAll",
    `
Quick Reference:
  unified-tts serve [--host <host>] [--port <n>]
  unified-tts backends [--json]
  unified-tts profiles [--json]
  unified-tts chunk <text> [--backend <name>] [--json]
  unified-tts speak <text> --voice <name> [--format mp3|opus|aac|flac|wav|pcm] [--out <file>] [--gap-ms <n>] [--json]
  unified-tts voices [--json]
  unified-tts voice-prefs list [--json]
  unified-tts voice-prefs set <voice> <backend> [--json]
  unified-tts voice-prefs rm <voice> [--json]
  unified-tts doctor [--json]
`,
  )

  program
    .command("serve")
    .description("Start the HTTP API")
    .option("--host <host>", "Interface to bind")
    .option("--port <n>", "Port to listen on", parsePort)
    .action(async (opts: { host?: string; port?: number }) => {
      await runAction(false, async () => {
        const server = await startApiServer({
          config: resolveConfig(),
          host: opts.host,
          port: opts.port,
          overrides: options.overrides,
        })
        io.stdout(`Unified TTS proxy listening on http://${server.host}:${server.port}\n`)
        await (options.waitForShutdown ?? waitForSignal)()
        await server.close()
      })
    })

  program
    .command("backends")
    .description("Probe every configured backend")
    .option("--json", "Print machine-readable JSON output")
    .action(async (opts: { json?: boolean }) => {
      const jsonMode = Boolean(opts.json)
      await runAction(jsonMode, async () => {
        const config = resolveConfig()
        const router = new BackendRouter(
          options.overrides?.backends ?? createBackends(config, options.overrides?.namespaces ?? loadVoiceNamespaces()),
        )
        if (config.preferredBackend) {
          router.setPreferred(config.preferredBackend)
        }
        const backends = await router.listBackends()

        if (jsonMode) {
          printJson({ ok: true, backends, preferred: router.preferred })
          return
        }
        for (const backend of backends) {
          const marker = backend.active ? "*" : " "
          const state = backend.available ? "up" : "down"
          io.stdout(`${marker} ${backend.name.padEnd(12)} ${state.padEnd(5)} port=${backend.port} cost=${backend.resource_cost}\n`)
        }
      })
    })

  program
    .command("profiles")
    .description("Show per-backend chunking limits")
    .option("--json", "Print machine-readable JSON output")
    .action(async (opts: { json?: boolean }) => {
      const jsonMode = Boolean(opts.json)
      await runAction(jsonMode, () => {
        const profiles = listProfiles()
        if (jsonMode) {
          printJson({ ok: true, profiles })
          return
        }
        for (const profile of profiles) {
          io.stdout(
            `${profile.name.padEnd(12)} words<=${profile.maxWords} chars<=${profile.maxChars} crossfade=${profile.crossfadeMs}ms${profile.needsChunking ? "" : " (no chunking)"}\n`,
          )
        }
      })
    })

  program
    .command("chunk <text>")
    .description("Preview how text would be split for a backend")
    .option("--backend <name>", "Backend profile to use", "openaudio")
    .option("--json", "Print machine-readable JSON output")
    .action(async (text: string, opts: { backend: string; json?: boolean }) => {
      const jsonMode = Boolean(opts.json)
      await runAction(jsonMode, () => {
        const profile = getProfile(opts.backend)
        const chunks = chunkText(text, profile)

        if (jsonMode) {
          printJson({
            ok: true,
            backend: opts.backend,
            known_profile: isKnownProfile(opts.backend),
            chunks: chunks.map((chunk, index) => ({
              index,
              words: countWords(chunk),
              chars: chunk.length,
              text: chunk,
            })),
          })
          return
        }
        chunks.forEach((chunk, index) => {
          io.stdout(`[${index + 1}] (${countWords(chunk)} words, ${chunk.length} chars) ${chunk}\n`)
        })
      })
    })

  program
    .command("speak <text>")
    .description("Synthesize speech without starting the server")
    .requiredOption("--voice <name>", "Voice name")
    .option("--format <format>", "Output format", "mp3")
    .option("--out <file>", "Output file (defaults to speech.<format>)")
    .option("--gap-ms <n>", "Join chunks with silence instead of crossfades", (value) => {
      const parsed = Number.parseInt(value, 10)
      if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError("Expected a non-negative integer.")
      }
      return parsed
    })
    .option("--json", "Print machine-readable JSON output")
    .action(
      async (
        text: string,
        opts: { voice: string; format: string; out?: string; gapMs?: number; json?: boolean },
      ) => {
        const jsonMode = Boolean(opts.json)
        await runAction(jsonMode, async () => {
          const format = parseAudioFormat(opts.format)
          const runtime = await createRuntime(resolveConfig(), options.overrides)
          try {
            const result = await synthesizeSpeech(runtime, {
              input: text,
              voice: opts.voice,
              format,
              gapMs: opts.gapMs ?? null,
            })
            const outPath = resolvePath(opts.out ?? `speech.${format}`)
            fs.mkdirSync(path.dirname(outPath), { recursive: true })
            fs.writeFileSync(outPath, result.audio)

            if (jsonMode) {
              printJson({
                ok: true,
                file: outPath,
                format,
                backend: result.backend,
                chunks: result.chunks,
                bytes: result.audio.length,
              })
              return
            }
            io.stdout(`wrote ${outPath} (${result.audio.length} bytes, ${result.backend}, ${result.chunks} chunk(s))\n`)
          } finally {
            runtime.close()
          }
        })
      },
    )

  program
    .command("voices")
    .description("List cloning voices in the voice directory")
    .option("--json", "Print machine-readable JSON output")
    .action(async (opts: { json?: boolean }) => {
      const jsonMode = Boolean(opts.json)
      await runAction(jsonMode, async () => {
        const library = new VoiceLibrary(resolveConfig().voiceDir)
        await library.refresh()

        if (jsonMode) {
          printJson({ ok: true, voice_dir: library.voiceDir, voices: library.listDetailed() })
          return
        }
        if (library.size === 0) {
          io.stdout(`No voices found in ${library.voiceDir}\n`)
          return
        }
        io.stdout(`${library.list().join("\n")}\n`)
      })
    })

  const voicePrefs = program.command("voice-prefs").description("Manage per-voice backend preferences")

  voicePrefs
    .command("list")
    .description("Show saved preferences")
    .option("--json", "Print machine-readable JSON output")
    .action(async (opts: { json?: boolean }) => {
      const jsonMode = Boolean(opts.json)
      await runAction(jsonMode, () =>
        withPreferences((store) => {
          const preferences = store.listAll()
          if (jsonMode) {
            printJson({ ok: true, preferences })
            return
          }
          const entries = Object.entries(preferences)
          if (entries.length === 0) {
            io.stdout("No voice preferences saved.\n")
            return
          }
          for (const [voice, backend] of entries) {
            io.stdout(`${voice} -> ${backend}\n`)
          }
        }),
      )
    })

  voicePrefs
    .command("set <voice> <backend>")
    .description("Route a voice to a backend")
    .option("--json", "Print machine-readable JSON output")
    .action(async (voice: string, backend: string, opts: { json?: boolean }) => {
      const jsonMode = Boolean(opts.json)
      await runAction(jsonMode, () => {
        const known = resolveConfig().backendOrder
        if (!known.includes(backend)) {
          throw new TtsProxyError(
            `Unknown backend: ${backend}. Configured: ${known.join(", ")}.`,
            "UNKNOWN_BACKEND",
            2,
            400,
          )
        }
        return withPreferences((store) => {
          store.set(voice, backend)
          if (jsonMode) {
            printJson({ ok: true, voice: voice.toLowerCase(), backend })
            return
          }
          io.stdout(`${voice.toLowerCase()} -> ${backend}\n`)
        })
      })
    })

  voicePrefs
    .command("rm <voice>")
    .description("Remove a voice preference")
    .option("--json", "Print machine-readable JSON output")
    .action(async (voice: string, opts: { json?: boolean }) => {
      const jsonMode = Boolean(opts.json)
      await runAction(jsonMode, () =>
        withPreferences((store) => {
          const removed = store.remove(voice)
          if (jsonMode) {
            printJson({ ok: true, voice: voice.toLowerCase(), removed })
            return
          }
          io.stdout(removed ? `removed ${voice.toLowerCase()}\n` : `no preference for ${voice.toLowerCase()}\n`)
        }),
      )
    })

  program
    .command("doctor")
    .description("Check ffmpeg, the voice directory and backend reachability")
    .option("--json", "Print machine-readable JSON output")
    .action(async (opts: { json?: boolean }) => {
      const jsonMode = Boolean(opts.json)
      await runAction(jsonMode, async () => {
        const config = resolveConfig()
        const report = await inspectProxyHealth({
          ffmpegCli: config.ffmpegCli,
          voices: new VoiceLibrary(config.voiceDir),
          router: new BackendRouter(
            options.overrides?.backends ?? createBackends(config, options.overrides?.namespaces ?? loadVoiceNamespaces()),
          ),
        })

        if (jsonMode) {
          printJson({ ok: true, ...report })
        } else {
          for (const check of report.checks) {
            const state = check.ok ? "ok" : check.required ? "FAIL" : "warn"
            io.stdout(`${check.id.padEnd(10)} ${state.padEnd(5)} ${check.message ?? check.path ?? ""}\n`)
          }
          io.stdout(`healthy: ${report.healthy}\n`)
        }

        if (!report.healthy) {
          io.exit(2)
        }
      })
    })

  return program
}
