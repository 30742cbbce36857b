import fs from "node:fs"
import path from "node:path"

import { CommanderError } from "commander"
import { afterEach, describe, expect, it } from "vitest"

import { loadConfig } from "../../../packages/core/src/config.js"
import type { RuntimeOverrides } from "../../../packages/core/src/features/runtime/runtime.js"
import { InMemoryVoicePreferenceStore } from "../../../packages/core/src/features/voices/preferences.js"
import { createChildLogger, logger, setLogLevel } from "../../../packages/core/src/logger.js"
import {
  constantWav,
  createTempDir,
  FakeBackend,
  RecordingTranscoder,
  writeScript,
  writeVoice,
} from "../../../packages/core/test/helpers.js"
import { createProgram } from "../src/program.js"

type CliRun = {
  stdout: string
  stderr: string
  exitCodes: number[]
}

async function runCli(
  args: string[],
  options: { env?: NodeJS.ProcessEnv; overrides?: RuntimeOverrides } = {},
): Promise<CliRun> {
  const run: CliRun = { stdout: "", stderr: "", exitCodes: [] }
  const program = createProgram({
    io: {
      stdout: (text) => {
        run.stdout += text
      },
      stderr: (text) => {
        run.stderr += text
      },
      exit: (code) => {
        run.exitCodes.push(code)
      },
    },
    loadConfig: () => loadConfig({ LOG_LEVEL: "silent", ...options.env }),
    overrides: options.overrides,
  })
  await program.parseAsync(args, { from: "user" })
  return run
}

function parseJson(run: CliRun): unknown {
  return JSON.parse(run.stdout)
}

/** A 30-word sentence that starts with `label`. */
function sentence(label: string): string {
  return `${label} ${Array.from({ length: 28 }, (_, i) => `w${i}`).join(" ")} end.`
}

describe("cli", () => {
  const tempDirs: string[] = []

  afterEach(() => {
    setLogLevel("silent")
    while (tempDirs.length > 0) {
      const dir = tempDirs.pop()
      if (dir) {
        fs.rmSync(dir, { recursive: true, force: true })
      }
    }
  })

  function tempDir(): string {
    const dir = createTempDir("unified-tts-cli-")
    tempDirs.push(dir)
    return dir
  }

  it("prints the profile table as JSON", async () => {
    const run = await runCli(["profiles", "--json"])

    expect(run.exitCodes).toEqual([])
    expect(parseJson(run)).toMatchObject({
      ok: true,
      profiles: expect.arrayContaining([expect.objectContaining({ name: "kyutai", maxWords: 40, crossfadeMs: 30 })]),
    })
  })

  it("previews chunking for a backend", async () => {
    const text = [sentence("alpha"), sentence("bravo")].join(" ")

    const run = await runCli(["chunk", text, "--backend", "kyutai", "--json"])

    expect(parseJson(run)).toEqual({
      ok: true,
      backend: "kyutai",
      known_profile: true,
      chunks: [
        { index: 0, words: 30, chars: sentence("alpha").length, text: sentence("alpha") },
        { index: 1, words: 30, chars: sentence("bravo").length, text: sentence("bravo") },
      ],
    })
  })

  it("prints chunks as plain text", async () => {
    const run = await runCli(["chunk", "Hello there.", "--backend", "unknown-backend"])

    expect(run.stdout).toBe("[1] (2 words, 12 chars) Hello there.\n")
  })

  it("lists backend availability", async () => {
    const run = await runCli(["backends", "--json"], {
      env: { UNIFIED_TTS_PREFERRED_BACKEND: "higgs" },
      overrides: {
        backends: [
          new FakeBackend({ name: "openaudio", port: 9877, resourceCost: 5 }),
          new FakeBackend({ name: "higgs", port: 8085, resourceCost: 15 }),
        ],
      },
    })

    expect(parseJson(run)).toEqual({
      ok: true,
      preferred: "higgs",
      backends: [
        { name: "openaudio", available: true, port: 9877, resource_cost: 5, active: false },
        { name: "higgs", available: true, port: 8085, resource_cost: 15, active: true },
      ],
    })
  })

  it("applies the configured log level", async () => {
    const component = createChildLogger("cli-test")

    await runCli(["backends", "--json"], {
      env: { LOG_LEVEL: "warn" },
      overrides: { backends: [new FakeBackend({ name: "openaudio" })] },
    })

    expect(logger.level).toBe("warn")
    expect(component.level).toBe("warn")
  })

  it("manages voice preferences in the database", async () => {
    const dbPath = path.join(tempDir(), "prefs.db")
    const env = { UNIFIED_TTS_BACKENDS: "kokoro,higgs" }

    const saved = await runCli(["--db-path", dbPath, "voice-prefs", "set", "Alice", "higgs", "--json"], { env })
    expect(parseJson(saved)).toEqual({ ok: true, voice: "alice", backend: "higgs" })

    const listed = await runCli(["--db-path", dbPath, "voice-prefs", "list"], { env })
    expect(listed.stdout).toBe("alice -> higgs\n")

    const removed = await runCli(["--db-path", dbPath, "voice-prefs", "rm", "alice", "--json"], { env })
    expect(parseJson(removed)).toEqual({ ok: true, voice: "alice", removed: true })

    const empty = await runCli(["--db-path", dbPath, "voice-prefs", "list"], { env })
    expect(empty.stdout).toBe("No voice preferences saved.\n")
  })

  it("rejects preferences for backends that are not configured", async () => {
    const dbPath = path.join(tempDir(), "prefs.db")

    const run = await runCli(["--db-path", dbPath, "voice-prefs", "set", "alice", "bark", "--json"], {
      env: { UNIFIED_TTS_BACKENDS: "kokoro" },
    })

    expect(run.exitCodes).toEqual([2])
    expect(parseJson(run)).toEqual({
      ok: false,
      error: { code: "UNKNOWN_BACKEND", message: "Unknown backend: bark. Configured: kokoro." },
    })
  })

  it("prints errors to stderr outside JSON mode", async () => {
    const run = await runCli(["voice-prefs", "set", "alice", "bark"], {
      env: { UNIFIED_TTS_BACKENDS: "kokoro", UNIFIED_TTS_DB_PATH: ":memory:" },
    })

    expect(run.stdout).toBe("")
    expect(run.stderr).toBe("Unknown backend: bark. Configured: kokoro.\n")
    expect(run.exitCodes).toEqual([2])
  })

  it("lists voices from the voice directory", async () => {
    const voiceDir = path.join(tempDir(), "voices")
    writeVoice(voiceDir, "zoe")
    writeVoice(voiceDir, "adam")

    const run = await runCli(["--voice-dir", voiceDir, "voices"])

    expect(run.stdout).toBe("adam\nzoe\n")
  })

  it("synthesizes to a file without a server", async () => {
    const dir = tempDir()
    const voiceDir = path.join(dir, "voices")
    writeVoice(voiceDir, "alice")
    const outPath = path.join(dir, "out", "hello.wav")
    const wav = constantWav(50)
    const backend = new FakeBackend({ name: "openaudio", generate: async () => wav })

    const run = await runCli(["speak", "Hello.", "--voice", "alice", "--format", "wav", "--out", outPath, "--json"], {
      env: { UNIFIED_TTS_VOICE_DIR: voiceDir, UNIFIED_TTS_DB_PATH: ":memory:" },
      overrides: {
        backends: [backend],
        namespaces: [],
        preferences: new InMemoryVoicePreferenceStore(),
        transcoder: new RecordingTranscoder(),
      },
    })

    expect(parseJson(run)).toEqual({
      ok: true,
      file: outPath,
      format: "wav",
      backend: "openaudio",
      chunks: 1,
      bytes: wav.length,
    })
    expect(fs.readFileSync(outPath)).toEqual(wav)
  })

  it("reports speech failures with their error code", async () => {
    const voiceDir = path.join(tempDir(), "voices")

    const run = await runCli(["speak", "Hello.", "--voice", "ghost", "--json"], {
      env: { UNIFIED_TTS_VOICE_DIR: voiceDir, UNIFIED_TTS_DB_PATH: ":memory:" },
      overrides: { backends: [new FakeBackend({ name: "openaudio" })], namespaces: [] },
    })

    expect(run.exitCodes).toEqual([2])
    expect(parseJson(run)).toEqual({
      ok: false,
      error: { code: "VOICE_NOT_FOUND", message: 'Voice "ghost" not found. Available: none.' },
    })
  })

  it("runs doctor checks", async () => {
    const dir = tempDir()
    const ffmpegCli = writeScript(dir, "ffmpeg", 'echo "ffmpeg version 7.1 Copyright"')

    const run = await runCli(["doctor", "--json"], {
      env: { UNIFIED_TTS_FFMPEG_CLI: ffmpegCli, UNIFIED_TTS_VOICE_DIR: path.join(dir, "voices") },
      overrides: { backends: [new FakeBackend({ name: "kokoro" })] },
    })

    expect(run.exitCodes).toEqual([])
    expect(parseJson(run)).toMatchObject({ ok: true, healthy: true, ffmpeg_version: "7.1" })
  })

  it("exits with code 2 when doctor finds a required failure", async () => {
    const dir = tempDir()

    const run = await runCli(["doctor"], {
      env: { UNIFIED_TTS_FFMPEG_CLI: path.join(dir, "missing-ffmpeg"), UNIFIED_TTS_VOICE_DIR: dir },
      overrides: { backends: [] },
    })

    expect(run.exitCodes).toEqual([2])
    expect(run.stdout.split("\n")[0]).toMatch(/^ffmpeg {5}FAIL /)
    expect(run.stdout).toContain("healthy: false\n")
  })

  it("rejects invalid options through commander", async () => {
    await expect(runCli(["serve", "--port", "99999"])).rejects.toBeInstanceOf(CommanderError)
  })
})
