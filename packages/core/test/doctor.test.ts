import fs from "node:fs"
import path from "node:path"

import { afterEach, describe, expect, it } from "vitest"

import { inspectProxyHealth } from "../src/features/doctor/doctor.js"
import { BackendRouter } from "../src/features/routing/router.js"
import { VoiceLibrary } from "../src/features/voices/library.js"
import { createTempDir, FakeBackend, writeScript, writeVoice } from "./helpers.js"

describe("inspectProxyHealth", () => {
  const tempDirs: string[] = []

  afterEach(() => {
    while (tempDirs.length > 0) {
      const dir = tempDirs.pop()
      if (dir) {
        fs.rmSync(dir, { recursive: true, force: true })
      }
    }
  })

  function tempDir(): string {
    const dir = createTempDir("unified-tts-doctor-")
    tempDirs.push(dir)
    return dir
  }

  it("reports a healthy setup", async () => {
    const dir = tempDir()
    const ffmpegCli = writeScript(dir, "ffmpeg", 'echo "ffmpeg version 6.1.1 Copyright (c) the FFmpeg developers"')
    const voiceDir = path.join(dir, "voices")
    writeVoice(voiceDir, "alice")

    const report = await inspectProxyHealth({
      ffmpegCli,
      voices: new VoiceLibrary(voiceDir),
      router: new BackendRouter([new FakeBackend({ name: "down", available: false }), new FakeBackend({ name: "kokoro" })]),
    })

    expect(report.healthy).toBe(true)
    expect(report.ffmpeg_version).toBe("6.1.1")
    expect(report.checks).toEqual([
      { id: "ffmpeg", required: true, ok: true, path: ffmpegCli, message: null },
      { id: "voice_dir", required: false, ok: true, path: voiceDir, message: "1 voice found." },
      { id: "backends", required: false, ok: true, path: null, message: "Available: kokoro." },
    ])
    expect(report.backends.map((backend) => backend.active)).toEqual([false, true])
  })

  it("stays healthy without voices or backends", async () => {
    const dir = tempDir()
    const ffmpegCli = writeScript(dir, "ffmpeg", 'echo "ffmpeg version n7.0"')
    const voiceDir = path.join(dir, "missing")

    const report = await inspectProxyHealth({
      ffmpegCli,
      voices: new VoiceLibrary(voiceDir),
      router: new BackendRouter([]),
    })

    expect(report.healthy).toBe(true)
    expect(report.checks[1]).toMatchObject({
      ok: false,
      message: `Voice directory does not exist. Create it with: mkdir -p ${voiceDir}`,
    })
    expect(report.checks[2]).toMatchObject({ ok: false, message: "No backend is reachable." })
  })

  it("is unhealthy when ffmpeg fails", async () => {
    const dir = tempDir()
    const ffmpegCli = writeScript(dir, "ffmpeg", 'echo "libavcodec   missing" >&2\nexit 1')

    const report = await inspectProxyHealth({
      ffmpegCli,
      voices: new VoiceLibrary(dir),
      router: new BackendRouter([]),
    })

    expect(report.healthy).toBe(false)
    expect(report.ffmpeg_version).toBeNull()
    expect(report.checks[0]).toMatchObject({ id: "ffmpeg", ok: false, message: "libavcodec missing" })
  })

  it("is unhealthy when ffmpeg cannot be started", async () => {
    const missing = path.join(tempDir(), "no-ffmpeg-here")

    const report = await inspectProxyHealth({
      ffmpegCli: missing,
      voices: new VoiceLibrary(missing),
      router: new BackendRouter([]),
    })

    expect(report.healthy).toBe(false)
    expect(report.checks[0].message).toContain("ENOENT")
  })
})
