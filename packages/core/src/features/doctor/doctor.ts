import { spawnSync } from "node:child_process"
import fs from "node:fs"

import { resolveFfmpegCli } from "../../lib/audio/transcode.js"
import type { BackendRouter, BackendStatus } from "../routing/router.js"
import type { VoiceLibrary } from "../voices/library.js"

type ProbeResult = {
  ok: boolean
  output: string
  message: string | null
}

export type DoctorCheckId = "ffmpeg" | "voice_dir" | "backends"

export type DoctorCheck = {
  id: DoctorCheckId
  required: boolean
  ok: boolean
  path: string | null
  message: string | null
}

export type DoctorReport = {
  healthy: boolean
  checks: DoctorCheck[]
  ffmpeg_version: string | null
  backends: BackendStatus[]
}

export type DoctorOptions = {
  ffmpegCli?: string | null
  voices: VoiceLibrary
  router: BackendRouter
}

function truncateMessage(value: string): string {
  const normalized = value.trim().replaceAll(/\s+/g, " ")
  if (normalized.length <= 300) {
    return normalized
  }
  return `${normalized.slice(0, 300)}...`
}

function probeBinary(pathToBinary: string, args: string[]): ProbeResult {
  const result = spawnSync(pathToBinary, args, {
    encoding: "utf-8",
    timeout: 10_000,
  })

  const output = `${result.stdout ?? ""}\n${result.stderr ?? ""}`.trim()
  if (result.error) {
    return { ok: false, output, message: truncateMessage(result.error.message) }
  }

  const exitCode = typeof result.status === "number" ? result.status : null
  const ok = exitCode === 0
  return {
    ok,
    output,
    message: ok ? null : truncateMessage(output || `exit code ${String(exitCode)}`),
  }
}

function checkFfmpeg(explicitPath: string | null | undefined): { check: DoctorCheck; version: string | null } {
  const ffmpegPath = resolveFfmpegCli(explicitPath)
  if (!ffmpegPath) {
    return {
      check: {
        id: "ffmpeg",
        required: true,
        ok: false,
        path: null,
        message: "Not found in PATH and no override env var is set.",
      },
      version: null,
    }
  }

  const probe = probeBinary(ffmpegPath, ["-version"])
  const version = probe.ok ? (/ffmpeg version (\S+)/.exec(probe.output)?.[1] ?? null) : null
  return {
    check: { id: "ffmpeg", required: true, ok: probe.ok, path: ffmpegPath, message: probe.message },
    version,
  }
}

async function checkVoiceDir(voices: VoiceLibrary): Promise<DoctorCheck> {
  if (!fs.existsSync(voices.voiceDir)) {
    return {
      id: "voice_dir",
      required: false,
      ok: false,
      path: voices.voiceDir,
      message: `Voice directory does not exist. Create it with: mkdir -p ${voices.voiceDir}`,
    }
  }

  const count = await voices.refresh()
  return {
    id: "voice_dir",
    required: false,
    ok: true,
    path: voices.voiceDir,
    message: `${count} voice${count === 1 ? "" : "s"} found.`,
  }
}

function checkBackends(statuses: BackendStatus[]): DoctorCheck {
  const available = statuses.filter((status) => status.available).map((status) => status.name)
  return {
    id: "backends",
    required: false,
    ok: available.length > 0,
    path: null,
    message: available.length > 0 ? `Available: ${available.join(", ")}.` : "No backend is reachable.",
  }
}

export async function inspectProxyHealth(options: DoctorOptions): Promise<DoctorReport> {
  const ffmpeg = checkFfmpeg(options.ffmpegCli)
  const voiceDir = await checkVoiceDir(options.voices)
  const backends = await options.router.listBackends()

  const checks = [ffmpeg.check, voiceDir, checkBackends(backends)]
  return {
    healthy: checks.every((check) => !check.required || check.ok),
    checks,
    ffmpeg_version: ffmpeg.version,
    backends,
  }
}
