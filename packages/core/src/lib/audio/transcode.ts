import { randomBytes } from "node:crypto"
import { promises as fs } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { TtsProxyError } from "../../errors.js"
import { createChildLogger } from "../../logger.js"
import { resolveBinary, runCommand } from "../tts/command.js"
import { sniffAudioFormat, type AudioFormat } from "./formats.js"

const log = createChildLogger("transcoder")

export const FFMPEG_ENV_VAR = "UNIFIED_TTS_FFMPEG_CLI"
const DEFAULT_TRANSCODE_TIMEOUT_MS = 30_000

export interface AudioTranscoder {
  transcode(input: Buffer, target: AudioFormat): Promise<Buffer>
}

export type FfmpegTranscoderOptions = {
  ffmpegCli?: string | null
  timeoutMs?: number
}

export function ffmpegCodecArgs(target: AudioFormat): string[] {
  switch (target) {
    case "mp3":
      return ["-codec:a", "libmp3lame", "-q:a", "2"]
    case "opus":
      return ["-codec:a", "libopus", "-b:a", "128k"]
    case "aac":
      return ["-codec:a", "aac", "-b:a", "128k"]
    case "flac":
      return ["-codec:a", "flac"]
    case "pcm":
      return ["-f", "s16le", "-acodec", "pcm_s16le"]
    case "wav":
      return ["-codec:a", "pcm_s16le"]
  }
}

export function resolveFfmpegCli(explicitPath?: string | null): string | null {
  return resolveBinary({
    explicitPath,
    envVar: FFMPEG_ENV_VAR,
    binaryNames: ["ffmpeg"],
  })
}

export function createFfmpegTranscoder(options: FfmpegTranscoderOptions = {}): AudioTranscoder {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TRANSCODE_TIMEOUT_MS

  return {
    async transcode(input: Buffer, target: AudioFormat): Promise<Buffer> {
      const ffmpegCli = resolveFfmpegCli(options.ffmpegCli)
      if (!ffmpegCli) {
        throw new TtsProxyError(
          `ffmpeg not found. Install ffmpeg or set ${FFMPEG_ENV_VAR}=/full/path/to/ffmpeg.`,
          "TRANSCODE_ERROR",
          1,
          500,
        )
      }

      const tempId = randomBytes(8).toString("hex")
      const inputFile = join(tmpdir(), `unified-tts-in-${tempId}.${sniffAudioFormat(input)}`)
      const outputFile = join(tmpdir(), `unified-tts-out-${tempId}.${target}`)

      try {
        await fs.writeFile(inputFile, input)

        const result = await runCommand(
          ffmpegCli,
          ["-y", "-i", inputFile, ...ffmpegCodecArgs(target), outputFile],
          { timeoutMs },
        )

        if (result.timedOut) {
          throw new TtsProxyError(
            `ffmpeg timed out after ${timeoutMs}ms converting to ${target}.`,
            "TRANSCODE_ERROR",
            1,
            500,
          )
        }

        if (result.code !== 0) {
          throw new TtsProxyError(
            `ffmpeg error: ${result.stderr.slice(0, 200) || `exit code ${result.code}`}`,
            "TRANSCODE_ERROR",
            1,
            500,
          )
        }

        const output = await fs.readFile(outputFile)
        log.debug({ target, inputBytes: input.length, outputBytes: output.length }, "transcoded audio")
        return output
      } catch (error) {
        if (error instanceof TtsProxyError) {
          throw error
        }
        const message = error instanceof Error ? error.message : "Unknown error"
        throw new TtsProxyError(`Transcoding to ${target} failed: ${message}`, "TRANSCODE_ERROR", 1, 500)
      } finally {
        await fs.unlink(inputFile).catch(() => {})
        await fs.unlink(outputFile).catch(() => {})
      }
    },
  }
}
