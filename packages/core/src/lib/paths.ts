import os from "node:os"
import path from "node:path"

const DEFAULT_UNIFIED_TTS_HOME = path.join(os.homedir(), ".unified-tts")

export const DEFAULT_VOICE_DIR = path.join(DEFAULT_UNIFIED_TTS_HOME, "voices")
export const DEFAULT_DB_PATH = path.join(DEFAULT_UNIFIED_TTS_HOME, "unified-tts.db")

export function resolvePath(input: string): string {
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2))
  }

  return path.resolve(input)
}

export function resolveVoiceDir(input?: string): string {
  if (!input || input.trim().length === 0) {
    return DEFAULT_VOICE_DIR
  }
  return resolvePath(input)
}

export function resolveDbPath(input?: string): string {
  if (!input || input.trim().length === 0) {
    return DEFAULT_DB_PATH
  }
  if (input === ":memory:") {
    return input
  }
  return resolvePath(input)
}
