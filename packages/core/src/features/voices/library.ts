import { promises as fs } from "node:fs"
import path from "node:path"

import { createChildLogger } from "../../logger.js"

const log = createChildLogger("voices")

const REFERENCE_EXTENSIONS = [".wav", ".mp3", ".flac"] as const
const TRANSCRIPT_FILE = "transcript.txt"

export type Voice = {
  name: string
  referencePath: string
  transcript: string
}

export type VoiceDetails = {
  name: string
  reference_path: string
  transcript: string
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile()
  } catch {
    return false
  }
}

async function loadVoice(voiceDir: string, name: string): Promise<Voice | null> {
  const directory = path.join(voiceDir, name)

  let referencePath: string | null = null
  for (const extension of REFERENCE_EXTENSIONS) {
    const candidate = path.join(directory, `reference${extension}`)
    if (await isFile(candidate)) {
      referencePath = candidate
      break
    }
  }
  if (!referencePath) {
    return null
  }

  try {
    const transcript = await fs.readFile(path.join(directory, TRANSCRIPT_FILE), "utf8")
    return { name, referencePath, transcript: transcript.trim() }
  } catch (error) {
    log.debug({ voice: name, err: error }, "skipping voice without readable transcript")
    return null
  }
}

/**
 * Cloning voices discovered from `<voiceDir>/<name>/reference.{wav,mp3,flac}` with a
 * sibling `transcript.txt`. Directories missing either file are skipped.
 */
export class VoiceLibrary {
  private voices = new Map<string, Voice>()

  constructor(readonly voiceDir: string) {}

  /** Rescans the directory; returns the number of voices found. */
  async refresh(): Promise<number> {
    let entries: string[]
    try {
      const dirents = await fs.readdir(this.voiceDir, { withFileTypes: true })
      entries = dirents.filter((entry) => entry.isDirectory()).map((entry) => entry.name)
    } catch (error) {
      log.warn({ voiceDir: this.voiceDir, err: error }, "voice directory not readable")
      this.voices = new Map()
      return 0
    }

    const loaded = await Promise.all(entries.map((name) => loadVoice(this.voiceDir, name)))
    const voices = new Map<string, Voice>()
    for (const voice of loaded) {
      if (voice) {
        voices.set(voice.name, voice)
      }
    }

    this.voices = voices
    log.info({ voiceDir: this.voiceDir, count: voices.size }, "discovered voices")
    return voices.size
  }

  get(name: string): Voice | undefined {
    return this.voices.get(name)
  }

  get size(): number {
    return this.voices.size
  }

  list(): string[] {
    return [...this.voices.keys()].sort()
  }

  listDetailed(): VoiceDetails[] {
    return this.list().flatMap((name) => {
      const voice = this.voices.get(name)
      return voice ? [{ name: voice.name, reference_path: voice.referencePath, transcript: voice.transcript }] : []
    })
  }
}
