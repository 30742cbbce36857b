import fs from "node:fs"
import path from "node:path"
import { fileURLToPath } from "node:url"

import { z } from "zod"

import { TtsProxyError } from "../../errors.js"

const MODULE_DIR = path.dirname(fileURLToPath(import.meta.url))

export const DEFAULT_NAMESPACES_FILE = resolveExistingPath([
  path.resolve(MODULE_DIR, "../../../data/voice-namespaces.json"),
  path.resolve(MODULE_DIR, "../../../../../../packages/core/data/voice-namespaces.json"),
  path.resolve(process.cwd(), "packages/core/data/voice-namespaces.json"),
])

const namespacesSchema = z.object({
  namespaces: z.array(
    z.object({
      backend: z.string().min(1),
      description: z.string().default(""),
      voices: z.record(z.string()),
    }),
  ),
})

/**
 * Voice names reserved for one backend. Keys are lower-case request voices; values
 * are what the backend expects (preset id, cloud voice id, or a description).
 */
export type VoiceNamespace = {
  backend: string
  description: string
  voices: ReadonlyMap<string, string>
}

function resolveExistingPath(candidates: string[]): string {
  return candidates.find((candidate) => fs.existsSync(candidate)) ?? candidates[0]
}

export function parseVoiceNamespaces(raw: unknown): VoiceNamespace[] {
  const parsed = namespacesSchema.safeParse(raw)
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")
    throw new TtsProxyError(`Invalid voice namespace data: ${details}`, "CONFIG_ERROR", 1, 500)
  }

  return parsed.data.namespaces.map((namespace) => ({
    backend: namespace.backend,
    description: namespace.description,
    voices: new Map(Object.entries(namespace.voices).map(([voice, value]) => [voice.toLowerCase(), value])),
  }))
}

export function loadVoiceNamespaces(filePath = DEFAULT_NAMESPACES_FILE): VoiceNamespace[] {
  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"))
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error"
    throw new TtsProxyError(`Could not read voice namespaces from ${filePath}: ${message}`, "CONFIG_ERROR", 1, 500)
  }
  return parseVoiceNamespaces(raw)
}

/** First namespace (in file order) that reserves the voice, case-insensitively. */
export function findNamespace(namespaces: VoiceNamespace[], voice: string): VoiceNamespace | undefined {
  const key = voice.toLowerCase()
  return namespaces.find((namespace) => namespace.voices.has(key))
}

export function namespaceFor(namespaces: VoiceNamespace[], backend: string): ReadonlyMap<string, string> {
  return namespaces.find((namespace) => namespace.backend === backend)?.voices ?? new Map<string, string>()
}
