import { createChildLogger } from "../../logger.js"
import type { BackendProfile } from "../profiles/profiles.js"

const log = createChildLogger("chunker")

type ChunkLimits = Pick<BackendProfile, "maxChars" | "maxWords">

const SENTENCE_BOUNDARY = /([.!?]+\s+)/
const CLAUSE_BOUNDARY = /(,\s+)/

export function countWords(text: string): number {
  const trimmed = text.trim()
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length
}

function exceeds(text: string, limits: ChunkLimits): boolean {
  return text.length > limits.maxChars || countWords(text) > limits.maxWords
}

// Pairs each split piece with the separator captured after it.
function splitKeepingSeparators(text: string, boundary: RegExp): string[] {
  const parts = text.split(boundary)
  const units: string[] = []
  for (let i = 0; i < parts.length; i += 2) {
    units.push(parts[i] + (parts[i + 1] ?? ""))
  }
  return units
}

function forceSplitByWords(text: string, maxWords: number): string[] {
  const size = Math.max(1, maxWords)
  const words = text.split(/\s+/).filter((word) => word.length > 0)
  const groups: string[] = []
  for (let i = 0; i < words.length; i += size) {
    groups.push(words.slice(i, i + size).join(" "))
  }
  return groups
}

function accumulate(
  units: string[],
  limits: ChunkLimits,
  splitOversized: (unit: string) => string[],
): string[] {
  const chunks: string[] = []
  let current = ""

  const flush = () => {
    const trimmed = current.trim()
    if (trimmed.length > 0) {
      chunks.push(trimmed)
    }
    current = ""
  }

  for (const unit of units) {
    if (exceeds(unit, limits)) {
      flush()
      chunks.push(...splitOversized(unit))
      continue
    }

    if (exceeds(current + unit, limits)) {
      flush()
      current = unit
    } else {
      current += unit
    }
  }

  flush()
  return chunks
}

function splitLongSentence(sentence: string, limits: ChunkLimits): string[] {
  return accumulate(splitKeepingSeparators(sentence, CLAUSE_BOUNDARY), limits, (clause) =>
    forceSplitByWords(clause, limits.maxWords),
  )
}

/**
 * Splits text into ordered chunks that fit the profile's word and character limits,
 * preferring sentence boundaries, then commas, then plain word groups.
 * Text that already fits is returned unchanged as a single chunk.
 */
export function chunkText(text: string, profile: BackendProfile): string[] {
  if (text.trim().length === 0) {
    return []
  }
  if (!profile.needsChunking || !exceeds(text, profile)) {
    return [text]
  }

  const chunks = accumulate(splitKeepingSeparators(text, SENTENCE_BOUNDARY), profile, (sentence) =>
    splitLongSentence(sentence, profile),
  )

  log.debug(
    { chars: text.length, words: countWords(text), chunks: chunks.length },
    "chunked text",
  )
  return chunks
}
