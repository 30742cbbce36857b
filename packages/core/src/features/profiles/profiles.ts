export type BackendProfile = {
  readonly maxWords: number
  readonly maxChars: number
  /** Target chunk size; never above maxWords. */
  readonly optimalWords: number
  readonly needsChunking: boolean
  readonly crossfadeMs: number
  /** Native output rate, when the backend is known to differ from the usual 24 kHz. */
  readonly sampleRate?: number
}

export const DEFAULT_PROFILE_NAME = "openaudio"

function defineProfiles<T extends Record<string, BackendProfile>>(profiles: T): Readonly<T> {
  for (const [name, profile] of Object.entries(profiles)) {
    if (profile.optimalWords > profile.maxWords) {
      throw new Error(`Backend profile ${name}: optimalWords (${profile.optimalWords}) exceeds maxWords (${profile.maxWords}).`)
    }
    Object.freeze(profile)
  }
  return Object.freeze(profiles)
}

export const BACKEND_PROFILES = defineProfiles({
  openaudio: { maxWords: 75, maxChars: 400, optimalWords: 50, needsChunking: true, crossfadeMs: 50 },
  voxcpm: { maxWords: 75, maxChars: 400, optimalWords: 50, needsChunking: true, crossfadeMs: 50 },
  voxcpm15: { maxWords: 150, maxChars: 800, optimalWords: 100, needsChunking: true, crossfadeMs: 50, sampleRate: 44_100 },
  kyutai: { maxWords: 40, maxChars: 250, optimalWords: 30, needsChunking: true, crossfadeMs: 30 },
  higgs: { maxWords: 100, maxChars: 600, optimalWords: 75, needsChunking: true, crossfadeMs: 50 },
  elevenlabs: { maxWords: 2500, maxChars: 15_000, optimalWords: 500, needsChunking: false, crossfadeMs: 0 },
  vibevoice: { maxWords: 100, maxChars: 500, optimalWords: 75, needsChunking: true, crossfadeMs: 100 },
  kokoro: { maxWords: 200, maxChars: 1200, optimalWords: 150, needsChunking: true, crossfadeMs: 30 },
  qwen3_tts: { maxWords: 100, maxChars: 500, optimalWords: 75, needsChunking: true, crossfadeMs: 50, sampleRate: 24_000 },
})

export type KnownBackendName = keyof typeof BACKEND_PROFILES

export function isKnownProfile(name: string): name is KnownBackendName {
  return Object.hasOwn(BACKEND_PROFILES, name)
}

/** Unknown names fall back to the default profile. */
export function getProfile(name: string): BackendProfile {
  return isKnownProfile(name) ? BACKEND_PROFILES[name] : BACKEND_PROFILES[DEFAULT_PROFILE_NAME]
}

export function needsChunking(name: string): boolean {
  return getProfile(name).needsChunking
}

export function listProfiles(): Array<{ name: string } & BackendProfile> {
  return Object.entries(BACKEND_PROFILES).map(([name, profile]) => ({ name, ...profile }))
}
