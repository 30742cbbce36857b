import type { AppConfig } from "../../../config.js"
import { TtsProxyError } from "../../../errors.js"
import { namespaceFor, type VoiceNamespace } from "../../../features/voices/namespaces.js"
import type { BackendAdapter } from "../types.js"
import { createElevenLabsBackend } from "./elevenlabs.js"
import { createHiggsBackend } from "./higgs.js"
import { createKokoroBackend } from "./kokoro.js"
import { createKyutaiBackend } from "./kyutai.js"
import { createOpenAudioBackend } from "./openaudio.js"
import { createQwen3TtsBackend } from "./qwen3-tts.js"
import { createVibeVoiceBackend } from "./vibevoice.js"
import { createVoxCpm15Backend } from "./voxcpm15.js"

type BackendFactory = (config: AppConfig, namespaces: VoiceNamespace[]) => BackendAdapter

const BACKEND_FACTORIES: Record<string, BackendFactory> = {
  openaudio: (config) => createOpenAudioBackend({ host: config.hosts.openaudio }),
  kokoro: (config, namespaces) =>
    createKokoroBackend({ host: config.hosts.kokoro, voices: namespaceFor(namespaces, "kokoro") }),
  vibevoice: (config, namespaces) =>
    createVibeVoiceBackend({ host: config.hosts.vibevoice, voices: namespaceFor(namespaces, "vibevoice") }),
  higgs: (config) => createHiggsBackend({ host: config.hosts.higgs }),
  kyutai: (config, namespaces) =>
    createKyutaiBackend({ hosts: config.hosts.kyutai, emotions: namespaceFor(namespaces, "kyutai") }),
  voxcpm15: (config) =>
    createVoxCpm15Backend({ host: config.hosts.voxcpm15, fleet: config.hosts.voxcpm15Fleet }),
  qwen3_tts: (config) => createQwen3TtsBackend({ host: config.hosts.qwen3Tts }),
  elevenlabs: (config, namespaces) =>
    createElevenLabsBackend({ apiKey: config.elevenLabsApiKey, voices: namespaceFor(namespaces, "elevenlabs") }),
}

export const SUPPORTED_BACKENDS = Object.keys(BACKEND_FACTORIES)

/**
 * Builds adapters in `config.backendOrder`, which is also the failover priority.
 */
export function createBackends(config: AppConfig, namespaces: VoiceNamespace[]): BackendAdapter[] {
  return config.backendOrder.map((name) => {
    const factory = Object.hasOwn(BACKEND_FACTORIES, name) ? BACKEND_FACTORIES[name] : undefined
    if (!factory) {
      throw new TtsProxyError(
        `Unknown backend "${name}" in UNIFIED_TTS_BACKENDS. Supported: ${SUPPORTED_BACKENDS.join(", ")}.`,
        "CONFIG_ERROR",
        2,
        500,
      )
    }
    return factory(config, namespaces)
  })
}
