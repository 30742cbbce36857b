import type { AppConfig } from "../../config.js"
import { createChildLogger } from "../../logger.js"
import { createFfmpegTranscoder, type AudioTranscoder } from "../../lib/audio/transcode.js"
import { createBackends } from "../../lib/tts/providers/index.js"
import type { BackendAdapter } from "../../lib/tts/types.js"
import { BackendRouter } from "../routing/router.js"
import type { SpeechContext } from "../speech/service.js"
import { VoiceLibrary } from "../voices/library.js"
import { loadVoiceNamespaces, type VoiceNamespace } from "../voices/namespaces.js"
import { SqliteVoicePreferenceStore, type VoicePreferenceStore } from "../voices/preferences.js"

const log = createChildLogger("runtime")

/**
 * Everything a request needs, built once per process.
 */
export type ProxyRuntime = SpeechContext & {
  config: AppConfig
  voices: VoiceLibrary
  close(): void
}

export type RuntimeOverrides = {
  backends?: BackendAdapter[]
  namespaces?: VoiceNamespace[]
  preferences?: VoicePreferenceStore
  transcoder?: AudioTranscoder
}

export async function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Promise<ProxyRuntime> {
  const namespaces = overrides.namespaces ?? loadVoiceNamespaces()
  const router = new BackendRouter(overrides.backends ?? createBackends(config, namespaces))

  if (config.preferredBackend && !router.setPreferred(config.preferredBackend)) {
    log.warn(
      { backend: config.preferredBackend, registered: router.names },
      "configured preferred backend is not registered; ignoring",
    )
  }

  const voices = new VoiceLibrary(config.voiceDir)
  await voices.refresh()

  const preferences = overrides.preferences ?? SqliteVoicePreferenceStore.open(config.dbPath)
  const transcoder = overrides.transcoder ?? createFfmpegTranscoder({ ffmpegCli: config.ffmpegCli })

  log.info({ backends: router.names, voices: voices.size }, "runtime ready")

  return {
    config,
    router,
    voices,
    preferences,
    namespaces,
    transcoder,
    chunkConcurrency: config.chunkConcurrency,
    close() {
      preferences.close()
    },
  }
}
