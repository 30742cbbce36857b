import { spawn, spawnSync } from "node:child_process"

export type CommandResult = {
  code: number
  stderr: string
  timedOut: boolean
}

export function resolveBinary(options: {
  envVar?: string
  explicitPath?: string | null
  binaryNames: string[]
  fallbackPaths?: string[]
}): string | null {
  const { envVar, explicitPath, binaryNames, fallbackPaths = [] } = options

  const explicit = explicitPath?.trim()
  if (explicit) return explicit

  if (envVar) {
    const envValue = process.env[envVar]?.trim()
    if (envValue) return envValue
  }

  for (const name of binaryNames) {
    const lookup = spawnSync("sh", ["-lc", `command -v ${name}`], { encoding: "utf-8" })
    const found = lookup.stdout?.trim()
    if (found) return found
  }

  for (const p of fallbackPaths) {
    const check = spawnSync("sh", ["-lc", `[ -x "${p}" ] && echo ok`], { encoding: "utf-8" })
    if (check.stdout?.trim() === "ok") return p
  }

  return null
}

export async function runCommand(
  bin: string,
  args: string[],
  options: { timeoutMs?: number } = {},
): Promise<CommandResult> {
  return await new Promise((resolve, reject) => {
    const proc = spawn(bin, args, { stdio: ["ignore", "ignore", "pipe"] })
    let stderr = ""
    let timedOut = false

    const timer =
      options.timeoutMs === undefined
        ? null
        : setTimeout(() => {
            timedOut = true
            proc.kill("SIGKILL")
          }, options.timeoutMs)

    proc.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString()
    })

    proc.on("error", (err) => {
      if (timer) clearTimeout(timer)
      reject(err)
    })

    proc.on("close", (code) => {
      if (timer) clearTimeout(timer)
      resolve({ code: code ?? -1, stderr, timedOut })
    })
  })
}
