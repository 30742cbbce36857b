#!/usr/bin/env node
// Loads .env before the logger reads LOG_LEVEL.
import "dotenv/config"

import { CommanderError } from "commander"

import { createProgram } from "./program.js"

const argv = [...process.argv]
const separatorIndex = argv.indexOf("--")
if (separatorIndex !== -1) {
  argv.splice(separatorIndex, 1)
}

try {
  await createProgram().parseAsync(argv)
} catch (error) {
  if (error instanceof CommanderError) {
    process.exit(error.exitCode)
  }
  const message = error instanceof Error ? error.message : "Unknown error"
  process.stderr.write(`${message}\n`)
  process.exit(2)
}
