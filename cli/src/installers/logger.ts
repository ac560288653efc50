import type { Logger } from './types.js'
import { createWriteStream } from 'fs'
import fs from 'fs-extra'
import * as path from 'path'
import pc from 'picocolors'

export const DIAGNOSTIC_PREFIX = 'LOG - '
// Every shell start writes a log; only the newest ones are kept.
export const RUN_LOG_KEEP = 20
const RUN_LOG_PATTERN = /^run-.+\.log$/

export function runLogName(date: Date = new Date()): string {
  return `run-${date.toISOString().replace(/[:.]/g, '-')}.log`
}

/** Delete all but the newest `keep` run logs. Returns the removed paths. */
export async function pruneRunLogs(logDir: string, keep: number = RUN_LOG_KEEP): Promise<string[]> {
  const logs = (await fs.readdir(logDir)).filter((name) => RUN_LOG_PATTERN.test(name)).sort()
  const stale = logs.slice(0, Math.max(0, logs.length - keep)).map((name) => path.join(logDir, name))
  for (const file of stale) {
    await fs.remove(file)
  }
  return stale
}

export interface LoggerOptions {
  // When false, info/ok lines only go to the log file.
  verbose: boolean
  // Called before anything reaches the console so a live progress line can be cleared.
  beforeConsoleWrite?: () => void
}

export function createLogger(logFile: string, options: LoggerOptions = { verbose: true }): Logger {
  let logStream: ReturnType<typeof createWriteStream> | null = null
  // NOTE: createWriteStream errors are usually async (emitted via "error"),
  // so try/catch is not sufficient. Always attach an error handler.
  logStream = createWriteStream(logFile, { flags: 'a', mode: 0o600 })
  logStream.on('error', () => {
    // Fallback to stdout only if file write fails (e.g. temp dir removed in tests).
    logStream = null
  })

  const write = (prefix: string, msg: string, toConsole: boolean, paint: (s: string) => string = (s) => s) => {
    const line = prefix ? `${prefix}${msg}\n` : `${msg}\n`
    if (toConsole) {
      options.beforeConsoleWrite?.()
      process.stdout.write(paint(line))
    }
    if (logStream) {
      logStream.write(line)
    }
  }

  return {
    log: (msg: string) => write('', msg, options.verbose),
    info: (msg: string) => write('', msg, options.verbose, pc.cyan),
    ok: (msg: string) => write('✔ ', msg, options.verbose, pc.green),
    warn: (msg: string) => write(DIAGNOSTIC_PREFIX, msg, true, pc.yellow),
    err: (msg: string) => write(DIAGNOSTIC_PREFIX, msg, true, pc.red)
  }
}
