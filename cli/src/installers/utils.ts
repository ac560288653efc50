import { which } from 'zx'
import { spawn } from 'node:child_process'
import { execa } from 'execa'
import type { InstallerContext, Logger } from './types.js'

// zx `which` honours PATHEXT on Windows, so `git` resolves to git.exe / git.cmd.
// For dynamic cmd + args we use Node's spawn directly; captured output goes
// through execa.

export async function resolveCmd(cmd: string): Promise<string | undefined> {
  try {
    return await which(cmd)
  } catch {
    return undefined
  }
}

export async function needCmd(cmd: string): Promise<boolean> {
  return (await resolveCmd(cmd)) !== undefined
}

export function isInteractive(ctx: InstallerContext): boolean {
  return Boolean(process.stdout.isTTY) &&
    !ctx.options.dryRun &&
    !ctx.options.skipConfirmation &&
    !ctx.options.assumeYes
}

export interface RunCommandOptions {
  dryRun: boolean
  logger?: Logger
  cwd?: string
  // Package managers are noisy; provisioning discards their output.
  quiet?: boolean
  timeoutMs?: number
}

export function formatCommand(cmd: string, args: string[]): string {
  return [cmd, ...args].map((a) => (a.includes(' ') ? `"${a}"` : a)).join(' ')
}

export async function runCommand(
  cmd: string,
  args: string[],
  options: RunCommandOptions = { dryRun: false }
): Promise<void> {
  if (options.dryRun) {
    options.logger?.log(`[dry-run] ${formatCommand(cmd, args)}`)
    return
  }
  const proc = spawn(cmd, args, {
    stdio: options.quiet ? 'ignore' : 'inherit',
    cwd: options.cwd || process.cwd(),
    shell: false,
    windowsHide: true,
    timeout: options.timeoutMs
  })
  await new Promise<void>((resolve, reject) => {
    proc.on('error', reject)
    proc.on('exit', (code, signal) => {
      if (code === 0) return resolve()
      const reason = signal ? `signal ${signal}` : String(code)
      reject(new Error(`Command failed (${reason}): ${formatCommand(cmd, args)}`))
    })
  })
}

export interface ExecCaptureResult {
  stdout: string
  stderr: string
  code: number | null
  timedOut: boolean
}

export async function execCapture(
  cmd: string,
  args: string[],
  options: { timeoutMs: number; cwd?: string }
): Promise<ExecCaptureResult> {
  const res = await execa(cmd, args, {
    cwd: options.cwd || process.cwd(),
    stdin: 'ignore',
    timeout: options.timeoutMs,
    reject: false,
    windowsHide: true
  })
  return {
    stdout: res.stdout,
    stderr: res.stderr,
    code: res.exitCode ?? null,
    timedOut: res.timedOut
  }
}

/** GET `url`, aborting after `timeoutMs`. Non-2xx responses reject. */
export async function fetchWithTimeout<T>(
  url: string,
  timeoutMs: number,
  read: (res: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)
  timeout.unref?.()
  try {
    const res = await fetch(url, { signal: controller.signal, redirect: 'follow' })
    if (!res.ok) throw new Error(`HTTP ${res.status}`)
    return await read(res)
  } finally {
    clearTimeout(timeout)
  }
}

export function fetchText(url: string, timeoutMs: number): Promise<string> {
  return fetchWithTimeout(url, timeoutMs, (res) => res.text())
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

export function createBackupPath(originalPath: string): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, -5)
  return `${originalPath}.backup.${timestamp}`
}
