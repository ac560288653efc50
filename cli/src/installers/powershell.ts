import { execa } from 'execa'
import type { Logger } from './types.js'
import { needCmd } from './utils.js'

const DEFAULT_TIMEOUT_MS = 10 * 60_000

export interface PowerShellOptions {
  dryRun: boolean
  logger?: Logger
  timeoutMs?: number
  // Force Windows PowerShell (5.1) even when pwsh is available.
  windowsPowerShell?: boolean
}

export async function resolvePowerShell(preferWindows = false): Promise<string | undefined> {
  if (!preferWindows && (await needCmd('pwsh'))) return 'pwsh'
  if (await needCmd('powershell')) return 'powershell'
  return undefined
}

export function quotePsString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`
}

/**
 * Run a PowerShell snippet without loading any profile (the profile is what
 * calls us). Output is discarded; a non-zero exit rejects.
 */
export async function runPowerShell(script: string, options: PowerShellOptions): Promise<void> {
  if (options.dryRun) {
    options.logger?.log(`[dry-run] powershell -Command ${script}`)
    return
  }
  const shell = await resolvePowerShell(options.windowsPowerShell)
  if (!shell) throw new Error('No PowerShell executable found (pwsh/powershell)')
  await execa(shell, ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-Command', script], {
    stdio: 'ignore',
    timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    windowsHide: true
  })
}

export function installModuleScript(moduleName: string): string {
  return [
    "$ErrorActionPreference = 'Stop'",
    `Install-Module -Name ${quotePsString(moduleName)} -Scope CurrentUser -Force -AllowClobber -SkipPublisherCheck`
  ].join('; ')
}

export function addAppxPackageScript(packagePath: string): string {
  return [
    "$ErrorActionPreference = 'Stop'",
    `Add-AppxPackage -Path ${quotePsString(packagePath)}`
  ].join('; ')
}
