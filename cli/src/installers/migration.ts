import fs from 'fs-extra'
import * as path from 'path'
import type { InstallerContext, KnownDirs, MigrationResult } from './types.js'
import type { PackageInstaller } from './packageInstaller.js'
import { wingetUpgradeArgs } from './packageInstaller.js'
import { errorMessage, execCapture, resolveCmd, runCommand } from './utils.js'

export const MIN_PWSH_VERSION = '7.4.0'
const PWSH_VERSION_TIMEOUT_MS = 10_000
const UPGRADE_TIMEOUT_MS = 15 * 60_000

export function migrationFlagPath(dirs: KnownDirs): string {
  return path.join(dirs.temp, 'shellkit', 'pwsh-migration.flag')
}

export function parseVersion(value: string): [number, number, number] | null {
  const match = value.match(/(\d+)\.(\d+)\.(\d+)/)
  if (!match) return null
  return [Number(match[1]), Number(match[2]), Number(match[3])]
}

export function isAtLeast(version: string, minimum: string): boolean {
  const a = parseVersion(version)
  const b = parseVersion(minimum)
  if (!a || !b) return false
  for (let i = 0; i < 3; i++) {
    if (a[i] > b[i]) return true
    if (a[i] < b[i]) return false
  }
  return true
}

async function readPwshVersion(pwsh: string): Promise<string | undefined> {
  try {
    const res = await execCapture(
      pwsh,
      ['-NoProfile', '-NonInteractive', '-Command', '$PSVersionTable.PSVersion.ToString()'],
      { timeoutMs: PWSH_VERSION_TIMEOUT_MS }
    )
    if (res.timedOut || res.code !== 0) return undefined
    const version = res.stdout.trim()
    return parseVersion(version) ? version : undefined
  } catch {
    return undefined
  }
}

async function writeFlag(flag: string): Promise<void> {
  await fs.ensureDir(path.dirname(flag))
  await fs.writeFile(flag, `PowerShell migration completed ${new Date().toString()}\n`, 'utf8')
}

/**
 * Bring an outdated PowerShell 7 up to the current release once. The flag
 * file is written only after the runtime is known to be current, so a failed
 * upgrade is retried on the next shell start.
 */
export async function runShellMigration(ctx: InstallerContext, installer: PackageInstaller): Promise<MigrationResult> {
  const flag = migrationFlagPath(ctx.dirs)
  if (await fs.pathExists(flag)) return { status: 'already-done' }

  const pwsh = await resolveCmd('pwsh')
  if (!pwsh) return { status: 'skipped', detail: 'pwsh not installed' }

  const version = await readPwshVersion(pwsh)
  if (version && isAtLeast(version, MIN_PWSH_VERSION)) {
    if (!ctx.options.dryRun) await writeFlag(flag)
    return { status: 'current', detail: version }
  }

  if (ctx.options.dryRun) {
    ctx.logger.log(`[dry-run] winget ${wingetUpgradeArgs('Microsoft.PowerShell').join(' ')}`)
    return { status: 'skipped', detail: 'dry-run' }
  }

  const winget = await installer.ensureWinget()
  if (!winget) return { status: 'failed', detail: 'winget is not available' }

  try {
    ctx.logger.info(`Upgrading PowerShell ${version ?? '(unknown version)'}`)
    await runCommand(winget, wingetUpgradeArgs('Microsoft.PowerShell'), {
      dryRun: false,
      logger: ctx.logger,
      quiet: true,
      timeoutMs: UPGRADE_TIMEOUT_MS
    })
  } catch (error) {
    const detail = errorMessage(error)
    ctx.logger.warn(`pwsh migration: ${detail}`)
    return { status: 'failed', detail }
  }

  await writeFlag(flag)
  ctx.logger.ok('PowerShell upgraded')
  return { status: 'migrated', detail: `from ${version ?? 'unknown'}` }
}
