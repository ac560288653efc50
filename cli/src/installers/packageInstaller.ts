import fs from 'fs-extra'
import * as path from 'path'
import * as p from '@clack/prompts'
import type { InstallerContext, InstallResult, ToolDescriptor } from './types.js'
import { errorMessage, fetchWithTimeout, isInteractive, resolveCmd, runCommand } from './utils.js'
import { probeTool } from './probe.js'
import { prependPath, refreshPath } from './envPath.js'
import { addAppxPackageScript, installModuleScript, runPowerShell } from './powershell.js'

export const WINGET_BOOTSTRAP_URL = 'https://aka.ms/getwinget'
const WINGET_DOWNLOAD_TIMEOUT_MS = 120_000
const INSTALL_TIMEOUT_MS = 15 * 60_000

export function wingetInstallArgs(id: string): string[] {
  return [
    'install',
    '--id', id,
    '--exact',
    '--silent',
    '--accept-package-agreements',
    '--accept-source-agreements',
    '--source', 'winget'
  ]
}

export function wingetUpgradeArgs(id: string): string[] {
  return ['upgrade', ...wingetInstallArgs(id).slice(1)]
}

export interface PackageInstaller {
  install(tool: ToolDescriptor): Promise<InstallResult>
  // Resolves the winget executable, bootstrapping it at most once per run.
  ensureWinget(): Promise<string | undefined>
}

export function createPackageInstaller(ctx: InstallerContext): PackageInstaller {
  let bootstrap: Promise<string | undefined> | undefined

  const quietRun = (cmd: string, args: string[]) =>
    runCommand(cmd, args, {
      dryRun: ctx.options.dryRun,
      logger: ctx.logger,
      quiet: true,
      timeoutMs: INSTALL_TIMEOUT_MS
    })

  async function ensureWinget(): Promise<string | undefined> {
    const existing = await resolveCmd('winget')
    if (existing) return existing
    bootstrap ??= bootstrapWinget(ctx)
    return bootstrap
  }

  async function runStrategy(tool: ToolDescriptor): Promise<void> {
    const strategy = tool.install
    switch (strategy.kind) {
      case 'winget': {
        const winget = await ensureWinget()
        if (!winget) throw new Error('winget is not available')
        await quietRun(winget, wingetInstallArgs(strategy.id))
        return
      }
      case 'nvm': {
        const nvm = (await resolveCmd('nvm')) ?? 'nvm'
        await quietRun(nvm, ['install', strategy.version])
        await quietRun(nvm, ['use', strategy.version])
        // nvm-windows activates versions through a symlink that is only on
        // PATH for new shells.
        const symlink = process.env.NVM_SYMLINK
        if (symlink) prependPath(symlink)
        return
      }
      case 'npm-global': {
        const npm = (await resolveCmd('npm')) ?? 'npm'
        await quietRun(npm, ['install', '-g', strategy.pkg])
        return
      }
      case 'ps-module':
        await runPowerShell(installModuleScript(strategy.module), {
          dryRun: ctx.options.dryRun,
          logger: ctx.logger
        })
        return
      case 'font': {
        const omp = await resolveCmd('oh-my-posh')
        if (!omp) throw new Error('oh-my-posh is required to install fonts')
        await quietRun(omp, ['font', 'install', strategy.name, '--user'])
        return
      }
    }
  }

  async function install(tool: ToolDescriptor): Promise<InstallResult> {
    try {
      ctx.logger.info(`Installing ${tool.label}`)
      await runStrategy(tool)
      await refreshPath(ctx.logger)
      const verified = await probeTool(tool.verify ?? tool.probe, ctx.dirs)
      if (verified.found) {
        ctx.logger.ok(`${tool.label} installed (${verified.path})`)
        return { status: 'installed', path: verified.path }
      }
      const detail = `${tool.label} install finished but it is still not reachable; open a new shell`
      ctx.logger.warn(`${tool.id}: ${detail}`)
      return { status: 'unverified', detail }
    } catch (error) {
      const detail = errorMessage(error)
      ctx.logger.warn(`${tool.id}: ${detail}`)
      return { status: 'failed', detail }
    }
  }

  return { install, ensureWinget }
}

async function bootstrapWinget(ctx: InstallerContext): Promise<string | undefined> {
  if (process.platform !== 'win32') {
    ctx.logger.warn('winget: package manager missing and can only be bootstrapped on Windows')
    return undefined
  }
  if (ctx.options.dryRun) {
    ctx.logger.log(`[dry-run] download ${WINGET_BOOTSTRAP_URL} and Add-AppxPackage`)
    return undefined
  }
  if (isInteractive(ctx)) {
    const answer = await p.confirm({
      message: 'winget was not found. Download and install App Installer (winget) from Microsoft?',
      initialValue: true
    })
    if (p.isCancel(answer) || !answer) {
      ctx.logger.warn('winget: bootstrap declined')
      return undefined
    }
  }
  try {
    const target = path.join(ctx.dirs.temp, 'Microsoft.DesktopAppInstaller.msixbundle')
    ctx.logger.info('winget not found; downloading App Installer')
    await downloadFile(WINGET_BOOTSTRAP_URL, target, WINGET_DOWNLOAD_TIMEOUT_MS)
    await runPowerShell(addAppxPackageScript(target), {
      dryRun: false,
      logger: ctx.logger,
      windowsPowerShell: true
    })
    await refreshPath(ctx.logger)
    const resolved = await resolveCmd('winget')
    if (!resolved) ctx.logger.warn('winget: installed App Installer but winget is still not on PATH')
    return resolved
  } catch (error) {
    ctx.logger.warn(`winget: bootstrap failed: ${errorMessage(error)}`)
    return undefined
  }
}

export async function downloadFile(url: string, target: string, timeoutMs: number): Promise<void> {
  const body = await fetchWithTimeout(url, timeoutMs, async (res) => Buffer.from(await res.arrayBuffer()))
  await fs.ensureDir(path.dirname(target))
  await fs.writeFile(target, body)
}
