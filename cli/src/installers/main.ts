import type {
  InstallerContext,
  InstallerOptions,
  MigrationResult,
  RunReport,
  StepReport,
  ThemeResult,
  ToolDescriptor
} from './types.js'
import fs from 'fs-extra'
import * as path from 'path'
import * as os from 'os'
import { createLogger, pruneRunLogs, runLogName, RUN_LOG_KEEP } from './logger.js'
import { loadUserConfig } from './config.js'
import { resolveKnownDirs } from './knownDirs.js'
import { probeTool } from './probe.js'
import { buildToolCatalogue } from './tools.js'
import { createPackageInstaller, type PackageInstaller } from './packageInstaller.js'
import { createProgressReporter, createProgressState, advanceProgress } from './progress.js'
import { syncProfiles } from './syncProfile.js'
import { runShellMigration } from './migration.js'
import { ensureTheme } from './theme.js'
import { applySettingsTargets } from './settingsTargets.js'
import { errorMessage } from './utils.js'

export const PROJECT = 'shellkit'

export function projectDir(homeDir: string): string {
  return path.join(homeDir, `.${PROJECT}`)
}

export function defaultInstallerOptions(): InstallerOptions {
  return {
    sourceProfile: undefined,
    skipTools: [],
    fontFace: undefined,
    patchSettings: true,
    progress: true,
    verbose: false,
    dryRun: false,
    assumeYes: false,
    skipConfirmation: false
  }
}

export async function createInstallerContext(
  options: InstallerOptions,
  beforeConsoleWrite?: () => void
): Promise<InstallerContext> {
  const homeDir = os.homedir()
  const logDir = projectDir(homeDir)
  await fs.ensureDir(logDir)

  let pruneError: unknown
  try {
    // Leave room for the log this run is about to create.
    await pruneRunLogs(logDir, RUN_LOG_KEEP - 1)
  } catch (error) {
    pruneError = error
  }
  const logFile = path.join(logDir, runLogName())
  const logger = createLogger(logFile, { verbose: options.verbose, beforeConsoleWrite })
  if (pruneError !== undefined) logger.warn(`logs: could not prune ${logDir}: ${errorMessage(pruneError)}`)
  const config = await loadUserConfig(logDir, logger)

  return {
    cwd: process.cwd(),
    homeDir,
    dirs: resolveKnownDirs(process.env, homeDir, config.profile.documentsDir),
    logDir,
    logFile,
    options,
    config,
    logger
  }
}

/** One check-then-install unit. Never throws. */
export async function provisionTool(
  ctx: InstallerContext,
  tool: ToolDescriptor,
  installer: PackageInstaller
): Promise<StepReport> {
  if (ctx.config.tools.skip.includes(tool.id) || ctx.options.skipTools.includes(tool.id)) {
    return { step: tool.id, outcome: 'skipped', detail: 'disabled' }
  }
  try {
    const before = await probeTool(tool.probe, ctx.dirs)
    if (before.found) {
      ctx.logger.ok(`${tool.label} present (${before.path})`)
      return { step: tool.id, outcome: 'satisfied', detail: before.path }
    }
    if (ctx.options.dryRun) {
      ctx.logger.log(`[dry-run] install ${tool.label}`)
      return { step: tool.id, outcome: 'skipped', detail: 'dry-run' }
    }
    const result = await installer.install(tool)
    switch (result.status) {
      case 'installed':
        return { step: tool.id, outcome: 'installed', detail: result.path }
      case 'unverified':
        return { step: tool.id, outcome: 'unverified', detail: result.detail }
      case 'failed':
        return { step: tool.id, outcome: 'absent', detail: result.detail }
    }
  } catch (error) {
    const detail = errorMessage(error)
    ctx.logger.warn(`${tool.id}: ${detail}`)
    return { step: tool.id, outcome: 'absent', detail }
  }
}

async function guard<T>(
  ctx: InstallerContext,
  label: string,
  run: () => Promise<T>,
  onError: (detail: string) => T
): Promise<T> {
  try {
    return await run()
  } catch (error) {
    const detail = errorMessage(error)
    ctx.logger.warn(`${label}: ${detail}`)
    return onError(detail)
  }
}

export async function runInstaller(options: InstallerOptions): Promise<RunReport> {
  const progress = createProgressReporter(process.stdout, options.progress)
  const ctx = await createInstallerContext(options, () => progress.clear())
  const { logger } = ctx

  logger.info(`==> ${PROJECT} run`)
  logger.info(`Log: ${ctx.logFile}`)

  // Profile sync goes first so a fresh profile always beats a stale copy.
  const profile = await guard(ctx, 'profile sync', () => syncProfiles(ctx), () => [])

  const tools = buildToolCatalogue(ctx.config)
  const installer = createPackageInstaller(ctx)
  const steps: StepReport[] = []
  let state = createProgressState(tools.length)
  for (const tool of tools) {
    progress.update(state, tool.label)
    const step = await provisionTool(ctx, tool, installer)
    steps.push(step)
    state = advanceProgress(state, step.outcome)
  }
  progress.update(state)
  progress.done()

  const migration = await guard<MigrationResult>(
    ctx,
    'pwsh migration',
    () => runShellMigration(ctx, installer),
    (detail) => ({ status: 'failed', detail })
  )

  const themeWanted = !ctx.config.tools.skip.includes('oh-my-posh') && !options.skipTools.includes('oh-my-posh')
  const theme = themeWanted
    ? await guard<ThemeResult>(ctx, 'theme', () => ensureTheme(ctx), (detail) => ({ status: 'failed', detail }))
    : { status: 'skipped' as const, detail: 'oh-my-posh disabled' }

  const settings = options.patchSettings
    ? await guard(ctx, 'settings', () => applySettingsTargets(ctx), () => [])
    : []

  logger.info(`Installed ${state.installedCount} of ${state.totalSteps} tool(s)`)
  return { profile, steps, migration, theme, settings }
}
