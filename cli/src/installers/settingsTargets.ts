import fs from 'fs-extra'
import * as path from 'path'
import type { InstallerContext, KnownDirs, SettingsPatchResult } from './types.js'
import { patchSettingsFile, type SettingAssignment } from './patchSettings.js'
import { errorMessage } from './utils.js'

// Windows Terminal derives this GUID for the PowerShell 7 dynamic profile.
export const WT_PWSH_PROFILE_GUID = '{574e775e-4f2a-5b96-ac1e-a2962a402336}'

export interface SettingsTarget {
  app: 'windows-terminal' | 'vscode'
  file: string
  // The application counts as installed when this directory exists.
  appDir: string
  assignments: SettingAssignment[]
}

export function windowsTerminalAssignments(fontFace: string): SettingAssignment[] {
  return [
    { path: 'defaultProfile', value: WT_PWSH_PROFILE_GUID, mode: 'force' },
    { path: 'profiles.defaults.font.face', value: fontFace, mode: 'if-missing' }
  ]
}

export function vscodeAssignments(fontFace: string): SettingAssignment[] {
  return [
    { path: ['terminal.integrated.defaultProfile.windows'], value: 'PowerShell', mode: 'force' },
    { path: ['terminal.integrated.fontFamily'], value: fontFace, mode: 'if-missing' }
  ]
}

export function listSettingsTargets(
  dirs: KnownDirs,
  fontFace: string,
  enabled: { windowsTerminal: boolean; vscode: boolean }
): SettingsTarget[] {
  const targets: SettingsTarget[] = []
  if (enabled.windowsTerminal) {
    const packaged = ['Microsoft.WindowsTerminal_8wekyb3d8bbwe', 'Microsoft.WindowsTerminalPreview_8wekyb3d8bbwe']
    for (const pkg of packaged) {
      const appDir = path.join(dirs.localAppData, 'Packages', pkg)
      targets.push({
        app: 'windows-terminal',
        appDir,
        file: path.join(appDir, 'LocalState', 'settings.json'),
        assignments: windowsTerminalAssignments(fontFace)
      })
    }
    const unpackaged = path.join(dirs.localAppData, 'Microsoft', 'Windows Terminal')
    targets.push({
      app: 'windows-terminal',
      appDir: unpackaged,
      file: path.join(unpackaged, 'settings.json'),
      assignments: windowsTerminalAssignments(fontFace)
    })
  }
  if (enabled.vscode) {
    for (const flavour of ['Code', 'Code - Insiders']) {
      const appDir = path.join(dirs.appData, flavour)
      targets.push({
        app: 'vscode',
        appDir,
        file: path.join(appDir, 'User', 'settings.json'),
        assignments: vscodeAssignments(fontFace)
      })
    }
  }
  return targets
}

export async function applySettingsTargets(ctx: InstallerContext): Promise<SettingsPatchResult[]> {
  const fontFace = ctx.options.fontFace || ctx.config.font.face
  const targets = listSettingsTargets(ctx.dirs, fontFace, ctx.config.settings)
  const results: SettingsPatchResult[] = []
  for (const target of targets) {
    try {
      if (!(await fs.pathExists(target.appDir))) continue
      results.push(
        await patchSettingsFile(target.file, target.assignments, {
          dryRun: ctx.options.dryRun,
          logger: ctx.logger
        })
      )
    } catch (error) {
      const detail = errorMessage(error)
      ctx.logger.warn(`settings: ${target.file}: ${detail}`)
      results.push({ file: target.file, status: 'failed', changed: [], skipped: [], error: detail })
    }
  }
  return results
}
