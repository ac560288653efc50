import fs from 'fs-extra'
import * as path from 'path'
import * as TOML from 'toml'
import type { Logger, ToolId, UserConfig } from './types.js'
import { isToolId } from './tools.js'
import { isValidThemeName } from './theme.js'
import { errorMessage } from './utils.js'

export const CONFIG_FILE = 'config.toml'

export function defaultUserConfig(): UserConfig {
  return {
    tools: { skip: [] },
    font: { install: 'CascadiaCode', face: 'CaskaydiaCove Nerd Font' },
    theme: { name: 'jandedobbeleer' },
    settings: { windowsTerminal: true, vscode: true },
    profile: { extra: [], documentsDir: undefined },
    node: { version: 'lts' }
  }
}

type Table = Record<string, unknown>

function isTable(value: unknown): value is Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function table(root: Table, key: string): Table {
  const value = root[key]
  return isTable(value) ? value : {}
}

function str(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim() ? value.trim() : fallback
}

function bool(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback
}

function strList(value: unknown): string[] {
  if (!Array.isArray(value)) return []
  return value.filter((item): item is string => typeof item === 'string' && item.trim() !== '')
}

export function normalizeUserConfig(raw: unknown, logger?: Logger): UserConfig {
  const defaults = defaultUserConfig()
  if (!isTable(raw)) return defaults

  const tools = table(raw, 'tools')
  const skip: ToolId[] = []
  for (const id of strList(tools.skip)) {
    if (isToolId(id)) skip.push(id)
    else logger?.warn(`config: unknown tool id "${id}" in tools.skip`)
  }

  const font = table(raw, 'font')
  const theme = table(raw, 'theme')
  const settings = table(raw, 'settings')
  const profile = table(raw, 'profile')
  const node = table(raw, 'node')

  let themeName = str(theme.name, defaults.theme.name)
  if (!isValidThemeName(themeName)) {
    logger?.warn(`config: ignoring theme.name "${themeName}"; use a bare theme name`)
    themeName = defaults.theme.name
  }

  return {
    tools: { skip },
    font: {
      install: str(font.install, defaults.font.install),
      face: str(font.face, defaults.font.face)
    },
    theme: { name: themeName },
    settings: {
      windowsTerminal: bool(settings.windowsTerminal, defaults.settings.windowsTerminal),
      vscode: bool(settings.vscode, defaults.settings.vscode)
    },
    profile: {
      extra: strList(profile.extra),
      documentsDir: typeof profile.documentsDir === 'string' && profile.documentsDir.trim()
        ? profile.documentsDir.trim()
        : undefined
    },
    node: { version: str(node.version, defaults.node.version) }
  }
}

/** Missing or unparsable config falls back to defaults; shell start must not break. */
export async function loadUserConfig(configDir: string, logger?: Logger): Promise<UserConfig> {
  const file = path.join(configDir, CONFIG_FILE)
  if (!(await fs.pathExists(file))) return defaultUserConfig()
  try {
    const raw = await fs.readFile(file, 'utf8')
    const parsed: unknown = TOML.parse(raw)
    return normalizeUserConfig(parsed, logger)
  } catch (error) {
    logger?.warn(`config: ignoring ${file}: ${errorMessage(error)}`)
    return defaultUserConfig()
  }
}
