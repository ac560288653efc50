import fs from 'fs-extra'
import * as path from 'path'
import type { InstallerContext, ThemeResult } from './types.js'
import { errorMessage, fetchText } from './utils.js'

const THEME_TIMEOUT_MS = 10_000

export function themeUrls(name: string): string[] {
  const file = `${encodeURIComponent(name)}.omp.json`
  return [
    `https://raw.githubusercontent.com/JanDeDobbeleer/oh-my-posh/main/themes/${file}`,
    `https://cdn.jsdelivr.net/gh/JanDeDobbeleer/oh-my-posh@main/themes/${file}`
  ]
}

// Theme names come from user config and become a file name.
export function isValidThemeName(name: string): boolean {
  return /^[\w.-]+$/.test(name) && !name.split('.').every((part) => part === '')
}

export function themePath(logDir: string, name: string): string {
  if (!isValidThemeName(name)) throw new Error(`invalid theme name "${name}"`)
  return path.join(logDir, 'themes', `${name}.omp.json`)
}

/** Download the prompt theme next to the logs unless it is already there. */
export async function ensureTheme(ctx: InstallerContext): Promise<ThemeResult> {
  const name = ctx.config.theme.name
  if (!isValidThemeName(name)) {
    const detail = `invalid theme name "${name}"`
    ctx.logger.warn(`theme: ${detail}`)
    return { status: 'failed', detail }
  }
  const target = themePath(ctx.logDir, name)
  if (await fs.pathExists(target)) return { status: 'present', path: target }
  if (ctx.options.dryRun) {
    ctx.logger.log(`[dry-run] download theme ${name} to ${target}`)
    return { status: 'skipped', path: target, detail: 'dry-run' }
  }

  const failures: string[] = []
  for (const url of themeUrls(name)) {
    try {
      const body = await fetchText(url, THEME_TIMEOUT_MS)
      JSON.parse(body)
      await fs.ensureDir(path.dirname(target))
      await fs.writeFile(target, body, 'utf8')
      ctx.logger.ok(`Theme ${name} saved to ${target}`)
      return { status: 'downloaded', path: target }
    } catch (error) {
      failures.push(`${url}: ${errorMessage(error)}`)
    }
  }
  const detail = failures.join('; ')
  ctx.logger.warn(`theme: could not download ${name} (${detail})`)
  return { status: 'failed', path: target, detail }
}
