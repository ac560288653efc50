import fs from 'fs-extra'
import * as path from 'path'
import type { InstallerContext, KnownDirs, ProfileSyncEntry } from './types.js'
import { errorMessage } from './utils.js'

export const PROFILE_FILE = 'Microsoft.PowerShell_profile.ps1'

// PowerShell 7 first: it is the default source when none is given.
export function canonicalProfilePaths(dirs: KnownDirs): string[] {
  return [
    path.join(dirs.documents, 'PowerShell', PROFILE_FILE),
    path.join(dirs.documents, 'WindowsPowerShell', PROFILE_FILE)
  ]
}

function comparablePath(p: string): string {
  const resolved = path.resolve(p)
  return process.platform === 'win32' ? resolved.toLowerCase() : resolved
}

export function siblingProfilePaths(source: string, dirs: KnownDirs, extra: string[] = []): string[] {
  const sourceKey = comparablePath(source)
  const seen = new Set<string>([sourceKey])
  const siblings: string[] = []
  for (const candidate of [...canonicalProfilePaths(dirs), ...extra]) {
    const key = comparablePath(candidate)
    if (seen.has(key)) continue
    seen.add(key)
    siblings.push(candidate)
  }
  return siblings
}

/**
 * Copy the active profile over every sibling PowerShell profile whose content
 * differs. Identical siblings are not touched.
 */
export async function syncProfiles(ctx: InstallerContext): Promise<ProfileSyncEntry[]> {
  const source = ctx.options.sourceProfile || canonicalProfilePaths(ctx.dirs)[0]
  // Bytes, not text: Windows PowerShell profiles are often ANSI or UTF-16.
  let content: Buffer
  try {
    content = await fs.readFile(source)
  } catch (error) {
    ctx.logger.warn(`profile sync: cannot read source profile ${source}: ${errorMessage(error)}`)
    return []
  }

  const entries: ProfileSyncEntry[] = []
  for (const target of siblingProfilePaths(source, ctx.dirs, ctx.config.profile.extra)) {
    entries.push(await syncOne(ctx, content, target))
  }
  return entries
}

async function syncOne(ctx: InstallerContext, content: Buffer, target: string): Promise<ProfileSyncEntry> {
  try {
    const exists = await fs.pathExists(target)
    if (exists) {
      const current = await fs.readFile(target)
      if (current.equals(content)) return { path: target, action: 'unchanged' }
    }
    const action = exists ? 'updated' : 'created'
    if (ctx.options.dryRun) {
      ctx.logger.log(`[dry-run] write ${target}`)
      return { path: target, action, detail: 'dry-run' }
    }
    await fs.ensureDir(path.dirname(target))
    await fs.writeFile(target, content)
    ctx.logger.ok(`Profile ${action}: ${target}`)
    return { path: target, action }
  } catch (error) {
    const detail = errorMessage(error)
    ctx.logger.warn(`profile sync: ${target}: ${detail}`)
    return { path: target, action: 'failed', detail }
  }
}
