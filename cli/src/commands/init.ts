import { defineCommand } from 'citty'
import fs from 'fs-extra'
import { resolve } from 'path'
import * as p from '@clack/prompts'
import { createActionContext } from '../actions/context.js'
import { canonicalProfilePaths } from '../installers/syncProfile.js'
import { createBackupPath } from '../installers/utils.js'
import { findRepoRoot } from '../lib/repoRoot.js'

export async function renderProfileTemplate(rootDir: string, themeName: string): Promise<string> {
  const template = await fs.readFile(resolve(rootDir, 'templates', 'profile.ps1'), 'utf8')
  return template.replace(/__THEME__/g, themeName)
}

export const initCommand = defineCommand({
  meta: { name: 'init', description: 'Write a starter PowerShell profile that runs shellkit on shell start' },
  args: {
    force: { type: 'boolean', description: 'Replace an existing profile (a backup is kept)' },
    path: { type: 'string', description: 'Profile path (default: PowerShell 7 profile)' }
  },
  async run({ args }) {
    const ctx = await createActionContext()
    const target = args.path ? String(args.path) : canonicalProfilePaths(ctx.dirs)[0]
    const content = await renderProfileTemplate(findRepoRoot(), ctx.config.theme.name)

    if (await fs.pathExists(target)) {
      let replace = Boolean(args.force)
      if (!replace && process.stdout.isTTY) {
        p.intro('shellkit · init')
        const answer = await p.confirm({
          message: `${target} already exists. Replace it? (backup will be created)`,
          initialValue: false
        })
        if (p.isCancel(answer)) return p.cancel('Init aborted')
        replace = answer
      }
      if (!replace) {
        ctx.logger.info(`Leaving existing profile in place: ${target}`)
        return
      }
      const backup = createBackupPath(target)
      await fs.copy(target, backup)
      ctx.logger.info(`Backed up current profile to ${backup}`)
    }

    await fs.outputFile(target, content, 'utf8')
    ctx.logger.ok(`Wrote ${target}`)
    if (process.stdout.isTTY) p.outro('Open a new shell to provision your tools')
  }
})
