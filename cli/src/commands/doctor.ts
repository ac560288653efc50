import { defineCommand } from 'citty'
import fs from 'fs-extra'
import { createActionContext } from '../actions/context.js'
import { getToolStatuses } from '../actions/tools.js'
import { migrationFlagPath } from '../installers/migration.js'
import { listSettingsTargets } from '../installers/settingsTargets.js'
import { canonicalProfilePaths } from '../installers/syncProfile.js'

export const doctorCommand = defineCommand({
  meta: { name: 'doctor', description: 'Report which tools, profiles and settings are in place (no changes)' },
  async run() {
    const ctx = await createActionContext()
    const { logger } = ctx

    const statuses = await getToolStatuses(ctx)
    for (const status of statuses) {
      if (status.probe.found) logger.ok(`${status.id.padEnd(16)} ${status.probe.path}`)
      else logger.warn(`${status.id.padEnd(16)} missing`)
    }

    for (const profile of canonicalProfilePaths(ctx.dirs)) {
      if (await fs.pathExists(profile)) logger.ok(`profile          ${profile}`)
      else logger.info(`profile          ${profile} (absent)`)
    }

    const flag = migrationFlagPath(ctx.dirs)
    logger.info(`pwsh migration   ${(await fs.pathExists(flag)) ? 'done' : 'pending'}`)

    for (const target of listSettingsTargets(ctx.dirs, ctx.config.font.face, ctx.config.settings)) {
      if (await fs.pathExists(target.file)) logger.ok(`settings         ${target.file}`)
    }
  }
})
