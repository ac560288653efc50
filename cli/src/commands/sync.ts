import { defineCommand } from 'citty'
import { createActionContext } from '../actions/context.js'
import { syncProfiles } from '../installers/syncProfile.js'

export const syncCommand = defineCommand({
  meta: { name: 'sync', description: 'Copy the active PowerShell profile to sibling profile locations' },
  args: {
    source: { type: 'string', description: 'Profile to copy from (default: PowerShell 7 profile)' },
    'dry-run': { type: 'boolean', description: 'Print actions without making changes' }
  },
  async run({ args }) {
    const ctx = await createActionContext({
      sourceProfile: args.source ? String(args.source) : undefined,
      dryRun: Boolean(args['dry-run'])
    })
    const entries = await syncProfiles(ctx)
    const unchanged = entries.filter((e) => e.action === 'unchanged')
    for (const entry of unchanged) {
      ctx.logger.info(`Profile already in sync: ${entry.path}`)
    }
  }
})
