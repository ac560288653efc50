import { defineCommand } from 'citty'
import { createActionContext } from '../actions/context.js'
import { applySettingsTargets } from '../installers/settingsTargets.js'

export const settingsCommand = defineCommand({
  meta: { name: 'settings', description: 'Set PowerShell as default shell and the Nerd Font in Windows Terminal / VS Code' },
  args: {
    font: { type: 'string', description: 'Font face to configure when none is set' },
    'dry-run': { type: 'boolean', description: 'Print actions without making changes' }
  },
  async run({ args }) {
    const ctx = await createActionContext({
      fontFace: args.font ? String(args.font) : undefined,
      dryRun: Boolean(args['dry-run'])
    })
    const results = await applySettingsTargets(ctx)
    if (results.length === 0) {
      ctx.logger.info('No Windows Terminal or VS Code settings found')
    }
  }
})
