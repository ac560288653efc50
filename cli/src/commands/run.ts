import { defineCommand } from 'citty'
import pc from 'picocolors'
import type { InstallerOptions, ToolId } from '../installers/types.js'
import { runInstaller, defaultInstallerOptions } from '../installers/main.js'
import { formatRunReport, formatRunSummary, isNoteworthy, summarizeRunReport } from '../installers/report.js'
import { DIAGNOSTIC_PREFIX } from '../installers/logger.js'
import { isToolId, TOOL_IDS } from '../installers/tools.js'
import { errorMessage } from '../installers/utils.js'

export function parseToolList(value: unknown): ToolId[] {
  if (value === undefined || value === null || value === '') return []
  const ids = String(value).split(',').map((s) => s.trim()).filter(Boolean)
  const unknown = ids.filter((id) => !isToolId(id))
  if (unknown.length > 0) {
    throw new Error(`Unknown tool id(s): ${unknown.join(', ')} (known: ${TOOL_IDS.join(', ')})`)
  }
  return ids.filter(isToolId)
}

export const provisionCommand = defineCommand({
  meta: {
    name: 'run',
    description: 'Sync the profile, install missing tools and patch terminal/editor settings'
  },
  args: {
    yes: { type: 'boolean', description: 'Non-interactive; never prompt' },
    'dry-run': { type: 'boolean', description: 'Print actions without making changes' },
    'skip-confirmation': { type: 'boolean', description: 'Skip prompts' },
    source: { type: 'string', description: 'Active profile to copy to sibling profiles (default: PowerShell 7 profile)' },
    skip: { type: 'string', description: `Comma-separated tools to leave alone (${TOOL_IDS.join('|')})` },
    font: { type: 'string', description: 'Font face written to terminal/editor settings' },
    verbose: { type: 'boolean', description: 'Print every step, not only problems' },
    progress: { type: 'boolean', default: true, description: 'Show the progress bar' },
    settings: { type: 'boolean', default: true, description: 'Patch Windows Terminal / VS Code settings' }
  },
  async run({ args }) {
    const verbose = Boolean(args.verbose)
    let options: InstallerOptions
    try {
      options = {
        ...defaultInstallerOptions(),
        sourceProfile: args.source ? String(args.source) : undefined,
        skipTools: parseToolList(args.skip),
        fontFace: args.font ? String(args.font) : undefined,
        patchSettings: args.settings !== false,
        progress: args.progress !== false,
        verbose,
        dryRun: Boolean(args['dry-run']),
        assumeYes: Boolean(args.yes),
        skipConfirmation: Boolean(args['skip-confirmation'])
      }
    } catch (error) {
      process.stdout.write(pc.red(`${DIAGNOSTIC_PREFIX}${errorMessage(error)}\n`))
      return
    }

    // Runs from the shell profile: report problems, never fail the shell start.
    try {
      const report = await runInstaller(options)
      const summary = summarizeRunReport(report)
      if (verbose) {
        process.stdout.write(formatRunReport(report).join('\n') + '\n')
      }
      if (verbose || isNoteworthy(summary)) {
        process.stdout.write(formatRunSummary(summary) + '\n')
      }
    } catch (error) {
      process.stdout.write(pc.red(`${DIAGNOSTIC_PREFIX}run failed: ${errorMessage(error)}\n`))
    }
  }
})
