import type { RunReport, StepOutcome } from './types.js'

const LABEL_WIDTH = 16

const STEP_ICONS: Record<StepOutcome, string> = {
  satisfied: '✔',
  installed: '✔',
  unverified: '⚠',
  absent: '✖',
  skipped: '-'
}

function line(icon: string, label: string, status: string, detail?: string): string {
  return `${icon} ${label.padEnd(LABEL_WIDTH)} ${status}${detail ? ` (${detail})` : ''}`
}

export function formatRunReport(report: RunReport): string[] {
  const lines: string[] = []
  for (const entry of report.profile) {
    const icon = entry.action === 'failed' ? '✖' : '✔'
    lines.push(line(icon, 'profile', entry.action, entry.detail ? `${entry.path}: ${entry.detail}` : entry.path))
  }
  for (const step of report.steps) {
    lines.push(line(STEP_ICONS[step.outcome], step.step, step.outcome, step.detail))
  }
  const migrationIcon = report.migration.status === 'failed' ? '✖' : '✔'
  lines.push(line(migrationIcon, 'pwsh-migration', report.migration.status, report.migration.detail))
  const themeIcon = report.theme.status === 'failed' ? '✖' : '✔'
  lines.push(line(themeIcon, 'theme', report.theme.status, report.theme.detail ?? report.theme.path))
  for (const result of report.settings) {
    const icon = result.status === 'failed' ? '✖' : result.status === 'restored' ? '⚠' : '✔'
    lines.push(line(icon, 'settings', result.status, result.file))
  }
  return lines
}

export interface RunSummary {
  installed: number
  unverified: number
  failed: number
  filesWritten: number
}

export function summarizeRunReport(report: RunReport): RunSummary {
  const count = (outcome: StepOutcome) => report.steps.filter((s) => s.outcome === outcome).length
  const profileFailures = report.profile.filter((e) => e.action === 'failed').length
  const settingsFailures = report.settings.filter((r) => r.status === 'failed' || r.status === 'restored').length
  const otherFailures = (report.migration.status === 'failed' ? 1 : 0) + (report.theme.status === 'failed' ? 1 : 0)
  const filesWritten =
    report.profile.filter((e) => (e.action === 'created' || e.action === 'updated') && !e.detail).length +
    report.settings.filter((r) => r.status === 'created' || r.status === 'updated').length
  return {
    installed: count('installed'),
    unverified: count('unverified'),
    failed: count('absent') + profileFailures + settingsFailures + otherFailures,
    filesWritten
  }
}

export function formatRunSummary(summary: RunSummary): string {
  return `shellkit: ${summary.installed} installed, ${summary.unverified} unverified, ${summary.failed} failed, ${summary.filesWritten} file(s) updated`
}

// Quiet shell starts: only speak up when a run changed or broke something.
export function isNoteworthy(summary: RunSummary): boolean {
  return summary.installed + summary.unverified + summary.failed + summary.filesWritten > 0
}
