import { defineCommand } from 'citty'
import { provisionCommand } from './commands/run.js'
import { syncCommand } from './commands/sync.js'
import { settingsCommand } from './commands/settings.js'
import { doctorCommand } from './commands/doctor.js'
import { ipCommand } from './commands/ip.js'
import { initCommand } from './commands/init.js'

export const root = defineCommand({
  meta: {
    name: 'shellkit',
    version: '0.1.0',
    description: 'Keep a Windows PowerShell developer profile provisioned on every shell start'
  },
  subCommands: {
    run: provisionCommand,
    sync: syncCommand,
    settings: settingsCommand,
    doctor: doctorCommand,
    ip: ipCommand,
    init: initCommand
  }
})

export { runInstaller } from './installers/main.js'
export { patchSettingsFile, applyAssignments } from './installers/patchSettings.js'
export type { SettingAssignment, JsonObject, JsonValue } from './installers/patchSettings.js'
export type { RunReport, StepReport, StepOutcome, InstallerOptions } from './installers/types.js'
