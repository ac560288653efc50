export type ToolId =
  | 'git'
  | 'pwsh'
  | 'nvm'
  | 'node'
  | 'pnpm'
  | 'oh-my-posh'
  | 'nerd-font'
  | 'terminal-icons'
  | 'psreadline'
  | 'zoxide'

export interface KnownDirs {
  home: string
  documents: string
  appData: string
  localAppData: string
  programFiles: string
  programFilesX86: string
  windowsDir: string
  temp: string
}

export type ProbeStrategy =
  | { kind: 'command'; commands: readonly string[]; fallbackPaths?: (dirs: KnownDirs) => string[] }
  | { kind: 'paths'; paths: (dirs: KnownDirs) => string[] }
  | { kind: 'directory-scan'; dirs: (dirs: KnownDirs) => string[]; match: RegExp }

export type ProbeResult =
  | { found: true; path: string; via: 'search-path' | 'known-location' }
  | { found: false }

export type InstallStrategy =
  | { kind: 'winget'; id: string }
  | { kind: 'nvm'; version: string }
  | { kind: 'npm-global'; pkg: string }
  | { kind: 'ps-module'; module: string }
  | { kind: 'font'; name: string }

export interface ToolDescriptor {
  readonly id: ToolId
  readonly label: string
  readonly probe: ProbeStrategy
  readonly install: InstallStrategy
  // Defaults to `probe` when absent.
  readonly verify?: ProbeStrategy
}

export type InstallResult =
  | { status: 'installed'; path: string }
  | { status: 'unverified'; detail: string }
  | { status: 'failed'; detail: string }

export type StepOutcome = 'satisfied' | 'installed' | 'unverified' | 'absent' | 'skipped'

export interface StepReport {
  step: ToolId
  outcome: StepOutcome
  detail?: string
}

export interface ProgressState {
  readonly totalSteps: number
  readonly currentStep: number
  readonly installedCount: number
}

export interface ProfileSyncEntry {
  path: string
  action: 'created' | 'updated' | 'unchanged' | 'failed'
  detail?: string
}

export type SettingsPatchStatus = 'created' | 'updated' | 'unchanged' | 'restored' | 'failed' | 'dry-run'

export interface SettingsPatchResult {
  file: string
  status: SettingsPatchStatus
  changed: string[]
  skipped: string[]
  backup?: string
  error?: string
}

export interface MigrationResult {
  status: 'already-done' | 'current' | 'migrated' | 'failed' | 'skipped'
  detail?: string
}

export interface ThemeResult {
  status: 'present' | 'downloaded' | 'failed' | 'skipped'
  path?: string
  detail?: string
}

export interface RunReport {
  profile: ProfileSyncEntry[]
  steps: StepReport[]
  migration: MigrationResult
  theme: ThemeResult
  settings: SettingsPatchResult[]
}

export interface UserConfig {
  tools: { skip: ToolId[] }
  font: { install: string; face: string }
  theme: { name: string }
  settings: { windowsTerminal: boolean; vscode: boolean }
  profile: { extra: string[]; documentsDir: string | undefined }
  node: { version: string }
}

export interface InstallerOptions {
  sourceProfile: string | undefined
  skipTools: ToolId[]
  fontFace: string | undefined
  patchSettings: boolean
  progress: boolean
  verbose: boolean
  dryRun: boolean
  assumeYes: boolean
  skipConfirmation: boolean
}

export interface InstallerContext {
  cwd: string
  homeDir: string
  dirs: KnownDirs
  logDir: string
  logFile: string
  options: InstallerOptions
  config: UserConfig
  logger: Logger
}

export interface Logger {
  log: (msg: string) => void
  info: (msg: string) => void
  ok: (msg: string) => void
  warn: (msg: string) => void
  err: (msg: string) => void
}
