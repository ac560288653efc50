import * as path from 'path'
import type { KnownDirs, ToolDescriptor, ToolId, UserConfig } from './types.js'

// Provisioning order: each entry may rely on the ones before it
// (node needs nvm, pnpm needs npm, modules need PowerShell).
export const TOOL_IDS: readonly ToolId[] = [
  'git',
  'pwsh',
  'nvm',
  'node',
  'pnpm',
  'oh-my-posh',
  'nerd-font',
  'terminal-icons',
  'psreadline',
  'zoxide'
]

export function isToolId(value: string): value is ToolId {
  return TOOL_IDS.some((id) => id === value)
}

const wingetLinks = (dirs: KnownDirs, exe: string) =>
  path.join(dirs.localAppData, 'Microsoft', 'WinGet', 'Links', exe)

const userModuleRoots = (dirs: KnownDirs) => [
  path.join(dirs.documents, 'PowerShell', 'Modules'),
  path.join(dirs.documents, 'WindowsPowerShell', 'Modules')
]

export function fontFilePattern(face: string): RegExp {
  // "CaskaydiaCove Nerd Font" ships as CaskaydiaCoveNerdFont-Regular.ttf etc.
  const compact = face.replace(/\s+/g, '').replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
  return new RegExp(`^${compact}`, 'i')
}

export function buildToolCatalogue(config: UserConfig): readonly ToolDescriptor[] {
  const catalogue: ToolDescriptor[] = [
    {
      id: 'git',
      label: 'Git',
      probe: {
        kind: 'command',
        commands: ['git'],
        fallbackPaths: (dirs) => [
          path.join(dirs.programFiles, 'Git', 'cmd', 'git.exe'),
          path.join(dirs.programFilesX86, 'Git', 'cmd', 'git.exe'),
          path.join(dirs.localAppData, 'Programs', 'Git', 'cmd', 'git.exe')
        ]
      },
      install: { kind: 'winget', id: 'Git.Git' }
    },
    {
      id: 'pwsh',
      label: 'PowerShell 7',
      probe: {
        kind: 'command',
        commands: ['pwsh'],
        fallbackPaths: (dirs) => [
          path.join(dirs.programFiles, 'PowerShell', '7', 'pwsh.exe'),
          path.join(dirs.localAppData, 'Microsoft', 'WindowsApps', 'pwsh.exe')
        ]
      },
      install: { kind: 'winget', id: 'Microsoft.PowerShell' }
    },
    {
      id: 'nvm',
      label: 'nvm for Windows',
      probe: {
        kind: 'command',
        commands: ['nvm'],
        fallbackPaths: (dirs) => [
          path.join(dirs.appData, 'nvm', 'nvm.exe'),
          path.join(dirs.localAppData, 'nvm', 'nvm.exe')
        ]
      },
      install: { kind: 'winget', id: 'CoreyButler.NVMforWindows' }
    },
    {
      id: 'node',
      label: 'Node.js',
      probe: {
        kind: 'command',
        commands: ['node'],
        fallbackPaths: (dirs) => [path.join(dirs.programFiles, 'nodejs', 'node.exe')]
      },
      install: { kind: 'nvm', version: config.node.version }
    },
    {
      id: 'pnpm',
      label: 'pnpm',
      probe: {
        kind: 'command',
        commands: ['pnpm'],
        fallbackPaths: (dirs) => [
          path.join(dirs.appData, 'npm', 'pnpm.cmd'),
          path.join(dirs.localAppData, 'pnpm', 'pnpm.exe')
        ]
      },
      install: { kind: 'npm-global', pkg: 'pnpm' }
    },
    {
      id: 'oh-my-posh',
      label: 'Oh My Posh',
      probe: {
        kind: 'command',
        commands: ['oh-my-posh'],
        fallbackPaths: (dirs) => [
          path.join(dirs.localAppData, 'Programs', 'oh-my-posh', 'bin', 'oh-my-posh.exe'),
          wingetLinks(dirs, 'oh-my-posh.exe')
        ]
      },
      install: { kind: 'winget', id: 'JanDeDobbeleer.OhMyPosh' }
    },
    {
      id: 'nerd-font',
      label: config.font.face,
      probe: {
        kind: 'directory-scan',
        dirs: (dirs) => [
          path.join(dirs.localAppData, 'Microsoft', 'Windows', 'Fonts'),
          path.join(dirs.windowsDir, 'Fonts')
        ],
        match: fontFilePattern(config.font.face)
      },
      install: { kind: 'font', name: config.font.install }
    },
    {
      id: 'terminal-icons',
      label: 'Terminal-Icons',
      probe: { kind: 'directory-scan', dirs: userModuleRoots, match: /^Terminal-Icons$/i },
      install: { kind: 'ps-module', module: 'Terminal-Icons' }
    },
    {
      id: 'psreadline',
      label: 'PSReadLine',
      probe: { kind: 'directory-scan', dirs: userModuleRoots, match: /^PSReadLine$/i },
      install: { kind: 'ps-module', module: 'PSReadLine' }
    },
    {
      id: 'zoxide',
      label: 'zoxide',
      probe: {
        kind: 'command',
        commands: ['zoxide'],
        fallbackPaths: (dirs) => [wingetLinks(dirs, 'zoxide.exe')]
      },
      install: { kind: 'winget', id: 'ajeetdsouza.zoxide' }
    }
  ]
  return Object.freeze(catalogue.map((tool) => Object.freeze(tool)))
}
