import { describe, it, expect, vi, beforeEach } from 'vitest'
import { makeCtx, makeLogger } from './test-utils.js'
import type { ToolDescriptor, ToolId } from '../src/installers/types.js'
import type { RunCommandOptions } from '../src/installers/utils.js'

const mocks = vi.hoisted(() => ({
  resolveCmd: vi.fn<[string], Promise<string | undefined>>(),
  runCommand: vi.fn<[string, string[], RunCommandOptions?], Promise<void>>(),
  probeTool: vi.fn(),
  refreshPath: vi.fn(),
  runPowerShell: vi.fn()
}))

vi.mock('../src/installers/utils.js', async () => {
  const actual = await vi.importActual<typeof import('../src/installers/utils.js')>('../src/installers/utils.js')
  return { ...actual, resolveCmd: mocks.resolveCmd, runCommand: mocks.runCommand }
})
vi.mock('../src/installers/probe.js', () => ({ probeTool: mocks.probeTool }))
vi.mock('../src/installers/envPath.js', async () => {
  const actual = await vi.importActual<typeof import('../src/installers/envPath.js')>('../src/installers/envPath.js')
  return { ...actual, refreshPath: mocks.refreshPath }
})
vi.mock('../src/installers/powershell.js', async () => {
  const actual = await vi.importActual<typeof import('../src/installers/powershell.js')>('../src/installers/powershell.js')
  return { ...actual, runPowerShell: mocks.runPowerShell }
})

import { createPackageInstaller, wingetInstallArgs, wingetUpgradeArgs } from '../src/installers/packageInstaller.js'
import { buildToolCatalogue } from '../src/installers/tools.js'
import { defaultUserConfig } from '../src/installers/config.js'
import { installModuleScript } from '../src/installers/powershell.js'

const WINGET = 'C:\\Users\\dev\\AppData\\Local\\Microsoft\\WindowsApps\\winget.exe'

function tool(id: ToolId): ToolDescriptor {
  const found = buildToolCatalogue(defaultUserConfig()).find((t) => t.id === id)
  if (!found) throw new Error(`missing tool ${id}`)
  return found
}

function commandsOnPath(found: Record<string, string>) {
  mocks.resolveCmd.mockImplementation(async (cmd: string) => found[cmd])
}

describe('installers/packageInstaller', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    mocks.runCommand.mockResolvedValue(undefined)
    mocks.refreshPath.mockResolvedValue(true)
    mocks.runPowerShell.mockResolvedValue(undefined)
    mocks.probeTool.mockResolvedValue({ found: true, path: 'C:\\Program Files\\Git\\cmd\\git.exe', via: 'search-path' })
  })

  it('builds silent, exact winget command lines', () => {
    expect(wingetInstallArgs('Git.Git')).toEqual([
      'install', '--id', 'Git.Git', '--exact', '--silent',
      '--accept-package-agreements', '--accept-source-agreements', '--source', 'winget'
    ])
    expect(wingetUpgradeArgs('Microsoft.PowerShell')[0]).toBe('upgrade')
    expect(wingetUpgradeArgs('Microsoft.PowerShell').slice(1)).toEqual(wingetInstallArgs('Microsoft.PowerShell').slice(1))
  })

  it('installs through winget, refreshes PATH and verifies the tool', async () => {
    commandsOnPath({ winget: WINGET })
    const ctx = makeCtx('/home/dev')
    const result = await createPackageInstaller(ctx).install(tool('git'))

    expect(mocks.runCommand).toHaveBeenCalledWith(
      WINGET,
      wingetInstallArgs('Git.Git'),
      expect.objectContaining({ dryRun: false, quiet: true })
    )
    expect(mocks.refreshPath).toHaveBeenCalledTimes(1)
    expect(result).toEqual({ status: 'installed', path: 'C:\\Program Files\\Git\\cmd\\git.exe' })
  })

  it('reports an install it cannot verify as unverified', async () => {
    commandsOnPath({ winget: WINGET })
    mocks.probeTool.mockResolvedValue({ found: false })
    const logger = makeLogger()

    const result = await createPackageInstaller(makeCtx('/home/dev', { logger })).install(tool('zoxide'))

    expect(result).toEqual({
      status: 'unverified',
      detail: 'zoxide install finished but it is still not reachable; open a new shell'
    })
    expect(logger.warn).toHaveBeenCalledWith(
      'zoxide: zoxide install finished but it is still not reachable; open a new shell'
    )
  })

  it('turns a failing package manager into a failed result', async () => {
    commandsOnPath({ winget: WINGET })
    mocks.runCommand.mockRejectedValue(new Error('Command failed (1): winget install'))
    const logger = makeLogger()

    const result = await createPackageInstaller(makeCtx('/home/dev', { logger })).install(tool('git'))

    expect(result).toEqual({ status: 'failed', detail: 'Command failed (1): winget install' })
    expect(logger.warn).toHaveBeenCalledWith('git: Command failed (1): winget install')
    expect(mocks.probeTool).not.toHaveBeenCalled()
  })

  it.skipIf(process.platform === 'win32')('tries to bootstrap a missing winget only once per run', async () => {
    commandsOnPath({})
    const logger = makeLogger()
    const installer = createPackageInstaller(makeCtx('/home/dev', { logger }))

    const first = await installer.install(tool('git'))
    const second = await installer.install(tool('zoxide'))

    expect(first).toEqual({ status: 'failed', detail: 'winget is not available' })
    expect(second).toEqual({ status: 'failed', detail: 'winget is not available' })
    const bootstrapWarnings = logger.warn.mock.calls.filter(([msg]) => String(msg).startsWith('winget:'))
    expect(bootstrapWarnings).toHaveLength(1)
    expect(mocks.runCommand).not.toHaveBeenCalled()
  })

  it('installs Node.js through nvm and activates it', async () => {
    commandsOnPath({ nvm: 'C:\\nvm\\nvm.exe' })
    await createPackageInstaller(makeCtx('/home/dev')).install(tool('node'))

    expect(mocks.runCommand.mock.calls.map(([cmd, args]) => [cmd, args])).toEqual([
      ['C:\\nvm\\nvm.exe', ['install', 'lts']],
      ['C:\\nvm\\nvm.exe', ['use', 'lts']]
    ])
  })

  it('installs pnpm as a global npm package', async () => {
    commandsOnPath({ npm: 'C:\\nodejs\\npm.cmd' })
    await createPackageInstaller(makeCtx('/home/dev')).install(tool('pnpm'))
    expect(mocks.runCommand).toHaveBeenCalledWith('C:\\nodejs\\npm.cmd', ['install', '-g', 'pnpm'], expect.anything())
  })

  it('installs PowerShell modules for the current user', async () => {
    commandsOnPath({})
    await createPackageInstaller(makeCtx('/home/dev')).install(tool('terminal-icons'))
    expect(mocks.runPowerShell).toHaveBeenCalledWith(
      installModuleScript('Terminal-Icons'),
      expect.objectContaining({ dryRun: false })
    )
  })

  it('installs the Nerd Font with oh-my-posh and needs it present', async () => {
    commandsOnPath({ 'oh-my-posh': 'C:\\omp\\oh-my-posh.exe' })
    await createPackageInstaller(makeCtx('/home/dev')).install(tool('nerd-font'))
    expect(mocks.runCommand).toHaveBeenCalledWith(
      'C:\\omp\\oh-my-posh.exe',
      ['font', 'install', 'CascadiaCode', '--user'],
      expect.anything()
    )

    commandsOnPath({})
    const result = await createPackageInstaller(makeCtx('/home/dev')).install(tool('nerd-font'))
    expect(result).toEqual({ status: 'failed', detail: 'oh-my-posh is required to install fonts' })
  })
})
