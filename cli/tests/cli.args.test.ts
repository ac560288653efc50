import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { runCommand } from 'citty'
import type { RunReport } from '../src/installers/types.js'

const mocks = vi.hoisted(() => ({ runInstaller: vi.fn() }))

vi.mock('../src/installers/main.js', async () => {
  const actual = await vi.importActual<typeof import('../src/installers/main.js')>('../src/installers/main.js')
  return { ...actual, runInstaller: mocks.runInstaller }
})

import { root } from '../src/index.js'
import { parseToolList } from '../src/commands/run.js'
import { renderProfileTemplate } from '../src/commands/init.js'
import { findRepoRoot } from '../src/lib/repoRoot.js'

const quietReport: RunReport = {
  profile: [],
  steps: [{ step: 'git', outcome: 'satisfied' }],
  migration: { status: 'already-done' },
  theme: { status: 'present' },
  settings: []
}

describe('cli args', () => {
  let writes: string[]

  beforeEach(() => {
    vi.clearAllMocks()
    writes = []
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      writes.push(String(chunk))
      return true
    })
    mocks.runInstaller.mockResolvedValue(quietReport)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('exposes the provisioning subcommands', () => {
    expect(Object.keys(root.subCommands ?? {})).toEqual(['run', 'sync', 'settings', 'doctor', 'ip', 'init'])
  })

  it('parses comma-separated tool ids', () => {
    expect(parseToolList('zoxide, pnpm')).toEqual(['zoxide', 'pnpm'])
    expect(parseToolList(undefined)).toEqual([])
    expect(() => parseToolList('git,emacs')).toThrow('Unknown tool id(s): emacs')
  })

  it('maps run flags onto installer options', async () => {
    await runCommand(root, {
      rawArgs: ['run', '--yes', '--dry-run', '--skip', 'zoxide', '--font', 'Hack Nerd Font', '--source', 'C:\\p.ps1']
    })

    expect(mocks.runInstaller).toHaveBeenCalledWith({
      sourceProfile: 'C:\\p.ps1',
      skipTools: ['zoxide'],
      fontFace: 'Hack Nerd Font',
      patchSettings: true,
      progress: true,
      verbose: false,
      dryRun: true,
      assumeYes: true,
      skipConfirmation: false
    })
  })

  it('prints nothing after a run that changed nothing', async () => {
    await runCommand(root, { rawArgs: ['run', '--yes'] })
    expect(writes).toEqual([])
  })

  it('reports bad tool ids without running or throwing', async () => {
    await expect(runCommand(root, { rawArgs: ['run', '--skip', 'emacs'] })).resolves.toBeDefined()
    expect(mocks.runInstaller).not.toHaveBeenCalled()
    expect(writes.join('')).toContain('LOG - Unknown tool id(s): emacs')
  })

  it('reports an unexpected run failure on one line instead of throwing', async () => {
    mocks.runInstaller.mockRejectedValue(new Error('disk gone'))
    await runCommand(root, { rawArgs: ['run'] })
    expect(writes.join('')).toContain('LOG - run failed: disk gone')
  })
})

describe('init template', () => {
  it('fills in the configured theme', async () => {
    const content = await renderProfileTemplate(findRepoRoot(), 'paradox')
    expect(content).toContain("Join-Path $HOME '.shellkit\\themes\\paradox.omp.json'")
    expect(content).not.toContain('__THEME__')
  })
})
