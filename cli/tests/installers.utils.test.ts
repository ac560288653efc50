import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'

const mocks = vi.hoisted(() => ({ execa: vi.fn() }))

vi.mock('execa', () => ({ execa: mocks.execa }))

import { execCapture, fetchText, fetchWithTimeout } from '../src/installers/utils.js'

describe('installers/utils execCapture', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('captures output without throwing on a non-zero exit', async () => {
    mocks.execa.mockResolvedValue({ stdout: '7.4.6', stderr: '', exitCode: 0, timedOut: false })

    const res = await execCapture('pwsh', ['-NoProfile', '-Command', '$PSVersionTable'], { timeoutMs: 1000, cwd: '/work' })

    expect(res).toEqual({ stdout: '7.4.6', stderr: '', code: 0, timedOut: false })
    expect(mocks.execa).toHaveBeenCalledWith('pwsh', ['-NoProfile', '-Command', '$PSVersionTable'], {
      cwd: '/work',
      stdin: 'ignore',
      timeout: 1000,
      reject: false,
      windowsHide: true
    })
  })

  it('reports timeouts and missing exit codes', async () => {
    mocks.execa.mockResolvedValue({ stdout: '', stderr: '', exitCode: undefined, timedOut: true })
    await expect(execCapture('reg', ['query', 'HKCU\\Environment'], { timeoutMs: 5 })).resolves.toEqual({
      stdout: '',
      stderr: '',
      code: null,
      timedOut: true
    })
  })
})

describe('installers/utils fetchWithTimeout', () => {
  const fetchMock = vi.fn<[string], Promise<Response>>()

  beforeEach(() => {
    fetchMock.mockReset()
    vi.stubGlobal('fetch', fetchMock)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('reads the body of a successful response', async () => {
    fetchMock.mockResolvedValue(new Response('hello', { status: 200 }))
    await expect(fetchText('https://example.test/a', 1000)).resolves.toBe('hello')
  })

  it('rejects non-2xx responses with the status', async () => {
    fetchMock.mockResolvedValue(new Response('nope', { status: 404 }))
    await expect(fetchWithTimeout('https://example.test/a', 1000, (res) => res.text())).rejects.toThrow('HTTP 404')
  })
})
