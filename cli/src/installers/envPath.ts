import * as path from 'path'
import type { Logger } from './types.js'
import { errorMessage, execCapture } from './utils.js'

const MACHINE_ENV_KEY = 'HKLM\\SYSTEM\\CurrentControlSet\\Control\\Session Manager\\Environment'
const USER_ENV_KEY = 'HKCU\\Environment'
const REG_QUERY_TIMEOUT_MS = 5000

// `reg query <key> /v Path` prints e.g.
//     Path    REG_EXPAND_SZ    %USERPROFILE%\.cargo\bin;C:\tools
export function parseRegPathValue(output: string): string | undefined {
  const match = output.match(/^\s+Path\s+REG_(?:EXPAND_)?SZ\s+(.*?)\s*$/im)
  return match ? match[1] : undefined
}

// Expands %VAR% references; lookups are case-insensitive like cmd.exe.
// Unknown variables are left untouched.
export function expandEnvVars(value: string, env: NodeJS.ProcessEnv): string {
  const lowered = new Map<string, string>()
  for (const [key, val] of Object.entries(env)) {
    if (typeof val === 'string') lowered.set(key.toLowerCase(), val)
  }
  return value.replace(/%([^%]+)%/g, (whole, name: string) => lowered.get(name.toLowerCase()) ?? whole)
}

export function splitPathList(value: string | undefined): string[] {
  if (!value) return []
  return value.split(';').map((entry) => entry.trim()).filter(Boolean)
}

// Machine entries first, then user entries, then whatever the process already
// had (e.g. entries a parent shell prepended). Duplicates are dropped
// case-insensitively, ignoring trailing separators.
export function mergePathLists(...lists: string[][]): string[] {
  const seen = new Set<string>()
  const merged: string[] = []
  for (const list of lists) {
    for (const entry of list) {
      const key = entry.replace(/[\\/]+$/, '').toLowerCase()
      if (seen.has(key)) continue
      seen.add(key)
      merged.push(entry)
    }
  }
  return merged
}

/**
 * Pick up PATH changes made by installers without restarting the shell.
 * Windows only; elsewhere the process PATH is left alone.
 */
export async function refreshPath(logger?: Logger, env: NodeJS.ProcessEnv = process.env): Promise<boolean> {
  if (process.platform !== 'win32') return false
  try {
    const machine = await queryRegPath(MACHINE_ENV_KEY)
    const user = await queryRegPath(USER_ENV_KEY)
    if (machine === undefined && user === undefined) return false
    const current = splitPathList(env.PATH ?? env.Path)
    const next = mergePathLists(
      splitPathList(machine && expandEnvVars(machine, env)),
      splitPathList(user && expandEnvVars(user, env)),
      current
    )
    env.PATH = next.join(';')
    return true
  } catch (error) {
    logger?.warn(`path refresh: ${errorMessage(error)}`)
    return false
  }
}

export function prependPath(dir: string, env: NodeJS.ProcessEnv = process.env): void {
  const current = env.PATH ?? ''
  env.PATH = current ? `${dir}${path.delimiter}${current}` : dir
}

async function queryRegPath(key: string): Promise<string | undefined> {
  const res = await execCapture('reg', ['query', key, '/v', 'Path'], { timeoutMs: REG_QUERY_TIMEOUT_MS })
  if (res.timedOut || res.code !== 0) return undefined
  return parseRegPathValue(res.stdout)
}
