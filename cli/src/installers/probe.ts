import fs from 'fs-extra'
import * as path from 'path'
import type { KnownDirs, ProbeResult, ProbeStrategy } from './types.js'
import { resolveCmd } from './utils.js'

const NOT_FOUND: ProbeResult = { found: false }

/**
 * Decide whether a tool is usable right now: search path first, then the
 * well-known install locations. Never throws; unreadable or missing
 * locations count as "not found".
 */
export async function probeTool(strategy: ProbeStrategy, dirs: KnownDirs): Promise<ProbeResult> {
  switch (strategy.kind) {
    case 'command': {
      for (const cmd of strategy.commands) {
        const resolved = await resolveCmd(cmd)
        if (resolved) return { found: true, path: resolved, via: 'search-path' }
      }
      const fallback = strategy.fallbackPaths
      return probePaths(fallback ? safeList(() => fallback(dirs)) : [])
    }
    case 'paths':
      return probePaths(safeList(() => strategy.paths(dirs)))
    case 'directory-scan':
      return scanDirectories(safeList(() => strategy.dirs(dirs)), strategy.match)
  }
}

async function probePaths(candidates: string[]): Promise<ProbeResult> {
  for (const candidate of candidates) {
    if (await existsQuietly(candidate)) {
      return { found: true, path: candidate, via: 'known-location' }
    }
  }
  return NOT_FOUND
}

async function scanDirectories(candidates: string[], match: RegExp): Promise<ProbeResult> {
  for (const dir of candidates) {
    let entries: string[]
    try {
      entries = await fs.readdir(dir)
    } catch {
      continue
    }
    const hit = entries.find((entry) => match.test(entry))
    if (hit) return { found: true, path: path.join(dir, hit), via: 'known-location' }
  }
  return NOT_FOUND
}

async function existsQuietly(candidate: string): Promise<boolean> {
  try {
    return await fs.pathExists(candidate)
  } catch {
    return false
  }
}

function safeList(build: () => string[]): string[] {
  try {
    return build().filter((entry) => entry.length > 0)
  } catch {
    return []
  }
}
