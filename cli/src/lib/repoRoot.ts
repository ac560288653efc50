import { accessSync } from 'fs'
import { dirname, resolve } from 'path'
import { fileURLToPath } from 'url'

const here = dirname(fileURLToPath(import.meta.url))

// Works from both src/lib (tests, tsx) and dist/lib (published build).
export function findRepoRoot(start: string = here): string {
  let cur = start
  for (let i = 0; i < 6; i++) {
    try {
      accessSync(resolve(cur, 'templates', 'profile.ps1'))
      return cur
    } catch {
      cur = resolve(cur, '..')
    }
  }
  return resolve(here, '..', '..')
}
