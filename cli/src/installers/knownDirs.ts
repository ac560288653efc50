import * as path from 'path'
import * as os from 'os'
import type { KnownDirs } from './types.js'

// Windows exposes these through the environment; fall back to the default
// per-user layout under the home directory when a variable is missing.
export function resolveKnownDirs(
  env: NodeJS.ProcessEnv,
  homeDir: string,
  documentsDir?: string
): KnownDirs {
  const home = env.USERPROFILE || homeDir
  return {
    home,
    documents: documentsDir || path.join(home, 'Documents'),
    appData: env.APPDATA || path.join(home, 'AppData', 'Roaming'),
    localAppData: env.LOCALAPPDATA || path.join(home, 'AppData', 'Local'),
    programFiles: env.ProgramFiles || 'C:\\Program Files',
    programFilesX86: env['ProgramFiles(x86)'] || 'C:\\Program Files (x86)',
    windowsDir: env.SystemRoot || env.windir || 'C:\\Windows',
    temp: env.TEMP || env.TMP || os.tmpdir()
  }
}
