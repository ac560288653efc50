import type { InstallerContext, InstallerOptions } from '../installers/types.js'
import { createInstallerContext, defaultInstallerOptions } from '../installers/main.js'

// Single-purpose commands (sync, settings, doctor) talk to the user directly.
export function createBaseOptions(): InstallerOptions {
  return { ...defaultInstallerOptions(), progress: false, verbose: true }
}

export async function createActionContext(
  options: Partial<InstallerOptions> = {}
): Promise<InstallerContext> {
  return createInstallerContext({ ...createBaseOptions(), ...options })
}
