import type { InstallerContext, ProbeResult, ToolDescriptor, ToolId } from '../installers/types.js'
import { buildToolCatalogue } from '../installers/tools.js'
import { probeTool } from '../installers/probe.js'

export interface ToolStatus {
  id: ToolId
  label: string
  probe: ProbeResult
}

export function listToolDefinitions(ctx: InstallerContext): readonly ToolDescriptor[] {
  return buildToolCatalogue(ctx.config)
}

export async function getToolStatuses(ctx: InstallerContext): Promise<ToolStatus[]> {
  const statuses: ToolStatus[] = []
  for (const tool of listToolDefinitions(ctx)) {
    statuses.push({ id: tool.id, label: tool.label, probe: await probeTool(tool.probe, ctx.dirs) })
  }
  return statuses
}
