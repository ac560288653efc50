import fs from 'fs-extra'
import * as path from 'path'
import { applyEdits, modify, parse as parseJsonc, type ParseError } from 'jsonc-parser'
import type { Logger, SettingsPatchResult } from './types.js'
import { createBackupPath, errorMessage } from './utils.js'

export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject
export interface JsonObject {
  [key: string]: JsonValue
}

export interface SettingAssignment {
  // "a.b.c" is split on dots; an array is taken literally so flat dotted keys
  // (VS Code's "terminal.integrated.fontFamily") can be addressed.
  path: string | readonly string[]
  value: JsonValue
  // `force` always writes; `if-missing` never overrides an existing user value.
  mode: 'if-missing' | 'force'
}

export interface SettingEdit {
  segments: string[]
  value: JsonValue
}

export interface AppliedAssignments {
  doc: JsonObject
  changed: string[]
  // One entry per changed key, in assignment order.
  edits: SettingEdit[]
  // Assignments blocked by a non-object value along their path.
  skipped: string[]
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function settingPathSegments(settingPath: SettingAssignment['path']): string[] {
  if (typeof settingPath === 'string') return settingPath.split('.').filter(Boolean)
  return [...settingPath]
}

export function jsonEqual(a: JsonValue | undefined, b: JsonValue | undefined): boolean {
  if (a === b) return true
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false
    return a.every((item, i) => jsonEqual(item, b[i]))
  }
  if (isJsonObject(a) && isJsonObject(b)) {
    const keys = Object.keys(a)
    if (keys.length !== Object.keys(b).length) return false
    return keys.every((key) => hasOwn(b, key) && jsonEqual(a[key], b[key]))
  }
  return false
}

function hasOwn(obj: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key)
}

/**
 * Merge assignments into a copy of `doc`. Intermediate objects are created as
 * needed; existing sibling keys are left alone.
 */
export function applyAssignments(doc: JsonObject, assignments: readonly SettingAssignment[]): AppliedAssignments {
  const next = structuredClone(doc)
  const changed: string[] = []
  const edits: SettingEdit[] = []
  const skipped: string[] = []

  for (const assignment of assignments) {
    const segments = settingPathSegments(assignment.path)
    if (segments.length === 0) continue
    const label = segments.join('.')
    const leaf = segments[segments.length - 1]

    let node: JsonObject | undefined = next
    for (const key of segments.slice(0, -1)) {
      const child: JsonValue | undefined = node[key]
      if (child === undefined) {
        const created: JsonObject = {}
        node[key] = created
        node = created
      } else if (isJsonObject(child)) {
        node = child
      } else {
        node = undefined
        break
      }
    }
    if (!node) {
      skipped.push(label)
      continue
    }

    if (hasOwn(node, leaf)) {
      if (assignment.mode === 'if-missing') continue
      if (jsonEqual(node[leaf], assignment.value)) continue
    }
    node[leaf] = structuredClone(assignment.value)
    changed.push(label)
    edits.push({ segments, value: assignment.value })
  }

  return { doc: next, changed, edits, skipped }
}

export interface LoadedSettings {
  doc: JsonObject
  // File content without a byte order mark; '' for a missing file.
  text: string
  exists: boolean
  malformed: boolean
}

// Windows Terminal and VS Code both accept comments and trailing commas.
export function parseSettingsText(text: string): JsonObject | undefined {
  const errors: ParseError[] = []
  const parsed: unknown = parseJsonc(text, errors, { allowTrailingComma: true, disallowComments: false })
  if (errors.length > 0 || !isJsonObject(parsed)) return undefined
  return parsed
}

export async function loadSettingsDocument(file: string): Promise<LoadedSettings> {
  if (!(await fs.pathExists(file))) return { doc: {}, text: '', exists: false, malformed: false }
  const text = (await fs.readFile(file, 'utf8')).replace(/^\uFEFF/, '')
  if (text.trim() === '') return { doc: {}, text, exists: true, malformed: false }
  const doc = parseSettingsText(text)
  if (doc) return { doc, text, exists: true, malformed: false }
  return { doc: {}, text, exists: true, malformed: true }
}

export function serializeSettings(doc: JsonObject): string {
  return JSON.stringify(doc, null, 4) + '\n'
}

/**
 * Apply edits to the existing text so comments, key order and formatting
 * survive. Empty or unusable text is replaced by a fresh document.
 */
export function renderSettings(doc: JsonObject, source: string, edits: readonly SettingEdit[]): string {
  if (source.trim() === '' || !parseSettingsText(source)) return serializeSettings(doc)
  const eol = source.includes('\r\n') ? '\r\n' : '\n'
  let text = source
  for (const edit of edits) {
    const changes = modify(text, edit.segments, edit.value, {
      formattingOptions: { insertSpaces: true, tabSize: 4, eol }
    })
    text = applyEdits(text, changes)
  }
  return text
}

export interface PatchSettingsOptions {
  dryRun: boolean
  logger: Logger
  serialize?: (doc: JsonObject, source: string, edits: readonly SettingEdit[]) => string
}

/**
 * Patch a JSON-with-comments settings file in place. The current file is
 * backed up before anything is written and copied back if serialization,
 * validation or the write itself fails.
 */
export async function patchSettingsFile(
  file: string,
  assignments: readonly SettingAssignment[],
  options: PatchSettingsOptions
): Promise<SettingsPatchResult> {
  const { logger } = options
  const serialize = options.serialize ?? renderSettings

  let loaded: LoadedSettings
  try {
    loaded = await loadSettingsDocument(file)
  } catch (error) {
    const detail = errorMessage(error)
    logger.warn(`settings: cannot read ${file}: ${detail}`)
    return { file, status: 'failed', changed: [], skipped: [], error: detail }
  }
  if (loaded.malformed) {
    logger.warn(`settings: ${file} is not a valid JSON object; starting from an empty document`)
  }

  const applied = applyAssignments(loaded.doc, assignments)
  for (const key of applied.skipped) {
    logger.warn(`settings: ${file}: "${key}" is blocked by a non-object value; leaving it alone`)
  }
  if (applied.changed.length === 0) {
    logger.info(`Settings already up to date: ${file}`)
    return { file, status: 'unchanged', changed: [], skipped: applied.skipped }
  }

  if (options.dryRun) {
    logger.log(`[dry-run] write ${file} (${applied.changed.join(', ')})`)
    return { file, status: 'dry-run', changed: applied.changed, skipped: applied.skipped }
  }

  let backup: string | undefined
  try {
    await fs.ensureDir(path.dirname(file))
    if (loaded.exists) {
      backup = createBackupPath(file)
      await fs.copy(file, backup)
      logger.info(`Backed up ${file} to ${backup}`)
    }
  } catch (error) {
    const detail = errorMessage(error)
    logger.warn(`settings: could not back up ${file}; not modifying it: ${detail}`)
    return { file, status: 'failed', changed: [], skipped: applied.skipped, error: detail }
  }

  try {
    const text = serialize(applied.doc, loaded.text, applied.edits)
    const reparsed = parseSettingsText(text)
    if (!reparsed || !jsonEqual(reparsed, applied.doc)) {
      throw new Error('serialized settings do not round-trip')
    }
    await fs.writeFile(file, text, 'utf8')
  } catch (error) {
    const detail = errorMessage(error)
    return rollback(file, backup, applied, detail, logger)
  }

  logger.ok(`Updated ${file} (${applied.changed.join(', ')})`)
  return {
    file,
    status: loaded.exists ? 'updated' : 'created',
    changed: applied.changed,
    skipped: applied.skipped,
    backup
  }
}

async function rollback(
  file: string,
  backup: string | undefined,
  applied: AppliedAssignments,
  detail: string,
  logger: Logger
): Promise<SettingsPatchResult> {
  const base = { file, changed: [], skipped: applied.skipped, backup, error: detail }
  if (!backup) {
    try {
      await fs.remove(file)
    } catch (removeError) {
      logger.err(`settings: could not remove partial ${file}: ${errorMessage(removeError)}`)
    }
    logger.warn(`settings: ${file}: ${detail}`)
    return { ...base, status: 'failed' }
  }
  try {
    await fs.copy(backup, file, { overwrite: true })
    logger.warn(`settings: ${file}: ${detail}; restored ${backup}`)
    return { ...base, status: 'restored' }
  } catch (restoreError) {
    logger.err(`settings: ${file}: ${detail}; restore from ${backup} failed: ${errorMessage(restoreError)}`)
    return { ...base, status: 'failed' }
  }
}
