import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { isAbsolute, resolve } from 'node:path'
import { parseGridConfig, type GridConfig } from '@gridline/core'

/**
 * Error thrown when a settings file cannot be read or parsed
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message)
    this.name = 'ConfigLoadError'
  }
}

const WHOLE_REFERENCE = /^\$\{([^}]+)\}$|^\$([A-Z_][A-Z0-9_]*)$/i

/**
 * Expands environment variables in a string
 * Supports ${VAR_NAME} and $VAR_NAME syntax
 */
function expandEnvironmentVariables(str: string): string {
  return str
    .replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      return process.env[varName] ?? ''
    })
    .replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
      return process.env[varName] ?? ''
    })
}

/**
 * A value that is nothing but a variable reference takes the type its
 * expansion reads as, so "${GRID_TRIGGER}" can feed a numeric setting.
 */
function coerceReference(expanded: string): unknown {
  const trimmed = expanded.trim()
  if (trimmed === 'true' || trimmed === 'false') {
    return trimmed === 'true'
  }
  const numeric = Number(trimmed)
  return trimmed !== '' && Number.isFinite(numeric) ? numeric : expanded
}

/**
 * Recursively expands environment variables in an object
 */
export function expandObjectEnvironmentVariables(obj: unknown): unknown {
  if (typeof obj === 'string') {
    const expanded = expandEnvironmentVariables(obj)
    return WHOLE_REFERENCE.test(obj) ? coerceReference(expanded) : expanded
  }

  if (Array.isArray(obj)) {
    return obj.map(expandObjectEnvironmentVariables)
  }

  if (obj && typeof obj === 'object') {
    const expanded: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(obj)) {
      expanded[key] = expandObjectEnvironmentVariables(value)
    }
    return expanded
  }

  return obj
}

/**
 * Loads the raw grid settings from a JSON file
 * @param settingsPath Path to the settings file (absolute or relative)
 * @throws ConfigLoadError if the file cannot be read or is not a JSON object
 */
export async function loadGridSettings(settingsPath: string): Promise<Record<string, unknown>> {
  const resolvedPath = isAbsolute(settingsPath)
    ? settingsPath
    : resolve(process.cwd(), settingsPath)

  if (!existsSync(resolvedPath)) {
    throw new ConfigLoadError(`Settings file not found: ${resolvedPath}`, resolvedPath)
  }

  let rawContent: string
  try {
    rawContent = await readFile(resolvedPath, 'utf-8')
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to read settings file: ${error instanceof Error ? error.message : 'Unknown error'}`,
      resolvedPath,
      error instanceof Error ? error : undefined
    )
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(rawContent)
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to parse JSON settings: ${error instanceof Error ? error.message : 'Invalid JSON'}`,
      resolvedPath,
      error instanceof Error ? error : undefined
    )
  }

  const expanded = expandObjectEnvironmentVariables(parsed)
  if (!isRecord(expanded)) {
    throw new ConfigLoadError('Settings must be a JSON object', resolvedPath)
  }
  return expanded
}

/**
 * Loads and validates a grid configuration
 * @throws ConfigLoadError if the file cannot be loaded
 * @throws GridConfigError if the settings are invalid
 */
export async function loadGridConfig(settingsPath: string): Promise<GridConfig> {
  return parseGridConfig(await loadGridSettings(settingsPath))
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
