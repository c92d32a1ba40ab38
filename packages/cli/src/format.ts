import { GridConfigError } from '@gridline/core'
import { ConfigLoadError } from './config-loader'

/**
 * Render an error for the terminal. Config errors list one issue per line.
 */
export function formatError(error: unknown, verbose = false): string {
  if (error instanceof GridConfigError) {
    return ['Invalid grid configuration', ...error.issues.map((issue) => `  - ${issue}`)].join('\n')
  }
  if (error instanceof ConfigLoadError) {
    return error.cause && verbose ? `${error.message}\n${error.cause.stack ?? ''}` : error.message
  }
  if (error instanceof Error) {
    return verbose && error.stack ? error.stack : error.message
  }
  return String(error)
}
