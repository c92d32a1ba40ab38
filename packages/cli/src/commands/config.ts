import chalk from 'chalk'
import { table } from 'table'
import { DEFAULT_GRID_SETTINGS, toGridSettings } from '@gridline/core'
import { loadGridConfig } from '../config-loader'
import { formatError } from '../format'

interface ConfigOptions {
  verbose?: boolean
}

/**
 * Print the default settings as JSON, ready to save and edit
 */
export function runConfigDefaults(): void {
  console.log(JSON.stringify(DEFAULT_GRID_SETTINGS, null, 2))
}

/**
 * Validate a settings file and print the effective settings
 */
export async function runConfigValidate(file: string, options: ConfigOptions): Promise<void> {
  try {
    const config = await loadGridConfig(file)
    const rows = Object.entries(toGridSettings(config)).map(([key, value]) => [key, String(value)])

    console.log(chalk.green(`✓ ${file} is a valid grid configuration\n`))
    console.log(table([['Setting', 'Value'], ...rows]))
  } catch (error) {
    console.error(chalk.red('✗'), formatError(error, options.verbose))
    process.exitCode = 1
  }
}
