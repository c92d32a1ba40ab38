import type { GridConfig } from '@gridline/shared'
import { toStockSymbol } from '@gridline/shared'
import { z } from 'zod/v4'

/**
 * Settings a grid starts from when a key is left out.
 * Keys follow the external settings surface (snake_case).
 */
export const DEFAULT_GRID_SETTINGS = {
  vt_symbol: 'BTCUSDT.BINANCE',
  lower_price: 40000,
  upper_price: 60000,
  trigger_price: 47000,
  rise_percent: 1,
  fall_down: 0,
  fall_percent: 1,
  rise_up: 0,
  order_type: 'limit',
  order_volume: 0.1,
  order_amount: 0,
  max_position: 0,
  min_position: 0,
  multiple_order: true,
  deadline: 'gtc',
  give_up_bias: 0,
  buy_offset: 0,
  sell_offset: 0
} as const

const NEGATIVE = 'must not be negative'

const nonNegative = (fallback: number) => z.number().min(0, NEGATIVE).default(fallback)

/**
 * Schema for grid settings
 * @property {string} vt_symbol - Instrument traded by the grid
 * @property {number} lower_price - Corridor floor
 * @property {number} upper_price - Corridor ceiling
 * @property {number} trigger_price - Initial reference price, inside the corridor
 * @property {string} order_type - LIMIT or MARKET (case-insensitive)
 *
 * @example
 * {
 *   vt_symbol: 'BTCUSDT.BINANCE',
 *   lower_price: 40000,
 *   upper_price: 60000,
 *   trigger_price: 47000,
 *   rise_percent: 1,
 *   fall_percent: 1,
 *   order_type: 'MARKET'
 * }
 */
export const gridSettingsSchema = z
  .object({
    vt_symbol: z.string().trim().min(1).default(DEFAULT_GRID_SETTINGS.vt_symbol),
    lower_price: nonNegative(DEFAULT_GRID_SETTINGS.lower_price),
    upper_price: z.number().positive().default(DEFAULT_GRID_SETTINGS.upper_price),
    trigger_price: nonNegative(DEFAULT_GRID_SETTINGS.trigger_price),
    rise_percent: nonNegative(DEFAULT_GRID_SETTINGS.rise_percent),
    fall_down: nonNegative(DEFAULT_GRID_SETTINGS.fall_down),
    fall_percent: nonNegative(DEFAULT_GRID_SETTINGS.fall_percent),
    rise_up: nonNegative(DEFAULT_GRID_SETTINGS.rise_up),
    order_type: z
      .preprocess(
        (value) => (typeof value === 'string' ? value.toLowerCase() : value),
        z.enum(['limit', 'market'])
      )
      .default(DEFAULT_GRID_SETTINGS.order_type),
    order_volume: nonNegative(DEFAULT_GRID_SETTINGS.order_volume),
    order_amount: nonNegative(DEFAULT_GRID_SETTINGS.order_amount),
    max_position: nonNegative(DEFAULT_GRID_SETTINGS.max_position),
    min_position: nonNegative(DEFAULT_GRID_SETTINGS.min_position),
    multiple_order: z.boolean().default(DEFAULT_GRID_SETTINGS.multiple_order),
    deadline: z.enum(['5d', '20d', '60d', 'gtc']).default(DEFAULT_GRID_SETTINGS.deadline),
    give_up_bias: nonNegative(DEFAULT_GRID_SETTINGS.give_up_bias),
    buy_offset: z.number().default(DEFAULT_GRID_SETTINGS.buy_offset),
    sell_offset: z.number().default(DEFAULT_GRID_SETTINGS.sell_offset)
  })
  .strict()
  .superRefine((settings, ctx) => {
    if (settings.lower_price > settings.upper_price) {
      ctx.addIssue({
        code: 'custom',
        path: ['lower_price'],
        message: 'must not exceed upper_price'
      })
    }
    if (settings.trigger_price < settings.lower_price || settings.trigger_price > settings.upper_price) {
      ctx.addIssue({
        code: 'custom',
        path: ['trigger_price'],
        message: 'must lie within [lower_price, upper_price]'
      })
    }
    if (
      settings.min_position > 0 &&
      settings.max_position > 0 &&
      settings.min_position > settings.max_position
    ) {
      ctx.addIssue({
        code: 'custom',
        path: ['min_position'],
        message: 'must not exceed max_position'
      })
    }
    if (settings.order_volume === 0 && settings.order_amount === 0) {
      ctx.addIssue({
        code: 'custom',
        path: ['order_volume'],
        message: 'order_volume or order_amount must be positive'
      })
    }
  })

/** Settings as accepted from a file or caller, before defaults */
export type GridSettingsInput = z.input<typeof gridSettingsSchema>

/** Settings after defaults and validation */
export type GridSettings = z.output<typeof gridSettingsSchema>

/**
 * Error thrown when grid settings fail validation
 */
export class GridConfigError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid grid configuration: ${issues.join('; ')}`)
    this.name = 'GridConfigError'
  }
}

function toGridConfig(settings: GridSettings): GridConfig {
  return {
    symbol: toStockSymbol(settings.vt_symbol),
    lowerPrice: settings.lower_price,
    upperPrice: settings.upper_price,
    triggerPrice: settings.trigger_price,
    risePercent: settings.rise_percent,
    fallDown: settings.fall_down,
    fallPercent: settings.fall_percent,
    riseUp: settings.rise_up,
    orderType: settings.order_type,
    orderVolume: settings.order_volume,
    orderAmount: settings.order_amount,
    maxPosition: settings.max_position,
    minPosition: settings.min_position,
    multipleOrder: settings.multiple_order,
    deadline: settings.deadline,
    giveUpBias: settings.give_up_bias,
    buyOffset: settings.buy_offset,
    sellOffset: settings.sell_offset
  }
}

/**
 * Validate raw settings and build an immutable grid configuration.
 * Never clamps: every violation is reported.
 * @throws GridConfigError listing each failing key
 */
export function parseGridConfig(settings: unknown): GridConfig {
  const result = gridSettingsSchema.safeParse(settings ?? {})
  if (!result.success) {
    throw new GridConfigError(
      result.error.issues.map((issue) => {
        const key = issue.path.map(String).join('.')
        return key ? `${key}: ${issue.message}` : issue.message
      })
    )
  }
  return Object.freeze(toGridConfig(result.data))
}

/**
 * Convert a configuration back to the external settings surface
 */
export function toGridSettings(config: GridConfig): GridSettings {
  return {
    vt_symbol: config.symbol,
    lower_price: config.lowerPrice,
    upper_price: config.upperPrice,
    trigger_price: config.triggerPrice,
    rise_percent: config.risePercent,
    fall_down: config.fallDown,
    fall_percent: config.fallPercent,
    rise_up: config.riseUp,
    order_type: config.orderType,
    order_volume: config.orderVolume,
    order_amount: config.orderAmount,
    max_position: config.maxPosition,
    min_position: config.minPosition,
    multiple_order: config.multipleOrder,
    deadline: config.deadline,
    give_up_bias: config.giveUpBias,
    buy_offset: config.buyOffset,
    sell_offset: config.sellOffset
  }
}
