export { GridStrategy } from './grid-strategy'
export type { GridStrategyOptions } from './grid-strategy'
