export * from './types/dates'
export * from './types/market-data'
export * from './types/orders'
export * from './types/config'
