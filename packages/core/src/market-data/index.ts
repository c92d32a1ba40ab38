export { fromCandle, fromTicker, isUsableSnapshot } from './snapshot-adapter'
