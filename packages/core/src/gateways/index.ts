export { BacktestGateway } from './backtest-gateway'
export type { BacktestGatewayConfig } from './backtest-gateway'
export { LiveGateway } from './live-gateway'
export type { ExchangeClient, LiveGatewayConfig, PlaceOrderRequest } from './live-gateway'
export { ReportQueue } from './order-gateway'
export type { GatewayReport, OrderGateway } from './order-gateway'
