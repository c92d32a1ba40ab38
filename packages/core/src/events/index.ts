/**
 * Event system exports
 */

// Core event bus
export { EventBus, registerStandardEvents } from './event-bus'

// Time source
export { RealTimeSource, SimulatedTimeSource } from './time-source'
export type { TimeSource } from './time-source'

// Types
export * from './types'
