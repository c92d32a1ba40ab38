// Event and logging contracts
export type {
  EventData,
  EventHandler,
  EventPublisher,
  EventSubscription,
  Logger
} from './events'
