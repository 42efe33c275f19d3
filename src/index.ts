export type { ConsumerMessage, MessageHeaders, MessageHeaderValue, MessageReceiver, MessageSource } from './message.js'

export { ConsumerMessagesDispatcher } from './streams/consumer-messages-dispatcher.js'
export type { ConsumerMessagesDispatcherOptions } from './streams/consumer-messages-dispatcher.js'
export { receiveMessages, toMessageIterator } from './streams/message-source.js'

// OpenTelemetry exports
export type {
  BrokerEndpoint,
  GlobalProviders,
  KafkaOperationType,
  KafkaOtelConfig,
  KafkaOtelInstrumentationConfig,
  MessageHookFn,
  TopicFilter,
  TopicFilterFn,
} from './otel/index.js'

export {
  consumerMessageHeaderGetter,
  DEFAULT_OTEL_CONFIG,
  extractTraceContext,
  getGlobalProviders,
  KafkaConsumerInstrumentation,
  KafkaOtelConfigBuilder,
  linksFromContext,
  MessageProcessInstrumenter,
  MessageProcessOperation,
  parseBrokerAddresses,
  resolveConfig,
  shouldIgnoreTopic,
} from './otel/index.js'

export { KAFKA_METRICS, KAFKA_OPERATION_TYPES, KAFKA_SEMANTIC_CONVENTIONS, KAFKA_SPAN_NAMES, PACKAGE_INFO } from './otel/index.js'

export { fromEachMessagePayload, instrumentEachMessage } from './adapters/kafkajs.js'
