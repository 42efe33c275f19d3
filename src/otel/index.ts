// Main OTEL module entry point
export type {
  BrokerEndpoint,
  GlobalProviders,
  KafkaOtelConfig,
  KafkaOtelInstrumentationConfig,
  MessageHookFn,
  TopicFilter,
  TopicFilterFn,
} from './types.js'

export { DEFAULT_OTEL_CONFIG } from './types.js'

export { getGlobalProviders, KafkaOtelConfigBuilder, parseBrokerAddresses, resolveConfig } from './config.js'

export { KafkaConsumerInstrumentation } from './instrumentation.js'

export { MessageProcessInstrumenter, MessageProcessOperation } from './process-operation.js'

export {
  KAFKA_DEFAULTS,
  KAFKA_METRICS,
  KAFKA_OPERATION_TYPES,
  KAFKA_SEMANTIC_CONVENTIONS,
  KAFKA_SPAN_NAMES,
  PACKAGE_INFO,
} from './constants.js'

export type { KafkaOperationType } from './constants.js'

export {
  consumerMessageHeaderGetter,
  extractTraceContext,
  linksFromContext,
  shouldIgnoreTopic,
} from './utils.js'
