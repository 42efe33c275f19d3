// OpenTelemetry semantic conventions for Kafka consumers
export const KAFKA_SEMANTIC_CONVENTIONS = {
  // Messaging system attributes (https://opentelemetry.io/docs/specs/semconv/messaging/messaging-spans/)
  MESSAGING_SYSTEM: 'messaging.system',
  MESSAGING_DESTINATION_NAME: 'messaging.destination.name',
  MESSAGING_DESTINATION_PARTITION_ID: 'messaging.destination.partition.id',
  MESSAGING_OPERATION_NAME: 'messaging.operation.name',
  MESSAGING_MESSAGE_ID: 'messaging.message.id',

  // Consumer-specific attributes
  MESSAGING_CONSUMER_GROUP_NAME: 'messaging.consumer.group.name',

  // Connection attributes
  SERVER_ADDRESS: 'server.address',
  SERVER_PORT: 'server.port',

  ERROR_TYPE: 'error.type',
} as const

// Operation types
export const KAFKA_OPERATION_TYPES = {
  RECEIVE: 'receive',
  PROCESS: 'process',
} as const

export type KafkaOperationType = typeof KAFKA_OPERATION_TYPES[keyof typeof KAFKA_OPERATION_TYPES]

// Span names
export const KAFKA_SPAN_NAMES = {
  CONSUMER_RECEIVE: (topic: string) => `${topic} receive`,
  CONSUMER_PROCESS: (topic: string) => `${topic} process`,
} as const

// Metric instruments, names are fixed for dashboard compatibility
export const KAFKA_METRICS = {
  RECEIVE_DURATION: 'messaging.client.operation.duration',
  CONSUMED_MESSAGES: 'messaging.client.consumed.messages',
  PROCESS_DURATION: 'messaging.client.process.duration',
  DURATION_UNIT: 's',
} as const

// Default values
export const KAFKA_DEFAULTS = {
  MESSAGING_SYSTEM: 'kafka',
  BROKER_ADDRESS_SEPARATOR: ';',
  STREAM_HIGH_WATER_MARK: 1,
} as const

// Package information
export const PACKAGE_INFO = {
  NAME: 'kafka-consumer-otel',
  VERSION: '0.1.0', // Should match package.json
} as const
