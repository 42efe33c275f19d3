import type { Meter, MeterProvider, Span, TextMapPropagator, Tracer, TracerProvider } from '@opentelemetry/api'
import type { InstrumentationConfig } from '@opentelemetry/instrumentation'
import type { ConsumerMessage } from '../message.js'

// Hook function signatures
export type MessageHookFn = (span: Span, message: ConsumerMessage) => void
export type TopicFilterFn = (topic: string) => boolean
export type TopicFilter = readonly string[] | TopicFilterFn

// Configuration interface for Kafka consumer OTEL instrumentation
export interface KafkaOtelInstrumentationConfig extends InstrumentationConfig {
  // Tracer provider used instead of the global one
  tracerProvider?: TracerProvider

  // Meter provider used instead of the global one
  meterProvider?: MeterProvider

  // Codec reading trace context from message headers
  propagator?: TextMapPropagator

  // Bootstrap brokers, `host[:port]` each
  brokerAddresses?: string[]

  // Consumer group the wrapped consumer belongs to
  consumerGroup?: string

  // Topics whose messages are forwarded without telemetry
  ignoreTopics?: TopicFilter

  // Custom hook called for each receive/process span
  messageHook?: MessageHookFn
}

// Process-wide providers captured at resolution time
export interface GlobalProviders {
  tracerProvider: TracerProvider
  meterProvider: MeterProvider
  propagator: TextMapPropagator
}

// Resolved, read-only configuration shared by dispatchers and instrumenters
export interface KafkaOtelConfig {
  readonly enabled: boolean
  readonly tracer: Tracer
  readonly meter: Meter
  readonly propagator: TextMapPropagator
  readonly serverAddress?: string
  readonly serverPort?: number
  readonly consumerGroup?: string
  readonly ignoreTopics?: TopicFilter
  readonly messageHook?: MessageHookFn
}

export interface BrokerEndpoint {
  serverAddress: string
  serverPort?: number
}

// Configuration defaults
export const DEFAULT_OTEL_CONFIG: Required<Pick<KafkaOtelInstrumentationConfig, 'enabled'>> = {
  enabled: true,
} as const
