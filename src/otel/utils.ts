import {
  type Attributes,
  type Context,
  type Counter,
  createNoopMeter,
  diag,
  type Histogram,
  INVALID_SPAN_CONTEXT,
  isSpanContextValid,
  type Link,
  type Meter,
  ROOT_CONTEXT,
  type Span,
  type SpanOptions,
  SpanStatusCode,
  type TextMapGetter,
  type TextMapPropagator,
  trace,
  type Tracer,
} from '@opentelemetry/api'
import type { ConsumerMessage, MessageHeaders } from '../message.js'
import { KAFKA_DEFAULTS, KAFKA_METRICS, KAFKA_SEMANTIC_CONVENTIONS, type KafkaOperationType } from './constants.js'
import type { KafkaOtelConfig, MessageHookFn, TopicFilter } from './types.js'

const NOOP_METER = createNoopMeter()

// Read trace context out of Kafka headers, Buffer values are decoded as UTF-8
export const consumerMessageHeaderGetter: TextMapGetter<MessageHeaders> = {
  get: (carrier, key) => {
    const value = carrier[key]
    const singleValue = Array.isArray(value) ? value[0] : value

    if (Buffer.isBuffer(singleValue)) {
      return singleValue.toString('utf8')
    }

    return singleValue
  },
  keys: (carrier) => Object.keys(carrier),
}

/**
 * Extracts the producer's trace context from the message headers.
 * Missing or malformed headers yield the root context.
 */
export function extractTraceContext(propagator: TextMapPropagator, message: ConsumerMessage): Context {
  try {
    return propagator.extract(ROOT_CONTEXT, message.headers ?? {}, consumerMessageHeaderGetter)
  } catch (error) {
    diag.warn(`Failed to extract trace context from ${message.topic} message:`, error)
    return ROOT_CONTEXT
  }
}

// Link to the span carried by ctx, if there is a valid one
export function linksFromContext(ctx: Context): Link[] {
  const spanContext = trace.getSpanContext(ctx)
  if (!spanContext || !isSpanContextValid(spanContext)) {
    return []
  }

  return [{ context: spanContext }]
}

// Check if topic should be ignored based on filter configuration
export function shouldIgnoreTopic(topic: string, ignoreTopics?: TopicFilter): boolean {
  if (!ignoreTopics) {
    return false
  }

  if (typeof ignoreTopics !== 'function') {
    return ignoreTopics.includes(topic)
  }

  try {
    return ignoreTopics(topic)
  } catch (error) {
    // If filter function throws, don't ignore the topic
    diag.warn('Topic filter failed:', error)
    return false
  }
}

/**
 * Attributes shared by every span and measurement of one operation kind.
 * The returned object is frozen; extend it with {@link getDestinationAttributes}.
 */
export function createDefaultAttributes(config: KafkaOtelConfig, operation: KafkaOperationType): Readonly<Attributes> {
  const attributes: Attributes = {
    [KAFKA_SEMANTIC_CONVENTIONS.MESSAGING_SYSTEM]: KAFKA_DEFAULTS.MESSAGING_SYSTEM,
    [KAFKA_SEMANTIC_CONVENTIONS.MESSAGING_OPERATION_NAME]: operation,
  }

  if (config.serverAddress) {
    attributes[KAFKA_SEMANTIC_CONVENTIONS.SERVER_ADDRESS] = config.serverAddress
  }
  if (config.serverPort) {
    attributes[KAFKA_SEMANTIC_CONVENTIONS.SERVER_PORT] = config.serverPort
  }
  if (config.consumerGroup) {
    attributes[KAFKA_SEMANTIC_CONVENTIONS.MESSAGING_CONSUMER_GROUP_NAME] = config.consumerGroup
  }

  return Object.freeze(attributes)
}

// Copy of the defaults plus topic and partition. The offset is left out to keep metric cardinality bounded.
export function getDestinationAttributes(
  defaults: Readonly<Attributes>,
  topic: string,
  partition: number | string,
): Attributes {
  return {
    ...defaults,
    [KAFKA_SEMANTIC_CONVENTIONS.MESSAGING_DESTINATION_NAME]: topic,
    [KAFKA_SEMANTIC_CONVENTIONS.MESSAGING_DESTINATION_PARTITION_ID]: String(partition),
  }
}

export function getMessageSpanAttributes(defaults: Readonly<Attributes>, message: ConsumerMessage): Attributes {
  return {
    ...getDestinationAttributes(defaults, message.topic, message.partition),
    [KAFKA_SEMANTIC_CONVENTIONS.MESSAGING_MESSAGE_ID]: String(message.offset),
  }
}

export function createNonRecordingSpan(): Span {
  return trace.wrapSpanContext(INVALID_SPAN_CONTEXT)
}

/**
 * Starts a span from the root context so it is linked to, not parented by, the producer.
 */
export function startLinkedSpan(tracer: Tracer, name: string, options: SpanOptions): Span {
  try {
    return tracer.startSpan(name, options, ROOT_CONTEXT)
  } catch (error) {
    diag.warn(`Failed to start span ${name}:`, error)
    return createNonRecordingSpan()
  }
}

export function createDurationHistogram(meter: Meter, name: string): Histogram {
  try {
    return meter.createHistogram(name, { unit: KAFKA_METRICS.DURATION_UNIT })
  } catch (error) {
    diag.warn(`Failed to create histogram ${name}, measurements are dropped:`, error)
    return NOOP_METER.createHistogram(name)
  }
}

export function createMessageCounter(meter: Meter, name: string): Counter {
  try {
    return meter.createCounter(name)
  } catch (error) {
    diag.warn(`Failed to create counter ${name}, measurements are dropped:`, error)
    return NOOP_METER.createCounter(name)
  }
}

export function runMessageHook(hook: MessageHookFn | undefined, span: Span, message: ConsumerMessage): void {
  if (!hook) {
    return
  }

  try {
    hook(span, message)
  } catch (error) {
    diag.warn('Message hook failed:', error)
  }
}

// Text stored in `error.type`: the message of an Error, the string form of anything else
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

// Set span status based on error
export function setSpanError(span: Span, error: unknown): void {
  const description = describeError(error)
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: description,
  })
  span.recordException(error instanceof Error ? error : description)
}

export function elapsedSeconds(start: number): number {
  return (performance.now() - start) / 1000
}
