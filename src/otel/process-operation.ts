import { type Attributes, diag, type Histogram, type Span, SpanKind } from '@opentelemetry/api'

import type { ConsumerMessage } from '../message.js'
import { KAFKA_METRICS, KAFKA_OPERATION_TYPES, KAFKA_SEMANTIC_CONVENTIONS, KAFKA_SPAN_NAMES } from './constants.js'
import type { KafkaOtelConfig } from './types.js'
import {
  createDefaultAttributes,
  createDurationHistogram,
  createNonRecordingSpan,
  describeError,
  elapsedSeconds,
  extractTraceContext,
  getDestinationAttributes,
  getMessageSpanAttributes,
  linksFromContext,
  runMessageHook,
  setSpanError,
  shouldIgnoreTopic,
  startLinkedSpan,
} from './utils.js'

interface ProcessOperationInit {
  span: Span
  topic: string
  partition: string
  defaultAttributes: Readonly<Attributes>
  processDuration: Histogram | null
}

/**
 * Brackets the processing of one message. Call {@link MessageProcessOperation.stop} exactly once;
 * a second call records the duration again.
 */
export class MessageProcessOperation {
  private error: unknown = undefined
  private readonly start = performance.now()

  constructor(private readonly init: ProcessOperationInit) {}

  get span(): Span {
    return this.init.span
  }

  /**
   * Marks the operation as failed. Later calls overwrite, `undefined` clears.
   */
  setError(error: unknown): void {
    this.error = error
  }

  stop(): void {
    const { span, topic, partition, defaultAttributes, processDuration } = this.init
    const hasError = this.error !== undefined && this.error !== null

    if (hasError) {
      span.setAttribute(KAFKA_SEMANTIC_CONVENTIONS.ERROR_TYPE, describeError(this.error))
      setSpanError(span, this.error)
    }
    span.end()

    if (!processDuration) {
      return
    }

    const attributes = getDestinationAttributes(defaultAttributes, topic, partition)
    if (hasError) {
      attributes[KAFKA_SEMANTIC_CONVENTIONS.ERROR_TYPE] = describeError(this.error)
    }

    try {
      processDuration.record(elapsedSeconds(this.start), attributes)
    } catch (error) {
      diag.warn('Failed to record process duration:', error)
    }
  }
}

/**
 * Opens a `"<topic> process"` span per message and records `messaging.client.process.duration` when it stops.
 */
export class MessageProcessInstrumenter {
  private readonly processDuration: Histogram
  private readonly defaultAttributes: Readonly<Attributes>

  constructor(private readonly config: KafkaOtelConfig) {
    this.processDuration = createDurationHistogram(config.meter, KAFKA_METRICS.PROCESS_DURATION)
    this.defaultAttributes = createDefaultAttributes(config, KAFKA_OPERATION_TYPES.PROCESS)
  }

  open(message: ConsumerMessage): MessageProcessOperation {
    const partition = String(message.partition)

    if (shouldIgnoreTopic(message.topic, this.config.ignoreTopics)) {
      return new MessageProcessOperation({
        span: createNonRecordingSpan(),
        topic: message.topic,
        partition,
        defaultAttributes: this.defaultAttributes,
        processDuration: null,
      })
    }

    const parentContext = extractTraceContext(this.config.propagator, message)
    const span = startLinkedSpan(this.config.tracer, KAFKA_SPAN_NAMES.CONSUMER_PROCESS(message.topic), {
      kind: SpanKind.CONSUMER,
      attributes: getMessageSpanAttributes(this.defaultAttributes, message),
      links: linksFromContext(parentContext),
    })
    runMessageHook(this.config.messageHook, span, message)

    return new MessageProcessOperation({
      span,
      topic: message.topic,
      partition,
      defaultAttributes: this.defaultAttributes,
      processDuration: this.processDuration,
    })
  }

  /**
   * Runs `handler` inside a process operation. A thrown error is recorded on the operation and rethrown.
   */
  async process<T>(
    message: ConsumerMessage,
    handler: (operation: MessageProcessOperation) => T | Promise<T>,
  ): Promise<T> {
    const operation = this.open(message)
    try {
      return await handler(operation)
    } catch (error) {
      operation.setError(error)
      throw error
    } finally {
      operation.stop()
    }
  }
}
