import { type Attributes, type Counter, diag, type Histogram, type Span } from '@opentelemetry/api'
import { Readable, type ReadableOptions } from 'node:stream'

import type { ConsumerMessage, MessageSource } from '../message.js'
import { KAFKA_DEFAULTS, KAFKA_METRICS, KAFKA_OPERATION_TYPES, KAFKA_SPAN_NAMES } from '../otel/constants.js'
import type { KafkaOtelConfig } from '../otel/types.js'
import {
  createDefaultAttributes,
  createDurationHistogram,
  createMessageCounter,
  elapsedSeconds,
  extractTraceContext,
  getDestinationAttributes,
  getMessageSpanAttributes,
  linksFromContext,
  runMessageHook,
  shouldIgnoreTopic,
  startLinkedSpan,
} from '../otel/utils.js'
import { toMessageIterator } from './message-source.js'

export interface ConsumerMessagesDispatcherOptions<T extends ConsumerMessage> extends ReadableOptions {
  source: MessageSource<T>
  config: KafkaOtelConfig
}

// Receive telemetry of the last pushed message, finished once downstream has taken it
interface PendingReceive {
  span: Span
  start: number
  attributes: Attributes
}

/**
 * Object-mode stream re-emitting every message of `source`, in order, with a
 * `"<topic> receive"` span and receive metrics per message.
 * @extends Readable
 */
export class ConsumerMessagesDispatcher<T extends ConsumerMessage = ConsumerMessage> extends Readable {
  private readonly messages: AsyncIterator<T>
  private readonly config: KafkaOtelConfig
  private readonly receiveDuration: Histogram
  private readonly consumedMessages: Counter
  private readonly defaultAttributes: Readonly<Attributes>
  private pending: PendingReceive | undefined

  /**
   * Creates a ConsumerMessagesDispatcher instance
   */
  constructor(dispatcherOptions: ConsumerMessagesDispatcherOptions<T>) {
    const { source, config, ...opts } = dispatcherOptions

    // One buffered message: upstream is read only as fast as downstream drains
    super({ highWaterMark: KAFKA_DEFAULTS.STREAM_HIGH_WATER_MARK, ...opts, objectMode: true })

    if (!source) {
      throw new Error('A valid message source is required.')
    }

    this.messages = toMessageIterator(source)
    this.config = config
    this.receiveDuration = createDurationHistogram(config.meter, KAFKA_METRICS.RECEIVE_DURATION)
    this.consumedMessages = createMessageCounter(config.meter, KAFKA_METRICS.CONSUMED_MESSAGES)
    this.defaultAttributes = createDefaultAttributes(config, KAFKA_OPERATION_TYPES.RECEIVE)
  }

  /**
   * Internal method called by the Readable stream to fetch the next upstream message
   * @private
   */
  async _read() {
    // With one buffered message, Node only asks for more after the previous one was taken
    this.finishPending()

    try {
      const result = await this.messages.next()
      if (this.destroyed) {
        return
      }

      if (result.done) {
        this.push(null) // Upstream closed, end of stream
        return
      }

      this.dispatch(result.value)
    } catch (error) {
      if (error instanceof Error) {
        this.destroy(error)
      } else {
        this.destroy(new Error(`Unknown error: ${String(error)}`))
      }
    }
  }

  /**
   * Releases the upstream source when the stream is destroyed
   * @private
   */
  _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    this.finishPending()

    if (typeof this.messages.return === 'function') {
      this.messages
        .return()
        .catch((returnError: unknown) => {
          diag.warn('Failed to release message source:', returnError)
        })
    }
    callback(error)
  }

  private dispatch(message: T): void {
    const start = performance.now()

    if (shouldIgnoreTopic(message.topic, this.config.ignoreTopics)) {
      this.push(message)
      return
    }

    const parentContext = extractTraceContext(this.config.propagator, message)
    const span = startLinkedSpan(this.config.tracer, KAFKA_SPAN_NAMES.CONSUMER_RECEIVE(message.topic), {
      attributes: getMessageSpanAttributes(this.defaultAttributes, message),
      links: linksFromContext(parentContext),
    })
    runMessageHook(this.config.messageHook, span, message)

    this.pending = {
      span,
      start,
      attributes: getDestinationAttributes(this.defaultAttributes, message.topic, message.partition),
    }
    this.push(message)
  }

  private finishPending(): void {
    const pending = this.pending
    if (!pending) {
      return
    }
    this.pending = undefined

    pending.span.end()
    try {
      this.receiveDuration.record(elapsedSeconds(pending.start), pending.attributes)
      this.consumedMessages.add(1, pending.attributes)
    } catch (error) {
      diag.warn('Failed to record receive metrics:', error)
    }
  }
}
