import { Readable } from 'node:stream'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { ConsumerMessagesDispatcher, KAFKA_METRICS, KafkaConsumerInstrumentation } from '../src/index.js'
import {
  collectMetrics,
  createMessage,
  createTelemetryHarness,
  drain,
  histogramPoints,
  type TelemetryHarness,
} from './helpers.js'

describe('KafkaConsumerInstrumentation', () => {
  let harness: TelemetryHarness

  beforeEach(() => {
    harness = createTelemetryHarness()
  })

  afterEach(async () => {
    await harness.shutdown()
  })

  it('wraps a stream and instruments processing with one configuration', async () => {
    const instrumentation = new KafkaConsumerInstrumentation(
      { brokerAddresses: ['localhost:9092'], consumerGroup: 'billing' },
      harness.globals,
    )
    const processor = instrumentation.createProcessInstrumenter()
    const dispatcher = instrumentation.wrapMessages(Readable.from([createMessage(1), createMessage(2)]))

    expect(dispatcher).toBeInstanceOf(ConsumerMessagesDispatcher)
    for await (const message of dispatcher) {
      await processor.process(message, () => undefined)
    }

    const spans = harness.spanExporter.getFinishedSpans()
    expect(spans.map((span) => span.name).sort()).toEqual([
      'orders process',
      'orders process',
      'orders receive',
      'orders receive',
    ])
    expect(spans.every((span) => span.attributes['server.address'] === 'localhost')).toBe(true)
    expect(spans.every((span) => span.attributes['messaging.consumer.group.name'] === 'billing')).toBe(true)
  })

  it('keeps the requested stream options but always uses object mode', () => {
    const instrumentation = new KafkaConsumerInstrumentation({}, harness.globals)

    const dispatcher = instrumentation.wrapMessages(Readable.from([]), { highWaterMark: 8, objectMode: false })

    expect(dispatcher.readableObjectMode).toBe(true)
    expect(dispatcher.readableHighWaterMark).toBe(8)
  })

  it('buffers one message by default', () => {
    const dispatcher = new KafkaConsumerInstrumentation({}, harness.globals).wrapMessages(Readable.from([]))

    expect(dispatcher.readableHighWaterMark).toBe(1)
  })

  it('forwards messages without telemetry when disabled', async () => {
    const instrumentation = new KafkaConsumerInstrumentation({ enabled: false }, harness.globals)
    const messages = [createMessage(1), createMessage(2)]

    const received = await drain(instrumentation.wrapMessages(Readable.from(messages)))
    await instrumentation.createProcessInstrumenter().process(messages[0], () => undefined)

    expect(instrumentation.isEnabled()).toBe(false)
    expect(received).toEqual(messages)
    expect(harness.spanExporter.getFinishedSpans()).toEqual([])
    expect(histogramPoints(await collectMetrics(harness.metricReader), KAFKA_METRICS.RECEIVE_DURATION)).toEqual([])
  })
})
