import { createNoopMeter, propagation, ProxyTracerProvider, type TextMapPropagator } from '@opentelemetry/api'
import { W3CTraceContextPropagator } from '@opentelemetry/core'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import {
  getGlobalProviders,
  KafkaOtelConfigBuilder,
  PACKAGE_INFO,
  parseBrokerAddresses,
  resolveConfig,
} from '../src/index.js'
import { createTelemetryHarness, type TelemetryHarness } from './helpers.js'

describe('parseBrokerAddresses', () => {
  it('splits a single host:port address', () => {
    expect(parseBrokerAddresses(['localhost:9092'])).toEqual({ serverAddress: 'localhost', serverPort: 9092 })
  })

  it('keeps the host when no port is given', () => {
    expect(parseBrokerAddresses(['kafka.internal'])).toEqual({ serverAddress: 'kafka.internal' })
  })

  it('leaves the port unset when it is not an integer', () => {
    expect(parseBrokerAddresses(['kafka.internal:plaintext'])).toEqual({ serverAddress: 'kafka.internal' })
    expect(parseBrokerAddresses(['kafka.internal:90a2'])).toEqual({ serverAddress: 'kafka.internal' })
  })

  it('leaves the port unset when it does not fit a safe integer', () => {
    expect(parseBrokerAddresses(['kafka.internal:99999999999999999999'])).toEqual({ serverAddress: 'kafka.internal' })
  })

  it('joins several brokers without parsing ports', () => {
    expect(parseBrokerAddresses(['a:9092', 'b:9093'])).toEqual({ serverAddress: 'a:9092;b:9093' })
  })
})

describe('KafkaOtelConfigBuilder', () => {
  let harness: TelemetryHarness

  beforeEach(() => {
    harness = createTelemetryHarness()
  })

  afterEach(async () => {
    await harness.shutdown()
  })

  it('resolves server address and port from a single broker', () => {
    const config = resolveConfig({ brokerAddresses: ['localhost:9092'] }, harness.globals)

    expect(config.serverAddress).toBe('localhost')
    expect(config.serverPort).toBe(9092)
  })

  it('resolves a joined server address and no port for several brokers', () => {
    const config = resolveConfig({ brokerAddresses: ['a:9092', 'b:9093'] }, harness.globals)

    expect(config.serverAddress).toBe('a:9092;b:9093')
    expect(config.serverPort).toBeUndefined()
  })

  it('replaces list settings instead of merging them', () => {
    const config = new KafkaOtelConfigBuilder()
      .withBrokerAddresses(['localhost:9092'])
      .withBrokerAddresses(['a:9092', 'b:9093'])
      .build(harness.globals)

    expect(config.serverAddress).toBe('a:9092;b:9093')
    expect(config.serverPort).toBeUndefined()
  })

  it('lets later settings override earlier ones', () => {
    const config = new KafkaOtelConfigBuilder()
      .apply({ consumerGroup: 'billing', brokerAddresses: ['localhost:9092'] })
      .withConsumerGroup('shipping')
      .apply({ brokerAddresses: undefined })
      .build(harness.globals)

    expect(config.consumerGroup).toBe('shipping')
    expect(config.serverAddress).toBe('localhost')
  })

  it('gets tracer and meter from the configured providers with the package identity', () => {
    const tracerProvider = new ProxyTracerProvider()
    const getTracer = vi.spyOn(tracerProvider, 'getTracer')
    const meterProvider = { getMeter: vi.fn(() => createNoopMeter()) }

    new KafkaOtelConfigBuilder()
      .withTracerProvider(tracerProvider)
      .withTracerProvider(undefined)
      .withMeterProvider(meterProvider)
      .build(harness.globals)

    expect(getTracer).toHaveBeenCalledWith(PACKAGE_INFO.NAME, PACKAGE_INFO.VERSION)
    expect(meterProvider.getMeter).toHaveBeenCalledWith(PACKAGE_INFO.NAME, PACKAGE_INFO.VERSION)
  })

  it('falls back to the given global providers', () => {
    const getTracer = vi.spyOn(harness.globals.tracerProvider, 'getTracer')
    const getMeter = vi.spyOn(harness.globals.meterProvider, 'getMeter')

    const config = resolveConfig({}, harness.globals)

    expect(getTracer).toHaveBeenCalledTimes(1)
    expect(getMeter).toHaveBeenCalledTimes(1)
    expect(config.propagator).toBe(harness.globals.propagator)
  })

  it('prefers an explicit propagator over the global one', () => {
    const propagator: TextMapPropagator = new W3CTraceContextPropagator()

    const config = new KafkaOtelConfigBuilder().withPropagator(propagator).build(harness.globals)

    expect(config.propagator).toBe(propagator)
  })

  it('does not touch providers when disabled', () => {
    const getTracer = vi.spyOn(harness.globals.tracerProvider, 'getTracer')

    const config = new KafkaOtelConfigBuilder().withEnabled(false).build(harness.globals)

    expect(config.enabled).toBe(false)
    expect(getTracer).not.toHaveBeenCalled()
    expect(config.tracer.startSpan('orders receive').isRecording()).toBe(false)
  })

  it('falls back to no-op handles when providers throw', () => {
    const config = resolveConfig({
      tracerProvider: {
        getTracer: () => {
          throw new Error('tracer provider shut down')
        },
      },
      meterProvider: {
        getMeter: () => {
          throw new Error('meter provider shut down')
        },
      },
    }, harness.globals)

    expect(config.tracer.startSpan('orders receive').isRecording()).toBe(false)
    expect(() => config.meter.createCounter('test').add(1)).not.toThrow()
  })

  it('rejects empty broker addresses', () => {
    expect(() => resolveConfig({ brokerAddresses: ['localhost:9092', ' '] }, harness.globals))
      .toThrow('Broker address at index 1 must be a non-empty string.')
  })

  it('treats an empty consumer group as unset', () => {
    expect(resolveConfig({ consumerGroup: '' }, harness.globals).consumerGroup).toBeUndefined()
  })

  it('returns a frozen configuration detached from the caller\'s lists', () => {
    const ignoreTopics = ['heartbeats']
    const config = resolveConfig({ ignoreTopics }, harness.globals)
    ignoreTopics.push('orders')

    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.ignoreTopics)).toBe(true)
    expect(config.ignoreTopics).toEqual(['heartbeats'])
  })
})

describe('getGlobalProviders', () => {
  it('snapshots the API globals', () => {
    const globals = getGlobalProviders()

    expect(globals.propagator).toBe(propagation)
    expect(typeof globals.tracerProvider.getTracer).toBe('function')
    expect(typeof globals.meterProvider.getMeter).toBe('function')
  })
})
