import { W3CTraceContextPropagator } from '@opentelemetry/core'
import {
  DataPointType,
  type DataPoint,
  type Histogram,
  type MetricData,
  MeterProvider,
  MetricReader,
} from '@opentelemetry/sdk-metrics'
import { BasicTracerProvider, InMemorySpanExporter, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base'

import type { ConsumerMessage, GlobalProviders } from '../src/index.js'

export const PRODUCER_TRACE_ID = 'aaaabbbbccccddddeeeeffff00001111'
export const PRODUCER_SPAN_ID = '0123456789abcdef'

// Collects on demand, no export interval
export class TestMetricReader extends MetricReader {
  protected async onForceFlush(): Promise<void> {
    // nothing buffered
  }

  protected async onShutdown(): Promise<void> {
    // nothing to release
  }
}

export interface TelemetryHarness {
  spanExporter: InMemorySpanExporter
  metricReader: TestMetricReader
  globals: GlobalProviders
  shutdown: () => Promise<void>
}

export function createTelemetryHarness(): TelemetryHarness {
  const spanExporter = new InMemorySpanExporter()
  const tracerProvider = new BasicTracerProvider({ spanProcessors: [new SimpleSpanProcessor(spanExporter)] })
  const metricReader = new TestMetricReader()
  const meterProvider = new MeterProvider({ readers: [metricReader] })

  return {
    spanExporter,
    metricReader,
    globals: {
      tracerProvider,
      meterProvider,
      propagator: new W3CTraceContextPropagator(),
    },
    shutdown: async () => {
      await tracerProvider.shutdown()
      await meterProvider.shutdown()
    },
  }
}

export async function collectMetrics(reader: TestMetricReader): Promise<MetricData[]> {
  const { resourceMetrics } = await reader.collect()
  return resourceMetrics.scopeMetrics.flatMap((scope) => scope.metrics)
}

export function histogramPoints(metrics: MetricData[], name: string): DataPoint<Histogram>[] {
  const metric = metrics.find((candidate) => candidate.descriptor.name === name)
  if (!metric) {
    return []
  }
  if (metric.dataPointType !== DataPointType.HISTOGRAM) {
    throw new Error(`${name} is not a histogram`)
  }
  return metric.dataPoints
}

export function sumPoints(metrics: MetricData[], name: string): DataPoint<number>[] {
  const metric = metrics.find((candidate) => candidate.descriptor.name === name)
  if (!metric) {
    return []
  }
  if (metric.dataPointType !== DataPointType.SUM) {
    throw new Error(`${name} is not a sum`)
  }
  return metric.dataPoints
}

export function traceparentHeaders(): Record<string, Buffer> {
  return { traceparent: Buffer.from(`00-${PRODUCER_TRACE_ID}-${PRODUCER_SPAN_ID}-01`) }
}

export function createMessage(offset: number, overrides: Partial<ConsumerMessage> = {}): ConsumerMessage {
  return {
    topic: 'orders',
    partition: 0,
    offset,
    key: Buffer.from(`order-${offset}`),
    payload: Buffer.from(JSON.stringify({ orderId: offset })),
    headers: {},
    ...overrides,
  }
}

export async function drain<T>(stream: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = []
  for await (const item of stream) {
    items.push(item)
  }
  return items
}
