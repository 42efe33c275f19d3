import {
  createNoopMeter,
  diag,
  type Meter,
  type MeterProvider,
  metrics,
  propagation,
  ProxyTracerProvider,
  type TextMapPropagator,
  trace,
  type Tracer,
  type TracerProvider,
} from '@opentelemetry/api'

import { KAFKA_DEFAULTS, PACKAGE_INFO } from './constants.js'
import {
  type BrokerEndpoint,
  DEFAULT_OTEL_CONFIG,
  type GlobalProviders,
  type KafkaOtelConfig,
  type KafkaOtelInstrumentationConfig,
  type MessageHookFn,
  type TopicFilter,
} from './types.js'

const PORT_PATTERN = /^[+-]?\d+$/

/**
 * Snapshot of the process-wide providers registered with `@opentelemetry/api`.
 * Pass your own to keep configuration free of global state.
 */
export function getGlobalProviders(): GlobalProviders {
  return {
    tracerProvider: trace.getTracerProvider(),
    meterProvider: metrics.getMeterProvider(),
    propagator: propagation,
  }
}

/**
 * Derives `server.address` / `server.port` from the bootstrap broker list.
 * A single `host[:port]` is split, several brokers are joined with `;` and carry no port.
 */
export function parseBrokerAddresses(addresses: readonly string[]): BrokerEndpoint {
  if (addresses.length !== 1) {
    return { serverAddress: addresses.join(KAFKA_DEFAULTS.BROKER_ADDRESS_SEPARATOR) }
  }

  const [host, port] = addresses[0].split(':')
  if (port === undefined || !PORT_PATTERN.test(port)) {
    return { serverAddress: host }
  }

  const serverPort = Number.parseInt(port, 10)
  if (!Number.isSafeInteger(serverPort)) {
    return { serverAddress: host }
  }

  return { serverAddress: host, serverPort }
}

function copyTopicFilter(filter: TopicFilter): TopicFilter {
  return typeof filter === 'function' ? filter : Object.freeze([...filter])
}

// A proxy provider without a delegate hands out no-op tracers
function createNoopTracer(): Tracer {
  return new ProxyTracerProvider().getTracer(PACKAGE_INFO.NAME, PACKAGE_INFO.VERSION)
}

function resolveTracer(provider: TracerProvider): Tracer {
  try {
    return provider.getTracer(PACKAGE_INFO.NAME, PACKAGE_INFO.VERSION)
  } catch (error) {
    diag.warn('Failed to get tracer, spans are disabled:', error)
    return createNoopTracer()
  }
}

function resolveMeter(provider: MeterProvider): Meter {
  try {
    return provider.getMeter(PACKAGE_INFO.NAME, PACKAGE_INFO.VERSION)
  } catch (error) {
    diag.warn('Failed to get meter, metrics are disabled:', error)
    return createNoopMeter()
  }
}

/**
 * Collects settings in call order, then resolves them into an immutable {@link KafkaOtelConfig}.
 * Later settings win; list settings are replaced, never merged.
 */
export class KafkaOtelConfigBuilder {
  private options: KafkaOtelInstrumentationConfig = { ...DEFAULT_OTEL_CONFIG }

  /**
   * Applies every defined field of `options` over the current settings
   * @returns {KafkaOtelConfigBuilder} This instance for chaining
   */
  apply(options: KafkaOtelInstrumentationConfig = {}): KafkaOtelConfigBuilder {
    const current = this.options
    this.options = {
      enabled: options.enabled ?? current.enabled,
      tracerProvider: options.tracerProvider ?? current.tracerProvider,
      meterProvider: options.meterProvider ?? current.meterProvider,
      propagator: options.propagator ?? current.propagator,
      brokerAddresses: options.brokerAddresses ?? current.brokerAddresses,
      consumerGroup: options.consumerGroup ?? current.consumerGroup,
      ignoreTopics: options.ignoreTopics ?? current.ignoreTopics,
      messageHook: options.messageHook ?? current.messageHook,
    }
    return this
  }

  withEnabled(enabled: boolean): KafkaOtelConfigBuilder {
    return this.apply({ enabled })
  }

  withTracerProvider(tracerProvider?: TracerProvider): KafkaOtelConfigBuilder {
    return this.apply({ tracerProvider })
  }

  withMeterProvider(meterProvider?: MeterProvider): KafkaOtelConfigBuilder {
    return this.apply({ meterProvider })
  }

  withPropagator(propagator?: TextMapPropagator): KafkaOtelConfigBuilder {
    return this.apply({ propagator })
  }

  withBrokerAddresses(brokerAddresses: string[]): KafkaOtelConfigBuilder {
    return this.apply({ brokerAddresses: [...brokerAddresses] })
  }

  withConsumerGroup(consumerGroup: string): KafkaOtelConfigBuilder {
    return this.apply({ consumerGroup })
  }

  withIgnoreTopics(ignoreTopics: TopicFilter): KafkaOtelConfigBuilder {
    return this.apply({ ignoreTopics: copyTopicFilter(ignoreTopics) })
  }

  withMessageHook(messageHook: MessageHookFn): KafkaOtelConfigBuilder {
    return this.apply({ messageHook })
  }

  /**
   * Validates the collected settings and resolves tracer and meter handles
   * @throws {Error} If a broker address is empty
   */
  build(globals: GlobalProviders = getGlobalProviders()): KafkaOtelConfig {
    const {
      enabled = DEFAULT_OTEL_CONFIG.enabled,
      tracerProvider = globals.tracerProvider,
      meterProvider = globals.meterProvider,
      propagator = globals.propagator,
      brokerAddresses,
      consumerGroup,
      ignoreTopics,
      messageHook,
    } = this.options

    brokerAddresses?.forEach((address, index) => {
      if (typeof address !== 'string' || address.trim() === '') {
        throw new Error(`Broker address at index ${index} must be a non-empty string.`)
      }
    })

    const endpoint = brokerAddresses ? parseBrokerAddresses(brokerAddresses) : undefined

    const config: KafkaOtelConfig = {
      enabled,
      tracer: enabled ? resolveTracer(tracerProvider) : createNoopTracer(),
      meter: enabled ? resolveMeter(meterProvider) : createNoopMeter(),
      propagator,
      serverAddress: endpoint?.serverAddress || undefined,
      serverPort: endpoint?.serverPort || undefined,
      consumerGroup: consumerGroup || undefined,
      ignoreTopics: ignoreTopics ? copyTopicFilter(ignoreTopics) : undefined,
      messageHook,
    }

    diag.debug(
      `Kafka consumer OTEL instrumentation ${enabled ? 'enabled' : 'disabled'}`
        + (config.serverAddress ? ` for ${config.serverAddress}` : ''),
    )

    return Object.freeze(config)
  }
}

/**
 * Resolves a configuration from a single options object
 * @throws {Error} If the options are invalid
 */
export function resolveConfig(
  options: KafkaOtelInstrumentationConfig = {},
  globals: GlobalProviders = getGlobalProviders(),
): KafkaOtelConfig {
  return new KafkaOtelConfigBuilder().apply(options).build(globals)
}
