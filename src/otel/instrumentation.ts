import type { ReadableOptions } from 'node:stream'

import type { ConsumerMessage, MessageSource } from '../message.js'
import { ConsumerMessagesDispatcher } from '../streams/consumer-messages-dispatcher.js'
import { getGlobalProviders, resolveConfig } from './config.js'
import { MessageProcessInstrumenter } from './process-operation.js'
import type { GlobalProviders, KafkaOtelConfig, KafkaOtelInstrumentationConfig } from './types.js'

/**
 * Entry point tying one resolved configuration to the receive and process instrumentation.
 * Each instance owns its configuration; nothing is registered globally.
 */
export class KafkaConsumerInstrumentation {
  private readonly _config: KafkaOtelConfig

  /**
   * Creates a KafkaConsumerInstrumentation instance
   * @throws {Error} If the configuration is invalid
   */
  constructor(config: KafkaOtelInstrumentationConfig = {}, globals: GlobalProviders = getGlobalProviders()) {
    this._config = resolveConfig(config, globals)
  }

  public get config(): KafkaOtelConfig {
    return this._config
  }

  public isEnabled(): boolean {
    return this._config.enabled
  }

  /**
   * Wraps a consumer's message stream with receive spans and metrics
   * @param source - An async iterable of messages or a consumer exposing `recv()`
   * @param streamOptions - Options for the returned stream, object mode is always on
   */
  public wrapMessages<T extends ConsumerMessage>(
    source: MessageSource<T>,
    streamOptions: ReadableOptions = {},
  ): ConsumerMessagesDispatcher<T> {
    return new ConsumerMessagesDispatcher<T>({ ...streamOptions, source, config: this._config })
  }

  public createProcessInstrumenter(): MessageProcessInstrumenter {
    return new MessageProcessInstrumenter(this._config)
  }
}
