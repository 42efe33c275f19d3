import type { EachMessageHandler, EachMessagePayload } from 'kafkajs'

import type { ConsumerMessage } from '../message.js'
import type { MessageProcessInstrumenter } from '../otel/process-operation.js'

export function fromEachMessagePayload({ topic, partition, message }: EachMessagePayload): ConsumerMessage {
  return {
    topic,
    partition,
    offset: message.offset,
    key: message.key,
    payload: message.value,
    headers: message.headers,
  }
}

/**
 * Wraps a kafkajs `eachMessage` handler in a process operation.
 * Errors thrown by the handler are recorded and rethrown so kafkajs retry logic still applies.
 */
export function instrumentEachMessage(
  instrumenter: MessageProcessInstrumenter,
  handler: EachMessageHandler,
): EachMessageHandler {
  return async (payload) => instrumenter.process(fromEachMessagePayload(payload), () => handler(payload))
}
