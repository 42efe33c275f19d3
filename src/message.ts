export type MessageHeaderValue = Buffer | string | Array<Buffer | string> | undefined
export type MessageHeaders = Record<string, MessageHeaderValue>

/**
 * A message as handed out by a Kafka consumer.
 * The instrumentation only reads it and forwards the same reference.
 */
export interface ConsumerMessage {
  topic: string
  partition: number
  offset: number | string
  key?: Buffer | string | null
  payload?: Buffer | string | null
  headers?: MessageHeaders
}

/**
 * Pull-based consumer, resolving `null` once it has been disconnected.
 */
export interface MessageReceiver<T extends ConsumerMessage = ConsumerMessage> {
  recv(): Promise<T | null>
}

export type MessageSource<T extends ConsumerMessage = ConsumerMessage> = AsyncIterable<T> | MessageReceiver<T>
