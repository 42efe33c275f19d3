import type { ConsumerMessage, MessageReceiver, MessageSource } from '../message.js'

export function isMessageReceiver<T extends ConsumerMessage>(source: MessageSource<T>): source is MessageReceiver<T> {
  if (Symbol.asyncIterator in source) {
    return false
  }
  return 'recv' in source && typeof source.recv === 'function'
}

/**
 * Pulls messages with `recv()` until the consumer reports it is disconnected
 */
export async function* receiveMessages<T extends ConsumerMessage>(receiver: MessageReceiver<T>): AsyncGenerator<T> {
  for (;;) {
    const message = await receiver.recv()
    if (!message) {
      return
    }
    yield message
  }
}

export function toMessageIterator<T extends ConsumerMessage>(source: MessageSource<T>): AsyncIterator<T> {
  if (isMessageReceiver(source)) {
    return receiveMessages(source)
  }

  return source[Symbol.asyncIterator]()
}
