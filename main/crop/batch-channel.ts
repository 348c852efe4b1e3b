import { EventEmitter } from 'events'
import type { BatchChannel, BatchMessage } from '../../src/types/batch'

export type BatchListener = (message: BatchMessage) => void

/** In-process channel: every posted message goes to every subscriber, in order. */
export class EventBatchChannel implements BatchChannel {
  private readonly emitter = new EventEmitter()

  post(message: BatchMessage): void {
    this.emitter.emit('message', message)
  }

  subscribe(listener: BatchListener): () => void {
    this.emitter.on('message', listener)
    return () => {
      this.emitter.off('message', listener)
    }
  }
}
