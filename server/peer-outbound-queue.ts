import type { MediaSample } from './peer-transport.js'

export const DEFAULT_PEER_QUEUE_MAX_BYTES = 4 * 1024 * 1024

function resolveMaxBytes(explicitMaxBytes?: number): number {
  if (typeof explicitMaxBytes === 'number' && Number.isFinite(explicitMaxBytes) && explicitMaxBytes > 0) {
    return Math.floor(explicitMaxBytes)
  }
  return DEFAULT_PEER_QUEUE_MAX_BYTES
}

/**
 * Leaky FIFO of samples waiting for one peer's transport. When the pending
 * bytes exceed the bound, the oldest samples are dropped; the newest sample
 * is always kept.
 */
export class PeerOutboundQueue {
  private readonly maxBytes: number
  private samples: MediaSample[] = []
  private totalBytes = 0
  private dropped = 0

  constructor(maxBytes?: number) {
    this.maxBytes = resolveMaxBytes(maxBytes)
  }

  enqueue(sample: MediaSample): void {
    this.samples.push(sample)
    this.totalBytes += sample.data.length
    this.evictOverflow()
  }

  shift(): MediaSample | undefined {
    const sample = this.samples.shift()
    if (sample) this.totalBytes -= sample.data.length
    return sample
  }

  pendingBytes(): number {
    return this.totalBytes
  }

  size(): number {
    return this.samples.length
  }

  droppedCount(): number {
    return this.dropped
  }

  clear(): void {
    this.samples = []
    this.totalBytes = 0
  }

  private evictOverflow(): void {
    while (this.totalBytes > this.maxBytes && this.samples.length > 1) {
      const evicted = this.samples.shift()
      if (!evicted) break
      this.totalBytes -= evicted.data.length
      this.dropped += 1
    }
  }
}
