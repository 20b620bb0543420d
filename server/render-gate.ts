import { logger } from './logger.js'
import type { DistributionTrack } from './distribution-track.js'
import type { MediaSample } from './peer-transport.js'
import type { SessionRegistry } from './session-registry.js'
import type { UnblockSignal } from './unblock-signal.js'

const log = logger.child({ component: 'render-gate' })

/**
 * What happens to a sample that was waiting when the gate is force-unblocked.
 * `deliver` still hands it to the track if peers exist at that moment.
 */
export type PendingSamplePolicy = 'discard' | 'deliver'

/** `shutdown` is not an error: the gate was force-unblocked and the call is over. */
export type RenderOutcome = 'delivered' | 'dropped' | 'shutdown'

export type RenderGateOptions = {
  liveMode: boolean
  pendingSamplePolicy?: PendingSamplePolicy
}

export class RenderGate {
  readonly liveMode: boolean
  readonly pendingSamplePolicy: PendingSamplePolicy
  private unlocked = false
  private blocked = 0

  constructor(
    private readonly registry: Pick<SessionRegistry, 'count'>,
    private readonly track: Pick<DistributionTrack, 'writeSample'>,
    private readonly signal: UnblockSignal,
    options: RenderGateOptions,
  ) {
    this.liveMode = options.liveMode
    this.pendingSamplePolicy = options.pendingSamplePolicy ?? 'discard'
  }

  /**
   * Live mode never waits: with no peers the sample is dropped. Otherwise the
   * caller is suspended until a peer is admitted or `unlock()` is called.
   */
  async render(sample: MediaSample): Promise<RenderOutcome> {
    if (this.registry.count() === 0) {
      if (this.liveMode) return 'dropped'
      const admitted = await this.waitForPeers()
      if (!admitted) return this.releasePending(sample)
    }

    this.track.writeSample(sample)
    return 'delivered'
  }

  /** Wake any suspended render call and keep rendering non-blocking until `unlockStop()`. */
  unlock(): void {
    this.unlocked = true
    this.signal.notify({ type: 'force-unblock' })
  }

  unlockStop(): void {
    this.unlocked = false
    this.signal.clear()
  }

  get isUnlocked(): boolean {
    return this.unlocked
  }

  /** Number of render calls currently suspended. */
  blockedCount(): number {
    return this.blocked
  }

  private async waitForPeers(): Promise<boolean> {
    this.blocked += 1
    try {
      while (this.registry.count() === 0) {
        if (this.unlocked) return false
        log.debug('Blocking until peers connect')
        await this.signal.wait()
        if (this.unlocked) return false
      }
      return true
    } finally {
      this.blocked -= 1
    }
  }

  private releasePending(sample: MediaSample): RenderOutcome {
    if (this.pendingSamplePolicy === 'deliver' && this.registry.count() > 0) {
      this.track.writeSample(sample)
    }
    log.debug({ policy: this.pendingSamplePolicy }, 'Render unblocked without peers')
    return 'shutdown'
  }
}
