import type { WebSink } from '../web-sink.js'

/** The one thing a source needs from the sink. */
export type SampleSink = Pick<WebSink, 'render'>

export type SourceEnd = 'eof' | 'shutdown' | 'stopped'

export type SourceStats = {
  frames: number
  delivered: number
  dropped: number
  endedBy: SourceEnd
}

export function emptyStats(): SourceStats {
  return { frames: 0, delivered: 0, dropped: 0, endedBy: 'eof' }
}
