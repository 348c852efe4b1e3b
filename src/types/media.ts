export type MediaKind = 'image' | 'video'

export interface MediaProbeResult {
  width: number
  height: number
  kind: MediaKind
  /** Seconds; only known for videos, and only when the container reports it */
  duration?: number
}

export interface MediaItem extends MediaProbeResult {
  path: string
}

export interface DimensionGroup {
  /** `${width}x${height}` */
  key: string
  width: number
  height: number
  paths: string[]
}

/** Reads a file's dimensions and kind; rejects when the file is not decodable media. */
export type MediaProbe = (path: string) => Promise<MediaProbeResult>
