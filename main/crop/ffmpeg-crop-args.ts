import type { CropRect } from '../../src/types/crop'

/**
 * 4:2:0 encoders reject odd frame sizes, so video crops are floored to even dimensions
 * (at least 2) with the top-left corner kept.
 */
export function toEvenVideoRegion(region: Readonly<CropRect>): CropRect {
  return {
    x: region.x,
    y: region.y,
    width: Math.max(2, region.width - (region.width % 2)),
    height: Math.max(2, region.height - (region.height % 2)),
  }
}

export function buildCropFilter(region: Readonly<CropRect>): string {
  return `crop=${region.width}:${region.height}:${region.x}:${region.y}`
}

export interface VideoCropArgs {
  inputPath: string
  outputPath: string
  region: Readonly<CropRect>
  /** Hardware encoder name; the container's default encoder when null */
  encoder: string | null
}

export function buildVideoCropArgs({ inputPath, outputPath, region, encoder }: VideoCropArgs): string[] {
  return [
    '-hide_banner',
    '-y',
    '-i', inputPath,
    '-vf', buildCropFilter(toEvenVideoRegion(region)),
    ...(encoder ? ['-c:v', encoder] : []),
    '-c:a', 'copy',
    outputPath,
  ]
}

export function buildImageCropArgs(inputPath: string, outputPath: string, region: Readonly<CropRect>): string[] {
  return [
    '-hide_banner',
    '-y',
    '-i', inputPath,
    '-vf', buildCropFilter(region),
    '-frames:v', '1',
    '-update', '1',
    outputPath,
  ]
}

export function buildFrameExtractArgs(inputPath: string, outputPath: string, atSeconds: number): string[] {
  return [
    '-hide_banner',
    '-y',
    '-ss', atSeconds.toFixed(3),
    '-i', inputPath,
    '-frames:v', '1',
    '-update', '1',
    outputPath,
  ]
}
