import { DEFAULT_CROP_CONFIG } from '../../../main/config'
import { ProcessExitError } from '../../../main/crop/errors'
import { extractRepresentativeFrame, getRepresentativeFrameTime } from '../../../main/media/frame-extractor'
import { createFakeLauncher } from '../../helpers/fake-process'

describe('frame extraction', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('picks a tenth of the way in, at most five seconds', () => {
    expect(getRepresentativeFrameTime(20)).toBe(2)
    expect(getRepresentativeFrameTime(600)).toBe(5)
    expect(getRepresentativeFrameTime(null)).toBe(0)
  })

  it('extracts one frame at the representative time', async () => {
    const { launch, calls } = createFakeLauncher((proc) => proc.finish(0))

    await expect(
      extractRepresentativeFrame('/a/clip.mp4', '/tmp/frame.png', {
        durationSeconds: 20,
        config: DEFAULT_CROP_CONFIG,
        ffmpegPath: '/fake/ffmpeg',
        launch,
      })
    ).resolves.toBe('/tmp/frame.png')
    expect(calls[0].args.slice(0, 6)).toEqual(['-hide_banner', '-y', '-ss', '2.000', '-i', '/a/clip.mp4'])
  })

  it('rejects with the process error when ffmpeg fails', async () => {
    const { launch } = createFakeLauncher((proc) => {
      proc.writeStderr('Output file is empty, nothing was encoded\n')
      proc.finish(1)
    })

    await expect(
      extractRepresentativeFrame('/a/clip.mp4', '/tmp/batch-crop-missing-frame.png', {
        atSeconds: 1,
        config: DEFAULT_CROP_CONFIG,
        ffmpegPath: '/fake/ffmpeg',
        launch,
      })
    ).rejects.toThrow(ProcessExitError)
  })
})
