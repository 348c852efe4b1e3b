import { DEFAULT_CROP_CONFIG, loadCropConfig } from '../../../main/config'

describe('loadCropConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadCropConfig({})).toEqual(DEFAULT_CROP_CONFIG)
  })

  it('reads overrides from the environment', () => {
    expect(
      loadCropConfig({
        BATCH_CROP_FFMPEG_PATH: '  /opt/ffmpeg/bin/ffmpeg ',
        BATCH_CROP_FFPROBE_PATH: '/opt/ffmpeg/bin/ffprobe',
        BATCH_CROP_HW_ENCODE: 'OFF',
        BATCH_CROP_POLL_INTERVAL_MS: '25',
        BATCH_CROP_GRACE_PERIOD_MS: '500',
        BATCH_CROP_PROBE_TIMEOUT_MS: '10000',
      })
    ).toEqual({
      ffmpegPath: '/opt/ffmpeg/bin/ffmpeg',
      ffprobePath: '/opt/ffmpeg/bin/ffprobe',
      hardwareEncode: 'off',
      pollIntervalMs: 25,
      gracePeriodMs: 500,
      probeTimeoutMs: 10000,
    })
  })

  it('caps the cancellation poll interval at 100ms', () => {
    expect(loadCropConfig({ BATCH_CROP_POLL_INTERVAL_MS: '500' }).pollIntervalMs).toBe(100)
  })

  it('falls back to defaults for invalid numbers', () => {
    const config = loadCropConfig({ BATCH_CROP_GRACE_PERIOD_MS: 'soon', BATCH_CROP_PROBE_TIMEOUT_MS: '-5' })
    expect(config.gracePeriodMs).toBe(2000)
    expect(config.probeTimeoutMs).toBe(5000)
    expect(config.hardwareEncode).toBe('auto')
  })
})
