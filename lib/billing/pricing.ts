/**
 * Generation cost model
 *
 * Video is metered in tokens derived from output pixels, frame rate and
 * duration. Images are metered per image. Prices are informational (USD).
 */

/**
 * Fixed output frame rate used for token estimates
 */
export const VIDEO_FPS = 24;

export const VIDEO_RESOLUTIONS = ['480p', '720p'] as const;
export const VIDEO_RATIOS = ['16:9', '4:3', '1:1', '3:4', '9:16', '21:9'] as const;

export type VideoResolution = (typeof VIDEO_RESOLUTIONS)[number];
export type VideoRatio = (typeof VIDEO_RATIOS)[number];

/**
 * Output frame size per resolution and aspect ratio
 */
export const RESOLUTION_PIXELS: Record<VideoResolution, Record<VideoRatio, readonly [number, number]>> = {
  '480p': {
    '16:9': [864, 496],
    '4:3': [752, 560],
    '1:1': [640, 640],
    '3:4': [560, 752],
    '9:16': [496, 864],
    '21:9': [992, 432],
  },
  '720p': {
    '16:9': [1280, 720],
    '4:3': [1112, 834],
    '1:1': [960, 960],
    '3:4': [834, 1112],
    '9:16': [720, 1280],
    '21:9': [1470, 630],
  },
};

/** USD per 1,000 video tokens */
export const VIDEO_PRICE_PER_1K = {
  withAudio: 0.016,
  withoutAudio: 0.008,
} as const;

/** USD per generated image */
export const IMAGE_UNIT_PRICE = 0.25;

function isResolution(value: string): value is VideoResolution {
  return (VIDEO_RESOLUTIONS as readonly string[]).includes(value);
}

function isRatio(value: string): value is VideoRatio {
  return (VIDEO_RATIOS as readonly string[]).includes(value);
}

/**
 * Frame size for a resolution/ratio pair. Each field falls back on its own:
 * an unknown resolution becomes 720p, an unknown ratio 16:9.
 */
export function framePixels(resolution: string, ratio: string): readonly [number, number] {
  const row = RESOLUTION_PIXELS[isResolution(resolution) ? resolution : '720p'];
  return row[isRatio(ratio) ? ratio : '16:9'];
}

/**
 * Estimated tokens for one video
 */
export function calculateTokens(
  resolution: string,
  ratio: string,
  duration: number,
  fps: number = VIDEO_FPS
): number {
  const [width, height] = framePixels(resolution, ratio);
  return Math.floor((width * height * fps * duration) / 1024);
}

function roundTo4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/**
 * Price of a token amount, rounded to 4 decimals
 */
export function calculateVideoPrice(tokens: number, withAudio: boolean): number {
  const rate = withAudio ? VIDEO_PRICE_PER_1K.withAudio : VIDEO_PRICE_PER_1K.withoutAudio;
  return roundTo4((tokens / 1000) * rate);
}

/**
 * Images a request will be charged for: the group ceiling in sequential
 * mode, otherwise the requested count
 */
export function estimateImageCount(options: { sequential: boolean; count: number; maxImages: number }): number {
  return options.sequential ? options.maxImages : options.count;
}

export function calculateImagePrice(count: number): number {
  return roundTo4(count * IMAGE_UNIT_PRICE);
}
