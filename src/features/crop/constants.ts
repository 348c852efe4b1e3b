/** Smallest width/height a region may shrink to during move, resize and numeric edits. */
export const MIN_CROP_SIZE = 10

/** Visual handle size in viewport pixels. */
export const DEFAULT_HANDLE_SIZE = 8

/** Extra hit-test tolerance around each handle. */
export const HANDLE_HIT_PADDING = 2

export const CORNER_HANDLES = ['top-left', 'top-right', 'bottom-left', 'bottom-right'] as const
export const EDGE_HANDLES = ['top', 'bottom', 'left', 'right'] as const
