export const BOARD_W = 30;
export const BOARD_H = 20;

/** Free cell. Values 1..MAX_AGENTS mark the trail of agent `value - 1`. */
export const FREE = 0;
export const MAX_AGENTS = 253;
/** Scratch marker used on cloned grids by flood fills. */
export const FLOOD_MARK = 254;
/** Returned for any read outside the board. */
export const OUT_OF_RANGE = 255;

export const DEFAULT_TIMEOUT_MS = 1750;
export const DEFAULT_SPACE_DEPTH = 12;

export const DEFAULT_WEIGHTS = {
  distance: 1,
  space: 2,
  wallHug: 2,
} as const;
