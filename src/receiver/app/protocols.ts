export const FRAMINGS = ["line", "length-prefixed"] as const;
export type Framing = (typeof FRAMINGS)[number];

// Bytes of a discarded frame passed on for inspection
export const PREVIEW_BYTES = 15;

export const DEFAULT_MAX_FRAME_BYTES = 16 * 1024 * 1024;
