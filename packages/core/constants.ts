export const DEFAULT_MAX_DEPTH = 32
export const MAX_DEPTH_CEILING = 1024

export const DEFAULT_RENDER_MAX_STRING = 80
export const DEFAULT_RENDER_MAX_ITEMS = 5
export const DEFAULT_RENDER_MAX_DEPTH = 3

export const TRUE_WORDS: ReadonlySet<string> = new Set(["true", "yes", "on", "1"])
export const FALSE_WORDS: ReadonlySet<string> = new Set(["false", "no", "off", "0"])

export const LOG_TAG = "conform"
