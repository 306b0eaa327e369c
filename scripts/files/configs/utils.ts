export const SECONDS_PER_BLOCK = 12

export const hoursToBlocks = (hours: number) =>
  Math.floor((hours * 60 * 60) / SECONDS_PER_BLOCK)
