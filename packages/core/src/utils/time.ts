export const MICROSECONDS_PER_SECOND = 1_000_000;

export const secondsToMicroseconds = (seconds: number): number =>
  Math.round(seconds * MICROSECONDS_PER_SECOND);

export const microsecondsToSeconds = (microseconds: number): number =>
  microseconds / MICROSECONDS_PER_SECOND;

/**
 * Formats a duration in seconds as `M:SS` (minutes are not wrapped into hours).
 */
export const formatDuration = (seconds: number): string => {
  const safe = Math.max(0, seconds);
  const minutes = Math.floor(safe / 60);
  const rest = Math.floor(safe % 60);
  return `${minutes}:${rest.toString().padStart(2, "0")}`;
};
