import { describe, it, expect } from "vitest";
import { formatDuration, microsecondsToSeconds, secondsToMicroseconds } from "./time";

describe("time utils", () => {
  it("rounds seconds to whole microseconds", () => {
    expect(secondsToMicroseconds(1.5)).toBe(1_500_000);
    expect(secondsToMicroseconds(0.1 + 0.2)).toBe(300_000);
    expect(microsecondsToSeconds(2_250_000)).toBe(2.25);
  });

  it("formats durations as minutes and seconds", () => {
    expect(formatDuration(0)).toBe("0:00");
    expect(formatDuration(59.9)).toBe("0:59");
    expect(formatDuration(125)).toBe("2:05");
    expect(formatDuration(3725)).toBe("62:05");
    expect(formatDuration(-3)).toBe("0:00");
  });
});
