import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "./config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.capabilities).toEqual({ allowedTargets: "capcut" });
    expect(config.draftsDir).toBeUndefined();
    expect(config.silenceThresholdSec).toBe(3);
    expect(config.minSegmentDurationSec).toBe(0.5);
    expect(config.subtitleMaxWords).toBe(8);
    expect(config.subtitleMaxChars).toBe(45);
    expect(config.ai.provider).toBe("openai");
  });

  it("coerces numbers and treats blank values as unset", () => {
    const config = loadConfig({
      CUTLINE_ALLOWED_TARGETS: "all",
      CUTLINE_DRAFTS_DIR: "",
      CUTLINE_SILENCE_THRESHOLD_SEC: "2.5",
      CUTLINE_SUBTITLE_MAX_WORDS: "",
    });

    expect(config.capabilities.allowedTargets).toBe("all");
    expect(config.draftsDir).toBeUndefined();
    expect(config.silenceThresholdSec).toBe(2.5);
    expect(config.subtitleMaxWords).toBe(8);
  });

  it("rejects unknown targets", () => {
    expect(() => loadConfig({ CUTLINE_ALLOWED_TARGETS: "everything" })).toThrow(ConfigError);
    expect(() => loadConfig({ CUTLINE_ALLOWED_TARGETS: "everything" })).toThrow(
      /^Invalid configuration: CUTLINE_ALLOWED_TARGETS: /
    );
  });

  it("rejects negative thresholds", () => {
    expect(() => loadConfig({ CUTLINE_MIN_SEGMENT_SEC: "-1" })).toThrow(
      /CUTLINE_MIN_SEGMENT_SEC/
    );
  });

  it("wraps model settings errors", () => {
    expect(() => loadConfig({ OPENAI_BASE_URL: "not a url" })).toThrow(
      /^Invalid AI configuration: /
    );
  });
});
