/**
 * Settings Model Tests
 *
 * Source: apps/camera-service/src/camera/settings.ts
 *
 * Critical Invariants:
 * - OPEN accepts every name in ALL_SETTINGS, PLAYING only PLAY_SETTINGS
 * - Rejections are returned as SettingValidationError, never thrown
 * - Numeric values are clamped to the advertised range
 * - ROI origin writes shrink the extent to stay on the sensor, and echo it
 * - mergeSettings reports only fields whose value changed
 */

import { describe, it, expect } from "vitest";
import { ALL_SETTINGS, PLAY_SETTINGS } from "@isocam/config";
import type { CameraSettings, SettingValue, WritableSetting } from "@isocam/types";
import { frameSize, mergeSettings, planSettingWrite } from "../settings";
import { SettingValidationError } from "../errors";
import { defaultSimulatedSettings } from "../drivers/simulated";

const validValues: Record<WritableSetting, SettingValue> = {
  exposure_ms: 10,
  binning_x: 2,
  binning_y: 2,
  roi_x: 4,
  roi_y: 4,
  roi_width: 32,
  roi_height: 24,
  trigger_type: "HW Trigger",
  trigger_count: 3,
  frame_queue_size: 2,
  gain: 10,
  black_level: 5,
  freq: "40 MHz",
  taps: "2",
  color_gain: [1, 2, 3],
};

function colorSettings(): CameraSettings {
  return defaultSimulatedSettings([64, 48], true);
}

function monoSettings(): CameraSettings {
  return defaultSimulatedSettings([64, 48], false);
}

function planned(settings: CameraSettings, name: string, value: unknown) {
  const result = planSettingWrite(settings, "OPEN", name, value);
  if (!result.ok) {
    throw new Error(`expected ${name} to be accepted: ${result.error.message}`);
  }
  return result.changes;
}

describe("planSettingWrite state guard", () => {
  it("accepts every writable setting while open", () => {
    for (const name of ALL_SETTINGS) {
      const result = planSettingWrite(colorSettings(), "OPEN", name, validValues[name]);
      expect(result.ok, name).toBe(true);
    }
  });

  it("accepts only play settings while playing", () => {
    for (const name of ALL_SETTINGS) {
      const result = planSettingWrite(colorSettings(), "PLAYING", name, validValues[name]);
      expect(result.ok, name).toBe(PLAY_SETTINGS.includes(name));
      if (!result.ok) {
        expect(result.error.message).toBe(`Cannot set "${name}": not writable while playing`);
      }
    }
  });

  it("rejects everything while closed", () => {
    const result = planSettingWrite(monoSettings(), "CLOSED", "exposure_ms", 10);
    expect(result.ok).toBe(false);
  });

  it("rejects unknown names", () => {
    const result = planSettingWrite(monoSettings(), "OPEN", "shutter_angle", 180);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(SettingValidationError);
      expect(result.error.setting).toBe("shutter_angle");
      expect(result.error.message).toBe('Cannot set "shutter_angle": unknown setting');
    }
  });

  it("rejects values of the wrong type", () => {
    expect(planSettingWrite(monoSettings(), "OPEN", "exposure_ms", "fast").ok).toBe(false);
    expect(planSettingWrite(monoSettings(), "OPEN", "gain", Number.NaN).ok).toBe(false);
    expect(planSettingWrite(monoSettings(), "OPEN", "trigger_type", "Software").ok).toBe(false);
    expect(planSettingWrite(monoSettings(), "OPEN", "freq", "80 MHz").ok).toBe(false);
  });

  it("rejects color gain on a mono camera", () => {
    const result = planSettingWrite(monoSettings(), "OPEN", "color_gain", [1, 1, 1]);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Cannot set "color_gain": camera has no color sensor');
    }
  });
});

describe("planSettingWrite clamping", () => {
  it("clamps exposure to its range and whole microseconds", () => {
    expect(planned(monoSettings(), "exposure_ms", 500)).toEqual({ exposure_ms: 100 });
    expect(planned(monoSettings(), "exposure_ms", -3)).toEqual({ exposure_ms: 0 });
    expect(planned(monoSettings(), "exposure_ms", 1.23456)).toEqual({ exposure_ms: 1.234 });
  });

  it("rounds and clamps integer settings", () => {
    expect(planned(monoSettings(), "gain", 1000)).toEqual({ gain: 480 });
    expect(planned(monoSettings(), "gain", 2.6)).toEqual({ gain: 3 });
    expect(planned(monoSettings(), "black_level", -1)).toEqual({ black_level: 0 });
    expect(planned(monoSettings(), "binning_x", 9)).toEqual({ binning_x: 4 });
    expect(planned(monoSettings(), "trigger_count", -5)).toEqual({ trigger_count: 0 });
    expect(planned(monoSettings(), "frame_queue_size", 0)).toEqual({ frame_queue_size: 1 });
  });

  it("shrinks the ROI width when the origin moves right", () => {
    expect(planned(monoSettings(), "roi_x", 60)).toEqual({ roi_x: 60, roi_width: 4 });
    expect(planned(monoSettings(), "roi_x", 100)).toEqual({ roi_x: 63, roi_width: 1 });
  });

  it("shrinks the ROI height when the origin moves down", () => {
    expect(planned(monoSettings(), "roi_y", 40)).toEqual({ roi_y: 40, roi_height: 8 });
  });

  it("limits the ROI extent to the sensor and echoes the origin", () => {
    const settings = { ...monoSettings(), roi_x: 10, roi_y: 8 };

    expect(planned(settings, "roi_width", 100)).toEqual({ roi_width: 54, roi_x: 10 });
    expect(planned(settings, "roi_width", 0)).toEqual({ roi_width: 1, roi_x: 10 });
    expect(planned(settings, "roi_height", 100)).toEqual({ roi_height: 40, roi_y: 8 });
  });

  it("accepts numeric tap counts", () => {
    expect(planned(monoSettings(), "taps", 2)).toEqual({ taps: "2" });
  });
});

describe("mergeSettings", () => {
  it("reports only the fields that changed", () => {
    const current = colorSettings();
    const { settings, changed } = mergeSettings(current, {
      exposure_ms: 20,
      gain: current.gain,
      color_gain: [1, 1, 1],
    });

    expect(changed).toEqual(["exposure_ms"]);
    expect(settings.exposure_ms).toBe(20);
    expect(current.exposure_ms).toBe(5);
  });

  it("detects a changed color gain", () => {
    const { changed, settings } = mergeSettings(colorSettings(), { color_gain: [2, 1, 1] });

    expect(changed).toEqual(["color_gain"]);
    expect(settings.color_gain).toEqual([2, 1, 1]);
  });
});

describe("frameSize", () => {
  it("divides the ROI by the binning", () => {
    expect(frameSize({ ...monoSettings(), binning_x: 2, binning_y: 2 })).toEqual([32, 24]);
  });
});
