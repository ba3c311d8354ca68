/**
 * Camera settings model
 *
 * A setting write goes through two steps:
 * - planSettingWrite checks the state guard and the value, and returns the
 *   clamped changes to hand to the driver (dependent ROI fields included)
 * - mergeSettings folds the changes the driver applied into the snapshot and
 *   reports which fields actually changed
 *
 * Validation failures are returned, never thrown.
 */

import { z } from "zod";
import { ALL_SETTINGS, PLAY_SETTINGS, TRIGGER_TYPES } from "@isocam/config";
import type {
  CameraSettings,
  SettingChanges,
  SettingRange,
  WritableSetting,
} from "@isocam/types";
import { SettingValidationError } from "./errors";
import type { CameraState } from "./state";

export type SettingWriteResult =
  | { ok: true; changes: SettingChanges }
  | { ok: false; error: SettingValidationError };

type Parsed<T> = { ok: true; value: T } | { ok: false; error: SettingValidationError };

const numberSchema = z.number().finite();
const triggerSchema = z.enum(TRIGGER_TYPES);
const gainComponent = z.number().finite().min(0);
const colorGainSchema = z.tuple([gainComponent, gainComponent, gainComponent]);

export function isWritableSetting(name: string): name is WritableSetting {
  return ALL_SETTINGS.some((setting) => setting === name);
}

/** Names accepted by the state guard in the given state */
export function allowedSettings(state: CameraState): readonly WritableSetting[] {
  switch (state) {
    case "OPEN":
      return ALL_SETTINGS;
    case "PLAYING":
      return PLAY_SETTINGS;
    case "CLOSED":
      return [];
  }
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function clampToRange(value: number, range: SettingRange): number {
  return clamp(value, range.min, range.max);
}

function reject(setting: string, reason: string): { ok: false; error: SettingValidationError } {
  return { ok: false, error: new SettingValidationError(setting, reason) };
}

function accept(changes: SettingChanges): SettingWriteResult {
  return { ok: true, changes };
}

function readNumber(setting: string, value: unknown): Parsed<number> {
  const parsed = numberSchema.safeParse(value);
  if (!parsed.success) {
    return reject(setting, `expected a number, got ${JSON.stringify(value)}`);
  }
  return { ok: true, value: parsed.data };
}

function readInteger(setting: string, value: unknown): Parsed<number> {
  const parsed = readNumber(setting, value);
  return parsed.ok ? { ok: true, value: Math.round(parsed.value) } : parsed;
}

function readChoice(setting: string, value: unknown, choices: readonly string[]): Parsed<string> {
  // Numeric choices such as tap counts may arrive unquoted
  const text = typeof value === "number" ? String(value) : value;
  if (typeof text !== "string" || !choices.includes(text)) {
    return reject(setting, `expected one of ${choices.join(", ")}, got ${JSON.stringify(value)}`);
  }
  return { ok: true, value: text };
}

/**
 * Validate a setting request against the state guard and the camera's
 * capabilities, and compute the changes to write.
 */
export function planSettingWrite(
  settings: CameraSettings,
  state: CameraState,
  name: string,
  value: unknown,
): SettingWriteResult {
  if (!isWritableSetting(name)) {
    return reject(name, "unknown setting");
  }
  if (!allowedSettings(state).includes(name)) {
    return reject(
      name,
      state === "PLAYING" ? "not writable while playing" : "camera is not open",
    );
  }

  const [sensorWidth, sensorHeight] = settings.sensor_size;

  switch (name) {
    case "exposure_ms": {
      const parsed = readNumber(name, value);
      if (!parsed.ok) return parsed;
      // Exposure is programmed in whole microseconds
      const us = Math.trunc(clampToRange(parsed.value, settings.exposure_range) * 1000);
      return accept({ exposure_ms: us / 1000 });
    }

    case "binning_x":
    case "binning_y": {
      const parsed = readInteger(name, value);
      if (!parsed.ok) return parsed;
      return name === "binning_x"
        ? accept({ binning_x: clampToRange(parsed.value, settings.binning_x_range) })
        : accept({ binning_y: clampToRange(parsed.value, settings.binning_y_range) });
    }

    case "roi_x": {
      const parsed = readInteger(name, value);
      if (!parsed.ok) return parsed;
      const x = clamp(parsed.value, 0, sensorWidth - 1);
      return accept({ roi_x: x, roi_width: Math.min(sensorWidth - x, settings.roi_width) });
    }

    case "roi_y": {
      const parsed = readInteger(name, value);
      if (!parsed.ok) return parsed;
      const y = clamp(parsed.value, 0, sensorHeight - 1);
      return accept({ roi_y: y, roi_height: Math.min(sensorHeight - y, settings.roi_height) });
    }

    case "roi_width": {
      const parsed = readInteger(name, value);
      if (!parsed.ok) return parsed;
      return accept({
        roi_width: clamp(parsed.value, 1, sensorWidth - settings.roi_x),
        roi_x: settings.roi_x,
      });
    }

    case "roi_height": {
      const parsed = readInteger(name, value);
      if (!parsed.ok) return parsed;
      return accept({
        roi_height: clamp(parsed.value, 1, sensorHeight - settings.roi_y),
        roi_y: settings.roi_y,
      });
    }

    case "trigger_type": {
      const parsed = triggerSchema.safeParse(value);
      if (!parsed.success || !settings.supported_triggers.includes(parsed.data)) {
        return reject(
          name,
          `expected one of ${settings.supported_triggers.join(", ")}, got ${JSON.stringify(value)}`,
        );
      }
      return accept({ trigger_type: parsed.data });
    }

    case "trigger_count": {
      const parsed = readInteger(name, value);
      if (!parsed.ok) return parsed;
      return accept({ trigger_count: Math.max(0, parsed.value) });
    }

    case "frame_queue_size": {
      const parsed = readInteger(name, value);
      if (!parsed.ok) return parsed;
      return accept({ frame_queue_size: Math.max(1, parsed.value) });
    }

    case "gain": {
      const parsed = readInteger(name, value);
      if (!parsed.ok) return parsed;
      return accept({ gain: clampToRange(parsed.value, settings.gain_range) });
    }

    case "black_level": {
      const parsed = readInteger(name, value);
      if (!parsed.ok) return parsed;
      return accept({ black_level: clampToRange(parsed.value, settings.black_level_range) });
    }

    case "freq": {
      const parsed = readChoice(name, value, settings.supported_freqs);
      if (!parsed.ok) return parsed;
      return accept({ freq: parsed.value });
    }

    case "taps": {
      const parsed = readChoice(name, value, settings.supported_taps);
      if (!parsed.ok) return parsed;
      return accept({ taps: parsed.value });
    }

    case "color_gain": {
      if (!settings.supports_color) {
        return reject(name, "camera has no color sensor");
      }
      const parsed = colorGainSchema.safeParse(value);
      if (!parsed.success) {
        return reject(name, "expected three non-negative numbers [r, g, b]");
      }
      return accept({ color_gain: parsed.data });
    }
  }
}

function sameValue(a: unknown, b: unknown): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => sameValue(item, b[i]));
  }
  return Object.is(a, b);
}

export interface MergedSettings {
  settings: CameraSettings;
  /** Fields whose value differs from the previous snapshot */
  changed: WritableSetting[];
}

/**
 * Apply changes to a snapshot without mutating it
 */
export function mergeSettings(current: CameraSettings, changes: SettingChanges): MergedSettings {
  const settings: CameraSettings = {
    ...current,
    exposure_ms: changes.exposure_ms ?? current.exposure_ms,
    binning_x: changes.binning_x ?? current.binning_x,
    binning_y: changes.binning_y ?? current.binning_y,
    roi_x: changes.roi_x ?? current.roi_x,
    roi_y: changes.roi_y ?? current.roi_y,
    roi_width: changes.roi_width ?? current.roi_width,
    roi_height: changes.roi_height ?? current.roi_height,
    trigger_type: changes.trigger_type ?? current.trigger_type,
    trigger_count: changes.trigger_count ?? current.trigger_count,
    frame_queue_size: changes.frame_queue_size ?? current.frame_queue_size,
    gain: changes.gain ?? current.gain,
    black_level: changes.black_level ?? current.black_level,
    freq: changes.freq ?? current.freq,
    taps: changes.taps ?? current.taps,
    color_gain: changes.color_gain ?? current.color_gain,
  };

  const changed = ALL_SETTINGS.filter((key) => !sameValue(current[key], settings[key]));
  return { settings, changed };
}

/** Frame dimensions produced by the current ROI and binning */
export function frameSize(settings: CameraSettings): [width: number, height: number] {
  return [
    Math.max(1, Math.floor(settings.roi_width / Math.max(1, settings.binning_x))),
    Math.max(1, Math.floor(settings.roi_height / Math.max(1, settings.binning_y))),
  ];
}
