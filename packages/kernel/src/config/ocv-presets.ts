/**
 * Meshconf Kernel: Battery OCV Presets
 *
 * Open-circuit-voltage curves used to turn a battery reading in millivolts
 * into a charge percentage. Each curve has 11 points: 100%, 90%, ... 0%,
 * strictly descending.
 *
 * A device selects a curve through its `ocv_preset` field. The preset
 * 'custom' means the curve is read from `custom_ocv_array` instead.
 */

import { CUSTOM_OCV_ARRAY_FIELD, OCV_PRESET_FIELD } from '../types/device.js';
import type { DeviceConfig } from '../types/device.js';

/** Number of points in every OCV curve. */
export const OCV_POINTS = 11;

/** Preset name that defers to the device's custom curve. */
export const CUSTOM_OCV_PRESET = 'custom';

export interface OcvPreset {
  readonly name: string;
  readonly displayName: string;
  /** Millivolts at 100%, 90%, ... 0%. */
  readonly curve: ReadonlyArray<number>;
}

export const OCV_PRESETS: ReadonlyArray<OcvPreset> = [
  { name: 'liIon', displayName: 'Li-Ion (Default)', curve: [4190, 4050, 3990, 3890, 3800, 3720, 3630, 3530, 3420, 3300, 3100] },
  { name: 'liFePO4', displayName: 'LiFePO4', curve: [3400, 3350, 3320, 3290, 3270, 3260, 3250, 3230, 3200, 3120, 3000] },
  { name: 'leadAcid', displayName: 'Lead Acid', curve: [2120, 2090, 2070, 2050, 2030, 2010, 1990, 1980, 1970, 1960, 1950] },
  { name: 'alkaline', displayName: 'Alkaline', curve: [1580, 1400, 1350, 1300, 1280, 1250, 1230, 1190, 1150, 1100, 1000] },
  { name: 'niMH', displayName: 'NiMH', curve: [1400, 1300, 1280, 1270, 1260, 1250, 1240, 1230, 1210, 1150, 1000] },
  { name: 'lto', displayName: 'LTO', curve: [2700, 2560, 2540, 2520, 2500, 2460, 2420, 2400, 2380, 2320, 1500] },
  { name: 'trackerT1000E', displayName: 'Tracker T1000-E', curve: [4190, 4042, 3957, 3885, 3820, 3776, 3746, 3725, 3696, 3644, 3100] },
  { name: 'heltecPocket5000', displayName: 'Heltec Pocket 5000', curve: [4300, 4240, 4120, 4000, 3888, 3800, 3740, 3698, 3655, 3580, 3400] },
  { name: 'heltecPocket10000', displayName: 'Heltec Pocket 10000', curve: [4100, 4060, 3960, 3840, 3729, 3625, 3550, 3500, 3420, 3345, 3100] },
  { name: 'seeedWioTracker', displayName: 'Seeed WIO Tracker', curve: [4200, 3876, 3826, 3763, 3713, 3660, 3573, 3485, 3422, 3359, 3300] },
  { name: 'seeedSolarNode', displayName: 'Seeed Solar Node', curve: [4200, 3986, 3922, 3812, 3734, 3645, 3527, 3420, 3281, 3087, 2786] },
  { name: 'r1Neo', displayName: 'R1 Neo', curve: [4330, 4292, 4254, 4216, 4178, 4140, 4102, 4064, 4026, 3988, 3950] },
  { name: 'wisMeshTag', displayName: 'WisMesh Tag', curve: [4240, 4112, 4029, 3970, 3906, 3846, 3824, 3802, 3776, 3650, 3072] },
];

/** Curve used when a device has no (or an unknown) preset. */
export const DEFAULT_OCV_CURVE: ReadonlyArray<number> = OCV_PRESETS[0]?.curve ?? [];

/** Look up a named preset. 'custom' is not a named preset. */
export function findOcvPreset(name: string): OcvPreset | undefined {
  return OCV_PRESETS.find((p) => p.name === name);
}

/** True for every name accepted in the `ocv_preset` field, including 'custom'. */
export function isOcvPresetName(name: string): boolean {
  return name === CUSTOM_OCV_PRESET || findOcvPreset(name) !== undefined;
}

/**
 * Parse a comma-separated custom curve ("4190, 4050, ...").
 * Returns null unless it yields exactly 11 integers.
 */
export function parseCustomOcvArray(text: string): number[] | null {
  const parts = text.split(',').map((p) => p.trim());
  if (parts.length !== OCV_POINTS) return null;
  const values: number[] = [];
  for (const part of parts) {
    if (!/^-?\d+$/.test(part)) return null;
    values.push(Number(part));
  }
  return values;
}

/**
 * The curve in effect for a device: the custom array when the preset is
 * 'custom' and the array parses, otherwise the named preset, otherwise Li-Ion.
 */
export function activeOcvCurve(config: DeviceConfig): ReadonlyArray<number> {
  const preset = config.fields[OCV_PRESET_FIELD];
  const custom = config.fields[CUSTOM_OCV_ARRAY_FIELD];

  if (preset === CUSTOM_OCV_PRESET && typeof custom === 'string') {
    const parsed = parseCustomOcvArray(custom);
    if (parsed !== null) return parsed;
  }
  if (typeof preset === 'string') {
    const named = findOcvPreset(preset);
    if (named !== undefined) return named.curve;
  }
  return DEFAULT_OCV_CURVE;
}

/**
 * Convert a battery reading to a percentage on `curve`, interpolating
 * linearly inside each 10% segment and clamping to 0..100.
 *
 * A curve without exactly 11 points yields null.
 */
export function batteryPercentage(millivolts: number, curve: ReadonlyArray<number>): number | null {
  if (curve.length !== OCV_POINTS) return null;
  const top = curve[0] ?? 0;
  const bottom = curve[OCV_POINTS - 1] ?? 0;
  if (millivolts >= top) return 100;
  if (millivolts <= bottom) return 0;

  for (let i = 0; i < OCV_POINTS - 1; i++) {
    const upper = curve[i] ?? 0;
    const lower = curve[i + 1] ?? 0;
    if (millivolts >= lower) {
      const base = (OCV_POINTS - 2 - i) * 10;
      if (upper <= lower) return base;
      const fraction = (millivolts - lower) / (upper - lower);
      return base + Math.round(fraction * 10);
    }
  }
  return 0;
}
