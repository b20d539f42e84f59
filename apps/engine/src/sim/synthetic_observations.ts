// Synthetic sensor data for demos and backtests.
//
// Hourly records that show gradual drying from ET (faster near the surface),
// rain events with depth-lagged infiltration, diurnal air temperature and a
// canopy temperature that rises with moisture stress. Deterministic for a
// given seed.

import type { DepthKey, RawObservationV1, SoilTexture } from "@irrigate/contracts";
import { TEXTURE_PROPERTIES } from "@irrigate/decision-kernel";

export const HOUR_MS = 3_600_000;
const MM_PER_INCH = 25.4;

// ET depletion relative to the 6" layer.
const DEPLETION_FACTORS: Readonly<Record<DepthKey, number>> = { "6in": 1.0, "12in": 0.6, "18in": 0.3 };
// Immediate share of a rain event (inches) reaching each depth, as VWC.
const RAIN_RESPONSE: Readonly<Record<DepthKey, number>> = { "6in": 0.08, "12in": 0.04, "18in": 0.02 };
// Delayed infiltration over the 12 hours after the event.
const RAIN_LAG: Readonly<Record<DepthKey, number>> = { "6in": 0, "12in": 0.003, "18in": 0.002 };
const DEPTHS: ReadonlyArray<DepthKey> = ["6in", "12in", "18in"];

const BASE_ET_IN_PER_HOUR = 0.012;
const MOISTURE_NOISE_STD = 0.015;
const TEMP_NOISE_STD = 0.8;

export type SyntheticOptions = {
  zoneId: string;
  texture: SoilTexture;
  endTs: number; // floored to the hour
  days?: number;
  includeRainEvents?: boolean;
  seed?: number;
};

export function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function gaussian(rand: () => number, std: number): number {
  // Box-Muller; 1 - u keeps the log argument in (0, 1].
  const u = 1 - rand();
  const v = rand();
  return std * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

function round(x: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(x * f) / f;
}

function clip(x: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, x));
}

function pickRainEvents(rand: () => number, nHours: number): Map<number, number> {
  const events = new Map<number, number>();
  const lo = 24;
  const hi = nHours - 24;
  if (hi - lo < 4) return events;

  const count = 2 + Math.floor(rand() * 3); // 2..4
  while (events.size < count) {
    const hour = lo + Math.floor(rand() * (hi - lo));
    if (events.has(hour)) continue;
    events.set(hour, 0.2 + rand() * 0.8); // inches
  }
  return events;
}

export function generateSyntheticObservations(opts: SyntheticOptions): RawObservationV1[] {
  const days = opts.days ?? 14;
  const rand = mulberry32(opts.seed ?? 42);
  const { field_capacity: fc, wilting_point: pwp } = TEXTURE_PROPERTIES[opts.texture];
  const taw = fc - pwp;

  const endTs = Math.floor(opts.endTs / HOUR_MS) * HOUR_MS;
  const nHours = days * 24 + 1;
  const startTs = endTs - days * 24 * HOUR_MS;

  const rain = opts.includeRainEvents === false ? new Map<number, number>() : pickRainEvents(rand, nHours);

  // Noise-free moisture trajectory per depth.
  const sm: Record<DepthKey, number[]> = { "6in": [], "12in": [], "18in": [] };
  const initial = pwp + 0.7 * taw;
  for (const d of DEPTHS) sm[d].push(initial);

  for (let i = 1; i < nHours; i++) {
    const hour = new Date(startTs + i * HOUR_MS).getUTCHours();
    const diurnal = hour >= 6 && hour <= 20 ? Math.sin((Math.PI * (hour - 6)) / 14) : 0;
    const etVolumetric = (BASE_ET_IN_PER_HOUR * diurnal) / 6;

    for (const d of DEPTHS) {
      let v = (sm[d][i - 1] ?? initial) - etVolumetric * DEPLETION_FACTORS[d];
      for (const [eventHour, amount] of rain) {
        if (i === eventHour) {
          v += amount * RAIN_RESPONSE[d];
        } else if (eventHour < i && i < eventHour + 12) {
          v += (amount * RAIN_LAG[d] * (12 - (i - eventHour))) / 12;
        }
      }
      sm[d].push(clip(v, pwp * 0.8, fc * 1.05));
    }
  }

  const out: RawObservationV1[] = [];
  for (let i = 0; i < nHours; i++) {
    const ts = startTs + i * HOUR_MS;
    const hour = new Date(ts).getUTCHours();

    const vwc: Partial<Record<DepthKey, number>> = {};
    for (const d of DEPTHS) {
      vwc[d] = round(clip((sm[d][i] ?? initial) + gaussian(rand, MOISTURE_NOISE_STD), 0, 1), 4);
    }

    const daytime = hour >= 6 && hour <= 18;
    const air = (daytime ? 30 + 8 * Math.sin((Math.PI * (hour - 6)) / 12) : 30 - 4) + gaussian(rand, TEMP_NOISE_STD);

    // Canopy runs from ~2 C below air when wet to ~5 C above when dry.
    const shallow = ((sm["6in"][i] ?? initial) + (sm["12in"][i] ?? initial)) / 2;
    const stress = clip(1 - (shallow - pwp) / taw, 0, 1);
    const canopy = air + (-2 + 7 * stress) + gaussian(rand, TEMP_NOISE_STD * 0.5);

    const rh = clip((daytime ? 65 - 30 * Math.sin((Math.PI * (hour - 6)) / 12) : 70) + gaussian(rand, 3), 5, 100);
    const rainInches = rain.get(i);

    out.push({
      type: "observation_v1",
      zone_id: opts.zoneId,
      ts_ms: ts,
      vwc,
      canopy_temp_c: round(canopy, 1),
      air_temp_c: round(air, 1),
      rh_pct: round(rh, 0),
      rainfall_mm: rainInches === undefined ? 0 : round(rainInches * MM_PER_INCH, 1),
    });
  }
  return out;
}
