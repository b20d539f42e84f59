export type WaterBalanceSource = "INIT" | "PROJECTED" | "RECONCILED" | "IRRIGATION";

export type WaterBalanceStateV1 = {
  zone_id: string;
  smd_mm: number; // deficit below field capacity, 0..whc_effective_mm
  whc_effective_mm: number;
  cumulative_et_mm: number; // since the last irrigation event
  cumulative_rain_mm: number; // since the last irrigation event
  last_update_ts: number;
  last_observation_ts: number | null;
  last_irrigation_ts: number | null;
  source: WaterBalanceSource;
};
