/**
 * Saturation vapour pressure (kPa) at air temperature `tC`, Tetens form.
 */
export function saturationVaporPressureKpa(tC: number): number {
  return 0.6108 * Math.exp((17.27 * tC) / (tC + 237.3));
}

/**
 * Vapour pressure deficit (kPa) from air temperature and relative humidity (%).
 */
export function vpdFromRelativeHumidity(airTempC: number, rhPct: number): number {
  const es = saturationVaporPressureKpa(airTempC);
  return Math.max(0, es * (1 - rhPct / 100));
}
