/**
 * Round a price to the nearest quarter point (.0, .25, .5, .75).
 * Non-finite input comes back unchanged.
 */
export function roundToQuarter(value: number): number {
  if (!Number.isFinite(value)) return value;

  const whole = Math.floor(value);
  const fraction = value - whole;

  if (fraction < 0.125) return whole;
  if (fraction < 0.375) return whole + 0.25;
  if (fraction < 0.625) return whole + 0.5;
  if (fraction < 0.875) return whole + 0.75;
  return whole + 1;
}
