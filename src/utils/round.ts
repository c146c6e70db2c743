/** Rounds to `digits` decimals, sending exact halves to the even neighbour. */
export function roundTo(value: number, digits: number): number {
  if (!Number.isFinite(value)) return value;
  const factor = 10 ** digits;
  const scaled = Math.abs(value) * factor;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;
  let whole = Math.round(scaled);
  if (fraction === 0.5) {
    whole = floor % 2 === 0 ? floor : floor + 1;
  }
  const rounded = (Math.sign(value) * whole) / factor;
  // avoid -0 leaking into reports
  return rounded === 0 ? 0 : rounded;
}
