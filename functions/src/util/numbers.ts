/** True for real numbers; NaN and numeric strings do not count. */
export const isNumber = (value: unknown): value is number =>
  typeof value === "number" && !Number.isNaN(value);

/**
 * Rounds to the nearest integer, sending exact halves to the even neighbour
 * (2.5 -> 2, 3.5 -> 4).
 */
export const roundHalfEven = (value: number): number => {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
};

export const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

export const formatDollars = (value: number): string => `$${value.toFixed(2)}`;
