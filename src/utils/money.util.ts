/** Round half away from zero to two decimal places. */
export function round2(value: number): number {
  const scaled = Math.round(Math.abs(value) * 100 + Number.EPSILON * 100);
  return (Math.sign(value) * scaled) / 100;
}

/** GST percentage (18) to the fraction used by invoices (0.18). */
export function percentToRate(percentage: number): number {
  return percentage / 100;
}
