const BP_UNITS: ReadonlyArray<[number, string]> = [
  [1e9, 'G'],
  [1e6, 'M'],
  [1e3, 'k'],
];

/** Axis label for a base-pair position: 1500 -> "2k", 2500000 -> "3M" */
export function formatBp(x: number, { accuracy = 1, unit = '', sep = '' } = {}): string {
  const [scale, suffix] = BP_UNITS.find(([limit]) => Math.abs(x) >= limit) ?? [1, ''];
  const digits = Math.max(0, -Math.floor(Math.log10(accuracy)));
  const value = Math.round(x / scale / accuracy) * accuracy;
  const label = suffix || unit ? `${sep}${suffix}${unit}` : '';
  return `${Number(value.toFixed(digits))}${label}`;
}
