import Decimal from 'decimal.js';

export { Decimal };

/** Finite decimal or null. Rejects 'NaN', 'Infinity' and the like. */
export function parseDecimal(value: unknown): Decimal | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    return new Decimal(value);
  }
  if (typeof value !== 'string') return null;

  const s = value.trim().replace(',', '.');
  // plain decimal notation only; Decimal would also take hex/binary literals
  if (!/^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i.test(s)) return null;

  const d = new Decimal(s);
  return d.isFinite() ? d : null;
}
