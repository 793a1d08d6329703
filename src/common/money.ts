/** Ringgit display used in every reply, e.g. RM1234.50 */
export function formatRinggit(amount: number): string {
  return `RM${amount.toFixed(2)}`;
}

/**
 * First positive number in free text ("about rm1,200.50 please" -> 1200.5).
 * Null when there is none or it is zero.
 */
export function parsePositiveAmount(text: string): number | null {
  const match = text.match(/(\d[\d,]*(?:\.\d+)?)/);
  if (!match) return null;
  const amount = Number(match[1].replace(/,/g, ''));
  return Number.isFinite(amount) && amount > 0 ? amount : null;
}
