const CURRENCY_AMOUNT = /[£$€]([\d,]+)/;
const BARE_NUMBER = /(\d{2,6})/;

/**
 * Best-effort salary estimate from free text. Ranges yield their first figure;
 * anything unrecognised (e.g. "Competitive") yields 0.
 *
 * @example parseSalaryAmount('£45,000 - £55,000 per annum') // 45000
 */
export function parseSalaryAmount(text: string | null | undefined): number {
  if (!text) return 0;

  const currency = text.replace(/\s+/g, '').match(CURRENCY_AMOUNT);
  if (currency) {
    const amount = parseInt(currency[1].replace(/,/g, ''), 10);
    if (!Number.isNaN(amount)) return amount;
  }

  const bare = text.replace(/,/g, '').match(BARE_NUMBER);
  if (bare) return parseInt(bare[1], 10);

  return 0;
}

export interface SalaryRange {
  min: number;
  max: number;
  average: number;
}

/** A range needs two currency figures, e.g. "£60,000 - £75,000". */
export function parseSalaryRange(text: string | null | undefined): SalaryRange | null {
  if (!text) return null;

  const amounts = [...text.replace(/\s+/g, '').matchAll(/[£$€]([\d,]+)/g)]
    .map(match => parseInt(match[1].replace(/,/g, ''), 10))
    .filter(amount => !Number.isNaN(amount));
  if (amounts.length < 2) return null;

  const min = Math.min(amounts[0], amounts[1]);
  const max = Math.max(amounts[0], amounts[1]);
  return { min, max, average: (min + max) / 2 };
}
