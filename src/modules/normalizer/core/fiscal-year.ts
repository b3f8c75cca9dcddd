const FISCAL_YEAR_RE = /^(?:FY\s*)?(\d{4}|\d{2})$/i;

/**
 * Accepts `2023`, `FY2023`, `FY 23` and `23`. Two-digit years are 20xx.
 */
export const parseFiscalYear = (raw: string): number | null => {
  const match = FISCAL_YEAR_RE.exec(raw.trim());
  const digits = match?.[1];
  if (digits === undefined) {
    return null;
  }

  const year = Number.parseInt(digits, 10);
  return digits.length === 2 ? 2000 + year : year;
};
