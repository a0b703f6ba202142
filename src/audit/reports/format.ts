/**
 * Shared text helpers for the plain-text reports
 */

export const RULE_WIDTH = 60;

export function checkMark(ok: boolean): string {
  return ok ? '✅' : '❌';
}

export function yesNo(ok: boolean): string {
  return ok ? '✅ YES' : '❌ NO';
}

/**
 * Blank line plus a title framed by "=" rules
 */
export function heading(title: string): string[] {
  const rule = '='.repeat(RULE_WIDTH);
  return ['', rule, title, rule];
}

/**
 * Decimal terabyte label for a byte threshold: 1e12 -> "1TB", 5e11 -> "0.5TB"
 */
export function formatSizeLabel(bytes: number): string {
  return `${Number((bytes / 1000 ** 4).toFixed(2))}TB`;
}
