const SHANGHAI = /^(sh)?6\d{5}$/;
const SHENZHEN = /^(sz)?[0-3]\d{5}$/;

export function isValidSymbol(code: string): boolean {
  const lower = code.trim().toLowerCase();
  return SHANGHAI.test(lower) || SHENZHEN.test(lower);
}

/**
 * Exchange-prefixed form of an A-share code: "600519" → "sh600519",
 * "000001" → "sz000001". Prefixed codes are lower-cased; anything else is
 * returned trimmed.
 */
export function normalizeSymbol(code: string): string {
  const trimmed = code.trim();
  const lower = trimmed.toLowerCase();
  if (lower.startsWith('sh') || lower.startsWith('sz')) return lower;
  if (/^\d{6}$/.test(trimmed)) {
    return trimmed.startsWith('6') ? `sh${trimmed}` : `sz${trimmed}`;
  }
  return trimmed;
}
