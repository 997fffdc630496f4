/**
 * VIN check-digit validation (ISO 3779 / FMVSS 115 scheme).
 * Pure functions, no I/O: safe to call from anywhere before a paid lookup.
 */

export type VinValidationFailure = "format" | "checksum";

/** Case-insensitive without the u flag, so non-ASCII letters never fold into the alphabet. */
const VIN_PATTERN = /^[A-HJ-NPR-Z0-9]{17}$/i;

/** Position weights; the check digit slot (index 8) weighs 0. */
const WEIGHTS: readonly number[] = Object.freeze([
  8, 7, 6, 5, 4, 3, 2, 10, 0, 9, 8, 7, 6, 5, 4, 3, 2,
]);

const TRANSLITERATIONS: Readonly<Record<string, number>> = Object.freeze({
  A: 1, B: 2, C: 3, D: 4, E: 5, F: 6, G: 7, H: 8,
  J: 1, K: 2, L: 3, M: 4, N: 5, P: 7, R: 9, S: 2,
  T: 3, U: 4, V: 5, W: 6, X: 7, Y: 8, Z: 9,
});

const CHECK_DIGIT_INDEX = 8;

function charValue(char: string): number {
  if (char >= "0" && char <= "9") return char.charCodeAt(0) - 48;
  return TRANSLITERATIONS[char] ?? 0;
}

/** Expected check character for an already well-formed, upper-case VIN. */
function expectedCheckChar(vin: string): string {
  let sum = 0;
  for (let i = 0; i < vin.length; i++) {
    sum += charValue(vin[i]) * WEIGHTS[i];
  }
  const checkDigit = sum % 11;
  return checkDigit === 10 ? "X" : String(checkDigit);
}

/**
 * True when the string is 17 characters of the VIN alphabet (I, O and Q excluded), any case.
 * Checked before any case mapping: toUpperCase() turns "ß" into "SS" and "ſ" into "S".
 */
export function hasValidVinFormat(vin: string): boolean {
  return typeof vin === "string" && VIN_PATTERN.test(vin);
}

/**
 * Why a VIN fails validation, or null when it passes.
 * Lets callers tell a malformed string from a transcription error.
 */
export function vinValidationFailure(vin: string): VinValidationFailure | null {
  if (!hasValidVinFormat(vin)) return "format";
  const normalized = vin.toUpperCase();
  return normalized[CHECK_DIGIT_INDEX] === expectedCheckChar(normalized) ? null : "checksum";
}

/** Verifies a VIN's embedded check digit. Never throws; malformed input is simply invalid. */
export function isValidVin(vin: string): boolean {
  return vinValidationFailure(vin) === null;
}
