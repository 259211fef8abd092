/**
 * Canonical comparison key for a workstation name: trimmed, NFC-composed and
 * lower-cased.  `toLowerCase` rather than `toLocaleLowerCase` keeps the key
 * independent of the host locale.  Lower-casing can leave a sequence that NFC
 * composes (capital omega + perispomeni), hence the second pass.
 */
export function normalizeName(raw: string): string {
  return raw.trim().normalize('NFC').toLowerCase().normalize('NFC');
}

export function isBlankName(raw: string): boolean {
  return raw.trim() === '';
}
