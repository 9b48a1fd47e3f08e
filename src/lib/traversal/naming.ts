/**
 * Export file naming
 */

// Reserved on at least one common filesystem, plus ASCII control characters
// eslint-disable-next-line no-control-regex
const ILLEGAL_CHARS = /[<>:"/\\|?*\u0000-\u001f]/g;
const MAX_NAME_LENGTH = 100;

export const UNNAMED = 'unnamed';

/**
 * Make a display name safe to use as a file basename.
 *
 * "  Login Page " -> "Login_Page", "a/b" -> "a_b", "" -> "unnamed"
 */
export function sanitizeName(name: string): string {
  const replaced = name.trim().replace(ILLEGAL_CHARS, '_').replace(/\s+/g, '_');
  // Count code points so a surrogate pair is never split
  const cleaned = Array.from(replaced).slice(0, MAX_NAME_LENGTH).join('');

  if (cleaned === '' || /^\.+$/.test(cleaned)) {
    return UNNAMED;
  }
  return cleaned;
}

/**
 * Hands out collision-free names for one traversal run. The first claim of
 * a name keeps it; later claims get `_2`, `_3`, ... Names are compared
 * case-insensitively so that "Card" and "card" never share a file on a
 * case-folding filesystem.
 */
export class NameRegistry {
  private used = new Set<string>();
  private nextSuffix = new Map<string, number>();

  claim(base: string): string {
    const key = base.toLowerCase();
    if (!this.used.has(key)) {
      this.used.add(key);
      return base;
    }

    let suffix = this.nextSuffix.get(key) ?? 2;
    let candidate = `${base}_${suffix}`;
    // A literal "Card_2" earlier in the run already owns that name
    while (this.used.has(candidate.toLowerCase())) {
      suffix++;
      candidate = `${base}_${suffix}`;
    }

    this.nextSuffix.set(key, suffix + 1);
    this.used.add(candidate.toLowerCase());
    return candidate;
  }

  has(name: string): boolean {
    return this.used.has(name.toLowerCase());
  }
}
