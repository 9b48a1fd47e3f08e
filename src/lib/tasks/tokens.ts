/**
 * Name tokenization for keyword rules
 */

/**
 * "LoginPage", "login-page" and "Login  Page" all give ["login", "page"]
 */
export function tokenize(text: string): string[] {
  return text
    .replace(/(\p{Ll}|\p{N})(\p{Lu})/gu, '$1 $2')
    .replace(/(\p{Lu}+)(\p{Lu}\p{Ll})/gu, '$1 $2')
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(token => token.length > 0);
}

function tokenMatches(token: string, keyword: string): boolean {
  return token === keyword || token === `${keyword}s`;
}

/**
 * True when `keyword` appears as a whole token (or a consecutive token run
 * for multi-word keywords). A trailing plural "s" is accepted.
 */
export function containsKeyword(tokens: readonly string[], keyword: string): boolean {
  const wanted = tokenize(keyword);
  if (wanted.length === 0 || wanted.length > tokens.length) return false;

  for (let start = 0; start + wanted.length <= tokens.length; start++) {
    const matched = wanted.every((part, offset) => {
      const token = tokens[start + offset];
      return offset === wanted.length - 1 ? tokenMatches(token, part) : token === part;
    });
    if (matched) return true;
  }
  return false;
}

export function containsAnyKeyword(tokens: readonly string[], keywords: readonly string[]): boolean {
  return keywords.some(keyword => containsKeyword(tokens, keyword));
}

/**
 * Lower-case, trimmed, single-spaced. Used to compare task descriptions.
 */
export function normalizeText(text: string): string {
  return text.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Display form of a node name: trimmed and single-spaced, case kept
 */
export function displayName(name: string): string {
  return name.trim().replace(/\s+/g, ' ');
}
