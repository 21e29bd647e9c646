// datelex/language/joiner - Reassemble tokens into text

/**
 * Concatenate tokens with `separator`, except around capturing tokens which
 * attach directly to both neighbours.
 */
export function joinTokens(tokens: readonly string[], separator: string, capturing: ReadonlySet<string>): string {
  if (tokens.length === 0) return '';

  let joined = tokens[0];
  for (let i = 1; i < tokens.length; i++) {
    const left = tokens[i - 1];
    const right = tokens[i];
    if (!capturing.has(left) && !capturing.has(right)) {
      joined += separator;
    }
    joined += right;
  }
  return joined;
}
