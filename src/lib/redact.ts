/** Keeps the token type prefix (`xoxb-`, `xoxp-`) and the last four characters. */
export function redactToken(token: string): string {
  const prefix = /^xox[a-z]-/.exec(token)?.[0] ?? "";
  const rest = token.slice(prefix.length);
  if (rest.length <= 8) {
    return `${prefix}[redacted]`;
  }
  return `${prefix}…${rest.slice(-4)}`;
}
