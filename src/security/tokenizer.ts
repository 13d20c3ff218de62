export type TokenizeResult =
  | { ok: true; tokens: string[] }
  | { ok: false; error: string };

/** Characters a backslash may escape inside double quotes. */
const DOUBLE_QUOTE_ESCAPABLE = new Set(["\\", '"', "$", "`", "\n"]);

/**
 * Split a command line into words using POSIX shell quoting rules.
 *
 * Only word splitting is performed: operators such as `;` or `|` stay inside the
 * word they touch, and nothing is expanded. Unterminated quotes and a trailing
 * backslash make the input unparsable.
 */
export function tokenize(command: string): TokenizeResult {
  const tokens: string[] = [];
  let current = "";
  let inWord = false;
  let quote: "'" | '"' | null = null;
  let i = 0;

  while (i < command.length) {
    const ch = command[i];

    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      i++;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
        i++;
        continue;
      }
      if (ch === "\\" && i + 1 < command.length) {
        const next = command[i + 1];
        if (DOUBLE_QUOTE_ESCAPABLE.has(next)) {
          if (next !== "\n") current += next;
          i += 2;
          continue;
        }
      }
      current += ch;
      i++;
      continue;
    }

    if (ch === "\\") {
      if (i + 1 >= command.length) {
        return { ok: false, error: "No escaped character" };
      }
      const next = command[i + 1];
      // Backslash-newline is a line continuation.
      if (next !== "\n") {
        current += next;
        inWord = true;
      }
      i += 2;
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
      i++;
      continue;
    }

    if (ch === " " || ch === "\t" || ch === "\n" || ch === "\r") {
      if (inWord) {
        tokens.push(current);
        current = "";
        inWord = false;
      }
      i++;
      continue;
    }

    current += ch;
    inWord = true;
    i++;
  }

  if (quote !== null) {
    return { ok: false, error: "No closing quotation" };
  }
  if (inWord) tokens.push(current);
  return { ok: true, tokens };
}
