// Redis KEYS/SCAN MATCH semantics: * ? [abc] [^a] [a-z] and backslash escapes.
export function globToRegExp(pattern: string): RegExp {
  let out = "";
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];
    if (ch === "\\" && i + 1 < pattern.length) {
      out += escapeRegExp(pattern[i + 1]);
      i += 2;
      continue;
    }
    if (ch === "*") {
      out += "[\\s\\S]*";
    } else if (ch === "?") {
      out += "[\\s\\S]";
    } else if (ch === "[") {
      const close = pattern.indexOf("]", i + 1);
      if (close === -1) {
        out += "\\[";
      } else {
        let body = pattern.slice(i + 1, close);
        const negate = body.startsWith("^");
        if (negate) body = body.slice(1);
        out += `[${negate ? "^" : ""}${body.replace(/[\]\\]/g, "\\$&")}]`;
        i = close + 1;
        continue;
      }
    } else {
      out += escapeRegExp(ch);
    }
    i += 1;
  }
  return new RegExp(`^${out}$`);
}

export function escapeGlob(literal: string): string {
  return literal.replace(/[*?[\]\\]/g, "\\$&");
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\/-]/g, "\\$&");
}
