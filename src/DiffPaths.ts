// file: src/DiffPaths.ts

// Single-character C escapes git uses in quoted paths
const C_ESCAPES: Record<string, number> = {
  a: 0x07,
  b: 0x08,
  t: 0x09,
  n: 0x0a,
  v: 0x0b,
  f: 0x0c,
  r: 0x0d,
  '"': 0x22,
  '\\': 0x5c,
};

/**
 * Decodes the body of a git-quoted path: octal escapes (e.g. `\360\237\224\216`) are raw
 * UTF-8 bytes, other characters are encoded as themselves.
 */
function unquote(body: string): string {
  const bytes: number[] = [];
  let i = 0;
  while (i < body.length) {
    if (body[i] === '\\') {
      let j = i + 1;
      let oct = '';
      // collect up to 3 octal digits
      while (j < body.length && oct.length < 3 && /[0-7]/.test(body[j])) {
        oct += body[j];
        j++;
      }
      if (oct.length > 0) {
        bytes.push(parseInt(oct, 8));
        i = j;
        continue;
      }
      const escaped = C_ESCAPES[body[i + 1]];
      if (escaped !== undefined) {
        bytes.push(escaped);
        i += 2;
        continue;
      }
      // not an escape, keep the backslash
      bytes.push(0x5c);
      i++;
    } else {
      const ch = String.fromCodePoint(body.codePointAt(i) ?? 0);
      bytes.push(...Buffer.from(ch, 'utf-8'));
      i += ch.length;
    }
  }
  return Buffer.from(bytes).toString('utf-8');
}

/**
 * Turns the path text of a `---`/`+++` marker (or a `diff --git` token) into a plain path.
 * Drops a tab-separated timestamp, unquotes, decodes escapes and strips a one-character
 * prefix such as `a/` or `w/`.
 * @param raw - Path text as it appears in the file header.
 * @returns The decoded path, or undefined for `/dev/null`.
 */
export function decodePath(raw: string): string | undefined {
  let path = raw.trim();
  const tab = path.indexOf('\t');
  if (tab !== -1) {
    path = path.slice(0, tab);
  }
  if (path === '/dev/null') {
    return undefined;
  }
  if (path.length >= 2 && path.startsWith('"') && path.endsWith('"')) {
    path = unquote(path.slice(1, -1));
  }
  return path.length > 1 && path[1] === '/' ? path.slice(2) : path;
}
