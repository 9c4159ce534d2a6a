import type { PDFFont } from "pdf-lib";

// Non-Latin-1 characters the standard fonts' WinAnsi encoding still covers
const WIN_ANSI_EXTRAS = new Set(
  "€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ".split("")
);

/**
 * Maps text onto what the standard PDF fonts can encode. Tabs become spaces,
 * everything outside WinAnsi becomes "?".
 */
export function toWinAnsi(input: string): string {
  let out = "";
  for (const char of input.replace(/\t/g, "    ")) {
    const code = char.codePointAt(0) ?? 0;
    if ((code >= 0x20 && code <= 0x7e) || (code >= 0xa0 && code <= 0xff)) {
      out += char;
    } else if (WIN_ANSI_EXTRAS.has(char)) {
      out += char;
    } else if (code === 0x0a) {
      out += "\n";
    } else {
      out += "?";
    }
  }
  return out;
}

export function wrap(
  input: string,
  width: number,
  font: PDFFont,
  size: number
): string[] {
  const out: string[] = [];
  const rows = input.replace(/\r/g, "").split("\n");

  rows.forEach((row) => {
    const line = row.trimEnd();
    if (!line.trim()) {
      out.push("");
      return;
    }

    const words = line.split(/\s+/);
    let current = "";

    words.forEach((word) => {
      const next = current ? `${current} ${word}` : word;
      if (font.widthOfTextAtSize(next, size) <= width) {
        current = next;
        return;
      }

      if (current) out.push(current);
      if (font.widthOfTextAtSize(word, size) <= width) {
        current = word;
        return;
      }

      const pieces = split(word, width, font, size);
      out.push(...pieces.slice(0, -1));
      current = pieces[pieces.length - 1] ?? "";
    });

    if (current) out.push(current);
  });

  return out;
}

function split(
  word: string,
  width: number,
  font: PDFFont,
  size: number
): string[] {
  const out: string[] = [];
  let current = "";
  for (const char of word) {
    const next = `${current}${char}`;
    if (font.widthOfTextAtSize(next, size) <= width) {
      current = next;
      continue;
    }
    if (current) out.push(current);
    current = char;
  }
  if (current) out.push(current);
  return out;
}

/**
 * Shortens `input` with an ellipsis so it fits in `width`.
 */
export function truncate(
  input: string,
  width: number,
  font: PDFFont,
  size: number
): string {
  if (font.widthOfTextAtSize(input, size) <= width) return input;
  let current = input;
  while (current.length > 0 && font.widthOfTextAtSize(`${current}...`, size) > width) {
    current = current.slice(0, -1);
  }
  return `${current.trimEnd()}...`;
}
