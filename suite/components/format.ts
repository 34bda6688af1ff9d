// suite/components/format.ts
// Shared, pure formatting helpers reused by logger.ts and proc.ts

/** Default box width (characters), including the left glyph and padding. */
export const DEFAULT_BOX_WIDTH = 78;

/** Truncate without ellipsis to keep scans clean. */
export function fitLabel(label: string, maxLen: number): string {
  return label.length <= maxLen ? label : label.slice(0, maxLen);
}

export function makeRule(openGlyph: '┌' | '└', label: string, width: number): string {
  const head = `${openGlyph}─ `;
  const usable = Math.max(0, width - head.length);
  const text = fitLabel(label, usable);
  const dashes = Math.max(0, usable - text.length);
  return head + text + '─'.repeat(dashes);
}

/** "1 file" / "3 files", "2 mismatches" with an explicit plural */
export function plural(n: number, word: string, many = `${word}s`): string {
  return `${n} ${n === 1 ? word : many}`;
}

/** Normalize to POSIX separators for display and set comparisons */
export function toPosix(rel: string): string {
  return rel.replace(/\\/g, '/');
}
