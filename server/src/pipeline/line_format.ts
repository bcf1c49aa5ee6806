// Helpers for the `KEY: value` response format shared by the judge and the fact checker.

const KEY_LINE = /^\s*(?:[-*#>]+\s*|\d+[.)]\s*)?\**\s*([A-Za-z][A-Za-z _-]*?)\s*\**\s*:\s*(.*)$/;

function normalizeKey(key: string): string {
  return key.trim().toUpperCase().replace(/[\s-]+/g, "_");
}

function cleanValue(value: string): string {
  return value.replace(/^\*+\s*/, "").replace(/\s*\*+$/, "").trim();
}

type KeyLine = { index: number; key: string; value: string };

function keyLines(text: string): KeyLine[] {
  const out: KeyLine[] = [];
  const lines = text.replace(/\r\n/g, "\n").split("\n");
  lines.forEach((line, index) => {
    const m = KEY_LINE.exec(line);
    if (!m) return;
    out.push({ index, key: normalizeKey(m[1] ?? ""), value: cleanValue(m[2] ?? "") });
  });
  return out;
}

/**
 * First value per key. Keys are upper-cased with spaces/hyphens folded to `_`,
 * so "Overall score" and "OVERALL_SCORE" collide on purpose.
 */
export function parseKeyValueLines(text: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const line of keyLines(text)) {
    if (!(line.key in fields)) fields[line.key] = line.value;
  }
  return fields;
}

/** Value of `key` plus every line after it; used for free-text trailers like FEEDBACK. */
export function trailingSection(text: string, key: string): string | null {
  const wanted = normalizeKey(key);
  const hit = keyLines(text).find((line) => line.key === wanted);
  if (!hit) return null;
  const rest = text.replace(/\r\n/g, "\n").split("\n").slice(hit.index + 1);
  const section = [hit.value, ...rest].join("\n").trim();
  return section.length > 0 ? section : null;
}

/** Parses "8", "8.5/10" or "8 out of 10"; anything else (or out of range) yields `fallback`. */
export function parseScore(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const head = value.split("/")[0] ?? "";
  const m = /-?\d+(?:\.\d+)?/.exec(head);
  if (!m) return fallback;
  const n = Number(m[0]);
  if (!Number.isFinite(n) || n < 0 || n > 10) return fallback;
  return n;
}
