export type ExplanationLine = {
  kind: "INPUT" | "COMPUTE" | "RESULT" | "NOTE";
  text: string;
};

export function fmt(v: number | null | undefined): string {
  if (v === null || v === undefined || Number.isNaN(v)) return "null";
  return Number.isInteger(v) ? String(v) : v.toFixed(2);
}

export function money(v: number): string {
  return `$${v.toFixed(2)}`;
}

export function signedPct(v: number): string {
  return `${v >= 0 ? "+" : ""}${v.toFixed(1)}%`;
}

export function renderLines(lines: readonly ExplanationLine[]): string {
  return lines.map((l) => `${l.kind.padEnd(7)} ${l.text}`).join("\n");
}
