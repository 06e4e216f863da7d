import type { Anomaly } from "../../core/src/schema.js";
import type { ExplanationLine } from "./lines.js";
import { fmt, money } from "./lines.js";

export type AnomalyExplanation = {
  date: string;
  lines: ExplanationLine[];
};

export function explainAnomalies(anomalies: readonly Anomaly[]): AnomalyExplanation[] {
  return anomalies.map((a) => {
    const lines: ExplanationLine[] = [
      { kind: "INPUT", text: `Amount ${money(a.amount)} on ${a.date}` },
      {
        kind: "INPUT",
        text: `Baseline mean ${fmt(a.baseline_mean)}, stddev ${fmt(a.baseline_stddev)}`,
      },
      {
        kind: "COMPUTE",
        text: `z = (${fmt(a.amount)} - ${fmt(a.baseline_mean)}) / stddev = ${fmt(a.z_score)}`,
      },
      {
        kind: "COMPUTE",
        text: `IQR bounds [${fmt(a.iqr_lower)}, ${fmt(a.iqr_upper)}]`,
      },
      { kind: "RESULT", text: `${a.severity} severity via ${a.rules.join(" + ")}` },
    ];
    if (a.baseline_flat) {
      lines.push({ kind: "NOTE", text: "Baseline was flat; z measured against the stddev floor" });
    }
    return { date: a.date, lines };
  });
}
