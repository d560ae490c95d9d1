export type StripStrategy =
  /** Keep the text after the first occurrence. */
  | "keep-after"
  /** Keep the text before the first occurrence. */
  | "keep-before"
  /** Delete every occurrence. */
  | "remove"
  /** Drop the first line if it contains the marker. */
  | "drop-leading-line";

export type CleanupRule = {
  marker: string;
  strategy: StripStrategy;
};

/** Framing the engine CLI wraps around an agent's answer, in application order. */
export const DEFAULT_CLEANUP_RULES: readonly CleanupRule[] = [
  { marker: "Completed:", strategy: "keep-after" },
  { marker: "Stopping backend", strategy: "keep-before" },
  { marker: "🔄", strategy: "keep-before" },
  { marker: "<|eot_id|>", strategy: "remove" },
  { marker: "Inferlet launched", strategy: "drop-leading-line" },
];

function applyRule(text: string, rule: CleanupRule): string {
  const idx = text.indexOf(rule.marker);
  switch (rule.strategy) {
    case "keep-after":
      return idx === -1 ? text : text.slice(idx + rule.marker.length);
    case "keep-before":
      return idx === -1 ? text : text.slice(0, idx);
    case "remove":
      return idx === -1 ? text : text.split(rule.marker).join("");
    case "drop-leading-line": {
      const lines = text.split("\n");
      return lines[0]?.includes(rule.marker) ? lines.slice(1).join("\n") : text;
    }
  }
}

/** Best-effort removal of engine framing. Pure; any marker may be absent. */
export function normalizeOutput(raw: string, rules: readonly CleanupRule[] = DEFAULT_CLEANUP_RULES): string {
  let text = raw.trim();
  for (const rule of rules) {
    text = applyRule(text, rule).trim();
  }
  return text;
}
