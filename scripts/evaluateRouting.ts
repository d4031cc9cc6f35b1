import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { DEFAULT_LOCAL_KEYWORDS, DEFAULT_REALTIME_KEYWORDS } from "../src/config/env.js";
import { ROUTING_POLICIES } from "../src/domain/types.js";
import { decideByRules } from "../src/pipelines/routing.js";

const casesSchema = z.array(
  z.object({
    query: z.string().min(1),
    expected: z.enum(ROUTING_POLICIES),
  }),
);

async function main() {
  const casesPath = path.resolve(process.argv[2] ?? "eval/routing-cases.json");
  const cases = casesSchema.parse(JSON.parse(await readFile(casesPath, "utf-8")));
  const rules = {
    localKeywords: DEFAULT_LOCAL_KEYWORDS,
    realtimeKeywords: DEFAULT_REALTIME_KEYWORDS,
  };

  const rows = cases.map((item) => {
    const outcome = decideByRules(item.query, rules);
    // Without a classifier, deferred queries resolve to hybrid.
    const predicted = outcome.kind === "decided" ? outcome.decision.policy : "hybrid";
    return {
      query: item.query,
      expected: item.expected,
      predicted,
      rule: outcome.rule,
      decided: outcome.kind === "decided",
      correct: predicted === item.expected,
    };
  });

  const decided = rows.filter((row) => row.decided);
  const summary = {
    cases: rows.length,
    accuracy: ratio(rows.filter((row) => row.correct).length, rows.length),
    rule_decided: decided.length,
    rule_precision: ratio(decided.filter((row) => row.correct).length, decided.length),
    deferred_to_classifier: rows.length - decided.length,
  };

  const misses = rows.filter((row) => !row.correct);
  process.stdout.write(`${JSON.stringify({ summary, misses }, null, 2)}\n`);
}

function ratio(numerator: number, denominator: number): number {
  if (denominator === 0) {
    return 0;
  }
  return Number((numerator / denominator).toFixed(4));
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Routing evaluation failed: ${message}\n`);
  process.exit(1);
});
