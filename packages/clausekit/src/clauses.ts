/**
 * Clause Keyword Registry
 *
 * Maps each clause slot to the keyword sequences that open it. The parser
 * uses it as lookahead to decide where a free-form clause body ends.
 */

import type { ClauseStart, Token } from "./types.ts";

type KeywordSequences = readonly (readonly string[])[];

export const CLAUSE_KEYWORDS: ReadonlyMap<Exclude<ClauseStart, "StatementEnd">, KeywordSequences> =
  new Map<Exclude<ClauseStart, "StatementEnd">, KeywordSequences>([
    ["Select", [["SELECT"], ["WITH"]]],
    ["From", [["FROM"]]],
    ["Into", [["INTO"]]],
    ["Where", [["WHERE"]]],
    ["GroupBy", [["GROUP", "BY"]]],
    ["Having", [["HAVING"]]],
    ["OrderBy", [["ORDER", "BY"]]],
    ["Limit", [["LIMIT"]]],
    ["Offset", [["OFFSET"]]],
    ["Values", [["VALUES"]]],
    ["Output", [["OUTPUT"]]],
    ["Returning", [["RETURNING"]]],
    ["Using", [["USING"]]],
    ["Set", [["SET"]]],
    ["Update", [["UPDATE"]]],
    ["Delete", [["DELETE"]]],
    ["SetOperator", [["UNION"], ["EXCEPT"], ["INTERSECT"]]],
  ]);

export function keywordSequencesFor(clause: ClauseStart): KeywordSequences {
  if (clause === "StatementEnd") return [];
  return CLAUSE_KEYWORDS.get(clause) ?? [];
}

function matchesSequence(tokens: readonly Token[], position: number, sequence: readonly string[]): boolean {
  return sequence.every((keyword, i) => tokens[position + i]?.normalizedText === keyword);
}

/**
 * Length of the keyword sequence opening `clause` at `position`, or 0.
 * StatementEnd never consumes anything.
 */
export function matchClause(tokens: readonly Token[], position: number, clause: ClauseStart): number {
  for (const sequence of keywordSequencesFor(clause)) {
    if (matchesSequence(tokens, position, sequence)) return sequence.length;
  }
  return 0;
}

export function isClauseStart(
  tokens: readonly Token[],
  position: number,
  candidates: readonly ClauseStart[]
): boolean {
  return candidates.some((clause) => {
    if (clause === "StatementEnd") {
      const next = tokens[position];
      return next === undefined || next.text === ";";
    }
    return matchClause(tokens, position, clause) > 0;
  });
}
