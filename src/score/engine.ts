import { BudgetBucket, CandidateRecord, DeadlineBucket, Decision, ScoredRecord } from "../types";
import { budgetBucket, deadlineBucket } from "./buckets";
import { extractBudget } from "./budget";
import { normalizeDeadline } from "./deadline";

/**
 * Turns a candidate into a scored record. The rules engine is the only
 * implementation; anything that can produce the same fields can stand in.
 */
export interface OpportunityScorer {
  score(candidate: CandidateRecord, now: Date): ScoredRecord;
}

type TagFields = Partial<Pick<ScoredRecord, "decision" | "buyerType" | "budgetBucket" | "region" | "deadlineBucket">>;

export function decide(deadline: DeadlineBucket, budget: BudgetBucket): Decision {
  if (deadline === "planning" && (budget === "mid" || budget === "enterprise")) {
    return "GO";
  }
  if ((deadline === "near_term" || deadline === "planning") && (budget === "small" || budget === "mid")) {
    return "MAYBE";
  }
  return "NO_GO";
}

export function oneLiner(record: Pick<ScoredRecord, "buyerOrg" | "budgetBucket" | "deadlineBucket">): string {
  return `${record.buyerOrg} opportunity - ${record.budgetBucket} budget, ${record.deadlineBucket} deadline`;
}

export function buildTags(record: TagFields): string[] {
  return [
    `decision_${record.decision ?? "NO_GO"}`,
    `buyer_${record.buyerType || "unknown"}`,
    `budget_${record.budgetBucket ?? "unknown"}`,
    `region_${record.region || "unknown"}`,
    `deadline_${record.deadlineBucket ?? "unknown"}`,
  ];
}

export function formatTags(tags: string[]): string {
  return tags.join(" ");
}

export class RulesScorer implements OpportunityScorer {
  score(candidate: CandidateRecord, now: Date): ScoredRecord {
    const deadline = normalizeDeadline(candidate.rawDeadlineText);
    const deadlineBand = deadlineBucket(deadline, now);
    const budgetValue = extractBudget(candidate.description);
    const budgetBand = budgetBucket(budgetValue);
    const decision = decide(deadlineBand, budgetBand);

    return {
      ...candidate,
      deadline,
      deadlineBucket: deadlineBand,
      budgetValue,
      budgetBucket: budgetBand,
      decision,
      oneLiner: oneLiner({ buyerOrg: candidate.buyerOrg, budgetBucket: budgetBand, deadlineBucket: deadlineBand }),
      tags: buildTags({
        decision,
        buyerType: candidate.buyerType,
        budgetBucket: budgetBand,
        region: candidate.region,
        deadlineBucket: deadlineBand,
      }),
    };
  }
}
