/**
 * Review Workflow
 *
 * Human review of recommendations. A recommendation starts pending and moves
 * exactly once to approved or rejected; terminal states never transition
 * again. The transition itself is a conditional write in storage so that two
 * admins racing on the same row cannot both succeed.
 */

import type { Recommendation } from "../../shared/schema";
import type { IStorage, PendingRecommendation, RecommendationReviewPatch } from "../storage";
import { safeLogger } from "../safe_logger";
import { invalidInput, invalidState, notFound } from "../utils/pipelineErrors";

export const REVIEW_ACTIONS = ["approve", "reject"] as const;
export type ReviewActionName = typeof REVIEW_ACTIONS[number];

export type ReviewState =
  | { status: "pending" }
  | { status: "approved"; reviewedBy: string | null; reviewedAt: Date; feedback: string | null }
  | { status: "rejected"; reviewedBy: string | null; reviewedAt: Date; feedback: string };

export type PendingReviewState = Extract<ReviewState, { status: "pending" }>;
export type TerminalReviewState = Exclude<ReviewState, PendingReviewState>;

export type ReviewAction =
  | { action: "approve"; feedback?: string }
  | { action: "reject"; feedback: string };

export interface Reviewer {
  id: string;
}

/**
 * Only a pending state can be reviewed; passing anything else does not compile.
 */
export function applyReviewAction(
  _state: PendingReviewState,
  action: ReviewAction,
  reviewerId: string,
  at: Date,
): TerminalReviewState {
  if (action.action === "approve") {
    const feedback = action.feedback?.trim();
    return { status: "approved", reviewedBy: reviewerId, reviewedAt: at, feedback: feedback || null };
  }
  return { status: "rejected", reviewedBy: reviewerId, reviewedAt: at, feedback: action.feedback };
}

export function toReviewState(recommendation: Recommendation): ReviewState {
  switch (recommendation.status) {
    case "pending":
      return { status: "pending" };
    case "approved":
      return {
        status: "approved",
        reviewedBy: recommendation.reviewedBy,
        reviewedAt: recommendation.updatedAt,
        feedback: recommendation.adminFeedback,
      };
    case "rejected":
      return {
        status: "rejected",
        reviewedBy: recommendation.reviewedBy,
        reviewedAt: recommendation.updatedAt,
        feedback: recommendation.adminFeedback ?? "",
      };
  }
}

export function isPending(state: ReviewState): state is PendingReviewState {
  return state.status === "pending";
}

function alreadyReviewed(recommendationId: string, currentStatus: string) {
  return invalidState(`Recommendation has already been ${currentStatus}`, {
    recommendationId,
    currentStatus,
  });
}

function toPatch(state: TerminalReviewState, reviewerId: string): RecommendationReviewPatch {
  return {
    status: state.status,
    reviewedBy: reviewerId,
    adminFeedback: state.feedback,
    updatedAt: state.reviewedAt,
  };
}

/**
 * Builds the action, enforcing non-empty feedback on rejection before any
 * state is read.
 */
export function buildReviewAction(action: ReviewActionName, feedback?: string): ReviewAction {
  if (action === "approve") {
    return { action: "approve", feedback };
  }
  const trimmed = feedback?.trim() ?? "";
  if (!trimmed) {
    throw invalidInput("Feedback is required when rejecting a recommendation");
  }
  return { action: "reject", feedback: trimmed };
}

function createdAtDesc(a: Recommendation, b: Recommendation): number {
  return b.createdAt.getTime() - a.createdAt.getTime();
}

/**
 * The recommendation a grower should act on: the newest approved one, else
 * the newest pending one. Rejected recommendations never qualify.
 */
export function selectAuthoritative(recommendations: readonly Recommendation[]): Recommendation | null {
  const newestFirst = [...recommendations].sort(createdAtDesc);
  return (
    newestFirst.find(r => r.status === "approved") ??
    newestFirst.find(r => r.status === "pending") ??
    null
  );
}

export class ReviewWorkflow {
  constructor(private readonly storage: IStorage) {}

  approve(recommendationId: string, admin: Reviewer, feedback?: string): Promise<Recommendation> {
    return this.review(admin, recommendationId, "approve", feedback);
  }

  reject(recommendationId: string, admin: Reviewer, feedback: string): Promise<Recommendation> {
    return this.review(admin, recommendationId, "reject", feedback);
  }

  async review(
    admin: Reviewer,
    recommendationId: string,
    actionName: ReviewActionName,
    feedback?: string,
  ): Promise<Recommendation> {
    const action = buildReviewAction(actionName, feedback);

    const current = await this.storage.getRecommendation(recommendationId);
    if (!current) {
      throw notFound("Recommendation not found", { recommendationId });
    }

    const state = toReviewState(current);
    if (!isPending(state)) {
      throw alreadyReviewed(recommendationId, state.status);
    }

    const next = applyReviewAction(state, action, admin.id, new Date());
    const updated = await this.storage.reviewPendingRecommendation(recommendationId, toPatch(next, admin.id));

    if (!updated) {
      // Lost the race: report whatever the winner left behind
      const latest = await this.storage.getRecommendation(recommendationId);
      if (!latest) {
        throw notFound("Recommendation not found", { recommendationId });
      }
      throw alreadyReviewed(recommendationId, latest.status);
    }

    safeLogger.info(`[Review] Recommendation ${next.status}`, {
      recommendationId,
      analysisId: updated.analysisId,
      reviewedBy: admin.id,
    });
    return updated;
  }

  listPending(): Promise<PendingRecommendation[]> {
    return this.storage.getPendingRecommendations();
  }

  /**
   * Admin-authored recommendation, typically written after rejecting the AI
   * one. It enters review as pending like any other.
   */
  async createAdminRecommendation(admin: Reviewer, analysisId: string, content: string): Promise<Recommendation> {
    const trimmed = content.trim();
    if (!trimmed) {
      throw invalidInput("Recommendation content is required");
    }

    const analysis = await this.storage.getAnalysis(analysisId);
    if (!analysis) {
      throw notFound("Analysis not found", { analysisId });
    }

    const recommendation = await this.storage.createRecommendation({
      analysisId,
      generatedBy: "admin",
      content: trimmed,
      source: "admin",
    });

    safeLogger.info("[Review] Admin recommendation created", {
      recommendationId: recommendation.id,
      analysisId,
      createdBy: admin.id,
    });
    return recommendation;
  }
}
