import {
  users,
  analyses,
  imageResults,
  recommendations,
  type User,
  type Analysis,
  type InsertAnalysis,
  type ImageResult,
  type InsertImageResult,
  type Recommendation,
  type InsertRecommendation,
  type AnalysisStatus,
  type Severity,
} from "../shared/schema";
import { db } from "./db";
import { eq, and, or, asc, desc, gte, lte, ilike, inArray, type SQL } from "drizzle-orm";

export interface AnalysisListFilters {
  cropType?: string;
  from?: Date;
  to?: Date;
  search?: string; // crop type or any detected disease
  limit: number;
  offset: number;
}

export interface AnalysisUpdate {
  cropType?: string;
  averageConfidence?: number;
  averageSeverity?: Severity;
  status?: AnalysisStatus;
  errorMessage?: string | null;
}

export interface RecommendationReviewPatch {
  status: "approved" | "rejected";
  reviewedBy: string;
  adminFeedback: string | null;
  updatedAt: Date;
}

export type PendingRecommendation = Recommendation & { analysis: Analysis };

export interface IStorage {
  // Users (owned by the auth collaborator, read-only here)
  getUser(id: string): Promise<User | undefined>;

  // Analyses
  createAnalysis(analysis: InsertAnalysis): Promise<Analysis>;
  getAnalysis(id: string): Promise<Analysis | undefined>;
  listAnalyses(userId: string, filters: AnalysisListFilters): Promise<Analysis[]>;
  updateAnalysis(id: string, data: AnalysisUpdate): Promise<Analysis | undefined>;

  // Image results
  createImageResult(result: InsertImageResult): Promise<ImageResult>;
  getImageResults(analysisId: string): Promise<ImageResult[]>;

  // Recommendations
  createRecommendation(recommendation: InsertRecommendation): Promise<Recommendation>;
  getRecommendation(id: string): Promise<Recommendation | undefined>;
  getRecommendationsForAnalysis(analysisId: string): Promise<Recommendation[]>;
  getPendingRecommendations(): Promise<PendingRecommendation[]>;
  /**
   * Applies the review only while the row is still pending. Resolves to
   * undefined when the row is missing or another reviewer got there first.
   */
  reviewPendingRecommendation(id: string, patch: RecommendationReviewPatch): Promise<Recommendation | undefined>;
}

function likePattern(value: string): string {
  return `%${value.replace(/[\\%_]/g, match => `\\${match}`)}%`;
}

export class DatabaseStorage implements IStorage {
  async getUser(id: string): Promise<User | undefined> {
    const [user] = await db.select().from(users).where(eq(users.id, id));
    return user;
  }

  async createAnalysis(analysisData: InsertAnalysis): Promise<Analysis> {
    const [analysis] = await db.insert(analyses).values(analysisData).returning();
    return analysis;
  }

  async getAnalysis(id: string): Promise<Analysis | undefined> {
    const [analysis] = await db.select().from(analyses).where(eq(analyses.id, id));
    return analysis;
  }

  async listAnalyses(userId: string, filters: AnalysisListFilters): Promise<Analysis[]> {
    const conditions: SQL[] = [eq(analyses.userId, userId)];

    if (filters.cropType) {
      conditions.push(ilike(analyses.cropType, likePattern(filters.cropType)));
    }
    if (filters.from) {
      conditions.push(gte(analyses.createdAt, filters.from));
    }
    if (filters.to) {
      conditions.push(lte(analyses.createdAt, filters.to));
    }
    if (filters.search) {
      const pattern = likePattern(filters.search);
      const diseaseMatches = db
        .select({ analysisId: imageResults.analysisId })
        .from(imageResults)
        .where(ilike(imageResults.diseaseDetected, pattern));
      const searchCondition = or(
        ilike(analyses.cropType, pattern),
        inArray(analyses.id, diseaseMatches),
      );
      if (searchCondition) conditions.push(searchCondition);
    }

    return await db
      .select()
      .from(analyses)
      .where(and(...conditions))
      .orderBy(desc(analyses.createdAt), desc(analyses.id))
      .limit(filters.limit)
      .offset(filters.offset);
  }

  async updateAnalysis(id: string, data: AnalysisUpdate): Promise<Analysis | undefined> {
    const [analysis] = await db
      .update(analyses)
      .set(data)
      .where(eq(analyses.id, id))
      .returning();
    return analysis;
  }

  async createImageResult(resultData: InsertImageResult): Promise<ImageResult> {
    const [result] = await db.insert(imageResults).values(resultData).returning();
    return result;
  }

  async getImageResults(analysisId: string): Promise<ImageResult[]> {
    return await db
      .select()
      .from(imageResults)
      .where(eq(imageResults.analysisId, analysisId))
      .orderBy(asc(imageResults.createdAt), asc(imageResults.id));
  }

  async createRecommendation(recommendationData: InsertRecommendation): Promise<Recommendation> {
    const [recommendation] = await db.insert(recommendations).values(recommendationData).returning();
    return recommendation;
  }

  async getRecommendation(id: string): Promise<Recommendation | undefined> {
    const [recommendation] = await db.select().from(recommendations).where(eq(recommendations.id, id));
    return recommendation;
  }

  async getRecommendationsForAnalysis(analysisId: string): Promise<Recommendation[]> {
    return await db
      .select()
      .from(recommendations)
      .where(eq(recommendations.analysisId, analysisId))
      .orderBy(asc(recommendations.createdAt), asc(recommendations.id));
  }

  async getPendingRecommendations(): Promise<PendingRecommendation[]> {
    const rows = await db
      .select({ recommendation: recommendations, analysis: analyses })
      .from(recommendations)
      .innerJoin(analyses, eq(recommendations.analysisId, analyses.id))
      .where(eq(recommendations.status, "pending"))
      .orderBy(asc(recommendations.createdAt));

    return rows.map(row => ({ ...row.recommendation, analysis: row.analysis }));
  }

  async reviewPendingRecommendation(
    id: string,
    patch: RecommendationReviewPatch,
  ): Promise<Recommendation | undefined> {
    // Conditional write: concurrent reviewers cannot both leave 'pending'
    const [recommendation] = await db
      .update(recommendations)
      .set(patch)
      .where(and(eq(recommendations.id, id), eq(recommendations.status, "pending")))
      .returning();
    return recommendation;
  }
}

export const storage = new DatabaseStorage();
