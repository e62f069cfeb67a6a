/**
 * In-process IStorage used by the service and route tests. Mirrors the
 * column defaults of the drizzle schema and the conditional review write.
 */

import type {
  Analysis,
  ImageResult,
  InsertAnalysis,
  InsertImageResult,
  InsertRecommendation,
  Recommendation,
  User,
  UserRole,
} from '../../shared/schema';
import type {
  AnalysisListFilters,
  AnalysisUpdate,
  IStorage,
  PendingRecommendation,
  RecommendationReviewPatch,
} from '../../server/storage';

const START_TIME = Date.UTC(2025, 0, 1, 8, 0, 0);

function includesIgnoreCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

export class MemoryStorage implements IStorage {
  readonly users = new Map<string, User>();
  readonly analyses = new Map<string, Analysis>();
  readonly imageResults: ImageResult[] = [];
  readonly recommendations = new Map<string, Recommendation>();

  private sequence = 0;
  private clock = START_TIME;

  // Each row gets a distinct, increasing timestamp
  private now(): Date {
    this.clock += 1000;
    return new Date(this.clock);
  }

  private nextId(prefix: string): string {
    this.sequence += 1;
    return `${prefix}-${this.sequence}`;
  }

  addUser(id: string, role: UserRole = 'farmer'): User {
    const user: User = { id, email: `${id}@example.test`, role, createdAt: this.now() };
    this.users.set(id, user);
    return user;
  }

  async getUser(id: string): Promise<User | undefined> {
    const user = this.users.get(id);
    return user && { ...user };
  }

  async createAnalysis(data: InsertAnalysis): Promise<Analysis> {
    const analysis: Analysis = {
      id: this.nextId('analysis'),
      userId: data.userId,
      cropType: data.cropType,
      averageConfidence: null,
      averageSeverity: null,
      status: data.status ?? 'pending',
      errorMessage: data.errorMessage ?? null,
      createdAt: this.now(),
    };
    this.analyses.set(analysis.id, analysis);
    return { ...analysis };
  }

  async getAnalysis(id: string): Promise<Analysis | undefined> {
    const analysis = this.analyses.get(id);
    return analysis && { ...analysis };
  }

  async listAnalyses(userId: string, filters: AnalysisListFilters): Promise<Analysis[]> {
    const { cropType, from, to, search } = filters;

    return [...this.analyses.values()]
      .filter(analysis => analysis.userId === userId)
      .filter(analysis => !cropType || includesIgnoreCase(analysis.cropType, cropType))
      .filter(analysis => !from || analysis.createdAt >= from)
      .filter(analysis => !to || analysis.createdAt <= to)
      .filter(analysis => !search
        || includesIgnoreCase(analysis.cropType, search)
        || this.imageResults.some(result =>
          result.analysisId === analysis.id && includesIgnoreCase(result.diseaseDetected, search)))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id.localeCompare(a.id))
      .slice(filters.offset, filters.offset + filters.limit)
      .map(analysis => ({ ...analysis }));
  }

  async updateAnalysis(id: string, data: AnalysisUpdate): Promise<Analysis | undefined> {
    const analysis = this.analyses.get(id);
    if (!analysis) return undefined;
    const updated: Analysis = { ...analysis, ...data };
    this.analyses.set(id, updated);
    return { ...updated };
  }

  async createImageResult(data: InsertImageResult): Promise<ImageResult> {
    const result: ImageResult = {
      id: this.nextId('result'),
      analysisId: data.analysisId,
      imageName: data.imageName,
      imageLocator: data.imageLocator,
      diseaseDetected: data.diseaseDetected,
      cropDetected: data.cropDetected ?? null,
      confidenceScore: data.confidenceScore,
      severity: data.severity,
      errorMessage: data.errorMessage ?? null,
      createdAt: this.now(),
    };
    this.imageResults.push(result);
    return { ...result };
  }

  async getImageResults(analysisId: string): Promise<ImageResult[]> {
    return this.imageResults
      .filter(result => result.analysisId === analysisId)
      .map(result => ({ ...result }));
  }

  async createRecommendation(data: InsertRecommendation): Promise<Recommendation> {
    const createdAt = this.now();
    const recommendation: Recommendation = {
      id: this.nextId('recommendation'),
      analysisId: data.analysisId,
      generatedBy: data.generatedBy ?? 'ai',
      content: data.content,
      status: 'pending',
      adminFeedback: null,
      reviewedBy: null,
      source: data.source ?? 'model',
      createdAt,
      updatedAt: createdAt,
    };
    this.recommendations.set(recommendation.id, recommendation);
    return { ...recommendation };
  }

  async getRecommendation(id: string): Promise<Recommendation | undefined> {
    const recommendation = this.recommendations.get(id);
    return recommendation && { ...recommendation };
  }

  async getRecommendationsForAnalysis(analysisId: string): Promise<Recommendation[]> {
    return [...this.recommendations.values()]
      .filter(recommendation => recommendation.analysisId === analysisId)
      .map(recommendation => ({ ...recommendation }));
  }

  async getPendingRecommendations(): Promise<PendingRecommendation[]> {
    const pending: PendingRecommendation[] = [];
    for (const recommendation of this.recommendations.values()) {
      const analysis = this.analyses.get(recommendation.analysisId);
      if (recommendation.status === 'pending' && analysis) {
        pending.push({ ...recommendation, analysis: { ...analysis } });
      }
    }
    return pending;
  }

  async reviewPendingRecommendation(
    id: string,
    patch: RecommendationReviewPatch,
  ): Promise<Recommendation | undefined> {
    // Check and write with no await in between, like a conditional UPDATE
    const recommendation = this.recommendations.get(id);
    if (!recommendation || recommendation.status !== 'pending') return undefined;
    const updated: Recommendation = { ...recommendation, ...patch };
    this.recommendations.set(id, updated);
    return { ...updated };
  }
}
