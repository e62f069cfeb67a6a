import { sql } from "drizzle-orm";
import {
  pgTable,
  text,
  varchar,
  timestamp,
  doublePrecision,
  index,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const USER_ROLES = ["farmer", "admin"] as const;
export const SEVERITIES = ["low", "medium", "high"] as const;
export const ANALYSIS_STATUSES = ["pending", "processing", "completed", "failed"] as const;
export const RECOMMENDATION_STATUSES = ["pending", "approved", "rejected"] as const;
export const RECOMMENDATION_AUTHORS = ["ai", "admin"] as const;
// Internal provenance tag; never part of the public response shape
export const RECOMMENDATION_SOURCES = ["model", "fallback", "admin"] as const;

export type UserRole = typeof USER_ROLES[number];
export type Severity = typeof SEVERITIES[number];
export type AnalysisStatus = typeof ANALYSIS_STATUSES[number];
export type RecommendationStatus = typeof RECOMMENDATION_STATUSES[number];
export type RecommendationAuthor = typeof RECOMMENDATION_AUTHORS[number];
export type RecommendationSource = typeof RECOMMENDATION_SOURCES[number];

export const MAX_IMAGE_NAME_LENGTH = 255;

// Users are owned by the authentication collaborator; only id and role matter here
export const users = pgTable("users", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  email: varchar("email").unique().notNull(),
  role: varchar("role", { length: 10, enum: USER_ROLES }).notNull().default("farmer"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export type User = typeof users.$inferSelect;

// One submission covering one or more images
export const analyses = pgTable("analyses", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  userId: varchar("user_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  cropType: varchar("crop_type", { length: 50 }).notNull(),

  // Derived from image_results; written only by the summary recompute
  averageConfidence: doublePrecision("average_confidence"),
  averageSeverity: varchar("average_severity", { length: 10, enum: SEVERITIES }),

  status: varchar("status", { length: 12, enum: ANALYSIS_STATUSES }).notNull().default("pending"),
  errorMessage: text("error_message"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => ({
  userCreatedIdx: index("idx_analyses_user_created").on(table.userId, table.createdAt),
}));

export const insertAnalysisSchema = createInsertSchema(analyses).omit({
  id: true,
  averageConfidence: true,
  averageSeverity: true,
  createdAt: true,
});

export type InsertAnalysis = z.infer<typeof insertAnalysisSchema>;
export type Analysis = typeof analyses.$inferSelect;

export const imageResults = pgTable("image_results", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  analysisId: varchar("analysis_id").notNull().references(() => analyses.id, { onDelete: "cascade" }),
  imageName: varchar("image_name", { length: MAX_IMAGE_NAME_LENGTH }).notNull(),
  imageLocator: text("image_locator").notNull(),

  diseaseDetected: varchar("disease_detected", { length: 100 }).notNull(), // disease, 'healthy', 'unknown' or 'error'
  cropDetected: varchar("crop_detected", { length: 50 }),
  confidenceScore: doublePrecision("confidence_score").notNull(), // 0.0 to 1.0
  severity: varchar("severity", { length: 10, enum: SEVERITIES }).notNull(),
  errorMessage: text("error_message"),

  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => ({
  analysisIdx: index("idx_image_results_analysis").on(table.analysisId),
}));

export const insertImageResultSchema = createInsertSchema(imageResults).omit({
  id: true,
  createdAt: true,
});

export type InsertImageResult = z.infer<typeof insertImageResultSchema>;
export type ImageResult = typeof imageResults.$inferSelect;

export const recommendations = pgTable("recommendations", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  analysisId: varchar("analysis_id").notNull().references(() => analyses.id, { onDelete: "cascade" }),
  generatedBy: varchar("generated_by", { length: 10, enum: RECOMMENDATION_AUTHORS }).notNull().default("ai"),
  content: text("content").notNull(),

  // Review lifecycle: pending -> approved | rejected
  status: varchar("status", { length: 10, enum: RECOMMENDATION_STATUSES }).notNull().default("pending"),
  adminFeedback: text("admin_feedback"),
  reviewedBy: varchar("reviewed_by").references(() => users.id),

  source: varchar("source", { length: 10, enum: RECOMMENDATION_SOURCES }).notNull().default("model"),

  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => ({
  analysisIdx: index("idx_recommendations_analysis").on(table.analysisId),
  statusIdx: index("idx_recommendations_status").on(table.status),
}));

export const insertRecommendationSchema = createInsertSchema(recommendations).omit({
  id: true,
  status: true,
  adminFeedback: true,
  reviewedBy: true,
  createdAt: true,
  updatedAt: true,
});

export type InsertRecommendation = z.infer<typeof insertRecommendationSchema>;
export type Recommendation = typeof recommendations.$inferSelect;
