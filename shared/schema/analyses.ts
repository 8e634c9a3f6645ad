import { randomUUID } from "crypto";
import { pgTable, text, varchar, timestamp, integer, real, json, pgEnum, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";

export const defectSeverityEnum = pgEnum('defect_severity', ['High', 'Medium', 'Low']);
export const processingMethodEnum = pgEnum('processing_method', ['rule_based', 'hybrid']);

export const defectAnalyses = pgTable("defect_analyses", {
  id: varchar("id").primaryKey().$defaultFn(() => randomUUID()),
  filename: text("filename").notNull(),
  fileHash: varchar("file_hash", { length: 64 }).notNull(),
  duplicateOf: varchar("duplicate_of"),
  totalDefects: integer("total_defects").notNull().default(0),
  summary: json("summary").$type<Record<string, number>>().notNull(),
  breakdown: json("breakdown").$type<Array<{ category: string; count: number; percentage: number }>>().notNull(),
  areaSummary: json("area_summary").$type<Record<string, number>>().notNull(),
  processingMethod: processingMethodEnum("processing_method").notNull().default('rule_based'),
  averageConfidence: real("average_confidence").notNull().default(0),
  sentenceCount: integer("sentence_count").notNull().default(0),
  textLength: integer("text_length").notNull().default(0),
  analyzedAt: timestamp("analyzed_at").notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => [
  index("defect_analyses_file_hash_idx").on(table.fileHash),
  index("defect_analyses_created_at_idx").on(table.createdAt),
]);

export const detectedDefects = pgTable("detected_defects", {
  id: varchar("id").primaryKey().$defaultFn(() => randomUUID()),
  analysisId: varchar("analysis_id").references(() => defectAnalyses.id, { onDelete: 'cascade' }).notNull(),
  category: text("category").notNull(),
  keyword: text("keyword").notNull(),
  sentence: text("sentence").notNull(),
  sentenceIndex: integer("sentence_index").notNull(),
  severity: defectSeverityEnum("severity").notNull(),
  confidence: real("confidence").notNull(),
  area: text("area").notNull().default('general'),
  detectionMethod: processingMethodEnum("detection_method").notNull().default('rule_based'),
  position: integer("position").notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => [
  index("detected_defects_analysis_id_idx").on(table.analysisId),
]);

export const insertDefectAnalysisSchema = createInsertSchema(defectAnalyses).omit({ id: true, createdAt: true });
export const insertDetectedDefectSchema = createInsertSchema(detectedDefects).omit({ id: true, createdAt: true });

export type DefectAnalysis = typeof defectAnalyses.$inferSelect;
export type InsertDefectAnalysis = typeof defectAnalyses.$inferInsert;
export type DetectedDefect = typeof detectedDefects.$inferSelect;
export type InsertDetectedDefect = typeof detectedDefects.$inferInsert;
