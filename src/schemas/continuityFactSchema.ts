import { z } from "zod";
import { FactCategory, FactSource } from "../types/continuity.js";

export const FactCategorySchema = z.nativeEnum(FactCategory);
export const FactSourceSchema = z.nativeEnum(FactSource);

// Continuity Fact Schema
export const ContinuityFactSchema = z.object({
    text: z.string().trim().min(1).max(20000),
    category: FactCategorySchema,
    book: z.string().trim().min(1),
    source: FactSourceSchema,
    sourceLabel: z.string().optional(),

    // Provenance
    chapter: z.number().int().positive().optional(),
    scene: z.number().int().positive().optional()
}).refine(fact => fact.scene === undefined || fact.chapter !== undefined, {
    message: "scene provenance requires a chapter",
    path: ["scene"]
});
