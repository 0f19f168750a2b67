import mongoose, { Schema } from "mongoose";
import * as crypto from "crypto";
import { FactCategory, FactSource } from "../types/continuity.js";

// MongoDB Schema for ContinuityFact. Documents are inserted, never updated.
const continuityFactSchema = new Schema({
    _id: { type: String, required: true, default: () => crypto.randomUUID() },
    text: { type: String, required: true },
    category: {
        type: String,
        enum: Object.values(FactCategory),
        required: true
    },
    book: { type: String, required: true, index: true },
    source: {
        type: String,
        enum: Object.values(FactSource),
        required: true
    },
    sourceLabel: String,
    chapter: Number,
    scene: Number,

    // Derived from text by the embedding model
    embedding: { type: [Number], required: true },
    embeddingModel: { type: String, required: true },

    createdAt: { type: Date, default: Date.now }
});

export default mongoose.model("ContinuityFact", continuityFactSchema);
