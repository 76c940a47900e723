import { Schema, model } from "mongoose";
import { LANGUAGES, type Language } from "../lib/types";

export interface QueryRecordFields {
  language: Language;
  nodeId: string;
  intent: string;
  confidence: number;
  latencyMs: number;
  cultural: boolean;
  degraded: boolean;
  enriched: boolean;
}

const QueryRecordSchema = new Schema<QueryRecordFields>({
  language: { type: String, enum: [...LANGUAGES], required: true, index: true },
  nodeId: { type: String, required: true },
  intent: { type: String, required: true },
  confidence: { type: Number, required: true, min: 0, max: 1 },
  latencyMs: { type: Number, required: true, min: 0 },
  cultural: { type: Boolean, default: false },
  degraded: { type: Boolean, default: false },
  enriched: { type: Boolean, default: false },
}, { timestamps: true });

export default model<QueryRecordFields>("QueryRecord", QueryRecordSchema);
