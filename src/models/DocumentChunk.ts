// src/models/DocumentChunk.ts
import mongoose, { Schema } from 'mongoose';

export interface IDocumentChunk {
  chunkId: string;
  documentId: string;
  documentTitle?: string;
  text: string;
  embedding: number[];
  // Entity names mentioned in the chunk, written at ingestion
  entities: string[];
  // Insertion order; breaks score ties
  position: number;
  createdAt: Date;
  updatedAt: Date;
}

const DocumentChunkSchema = new Schema<IDocumentChunk>(
  {
    chunkId: { type: String, required: true, unique: true },
    documentId: { type: String, required: true, index: true },
    documentTitle: { type: String },
    text: { type: String, required: true },
    embedding: { type: [Number], default: [] },
    entities: { type: [String], default: [] },
    position: { type: Number, required: true },
  },
  {
    timestamps: true,
    collection: 'chunks'
  }
);

DocumentChunkSchema.index({ position: 1 });

export const DocumentChunk = mongoose.model<IDocumentChunk>('DocumentChunk', DocumentChunkSchema);
