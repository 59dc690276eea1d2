import mongoose from 'mongoose';
import { config } from '../src/core/config';
import { logger } from '../src/core/logger';
import { DocumentChunk, GraphEdge, GraphNode } from '../src/models';

interface IndexedModel {
  collection: { collectionName: string };
  createIndexes(): Promise<void>;
}

async function migrate() {
  logger.info('Starting migration...');

  await mongoose.connect(config.mongodb.uri, {
    dbName: config.mongodb.dbName,
  });

  // Indexes declared on the schemas
  const models: IndexedModel[] = [DocumentChunk, GraphNode, GraphEdge];
  for (const model of models) {
    logger.info(`Creating indexes for ${model.collection.collectionName}`);
    await model.createIndexes();
    logger.info(`✓ ${model.collection.collectionName} indexes created`);
  }

  if (config.mongodb.vectorSearchEnabled) {
    logger.info('Vector search is enabled; the Atlas search index must be created separately', {
      index: config.mongodb.vectorIndexName,
      collection: DocumentChunk.collection.collectionName,
      path: 'embedding',
    });
  }

  logger.info('Migration complete');
  await mongoose.disconnect();
}

migrate().catch(console.error);
