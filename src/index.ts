import express, { Express, Request, Response, NextFunction } from 'express';
import mongoose from 'mongoose';
import cors from 'cors';
import { z } from 'zod';
import { config } from './core/config';
import { logger } from './core/logger';
import { AppServices, createProductionServices } from './core/container';
import { NotFoundError, PipelineError, ValidationError, errorMessage } from './core/errors';
import { PipelineResult, RetrievalStep, Session } from './types';
import { maskIdentifier, maskSensitiveData } from './utils/security';
import { withTimeout } from './utils/timeout';
import './models';

const SESSION_ID = z.string().regex(/^[A-Za-z0-9_-]{1,128}$/, 'Invalid session id format');

const ChatRequestSchema = z.object({
  message: z.string().trim().min(1, 'message must not be empty').max(4000),
  session_id: SESSION_ID.optional(),
});

const NeighborhoodQuerySchema = z.object({
  hops: z.coerce.number().int().min(1).max(config.graph.maxNeighborhoodHops).default(2),
});

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`);
    throw new ValidationError(issues.join('; '), { issues });
  }
  return parsed.data;
}

function toStepView(step: RetrievalStep) {
  return {
    stage: step.stage,
    state: step.state,
    duration_ms: step.durationMs,
    description: step.description,
    data: step.data,
  };
}

function toChatResponse(result: PipelineResult) {
  return {
    message: result.answer,
    intent: result.intent?.intent ?? null,
    confidence: result.confidence,
    low_confidence: result.lowConfidence,
    graph_facts: result.graphFacts,
    sources: result.sources,
    citations: result.citations,
    retrieval_steps: result.steps.map(toStepView),
    resolved_query: result.resolvedQuery,
    session_id: result.sessionId,
    trace_id: result.traceId,
  };
}

function toTraceView(result: PipelineResult) {
  return {
    trace_id: result.traceId,
    session_id: result.sessionId,
    status: result.status,
    stage: result.stage,
    query: result.query,
    resolved_query: result.resolvedQuery,
    intent: result.intent,
    confidence: result.confidence,
    low_confidence: result.lowConfidence,
    graph_facts: result.graphFacts,
    citations: result.citations,
    retrieval_steps: result.steps.map(toStepView),
    error: result.error,
  };
}

function toSessionView(session: Session) {
  return {
    session_id: session.id,
    created_at: session.createdAt.toISOString(),
    last_accessed_at: session.lastAccessedAt.toISOString(),
    turns: session.turns.map(turn => ({
      query: turn.query,
      resolved_query: turn.resolvedQuery,
      intent: turn.intent,
      entities: turn.entities,
      at: turn.at.toISOString(),
    })),
  };
}

export function createApp(services: AppServices): Express {
  const app = express();
  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));
  app.use(express.json({ limit: '1mb' }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    logger.debug('Request', { method: req.method, path: req.path, ip: req.ip });
    next();
  });

  app.get('/health/live', (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  app.get('/health/ready', async (req: Request, res: Response) => {
    const check = async (ping: () => Promise<void>, label: string) => {
      try {
        await withTimeout(() => ping(), config.execution.dbTimeout, label);
        return { status: 'ok' };
      } catch (error) {
        return { status: 'error', error: errorMessage(error) };
      }
    };

    const [vectorIndex, graph] = await Promise.all([
      check(() => services.vectorIndex.ping(), 'vector index ping'),
      check(() => services.graphStore.ping(), 'graph ping'),
    ]);
    const ready = vectorIndex.status === 'ok' && graph.status === 'ok';

    res.status(ready ? 200 : 503).json({
      status: ready ? 'ready' : 'unavailable',
      checks: { vector_index: vectorIndex, graph },
      timestamp: new Date().toISOString(),
    });
  });

  app.post('/api/v1/chat', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseOrThrow(ChatRequestSchema, req.body);

      // Client disconnects abort the run
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableEnded) controller.abort();
      });

      logger.info('Processing chat message', {
        queryPreview: maskSensitiveData(body.message.substring(0, 100)),
        sessionId: body.session_id ? maskIdentifier(body.session_id) : undefined,
      });

      const result = await services.orchestrator.run(body.message, {
        sessionId: body.session_id,
        signal: controller.signal,
      });

      if (controller.signal.aborted) {
        logger.info('Client disconnected before the answer was ready', { traceId: result.traceId });
        return;
      }

      if (result.status === 'failed') {
        const failure = result.error ?? { code: 'INTERNAL_ERROR', message: 'Pipeline failed', statusCode: 500 };
        res.status(failure.statusCode).json({
          success: false,
          message: failure.message,
          error: { code: failure.code, message: failure.message },
          intent: result.intent?.intent ?? null,
          retrieval_steps: result.steps.map(toStepView),
          session_id: result.sessionId,
          trace_id: result.traceId,
        });
        return;
      }

      res.json(toChatResponse(result));
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/v1/chat/trace/:sessionId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = parseOrThrow(SESSION_ID, req.params.sessionId);
      const trace = services.traces.getLatestForSession(sessionId);
      if (!trace) {
        throw new NotFoundError('No trace found for this session');
      }
      res.json({ success: true, data: toTraceView(trace) });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/v1/query/:traceId/trace', (req: Request, res: Response, next: NextFunction) => {
    try {
      const trace = services.traces.getByTraceId(req.params.traceId);
      if (!trace) {
        throw new NotFoundError('Trace not found or expired');
      }
      res.json({ success: true, data: toTraceView(trace) });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/v1/sessions/:sessionId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = parseOrThrow(SESSION_ID, req.params.sessionId);
      const session = services.sessions.get(sessionId);
      if (!session) {
        throw new NotFoundError('Session not found or expired');
      }
      res.json({ success: true, data: toSessionView(session) });
    } catch (error) {
      next(error);
    }
  });

  app.delete('/api/v1/sessions/:sessionId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = parseOrThrow(SESSION_ID, req.params.sessionId);
      if (!services.sessions.delete(sessionId)) {
        throw new NotFoundError('Session not found or expired');
      }
      services.traces.forgetSession(sessionId);
      res.json({ success: true, message: 'Session cleared' });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/v1/graph/stats', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const stats = await services.graphStore.stats();
      res.json({
        success: true,
        data: {
          total_nodes: stats.totalNodes,
          total_relationships: stats.totalRelationships,
          nodes_by_label: stats.nodesByLabel,
          relationships_by_type: stats.relationshipsByType,
        },
      });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/v1/graph/neighborhood/:nodeId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { hops } = parseOrThrow(NeighborhoodQuerySchema, req.query);
      const neighborhood = await services.graphStore.neighborhood(req.params.nodeId, hops);
      if (!neighborhood) {
        throw new NotFoundError(`Node ${req.params.nodeId} not found`);
      }

      res.json({
        success: true,
        data: {
          center_node: neighborhood.center,
          hops: neighborhood.hops,
          nodes: neighborhood.nodes,
          edges: neighborhood.edges.map(edge => ({ source: edge.from, target: edge.to, type: edge.relation })),
        },
      });
    } catch (error) {
      next(error);
    }
  });

  app.use((error: Error, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    // body-parser rejects malformed JSON with a SyntaxError
    const normalized = error instanceof SyntaxError ? new ValidationError('Malformed JSON body') : error;

    if (normalized instanceof PipelineError) {
      logger.warn('Request failed', { path: req.path, code: normalized.code, error: normalized.message });
      res.status(normalized.statusCode).json({
        success: false,
        message: normalized.message,
        error: {
          message: normalized.message,
          code: normalized.code,
          details: normalized.details,
        },
      });
    } else {
      logger.error('Unhandled error', { path: req.path, error: normalized.message, stack: normalized.stack });
      res.status(500).json({
        success: false,
        message: 'Internal server error',
        error: {
          message: 'Internal server error',
          code: 'INTERNAL_ERROR',
        },
      });
    }
  });

  return app;
}

async function connectDatabase() {
  await mongoose.connect(config.mongodb.uri, {
    dbName: config.mongodb.dbName,
  });
  logger.info('Connected to MongoDB', {
    dbName: config.mongodb.dbName,
    uri: maskSensitiveData(config.mongodb.uri),
  });
}

export async function startServer() {
  await connectDatabase();

  const services = createProductionServices();
  services.sessions.start();
  services.traces.start();

  const app = createApp(services);
  const server = app.listen(config.server.port, () => {
    logger.info('GraphRAG server started', {
      port: config.server.port,
      env: config.server.env,
      nodeVersion: process.version,
    });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    services.sessions.stop();
    services.traces.stop();
    server.close(() => {
      mongoose.disconnect().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('MongoDB disconnect failed', { error: errorMessage(error) });
          process.exit(1);
        }
      );
    });
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  return server;
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.error('Failed to start server', { error: maskSensitiveData(errorMessage(error)) });
    process.exit(1);
  });
}
