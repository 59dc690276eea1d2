import { Server } from 'http';
import axios, { AxiosInstance } from 'axios';
import { createApp } from '../index';
import { createServices } from '../core/container';
import { SessionMemory } from '../services/session-memory.service';
import { TraceStore } from '../services/trace-store';
import { FakeEmbedder, InMemoryGraphStore, InMemoryVectorIndex, ScriptedCompletion } from './helpers/fakes';
import { HIT_GUIDE, HIT_MANUAL, maintenanceGraph } from './helpers/fixtures';

describe('HTTP API', () => {
  let server: Server;
  let client: AxiosInstance;
  let completion: ScriptedCompletion;
  let vectorIndex: InMemoryVectorIndex;
  let graphStore: InMemoryGraphStore;

  beforeEach(async () => {
    completion = new ScriptedCompletion({
      classify: () => '{"intent": "people", "confidence": 0.9, "reasoning": "asks about a person"}',
      generate: () => 'John Smith (Mechanical Technician) is responsible for P-101 [1].',
    });
    vectorIndex = new InMemoryVectorIndex([HIT_MANUAL, HIT_GUIDE]);
    graphStore = maintenanceGraph();

    const services = createServices(
      { completion, embedder: new FakeEmbedder(), vectorIndex, graphStore },
      {
        sessions: new SessionMemory({ ttlMs: 60000 }),
        traces: new TraceStore({ ttlMs: 60000 }),
        orchestrator: { totalTimeoutMs: 5000, parallel: true },
      }
    );

    server = await new Promise<Server>(resolve => {
      const listening = createApp(services).listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Test server did not bind to a TCP port');
    }
    client = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
  });

  describe('health', () => {
    test('should report liveness', async () => {
      const response = await client.get('/health/live');

      expect(response.status).toBe(200);
      expect(response.data.status).toBe('ok');
    });

    test('should report readiness when both stores respond', async () => {
      const response = await client.get('/health/ready');

      expect(response.status).toBe(200);
      expect(response.data.status).toBe('ready');
      expect(response.data.checks).toEqual({ vector_index: { status: 'ok' }, graph: { status: 'ok' } });
    });

    test('should report unavailable when the graph is down', async () => {
      graphStore.fail = new Error('ECONNREFUSED');

      const response = await client.get('/health/ready');

      expect(response.status).toBe(503);
      expect(response.data.status).toBe('unavailable');
      expect(response.data.checks.graph).toEqual({ status: 'error', error: 'ECONNREFUSED' });
    });
  });

  describe('POST /api/v1/chat', () => {
    test('should return the answer with facts, sources and steps', async () => {
      const response = await client.post('/api/v1/chat', { message: 'Who maintains pump P-101?' });

      expect(response.status).toBe(200);
      expect(response.data.message).toBe('John Smith (Mechanical Technician) is responsible for P-101 [1].');
      expect(response.data.intent).toBe('people');
      expect(response.data.graph_facts).toEqual(['John Smith (Mechanical Technician) is responsible for P-101']);
      expect(response.data.citations).toEqual([1]);
      expect(response.data.sources[0].metadata.chunk_id).toBe('chunk-1');
      expect(response.data.low_confidence).toBe(false);
      expect(response.data.retrieval_steps[0]).toMatchObject({ stage: 'query_received', state: 'received' });
      expect(typeof response.data.retrieval_steps[0].duration_ms).toBe('number');
      expect(typeof response.data.session_id).toBe('string');
      expect(typeof response.data.trace_id).toBe('string');
    });

    test('should resolve follow-ups within the given session', async () => {
      await client.post('/api/v1/chat', { message: 'Who maintains pump P-101?', session_id: 'session-1' });

      const response = await client.post('/api/v1/chat', { message: 'What team is he on?', session_id: 'session-1' });

      expect(response.status).toBe(200);
      expect(response.data.resolved_query).toBe('What team is John Smith on?');
      expect(response.data.session_id).toBe('session-1');
    });

    test('should reject an empty message', async () => {
      const response = await client.post('/api/v1/chat', { message: '   ' });

      expect(response.status).toBe(400);
      expect(response.data.success).toBe(false);
      expect(response.data.error.code).toBe('VALIDATION_ERROR');
      expect(completion.calls).toHaveLength(0);
    });

    test('should reject a malformed session id', async () => {
      const response = await client.post('/api/v1/chat', { message: 'Who maintains pump P-101?', session_id: 'bad id!' });

      expect(response.status).toBe(400);
      expect(response.data.error.code).toBe('VALIDATION_ERROR');
    });

    test('should reject a body that is not a JSON object', async () => {
      const response = await client.post('/api/v1/chat', '"just a string"', {
        headers: { 'Content-Type': 'application/json' },
      });

      expect(response.status).toBe(400);
      expect(response.data.error.code).toBe('VALIDATION_ERROR');
    });

    test('should map a generation failure to 502 with the partial trace', async () => {
      completion.set('generate', () => {
        throw new Error('upstream 500');
      });

      const response = await client.post('/api/v1/chat', { message: 'Who maintains pump P-101?' });

      expect(response.status).toBe(502);
      expect(response.data.success).toBe(false);
      expect(response.data.error).toEqual({
        code: 'GENERATION_ERROR',
        message: 'Answer generation failed: upstream 500',
      });
      expect(response.data.intent).toBe('people');
      expect(response.data.retrieval_steps.map((step: { state: string }) => step.state)).toContain('failed');
    });
  });

  describe('traces', () => {
    test('should return the latest trace of a session', async () => {
      const chat = await client.post('/api/v1/chat', { message: 'Who maintains pump P-101?', session_id: 'session-1' });

      const response = await client.get('/api/v1/chat/trace/session-1');

      expect(response.status).toBe(200);
      expect(response.data.data.trace_id).toBe(chat.data.trace_id);
      expect(response.data.data.status).toBe('completed');
    });

    test('should return a trace by id', async () => {
      const chat = await client.post('/api/v1/chat', { message: 'Who maintains pump P-101?' });

      const response = await client.get(`/api/v1/query/${chat.data.trace_id}/trace`);

      expect(response.status).toBe(200);
      expect(response.data.data.graph_facts).toEqual(['John Smith (Mechanical Technician) is responsible for P-101']);
    });

    test('should return 404 for unknown traces', async () => {
      const bySession = await client.get('/api/v1/chat/trace/nobody');
      const byId = await client.get('/api/v1/query/missing/trace');

      expect(bySession.status).toBe(404);
      expect(byId.status).toBe(404);
      expect(byId.data.error.code).toBe('NOT_FOUND');
    });
  });

  describe('sessions', () => {
    test('should show and clear a session', async () => {
      await client.post('/api/v1/chat', { message: 'Who maintains pump P-101?', session_id: 'session-1' });

      const shown = await client.get('/api/v1/sessions/session-1');
      expect(shown.status).toBe(200);
      expect(shown.data.data.turns).toHaveLength(1);
      expect(shown.data.data.turns[0].query).toBe('Who maintains pump P-101?');

      const cleared = await client.delete('/api/v1/sessions/session-1');
      expect(cleared.status).toBe(200);

      expect((await client.get('/api/v1/sessions/session-1')).status).toBe(404);
      expect((await client.get('/api/v1/chat/trace/session-1')).status).toBe(404);
    });

    test('should return 404 when clearing an unknown session', async () => {
      const response = await client.delete('/api/v1/sessions/nobody');

      expect(response.status).toBe(404);
    });
  });

  describe('GET /api/v1/graph/stats', () => {
    test('should count nodes per label and relationships per type', async () => {
      const response = await client.get('/api/v1/graph/stats');

      expect(response.status).toBe(200);
      expect(response.data.data).toEqual({
        total_nodes: 11,
        total_relationships: 9,
        nodes_by_label: {
          Person: 2,
          Role: 1,
          Team: 1,
          Asset: 2,
          Component: 2,
          Location: 1,
          Document: 1,
          Chunk: 1,
        },
        relationships_by_type: {
          HAS_ROLE: 1,
          RESPONSIBLE_FOR: 1,
          MEMBER_OF: 1,
          SAFETY_OVERSIGHT: 1,
          HAS_COMPONENT: 2,
          LOCATED_AT: 1,
          APPLIES_TO: 1,
          MENTIONS: 1,
        },
      });
    });

    test('should return 500 when the graph cannot be read', async () => {
      graphStore.fail = new Error('ECONNREFUSED');

      const response = await client.get('/api/v1/graph/stats');

      expect(response.status).toBe(500);
      expect(response.data.error.code).toBe('INTERNAL_ERROR');
    });
  });

  describe('GET /api/v1/graph/neighborhood/:nodeId', () => {
    test('should return nodes and edges within two hops by default', async () => {
      const response = await client.get('/api/v1/graph/neighborhood/person-john');

      expect(response.status).toBe(200);
      expect(response.data.data.center_node).toEqual({
        id: 'person-john',
        label: 'Person',
        name: 'John Smith',
        view: 'people',
      });
      expect(response.data.data.hops).toBe(2);
      expect(response.data.data.nodes.map((node: { id: string }) => node.id)).toEqual([
        'role-mech',
        'team-rotating',
        'asset-p101',
      ]);
      expect(response.data.data.edges).toEqual([
        { source: 'person-john', target: 'role-mech', type: 'HAS_ROLE' },
        { source: 'person-john', target: 'team-rotating', type: 'MEMBER_OF' },
        { source: 'role-mech', target: 'asset-p101', type: 'RESPONSIBLE_FOR' },
      ]);
    });

    test('should limit the walk to the requested hops', async () => {
      const response = await client.get('/api/v1/graph/neighborhood/person-john', { params: { hops: 1 } });

      expect(response.status).toBe(200);
      expect(response.data.data.hops).toBe(1);
      expect(response.data.data.nodes.map((node: { id: string }) => node.id)).toEqual(['role-mech', 'team-rotating']);
      expect(response.data.data.edges).toHaveLength(2);
    });

    test('should reject hops outside the allowed range', async () => {
      const tooMany = await client.get('/api/v1/graph/neighborhood/person-john', { params: { hops: 9 } });
      const zero = await client.get('/api/v1/graph/neighborhood/person-john', { params: { hops: 0 } });

      expect(tooMany.status).toBe(400);
      expect(tooMany.data.error.code).toBe('VALIDATION_ERROR');
      expect(zero.status).toBe(400);
    });

    test('should return 404 for an unknown node', async () => {
      const response = await client.get('/api/v1/graph/neighborhood/nobody');

      expect(response.status).toBe(404);
      expect(response.data.error.code).toBe('NOT_FOUND');
    });
  });
});
