import { before, after, test } from 'node:test';
import assert from 'node:assert';
import type { Server } from 'node:http';
import type { MatchStatusResponse, MatchTutorsResponse } from '@tutor-match/shared';
import { createApp } from '../app/createApp.js';
import { signAccessToken } from '../lib/auth/jwt.js';
import { createMatchEngine } from '../services/matching/index.js';
import { MemoryTutorDirectory } from '../services/directory/directory.js';
import { FakeClock, silentLogger } from '../services/matching/__tests__/fixtures.js';

process.env.JWT_ACCESS_SECRET = 'test-secret';

const allHigh = { TCS: 'HIGH', TSPI: 'HIGH', TWMLS: 'HIGH', TPO: 'HIGH', TECP: 'HIGH', TET: 'HIGH', TICS: 'HIGH', TRD: 'HIGH' } as const;
const halfHigh = { ...allHigh, TECP: 'LOW', TET: 'LOW', TICS: 'LOW', TRD: 'LOW' } as const;
const allLow = { TCS: 'LOW', TSPI: 'LOW', TWMLS: 'LOW', TPO: 'LOW', TECP: 'LOW', TET: 'LOW', TICS: 'LOW', TRD: 'LOW' } as const;

const assessment = {
  confidence: 20,
  anxiety: 50,
  processingSpeed: 20,
  workingMemory: 20,
  precision: 20,
  errorCorrection: 20,
  exploration: 20,
  impulsivity: 50,
  logicalReasoning: 50,
  hypotheticalReasoning: 50
};

const directory = new MemoryTutorDirectory({
  learners: [
    { id: 'learner-main', name: 'Main Learner', subjects: ['Maths'], assessment },
    { id: 'learner-burst', name: 'Burst Learner', subjects: ['Maths'], assessment },
    { id: 'learner-fresh', name: 'Fresh Learner', subjects: ['Maths'], assessment },
    { id: 'learner-new', name: 'New Learner', subjects: ['Maths'] }
  ],
  tutors: [
    { id: 'tutor-perfect', name: 'Perfect Fit', price: 800, subjects: ['Mathematics'], pedagogy: allHigh },
    { id: 'tutor-good', name: 'Good Fit', price: 600, subjects: ['Mathematics'], pedagogy: halfHigh },
    { id: 'tutor-poor', name: 'Poor Fit', price: 400, subjects: ['Mathematics'], pedagogy: allLow }
  ]
});

let server: Server;
let baseUrl = '';

before(async () => {
  const engine = createMatchEngine({ clock: new FakeClock(), logger: silentLogger });
  const app = createApp({ engine, directory, logger: silentLogger });
  await new Promise<void>((resolve) => {
    server = app.listen(0, () => resolve());
  });
  const addr = server.address();
  const port = typeof addr === 'string' ? 80 : addr?.port;
  baseUrl = `http://127.0.0.1:${port}`;
});

after(async () => {
  if (server) {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
});

function learnerToken(learnerId: string) {
  return signAccessToken({ sub: learnerId, role: 'learner' });
}

async function get(path: string, headers: Record<string, string> = {}) {
  const res = await fetch(`${baseUrl}${path}`, { headers });
  const body: unknown = await res.json();
  return { status: res.status, headers: res.headers, body };
}

function isMatchResponse(value: unknown): value is MatchTutorsResponse {
  return typeof value === 'object' && value !== null && 'success' in value && value.success === true
    && 'matches' in value && Array.isArray(value.matches);
}

function bearer(learnerId: string) {
  return { Authorization: `Bearer ${learnerToken(learnerId)}` };
}

test('health and meta are public', async () => {
  assert.deepStrictEqual((await get('/health')).body, { ok: true });
  assert.deepStrictEqual((await get('/api/meta')).body, { name: 'tutor-match', version: '0.1.0' });
});

test('matching requires a learner token', async () => {
  const anonymous = await get('/api/learner/match-tutors');
  assert.strictEqual(anonymous.status, 401);
  assert.deepStrictEqual(anonymous.body, { error: 'Authentication required' });

  const garbage = await get('/api/learner/match-tutors', { Authorization: 'Bearer not-a-token' });
  assert.strictEqual(garbage.status, 401);
  assert.deepStrictEqual(garbage.body, { error: 'invalid token' });

  const tutorToken = signAccessToken({ sub: 'tutor-perfect', role: 'tutor' });
  const forbidden = await get('/api/learner/match-tutors', { Authorization: `Bearer ${tutorToken}` });
  assert.strictEqual(forbidden.status, 403);
  assert.deepStrictEqual(forbidden.body, { error: 'Learner access required' });
});

test('returns ranked matches and then serves the cache', async () => {
  const first = await get('/api/learner/match-tutors', bearer('learner-main'));
  assert.strictEqual(first.status, 200);
  const body = first.body;
  assert.ok(isMatchResponse(body));
  assert.strictEqual(body.source, 'fallback');
  assert.strictEqual(body.cacheHit, false);
  assert.deepStrictEqual(body.matches.map((m) => m.tutor.id), ['tutor-perfect', 'tutor-good', 'tutor-poor']);
  assert.deepStrictEqual(body.matches[0], {
    tutor: { id: 'tutor-perfect', name: 'Perfect Fit', price: 800, subjects: ['Mathematics'] },
    matchDetails: {
      compatibilityScore: 100,
      cognitiveMatchCount: 8,
      subjectOverlapRatio: 1,
      reasoning: body.matches[0]?.matchDetails.reasoning,
      subjectExplanation: 'Full subject match: Maths.'
    }
  });

  const cookie = `access_token=${learnerToken('learner-main')}`;
  const second = await get('/api/learner/match-tutors', { Cookie: cookie });
  assert.strictEqual(second.status, 200);
  assert.deepStrictEqual(second.body, { ...body, cacheHit: true, source: 'cache' });
});

test('a learner without an assessment gets a 400', async () => {
  const res = await get('/api/learner/match-tutors', bearer('learner-new'));
  assert.strictEqual(res.status, 400);
  assert.deepStrictEqual(res.body, { error: 'ASSESSMENT_REQUIRED', message: 'Cognitive assessment required' });
});

test('an unknown learner gets a 404', async () => {
  const res = await get('/api/learner/match-tutors', bearer('learner-ghost'));
  assert.strictEqual(res.status, 404);
  assert.deepStrictEqual(res.body, { error: 'LEARNER_NOT_FOUND', message: 'Learner profile not found' });
});

test('the sixth request gets a 429 with Retry-After', async () => {
  for (let i = 0; i < 5; i += 1) {
    const ok = await get('/api/learner/match-tutors', bearer('learner-burst'));
    assert.strictEqual(ok.status, 200);
  }
  const limited = await get('/api/learner/match-tutors', bearer('learner-burst'));
  assert.strictEqual(limited.status, 429);
  assert.strictEqual(limited.headers.get('retry-after'), '300');
  assert.deepStrictEqual(limited.body, {
    error: 'RATE_LIMITED',
    message: 'Too many matching requests. Please wait before trying again.',
    retryAfter: 300
  });
});

test('match-status reports quota without consuming it', async () => {
  const expected: MatchStatusResponse = {
    aiEnabled: false,
    provider: null,
    model: null,
    remainingRequests: 5,
    windowSeconds: 300
  };
  assert.deepStrictEqual((await get('/api/learner/match-status', bearer('learner-fresh'))).body, expected);
  assert.deepStrictEqual((await get('/api/learner/match-status', bearer('learner-fresh'))).body, expected);
});
