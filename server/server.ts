import Fastify from 'fastify';
import { z, type ZodError } from 'zod';
import { loadSettings } from '../config/settings';
import { buildAdvisor, type AdvisorContext } from '../runtime/build-advisor';
import { parseWorldSnapshot } from '../world/snapshot-reader';
import type { WorldSnapshot } from '../world/types';

const goalUpdateSchema = z.object({
  update: z.string().min(1)
});

const navigationQuerySchema = z.object({
  mapId: z.coerce.number().int().min(0).optional()
});

const navigationTargetSchema = z.object({
  mapId: z.number().int().min(0),
  landmark: z.string().min(1)
});

const decisionSchema = z.object({
  action: z.string().min(1),
  observation: z.string().optional(),
  goalUpdate: z.string().nullable().optional(),
  fled: z.boolean().optional(),
  mapId: z.number().int().min(0).optional()
});

function issueMessage(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}

export interface BuildServerOptions {
  logger?: boolean;
  /** Pre-built subsystems; loaded from the environment when omitted. */
  context?: AdvisorContext;
}

/** HTTP surface over the advisor for dashboards and the decision loop. */
export async function buildServer(options: BuildServerOptions = {}) {
  const fastify = Fastify({ logger: options.logger ?? true });
  const context = options.context ?? buildAdvisor(loadSettings());
  const { advisor, goalTree, goalSelector, navigator, battleTracker, playerStats } = context;

  fastify.get('/health', async () => ({ status: 'ok', ticks: advisor.ticks }));

  fastify.get('/goals', async () => ({
    tree: goalTree.render(),
    goals: goalTree.summaries(),
    current: goalSelector.describeCurrentGoal()
  }));

  fastify.post('/goals/update', async (request, reply) => {
    const parsed = goalUpdateSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400).send({ error: issueMessage(parsed.error) });
      return;
    }
    return goalSelector.applyGoalUpdate(parsed.data.update);
  });

  fastify.get('/battle', async () => battleTracker.stats());

  fastify.get('/stats', async () => playerStats.snapshot());

  fastify.get('/navigation', async (request, reply) => {
    const parsed = navigationQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      reply.code(400).send({ error: issueMessage(parsed.error) });
      return;
    }
    const { mapId } = parsed.data;
    return {
      ...navigator.snapshot(),
      targets: mapId === undefined ? [] : navigator.availableTargets(mapId)
    };
  });

  fastify.post('/navigation/target', async (request, reply) => {
    const parsed = navigationTargetSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400).send({ error: issueMessage(parsed.error) });
      return;
    }
    const { mapId, landmark } = parsed.data;
    if (!navigator.setTarget(mapId, landmark)) {
      reply.code(404).send({ error: `Unknown landmark '${landmark}' on map ${mapId}` });
      return;
    }
    return navigator.snapshot();
  });

  fastify.post('/navigation/cancel', async () => {
    navigator.cancel();
    return navigator.snapshot();
  });

  fastify.post('/tick', async (request, reply) => {
    let snapshot: WorldSnapshot;
    try {
      snapshot = parseWorldSnapshot(request.body ?? {});
    } catch (err) {
      if (err instanceof z.ZodError) {
        reply.code(400).send({ error: issueMessage(err) });
        return;
      }
      throw err;
    }
    const advisory = advisor.tick(snapshot);
    return { ...advisory, text: advisor.formatAdvisory(advisory) };
  });

  fastify.post('/decision', async (request, reply) => {
    const parsed = decisionSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400).send({ error: issueMessage(parsed.error) });
      return;
    }
    return advisor.recordDecision(parsed.data);
  });

  return fastify;
}

if (require.main === module) {
  const settings = loadSettings();
  buildServer()
    .then(async (fastify) => {
      try {
        await fastify.listen({ port: settings.port, host: '0.0.0.0' });
        console.log(`[INFO] Advisor server listening on port ${settings.port}`);
      } catch (error) {
        console.error(`[ERROR] Failed to start server on port ${settings.port}:`, error);
        process.exit(1);
      }
    })
    .catch((error: unknown) => {
      console.error('[ERROR] Failed to build server:', error);
      process.exit(1);
    });
}
