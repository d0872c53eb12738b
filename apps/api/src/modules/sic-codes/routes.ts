import type { FastifyInstance } from 'fastify';
import { z } from 'zod/v4';
import {
  ErrorEnvelopeSchema,
  SicAssessInputSchema,
  SicAssessResponseSchema,
  SicBatchMatchInputSchema,
  SicBatchMatchResponseSchema,
  SicClassificationSchema,
  SicCodeParamsSchema,
  SicCodesQuerySchema,
  SicCodesResponseSchema,
  SicEntrySchema,
  SicMatchInputSchema,
} from '@sicmatch/types';
import { observeClassification } from '../../lib/metrics.js';
import { assessCurrentCode, predictCode } from './services/assess.js';
import type { SicMatcher } from './services/match.js';

export type SicRoutesOptions = { matcher: SicMatcher };

export default async function sicRoutes(app: FastifyInstance, { matcher }: SicRoutesOptions) {
  const { catalog } = matcher;

  app.post<{
    Body: z.infer<typeof SicMatchInputSchema>;
    Reply: z.infer<typeof SicClassificationSchema>;
  }>(
    '/match',
    {
      schema: {
        tags: ['SIC'],
        body: SicMatchInputSchema,
        response: { 200: SicClassificationSchema },
      },
      config: { rateLimit: { max: 300, timeWindow: '1 minute' } },
    },
    async (req, reply) => {
      const { description, limit, minScore } = req.body;
      const out = observeClassification(() => matcher.classify(description, { limit, minScore }));
      return reply.send(out);
    }
  );

  app.post<{
    Body: z.infer<typeof SicBatchMatchInputSchema>;
    Reply: z.infer<typeof SicBatchMatchResponseSchema>;
  }>(
    '/match/batch',
    {
      schema: {
        tags: ['SIC'],
        body: SicBatchMatchInputSchema,
        response: { 200: SicBatchMatchResponseSchema },
      },
      config: { rateLimit: { max: 30, timeWindow: '1 minute' } },
    },
    async (req, reply) => {
      const { descriptions, limit, minScore } = req.body;
      const results = descriptions.map((d) =>
        observeClassification(() => matcher.classify(d, { limit, minScore }))
      );
      return reply.send({ results });
    }
  );

  app.post<{
    Body: z.infer<typeof SicAssessInputSchema>;
    Reply: z.infer<typeof SicAssessResponseSchema>;
  }>(
    '/assess',
    {
      schema: {
        tags: ['SIC'],
        body: SicAssessInputSchema,
        response: { 200: SicAssessResponseSchema },
      },
    },
    async (req, reply) => {
      const { description, currentCode } = req.body;
      return reply.send({
        current: assessCurrentCode(matcher, description, currentCode),
        predicted: predictCode(matcher, description),
      });
    }
  );

  app.get<{
    Querystring: z.infer<typeof SicCodesQuerySchema>;
    Reply: z.infer<typeof SicCodesResponseSchema>;
  }>(
    '/codes',
    {
      schema: {
        tags: ['SIC'],
        querystring: SicCodesQuerySchema,
        response: { 200: SicCodesResponseSchema },
      },
    },
    async (req) => {
      const { q, limit } = req.query;
      return catalog.search(q, limit);
    }
  );

  app.get<{
    Params: z.infer<typeof SicCodeParamsSchema>;
    Reply: z.infer<typeof SicEntrySchema>;
  }>(
    '/codes/:code',
    {
      schema: {
        tags: ['SIC'],
        params: SicCodeParamsSchema,
        response: { 200: SicEntrySchema, 404: ErrorEnvelopeSchema },
      },
    },
    async (req) => {
      const entry = catalog.get(req.params.code);
      if (!entry) throw app.httpErrors.notFound(`Unknown SIC code "${req.params.code}"`);
      return entry;
    }
  );
}
