import Fastify from 'fastify';
import type { TypeBoxTypeProvider } from '@fastify/type-provider-typebox';
import {
  GenerationRequestSchema,
  ChannelParamsSchema,
  CorpusSummaryResponseSchema,
  ErrorResponseSchema,
  type CorpusSummaryResponse,
  type GenerationRequest,
} from './schemas';
import { resolveGeneratorConfig } from '../config/generator';
import { serverLoggerOptions } from '../config/logger';
import { generateCorpus } from '../utils/corpus';
import { bankToCsv, momoToCsv, CORPUS_FILE_NAMES } from '../utils/csv';
import { ConfigurationError } from '../utils/errors';

function configFromRequest(body: GenerationRequest) {
  return resolveGeneratorConfig({ ...body });
}

/**
 * Build the corpus service. Generation runs in-process per request; the
 * service writes nothing to disk.
 */
export function buildServer() {
  const app = Fastify({
    logger: serverLoggerOptions,
  }).withTypeProvider<TypeBoxTypeProvider>();

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ConfigurationError) {
      return reply.status(422).send({
        error: error.name,
        message: error.message,
        details: error.details,
      });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error(error);
    }
    return reply.status(statusCode).send({
      error: error.name,
      message: error.message,
    });
  });

  /**
   * POST /v1/corpus/summary - Generate a corpus and return its counts
   */
  app.post(
    '/v1/corpus/summary',
    {
      schema: {
        body: GenerationRequestSchema,
        response: {
          200: CorpusSummaryResponseSchema,
          422: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const config = configFromRequest(request.body);
      const generated = generateCorpus(config);

      const response: CorpusSummaryResponse = {
        summary: generated.summary,
        tiers: generated.tiers,
        instances: generated.instances,
        config: {
          seed: config.seed,
          customers: config.customers,
          momo_legit: config.momo_legit,
          bank_legit: config.bank_legit,
          attacks: config.attacks,
          window_days: config.window_days,
          attack_window_days: config.attack_window_days,
          reference_time: config.reference_time,
        },
      };

      return reply.status(200).send(response);
    }
  );

  /**
   * POST /v1/corpus/:channel - Generate a corpus and return one table as CSV
   */
  app.post(
    '/v1/corpus/:channel',
    {
      schema: {
        params: ChannelParamsSchema,
        body: GenerationRequestSchema,
      },
    },
    async (request, reply) => {
      const { channel } = request.params;
      const { corpus } = generateCorpus(configFromRequest(request.body));
      const csv = channel === 'momo' ? momoToCsv(corpus.momo) : bankToCsv(corpus.bank);

      return reply
        .status(200)
        .header('content-disposition', `attachment; filename="${CORPUS_FILE_NAMES[channel]}"`)
        .type('text/csv; charset=utf-8')
        .send(csv);
    }
  );

  // Health check endpoint
  app.get('/health', async () => {
    return { status: 'ok' };
  });

  return app;
}
