import type { FastifyInstance } from 'fastify';
import { InputValidationError } from '../errors.js';
import type { AssessmentService } from '../services/assessment.service.js';
import type { AssessmentOutcome, SubjectIdentifier } from '../types.js';
import {
  parseJournalQuery,
  parsePaperQuery,
  type JournalQuery,
  type PaperQuery,
} from '../validation/identifiers.js';

export const MAX_BATCH_ITEMS = 20;

export interface AssessmentRoutesOptions {
  assessment: AssessmentService;
}

type JournalRequest = JournalQuery & { rationale?: boolean };
type PaperRequest = PaperQuery & { rationale?: boolean };

export type BatchItem =
  | ({ type: 'journal' } & JournalQuery)
  | ({ type: 'paper' } & PaperQuery);

export type BatchResult = {
  input: BatchItem;
  outcome: AssessmentOutcome | { status: 'invalid'; message: string };
};

export function statusCodeFor(outcome: AssessmentOutcome): number {
  switch (outcome.status) {
    case 'scored':
    case 'insufficient_data':
      return 200;
    case 'not_found':
      return 404;
    case 'fetch_error':
      return 502;
  }
}

function identifierFor(item: BatchItem): SubjectIdentifier {
  return item.type === 'journal'
    ? parseJournalQuery({ issn: item.issn, name: item.name })
    : parsePaperQuery({ doi: item.doi, title: item.title });
}

const identifierField = { type: 'string', maxLength: 2048 } as const;

export async function assessmentRoutes(app: FastifyInstance, options: AssessmentRoutesOptions) {
  const { assessment } = options;

  // Assess a journal by ISSN or name
  app.post<{ Body: JournalRequest }>(
    '/assess/journal',
    {
      schema: {
        body: {
          type: 'object',
          properties: {
            issn: identifierField,
            name: identifierField,
            rationale: { type: 'boolean' },
          },
        },
      },
    },
    async (request, reply) => {
      const { issn, name, rationale } = request.body;
      const identifier = parseJournalQuery({ issn, name });

      const outcome = await assessment.assess(identifier, { rationale });
      return reply.status(statusCodeFor(outcome)).send(outcome);
    }
  );

  // Assess a paper by DOI or title
  app.post<{ Body: PaperRequest }>(
    '/assess/paper',
    {
      schema: {
        body: {
          type: 'object',
          properties: {
            doi: identifierField,
            title: identifierField,
            rationale: { type: 'boolean' },
          },
        },
      },
    },
    async (request, reply) => {
      const { doi, title, rationale } = request.body;
      const identifier = parsePaperQuery({ doi, title });

      const outcome = await assessment.assess(identifier, { rationale });
      return reply.status(statusCodeFor(outcome)).send(outcome);
    }
  );

  // Assess several journals and papers, one after another, without rationales
  app.post<{ Body: { items: BatchItem[] } }>(
    '/assess/batch',
    {
      schema: {
        body: {
          type: 'object',
          required: ['items'],
          properties: {
            items: {
              type: 'array',
              minItems: 1,
              maxItems: MAX_BATCH_ITEMS,
              items: {
                type: 'object',
                required: ['type'],
                properties: {
                  type: { type: 'string', enum: ['journal', 'paper'] },
                  issn: identifierField,
                  name: identifierField,
                  doi: identifierField,
                  title: identifierField,
                },
              },
            },
          },
        },
      },
    },
    async (request) => {
      const results: BatchResult[] = [];

      for (const input of request.body.items) {
        let identifier: SubjectIdentifier;
        try {
          identifier = identifierFor(input);
        } catch (error) {
          if (!(error instanceof InputValidationError)) throw error;
          results.push({ input, outcome: { status: 'invalid', message: error.message } });
          continue;
        }

        results.push({ input, outcome: await assessment.assess(identifier) });
      }

      return { results };
    }
  );
}
