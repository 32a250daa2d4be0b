// OpenAPI 3.0 document for the job and webhook-monitoring endpoints

const servers = [{ url: 'http://localhost:4000/api', description: 'Local API' }];

const signatureHeader = {
  in: 'header',
  name: 'X-Signature',
  required: true,
  description: 'Hex HMAC-SHA256 of the request path and query string, keyed with the shared key.',
  schema: { type: 'string' },
};

const jobIdParam = { in: 'path', name: 'id', required: true, schema: { type: 'string', format: 'uuid' } };

const errorResponse = (description: string) => ({
  description,
  content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } },
});

const jsonResponse = (description: string, ref: string) => ({
  description,
  content: { 'application/json': { schema: { $ref: `#/components/schemas/${ref}` } } },
});

export const openapiSpec = {
  openapi: '3.0.3',
  info: {
    title: 'Lot Batch API',
    version: '1.0.0',
    description:
      'Submit vehicle lots for batch vision description and translation. Results are delivered to signed webhooks and can be polled.',
  },
  servers,
  tags: [
    { name: 'Jobs', description: 'Job submission, status, results and cancellation' },
    { name: 'Webhooks', description: 'Delivery metrics and endpoint health' },
  ],
  paths: {
    '/v1/jobs': {
      post: {
        tags: ['Jobs'],
        summary: 'Create a batch job',
        description: '`signature` is the hex HMAC-SHA256 of the canonical JSON of `lots` (sorted keys, no whitespace).',
        requestBody: {
          required: true,
          content: { 'application/json': { schema: { $ref: '#/components/schemas/CreateJobRequest' } } },
        },
        responses: {
          '202': jsonResponse('Job accepted', 'CreateJobResponse'),
          '400': errorResponse('Malformed request'),
          '403': errorResponse('Invalid signature'),
        },
      },
      get: {
        tags: ['Jobs'],
        summary: 'List jobs, newest first',
        parameters: [
          signatureHeader,
          { in: 'query', name: 'status', schema: { $ref: '#/components/schemas/JobStatus' } },
          { in: 'query', name: 'limit', schema: { type: 'integer', minimum: 1, maximum: 100, default: 20 } },
          { in: 'query', name: 'offset', schema: { type: 'integer', minimum: 0, default: 0 } },
        ],
        responses: { '200': { description: 'Job summaries' }, '403': errorResponse('Invalid signature') },
      },
    },
    '/v1/jobs/{id}/status': {
      get: {
        tags: ['Jobs'],
        summary: 'Job status and progress',
        parameters: [signatureHeader, jobIdParam],
        responses: {
          '200': jsonResponse('Snapshot', 'JobSnapshot'),
          '403': errorResponse('Invalid signature'),
          '404': errorResponse('Unknown job'),
        },
      },
    },
    '/v1/jobs/{id}/results': {
      get: {
        tags: ['Jobs'],
        summary: 'Per-lot descriptions of a completed job',
        parameters: [signatureHeader, jobIdParam],
        responses: {
          '200': jsonResponse('Results', 'JobResults'),
          '202': { description: 'Job not completed yet' },
          '403': errorResponse('Invalid signature'),
          '404': errorResponse('Unknown job'),
        },
      },
    },
    '/v1/jobs/{id}/cancel': {
      post: {
        tags: ['Jobs'],
        summary: 'Cancel a pending or running job',
        description: 'Local only: the remote batch keeps running and its results are ignored.',
        parameters: [signatureHeader, jobIdParam],
        requestBody: {
          content: { 'application/json': { schema: { type: 'object', properties: { reason: { type: 'string' } } } } },
        },
        responses: {
          '200': { description: 'Cancelled' },
          '403': errorResponse('Invalid signature'),
          '404': errorResponse('Unknown job'),
          '409': errorResponse('Job is no longer cancellable'),
        },
      },
    },
    '/v1/webhooks/metrics': {
      get: {
        tags: ['Webhooks'],
        summary: 'Delivery metrics for a trailing window',
        parameters: [signatureHeader, { in: 'query', name: 'hours', schema: { type: 'integer', minimum: 1, default: 24 } }],
        responses: { '200': { description: 'Metrics' } },
      },
    },
    '/v1/webhooks/failures': {
      get: {
        tags: ['Webhooks'],
        summary: 'Permanently failed deliveries, most recent attempt first',
        parameters: [signatureHeader, { in: 'query', name: 'limit', schema: { type: 'integer', minimum: 1, maximum: 100, default: 10 } }],
        responses: { '200': { description: 'Failures' } },
      },
    },
    '/v1/webhooks/endpoints': {
      get: {
        tags: ['Webhooks'],
        summary: 'Per-endpoint delivery health, worst first',
        parameters: [signatureHeader],
        responses: { '200': { description: 'Endpoint health' } },
      },
    },
    '/v1/webhooks/alerts': {
      get: {
        tags: ['Webhooks'],
        summary: 'Delivery alerts over the last hour',
        parameters: [signatureHeader],
        responses: { '200': { description: 'Alerts' } },
      },
    },
  },
  components: {
    schemas: {
      Error: { type: 'object', properties: { error: { type: 'string' } }, required: ['error'] },
      JobStatus: { type: 'string', enum: ['pending', 'processing', 'translating', 'completed', 'failed', 'cancelled'] },
      CreateJobRequest: {
        type: 'object',
        required: ['languages', 'lots', 'signature'],
        properties: {
          version: { type: 'string' },
          languages: { type: 'array', items: { type: 'string' }, example: ['en', 'fr'] },
          webhook_url: { type: 'string', format: 'uri' },
          signature: { type: 'string' },
          lots: {
            type: 'array',
            items: {
              type: 'object',
              required: ['lot_id'],
              properties: {
                lot_id: { type: 'string' },
                additional_info: { type: 'string' },
                images: { type: 'array', items: { type: 'object', properties: { url: { type: 'string' } } } },
                image_urls: { type: 'array', items: { type: 'string' } },
                webhook: { type: 'string', format: 'uri' },
              },
            },
          },
        },
      },
      CreateJobResponse: {
        type: 'object',
        properties: {
          job_id: { type: 'string' },
          status: { $ref: '#/components/schemas/JobStatus' },
          error_message: { type: 'string', nullable: true },
        },
      },
      JobSnapshot: {
        type: 'object',
        properties: {
          jobId: { type: 'string' },
          status: { $ref: '#/components/schemas/JobStatus' },
          languages: { type: 'array', items: { type: 'string' } },
          progress: {
            type: 'object',
            properties: {
              totalLots: { type: 'integer' },
              processedLots: { type: 'integer' },
              failedLots: { type: 'integer' },
              completionPercentage: { type: 'number' },
            },
          },
          errorMessage: { type: 'string', nullable: true },
        },
      },
      JobResults: {
        type: 'object',
        properties: {
          job_id: { type: 'string' },
          status: { $ref: '#/components/schemas/JobStatus' },
          completed_at: { type: 'string', format: 'date-time' },
          lots: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                lot_id: { type: 'string' },
                status: { type: 'string' },
                descriptions: {
                  type: 'array',
                  items: { type: 'object', properties: { language: { type: 'string' }, damages: { type: 'string' } } },
                },
                missing_images: { type: 'array', items: { type: 'string' } },
                error: { type: 'string' },
              },
            },
          },
        },
      },
    },
  },
};
