const errorSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', example: 'error' },
    message: { type: 'string' },
    valetRequestUrl: { type: 'string' },
    requestedStart: { type: 'string', format: 'date' },
    requestedEnd: { type: 'string', format: 'date' }
  }
};

export const openApiSpec = {
  openapi: '3.1.0',
  info: {
    title: 'Bank of Canada FX Rates API',
    version: '1.0.0',
    description: `USD/CAD exchange rates from the Bank of Canada Valet service.

A date with no published rate (weekend, holiday) resolves to the preceding business day.
Range queries start from that same day and include every published day through the end date.

**Valet documentation:** https://www.bankofcanada.ca/valet/docs

**Features:**
- Redis cache (optional, 1h TTL)
- Rate limiting: 30 requests/min towards Valet
- Exact decimal rates, 4 decimal places`,
    contact: {
      name: 'API Support'
    }
  },
  servers: [
    {
      url: 'http://localhost:8000',
      description: 'Development server'
    }
  ],
  paths: {
    '/api/health': {
      get: {
        summary: 'Health check',
        description: 'Reports API, rate limiter and Redis status',
        tags: ['System'],
        responses: {
          '200': {
            description: 'API is healthy',
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  properties: {
                    status: { type: 'string', example: 'ok' },
                    timestamp: { type: 'string', format: 'date-time' },
                    valetBlockedUntil: { type: 'string', format: 'date-time', nullable: true },
                    rateLimitPerMinute: { type: 'number', example: 30 },
                    redis: {
                      type: 'object',
                      properties: {
                        status: { type: 'string', example: 'connected' },
                        cachedKeys: { type: 'number', example: 5 },
                        ttlSeconds: { type: 'number', example: 3600 }
                      }
                    }
                  }
                }
              }
            }
          }
        }
      }
    },
    '/api/boc-exchange': {
      get: {
        summary: 'Get USD/CAD exchange rates',
        description: `Rate for a single date, or every published rate of a range.

Single date:
\`\`\`
http://localhost:8000/api/boc-exchange?start=2025-01-18
\`\`\`
returns the Friday 2025-01-17 observation.

Range, CAD to USD:
\`\`\`
http://localhost:8000/api/boc-exchange?start=2025-01-18&end=2025-01-21&reverse=true
\`\`\``,
        tags: ['Exchange Rates'],
        parameters: [
          {
            name: 'start',
            in: 'query',
            required: true,
            description: 'Single date, or start of the range (YYYY-MM-DD)',
            schema: { type: 'string', format: 'date' },
            example: '2025-01-15'
          },
          {
            name: 'end',
            in: 'query',
            required: false,
            description: 'End of the range (YYYY-MM-DD), not before start',
            schema: { type: 'string', format: 'date' },
            example: '2025-01-21'
          },
          {
            name: 'reverse',
            in: 'query',
            required: false,
            description: 'Return CAD to USD instead of USD to CAD',
            schema: { type: 'string', enum: ['true', 'false', '1', '0'] },
            example: 'false'
          }
        ],
        'x-codeSamples': [
          {
            lang: 'Shell',
            source: "curl 'http://localhost:8000/api/boc-exchange?start=2025-01-15'"
          },
          {
            lang: 'Shell',
            label: 'Range',
            source: "curl 'http://localhost:8000/api/boc-exchange?start=2025-01-15&end=2025-01-21'"
          }
        ],
        responses: {
          '200': {
            description: 'Selected observations',
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  properties: {
                    status: { type: 'string', example: 'success' },
                    series: { type: 'string', example: 'FXUSDCAD' },
                    base: { type: 'string', example: 'USD' },
                    quote: { type: 'string', example: 'CAD' },
                    start: { type: 'string', format: 'date' },
                    end: { type: 'string', format: 'date', nullable: true },
                    observations: {
                      type: 'array',
                      items: {
                        type: 'object',
                        properties: {
                          date: { type: 'string', format: 'date' },
                          rate: { type: 'string', example: '1.4389' }
                        }
                      }
                    },
                    source: { type: 'string', example: 'Bank of Canada (Valet)' },
                    queriedAt: { type: 'string', format: 'date-time' },
                    valetRequestUrl: { type: 'string' },
                    cached: { type: 'boolean', example: false }
                  }
                }
              }
            }
          },
          '400': {
            description: 'Malformed date, or end before start',
            content: { 'application/json': { schema: errorSchema } }
          },
          '404': {
            description: 'No published rate at or before the start date in the fetched window',
            content: { 'application/json': { schema: errorSchema } }
          },
          '429': {
            description: 'Local rate limit towards Valet exceeded',
            content: { 'application/json': { schema: errorSchema } }
          },
          '502': {
            description: 'Valet unreachable, returned an error, or returned an unexpected body',
            content: { 'application/json': { schema: errorSchema } }
          }
        }
      }
    }
  }
};
