import swaggerJsdoc from 'swagger-jsdoc';
import env from './env.js';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Carrier Rate Negotiation API',
      version: '1.0.0',
      description: `
## Carrier Rate Negotiation Engine

Evaluates carrier rate offers during inbound carrier-sales calls:
- **Evaluate** - Accept, counter or reject an offer for one negotiation round
- **Sessions** - Inspect a session's rounds, or close it as abandoned or timed out
- **Loads** - Round history per load and the negotiable price band

### Errors
Domain errors carry a \`code\` (\`INVALID_ROUND\`, \`INVALID_OFFER\`, \`INVALID_PRICING\`,
\`DUPLICATE_ROUND_CONFLICT\`, \`SESSION_LOAD_MISMATCH\`, \`SESSION_ALREADY_CLOSED\`,
\`LOAD_NOT_FOUND\`, \`SESSION_NOT_FOUND\`).
      `,
    },
    servers: [
      {
        url: `http://localhost:${env.port}`,
        description: 'Development server',
      },
    ],
    components: {
      schemas: {
        Error: {
          type: 'object',
          properties: {
            message: { type: 'string', example: 'Round 2 is out of sequence for session call-1; expected round 1' },
            code: { type: 'string', example: 'INVALID_ROUND' },
            details: { type: 'object' },
          },
        },
        ValidationError: {
          type: 'object',
          properties: {
            success: { type: 'boolean', example: false },
            message: { type: 'string', example: 'Validation error' },
            errors: { type: 'array', items: { type: 'string' } },
          },
        },
        ServiceHealth: {
          type: 'object',
          properties: {
            name: { type: 'string', example: 'database' },
            status: { type: 'string', enum: ['healthy', 'unhealthy', 'degraded'], example: 'healthy' },
            latency: { type: 'number', example: 5.2 },
            message: { type: 'string', example: 'Connected to PostgreSQL' },
          },
        },
        HealthResponse: {
          type: 'object',
          properties: {
            status: { type: 'string', enum: ['healthy', 'unhealthy', 'degraded'] },
            timestamp: { type: 'string', format: 'date-time' },
            version: { type: 'string', example: '1.0.0' },
            uptime: { type: 'number', example: 3600 },
            services: {
              type: 'array',
              items: { $ref: '#/components/schemas/ServiceHealth' },
            },
          },
        },
        EvaluateRoundRequest: {
          type: 'object',
          required: ['loadId', 'sessionId', 'carrierOffer', 'roundNumber'],
          properties: {
            loadId: { type: 'string', example: 'LD-1001' },
            carrierId: { type: 'string', nullable: true, example: 'MC-123456' },
            sessionId: { type: 'string', example: 'call-7f3a' },
            carrierOffer: { type: 'number', example: 3200 },
            roundNumber: { type: 'integer', minimum: 1, example: 1 },
          },
        },
        EvaluateRoundResponse: {
          type: 'object',
          properties: {
            negotiationId: { type: 'string', format: 'uuid' },
            sessionId: { type: 'string' },
            loadId: { type: 'string' },
            carrierId: { type: 'string', nullable: true },
            roundNumber: { type: 'integer', example: 1 },
            carrierOffer: { type: 'number', example: 3200 },
            response: { type: 'string', enum: ['ACCEPTED', 'COUNTER_OFFER', 'REJECTED'] },
            counterOffer: { type: 'number', example: 2940 },
            finalStatus: { type: 'string', enum: ['DEAL_ACCEPTED', 'DEAL_REJECTED'] },
            remainingRounds: { type: 'integer', example: 2 },
            message: { type: 'string' },
            justification: { type: 'string' },
            rateDifference: { type: 'number', example: 400 },
            percentageOverLoadboard: { type: 'number', example: 14.29 },
            nextSteps: {
              type: 'object',
              properties: {
                action: {
                  type: 'string',
                  enum: ['PROCEED_TO_BOOKING', 'CONTINUE_NEGOTIATION', 'END_NEGOTIATION'],
                },
                reason: { type: 'string' },
                handoffData: { type: 'object' },
              },
            },
            createdAt: { type: 'string', format: 'date-time' },
          },
        },
        PriceBand: {
          type: 'object',
          properties: {
            loadId: { type: 'string' },
            carrierId: { type: 'string', nullable: true },
            effectiveRate: { type: 'number', example: 2800 },
            minimumRate: { type: 'number', example: 2660 },
            autoAcceptRate: { type: 'number', example: 2856 },
            maximumRate: { type: 'number', example: 2940 },
            urgencyFactor: { type: 'number', example: 1.05 },
            historyFactor: { type: 'number', example: 1 },
          },
        },
      },
    },
    tags: [
      { name: 'Health', description: 'Service health monitoring endpoints' },
      { name: 'Negotiation', description: 'Carrier rate negotiation rounds and sessions' },
    ],
  },
  apis: ['./src/modules/health/*.routes.ts', './src/modules/negotiation/*.routes.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);

export default swaggerSpec;
