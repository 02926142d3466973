import { z } from 'zod';

export const BackoffStrategySchema = z.enum(['fixed', 'exponential']);

export const GatewayConfigSchema = z
  .object({
    $schema: z.string().optional(),
    requestsPerMinute: z.number().int().positive().default(30),
    requestsPerHour: z.number().int().positive().default(500),
    cacheTtlSeconds: z.number().int().positive().default(3600),
    requestTimeoutSeconds: z.number().positive().default(30),
    maxRetries: z.number().int().min(1).max(10).default(3),
    retryDelaySeconds: z.number().min(0).default(2),
    backoff: BackoffStrategySchema.default('exponential'),
    userAgent: z.string().min(1).default('QuarryResearch/0.1 (+https://example.org/quarry)'),
  })
  .refine((config) => config.requestsPerHour >= config.requestsPerMinute, {
    message: 'requestsPerHour must be at least requestsPerMinute',
    path: ['requestsPerHour'],
  });

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type GatewayConfigInput = z.input<typeof GatewayConfigSchema>;
export type BackoffStrategy = z.infer<typeof BackoffStrategySchema>;
