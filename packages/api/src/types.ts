import { OpenAPIHono } from '@hono/zod-openapi';
import { formatZodErrors } from '@quarry/schemas/src/validators.js';

export interface AppEnv {
  Variables: {
    requestId: string;
  };
}

/** Router whose request validation failures share the error handler's body shape. */
export function createRouter(): OpenAPIHono<AppEnv> {
  return new OpenAPIHono<AppEnv>({
    defaultHook: (result, c): Response | undefined => {
      if (result.success) {
        return undefined;
      }
      return c.json(
        {
          error: 'Validation failed',
          code: 'VALIDATION_ERROR',
          requestId: c.get('requestId'),
          details: [...formatZodErrors(result.error)],
        },
        400,
      );
    },
  });
}
