import { OpenAPIHono } from '@hono/zod-openapi';

export const API_VERSION = '0.1.0';

export interface AppEnv {
  Variables: {
    requestId: string;
  };
}

export function createRouter(): OpenAPIHono<AppEnv> {
  return new OpenAPIHono<AppEnv>({
    defaultHook: (result, c): Response | undefined => {
      if (!result.success) {
        const details = result.error.errors.map(
          (e) => `${e.path.join('.')}: ${e.message}`,
        );
        return c.json(
          {
            error: 'Validation failed',
            code: 'VALIDATION_ERROR',
            requestId: c.get('requestId'),
            details,
          },
          400,
        );
      }
    },
  });
}
