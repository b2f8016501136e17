import { z } from '@hono/zod-openapi';

export function createVerifyRequestSchema(maxTextLength: number) {
  return z
    .object({
      text: z
        .string()
        .max(maxTextLength)
        .openapi({ example: 'The Eiffel Tower was completed in 1889 and is located in Berlin.' }),
    })
    .openapi('VerifyRequest');
}

export type VerifyRequest = z.infer<ReturnType<typeof createVerifyRequestSchema>>;
