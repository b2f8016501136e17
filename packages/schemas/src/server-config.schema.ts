import { z } from 'zod';

const BooleanFlagSchema = z.enum(['true', 'false']).transform((v) => v === 'true');

const TemperatureListSchema = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0)
      .map(Number),
  )
  .pipe(z.array(z.number().min(0).max(2)).min(1).max(5));

export const ServerConfigSchema = z
  .object({
    port: z.coerce.number().int().min(1).max(65535).default(3000),
    mockLlm: BooleanFlagSchema.default('false'),
    gcpProjectId: z.string().min(1).optional(),
    vertexLocation: z.string().min(1).default('europe-west1'),
    llmModel: z.string().min(1).default('gemini-2.0-flash'),
    searchModel: z.string().min(1).default('gemini-2.0-flash'),
    searchCache: z.enum(['memory', 'firestore']).default('memory'),
    searchCacheTtlHours: z.coerce.number().positive().default(168),
    maxClaims: z.coerce.number().int().min(1).max(25).default(10),
    maxCitations: z.coerce.number().int().min(1).max(50).default(20),
    maxTextLength: z.coerce.number().int().min(1).default(20000),
    maxSources: z.coerce.number().int().min(0).max(10).default(3),
    votingTemperatures: TemperatureListSchema.default('0.1,0.3,0.5'),
  })
  .superRefine((config, ctx) => {
    if (!config.mockLlm && config.gcpProjectId === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['gcpProjectId'],
        message: 'FACTLENS_GCP_PROJECT_ID is required unless FACTLENS_MOCK_LLM=true',
      });
    }
    if (config.searchCache === 'firestore' && config.gcpProjectId === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['searchCache'],
        message: 'the firestore search cache needs FACTLENS_GCP_PROJECT_ID',
      });
    }
  });

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
