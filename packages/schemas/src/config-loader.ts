import type { ZodError } from 'zod';
import { SchemaValidationError } from '@factlens/shared/src/utils/errors.js';
import { ServerConfigSchema } from './server-config.schema.js';
import type { ServerConfig } from './server-config.schema.js';

export type EnvSource = Readonly<Record<string, string | undefined>>;

function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

/** First non-blank value among the given variable names. */
function readEnv(env: EnvSource, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
}

export function loadServerConfig(env: EnvSource = process.env): ServerConfig {
  const raw = {
    port: readEnv(env, 'FACTLENS_PORT', 'PORT'),
    mockLlm: readEnv(env, 'FACTLENS_MOCK_LLM'),
    gcpProjectId: readEnv(env, 'FACTLENS_GCP_PROJECT_ID', 'GCP_PROJECT_ID'),
    vertexLocation: readEnv(env, 'VERTEX_AI_LOCATION'),
    llmModel: readEnv(env, 'FACTLENS_LLM_MODEL'),
    searchModel: readEnv(env, 'FACTLENS_SEARCH_MODEL'),
    searchCache: readEnv(env, 'FACTLENS_SEARCH_CACHE'),
    searchCacheTtlHours: readEnv(env, 'FACTLENS_SEARCH_CACHE_TTL_HOURS'),
    maxClaims: readEnv(env, 'FACTLENS_MAX_CLAIMS'),
    maxCitations: readEnv(env, 'FACTLENS_MAX_CITATIONS'),
    maxTextLength: readEnv(env, 'FACTLENS_MAX_TEXT_LENGTH'),
    maxSources: readEnv(env, 'FACTLENS_MAX_SOURCES'),
    votingTemperatures: readEnv(env, 'FACTLENS_VOTING_TEMPERATURES'),
  };

  const result = ServerConfigSchema.safeParse(raw);

  if (!result.success) {
    throw new SchemaValidationError('Invalid server configuration', formatZodErrors(result.error));
  }

  return result.data;
}
