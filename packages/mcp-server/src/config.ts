/**
 * Server configuration from the environment.
 *
 *   URYSOHN_DEFAULT_TOLERANCE   tolerance for evaluate/sample (default 1e-6)
 *   URYSOHN_CHECK_CONTRACTS     'true' | 'false' (default 'true')
 *   URYSOHN_MAX_CERTIFY_LEVEL   largest level certify_continuity accepts (default 12)
 */

import { z } from 'zod';

export const ServerConfigSchema = z.object({
  defaultTolerance: z.coerce.number().finite().positive().default(1e-6),
  checkContracts: z.enum(['true', 'false']).default('true').transform((v) => v === 'true'),
  // certificates cost up to 2^level nodes
  maxCertifyLevel: z.coerce.number().int().min(0).max(20).default(12),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = ServerConfigSchema.safeParse({
    defaultTolerance: env.URYSOHN_DEFAULT_TOLERANCE,
    checkContracts: env.URYSOHN_CHECK_CONTRACTS,
    maxCertifyLevel: env.URYSOHN_MAX_CERTIFY_LEVEL,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  return parsed.data;
}
