/**
 * Zod validation schemas for repo-dashboard routes
 */

import { z } from 'zod';
import { LAUNCH_TARGETS } from '../launcher/AppLauncher.js';

/**
 * Query of the repository list
 */
export const RepositoryListQuerySchema = z.object({
  refresh: z.enum(['true', 'false', '1', '0']).optional(),
});

export type RepositoryListQuery = z.infer<typeof RepositoryListQuerySchema>;

/**
 * Path parameters of the open action
 */
export const OpenRepositoryParamsSchema = z.object({
  target: z.enum(LAUNCH_TARGETS),
  name: z
    .string()
    .min(1, 'name is required')
    .refine((name) => name !== '.' && name !== '..' && !/[\\/]/.test(name), {
      message: 'name must be a single directory name',
    }),
});

export type OpenRepositoryParams = z.infer<typeof OpenRepositoryParamsSchema>;
