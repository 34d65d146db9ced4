import { z } from 'zod';

// ============================================
// Release Validators
// ============================================

// Stable versions are GitHub release names (free text); snapshots are commit hashes
export const versionNameSchema = z
  .string()
  .min(1)
  .max(200);

export const downloadParamsSchema = z.object({
  version: versionNameSchema,
  file: z.string().min(1).max(100)
});
