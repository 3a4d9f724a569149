/* src/cli/config/schema.ts
 * Zod schemas for agent-console configuration (top-level "agent-console").
 */
import { z } from 'zod';

// Common coercer for boolean-ish values
const coerceBool = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((v) => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'number') return v === 1;
    const s = String(v).trim().toLowerCase();
    if (s === '1' || s === 'true') return true;
    if (s === '0' || s === 'false') return false;
    return undefined;
  })
  .optional();

export const cliDefaultsSchema = z
  .object({
    mode: z.enum(['interactive', 'batch']).optional(),
    timeout: z.coerce.number().int().positive().optional(),
    input: z.string().min(1).optional(),
    sheet: z.string().min(1).optional(),
    outputDir: z.string().min(1).optional(),
    pause: coerceBool,
    debug: coerceBool,
    boring: coerceBool,
  })
  .strict()
  .optional();
export type CliDefaults = z.infer<typeof cliDefaultsSchema>;

const envNameSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, {
    message: 'tokenEnv must be an environment variable name',
  });

// Complete config block (namespaced under agent-console)
export const cliConfigSchema = z
  .object({
    defaults: cliDefaultsSchema,
    tokenEnv: envNameSchema.optional(),
  })
  .strict();
export type CliConfig = z.infer<typeof cliConfigSchema>;
