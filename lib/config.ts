/**
 * Converter Configuration
 *
 * Read from the environment once per process; every value has a default so the
 * converter runs without any setup.
 */

import path from 'path';
import { z } from 'zod';

export const ConverterConfigSchema = z.object({
  /** Directory scanned when the CLI runs without arguments. */
  templatesDir: z.string().min(1),
  /** Planning-system users who may use the imported goals, comma-separated. */
  assignedUsers: z.string(),
  /** TemplateID used when the cell is blank and no override applies. */
  defaultTemplateId: z.string().trim().min(1),
  codeScheme: z.string().trim().min(1),
  codeSchemeVersion: z.string().trim().min(1),
});

export type ConverterConfig = z.infer<typeof ConverterConfigSchema>;

export const DEFAULT_CONFIG: Omit<ConverterConfig, 'templatesDir'> = {
  assignedUsers: '',
  defaultTemplateId: 'Default',
  codeScheme: 'FMA',
  codeSchemeVersion: '3.2',
};

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ConverterConfig {
  return ConverterConfigSchema.parse({
    templatesDir: env.CLINICAL_GOALS_TEMPLATES_DIR || path.join(cwd, 'templates'),
    assignedUsers: env.CLINICAL_GOALS_ASSIGNED_USERS ?? DEFAULT_CONFIG.assignedUsers,
    defaultTemplateId: env.CLINICAL_GOALS_DEFAULT_TEMPLATE_ID || DEFAULT_CONFIG.defaultTemplateId,
    codeScheme: env.CLINICAL_GOALS_CODE_SCHEME || DEFAULT_CONFIG.codeScheme,
    codeSchemeVersion: env.CLINICAL_GOALS_CODE_SCHEME_VERSION || DEFAULT_CONFIG.codeSchemeVersion,
  });
}
