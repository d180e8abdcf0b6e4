import { z } from 'zod';

import { CLIError, parseConfig } from '../../shared/cli.js';
import {
  SHARED_FLAGS,
  extractorEnvSchema,
  isoDateSchema,
  layerInputs,
  toExtractorSettings,
  type ExtractorSettings,
} from '../common/config.js';

const classroomEnvSchema = extractorEnvSchema.extend({
  CLASSROOM_ACCOUNT: z.string().trim().email(),
  GOOGLE_SERVICE_ACCOUNT_FILE: z.string().trim().min(1).default('service-account.json'),
  USAGE_START_DATE: isoDateSchema.optional(),
  USAGE_END_DATE: isoDateSchema.optional(),
});

export const CLASSROOM_FLAGS = {
  ...SHARED_FLAGS,
  'classroom-account': 'CLASSROOM_ACCOUNT',
  'service-account-file': 'GOOGLE_SERVICE_ACCOUNT_FILE',
  'usage-start-date': 'USAGE_START_DATE',
  'usage-end-date': 'USAGE_END_DATE',
} as const;

export interface ClassroomConfig extends ExtractorSettings {
  classroomAccount: string;
  serviceAccountFile: string;
  usageStartDate?: string;
  usageEndDate?: string;
}

export function loadClassroomConfig(flags: Record<string, string>, env: NodeJS.ProcessEnv = process.env): ClassroomConfig {
  const parsed = parseConfig(classroomEnvSchema, layerInputs(env, flags));
  if (Boolean(parsed.USAGE_START_DATE) !== Boolean(parsed.USAGE_END_DATE)) {
    throw new CLIError('--usage-start-date and --usage-end-date must be given together');
  }
  if (parsed.USAGE_START_DATE && parsed.USAGE_END_DATE && parsed.USAGE_START_DATE > parsed.USAGE_END_DATE) {
    throw new CLIError('--usage-start-date must not be after --usage-end-date');
  }
  return {
    ...toExtractorSettings(parsed),
    classroomAccount: parsed.CLASSROOM_ACCOUNT,
    serviceAccountFile: parsed.GOOGLE_SERVICE_ACCOUNT_FILE,
    usageStartDate: parsed.USAGE_START_DATE,
    usageEndDate: parsed.USAGE_END_DATE,
  };
}
