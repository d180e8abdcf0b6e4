import { z } from 'zod';

import { parseConfig } from '../../shared/cli.js';
import {
  SHARED_FLAGS,
  extractorEnvSchema,
  layerInputs,
  toExtractorSettings,
  type ExtractorSettings,
} from '../common/config.js';

const schoologyEnvSchema = extractorEnvSchema.extend({
  SCHOOLOGY_KEY: z.string().trim().min(1),
  SCHOOLOGY_SECRET: z.string().trim().min(1),
  SCHOOLOGY_PAGE_SIZE: z.coerce.number().int().min(1).max(200).default(200),
});

export const SCHOOLOGY_FLAGS = {
  ...SHARED_FLAGS,
  'client-key': 'SCHOOLOGY_KEY',
  'client-secret': 'SCHOOLOGY_SECRET',
  'page-size': 'SCHOOLOGY_PAGE_SIZE',
} as const;

export interface SchoologyConfig extends ExtractorSettings {
  clientKey: string;
  clientSecret: string;
  pageSize: number;
}

export function loadSchoologyConfig(flags: Record<string, string>, env: NodeJS.ProcessEnv = process.env): SchoologyConfig {
  const parsed = parseConfig(schoologyEnvSchema, layerInputs(env, flags));
  return {
    ...toExtractorSettings(parsed),
    clientKey: parsed.SCHOOLOGY_KEY,
    clientSecret: parsed.SCHOOLOGY_SECRET,
    pageSize: parsed.SCHOOLOGY_PAGE_SIZE,
  };
}
