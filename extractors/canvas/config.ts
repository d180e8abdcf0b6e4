import { z } from 'zod';

import { parseConfig } from '../../shared/cli.js';
import {
  SHARED_FLAGS,
  extractorEnvSchema,
  isoDateSchema,
  layerInputs,
  toExtractorSettings,
  type ExtractorSettings,
} from '../common/config.js';

const canvasEnvSchema = extractorEnvSchema.extend({
  CANVAS_BASE_URL: z.string().trim().url(),
  CANVAS_ACCESS_TOKEN: z.string().trim().min(1),
  CANVAS_ACCOUNT_ID: z.string().trim().min(1).default('self'),
  START_DATE: isoDateSchema.optional(),
  END_DATE: isoDateSchema.optional(),
});

export const CANVAS_FLAGS = {
  ...SHARED_FLAGS,
  'base-url': 'CANVAS_BASE_URL',
  'access-token': 'CANVAS_ACCESS_TOKEN',
  'account-id': 'CANVAS_ACCOUNT_ID',
  'start-date': 'START_DATE',
  'end-date': 'END_DATE',
} as const;

export interface CanvasConfig extends ExtractorSettings {
  baseUrl: string;
  accessToken: string;
  accountId: string;
  startDate?: string;
  endDate?: string;
}

export function loadCanvasConfig(flags: Record<string, string>, env: NodeJS.ProcessEnv = process.env): CanvasConfig {
  const parsed = parseConfig(canvasEnvSchema, layerInputs(env, flags));
  return {
    ...toExtractorSettings(parsed),
    baseUrl: parsed.CANVAS_BASE_URL,
    accessToken: parsed.CANVAS_ACCESS_TOKEN,
    accountId: parsed.CANVAS_ACCOUNT_ID,
    startDate: parsed.START_DATE,
    endDate: parsed.END_DATE,
  };
}
