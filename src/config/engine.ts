import fs from 'fs';
import { z } from 'zod';
import { EngineConfig } from '../models/EngineConfig';
import { logger } from '../utils/logger';

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  actionDelays: {
    likePost: [2, 5],
    viewStory: [1, 3],
    likeStory: [1, 2],
    replyStory: [3, 6],
    sendDm: [5, 10],
    follow: [3, 7],
    betweenActions: [5, 15],
    betweenTargets: [30, 90],
    betweenAccounts: [300, 600],
    pageLoad: [2, 5],
  },
  timeouts: {
    navigation: 30000,
    domContentLoaded: 10000,
    recoveryCheck: 5000,
    reload: 15000,
    element: 5000,
  },
  safetyLimits: {
    maxParallelWorkers: 10,
  },
  navigationAttempts: 3,
  recoveryNavigationAttempts: 2,
  userAgents: [
    'Mozilla/5.0 (iPhone; CPU iPhone OS 16_1 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/16.0 Mobile/15E148 Safari/604.1',
    'Mozilla/5.0 (Linux; Android 13; SM-G998B) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/108.0.0.0 Mobile Safari/537.36',
    'Mozilla/5.0 (Linux; Android 12; Pixel 6 Pro) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/107.0.0.0 Mobile Safari/537.36',
    'Mozilla/5.0 (iPhone; CPU iPhone OS 15_7 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/15.0 Mobile/15E148 Safari/604.1',
  ],
  screenResolutions: [
    [375, 812],
    [414, 896],
    [390, 844],
    [360, 640],
    [412, 869],
  ],
};

const delayRange = z
  .tuple([z.number().nonnegative(), z.number().nonnegative()])
  .refine(([min, max]) => min <= max, { message: 'min must not exceed max' });

const EngineConfigOverrideSchema = z
  .object({
    actionDelays: z
      .object({
        likePost: delayRange,
        viewStory: delayRange,
        likeStory: delayRange,
        replyStory: delayRange,
        sendDm: delayRange,
        follow: delayRange,
        betweenActions: delayRange,
        betweenTargets: delayRange,
        betweenAccounts: delayRange,
        pageLoad: delayRange,
      })
      .partial(),
    timeouts: z
      .object({
        navigation: z.number().int().positive(),
        domContentLoaded: z.number().int().positive(),
        recoveryCheck: z.number().int().positive(),
        reload: z.number().int().positive(),
        element: z.number().int().positive(),
      })
      .partial(),
    safetyLimits: z
      .object({
        maxParallelWorkers: z.number().int().positive(),
      })
      .partial(),
    navigationAttempts: z.number().int().min(1),
    recoveryNavigationAttempts: z.number().int().min(1),
    userAgents: z.array(z.string().min(1)).min(1),
    screenResolutions: z.array(z.tuple([z.number().int().positive(), z.number().int().positive()])).min(1),
  })
  .partial();

export type EngineConfigOverride = z.infer<typeof EngineConfigOverrideSchema>;

/**
 * Overlays a partial override on the defaults; nested groups merge key by key
 */
export function mergeEngineConfig(base: EngineConfig, override: EngineConfigOverride): EngineConfig {
  return {
    actionDelays: { ...base.actionDelays, ...override.actionDelays },
    timeouts: { ...base.timeouts, ...override.timeouts },
    safetyLimits: { ...base.safetyLimits, ...override.safetyLimits },
    navigationAttempts: override.navigationAttempts ?? base.navigationAttempts,
    recoveryNavigationAttempts: override.recoveryNavigationAttempts ?? base.recoveryNavigationAttempts,
    userAgents: override.userAgents ?? base.userAgents,
    screenResolutions: override.screenResolutions ?? base.screenResolutions,
  };
}

export function parseEngineConfigOverride(raw: unknown): EngineConfigOverride {
  return EngineConfigOverrideSchema.parse(raw);
}

/**
 * Loads the engine configuration, applying the JSON override file when one is given.
 * A missing file falls back to the defaults; a malformed one is an error.
 */
export function loadEngineConfig(filePath?: string): EngineConfig {
  if (!filePath) {
    return DEFAULT_ENGINE_CONFIG;
  }

  if (!fs.existsSync(filePath)) {
    logger.warn(`Engine config file ${filePath} not found, using defaults`);
    return DEFAULT_ENGINE_CONFIG;
  }

  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  const override = parseEngineConfigOverride(raw);
  logger.info(`Loaded engine config overrides from ${filePath}`);
  return mergeEngineConfig(DEFAULT_ENGINE_CONFIG, override);
}
