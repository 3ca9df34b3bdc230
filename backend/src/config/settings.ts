/**
 * Settings
 * Environment-driven configuration, validated once at start-up
 */

import { z } from 'zod';

// =============================================================================
// Schema
// =============================================================================

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const SettingsSchema = z.object({
  BOT_NAME: z.string().min(1).default('Atlas Support'),
  DEFAULT_FALLBACK_CHANNEL: z.string().min(1).default('support-requests'),

  HUNT_WAVE_TIMEOUT_MINUTES: z.coerce.number().positive().default(5),
  HUNT_EXPIRY_MINUTES: z.coerce.number().positive().default(120),
  HUNT_MAX_WAVES: z.coerce.number().int().min(1).default(10),
  HUNT_REBROADCAST_ON_EXHAUSTION: booleanFromEnv.default('true'),
  HIGH_URGENCY_THRESHOLD: z.coerce.number().min(0).max(100).default(80),
  VIP_WAVE_WIDTH: z.coerce.number().int().min(1).default(3),

  EXPERTS_PATH: z.string().default('data/experts.json'),
  USER_PRIORITIES_PATH: z.string().default('data/user_priorities.json'),
  TICKETS_PATH: z.string().default('data/tickets.json'),

  SLACK_BOT_TOKEN: z.string().optional(),
  SLACK_API_URL: z.string().url().default('https://slack.com/api'),
  ANTHROPIC_API_KEY: z.string().optional(),
  CLASSIFIER_MODEL: z.string().default('claude-3-5-haiku-20241022'),

  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: z.coerce.number().int().min(0).max(65535).default(3001),
});

// =============================================================================
// Types
// =============================================================================

export interface HuntSettings {
  waveTimeoutMs: number;
  huntExpiryMs: number;
  maxWaves: number;
  rebroadcastOnExhaustion: boolean;
  highUrgencyThreshold: number;
  vipWaveWidth: number;
}

export interface Settings {
  botName: string;
  fallbackChannel: string;
  hunt: HuntSettings;
  paths: {
    experts: string;
    userPriorities: string;
    tickets: string;
  };
  slack: {
    botToken?: string;
    apiUrl: string;
  };
  classifier: {
    apiKey?: string;
    model: string;
  };
  api: {
    host: string;
    port: number;
  };
}

const MINUTE_MS = 60 * 1000;

// =============================================================================
// Loading
// =============================================================================

/**
 * Parse settings from an environment map. Throws a zod error listing every bad variable.
 */
export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
  const parsed = SettingsSchema.parse(env);

  return Object.freeze({
    botName: parsed.BOT_NAME,
    fallbackChannel: parsed.DEFAULT_FALLBACK_CHANNEL,
    hunt: {
      waveTimeoutMs: parsed.HUNT_WAVE_TIMEOUT_MINUTES * MINUTE_MS,
      huntExpiryMs: parsed.HUNT_EXPIRY_MINUTES * MINUTE_MS,
      maxWaves: parsed.HUNT_MAX_WAVES,
      rebroadcastOnExhaustion: parsed.HUNT_REBROADCAST_ON_EXHAUSTION,
      highUrgencyThreshold: parsed.HIGH_URGENCY_THRESHOLD,
      vipWaveWidth: parsed.VIP_WAVE_WIDTH,
    },
    paths: {
      experts: parsed.EXPERTS_PATH,
      userPriorities: parsed.USER_PRIORITIES_PATH,
      tickets: parsed.TICKETS_PATH,
    },
    slack: {
      botToken: parsed.SLACK_BOT_TOKEN,
      apiUrl: parsed.SLACK_API_URL,
    },
    classifier: {
      apiKey: parsed.ANTHROPIC_API_KEY,
      model: parsed.CLASSIFIER_MODEL,
    },
    api: {
      host: parsed.API_HOST,
      port: parsed.API_PORT,
    },
  });
}

/**
 * Credentials are optional for tests but required to run the server
 */
export function validateForRuntime(settings: Settings): void {
  const missing = [
    ['SLACK_BOT_TOKEN', settings.slack.botToken],
    ['ANTHROPIC_API_KEY', settings.classifier.apiKey],
  ]
    .filter(([, value]) => !value)
    .map(([name]) => name);

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }
}
