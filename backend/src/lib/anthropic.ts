/**
 * Anthropic Claude API Client
 * Lazily created singleton plus a JSON-output helper validated with zod
 */

import Anthropic from '@anthropic-ai/sdk';
import type { z } from 'zod';
import { createLogger } from './logger.js';

const log = createLogger('anthropic');

let anthropicClient: Anthropic | null = null;
let configuredApiKey: string | undefined;

/**
 * Set the key used when the client is first created. Resets an existing client.
 */
export function configureAnthropic(apiKey: string | undefined): void {
  configuredApiKey = apiKey;
  anthropicClient = null;
}

/**
 * Get Anthropic client instance (singleton)
 */
export function getAnthropicClient(): Anthropic {
  if (!anthropicClient) {
    const apiKey = configuredApiKey ?? process.env.ANTHROPIC_API_KEY;

    if (!apiKey) {
      throw new Error('ANTHROPIC_API_KEY environment variable is required');
    }

    anthropicClient = new Anthropic({ apiKey });
    log.info('Anthropic client initialized');
  }

  return anthropicClient;
}

export const CLAUDE_MODELS = {
  SONNET: 'claude-3-5-sonnet-20241022',
  HAIKU: 'claude-3-5-haiku-20241022',
} as const;

export interface GenerationOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * Single-turn completion, returns the first text block
 */
export async function generateCompletion(
  systemPrompt: string,
  userPrompt: string,
  options: GenerationOptions = {}
): Promise<string> {
  const client = getAnthropicClient();
  const model = options.model || CLAUDE_MODELS.HAIKU;

  const response = await client.messages.create({
    model,
    max_tokens: options.maxTokens || 1024,
    temperature: options.temperature ?? 0,
    system: systemPrompt,
    messages: [{ role: 'user', content: userPrompt }],
  });

  const textContent = response.content.find((c) => c.type === 'text');
  if (!textContent || textContent.type !== 'text') {
    throw new Error('No text content in response');
  }

  log.debug(
    {
      model,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    },
    'Claude completion generated'
  );

  return textContent.text;
}

/**
 * Pull the outermost JSON object out of a model reply and validate it
 */
export function parseStructuredOutput<S extends z.ZodTypeAny>(text: string, schema: S): z.output<S> {
  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new Error('No JSON object found in response');
  }

  const parsed: unknown = JSON.parse(jsonMatch[0]);
  return schema.parse(parsed);
}

/**
 * Generate structured JSON output using Claude
 */
export async function generateStructuredOutput<S extends z.ZodTypeAny>(
  systemPrompt: string,
  userPrompt: string,
  schema: S,
  options: Omit<GenerationOptions, 'temperature'> = {}
): Promise<z.output<S>> {
  const jsonSystemPrompt = `${systemPrompt}

IMPORTANT: Your response must be valid JSON only. Do not include any text before or after the JSON object.`;

  const response = await generateCompletion(jsonSystemPrompt, userPrompt, { ...options, temperature: 0 });

  try {
    return parseStructuredOutput(response, schema);
  } catch (error) {
    log.error({ error, response }, 'Failed to parse Claude JSON response');
    throw new Error('Failed to parse structured output from Claude');
  }
}
