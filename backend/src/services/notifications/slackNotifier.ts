/**
 * Slack Notifier
 * Notifier over the Slack Web API (chat.postMessage) using the bot token.
 * Thread recipients are encoded as `channelId:threadTs`.
 */

import { z } from 'zod';
import { createLogger } from '../../lib/logger.js';
import { outcomeMessage } from '../hunt/messages.js';
import {
  describeRecipient,
  type HuntOutcome,
  type Notifier,
  type NotifyResult,
  type Recipient,
} from './notifier.js';

const log = createLogger('slackNotifier');

export interface SlackConfig {
  botToken: string;
  apiUrl?: string;
  username?: string;
  timeout?: number;
  /** Injected in tests */
  fetchFn?: typeof fetch;
}

export interface SlackBlock {
  type: string;
  text?: {
    type: string;
    text: string;
  };
  elements?: Array<{
    type: string;
    text: string;
  }>;
}

export interface SlackMessage {
  channel: string;
  text: string;
  thread_ts?: string;
  username?: string;
  blocks?: SlackBlock[];
}

const SlackApiResponseSchema = z.object({
  ok: z.boolean().default(false),
  error: z.string().optional(),
});

/**
 * Where a recipient's messages go in Slack terms
 */
export function toSlackTarget(recipient: Recipient): { channel: string; threadTs?: string } {
  switch (recipient.kind) {
    case 'user':
      // Posting to a user id opens the bot's DM with them
      return { channel: recipient.id };
    case 'channel':
      return { channel: recipient.id };
    case 'thread': {
      const separator = recipient.ref.indexOf(':');
      if (separator <= 0) return { channel: recipient.ref };
      return {
        channel: recipient.ref.slice(0, separator),
        threadTs: recipient.ref.slice(separator + 1) || undefined,
      };
    }
  }
}

export class SlackNotifier implements Notifier {
  private readonly apiUrl: string;
  private readonly timeout: number;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly config: SlackConfig) {
    this.apiUrl = (config.apiUrl || 'https://slack.com/api').replace(/\/+$/, '');
    this.timeout = config.timeout || 10000;
    this.fetchFn = config.fetchFn || fetch;
  }

  async notify(recipient: Recipient, ticketId: string, message: string): Promise<NotifyResult> {
    const target = toSlackTarget(recipient);

    return this.postMessage({
      channel: target.channel,
      thread_ts: target.threadTs,
      text: message,
      username: this.config.username,
      blocks: this.buildBlocks(ticketId, message),
    });
  }

  /**
   * Same text to every recipient; failures are logged per recipient
   */
  async announceOutcome(ticketId: string, outcome: HuntOutcome, recipients: Recipient[]): Promise<void> {
    const text = outcomeMessage(ticketId, outcome);

    for (const recipient of recipients) {
      const result = await this.notify(recipient, ticketId, text);
      if (!result.ok) {
        log.warn(
          { ticketId, outcome: outcome.kind, recipient: describeRecipient(recipient), error: result.error },
          'Outcome announcement not delivered'
        );
      }
    }
  }

  private buildBlocks(ticketId: string, message: string): SlackBlock[] {
    return [
      {
        type: 'section',
        text: { type: 'mrkdwn', text: message },
      },
      {
        type: 'context',
        elements: [{ type: 'mrkdwn', text: `Ticket \`${ticketId}\`` }],
      },
    ];
  }

  private async postMessage(message: SlackMessage): Promise<NotifyResult> {
    try {
      const response = await this.fetchFn(`${this.apiUrl}/chat.postMessage`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json; charset=utf-8',
          Authorization: `Bearer ${this.config.botToken}`,
        },
        body: JSON.stringify(message),
        signal: AbortSignal.timeout(this.timeout),
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Slack API error: ${response.status} - ${errorText}`);
      }

      const body = SlackApiResponseSchema.parse(await response.json());
      if (!body.ok) {
        throw new Error(`Slack API error: ${body.error || 'unknown_error'}`);
      }

      return { ok: true };
    } catch (error) {
      log.error({ channel: message.channel, error }, 'Failed to send Slack message');
      return {
        ok: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }
}
