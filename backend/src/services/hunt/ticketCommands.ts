/**
 * Ticket Commands
 * The claim / resolve / cancel command surface: one outcome, one sentence
 */

import type { CancelResult, ClaimResult, CommandResponse, ResolveResult } from '@sme-hunt/shared';
import type { HuntEngine } from './huntEngine.js';
import { cancelReply, claimReply, resolveReply } from './messages.js';

export class TicketCommands {
  constructor(private readonly engine: Pick<HuntEngine, 'claim' | 'resolve' | 'cancel'>) {}

  async claim(ticketId: string, expertId: string): Promise<CommandResponse<ClaimResult>> {
    const { result } = await this.engine.claim(ticketId, expertId);
    return { outcome: result, message: claimReply(ticketId, result) };
  }

  async resolve(ticketId: string): Promise<CommandResponse<ResolveResult>> {
    const { result } = await this.engine.resolve(ticketId);
    return { outcome: result, message: resolveReply(ticketId, result) };
  }

  async cancel(ticketId: string, reason?: string): Promise<CommandResponse<CancelResult>> {
    const outcome = await this.engine.cancel(ticketId, reason);
    return { outcome, message: cancelReply(ticketId, outcome) };
  }
}
