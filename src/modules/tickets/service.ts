/**
 * Ticket service: single entrypoint to open/close support tickets.
 * Purpose: centralize the per-user limit, channel creation and the persisted ticket status so
 * buttons and commands do not duplicate DB writes.
 *
 * The limit is checked again after the insert: when two opens race past the first check, the
 * oldest tickets (by creation time, then channel id) keep their slot and the rest are rolled back.
 */
import type { SupportTicket } from "@/db/schemas/ticket";
import type { TicketCounts } from "@/db/store";
import type { ChannelId } from "@/db/types";
import { bestEffort, type MarketDeps } from "@/modules/market/deps";
import { type Actor, MarketError, storeFailure } from "@/modules/market/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";

export interface TicketService {
  openTicket(user: { id: string; name: string }): Promise<Result<SupportTicket, MarketError>>;
  closeTicket(channelId: ChannelId, actor: Actor): Promise<Result<SupportTicket, MarketError>>;
  getCounts(): Promise<Result<TicketCounts, MarketError>>;
}

const quotaExceeded = () => new MarketError("QUOTA_EXCEEDED", "You already have an open ticket.");

class TicketServiceImpl implements TicketService {
  constructor(private readonly deps: MarketDeps) {}

  async openTicket(user: { id: string; name: string }): Promise<Result<SupportTicket, MarketError>> {
    const { store, tickets, settings, logger } = this.deps;

    const open = await store.tickets.listOpenByUser(user.id);
    if (open.isErr()) return ErrResult(storeFailure("tickets.listOpenByUser", open.error));
    if (open.unwrap().length >= settings.maxTicketsPerUser) return ErrResult(quotaExceeded());

    let channelId: ChannelId;
    try {
      ({ channelId } = await tickets.openTicketChannel(user));
    } catch (error) {
      logger.error("[tickets] could not create ticket channel", { userId: user.id, error });
      return ErrResult(
        new MarketError("EXTERNAL_FAILURE", "Could not open a ticket channel.", { cause: error }),
      );
    }

    const ticket: SupportTicket = {
      _id: channelId,
      userId: user.id,
      status: "open",
      createdAt: this.deps.now(),
      closedAt: null,
      closedBy: null,
    };

    const inserted = await store.tickets.insert(ticket);
    if (inserted.isErr()) {
      await bestEffort(logger, "[tickets] could not delete orphaned channel", { channelId }, () =>
        tickets.closeTicketChannel(channelId),
      );
      return ErrResult(storeFailure("tickets.insert", inserted.error));
    }

    const kept = await this.keepWithinLimit(ticket);
    if (kept.isErr()) return ErrResult(kept.error);

    await bestEffort(logger, "[tickets] could not post welcome", { channelId }, () =>
      tickets.postTicketWelcome(channelId, user.id),
    );
    logger.info("[tickets] ticket opened", { channelId, userId: user.id });
    return OkResult(ticket);
  }

  private async keepWithinLimit(ticket: SupportTicket): Promise<Result<void, MarketError>> {
    const { store, tickets, settings, logger } = this.deps;
    const channelId = ticket._id;

    const open = await store.tickets.listOpenByUser(ticket.userId);
    if (open.isErr()) return ErrResult(storeFailure("tickets.listOpenByUser", open.error));
    const rank = open.unwrap().findIndex((row) => row._id === channelId);
    if (rank < settings.maxTicketsPerUser) return OkResult(undefined);

    logger.warn("[tickets] concurrent open over the limit; rolling back", { channelId, userId: ticket.userId });
    const removed = await store.tickets.remove(channelId);
    if (removed.isErr()) {
      logger.error("[tickets] could not remove ticket over the limit", { channelId, error: removed.error });
    }
    await bestEffort(logger, "[tickets] could not delete ticket channel", { channelId }, () =>
      tickets.closeTicketChannel(channelId),
    );
    return ErrResult(quotaExceeded());
  }

  async closeTicket(channelId: ChannelId, actor: Actor): Promise<Result<SupportTicket, MarketError>> {
    const { store, tickets, settings, logger } = this.deps;

    const found = await store.tickets.find(channelId);
    if (found.isErr()) return ErrResult(storeFailure("tickets.find", found.error));
    const ticket = found.unwrap();
    if (!ticket) return ErrResult(new MarketError("NOT_FOUND", "This channel is not a ticket."));
    if (ticket.userId !== actor.id && !actor.overseer) {
      return ErrResult(new MarketError("FORBIDDEN", "Only the ticket owner or staff can close it."));
    }
    if (ticket.status === "closed") {
      return ErrResult(new MarketError("TICKET_CLOSED", "This ticket is already closed."));
    }

    const res = await store.tickets.close(channelId, actor.id, this.deps.now());
    if (res.isErr()) return ErrResult(storeFailure("tickets.close", res.error));
    const closed = res.unwrap();
    if (!closed) return ErrResult(new MarketError("TICKET_CLOSED", "This ticket is already closed."));

    await bestEffort(logger, "[tickets] could not announce closing", { channelId }, () =>
      tickets.announce(channelId, {
        kind: "TICKET_CLOSING",
        closedBy: actor.id,
        closesInMs: settings.teardownDelayMs,
      }),
    );
    await this.deps.sleep(settings.teardownDelayMs);
    await bestEffort(logger, "[tickets] could not delete ticket channel", { channelId }, () =>
      tickets.closeTicketChannel(channelId),
    );

    logger.info("[tickets] ticket closed", { channelId, closedBy: actor.id });
    return OkResult(closed);
  }

  async getCounts(): Promise<Result<TicketCounts, MarketError>> {
    const res = await this.deps.store.tickets.counts();
    return res.isErr() ? ErrResult(storeFailure("tickets.counts", res.error)) : OkResult(res.unwrap());
  }
}

export function createTicketService(deps: MarketDeps): TicketService {
  return new TicketServiceImpl(deps);
}
