/**
 * Recording presenters: every call is appended to `calls`; `failOn` makes a method throw.
 */
import type {
  ChannelNotice,
  ListingDraft,
  MarketPresenter,
  NegotiationSpaceRequest,
  PublishedListingRef,
  PublishedVouch,
  RatingPrompt,
  TicketNotice,
  TicketPresenter,
  UserNotice,
} from "@/modules/market/presenter";
import type { ActiveListing } from "@/db/schemas/listing";
import type { TradeHistoryEntry, TradeSession } from "@/db/schemas/trade";

export type PresenterCall =
  | { method: "publishListing"; draft: ListingDraft }
  | { method: "updateListing"; listing: ActiveListing }
  | { method: "retractListing"; ref: PublishedListingRef }
  | { method: "openNegotiationSpace"; request: NegotiationSpaceRequest }
  | { method: "postControls"; channelId: string; tradeId: string }
  | { method: "disableControls"; channelId: string; messageId: string; tradeId: string }
  | { method: "announce"; channelId: string; notice: ChannelNotice }
  | { method: "closeSpace"; channelId: string }
  | { method: "notifyUser"; userId: string; notice: UserNotice }
  | { method: "promptRating"; prompt: RatingPrompt }
  | { method: "publishVouch"; vouch: PublishedVouch }
  | { method: "logCompletedTrade"; entry: TradeHistoryEntry; trade: TradeSession };

export type PresenterMethod = PresenterCall["method"];

export class FakeMarketPresenter implements MarketPresenter {
  readonly calls: PresenterCall[] = [];
  private readonly failing = new Set<PresenterMethod>();
  private channelSeq = 0;
  private messageSeq = 0;

  failOn(method: PresenterMethod): void {
    this.failing.add(method);
  }

  recover(method: PresenterMethod): void {
    this.failing.delete(method);
  }

  /** Calls of one method, narrowed to that variant. */
  callsOf<M extends PresenterMethod>(method: M): Extract<PresenterCall, { method: M }>[] {
    return this.calls.filter((call): call is Extract<PresenterCall, { method: M }> => call.method === method);
  }

  private record(call: PresenterCall): void {
    if (this.failing.has(call.method)) {
      throw new Error(`presenter failure: ${call.method}`);
    }
    this.calls.push(call);
  }

  private nextMessageId(): string {
    this.messageSeq += 1;
    return `msg-${this.messageSeq}`;
  }

  async publishListing(draft: ListingDraft): Promise<PublishedListingRef> {
    this.record({ method: "publishListing", draft });
    const channelId = draft.category === "main" ? "main-listings" : "iron-listings";
    return {
      channelId,
      messageId: this.nextMessageId(),
      extraMessageIds: draft.images.slice(1).map(() => this.nextMessageId()),
    };
  }

  async updateListing(listing: ActiveListing): Promise<void> {
    this.record({ method: "updateListing", listing });
  }

  async retractListing(ref: PublishedListingRef): Promise<void> {
    this.record({ method: "retractListing", ref });
  }

  async openNegotiationSpace(request: NegotiationSpaceRequest): Promise<{ channelId: string }> {
    this.record({ method: "openNegotiationSpace", request });
    this.channelSeq += 1;
    return { channelId: `trade-channel-${this.channelSeq}` };
  }

  async postControls(channelId: string, trade: NegotiationSpaceRequest): Promise<{ messageId: string }> {
    this.record({ method: "postControls", channelId, tradeId: trade.tradeId });
    return { messageId: this.nextMessageId() };
  }

  async disableControls(channelId: string, messageId: string, tradeId: string): Promise<void> {
    this.record({ method: "disableControls", channelId, messageId, tradeId });
  }

  async announce(channelId: string, notice: ChannelNotice): Promise<void> {
    this.record({ method: "announce", channelId, notice });
  }

  async closeSpace(channelId: string): Promise<void> {
    this.record({ method: "closeSpace", channelId });
  }

  async notifyUser(userId: string, notice: UserNotice): Promise<void> {
    this.record({ method: "notifyUser", userId, notice });
  }

  async promptRating(prompt: RatingPrompt): Promise<void> {
    this.record({ method: "promptRating", prompt });
  }

  async publishVouch(vouch: PublishedVouch): Promise<void> {
    this.record({ method: "publishVouch", vouch });
  }

  async logCompletedTrade(entry: TradeHistoryEntry, trade: TradeSession): Promise<void> {
    this.record({ method: "logCompletedTrade", entry, trade });
  }
}

export type TicketCall =
  | { method: "openTicketChannel"; userId: string }
  | { method: "postTicketWelcome"; channelId: string; userId: string }
  | { method: "announce"; channelId: string; notice: TicketNotice }
  | { method: "closeTicketChannel"; channelId: string };

export class FakeTicketPresenter implements TicketPresenter {
  readonly calls: TicketCall[] = [];
  private readonly failing = new Set<TicketCall["method"]>();
  private seq = 0;

  failOn(method: TicketCall["method"]): void {
    this.failing.add(method);
  }

  private record(call: TicketCall): void {
    if (this.failing.has(call.method)) throw new Error(`ticket presenter failure: ${call.method}`);
    this.calls.push(call);
  }

  async openTicketChannel(user: { id: string; name: string }): Promise<{ channelId: string }> {
    this.record({ method: "openTicketChannel", userId: user.id });
    this.seq += 1;
    return { channelId: `ticket-channel-${this.seq}` };
  }

  async postTicketWelcome(channelId: string, userId: string): Promise<void> {
    this.record({ method: "postTicketWelcome", channelId, userId });
  }

  async announce(channelId: string, notice: TicketNotice): Promise<void> {
    this.record({ method: "announce", channelId, notice });
  }

  async closeTicketChannel(channelId: string): Promise<void> {
    this.record({ method: "closeTicketChannel", channelId });
  }
}
