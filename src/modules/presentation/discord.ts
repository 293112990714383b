/**
 * Seyfert implementations of the marketplace presenter ports.
 *
 * Listings, trade channels, DMs and vouch logs go through the REST shorthands on
 * `UsingClient`. Every method throws on a rejected request; deleting something
 * that is already gone counts as success.
 */
import type { UsingClient } from "seyfert";
import { ChannelType, OverwriteType, PermissionFlagsBits } from "seyfert/lib/types";
import type { DiscordRouting } from "@/configuration/env";
import type { ActiveListing } from "@/db/schemas/listing";
import type { TradeHistoryEntry, TradeSession } from "@/db/schemas/trade";
import type { ChannelId, MessageId, TradeId, UserId } from "@/db/types";
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
import type { ListingCategory } from "@/modules/market/types";
import { isUnknownResource } from "@/utils/discord-errors";
import {
  buildCompletedSaleEmbed,
  buildListingButtons,
  buildListingEmbed,
  buildRatingPrompt,
  buildScreenshotEmbed,
  buildTicketWelcome,
  buildTradeControls,
  buildTradeEmbed,
  buildVouchEmbed,
  listingViewFromDraft,
  listingViewFromRecord,
} from "./embeds";
import { formatChannelNotice, formatTicketNotice, formatUserNotice } from "./messages";

const MEMBER_ACCESS = String(
  PermissionFlagsBits.ViewChannel |
    PermissionFlagsBits.SendMessages |
    PermissionFlagsBits.ReadMessageHistory |
    PermissionFlagsBits.AttachFiles,
);
const HIDDEN = String(PermissionFlagsBits.ViewChannel);

/** Lowercase, ascii-only channel name fragment. */
export function channelSlug(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 80);
  return slug || "user";
}

function privateOverwrites(guildId: string, staffRoleId: string, members: UserId[]) {
  return [
    { id: guildId, type: OverwriteType.Role, deny: HIDDEN },
    { id: staffRoleId, type: OverwriteType.Role, allow: MEMBER_ACCESS },
    ...members.map((id) => ({ id, type: OverwriteType.Member, allow: MEMBER_ACCESS })),
  ];
}

async function ignoreGone(action: () => Promise<unknown>): Promise<void> {
  try {
    await action();
  } catch (error) {
    if (!isUnknownResource(error)) throw error;
  }
}

export class DiscordMarketPresenter implements MarketPresenter {
  constructor(
    private readonly client: UsingClient,
    private readonly routing: DiscordRouting,
  ) {}

  private listingChannel(category: ListingCategory): ChannelId {
    return category === "main"
      ? this.routing.mainListingsChannelId
      : this.routing.ironListingsChannelId;
  }

  async publishListing(draft: ListingDraft): Promise<PublishedListingRef> {
    const channelId = this.listingChannel(draft.category);
    const message = await this.client.messages.write(channelId, {
      embeds: [buildListingEmbed(listingViewFromDraft(draft))],
      components: [buildListingButtons(draft.id)],
    });

    const extraMessageIds: MessageId[] = [];
    for (const [index, url] of draft.images.slice(1).entries()) {
      try {
        const extra = await this.client.messages.write(channelId, {
          embeds: [buildScreenshotEmbed(url, index + 2)],
        });
        extraMessageIds.push(extra.id);
      } catch (error) {
        // Remove what was already posted.
        await this.retractListing({ channelId, messageId: message.id, extraMessageIds });
        throw error;
      }
    }

    return { channelId, messageId: message.id, extraMessageIds };
  }

  async updateListing(listing: ActiveListing): Promise<void> {
    await this.client.messages.edit(listing.messageId, listing.channelId, {
      embeds: [buildListingEmbed(listingViewFromRecord(listing))],
      components: [buildListingButtons(listing._id)],
    });
  }

  async retractListing(ref: PublishedListingRef): Promise<void> {
    for (const messageId of [ref.messageId, ...ref.extraMessageIds]) {
      await ignoreGone(() => this.client.messages.delete(messageId, ref.channelId));
    }
  }

  async openNegotiationSpace(request: NegotiationSpaceRequest): Promise<{ channelId: ChannelId }> {
    const { guildId, staffRoleId, tradeCategoryId } = this.routing;
    const channel = await this.client.guilds.channels.create(guildId, {
      name: `trade-${channelSlug(request.buyerName)}`,
      type: ChannelType.GuildText,
      parent_id: tradeCategoryId,
      topic: `Trade ${request.tradeId} · ${request.snapshot.accountType}`,
      permission_overwrites: privateOverwrites(guildId, staffRoleId, [
        request.buyerId,
        request.sellerId,
      ]),
    });
    return { channelId: channel.id };
  }

  async postControls(
    channelId: ChannelId,
    trade: NegotiationSpaceRequest,
  ): Promise<{ messageId: MessageId }> {
    const message = await this.client.messages.write(channelId, {
      content: `<@${trade.buyerId}> <@${trade.sellerId}>`,
      embeds: [buildTradeEmbed(trade)],
      components: [buildTradeControls(trade.tradeId)],
    });
    return { messageId: message.id };
  }

  async disableControls(channelId: ChannelId, messageId: MessageId, tradeId: TradeId): Promise<void> {
    await ignoreGone(() =>
      this.client.messages.edit(messageId, channelId, {
        components: [buildTradeControls(tradeId, true)],
      }),
    );
  }

  async announce(channelId: ChannelId, notice: ChannelNotice): Promise<void> {
    await this.client.messages.write(channelId, { content: formatChannelNotice(notice) });
  }

  async closeSpace(channelId: ChannelId): Promise<void> {
    await ignoreGone(() => this.client.channels.delete(channelId));
  }

  async notifyUser(userId: UserId, notice: UserNotice): Promise<void> {
    await this.client.users.write(userId, { content: formatUserNotice(notice) });
  }

  async promptRating(prompt: RatingPrompt): Promise<void> {
    await this.client.users.write(prompt.raterId, buildRatingPrompt(prompt));
  }

  async publishVouch(vouch: PublishedVouch): Promise<void> {
    await this.client.messages.write(this.routing.vouchLogChannelId, {
      embeds: [buildVouchEmbed(vouch)],
    });
  }

  async logCompletedTrade(entry: TradeHistoryEntry, trade: TradeSession): Promise<void> {
    await this.client.messages.write(this.routing.completedSalesChannelId, {
      embeds: [
        buildCompletedSaleEmbed({
          tradeId: trade._id,
          accountType: entry.accountType,
          price: entry.price,
          buyerId: entry.buyerId,
          sellerId: entry.sellerId,
          completedAt: entry.completedAt,
        }),
      ],
    });
  }
}

export class DiscordTicketPresenter implements TicketPresenter {
  constructor(
    private readonly client: UsingClient,
    private readonly routing: DiscordRouting,
  ) {}

  async openTicketChannel(user: { id: UserId; name: string }): Promise<{ channelId: ChannelId }> {
    const { guildId, staffRoleId, ticketCategoryId } = this.routing;
    const channel = await this.client.guilds.channels.create(guildId, {
      name: `ticket-${channelSlug(user.name)}`,
      type: ChannelType.GuildText,
      parent_id: ticketCategoryId,
      permission_overwrites: privateOverwrites(guildId, staffRoleId, [user.id]),
    });
    return { channelId: channel.id };
  }

  async postTicketWelcome(channelId: ChannelId, userId: UserId): Promise<void> {
    await this.client.messages.write(channelId, buildTicketWelcome(channelId, userId));
  }

  async announce(channelId: ChannelId, notice: TicketNotice): Promise<void> {
    await this.client.messages.write(channelId, { content: formatTicketNotice(notice) });
  }

  async closeTicketChannel(channelId: ChannelId): Promise<void> {
    await ignoreGone(() => this.client.channels.delete(channelId));
  }
}
