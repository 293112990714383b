/**
 * Motivación: separar la presentación (embeds, botones, modales) de la lógica de negocio.
 *
 * Idea/concepto: funciones puras que transforman listados, trades, vouches y estadísticas en
 * componentes de Discord.
 *
 * Alcance: solo construcción de UI; no realiza operaciones de I/O ni lógica de estado.
 */
import { ActionRow, Button, Embed, Modal, TextInput } from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import { ButtonStyle, TextInputStyle } from "seyfert/lib/types";
import type { ActiveListing } from "@/db/schemas/listing";
import type { Vouch, VouchRole, VouchSlot } from "@/db/schemas/vouch";
import { formatPriceValue, parsePrice } from "@/modules/listings/price";
import type {
  ListingDraft,
  NegotiationSpaceRequest,
  PublishedVouch,
  RatingPrompt,
} from "@/modules/market/presenter";
import { CATEGORY_PREFIX, type ListingCategory, shortId } from "@/modules/market/types";
import type { ReputationStats } from "@/modules/reputation";
import { COMMENT_INPUT, CustomIds, SALE_INPUT } from "./custom-ids";

const stars = (count: number): string => "⭐".repeat(count);

function priceLabel(raw: string): string {
  const parsed = parsePrice(raw);
  if (parsed.isErr() || !parsed.unwrap().multiplier) return raw;
  return `${raw} (${formatPriceValue(parsed.unwrap().value)})`;
}

/** Panel con un botón por categoría de cuenta. */
export function buildMarketPanel(): { embeds: Embed[]; components: ActionRow<Button>[] } {
  const embed = new Embed()
    .setTitle("Create a trade")
    .setDescription("Post your account using the buttons below.")
    .setColor(EmbedColors.Blurple);

  const row = new ActionRow<Button>().addComponents(
    new Button()
      .setCustomId(CustomIds.postListing("main"))
      .setLabel("Post OSRS Main Account")
      .setStyle(ButtonStyle.Success),
    new Button()
      .setCustomId(CustomIds.postListing("iron"))
      .setLabel("Post OSRS Iron Account")
      .setStyle(ButtonStyle.Primary),
  );

  return { embeds: [embed], components: [row] };
}

export function buildSaleModal(category: ListingCategory): Modal {
  return new Modal()
    .setCustomId(CustomIds.saleModal(category))
    .setTitle(`${CATEGORY_PREFIX[category]} Account Sale Listing`)
    .addComponents(
      new ActionRow<TextInput>().addComponents(
        new TextInput()
          .setCustomId(SALE_INPUT.accountType)
          .setLabel("Account Type")
          .setPlaceholder("e.g. Maxed Pure, Ironman")
          .setStyle(TextInputStyle.Short)
          .setRequired(true),
      ),
      new ActionRow<TextInput>().addComponents(
        new TextInput()
          .setCustomId(SALE_INPUT.price)
          .setLabel("Price")
          .setPlaceholder("e.g. $150 or 250m OSRS GP")
          .setStyle(TextInputStyle.Short)
          .setRequired(true),
      ),
      new ActionRow<TextInput>().addComponents(
        new TextInput()
          .setCustomId(SALE_INPUT.description)
          .setLabel("Description")
          .setStyle(TextInputStyle.Paragraph)
          .setRequired(true),
      ),
    );
}

export function buildEditModal(listing: ActiveListing): Modal {
  return new Modal()
    .setCustomId(CustomIds.listingEditModal(listing._id))
    .setTitle("Edit Listing")
    .addComponents(
      new ActionRow<TextInput>().addComponents(
        new TextInput()
          .setCustomId(SALE_INPUT.accountType)
          .setLabel("Account Type")
          .setStyle(TextInputStyle.Short)
          .setValue(listing.accountType)
          .setRequired(true),
      ),
      new ActionRow<TextInput>().addComponents(
        new TextInput()
          .setCustomId(SALE_INPUT.price)
          .setLabel("Price")
          .setStyle(TextInputStyle.Short)
          .setValue(listing.price)
          .setRequired(true),
      ),
      new ActionRow<TextInput>().addComponents(
        new TextInput()
          .setCustomId(SALE_INPUT.description)
          .setLabel("Description")
          .setStyle(TextInputStyle.Paragraph)
          .setValue(listing.description)
          .setRequired(true),
      ),
    );
}

type ListingView = Pick<
  ActiveListing,
  "accountType" | "price" | "description" | "ownerId" | "ownerName" | "images"
> & { id: string };

export const listingViewFromDraft = (draft: ListingDraft): ListingView => ({ ...draft });

export const listingViewFromRecord = (listing: ActiveListing): ListingView => ({
  ...listing,
  id: listing._id,
});

export function buildListingEmbed(listing: ListingView): Embed {
  const embed = new Embed()
    .setTitle(`💼 ${listing.accountType}`)
    .setDescription(listing.description)
    .setColor(EmbedColors.Green)
    .addFields([
      { name: "💰 Price", value: priceLabel(listing.price), inline: true },
      { name: "🧑 Seller", value: `<@${listing.ownerId}>`, inline: true },
    ])
    .setFooter({ text: `Listing ${listing.id} · posted by ${listing.ownerName}` })
    .setTimestamp();

  const [first] = listing.images;
  if (first) embed.setImage(first);
  return embed;
}

export function buildScreenshotEmbed(url: string, position: number): Embed {
  return new Embed()
    .setTitle(`📷 Additional Screenshot #${position}`)
    .setDescription("Provided by seller")
    .setColor(EmbedColors.Yellow)
    .setImage(url);
}

export function buildListingButtons(listingId: string): ActionRow<Button> {
  return new ActionRow<Button>().addComponents(
    new Button()
      .setCustomId(CustomIds.listingTrade(listingId))
      .setLabel("Trade")
      .setStyle(ButtonStyle.Success),
    new Button()
      .setCustomId(CustomIds.listingEdit(listingId))
      .setLabel("✏️ Edit")
      .setStyle(ButtonStyle.Secondary),
    new Button()
      .setCustomId(CustomIds.listingCancel(listingId))
      .setLabel("❌ Cancel")
      .setStyle(ButtonStyle.Danger),
  );
}

export function buildTradeEmbed(trade: NegotiationSpaceRequest): Embed {
  return new Embed()
    .setTitle(`🤝 Trade ${shortId(trade.tradeId)}`)
    .setDescription(
      "Negotiate here. When the trade is done, **both** parties press **Trade Completed**.\nStaff can confirm or cancel on your behalf.",
    )
    .setColor(EmbedColors.Blurple)
    .addFields([
      { name: "Account", value: trade.snapshot.accountType, inline: true },
      { name: "Price", value: priceLabel(trade.snapshot.price), inline: true },
      { name: "Buyer", value: `<@${trade.buyerId}>`, inline: true },
      { name: "Seller", value: `<@${trade.sellerId}>`, inline: true },
    ]);
}

export function buildTradeControls(tradeId: string, disabled = false): ActionRow<Button> {
  return new ActionRow<Button>().addComponents(
    new Button()
      .setCustomId(CustomIds.tradeComplete(tradeId))
      .setLabel("✅ Trade Completed")
      .setStyle(ButtonStyle.Success)
      .setDisabled(disabled),
    new Button()
      .setCustomId(CustomIds.tradeCancel(tradeId))
      .setLabel("❌ Trade Canceled")
      .setStyle(ButtonStyle.Danger)
      .setDisabled(disabled),
  );
}

export function buildCompletedSaleEmbed(params: {
  tradeId: string;
  accountType: string;
  price: string;
  buyerId: string;
  sellerId: string;
  completedAt: Date;
}): Embed {
  return new Embed()
    .setTitle("✅ Sale Completed")
    .setColor(EmbedColors.Green)
    .addFields([
      { name: "Account", value: params.accountType, inline: true },
      { name: "Price", value: priceLabel(params.price), inline: true },
      { name: "Trade", value: `\`${shortId(params.tradeId)}\``, inline: true },
      { name: "Buyer", value: `<@${params.buyerId}>`, inline: true },
      { name: "Seller", value: `<@${params.sellerId}>`, inline: true },
    ])
    .setTimestamp(params.completedAt);
}

export function buildRatingPrompt(prompt: RatingPrompt): {
  embeds: Embed[];
  components: ActionRow<Button>[];
} {
  const who = prompt.role === "buyer" ? "seller" : "buyer";
  const embed = new Embed()
    .setTitle("⭐ Leave a vouch")
    .setDescription(
      `How was your trade with the ${who} **${prompt.ratedName}** for **${prompt.accountType}**?\nPick a rating before <t:${Math.floor(prompt.expiresAt.getTime() / 1000)}:t>.`,
    )
    .setColor(EmbedColors.Yellow)
    .setFooter({ text: `Trade ${shortId(prompt.tradeId)}` });

  const row = new ActionRow<Button>();
  for (let count = 1; count <= 5; count++) {
    row.addComponents(
      new Button()
        .setCustomId(CustomIds.rateStars(prompt.tradeId, prompt.role, count))
        .setLabel(stars(count))
        .setStyle(ButtonStyle.Primary),
    );
  }
  return { embeds: [embed], components: [row] };
}

export function buildCommentModal(tradeId: string, role: VouchRole, rating: number): Modal {
  return new Modal()
    .setCustomId(CustomIds.rateComment(tradeId, role, rating))
    .setTitle(`Vouch: ${stars(rating)}`)
    .addComponents(
      new ActionRow<TextInput>().addComponents(
        new TextInput()
          .setCustomId(COMMENT_INPUT)
          .setLabel("Comments")
          .setStyle(TextInputStyle.Paragraph)
          .setPlaceholder("What was your experience?")
          .setRequired(false),
      ),
    );
}

const slotField = (label: string, slot: VouchSlot) => ({
  name: `${label} → <@${slot.ratedId}>`,
  value: `${stars(slot.stars)}\n${slot.comment || "_No comment_"}\nby <@${slot.raterId}>`,
  inline: false,
});

export function buildVouchEmbed(vouch: PublishedVouch): Embed {
  const embed = new Embed()
    .setTitle("📝 Trade Vouch")
    .setColor(EmbedColors.Yellow)
    .addFields([slotField("Buyer's vouch", vouch.buyer), slotField("Seller's vouch", vouch.seller)])
    .setFooter({ text: `Trade ${shortId(vouch.tradeId)}` })
    .setTimestamp();

  if (vouch.accountType) {
    const price = vouch.price ? ` · ${priceLabel(vouch.price)}` : "";
    embed.setDescription(`**${vouch.accountType}**${price}`);
  }
  return embed;
}

export function buildStatsEmbed(stats: ReputationStats, recent: Vouch[]): Embed {
  const average =
    stats.average === undefined ? "No ratings yet" : `${stats.average} / 5 (${stats.ratingCount})`;

  const embed = new Embed()
    .setTitle(`📊 Trader stats: ${stats.displayName ?? stats.userId}`)
    .setColor(EmbedColors.Blurple)
    .addFields([
      { name: "Sales", value: `${stats.sales}`, inline: true },
      { name: "Purchases", value: `${stats.purchases}`, inline: true },
      { name: "Average rating", value: average, inline: true },
    ]);

  if (recent.length) {
    embed.addFields([
      {
        name: "Recent vouches",
        value: recent
          .map((vouch) => `${stars(vouch.stars)} from <@${vouch.raterId}>: ${vouch.comment || "_No comment_"}`)
          .join("\n")
          .slice(0, 1024),
        inline: false,
      },
    ]);
  }
  return embed;
}

export function buildListingsEmbed(listings: ActiveListing[]): Embed {
  const embed = new Embed().setTitle("📦 Your active listings").setColor(EmbedColors.Green);
  if (!listings.length) return embed.setDescription("You have no active listings.");

  return embed.setDescription(
    listings
      .map(
        (listing) =>
          `• **${listing.accountType}** · ${listing.price} · <#${listing.channelId}> · \`${listing._id}\``,
      )
      .join("\n"),
  );
}

export function buildTicketPanel(): { embeds: Embed[]; components: ActionRow<Button>[] } {
  const embed = new Embed()
    .setTitle("Support")
    .setDescription("Need help with a trade? Open a private ticket with staff.")
    .setColor(EmbedColors.Blurple);
  const row = new ActionRow<Button>().addComponents(
    new Button()
      .setCustomId(CustomIds.ticketOpen())
      .setLabel("🎫 Open Ticket")
      .setStyle(ButtonStyle.Primary),
  );
  return { embeds: [embed], components: [row] };
}

export function buildTicketWelcome(channelId: string, userId: string): {
  content: string;
  embeds: Embed[];
  components: ActionRow<Button>[];
} {
  const embed = new Embed()
    .setTitle("🎫 Support Ticket")
    .setDescription("Describe your issue and a staff member will be with you shortly.")
    .setColor(EmbedColors.Blurple);
  const row = new ActionRow<Button>().addComponents(
    new Button()
      .setCustomId(CustomIds.ticketClose(channelId))
      .setLabel("Close Ticket")
      .setStyle(ButtonStyle.Danger),
  );
  return { content: `<@${userId}>`, embeds: [embed], components: [row] };
}
